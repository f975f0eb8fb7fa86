// Path: src/lib/onepassword/resolver.ts
// Find the one secure note whose title contains a locator

import { opLogger as log } from '../logger.js';
import { AmbiguousError, NotFoundError } from '../../utils/error.js';
import type { OnePasswordClient } from './client.js';
import type { ItemSummary, SecureNote } from './types.js';

/**
 * Secure notes whose title contains the locator substring
 */
export function findMatchingNotes(notes: ItemSummary[], locator: string): ItemSummary[] {
  return notes.filter(note => note.title.includes(locator));
}

/**
 * Resolve a locator (`repo:<owner>/<repo>` or `fly:<app>`) to exactly one note.
 *
 * @throws NotFoundError when no title matches
 * @throws AmbiguousError when several titles match
 */
export function resolveNote(client: OnePasswordClient, locator: string): SecureNote {
  const matches = findMatchingNotes(client.listSecureNotes(), locator);

  if (matches.length === 0) {
    throw new NotFoundError(locator);
  }
  if (matches.length > 1) {
    throw new AmbiguousError(locator, matches.map(m => m.title));
  }

  const [match] = matches;
  log.debug({ locator, id: match.id, title: match.title }, 'Resolved secure note');
  return client.getItem(match.id);
}
