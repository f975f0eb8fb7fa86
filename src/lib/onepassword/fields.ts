// Path: src/lib/onepassword/fields.ts
// Secure note fields <-> SecretSet, with a push that never deletes

import { opLogger as log } from '../logger.js';
import { formatTimestamp } from '../../utils/time.js';
import type { SecretSet } from '../env-file.js';
import type { OnePasswordClient } from './client.js';
import type { NoteField, SecureNote } from './types.js';

/** Section holding the tool's own bookkeeping fields */
export const METADATA_SECTION = 'op-env-sync';

/** Optional field naming the local file a note is materialized to */
export const FILE_NAME_FIELD = 'file_name';

/** Id of the built-in notes field */
export const NOTES_FIELD = 'notesPlain';

export type NoteStamp = 'last edited at' | 'last imported at';

/**
 * Outcome of comparing a local SecretSet with a note's fields.
 * `remoteOnly` keys are reported but never removed.
 */
export interface SecretDiff {
  added: string[];
  changed: string[];
  unchanged: string[];
  remoteOnly: string[];
}

/**
 * Fields that describe the note rather than hold a secret
 */
export function isMetadataField(field: NoteField): boolean {
  return (
    field.label === FILE_NAME_FIELD ||
    field.purpose === 'NOTES' ||
    field.id === NOTES_FIELD ||
    field.section?.label === METADATA_SECTION
  );
}

function secretFields(note: SecureNote): NoteField[] {
  return note.fields.filter(field => field.label !== '' && !isMetadataField(field));
}

/**
 * Read every secret field of a note into a SecretSet
 */
export function pullFields(note: SecureNote): SecretSet {
  const secrets: SecretSet = {};
  for (const field of secretFields(note)) {
    secrets[field.label] = field.value ?? '';
  }
  return secrets;
}

/**
 * Value of the note's `file_name` field, if set and non-blank
 */
export function getFileName(note: SecureNote): string | undefined {
  const field = note.fields.find(f => f.label === FILE_NAME_FIELD);
  const value = field?.value?.trim();
  return value ? value : undefined;
}

/**
 * Local keys that name a metadata field and so are never pushed
 */
export function reservedKeys(local: SecretSet): string[] {
  return Object.keys(local).filter(key => key === FILE_NAME_FIELD || key === NOTES_FIELD);
}

/**
 * Compare a local SecretSet against the remote one.
 * Reserved keys are left out of the comparison.
 */
export function diffSecrets(local: SecretSet, remote: SecretSet): SecretDiff {
  const diff: SecretDiff = { added: [], changed: [], unchanged: [], remoteOnly: [] };
  const reserved = new Set(reservedKeys(local));

  for (const [key, value] of Object.entries(local)) {
    if (reserved.has(key)) {
      continue;
    } else if (!Object.hasOwn(remote, key)) {
      diff.added.push(key);
    } else if (remote[key] !== value) {
      diff.changed.push(key);
    } else {
      diff.unchanged.push(key);
    }
  }

  for (const key of Object.keys(remote)) {
    if (!Object.hasOwn(local, key)) {
      diff.remoteOnly.push(key);
    }
  }

  return diff;
}

export function hasChanges(diff: SecretDiff): boolean {
  return diff.added.length > 0 || diff.changed.length > 0;
}

/**
 * Escape `.`, `=` and `\` in a section or field name for an `op` assignment
 */
export function escapeAssignmentName(name: string): string {
  return name.replace(/[\\.=]/g, match => `\\${match}`);
}

function assignment(section: string | undefined, label: string, type: string, value: string): string {
  const prefix = section ? `${escapeAssignmentName(section)}.` : '';
  return `${prefix}${escapeAssignmentName(label)}[${type}]=${value}`;
}

/**
 * Assignment statements writing the added and changed keys.
 * A changed key is written back into the section it already lives in.
 */
export function buildAssignments(note: SecureNote, local: SecretSet, diff: SecretDiff): string[] {
  const sections = new Map<string, string | undefined>();
  for (const field of secretFields(note)) {
    sections.set(field.label, field.section?.label || undefined);
  }

  return [...diff.added, ...diff.changed].map(key =>
    assignment(sections.get(key), key, 'password', local[key])
  );
}

function stampAssignment(stamp: NoteStamp, now: Date): string {
  return assignment(METADATA_SECTION, stamp, 'text', formatTimestamp(now));
}

export interface PushOptions {
  /** Bookkeeping field updated in the same edit when something changed */
  stamp?: NoteStamp;
  now?: Date;
  /** Compute the diff without editing the note */
  dryRun?: boolean;
}

/**
 * Write local secrets to a note: new keys are added, changed keys are
 * overwritten, and keys missing locally are left alone.
 */
export function pushFields(
  client: OnePasswordClient,
  note: SecureNote,
  local: SecretSet,
  options: PushOptions = {}
): SecretDiff {
  const diff = diffSecrets(local, pullFields(note));

  const reserved = reservedKeys(local);
  if (reserved.length > 0) {
    log.warn({ id: note.id, keys: reserved }, 'Skipped keys naming note metadata fields');
  }

  if (!hasChanges(diff) || options.dryRun) {
    log.debug({ id: note.id, dryRun: options.dryRun ?? false, diff }, 'Push skipped');
    return diff;
  }

  const assignments = buildAssignments(note, local, diff);
  if (options.stamp) {
    assignments.push(stampAssignment(options.stamp, options.now ?? new Date()));
  }

  client.editItem(note.id, assignments);
  log.info(
    { id: note.id, added: diff.added, changed: diff.changed, kept: diff.remoteOnly },
    'Pushed fields to secure note'
  );
  return diff;
}

/**
 * Record when the note was last edited or imported
 */
export function stampNote(
  client: OnePasswordClient,
  note: SecureNote,
  stamp: NoteStamp,
  now: Date = new Date()
): void {
  client.editItem(note.id, [stampAssignment(stamp, now)]);
}
