// Path: src/lib/onepassword/client.ts
// Thin wrapper over the 1Password CLI (`op`)

import { opLogger as log } from '../logger.js';
import { runCommand, type CommandRunner } from '../../utils/shell.js';
import {
  parseItemSummaries,
  parseSecureNote,
  type ItemSummary,
  type SecureNote,
} from './types.js';

export interface OnePasswordClientOptions {
  /** op executable (default: `op`) */
  bin?: string;
  /** Restrict every query to one vault */
  vault?: string;
  run?: CommandRunner;
}

/**
 * Reads and edits secure notes through an already signed-in `op` session.
 */
export class OnePasswordClient {
  private readonly bin: string;
  private readonly vault?: string;
  private readonly run: CommandRunner;

  constructor(options: OnePasswordClientOptions = {}) {
    this.bin = options.bin ?? 'op';
    this.vault = options.vault;
    this.run = options.run ?? runCommand;
  }

  private vaultArgs(): string[] {
    return this.vault ? ['--vault', this.vault] : [];
  }

  /**
   * List every secure note visible to the session
   */
  listSecureNotes(): ItemSummary[] {
    const output = this.run(this.bin, [
      'item', 'list',
      '--categories', 'Secure Note',
      ...this.vaultArgs(),
      '--format', 'json',
    ]);
    const items = parseItemSummaries(output);
    log.debug({ count: items.length, vault: this.vault }, 'Listed secure notes');
    return items;
  }

  /**
   * Fetch a note with all of its fields
   */
  getItem(id: string): SecureNote {
    const output = this.run(this.bin, ['item', 'get', id, ...this.vaultArgs(), '--format', 'json']);
    const note = parseSecureNote(output);
    log.debug({ id, fieldCount: note.fields.length }, 'Fetched secure note');
    return note;
  }

  /**
   * Apply assignment statements (`[section.]field[type]=value`) to a note in one call
   */
  editItem(id: string, assignments: string[]): void {
    if (assignments.length === 0) {
      return;
    }
    this.run(this.bin, ['item', 'edit', id, ...this.vaultArgs(), ...assignments, '--format', 'json']);
    log.info({ id, fieldCount: assignments.length }, 'Edited secure note');
  }
}
