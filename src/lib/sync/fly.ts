// Path: src/lib/sync/fly.ts
// `fly import|edit`: secure note -> Fly app secrets, and editing the note

import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { syncLogger as log } from '../logger.js';
import { flyLocator } from '../git.js';
import { parseEnv, serializeEnv } from '../env-file.js';
import { resolveNote } from '../onepassword/resolver.js';
import { hasChanges, pullFields, pushFields, stampNote, type SecretDiff } from '../onepassword/fields.js';
import { ConfigError, EmptySecretsError } from '../../utils/error.js';
import type { SyncContext } from './context.js';

export interface ImportResult {
  appName: string;
  keys: string[];
}

export interface EditResult {
  appName: string;
  /** False when the editor left the file as it was or only removed keys */
  changed: boolean;
  diff: SecretDiff;
}

/**
 * Upload the secrets of note `fly:<app>` to the Fly app, then stamp the note
 *
 * @throws EmptySecretsError if the note holds no secrets
 */
export function importToFly(ctx: SyncContext, appName: string): ImportResult {
  const locator = flyLocator(appName);
  const note = resolveNote(ctx.op, locator);
  const secrets = pullFields(note);
  const keys = Object.keys(secrets);

  if (keys.length === 0) {
    throw new EmptySecretsError(locator);
  }

  ctx.fly.setSecrets(appName, secrets);
  stampNote(ctx.op, note, 'last imported at', ctx.now());
  log.info({ app: appName, keys }, 'Imported secrets to Fly');

  return { appName, keys };
}

/**
 * Open the secrets of note `fly:<app>` in the editor and push the result back.
 * Keys deleted in the editor stay in 1Password.
 */
export function editFlySecrets(ctx: SyncContext, appName: string): EditResult {
  if (ctx.editor.length === 0) {
    throw new ConfigError('No editor configured. Run: op-env-sync config set editor "code --wait"');
  }

  const locator = flyLocator(appName);
  const note = resolveNote(ctx.op, locator);
  const original = serializeEnv(pullFields(note));

  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'op-env-sync-'));
  const filePath = path.join(dir, `${appName.replace(/[^a-zA-Z0-9_-]/g, '-')}.env`);

  let edited: string;
  try {
    fs.writeFileSync(filePath, original, { mode: 0o600 });
    const [command, ...args] = ctx.editor;
    log.debug({ app: appName, editor: command }, 'Opening editor');
    ctx.interactive(command, [...args, filePath]);
    edited = fs.readFileSync(filePath, 'utf-8');
  } finally {
    fs.rmSync(dir, { recursive: true, force: true });
  }

  if (edited === original) {
    return {
      appName,
      changed: false,
      diff: { added: [], changed: [], unchanged: Object.keys(parseEnv(original)), remoteOnly: [] },
    };
  }

  const diff = pushFields(ctx.op, note, parseEnv(edited), {
    stamp: 'last edited at',
    now: ctx.now(),
  });

  return { appName, changed: hasChanges(diff), diff };
}
