// Path: src/lib/sync/local.test.ts
// Unit tests for local .env sync operations

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { createSyncContext, type SyncContext } from './context.js';
import { getLocalSecrets, localStatus, pushLocalSecrets } from './local.js';
import { DEFAULT_CONFIG } from '../config/types.js';
import {
  EmptySecretsError,
  FileNotFoundError,
  GitRemoteError,
  InvalidPathError,
  NotFoundError,
} from '../../utils/error.js';
import { createFakeCli, field, note, type FakeCli, type FakeCliOptions } from '../../../test/helpers/fake-cli.js';

const NOW = new Date(2024, 5, 1, 8, 30, 0);

describe('local sync', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'local-sync-test-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  function setup(options: FakeCliOptions): { cli: FakeCli; ctx: SyncContext } {
    const cli = createFakeCli(options);
    const ctx = createSyncContext(DEFAULT_CONFIG, { run: cli.run, cwd: tempDir, now: () => NOW });
    return { cli, ctx };
  }

  describe('getLocalSecrets', () => {
    it('should write .env from the note matching the origin remote', () => {
      const { cli, ctx } = setup({
        remoteUrl: 'git@github.com:acme/widgets.git',
        notes: [note('n1', 'repo:acme/widgets', [field('API_KEY', 'abc'), field('DB_URL', 'foo')])],
      });

      const result = getLocalSecrets(ctx);

      expect(result.fileName).toBe('.env');
      expect(result.keys).toEqual(['API_KEY', 'DB_URL']);
      expect(fs.readFileSync(path.join(tempDir, '.env'), 'utf-8')).toBe('API_KEY=abc\nDB_URL=foo\n');
      expect(cli.callsTo('op', 'edit')).toHaveLength(0);
    });

    it('should create the file with owner-only permissions', () => {
      const { ctx } = setup({ notes: [note('n1', 'repo:acme/widgets', [field('A', '1')])] });

      getLocalSecrets(ctx);

      expect(fs.statSync(path.join(tempDir, '.env')).mode & 0o777).toBe(0o600);
    });

    it('should write to the file named by the note', () => {
      const { ctx } = setup({
        notes: [note('n1', 'repo:acme/widgets', [field('file_name', 'config/.env.local'), field('A', '1')])],
      });

      const result = getLocalSecrets(ctx);

      expect(result.fileName).toBe('config/.env.local');
      expect(fs.readFileSync(path.join(tempDir, 'config', '.env.local'), 'utf-8')).toBe('A=1\n');
    });

    it('should refuse a file name escaping the repository', () => {
      const { ctx } = setup({
        notes: [note('n1', 'repo:acme/widgets', [field('file_name', '../outside.env'), field('A', '1')])],
      });

      expect(() => getLocalSecrets(ctx)).toThrow(InvalidPathError);
      expect(fs.existsSync(path.join(tempDir, '..', 'outside.env'))).toBe(false);
    });

    it('should raise NotFoundError and write nothing without a matching note', () => {
      const { ctx } = setup({ notes: [note('n1', 'repo:acme/gadgets')] });

      expect(() => getLocalSecrets(ctx)).toThrow(NotFoundError);
      expect(fs.existsSync(path.join(tempDir, '.env'))).toBe(false);
    });

    it('should keep an existing env file when the note holds no secret fields', () => {
      const { ctx } = setup({
        notes: [{
          id: 'n1',
          title: 'repo:acme/widgets',
          fields: [{ id: 'notesPlain', label: 'notesPlain', type: 'STRING', purpose: 'NOTES', value: 'API_KEY=abc' }],
        }],
      });
      fs.writeFileSync(path.join(tempDir, '.env'), 'KEEP=me\n');

      expect(() => getLocalSecrets(ctx)).toThrow(EmptySecretsError);
      expect(fs.readFileSync(path.join(tempDir, '.env'), 'utf-8')).toBe('KEEP=me\n');
    });

    it('should raise GitRemoteError outside a repository', () => {
      const { cli, ctx } = setup({ remoteUrl: null, notes: [note('n1', 'repo:acme/widgets')] });

      expect(() => getLocalSecrets(ctx)).toThrow(GitRemoteError);
      expect(cli.callsTo('op')).toHaveLength(0);
    });
  });

  describe('pushLocalSecrets', () => {
    it('should update changed keys and keep keys only in 1Password', () => {
      const { cli, ctx } = setup({
        notes: [note('n1', 'repo:acme/widgets', [field('API_KEY', 'abc'), field('DB_URL', 'foo')])],
      });
      fs.writeFileSync(path.join(tempDir, '.env'), 'API_KEY=xyz\n');

      const result = pushLocalSecrets(ctx);

      expect(result.pushed).toBe(true);
      expect(result.diff).toEqual({ added: [], changed: ['API_KEY'], unchanged: [], remoteOnly: ['DB_URL'] });
      expect(cli.callsTo('op', 'edit').map(c => c.args)).toEqual([
        [
          'item', 'edit', 'n1',
          'API_KEY[password]=xyz',
          'op-env-sync.last edited at[text]=2024/06/01 08:30:00',
          '--format', 'json',
        ],
      ]);
    });

    it('should skip keys naming the note\'s own settings', () => {
      const { cli, ctx } = setup({
        notes: [note('n1', 'repo:acme/widgets', [field('file_name', '.env.local', { type: 'STRING' })])],
      });
      fs.writeFileSync(path.join(tempDir, '.env.local'), 'file_name=../../etc/x\nA=1\n');

      const result = pushLocalSecrets(ctx);

      expect(result.skipped).toEqual(['file_name']);
      expect(result.diff.added).toEqual(['A']);
      expect(cli.callsTo('op', 'edit').map(c => c.args)).toEqual([
        [
          'item', 'edit', 'n1',
          'A[password]=1',
          'op-env-sync.last edited at[text]=2024/06/01 08:30:00',
          '--format', 'json',
        ],
      ]);
    });

    it('should not edit the note when nothing changed', () => {
      const { cli, ctx } = setup({ notes: [note('n1', 'repo:acme/widgets', [field('A', '1')])] });
      fs.writeFileSync(path.join(tempDir, '.env'), 'A=1\n');

      const result = pushLocalSecrets(ctx);

      expect(result.pushed).toBe(false);
      expect(cli.callsTo('op', 'edit')).toHaveLength(0);
    });

    it('should only report the diff on a dry run', () => {
      const { cli, ctx } = setup({ notes: [note('n1', 'repo:acme/widgets', [field('A', '1')])] });
      fs.writeFileSync(path.join(tempDir, '.env'), 'A=2\nB=3\n');

      const result = pushLocalSecrets(ctx, { dryRun: true });

      expect(result.pushed).toBe(false);
      expect(result.diff.added).toEqual(['B']);
      expect(result.diff.changed).toEqual(['A']);
      expect(cli.callsTo('op', 'edit')).toHaveLength(0);
    });

    it('should raise FileNotFoundError when the env file is missing', () => {
      const { cli, ctx } = setup({ notes: [note('n1', 'repo:acme/widgets', [field('A', '1')])] });

      expect(() => pushLocalSecrets(ctx)).toThrow(FileNotFoundError);
      expect(() => pushLocalSecrets(ctx)).toThrow('File not found: .env');
      expect(cli.callsTo('op', 'edit')).toHaveLength(0);
    });
  });

  describe('localStatus', () => {
    it('should compare the env file with the note', () => {
      const { cli, ctx } = setup({
        notes: [note('n1', 'repo:acme/widgets', [field('A', '1'), field('B', '2')])],
      });
      fs.writeFileSync(path.join(tempDir, '.env'), 'A=1\nC=3\n');

      expect(localStatus(ctx)).toEqual({
        fileName: '.env',
        diff: { added: ['C'], changed: [], unchanged: ['A'], remoteOnly: ['B'] },
      });
      expect(cli.callsTo('op', 'edit')).toHaveLength(0);
    });
  });
});
