// Path: src/lib/sync/index.ts
// Public API for sync operations

export { createSyncContext, type SyncContext, type SyncContextOverrides } from './context.js';

export {
  resolveLocalTarget,
  getLocalSecrets,
  pushLocalSecrets,
  localStatus,
  type LocalTarget,
  type GetResult,
  type PushResult,
} from './local.js';

export { importToFly, editFlySecrets, type ImportResult, type EditResult } from './fly.js';
