// Path: src/lib/onepassword/index.ts
// Public API for the 1Password module

export type { ItemSummary, NoteField, FieldSection, SecureNote } from './types.js';
export { parseItemSummaries, parseSecureNote } from './types.js';

export { OnePasswordClient, type OnePasswordClientOptions } from './client.js';

export { resolveNote, findMatchingNotes } from './resolver.js';

export {
  METADATA_SECTION,
  FILE_NAME_FIELD,
  NOTES_FIELD,
  isMetadataField,
  pullFields,
  getFileName,
  reservedKeys,
  diffSecrets,
  hasChanges,
  escapeAssignmentName,
  buildAssignments,
  pushFields,
  stampNote,
  type NoteStamp,
  type SecretDiff,
  type PushOptions,
} from './fields.js';
