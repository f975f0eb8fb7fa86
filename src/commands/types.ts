// Path: src/commands/types.ts
// Type definitions for Commander.js command options

/**
 * Options for the 'local push' command
 */
export interface LocalPushCommandOptions {
  dryRun?: boolean;
}

/**
 * Options for the 'local status' command
 */
export interface LocalStatusCommandOptions {
  json?: boolean;
}

/**
 * Options for the 'fly edit' command
 */
export interface FlyEditCommandOptions {
  /** Import to Fly after editing without asking */
  yes?: boolean;
  /** Commander sets this to false for --no-import */
  import?: boolean;
}

/**
 * Options for the 'config list' command
 */
export interface ConfigListCommandOptions {
  json?: boolean;
}
