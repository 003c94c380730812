// Path: src/commands/types.ts
// Type definitions for Commander.js command options

/**
 * Options for the 'status' command
 */
export interface StatusCommandOptions {
  json?: boolean;
}

/**
 * Options for the 'url' command
 */
export interface UrlCommandOptions {
  showSecret?: boolean;
}

/**
 * Options for the 'check' command
 */
export interface CheckCommandOptions {
  metrics?: boolean;
}
