// Path: src/lib/config/storage.ts
// Internal config storage management

import Conf from 'conf';
import path from 'node:path';
import type { ConfigFile } from './types.js';

/**
 * Get config directory path - computed dynamically to support test isolation
 */
export function getConfigDir(): string {
  return process.env.RDS_IAM_CONNECT_CONFIG_DIR ?? '/etc/rds-iam-connect';
}

/**
 * Get config file path
 */
export function getConfigFile(): string {
  return path.join(getConfigDir(), 'config.json');
}

let userConfig: Conf<ConfigFile> | null = null;

/**
 * User-level config store (development/non-root usage)
 * Uses Conf package for cross-platform user config storage
 */
export function getUserConfig(): Conf<ConfigFile> {
  userConfig ??= new Conf<ConfigFile>({
    projectName: 'rds-iam-connect',
    defaults: {},
  });
  return userConfig;
}
