// Path: src/lib/config/loader.ts
// Configuration loading and retrieval

import fs from 'node:fs';
import { configLogger as log } from '../logger.js';
import { RdsIamError } from '../../utils/error.js';
import { parseDuration } from '../../utils/duration.js';
import type { AppConfig, ConfigFile } from './types.js';
import { EMPTY_CONFIG } from './types.js';
import { getConfigFile, getUserConfig } from './storage.js';

function readDuration(value: string | number | undefined, field: string, fallback: number): number {
  if (value === undefined) return fallback;
  const ms = parseDuration(value);
  if (ms === undefined) {
    throw new RdsIamError(
      `Invalid duration for ${field}: expected e.g. "14m", "90s" or milliseconds`,
      'INVALID_CONFIG',
      { metadata: { field } }
    );
  }
  return ms;
}

function readBoolean(value: string): boolean | undefined {
  switch (value.trim().toLowerCase()) {
    case 'true':
    case '1':
    case 'yes':
      return true;
    case 'false':
    case '0':
    case 'no':
      return false;
    default:
      return undefined;
  }
}

/**
 * Read config.json, or the user-level store when no system config exists
 */
function readConfigFile(): ConfigFile {
  const configFile = getConfigFile();

  if (fs.existsSync(configFile)) {
    try {
      const parsed = JSON.parse(fs.readFileSync(configFile, 'utf-8')) as ConfigFile;
      log.debug({ path: configFile }, 'Loaded system config');
      return parsed;
    } catch (err) {
      throw new RdsIamError(`Failed to load config file ${configFile}`, 'INVALID_CONFIG', { cause: err });
    }
  }

  if (process.env.RDS_IAM_CONNECT_CONFIG_DIR) {
    // Custom config dir without a file yet: don't fall back to the user store
    log.debug({ path: configFile }, 'Using empty config for custom config dir');
    return {};
  }

  const userConfig = getUserConfig();
  log.debug({ path: userConfig.path }, 'Loaded user config');
  return userConfig.store;
}

/**
 * Merge a config file over the defaults. A zero refresh interval keeps meaning
 * "use the default"; the authenticator resolves it.
 */
export function resolveConfig(file: ConfigFile): AppConfig {
  return {
    connectionString: file.connectionString ?? EMPTY_CONFIG.connectionString,
    rdsIam: {
      enabled: file.rdsIam?.enabled ?? EMPTY_CONFIG.rdsIam.enabled,
      region: file.rdsIam?.region ?? EMPTY_CONFIG.rdsIam.region,
      dbUser: file.rdsIam?.dbUser,
      tokenRefreshIntervalMs: readDuration(
        file.rdsIam?.tokenRefreshInterval,
        'rdsIam.tokenRefreshInterval',
        EMPTY_CONFIG.rdsIam.tokenRefreshIntervalMs
      ),
    },
    pool: {
      maxConnections: file.pool?.maxConnections ?? EMPTY_CONFIG.pool.maxConnections,
      idleTimeoutMs: readDuration(file.pool?.idleTimeout, 'pool.idleTimeout', EMPTY_CONFIG.pool.idleTimeoutMs),
      connectionTimeoutSeconds: file.pool?.connectionTimeoutSeconds ?? EMPTY_CONFIG.pool.connectionTimeoutSeconds,
    },
  };
}

/**
 * Load configuration from file or user config, with environment variable overrides.
 *
 * Environment variables:
 * - DATABASE_URL: Override connection string
 * - RDS_IAM_ENABLED: "true"/"false" to switch IAM auth
 * - RDS_IAM_REGION: Override AWS region
 * - RDS_IAM_DB_USER: Override database user for token signing
 * - RDS_IAM_TOKEN_REFRESH_INTERVAL: Override refresh interval ("14m", "90s", ms)
 *
 * @throws RdsIamError INVALID_CONFIG for unreadable files or invalid values
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const config = resolveConfig(readConfigFile());

  if (env.DATABASE_URL) {
    config.connectionString = env.DATABASE_URL;
  }
  if (env.RDS_IAM_ENABLED) {
    const enabled = readBoolean(env.RDS_IAM_ENABLED);
    if (enabled === undefined) {
      throw new RdsIamError('Invalid value for RDS_IAM_ENABLED: expected true or false', 'INVALID_CONFIG');
    }
    config.rdsIam.enabled = enabled;
  }
  if (env.RDS_IAM_REGION) {
    config.rdsIam.region = env.RDS_IAM_REGION;
  }
  if (env.RDS_IAM_DB_USER) {
    config.rdsIam.dbUser = env.RDS_IAM_DB_USER;
  }
  if (env.RDS_IAM_TOKEN_REFRESH_INTERVAL) {
    config.rdsIam.tokenRefreshIntervalMs = readDuration(
      env.RDS_IAM_TOKEN_REFRESH_INTERVAL,
      'RDS_IAM_TOKEN_REFRESH_INTERVAL',
      config.rdsIam.tokenRefreshIntervalMs
    );
  }

  return config;
}

/**
 * Get config file path for display
 */
export function getConfigPath(): string {
  const configFile = getConfigFile();
  if (fs.existsSync(configFile) || process.env.RDS_IAM_CONNECT_CONFIG_DIR) {
    return configFile;
  }
  return getUserConfig().path;
}
