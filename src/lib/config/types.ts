// Path: src/lib/config/types.ts
// Configuration type definitions

import { DEFAULT_RDS_IAM_CONFIG, type RdsIamConfig } from '../../rds-iam/types.js';

/**
 * Connection pool settings
 */
export interface PoolConfig {
  /** Upper bound on open connections */
  maxConnections: number;
  /** Idle connections older than this are closed, in ms */
  idleTimeoutMs: number;
  /** Connect timeout per physical connection, in seconds */
  connectionTimeoutSeconds: number;
}

/**
 * Resolved application configuration
 */
export interface AppConfig {
  /**
   * postgres:// or mysql:// connection string.
   * May contain a password, so it is never logged.
   */
  connectionString: string;
  rdsIam: RdsIamConfig;
  pool: PoolConfig;
}

/**
 * Configuration as written in config.json. Durations may be strings such as "14m".
 */
export interface ConfigFile {
  connectionString?: string;
  rdsIam?: {
    enabled?: boolean;
    region?: string;
    dbUser?: string;
    tokenRefreshInterval?: string | number;
  };
  pool?: {
    maxConnections?: number;
    idleTimeout?: string | number;
    connectionTimeoutSeconds?: number;
  };
}

export const DEFAULT_POOL_CONFIG: Readonly<PoolConfig> = {
  maxConnections: 5,
  idleTimeoutMs: 30 * 1000,
  connectionTimeoutSeconds: 30,
};

export const EMPTY_CONFIG: Readonly<AppConfig> = {
  connectionString: '',
  rdsIam: { ...DEFAULT_RDS_IAM_CONFIG },
  pool: { ...DEFAULT_POOL_CONFIG },
};
