// Path: src/db/index.ts
// Database factory: RDS IAM setup, connector and pool wired together

import { createLogger } from '../lib/logger.js';
import type { RdsIamAuthenticator } from '../rds-iam/authenticator.js';
import { buildRdsIamConnection } from '../rds-iam/build.js';
import { createRdsIamConnector, createStaticConnector } from '../rds-iam/connector.js';
import type { RdsIamConfig, RdsIamDependencies } from '../rds-iam/types.js';
import { createDrivers, driverNameForConnectionString, type DriverRegistry } from './drivers/index.js';
import { ConnectionPool, type ConnectionPoolOptions, type PoolStats } from './pool.js';
import type { DatabaseConnection, DriverName, Row } from './types.js';

const log = createLogger({ module: 'db' });

export interface OpenDatabaseOptions extends ConnectionPoolOptions {
  connectionTimeoutSeconds?: number;
  /** Credential resolver and token signer (default: AWS SDK) */
  dependencies?: RdsIamDependencies;
  /** Driver implementations (default: pg and mysql2) */
  drivers?: DriverRegistry;
  signal?: AbortSignal;
}

/**
 * Pooled database handle
 */
export class Database {
  constructor(
    readonly driverName: DriverName,
    private readonly pool: ConnectionPool,
    /** Token handle, or null when IAM auth is disabled */
    readonly authenticator: RdsIamAuthenticator | null
  ) {}

  async query(sql: string, params?: unknown[], signal?: AbortSignal): Promise<Row[]> {
    return this.pool.withConnection((conn) => conn.query(sql, params), signal);
  }

  async withConnection<T>(fn: (conn: DatabaseConnection) => Promise<T>, signal?: AbortSignal): Promise<T> {
    return this.pool.withConnection(fn, signal);
  }

  /**
   * Check that a connection can be opened and answers a ping
   */
  async testConnection(signal?: AbortSignal): Promise<boolean> {
    try {
      await this.pool.withConnection((conn) => conn.ping(), signal);
      return true;
    } catch (err) {
      log.error({ err, driver: this.driverName }, 'Database connection test failed');
      return false;
    }
  }

  stats(): PoolStats {
    return this.pool.stats();
  }

  async close(): Promise<void> {
    await this.pool.close();
  }
}

/**
 * Open a pooled database for a postgres:// or mysql:// connection string.
 *
 * With IAM auth enabled the initial token is fetched before this resolves, and every
 * physical connection the pool opens later asks the authenticator for a fresh one.
 */
export async function openDatabase(
  connectionString: string,
  rdsIam: RdsIamConfig,
  options: OpenDatabaseOptions = {}
): Promise<Database> {
  const driverName = driverNameForConnectionString(connectionString);
  const drivers = options.drivers ?? createDrivers({ connectionTimeoutSeconds: options.connectionTimeoutSeconds });

  const { connectionString: rewritten, authenticator } = await buildRdsIamConnection(
    connectionString,
    rdsIam,
    options.dependencies,
    options.signal
  );

  const connector = authenticator
    ? createRdsIamConnector(driverName, authenticator, drivers)
    : createStaticConnector(driverName, rewritten, drivers);

  const pool = new ConnectionPool(connector, {
    maxConnections: options.maxConnections,
    idleTimeoutMs: options.idleTimeoutMs,
  });

  log.debug({ driver: driverName, iamAuth: authenticator !== null }, 'Database pool created');
  return new Database(driverName, pool, authenticator);
}

export { ConnectionPool } from './pool.js';
export type { ConnectionPoolOptions, PoolStats } from './pool.js';
export type { Connector, DatabaseConnection, DatabaseDriver, DriverName, DriverOptions, Row } from './types.js';
export { createDrivers, getDriver, driverNameForConnectionString } from './drivers/index.js';
export type { DriverRegistry } from './drivers/index.js';
