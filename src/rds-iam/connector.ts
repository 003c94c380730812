// Path: src/rds-iam/connector.ts
// Connectors: how the pool dials each new physical connection

import { createLogger } from '../lib/logger.js';
import { metrics } from '../lib/metrics.js';
import { getDriver, type DriverRegistry } from '../db/drivers/index.js';
import type { Connector, DatabaseConnection, DatabaseDriver } from '../db/types.js';
import type { RdsIamAuthenticator } from './authenticator.js';

const log = createLogger({ module: 'rds-iam-connector' });

async function openWith(driver: DatabaseDriver, connectionString: string): Promise<DatabaseConnection> {
  try {
    const conn = await driver.open(connectionString);
    metrics.connectionOpened(driver.name, 'success');
    return conn;
  } catch (err) {
    metrics.connectionOpened(driver.name, 'failure');
    throw err;
  }
}

/**
 * Asks the authenticator for a connection string right before every dial, so connections
 * opened long after startup (pool growth, replacing evicted connections) still get a
 * token inside its validity window. Nothing is cached between opens.
 */
export class RdsIamConnector implements Connector {
  constructor(
    private readonly authenticator: RdsIamAuthenticator,
    readonly driver: DatabaseDriver
  ) {}

  async connect(signal?: AbortSignal): Promise<DatabaseConnection> {
    // A refresh failure fails the open before anything is dialed
    const connectionString = await this.authenticator.getCurrentConnectionString(signal);
    log.debug({ driver: this.driver.name, endpoint: this.authenticator.endpoint }, 'Opening connection with IAM token');
    return openWith(this.driver, connectionString);
  }
}

/**
 * Dials every connection with the same connection string (IAM auth disabled)
 */
export class StaticConnector implements Connector {
  constructor(
    private readonly connectionString: string,
    readonly driver: DatabaseDriver
  ) {}

  async connect(): Promise<DatabaseConnection> {
    return openWith(this.driver, this.connectionString);
  }
}

/**
 * Bind an authenticator to a driver by name ('postgres' or 'mysql')
 */
export function createRdsIamConnector(
  driverName: string,
  authenticator: RdsIamAuthenticator,
  drivers?: DriverRegistry
): Connector {
  return new RdsIamConnector(authenticator, getDriver(driverName, drivers));
}

export function createStaticConnector(
  driverName: string,
  connectionString: string,
  drivers?: DriverRegistry
): Connector {
  return new StaticConnector(connectionString, getDriver(driverName, drivers));
}
