// Path: src/db/drivers/index.ts
// Driver registry

import { RdsIamError } from '../../utils/error.js';
import type { DatabaseDriver, DriverName, DriverOptions } from '../types.js';
import { createMysqlDriver } from './mysql.js';
import { createPostgresDriver } from './postgres.js';

export type DriverRegistry = Record<DriverName, DatabaseDriver>;

export function createDrivers(options: DriverOptions = {}): DriverRegistry {
  return {
    postgres: createPostgresDriver(options),
    mysql: createMysqlDriver(options),
  };
}

/**
 * Driver name for a connection string scheme (postgres://, postgresql://, mysql://)
 */
export function driverNameForConnectionString(connectionString: string): DriverName {
  const scheme = /^([a-z][a-z0-9+.-]*):/i.exec(connectionString)?.[1].toLowerCase();
  switch (scheme) {
    case 'postgres':
    case 'postgresql':
      return 'postgres';
    case 'mysql':
      return 'mysql';
    default:
      throw new RdsIamError(
        'Unsupported database: connection string must start with postgres:// or mysql://',
        'UNSUPPORTED_SCHEME'
      );
  }
}

/**
 * Look up a driver by name
 */
export function getDriver(name: string, drivers: DriverRegistry = createDrivers()): DatabaseDriver {
  switch (name) {
    case 'postgres':
    case 'mysql':
      return drivers[name];
    default:
      throw new RdsIamError(`Unsupported database driver: ${name}`, 'INVALID_CONFIG');
  }
}

export { createPostgresDriver } from './postgres.js';
export { createMysqlDriver, toMysqlOptions } from './mysql.js';
