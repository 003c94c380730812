// Path: src/db/drivers/mysql.ts
// MySQL driver over the mysql2 package

import { createLogger } from '../../lib/logger.js';
import { parseConnectionDescriptor } from '../../rds-iam/connection-string.js';
import type { DatabaseConnection, DatabaseDriver, DriverOptions, Row } from '../types.js';

const log = createLogger({ module: 'db-mysql' });

const TLS_PARAMS = new Set(['ssl', 'tls']);
const FALSE_VALUES = new Set(['false', '0', 'disabled']);

/**
 * mysql2 connection options from a mysql:// connection string.
 * TLS is switched on by an `ssl` or `tls` query parameter; RDS requires it for IAM tokens.
 */
export function toMysqlOptions(
  connectionString: string,
  options: DriverOptions = {}
): import('mysql2/promise').ConnectionOptions {
  const descriptor = parseConnectionDescriptor(connectionString);
  const wantsTls = descriptor.query.some(
    (param) => TLS_PARAMS.has(param.key.toLowerCase()) && !FALSE_VALUES.has((param.value ?? 'true').toLowerCase())
  );

  return {
    host: descriptor.host.replace(/^\[(.*)\]$/, '$1'),
    port: descriptor.port ?? 3306,
    user: descriptor.username,
    password: descriptor.password,
    database: descriptor.path.replace(/^\//, '') || undefined,
    connectTimeout: (options.connectionTimeoutSeconds ?? 30) * 1000,
    ...(wantsTls ? { ssl: { rejectUnauthorized: true } } : {}),
  };
}

/**
 * Single mysql2 connection wrapped as a DatabaseConnection
 */
class MysqlConnection implements DatabaseConnection {
  broken = false;

  constructor(private readonly conn: import('mysql2/promise').Connection) {}

  async query(sql: string, params?: unknown[]): Promise<Row[]> {
    const [rows] = await this.conn.query<import('mysql2/promise').RowDataPacket[]>(sql, params);
    return rows;
  }

  async ping(): Promise<void> {
    await this.conn.query('SELECT 1');
  }

  async close(): Promise<void> {
    await this.conn.end();
    log.debug('MySQL connection closed');
  }
}

/**
 * MySQL driver. Uses the mysql2 package, loaded on first connect.
 */
export function createMysqlDriver(options: DriverOptions = {}): DatabaseDriver {
  return {
    name: 'mysql',

    async open(connectionString: string): Promise<DatabaseConnection> {
      let mysql: typeof import('mysql2/promise');
      try {
        mysql = await import('mysql2/promise');
      } catch (err) {
        if (err instanceof Error && err.message.includes('Cannot find')) {
          throw new Error('MySQL client (mysql2) is not installed. Install it with: npm install mysql2');
        }
        throw err;
      }

      const client = await mysql.createConnection(toMysqlOptions(connectionString, options));
      const conn = new MysqlConnection(client);

      // A fatal error on an idle connection with no listener would crash the process
      client.on('error', (err: unknown) => {
        conn.broken = true;
        log.error({ err }, 'MySQL connection error');
      });
      client.on('end', () => {
        conn.broken = true;
      });

      log.debug('MySQL connection opened');
      return conn;
    },
  };
}
