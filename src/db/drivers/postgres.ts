// Path: src/db/drivers/postgres.ts
// PostgreSQL driver over the pg package

import { createLogger } from '../../lib/logger.js';
import type { DatabaseConnection, DatabaseDriver, DriverOptions, Row } from '../types.js';

const log = createLogger({ module: 'db-postgres' });

/**
 * Single pg client wrapped as a DatabaseConnection
 */
class PostgresConnection implements DatabaseConnection {
  broken = false;

  constructor(private readonly client: import('pg').Client) {}

  async query(sql: string, params?: unknown[]): Promise<Row[]> {
    const result = await this.client.query(sql, params);
    return result.rows;
  }

  async ping(): Promise<void> {
    await this.client.query('SELECT 1');
  }

  async close(): Promise<void> {
    await this.client.end();
    log.debug('PostgreSQL connection closed');
  }
}

/**
 * PostgreSQL driver. Uses the pg package, loaded on first connect.
 */
export function createPostgresDriver(options: DriverOptions = {}): DatabaseDriver {
  return {
    name: 'postgres',

    async open(connectionString: string): Promise<DatabaseConnection> {
      let Client: typeof import('pg').Client;
      try {
        const pg = await import('pg');
        // eslint-disable-next-line @typescript-eslint/no-unnecessary-condition -- pg module structure varies
        Client = pg.default?.Client ?? pg.Client;
      } catch {
        throw new Error('PostgreSQL client (pg) is not installed. Install it with: npm install pg');
      }

      const client = new Client({
        connectionString,
        connectionTimeoutMillis: (options.connectionTimeoutSeconds ?? 30) * 1000,
      });

      const conn = new PostgresConnection(client);

      // Errors on an idle client would otherwise crash the process
      client.on('error', (err) => {
        conn.broken = true;
        log.error({ err }, 'PostgreSQL connection error');
      });
      client.on('end', () => {
        conn.broken = true;
      });

      await client.connect();
      log.debug('PostgreSQL connection opened');
      return conn;
    },
  };
}
