// Path: src/db/types.ts
// Database driver, connection and connector interfaces

export type DriverName = 'postgres' | 'mysql';

export type Row = Record<string, unknown>;

/**
 * One physical database connection
 */
export interface DatabaseConnection {
  /**
   * Set by the driver once the connection has failed underneath (socket error, server
   * closed it). The pool closes broken connections instead of reusing them.
   */
  readonly broken: boolean;

  /**
   * Run a statement and return its rows
   * @param sql - Statement text, using the driver's placeholder syntax
   * @param params - Positional parameters
   */
  query(sql: string, params?: unknown[]): Promise<Row[]>;

  /**
   * Round trip to the server (SELECT 1)
   */
  ping(): Promise<void>;

  /**
   * Close the connection
   */
  close(): Promise<void>;
}

/**
 * Low-level driver that dials a physical connection from a connection string
 */
export interface DatabaseDriver {
  readonly name: DriverName;
  open(connectionString: string): Promise<DatabaseConnection>;
}

export interface DriverOptions {
  connectionTimeoutSeconds?: number;
}

/**
 * Something the pool opens physical connections through.
 * Implementations decide which connection string each new connection uses.
 */
export interface Connector {
  readonly driver: DatabaseDriver;
  connect(signal?: AbortSignal): Promise<DatabaseConnection>;
}
