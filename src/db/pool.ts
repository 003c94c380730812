// Path: src/db/pool.ts
// Connection pool that dials through a Connector

import { createLogger } from '../lib/logger.js';
import { metrics } from '../lib/metrics.js';
import { cancelledError } from '../utils/cancel.js';
import type { Connector, DatabaseConnection } from './types.js';

const log = createLogger({ module: 'db-pool' });

const DEFAULT_MAX_CONNECTIONS = 5;
const DEFAULT_IDLE_TIMEOUT_MS = 30 * 1000;

export interface ConnectionPoolOptions {
  /** Upper bound on open physical connections (default: 5) */
  maxConnections?: number;
  /**
   * Idle connections older than this are closed (default: 30s). Checked whenever a
   * connection is acquired or released, not on a timer.
   */
  idleTimeoutMs?: number;
}

export interface PoolStats {
  open: number;
  idle: number;
  waiting: number;
}

interface IdleConnection {
  conn: DatabaseConnection;
  releasedAt: number;
}

interface Waiter {
  resolve: (conn: DatabaseConnection) => void;
  reject: (err: unknown) => void;
  signal?: AbortSignal;
  onAbort?: () => void;
}

/**
 * Pool of physical connections.
 *
 * Every new connection is dialed through the connector, so an IAM connector gets to
 * refresh its token at the moment the pool grows or replaces an evicted connection.
 * Idle eviction is checked lazily on acquire and release. Broken connections and
 * connections whose work failed are closed, never reused.
 */
export class ConnectionPool {
  private readonly connector: Connector;
  private readonly maxConnections: number;
  private readonly idleTimeoutMs: number;

  private idle: IdleConnection[] = [];
  private waiters: Waiter[] = [];
  private openCount = 0;
  private closed = false;

  constructor(connector: Connector, options: ConnectionPoolOptions = {}) {
    this.connector = connector;
    this.maxConnections = Math.max(1, options.maxConnections ?? DEFAULT_MAX_CONNECTIONS);
    this.idleTimeoutMs = options.idleTimeoutMs ?? DEFAULT_IDLE_TIMEOUT_MS;
  }

  get driverName(): string {
    return this.connector.driver.name;
  }

  stats(): PoolStats {
    return { open: this.openCount, idle: this.idle.length, waiting: this.waiters.length };
  }

  /**
   * Get a connection: a reusable idle one, a new one when under the limit,
   * otherwise the next one released.
   */
  async acquire(signal?: AbortSignal): Promise<DatabaseConnection> {
    if (this.closed) throw new Error('Connection pool is closed');
    if (signal?.aborted) throw cancelledError('acquire connection', signal);

    await this.evictIdle();
    if (this.closed) throw new Error('Connection pool is closed');

    const reusable = this.idle.pop();
    if (reusable) return reusable.conn;

    if (this.openCount < this.maxConnections) {
      return this.openNew(signal);
    }

    return new Promise<DatabaseConnection>((resolve, reject) => {
      const waiter: Waiter = { resolve, reject, signal };
      if (signal) {
        waiter.onAbort = () => {
          this.waiters = this.waiters.filter((w) => w !== waiter);
          reject(cancelledError('acquire connection', signal));
        };
        signal.addEventListener('abort', waiter.onAbort, { once: true });
      }
      this.waiters.push(waiter);
    });
  }

  /**
   * Return a connection for reuse
   */
  release(conn: DatabaseConnection): void {
    if (this.closed) {
      void this.discard(conn);
      return;
    }
    if (conn.broken) {
      void this.destroy(conn);
      return;
    }

    const waiter = this.takeWaiter();
    if (waiter) {
      waiter.resolve(conn);
      return;
    }

    this.idle.push({ conn, releasedAt: Date.now() });
    void this.evictIdle();
  }

  /**
   * Close a connection that should not be reused (e.g. after a connection-level error)
   */
  async destroy(conn: DatabaseConnection): Promise<void> {
    await this.discard(conn);
    this.serveWaiter();
  }

  /**
   * Run `fn` with a pooled connection. The connection is released when `fn` resolves
   * and closed when it rejects, since the failure may have left it unusable.
   */
  async withConnection<T>(fn: (conn: DatabaseConnection) => Promise<T>, signal?: AbortSignal): Promise<T> {
    const conn = await this.acquire(signal);
    let result: T;
    try {
      result = await fn(conn);
    } catch (err) {
      await this.destroy(conn);
      throw err;
    }
    this.release(conn);
    return result;
  }

  /**
   * Close idle connections and reject waiters. Connections still checked out are
   * closed when released.
   */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    for (const waiter of this.waiters.splice(0)) {
      this.detach(waiter);
      waiter.reject(new Error('Connection pool is closed'));
    }

    const idle = this.idle.splice(0);
    await Promise.all(idle.map(({ conn }) => this.discard(conn)));
    log.info({ driver: this.driverName, closed: idle.length }, 'Connection pool closed');
  }

  private async openNew(signal?: AbortSignal): Promise<DatabaseConnection> {
    this.openCount++;
    this.reportSize();
    let conn: DatabaseConnection;
    try {
      conn = await this.connector.connect(signal);
    } catch (err) {
      this.openCount--;
      this.reportSize();
      this.serveWaiter();
      throw err;
    }

    if (this.closed) {
      // Dialed while close() ran
      await this.discard(conn);
      throw new Error('Connection pool is closed');
    }

    log.debug({ driver: this.driverName, open: this.openCount }, 'Opened pooled connection');
    return conn;
  }

  private async evictIdle(): Promise<void> {
    const cutoff = Date.now() - this.idleTimeoutMs;
    const isExpired = (entry: IdleConnection): boolean => entry.releasedAt < cutoff || entry.conn.broken;
    const expired = this.idle.filter(isExpired);
    if (expired.length === 0) return;

    this.idle = this.idle.filter((entry) => !isExpired(entry));
    await Promise.all(expired.map(({ conn }) => this.discard(conn)));
    log.debug({ driver: this.driverName, evicted: expired.length }, 'Evicted idle connections');
  }

  private async discard(conn: DatabaseConnection): Promise<void> {
    this.openCount--;
    this.reportSize();
    try {
      await conn.close();
    } catch (err) {
      log.warn({ err, driver: this.driverName }, 'Failed to close database connection');
    }
  }

  /**
   * A slot freed up: dial a new connection for the oldest waiter
   */
  private serveWaiter(): void {
    if (this.closed || this.openCount >= this.maxConnections) return;
    const waiter = this.takeWaiter();
    if (!waiter) return;

    this.openNew(waiter.signal).then(waiter.resolve, waiter.reject);
  }

  private takeWaiter(): Waiter | undefined {
    const waiter = this.waiters.shift();
    if (waiter) this.detach(waiter);
    return waiter;
  }

  private detach(waiter: Waiter): void {
    if (waiter.signal && waiter.onAbort) {
      waiter.signal.removeEventListener('abort', waiter.onAbort);
    }
  }

  private reportSize(): void {
    metrics.setPoolConnections(this.driverName, this.openCount);
  }
}
