// Path: test/helpers/fakes.ts
// In-process stand-ins for AWS collaborators and database drivers

import { vi } from 'vitest';
import type { AwsCredentialIdentityProvider } from '@aws-sdk/types';
import type { DatabaseConnection, DatabaseDriver, DriverName, Row } from '../../src/db/types.js';
import type { DriverRegistry } from '../../src/db/drivers/index.js';
import type { RdsIamConfig, SignTokenRequest } from '../../src/rds-iam/types.js';

export const fakeCredentials: AwsCredentialIdentityProvider = async () => ({
  accessKeyId: 'test-access-key',
  secretAccessKey: 'test-secret',
});

export function rdsIamConfig(overrides: Partial<RdsIamConfig> = {}): RdsIamConfig {
  return {
    enabled: true,
    region: 'eu-central-1',
    dbUser: 'iamuser',
    tokenRefreshIntervalMs: 14 * 60 * 1000,
    ...overrides,
  };
}

/**
 * Credential resolver and token signer returning token-1, token-2, ... in order
 */
export function createFakeAws() {
  let issued = 0;
  const resolve = vi.fn(async (_region: string, _signal?: AbortSignal) => fakeCredentials);
  const sign = vi.fn(async (_request: SignTokenRequest, _signal?: AbortSignal) => {
    issued++;
    return `token-${issued}`;
  });

  return {
    resolve,
    sign,
    dependencies: {
      credentialResolver: { resolve },
      tokenSigner: { sign },
    },
  };
}

export interface FakeConnection extends DatabaseConnection {
  readonly connectionString: string;
  broken: boolean;
  closed: boolean;
}

export function createFakeConnection(connectionString: string, rows: Row[] = [{ ok: 1 }]): FakeConnection {
  const conn: FakeConnection = {
    connectionString,
    broken: false,
    closed: false,
    query: vi.fn(async () => rows),
    ping: vi.fn(async () => undefined),
    close: vi.fn(async () => {
      conn.closed = true;
    }),
  };
  return conn;
}

/**
 * Driver that records every connection string it was asked to dial
 */
export function createFakeDriver(name: DriverName) {
  const opened: FakeConnection[] = [];
  const open = vi.fn(async (connectionString: string) => {
    const conn = createFakeConnection(connectionString);
    opened.push(conn);
    return conn;
  });
  const driver: DatabaseDriver = { name, open };
  return { driver, open, opened };
}

export function createFakeDrivers() {
  const postgres = createFakeDriver('postgres');
  const mysql = createFakeDriver('mysql');
  const registry: DriverRegistry = { postgres: postgres.driver, mysql: mysql.driver };
  return { postgres, mysql, registry };
}
