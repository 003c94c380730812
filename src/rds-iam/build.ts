// Path: src/rds-iam/build.ts
// Entry point: turn a configured connection string into one using an IAM auth token

import { createLogger } from '../lib/logger.js';
import { RdsIamError, wrapError } from '../utils/error.js';
import { RdsIamAuthenticator } from './authenticator.js';
import { parseForCredentialSwap } from './connection-string.js';
import type { RdsIamConfig, RdsIamDependencies } from './types.js';

const log = createLogger({ module: 'rds-iam' });

export interface RdsIamConnection {
  /** Connection string to open the pool with (holds the initial token when enabled) */
  connectionString: string;
  /** Token handle for the connector, or null when IAM auth is disabled */
  authenticator: RdsIamAuthenticator | null;
}

/**
 * Prepare a connection string for RDS IAM authentication.
 *
 * When disabled, the string is returned unchanged with no authenticator and no AWS calls.
 * Otherwise the password is stripped, the configured database user applied, an initial
 * token fetched and injected as the password.
 *
 * Loads the AWS SDK lazily so that disabled setups never import it.
 *
 * @throws RdsIamError UNSUPPORTED_SCHEME, MALFORMED_CONNECTION_STRING, INVALID_CONFIG,
 *   or any refresh error from the initial token fetch
 */
export async function buildRdsIamConnection(
  connectionString: string,
  config: RdsIamConfig,
  dependencies?: RdsIamDependencies,
  signal?: AbortSignal
): Promise<RdsIamConnection> {
  if (!config.enabled) {
    return { connectionString, authenticator: null };
  }

  const swap = parseForCredentialSwap(connectionString, config.dbUser);
  if (swap.username === undefined) {
    throw new RdsIamError(
      'RDS IAM authentication needs a database user: set dbUser or include one in the connection string',
      'INVALID_CONFIG'
    );
  }

  const authenticator = new RdsIamAuthenticator({
    config,
    endpoint: swap.endpoint,
    dbUser: swap.username,
    baseConnectionString: swap.connectionString,
    dependencies: dependencies ?? (await import('./aws.js')).defaultDependencies,
  });

  try {
    await authenticator.refresh(signal);
  } catch (err) {
    throw wrapError(err, err instanceof RdsIamError ? err.code : 'TOKEN_SIGNING_FAILED', 'Failed to generate initial RDS IAM token');
  }

  const rewritten = await authenticator.getCurrentConnectionString(signal);

  log.info(
    { endpoint: swap.endpoint, dbUser: swap.username, refreshIntervalMs: authenticator.refreshIntervalMs },
    'AWS RDS IAM authentication enabled for SQL database'
  );

  return { connectionString: rewritten, authenticator };
}
