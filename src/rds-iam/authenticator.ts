// Path: src/rds-iam/authenticator.ts
// Caches an RDS IAM auth token and hands out connection strings carrying a fresh one

import type { AwsCredentialIdentityProvider } from '@aws-sdk/types';
import { createLogger } from '../lib/logger.js';
import { metrics } from '../lib/metrics.js';
import { throwIfAborted } from '../utils/cancel.js';
import { RdsIamError, isCancelledError, wrapError } from '../utils/error.js';
import { injectSecret } from './connection-string.js';
import {
  DEFAULT_TOKEN_REFRESH_INTERVAL_MS,
  type RdsIamConfig,
  type RdsIamDependencies,
} from './types.js';

const log = createLogger({ module: 'rds-iam-authenticator' });

/**
 * Effective region: configured value, then AWS_REGION, then AWS_DEFAULT_REGION
 */
export function resolveRegion(configured: string): string | undefined {
  const region = configured || process.env.AWS_REGION || process.env.AWS_DEFAULT_REGION;
  return region || undefined;
}

/**
 * Refresh interval with the default applied to zero, negative or non-finite values
 */
export function effectiveRefreshInterval(config: Pick<RdsIamConfig, 'tokenRefreshIntervalMs'>): number {
  const interval = config.tokenRefreshIntervalMs;
  return Number.isFinite(interval) && interval > 0 ? interval : DEFAULT_TOKEN_REFRESH_INTERVAL_MS;
}

export interface RdsIamAuthenticatorOptions {
  config: RdsIamConfig;
  /** host:port the token is signed for */
  endpoint: string;
  /** Database user the token is signed for */
  dbUser: string;
  /** Connection string without a password */
  baseConnectionString: string;
  dependencies: RdsIamDependencies;
}

interface TokenState {
  token: string;
  refreshedAt: number;
}

/**
 * Owns the auth token for one database target.
 *
 * Refresh is lazy: a caller asking for a connection string after the refresh interval has
 * elapsed pays for the refresh inline. There is no timer. Concurrent callers in the stale
 * window may each refresh; the last one to finish wins, which is fine because any token
 * still inside its validity window works.
 */
export class RdsIamAuthenticator {
  readonly endpoint: string;
  readonly dbUser: string;
  readonly refreshIntervalMs: number;

  private readonly config: Readonly<RdsIamConfig>;
  private readonly baseConnectionString: string;
  private readonly dependencies: RdsIamDependencies;
  // Token and timestamp are swapped as one object so readers never see a mismatched pair
  private state: TokenState | null = null;

  constructor(options: RdsIamAuthenticatorOptions) {
    this.config = { ...options.config };
    this.endpoint = options.endpoint;
    this.dbUser = options.dbUser;
    this.baseConnectionString = options.baseConnectionString;
    this.dependencies = options.dependencies;
    this.refreshIntervalMs = effectiveRefreshInterval(options.config);
  }

  get hasToken(): boolean {
    return this.state !== null;
  }

  /** Time of the last successful refresh, or null before the first one */
  get lastRefresh(): Date | null {
    return this.state ? new Date(this.state.refreshedAt) : null;
  }

  isStale(now = Date.now()): boolean {
    return this.state === null || now - this.state.refreshedAt > this.refreshIntervalMs;
  }

  /**
   * Fetch a new token. On failure the previous token and timestamp stay as they were.
   *
   * @throws RdsIamError CREDENTIAL_RESOLUTION_FAILED, TOKEN_SIGNING_FAILED or CANCELLED
   */
  async refresh(signal?: AbortSignal): Promise<void> {
    const started = Date.now();
    try {
      throwIfAborted(signal, 'refresh RDS IAM token');

      const region = resolveRegion(this.config.region);
      if (!region) {
        throw new RdsIamError(
          'Failed to resolve AWS credentials: no region configured and AWS_REGION is not set',
          'CREDENTIAL_RESOLUTION_FAILED'
        );
      }

      let credentials: AwsCredentialIdentityProvider;
      try {
        credentials = await this.dependencies.credentialResolver.resolve(region, signal);
      } catch (err) {
        throw wrapError(err, 'CREDENTIAL_RESOLUTION_FAILED', 'Failed to resolve AWS credentials', { region });
      }
      throwIfAborted(signal, 'refresh RDS IAM token');

      let token: string;
      try {
        token = await this.dependencies.tokenSigner.sign(
          { endpoint: this.endpoint, region, dbUser: this.dbUser, credentials },
          signal
        );
      } catch (err) {
        throw wrapError(err, 'TOKEN_SIGNING_FAILED', 'Failed to build RDS auth token', { endpoint: this.endpoint });
      }
      throwIfAborted(signal, 'refresh RDS IAM token');

      this.state = { token, refreshedAt: Date.now() };

      metrics.tokenRefreshed(this.endpoint, Date.now() - started);
      log.debug({ endpoint: this.endpoint, dbUser: this.dbUser, region }, 'RDS IAM token refreshed');
      log.trace({ endpoint: this.endpoint, tokenLength: token.length }, 'New RDS IAM token stored');
    } catch (err) {
      const reason = err instanceof RdsIamError ? err.code : 'UNKNOWN';
      metrics.tokenRefreshFailed(this.endpoint, reason);
      if (!isCancelledError(err)) {
        log.warn({ err, endpoint: this.endpoint }, 'RDS IAM token refresh failed');
      }
      throw err;
    }
  }

  /**
   * Current token, refreshed first when stale
   */
  async getToken(signal?: AbortSignal): Promise<string> {
    if (this.isStale()) {
      await this.refresh(signal);
    }
    if (this.state === null) {
      // refresh() either stores a token or throws
      throw new RdsIamError('No RDS IAM token available', 'TOKEN_SIGNING_FAILED');
    }
    return this.state.token;
  }

  /**
   * Connection string carrying a usable token, refreshing first when stale
   *
   * @throws RdsIamError from refresh(), or SECRET_INJECTION_FAILED
   */
  async getCurrentConnectionString(signal?: AbortSignal): Promise<string> {
    const token = await this.getToken(signal);
    try {
      return injectSecret(this.baseConnectionString, token);
    } catch (err) {
      throw wrapError(err, 'SECRET_INJECTION_FAILED', 'Failed to inject RDS IAM token into connection string');
    }
  }
}
