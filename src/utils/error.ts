// Path: src/utils/error.ts
// Error taxonomy and helpers for RDS IAM authentication

/**
 * Failure categories surfaced by this package.
 *
 * Configuration errors (scheme, malformed string, invalid config) are fatal and need a
 * config change. Credential resolution and signing failures are transient; the caller
 * decides whether to retry the connection attempt.
 */
export type RdsIamErrorCode =
  | 'UNSUPPORTED_SCHEME'
  | 'MALFORMED_CONNECTION_STRING'
  | 'CREDENTIAL_RESOLUTION_FAILED'
  | 'TOKEN_SIGNING_FAILED'
  | 'SECRET_INJECTION_FAILED'
  | 'CANCELLED'
  | 'INVALID_CONFIG';

const RETRYABLE_CODES: ReadonlySet<RdsIamErrorCode> = new Set([
  'CREDENTIAL_RESOLUTION_FAILED',
  'TOKEN_SIGNING_FAILED',
]);

/**
 * Extract error message from unknown error type.
 */
export function extractErrorMessage(err: unknown): string {
  if (err instanceof Error) {
    return err.message;
  }
  if (typeof err === 'string') {
    return err;
  }
  return String(err);
}

/**
 * Check if an error is retryable (network-related or a transient token failure).
 */
export function isRetryableError(err: unknown): boolean {
  if (err instanceof RdsIamError) {
    return err.retryable;
  }
  const msg = extractErrorMessage(err).toLowerCase();
  return /econnrefused|enotfound|etimedout|socket hang up|econnreset|epipe|network/i.test(msg);
}

/**
 * Error carrying a code, the operation that failed and the underlying cause.
 * Messages never include tokens or connection strings.
 */
export class RdsIamError extends Error {
  readonly code: RdsIamErrorCode;
  readonly metadata?: Record<string, unknown>;
  readonly retryable: boolean;

  constructor(
    message: string,
    code: RdsIamErrorCode,
    options?: {
      cause?: unknown;
      metadata?: Record<string, unknown>;
    }
  ) {
    super(message);
    this.name = 'RdsIamError';
    this.code = code;
    this.metadata = options?.metadata;
    this.retryable = RETRYABLE_CODES.has(code);

    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

/**
 * Wrap an unknown error into an RdsIamError, prefixing the operation that failed.
 * RdsIamErrors with code CANCELLED pass through untouched.
 */
export function wrapError(
  err: unknown,
  code: RdsIamErrorCode,
  operation: string,
  metadata?: Record<string, unknown>
): RdsIamError {
  if (isCancelledError(err)) {
    return err;
  }
  return new RdsIamError(`${operation}: ${extractErrorMessage(err)}`, code, { cause: err, metadata });
}

export function isCancelledError(err: unknown): err is RdsIamError {
  return err instanceof RdsIamError && err.code === 'CANCELLED';
}

export function isRdsIamError(err: unknown, code?: RdsIamErrorCode): err is RdsIamError {
  return err instanceof RdsIamError && (code === undefined || err.code === code);
}
