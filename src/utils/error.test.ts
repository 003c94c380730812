// Path: src/utils/error.test.ts

import { describe, it, expect } from 'vitest';
import {
  RdsIamError,
  extractErrorMessage,
  isCancelledError,
  isRdsIamError,
  isRetryableError,
  wrapError,
} from './error.js';

describe('RdsIamError', () => {
  it('should mark transient token failures as retryable', () => {
    expect(new RdsIamError('x', 'CREDENTIAL_RESOLUTION_FAILED').retryable).toBe(true);
    expect(new RdsIamError('x', 'TOKEN_SIGNING_FAILED').retryable).toBe(true);
    expect(new RdsIamError('x', 'UNSUPPORTED_SCHEME').retryable).toBe(false);
    expect(new RdsIamError('x', 'MALFORMED_CONNECTION_STRING').retryable).toBe(false);
  });

  it('should keep cause and metadata', () => {
    const cause = new Error('inner');
    const err = new RdsIamError('outer', 'INVALID_CONFIG', { cause, metadata: { field: 'region' } });

    expect(err.name).toBe('RdsIamError');
    expect(err.cause).toBe(cause);
    expect(err.metadata).toEqual({ field: 'region' });
  });
});

describe('wrapError', () => {
  it('should prefix the operation and keep the original as cause', () => {
    const cause = new Error('ExpiredToken');
    const err = wrapError(cause, 'CREDENTIAL_RESOLUTION_FAILED', 'Failed to resolve AWS credentials');

    expect(err.message).toBe('Failed to resolve AWS credentials: ExpiredToken');
    expect(err.code).toBe('CREDENTIAL_RESOLUTION_FAILED');
    expect(err.cause).toBe(cause);
  });

  it('should pass cancellation through', () => {
    const cancelled = new RdsIamError('refresh: operation cancelled', 'CANCELLED');
    expect(wrapError(cancelled, 'TOKEN_SIGNING_FAILED', 'Failed')).toBe(cancelled);
  });
});

describe('error helpers', () => {
  it('should extract messages from any thrown value', () => {
    expect(extractErrorMessage(new Error('boom'))).toBe('boom');
    expect(extractErrorMessage('plain')).toBe('plain');
    expect(extractErrorMessage(42)).toBe('42');
  });

  it('should detect network errors as retryable', () => {
    expect(isRetryableError(new Error('connect ECONNREFUSED 10.0.0.1:5432'))).toBe(true);
    expect(isRetryableError(new Error('password authentication failed'))).toBe(false);
  });

  it('should narrow by code', () => {
    const err = new RdsIamError('x', 'CANCELLED');
    expect(isRdsIamError(err)).toBe(true);
    expect(isRdsIamError(err, 'INVALID_CONFIG')).toBe(false);
    expect(isCancelledError(err)).toBe(true);
    expect(isCancelledError(new Error('cancelled'))).toBe(false);
  });
});
