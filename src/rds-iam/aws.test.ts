// Path: src/rds-iam/aws.test.ts

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { defaultProvider } from '@aws-sdk/credential-provider-node';
import { defaultCredentialResolver, splitEndpoint } from './aws.js';

vi.mock('@aws-sdk/credential-provider-node', () => ({
  defaultProvider: vi.fn(() => async () => ({
    accessKeyId: 'test-access-key',
    secretAccessKey: 'test-secret',
  })),
}));

describe('splitEndpoint', () => {
  it('should split host and port', () => {
    expect(splitEndpoint('mydb.abc123.eu-west-1.rds.amazonaws.com:5432')).toEqual({
      hostname: 'mydb.abc123.eu-west-1.rds.amazonaws.com',
      port: 5432,
    });
  });

  it('should keep IPv6 brackets in the hostname', () => {
    expect(splitEndpoint('[::1]:3306')).toEqual({ hostname: '[::1]', port: 3306 });
  });

  it('should require a port', () => {
    expect(() => splitEndpoint('mydb.internal')).toThrow(/^endpoint must include a port/);
  });
});

describe('defaultCredentialResolver', () => {
  beforeEach(() => {
    vi.mocked(defaultProvider).mockClear();
  });

  it('should scope the provider chain to the target region', async () => {
    const provider = await defaultCredentialResolver.resolve('eu-west-1');

    expect(defaultProvider).toHaveBeenCalledWith({ clientConfig: { region: 'eu-west-1' } });
    await expect(provider()).resolves.toEqual({
      accessKeyId: 'test-access-key',
      secretAccessKey: 'test-secret',
    });
  });
});
