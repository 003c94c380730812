// Path: src/rds-iam/types.ts
// RDS IAM authentication types and collaborator interfaces

import type { AwsCredentialIdentityProvider } from '@aws-sdk/types';

/** RDS auth tokens are valid for 15 minutes */
export const TOKEN_LIFETIME_MS = 15 * 60 * 1000;

/** Refresh a minute before the token expires */
export const DEFAULT_TOKEN_REFRESH_INTERVAL_MS = 14 * 60 * 1000;

/**
 * RDS IAM authentication settings for one database target
 */
export interface RdsIamConfig {
  /** Use IAM auth tokens instead of the password in the connection string */
  enabled: boolean;
  /** AWS region of the RDS instance; empty falls back to AWS_REGION / AWS_DEFAULT_REGION */
  region: string;
  /** Database user to sign tokens for; defaults to the user in the connection string */
  dbUser?: string;
  /** How long a token is reused before refreshing, in ms (0 = default of 14 minutes) */
  tokenRefreshIntervalMs: number;
}

export const DEFAULT_RDS_IAM_CONFIG: Readonly<RdsIamConfig> = {
  enabled: false,
  region: '',
  tokenRefreshIntervalMs: DEFAULT_TOKEN_REFRESH_INTERVAL_MS,
};

/**
 * Resolves the AWS credentials used to sign tokens for a region.
 * Implementations own the credential precedence (env, profile, instance role, ...).
 */
export interface CredentialResolver {
  resolve(region: string, signal?: AbortSignal): Promise<AwsCredentialIdentityProvider>;
}

export interface SignTokenRequest {
  /** host:port exactly as it appears in the connection string */
  endpoint: string;
  region: string;
  dbUser: string;
  credentials: AwsCredentialIdentityProvider;
}

/**
 * Produces a short-lived auth token accepted by the database as a password
 */
export interface TokenSigner {
  sign(request: SignTokenRequest, signal?: AbortSignal): Promise<string>;
}

/**
 * External collaborators of the authenticator, injectable for tests
 */
export interface RdsIamDependencies {
  credentialResolver: CredentialResolver;
  tokenSigner: TokenSigner;
}
