// Path: src/rds-iam/index.ts
// Public API for RDS IAM authentication

export type {
  RdsIamConfig,
  CredentialResolver,
  TokenSigner,
  SignTokenRequest,
  RdsIamDependencies,
} from './types.js';
export { DEFAULT_RDS_IAM_CONFIG, DEFAULT_TOKEN_REFRESH_INTERVAL_MS, TOKEN_LIFETIME_MS } from './types.js';

export {
  parseConnectionDescriptor,
  formatConnectionDescriptor,
  parseForCredentialSwap,
  injectSecret,
  redactConnectionString,
  SUPPORTED_SCHEMES,
  type ConnectionDescriptor,
  type CredentialSwapResult,
  type QueryParam,
  type SupportedScheme,
} from './connection-string.js';

export { RdsIamAuthenticator, effectiveRefreshInterval, resolveRegion } from './authenticator.js';
export type { RdsIamAuthenticatorOptions } from './authenticator.js';
export { buildRdsIamConnection, type RdsIamConnection } from './build.js';
export { RdsIamConnector, StaticConnector, createRdsIamConnector, createStaticConnector } from './connector.js';
