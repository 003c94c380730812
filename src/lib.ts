// Path: src/lib.ts
// Package entry point

export * from './rds-iam/index.js';
export * from './db/index.js';
export { RdsIamError, isRdsIamError, isRetryableError, type RdsIamErrorCode } from './utils/error.js';
export { loadConfig, validateConfig } from './lib/config/index.js';
export type { AppConfig, PoolConfig } from './lib/config/index.js';
