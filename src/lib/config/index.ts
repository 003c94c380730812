// Path: src/lib/config/index.ts
// Public API for configuration module

export type { AppConfig, ConfigFile, PoolConfig } from './types.js';
export { DEFAULT_POOL_CONFIG, EMPTY_CONFIG } from './types.js';

export { loadConfig, resolveConfig, getConfigPath } from './loader.js';
export { getConfigDir, getConfigFile } from './storage.js';

export {
  validateConfig,
  formatValidationResult,
  type ValidationResult,
  type ValidationError,
  type ValidationWarning,
} from '../validation.js';
