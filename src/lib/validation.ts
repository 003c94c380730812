// Path: src/lib/validation.ts
// Configuration validation for rds-iam-connect

import type { AppConfig } from './config/types.js';
import { configLogger as log } from './logger.js';
import { resolveRegion, effectiveRefreshInterval } from '../rds-iam/authenticator.js';
import { parseForCredentialSwap } from '../rds-iam/connection-string.js';
import { TOKEN_LIFETIME_MS } from '../rds-iam/types.js';
import { extractErrorMessage } from '../utils/error.js';
import { formatDuration } from '../utils/duration.js';

export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
  warnings: ValidationWarning[];
}

export interface ValidationError {
  field: string;
  message: string;
  value?: unknown;
}

export interface ValidationWarning {
  field: string;
  message: string;
  suggestion?: string;
}

/**
 * Validate RDS IAM settings against the connection string
 */
function validateRdsIam(config: AppConfig): { errors: ValidationError[]; warnings: ValidationWarning[] } {
  const errors: ValidationError[] = [];
  const warnings: ValidationWarning[] = [];
  const { rdsIam } = config;

  if (!resolveRegion(rdsIam.region)) {
    errors.push({
      field: 'rdsIam.region',
      message: 'AWS region is required (set rdsIam.region or AWS_REGION)',
    });
  }

  if (config.connectionString) {
    try {
      const swap = parseForCredentialSwap(config.connectionString, rdsIam.dbUser);
      if (swap.username === undefined) {
        errors.push({
          field: 'rdsIam.dbUser',
          message: 'Database user is required (set rdsIam.dbUser or include one in the connection string)',
        });
      }
      if (!/:\d+$/.test(swap.endpoint)) {
        errors.push({
          field: 'connectionString',
          message: 'Connection string must include a port for IAM token signing',
          value: swap.endpoint,
        });
      }
      if (!swap.endpoint.includes('.rds.amazonaws.com')) {
        warnings.push({
          field: 'connectionString',
          message: 'Host does not look like an RDS endpoint',
          suggestion: 'Use the RDS-assigned hostname, not a CNAME; tokens are bound to the exact host',
        });
      }
    } catch (err) {
      errors.push({ field: 'connectionString', message: extractErrorMessage(err) });
    }
  }

  if (rdsIam.tokenRefreshIntervalMs < 0) {
    errors.push({
      field: 'rdsIam.tokenRefreshInterval',
      message: 'Token refresh interval cannot be negative',
      value: rdsIam.tokenRefreshIntervalMs,
    });
  } else if (effectiveRefreshInterval(rdsIam) >= TOKEN_LIFETIME_MS) {
    warnings.push({
      field: 'rdsIam.tokenRefreshInterval',
      message: `Token refresh interval ${formatDuration(rdsIam.tokenRefreshIntervalMs)} is not shorter than the 15m token lifetime`,
      suggestion: 'Use at most 14m so connections never get an expired token',
    });
  }

  return { errors, warnings };
}

/**
 * Validate the full configuration
 */
export function validateConfig(config: AppConfig): ValidationResult {
  const errors: ValidationError[] = [];
  const warnings: ValidationWarning[] = [];

  if (!config.connectionString) {
    errors.push({
      field: 'connectionString',
      message: 'Connection string is required (set connectionString or DATABASE_URL)',
    });
  }

  if (config.rdsIam.enabled) {
    const rdsIamValidation = validateRdsIam(config);
    errors.push(...rdsIamValidation.errors);
    warnings.push(...rdsIamValidation.warnings);
  }

  if (!Number.isInteger(config.pool.maxConnections) || config.pool.maxConnections < 1) {
    errors.push({
      field: 'pool.maxConnections',
      message: 'Pool size must be a positive integer',
      value: config.pool.maxConnections,
    });
  }
  if (config.pool.connectionTimeoutSeconds <= 0) {
    errors.push({
      field: 'pool.connectionTimeoutSeconds',
      message: 'Connection timeout must be positive',
      value: config.pool.connectionTimeoutSeconds,
    });
  }

  const result = {
    valid: errors.length === 0,
    errors,
    warnings,
  };

  if (errors.length > 0) {
    log.error({ errors }, 'Configuration validation failed');
  }
  if (warnings.length > 0) {
    log.warn({ warnings }, 'Configuration has warnings');
  }

  return result;
}

/**
 * Format validation result for display
 */
export function formatValidationResult(result: ValidationResult): string {
  const lines: string[] = [];

  if (result.errors.length > 0) {
    lines.push('Errors:');
    for (const error of result.errors) {
      lines.push(`  ✗ ${error.field}: ${error.message}`);
      if (error.value !== undefined) {
        lines.push(`    Value: ${JSON.stringify(error.value)}`);
      }
    }
  }

  if (result.warnings.length > 0) {
    if (lines.length > 0) lines.push('');
    lines.push('Warnings:');
    for (const warning of result.warnings) {
      lines.push(`  ⚠ ${warning.field}: ${warning.message}`);
      if (warning.suggestion) {
        lines.push(`    Suggestion: ${warning.suggestion}`);
      }
    }
  }

  if (result.valid && result.warnings.length === 0) {
    lines.push('✓ Configuration is valid');
  } else if (result.valid) {
    lines.push('');
    lines.push('✓ Configuration is valid (with warnings)');
  }

  return lines.join('\n');
}
