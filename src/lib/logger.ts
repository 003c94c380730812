// Path: src/lib/logger.ts
// Centralized Pino logger for rds-iam-connect

import pino from 'pino';
import { createRequire } from 'node:module';

const require = createRequire(import.meta.url);

const isDev = process.env.NODE_ENV !== 'production';
const level = process.env.LOG_LEVEL ?? (isDev ? 'debug' : 'info');

// Cache the result
let pinoPrettyAvailable: boolean | null = null;

/**
 * Pretty transport for development, when pino-pretty is installed
 */
function createTransport(): pino.TransportSingleOptions | undefined {
  if (!isDev || level === 'silent') return undefined;

  if (pinoPrettyAvailable === null) {
    try {
      require.resolve('pino-pretty');
      pinoPrettyAvailable = true;
    } catch {
      pinoPrettyAvailable = false;
    }
  }

  if (!pinoPrettyAvailable) return undefined;

  return {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'SYS:standard',
      ignore: 'pid,hostname',
      destination: 2,
    },
  };
}

const transport = createTransport();

/**
 * Options shared by every destination: level, base fields, redaction, timestamps
 */
export const loggerOptions: pino.LoggerOptions = {
  level,
  base: {
    service: 'rds-iam-connect',
    pid: process.pid,
  },
  redact: {
    paths: [
      'password',
      'token',
      'secret',
      'connectionString',
      '*.password',
      '*.token',
      '*.connectionString',
    ],
    censor: '[REDACTED]',
  },
  timestamp: pino.stdTimeFunctions.isoTime,
};

/**
 * Base logger instance
 *
 * Configure via environment variables:
 * - LOG_LEVEL: trace, debug, info, warn, error, fatal, silent
 *   (default: debug in dev, info in prod)
 *
 * Auth tokens are only ever logged at trace level, and then only their length.
 * Logs go to stderr so that CLI output on stdout stays machine-readable.
 */
export const logger = pino(
  { ...loggerOptions, transport },
  transport ? undefined : pino.destination(2)
);

/**
 * Create a child logger with additional context
 *
 * @example
 * const log = createLogger({ module: 'authenticator' });
 * log.info({ endpoint }, 'Token refreshed');
 */
export function createLogger(context: Record<string, unknown>): pino.Logger {
  return logger.child(context);
}

export const configLogger = createLogger({ module: 'config' });
export const metricsLogger = createLogger({ module: 'metrics' });

export type Logger = pino.Logger;
