import type { Command } from 'commander';
import ora from 'ora';
import chalk from 'chalk';
import { loadConfig, validateConfig, formatValidationResult, type AppConfig } from '../lib/config/index.js';
import { exportMetrics } from '../lib/metrics.js';
import { openDatabase } from '../db/index.js';
import { extractErrorMessage, isRetryableError } from '../utils/error.js';
import type { CheckCommandOptions } from './types.js';

export function registerCheckCommand(program: Command): void {
  program
    .command('check')
    .description('Open a pooled connection and ping the database')
    .option('--metrics', 'Print Prometheus metrics after the check')
    .addHelpText('after', `
Examples:
  rds-iam-connect check
  DATABASE_URL=postgres://app@mydb.abc123.eu-west-1.rds.amazonaws.com:5432/app \\
    RDS_IAM_ENABLED=true rds-iam-connect check --metrics
`)
    .action(async (options: CheckCommandOptions) => {
      let config: AppConfig;
      try {
        config = loadConfig();
      } catch (err) {
        console.error(chalk.red(`Failed to load configuration: ${extractErrorMessage(err)}`));
        process.exit(1);
      }

      const validation = validateConfig(config);
      if (!validation.valid) {
        console.error(formatValidationResult(validation));
        process.exit(1);
      }

      const spinner = ora('Connecting...').start();
      let ok = false;
      try {
        const db = await openDatabase(config.connectionString, config.rdsIam, {
          maxConnections: config.pool.maxConnections,
          idleTimeoutMs: config.pool.idleTimeoutMs,
          connectionTimeoutSeconds: config.pool.connectionTimeoutSeconds,
        });
        try {
          ok = await db.testConnection();
        } finally {
          await db.close();
        }

        if (ok) {
          spinner.succeed(`Connected (${db.driverName}${db.authenticator ? ', IAM token' : ''})`);
        } else {
          spinner.fail('Connection test failed (see logs)');
        }
      } catch (err) {
        const hint = isRetryableError(err) ? chalk.gray(' (transient, retry may succeed)') : '';
        spinner.fail(`${extractErrorMessage(err)}${hint}`);
      }

      if (options.metrics === true) {
        console.log();
        console.log(exportMetrics());
      }

      if (!ok) process.exit(1);
    });
}
