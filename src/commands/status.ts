import type { Command } from 'commander';
import chalk from 'chalk';
import { formatValidationResult, getConfigPath, loadConfig, validateConfig, type AppConfig } from '../lib/config/index.js';
import { effectiveRefreshInterval, resolveRegion } from '../rds-iam/authenticator.js';
import { redactConnectionString } from '../rds-iam/connection-string.js';
import { formatDuration } from '../utils/duration.js';
import { extractErrorMessage } from '../utils/error.js';
import type { StatusCommandOptions } from './types.js';

export function registerStatusCommand(program: Command): void {
  program
    .command('status')
    .description('Show configuration and RDS IAM settings')
    .option('--json', 'Output as JSON')
    .addHelpText('after', `
Examples:
  rds-iam-connect status         # Human-readable status
  rds-iam-connect status --json  # JSON output for scripting
`)
    .action((options: StatusCommandOptions) => {
      let config: AppConfig;
      try {
        config = loadConfig();
      } catch (err) {
        console.error(chalk.red(`Failed to load configuration: ${extractErrorMessage(err)}`));
        process.exit(1);
      }

      const validation = validateConfig(config);
      const refreshIntervalMs = effectiveRefreshInterval(config.rdsIam);
      const region = resolveRegion(config.rdsIam.region);

      if (options.json === true) {
        console.log(JSON.stringify({
          configPath: getConfigPath(),
          connectionString: config.connectionString ? redactConnectionString(config.connectionString) : null,
          rdsIam: {
            enabled: config.rdsIam.enabled,
            region: region ?? null,
            dbUser: config.rdsIam.dbUser ?? null,
            tokenRefreshIntervalMs: refreshIntervalMs,
          },
          pool: config.pool,
          valid: validation.valid,
          errors: validation.errors,
          warnings: validation.warnings,
        }, null, 2));
        return;
      }

      console.log();
      console.log(chalk.bold('RDS IAM Connect Status'));
      console.log();

      console.log(chalk.bold('Database'));
      console.log(`  Connection:   ${config.connectionString ? redactConnectionString(config.connectionString) : chalk.yellow('not configured')}`);
      console.log(`  Pool Size:    ${config.pool.maxConnections}`);
      console.log(`  Idle Timeout: ${formatDuration(config.pool.idleTimeoutMs)}`);
      console.log();

      console.log(chalk.bold('RDS IAM Authentication'));
      console.log(`  Enabled:      ${config.rdsIam.enabled ? chalk.green('yes') : chalk.gray('no')}`);
      if (config.rdsIam.enabled) {
        console.log(`  Region:       ${region ?? chalk.yellow('not set')}`);
        console.log(`  DB User:      ${config.rdsIam.dbUser ?? chalk.gray('(from connection string)')}`);
        console.log(`  Refresh:      every ${formatDuration(refreshIntervalMs)}`);
      }
      console.log();

      console.log(formatValidationResult(validation));
      console.log();
      console.log(chalk.gray(`Config: ${getConfigPath()}`));
      console.log();
    });
}
