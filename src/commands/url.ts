import type { Command } from 'commander';
import chalk from 'chalk';
import { loadConfig } from '../lib/config/index.js';
import { buildRdsIamConnection } from '../rds-iam/build.js';
import { redactConnectionString } from '../rds-iam/connection-string.js';
import { extractErrorMessage } from '../utils/error.js';
import type { UrlCommandOptions } from './types.js';

export function registerUrlCommand(program: Command): void {
  program
    .command('url')
    .description('Print the connection string with a fresh IAM token as password')
    .option('--show-secret', 'Print the token instead of masking it')
    .addHelpText('after', `
Examples:
  # Check what the rewritten connection string looks like
  rds-iam-connect url

  # Use the connection string with psql
  psql "$(rds-iam-connect url --show-secret)"
`)
    .action(async (options: UrlCommandOptions) => {
      try {
        const config = loadConfig();
        if (!config.connectionString) {
          console.error(chalk.red('No connection string configured. Set DATABASE_URL or connectionString in config.json'));
          process.exit(1);
        }

        const { connectionString } = await buildRdsIamConnection(config.connectionString, config.rdsIam);
        console.log(options.showSecret === true ? connectionString : redactConnectionString(connectionString));
      } catch (err) {
        console.error(chalk.red(extractErrorMessage(err)));
        process.exit(1);
      }
    });
}
