#!/usr/bin/env node

import { Command } from 'commander';
import { readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import { registerStatusCommand } from './commands/status.js';
import { registerUrlCommand } from './commands/url.js';
import { registerCheckCommand } from './commands/check.js';

// Read version from package.json at runtime
function getVersion(): string {
  try {
    const __dirname = dirname(fileURLToPath(import.meta.url));
    // src/ and dist/ both sit one level below package.json
    const pkgPath = join(__dirname, '..', 'package.json');
    const pkg = JSON.parse(readFileSync(pkgPath, 'utf-8')) as { version?: string };
    return pkg.version ?? '0.0.0';
  } catch {
    return '0.0.0';
  }
}
const version = getVersion();

const program = new Command();

program
  .name('rds-iam-connect')
  .description('Connect to RDS PostgreSQL and MySQL with short-lived IAM auth tokens')
  .version(version);

registerStatusCommand(program);
registerUrlCommand(program);
registerCheckCommand(program);

await program.parseAsync();
