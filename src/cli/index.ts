#!/usr/bin/env node

/**
 * plugin-secrets CLI
 * Lists, checks and scaffolds the secrets plugins need
 */

import { Command } from 'commander';
import '../kinds';
import { listCommand } from './commands/list';
import { checkCommand } from './commands/check';
import { initCommand } from './commands/init';
import { readFileSync } from 'fs';
import { join } from 'path';

// Read version from package.json
const packageJsonPath = join(__dirname, '../../package.json');
const packageJson: { version?: string } = JSON.parse(readFileSync(packageJsonPath, 'utf8'));
const version = packageJson.version || '0.0.0';

const program = new Command();

program
  .name('plugin-secrets')
  .description('Declare, check and scaffold the secrets plugins need')
  .version(version);

program
  .command('list')
  .description('List every secret registered plugins can use')
  .option('--json', 'Output as JSON')
  .action(listCommand);

program
  .command('check')
  .description('Check the secrets file for missing secrets')
  .option('-f, --file <path>', 'Secrets file (default: ~/.plugin-secrets/secrets.yaml)')
  .option('--json', 'Output as JSON')
  .action(checkCommand);

program
  .command('init')
  .description('Write a secrets file template with instructions for every secret')
  .option('-f, --file <path>', 'Secrets file (default: ~/.plugin-secrets/secrets.yaml)')
  .action(initCommand);

program.parse();
