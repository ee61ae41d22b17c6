#!/usr/bin/env node

import { Command } from 'commander';
import { nameCommand } from './cli/commands/name';
import { targetCommand } from './cli/commands/target';
import { deployConfigCommand } from './cli/commands/deploy-config';
import { checkCommand } from './cli/commands/check';

const program = new Command();

program
  .name('worker-manifest')
  .description('Resolve a worker manifest and its environments into a deploy target')
  .version('1.0.0');

program
  .command('name')
  .description('Print the effective worker name')
  .option('-c, --config <path>', 'Path to manifest file', 'worker.yaml')
  .option('-e, --env <name>', 'Environment to resolve')
  .option('-d, --debug', 'Enable debug output')
  .option('--log-file <path>', 'Append log output to a file')
  .action(nameCommand);

program
  .command('target')
  .description('Show the effective build target')
  .option('-c, --config <path>', 'Path to manifest file', 'worker.yaml')
  .option('-e, --env <name>', 'Environment to resolve')
  .option('-d, --debug', 'Enable debug output')
  .option('--log-file <path>', 'Append log output to a file')
  .option('--json', 'Output as JSON')
  .action(targetCommand);

program
  .command('deploy-config')
  .description('Show where the worker would be deployed')
  .option('-c, --config <path>', 'Path to manifest file', 'worker.yaml')
  .option('-e, --env <name>', 'Environment to resolve')
  .option('-d, --debug', 'Enable debug output')
  .option('--log-file <path>', 'Append log output to a file')
  .option('--json', 'Output as JSON')
  .option('--allow-dev-only', 'Accept a manifest with no route and workers_dev unset')
  .action(deployConfigCommand);

program
  .command('check')
  .description('Resolve the top level and every environment')
  .option('-c, --config <path>', 'Path to manifest file', 'worker.yaml')
  .option('-d, --debug', 'Enable debug output')
  .option('--log-file <path>', 'Append log output to a file')
  .option('--template', 'Also list fields that need your account details')
  .action(checkCommand);

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
