#!/usr/bin/env node
import { program } from 'commander';
import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';

import { validateCommand } from './commands/validate.js';
import { planCommand } from './commands/plan.js';
import { applyCommand } from './commands/apply.js';
import { splitCommand } from './commands/split.js';

// Get version from package.json
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const packagePath = join(__dirname, '..', '..', 'package.json');
const packageJson = JSON.parse(readFileSync(packagePath, 'utf-8')) as { version: string };

program
  .name('tfsplit')
  .description('Move Terraform module state from one working directory into others')
  .version(packageJson.version)
  .option('--verbose', 'Print terraform/terragrunt commands before execution');

/**
 * Verbose option description shared across all commands that run terraform/terragrunt.
 */
const VERBOSE_DESC = 'Print terraform/terragrunt commands before execution';

/**
 * Merge the global --verbose flag into command-level options.
 * Supports both positions:
 *   tfsplit --verbose plan file    (parent parses --verbose)
 *   tfsplit plan file --verbose    (subcommand parses --verbose)
 */
function withGlobalOpts<T extends { verbose?: boolean }>(opts: T): T & { verbose: boolean } {
  const globalOpts = program.opts<{ verbose?: boolean }>();
  return { ...opts, verbose: opts.verbose === true || globalOpts.verbose === true };
}

/**
 * Collect repeated option values.
 */
function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

program
  .command('validate <file>')
  .description('Validate a split plan without reading any state')
  .option('--json', 'Output as JSON')
  .action(validateCommand);

program
  .command('plan <file>')
  .description('Pull every state in a split plan and show what would move')
  .option('--json', 'Output as JSON')
  .option('--verbose', VERBOSE_DESC)
  .action((file: string, opts: { json?: boolean; verbose?: boolean }) =>
    planCommand(file, withGlobalOpts(opts))
  );

program
  .command('apply <file>')
  .description('Move module state as described by a split plan')
  .option('--overwrite', 'Replace colliding destination instances')
  .option('--json', 'Output as JSON')
  .option('--verbose', VERBOSE_DESC)
  .action((file: string, opts: { json?: boolean; verbose?: boolean; overwrite?: boolean }) =>
    applyCommand(file, withGlobalOpts(opts))
  );

program
  .command('split')
  .description('Move module state described by flags instead of a plan file')
  .requiredOption('--source <dir>', 'Working directory holding the state to split')
  .requiredOption(
    '--split <module=dir[=prefix]>',
    'Module to move and its destination; repeatable',
    collect,
    []
  )
  .option('--dry-run', 'Show what would move without pushing')
  .option('--overwrite', 'Replace colliding destination instances')
  .option('--tool <tool>', 'terraform, terragrunt or auto')
  .option('--expected-lineage <uuid>', 'Abort unless the source state has this lineage')
  .option('--json', 'Output as JSON')
  .option('--verbose', VERBOSE_DESC)
  .action((opts: Parameters<typeof splitCommand>[0]) => splitCommand(withGlobalOpts(opts)));

program.parse();
