#!/usr/bin/env node
/**
 * querywright CLI
 */

import { Command, Option } from 'commander';
import { runAsk } from './cli/ask.js';
import { runSchema } from './cli/schema.js';
import { runValidate } from './cli/validate.js';

const program = new Command();

program
  .name('querywright')
  .description('Turn questions into validated, read-only SQL')
  .version('0.1.0');

program
  .command('ask <question>')
  .description('Convert a question to SQL')
  .option('-e, --execute', 'Execute the statement and print the rows')
  .option('-m, --max-corrections <n>', 'Correction attempts for validation and execution failures')
  .addOption(new Option('-f, --format <type>', 'Output format for rows').choices(['table', 'json']).default('table'))
  .action(runAsk);

program
  .command('schema [question]')
  .description('Show the schema version and the compact context sent for a question')
  .action(runSchema);

program
  .command('validate <sql>')
  .description('Validate a statement against the live schema')
  .action(runValidate);

await program.parseAsync();
