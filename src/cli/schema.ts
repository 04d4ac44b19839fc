/**
 * Show the schema version and the compact context for a question.
 */

import chalk from 'chalk';
import { Querywright } from '../Querywright.js';
import { reportError } from './report.js';
import * as logger from './logger.js';

export async function runSchema(question: string | undefined): Promise<void> {
  const spinner = logger.spinner('Reading schema...');
  let qw: Querywright | undefined;

  try {
    qw = await Querywright.fromEnv();
    const { version, context } = await qw.getCompactSchema(question);
    spinner.succeed(`Schema version ${chalk.cyan(version)}`);

    logger.section(question ? `Context for "${question}"` : 'Context');
    console.log(context.renderedText);
    logger.newline();
    logger.info(`${context.relevantTables.length} tables, ${context.joinHints.length} relationships`);
  } catch (error) {
    spinner.fail('Could not read schema');
    reportError(error);
    process.exitCode = 1;
  } finally {
    await qw?.close();
  }
}
