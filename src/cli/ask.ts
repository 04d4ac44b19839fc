/**
 * Convert a question from the CLI, optionally executing it.
 */

import chalk from 'chalk';
import { Querywright } from '../Querywright.js';
import { reportError } from './report.js';
import * as logger from './logger.js';

export interface AskOptions {
  execute?: boolean;
  maxCorrections?: string;
  format: 'json' | 'table';
}

export async function runAsk(question: string, options: AskOptions): Promise<void> {
  const spinner = logger.spinner('Connecting to database...');
  let qw: Querywright | undefined;

  try {
    qw = await Querywright.fromEnv();
    spinner.succeed('Connected');

    const maxCorrections = options.maxCorrections === undefined ? undefined : Number(options.maxCorrections);
    if (maxCorrections !== undefined && (!Number.isInteger(maxCorrections) || maxCorrections < 0)) {
      throw new Error(`--max-corrections must be a non-negative integer, got "${options.maxCorrections}"`);
    }

    spinner.start('Generating SQL...');
    const result = await qw.convert(question, { execute: options.execute ?? false, maxCorrections });

    if (result.status === 'failed') {
      spinner.fail(
        result.failure?.kind === 'input' ? 'Nothing to convert' : `Conversion failed after ${result.attempts} correction(s)`
      );
      if (result.candidate.statement) logger.statement(result.candidate.statement);
      logger.error(result.failure?.detail ?? 'Unknown failure', result.failure?.rationale);
      process.exitCode = 1;
      return;
    }

    const source = result.fromCache ? chalk.green(`HIT (${result.cacheTier})`) : chalk.yellow('MISS');
    spinner.succeed(`Done in ${result.latencyMs}ms`);
    logger.statement(result.candidate.statement);
    console.log(chalk.gray(`Cache: ${source}  Corrections: ${result.attempts}  Schema: ${result.schemaVersion}`));

    logger.violations(result.validation.violations);
    if (result.processed.category === 'schema_meta') {
      logger.info(result.candidate.explanation);
    }

    if (result.execution) {
      logger.newline();
      const rows = result.execution.rows ?? [];
      logger.rows(rows, options.format);
      logger.info(`${result.execution.rowCount ?? rows.length} rows`);
    }
  } catch (error) {
    spinner.fail('Query failed');
    reportError(error);
    process.exitCode = 1;
  } finally {
    await qw?.close();
  }
}
