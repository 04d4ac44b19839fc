import chalk from 'chalk';
import { QuerywrightError } from '../types/errors.js';
import * as logger from './logger.js';

/**
 * Print an error with its suggested fixes.
 */
export function reportError(error: unknown): void {
  if (error instanceof QuerywrightError) {
    logger.error(error.detail);
    for (const suggestion of error.suggestions) {
      console.log(`  ${chalk.yellow('→')} ${chalk.dim(suggestion)}`);
    }
    return;
  }
  logger.error(error instanceof Error ? error.message : String(error));
  if (!process.env.DATABASE_URL && !process.env.DATABASE_PATH) {
    console.log(chalk.yellow('Tip: set DATABASE_PATH or DATABASE_URL in .env'));
  }
}
