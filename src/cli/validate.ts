/**
 * Validate a statement against the live schema.
 */

import { Querywright } from '../Querywright.js';
import { reportError } from './report.js';
import * as logger from './logger.js';

export async function runValidate(statement: string): Promise<void> {
  let qw: Querywright | undefined;

  try {
    qw = await Querywright.fromEnv();
    const { validation, statement: processed } = await qw.validate(statement);

    logger.section('Validation');
    logger.row('Valid', String(validation.isValid), validation.isValid);
    logger.row('Requires correction', String(validation.requiresCorrection), !validation.requiresCorrection);
    logger.row('Tables', validation.tablesReferenced.join(', ') || '(none)');

    logger.violations(validation.violations);

    if (validation.isValid) {
      logger.newline();
      logger.statement(processed);
    } else {
      process.exitCode = 1;
    }
  } catch (error) {
    reportError(error);
    process.exitCode = 1;
  } finally {
    await qw?.close();
  }
}
