/**
 * Deterministic clean-up of statements that passed validation.
 */

import { analyzeStatement, isUnbounded } from './analyzer.js';
import { compact, usesBackslashEscapes } from './scanner.js';

export interface PostProcessorOptions {
  /** Row limit appended to unbounded SELECTs. */
  defaultLimit?: number;
}

export class SQLPostProcessor {
  private defaultLimit: number;

  constructor(options: PostProcessorOptions = {}) {
    this.defaultLimit = options.defaultLimit ?? 100;
  }

  /**
   * Drop comments and trailing semicolons, collapse whitespace outside
   * literals, and bound plain SELECTs with `LIMIT <default>`. Idempotent.
   */
  process(statement: string, dialect?: string): string {
    const analysis = analyzeStatement(statement, { backslashEscapes: usesBackslashEscapes(dialect) });
    if (analysis.scanError) return statement.trim();

    let sql = compact(statement, analysis.tokens);
    // An OFFSET without LIMIT is left alone; appending after it is not portable
    if (isUnbounded(analysis) && !analysis.hasOffset) {
      sql += ` LIMIT ${this.defaultLimit}`;
    }
    return sql;
  }
}
