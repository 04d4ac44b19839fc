/**
 * Executes validated statements through Knex.
 */

import type { Knex } from 'knex';
import type { CallOptions, ExecutionOutcome, SQLExecutor } from '../types/models.js';
import { logger } from '../utils/logger.js';
import { extractRows } from './database.js';

export interface KnexExecutorOptions {
  /** Upper bound on rows handed back, whatever the statement returns. */
  maxRows?: number;
  timeoutMs?: number;
  /** Cancel the query on the server when the timeout fires (pg, mysql). */
  cancelOnTimeout?: boolean;
}

/**
 * Database errors are reported in the outcome so the correction loop can
 * feed them back; they are never thrown. An aborted call rejects.
 */
export class KnexExecutor implements SQLExecutor {
  private db: Knex;
  private maxRows: number;
  private timeoutMs?: number;
  private cancelOnTimeout: boolean;

  constructor(db: Knex, options: KnexExecutorOptions = {}) {
    this.db = db;
    this.maxRows = options.maxRows ?? 1000;
    this.timeoutMs = options.timeoutMs;
    this.cancelOnTimeout = options.cancelOnTimeout ?? false;
  }

  async execute(statement: string, options: CallOptions = {}): Promise<ExecutionOutcome> {
    options.signal?.throwIfAborted();

    const query = this.db.raw(statement);
    if (this.timeoutMs !== undefined) {
      query.timeout(this.timeoutMs, { cancel: this.cancelOnTimeout });
    }

    try {
      const result: unknown = await untilAborted(query, options.signal);
      const rows = extractRows(result);
      logger.debug(`Query returned ${rows.length} rows`);
      return {
        success: true,
        rowCount: rows.length,
        rows: rows.slice(0, this.maxRows),
      };
    } catch (error) {
      options.signal?.throwIfAborted();
      const message = error instanceof Error ? error.message : String(error);
      logger.warn(`SQL execution failed: ${message}`);
      return { success: false, errorMessage: message };
    }
  }
}

/**
 * Settle with `work`, or reject with the abort reason as soon as the signal
 * fires. The caller stops waiting; the timeout bounds the query itself.
 */
function untilAborted<T>(work: PromiseLike<T>, signal: AbortSignal | undefined): Promise<T> {
  if (!signal) return Promise.resolve(work);

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    signal.addEventListener('abort', onAbort, { once: true });
    Promise.resolve(work).then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}
