/**
 * Database connection using Knex.js for multi-database support.
 * Supports PostgreSQL, MySQL, SQLite, and SQL Server.
 */

import knex, { type Knex } from 'knex';
import { normalizeClient } from '../config.js';
import { toJsonValue, type JsonObject, type JsonValue } from '../types/utils.js';
import { logger } from '../utils/logger.js';

/**
 * Open a connection and check it with a trivial query.
 * Client aliases such as `postgres` or `sqlite` are accepted.
 */
export async function createDatabase(knexConfig: Knex.Config): Promise<Knex> {
  let clientConfig = knexConfig;
  if (typeof knexConfig.client === 'string') {
    const { client, aliased } = normalizeClient(knexConfig.client);
    if (aliased) {
      logger.warn(`Database client "${knexConfig.client}" normalized to "${client}"`);
      clientConfig = { ...knexConfig, client };
    }
  }

  const db = knex(clientConfig);
  try {
    await db.raw('SELECT 1');
  } catch (error) {
    logger.error({ err: error }, 'Failed to connect to database');
    await db.destroy();
    throw error;
  }

  logger.info(`Database initialized: ${describeClient(clientConfig)}`);
  return db;
}

export function describeClient(knexConfig: Knex.Config): string {
  return typeof knexConfig.client === 'string' ? knexConfig.client : 'custom';
}

/**
 * Knex can cancel running queries for these clients only.
 */
export function supportsQueryCancel(client: string | undefined): boolean {
  return client === 'pg' || client === 'postgres' || client === 'postgresql' || client === 'mysql' || client === 'mysql2';
}

/**
 * Pull the row array out of a raw query result.
 * Knex returns different result structures per dialect; order matters.
 */
export function extractRows(result: unknown): JsonObject[] {
  return toRows(rawRows(result));
}

function rawRows(result: unknown): unknown {
  if (Array.isArray(result)) {
    // MySQL: [[rows], [fields]]
    if (result.length === 2 && Array.isArray(result[0])) return result[0];
    // SQLite: rows directly
    return result;
  }
  if (typeof result === 'object' && result !== null) {
    // PostgreSQL: { rows: [...] }
    if ('rows' in result) return result.rows;
    // SQL Server: { recordset: [...] }
    if ('recordset' in result) return result.recordset;
  }
  return [];
}

function toRows(value: unknown): JsonObject[] {
  if (!Array.isArray(value)) return [];
  const rows: JsonObject[] = [];
  for (const raw of value) {
    const row: JsonValue = toJsonValue(raw);
    if (typeof row === 'object' && row !== null && !Array.isArray(row)) rows.push(row);
  }
  return rows;
}
