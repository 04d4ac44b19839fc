/**
 * Shared test doubles: a small shop schema, a scripted generator and a
 * scripted executor.
 */

import { createSnapshot, type TableDefinition } from '../schema/snapshot.js';
import type {
  CallOptions,
  CompactSchemaContext,
  ExecutionOutcome,
  GenerateOptions,
  QueryCategory,
  SchemaSnapshot,
  SQLCandidate,
  SQLExecutor,
  SQLGenerator,
} from '../types/models.js';
import { referencedTables } from '../validation/analyzer.js';

export const SHOP_TABLES: TableDefinition[] = [
  {
    name: 'users',
    columns: [
      { name: 'id', type: 'integer', nullable: false },
      { name: 'name', type: 'varchar(255)' },
      { name: 'email', type: 'varchar(255)' },
      { name: 'created_at', type: 'datetime' },
    ],
    primaryKey: ['id'],
  },
  {
    name: 'categories',
    columns: [
      { name: 'id', type: 'integer', nullable: false },
      { name: 'name', type: 'text' },
      { name: 'revenue', type: 'decimal(10,2)' },
    ],
    primaryKey: ['id'],
  },
  {
    name: 'products',
    columns: [
      { name: 'id', type: 'integer', nullable: false },
      { name: 'name', type: 'text' },
      { name: 'category_id', type: 'integer' },
      { name: 'price', type: 'decimal(10,2)' },
      { name: 'sales', type: 'integer' },
    ],
    primaryKey: ['id'],
    foreignKeys: [{ column: 'category_id', referencedTable: 'categories', referencedColumn: 'id' }],
  },
  {
    name: 'orders',
    columns: [
      { name: 'id', type: 'integer', nullable: false },
      { name: 'user_id', type: 'integer' },
      { name: 'total', type: 'decimal(10,2)' },
      { name: 'status', type: 'varchar(20)' },
      { name: 'created_at', type: 'datetime' },
    ],
    primaryKey: ['id'],
    foreignKeys: [{ column: 'user_id', referencedTable: 'users', referencedColumn: 'id' }],
  },
  {
    name: 'order_items',
    columns: [
      { name: 'id', type: 'integer', nullable: false },
      { name: 'order_id', type: 'integer' },
      { name: 'product_id', type: 'integer' },
      { name: 'quantity', type: 'integer' },
    ],
    primaryKey: ['id'],
    foreignKeys: [
      { column: 'order_id', referencedTable: 'orders', referencedColumn: 'id' },
      { column: 'product_id', referencedTable: 'products', referencedColumn: 'id' },
    ],
  },
];

export function shopSnapshot(): SchemaSnapshot {
  return createSnapshot(SHOP_TABLES, 'sqlite');
}

export interface GenerateCall {
  context: CompactSchemaContext;
  question: string;
  correction?: string;
  category?: QueryCategory;
}

/**
 * Returns the scripted statements in order; the last one repeats. An Error in
 * the script is thrown instead.
 */
export class ScriptedGenerator implements SQLGenerator {
  readonly calls: GenerateCall[] = [];

  constructor(
    private script: Array<string | Error>,
    private onGenerate?: (call: GenerateCall) => void | Promise<void>
  ) {}

  async generate(
    context: CompactSchemaContext,
    question: string,
    correction?: string,
    options: GenerateOptions = {}
  ): Promise<SQLCandidate> {
    options.signal?.throwIfAborted();
    const call = { context, question, correction, category: options.category };
    this.calls.push(call);
    await this.onGenerate?.(call);

    const step = this.script[Math.min(this.calls.length, this.script.length) - 1];
    if (step === undefined) throw new Error('ScriptedGenerator has nothing to return');
    if (step instanceof Error) throw step;
    return { statement: step, explanation: 'scripted', confidence: 0.9, tablesReferenced: referencedTables(step) };
  }
}

/**
 * Fails with the given messages in order, then succeeds with one row.
 */
export class ScriptedExecutor implements SQLExecutor {
  readonly statements: string[] = [];

  constructor(private failures: string[] = []) {}

  async execute(statement: string, options: CallOptions = {}): Promise<ExecutionOutcome> {
    options.signal?.throwIfAborted();
    this.statements.push(statement);
    const failure = this.failures[this.statements.length - 1];
    if (failure !== undefined) return { success: false, errorMessage: failure };
    return { success: true, rowCount: 1, rows: [{ ok: 1 }] };
  }
}
