/**
 * Data models shared across the conversion pipeline.
 */

import type { JsonObject } from './utils.js';

// ─── Schema ────────────────────────────────────────────────────────────────

export interface ColumnInfo {
  readonly name: string;
  readonly type: string;
  readonly nullable: boolean;
}

export interface ForeignKey {
  readonly column: string;
  readonly referencedTable: string;
  readonly referencedColumn: string;
}

export interface TableInfo {
  readonly name: string;
  readonly columns: readonly ColumnInfo[];
  readonly primaryKey: readonly string[];
  readonly foreignKeys: readonly ForeignKey[];
}

/**
 * Immutable view of the database structure.
 * Table order is the order tables were declared in.
 */
export interface SchemaSnapshot {
  readonly tables: ReadonlyMap<string, TableInfo>;
  readonly dialect?: string;
}

/**
 * Hex digest identifying one schema structure.
 */
export type SchemaVersion = string;

/**
 * Pairs a snapshot with its version. Captured once per request and carried to
 * every cache read and write so stale entries are never served or written.
 */
export interface SchemaVersionToken {
  readonly version: SchemaVersion;
  readonly snapshot: SchemaSnapshot;
}

// ─── Preprocessing ─────────────────────────────────────────────────────────

export type QueryCategory =
  | 'lookup'
  | 'aggregation'
  | 'join'
  | 'group_by'
  | 'ranking'
  | 'filter'
  | 'nested'
  | 'schema_meta'
  | 'non_query';

export type AggregateFunction = 'count' | 'sum' | 'avg' | 'min' | 'max';

export interface TableMatch {
  readonly table: string;
  /** Index of the first matched word in the normalized text. */
  readonly position: number;
}

export interface ColumnMatch {
  readonly table: string;
  readonly column: string;
  readonly position: number;
}

export interface ProcessedQuery {
  readonly original: string;
  readonly normalizedText: string;
  readonly category: QueryCategory;
  /** Matched table and column names, in order of first appearance. */
  readonly entities: readonly string[];
  readonly tables: readonly TableMatch[];
  readonly columns: readonly ColumnMatch[];
  readonly timeExpressions: readonly string[];
  readonly aggregations: readonly AggregateFunction[];
  /** Row count requested through "top N" style phrasing. */
  readonly limit?: number;
  readonly confidence: number;
}

// ─── Schema context ────────────────────────────────────────────────────────

export interface JoinHint {
  readonly fromTable: string;
  readonly fromColumn: string;
  readonly toTable: string;
  readonly toColumn: string;
}

export interface CompactSchemaContext {
  readonly relevantTables: readonly string[];
  readonly renderedText: string;
  readonly joinHints: readonly JoinHint[];
}

// ─── SQL ───────────────────────────────────────────────────────────────────

export interface SQLCandidate {
  readonly statement: string;
  readonly explanation: string;
  readonly confidence: number;
  readonly tablesReferenced: readonly string[];
}

export type ViolationKind =
  | 'syntax_error'
  | 'unknown_table'
  | 'unknown_column'
  | 'dangerous_operation'
  | 'missing_limit'
  | 'implicit_join'
  | 'cartesian_risk';

export interface Violation {
  readonly kind: ViolationKind;
  readonly detail: string;
  readonly fatal: boolean;
}

export interface ValidationResult {
  readonly isValid: boolean;
  readonly violations: readonly Violation[];
  readonly requiresCorrection: boolean;
  readonly tablesReferenced: readonly string[];
}

export interface ExecutionOutcome {
  readonly success: boolean;
  readonly errorMessage?: string;
  readonly rowCount?: number;
  /** Returned to the caller only; never cached. */
  readonly rows?: readonly JsonObject[];
}

// ─── Collaborators ─────────────────────────────────────────────────────────

export interface CallOptions {
  signal?: AbortSignal;
}

export interface GenerateOptions extends CallOptions {
  /** Category of the question, used to pick worked examples. */
  category?: QueryCategory;
}

/**
 * Text-generation backend. Provider failures reject; they are never retried
 * by the pipeline.
 */
export interface SQLGenerator {
  generate(
    context: CompactSchemaContext,
    question: string,
    correction?: string,
    options?: GenerateOptions
  ): Promise<SQLCandidate>;
}

/**
 * Runs a validated statement. Database errors are reported in the outcome.
 */
export interface SQLExecutor {
  execute(statement: string, options?: CallOptions): Promise<ExecutionOutcome>;
}

export interface SchemaSource {
  load(): Promise<SchemaSnapshot>;
}
