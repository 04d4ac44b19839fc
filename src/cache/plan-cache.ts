/**
 * Structural plan cache.
 *
 * Recognises a handful of question shapes and fills a SQL template from values
 * resolved against the schema, without calling the generator. Also remembers
 * "learned" templates: accepted statements whose only variable part is the row
 * count asked for in the question.
 */

import type {
  ProcessedQuery,
  QueryCategory,
  SchemaSnapshot,
  SchemaVersion,
  SchemaVersionToken,
  SQLCandidate,
  TableInfo,
} from '../types/models.js';
import { isJsonObject } from '../types/utils.js';
import { logger } from '../utils/logger.js';
import { words } from '../preprocess/text.js';
import { resolveTimeRange } from '../preprocess/time.js';
import { findTable, isTemporalType } from '../schema/snapshot.js';
import { hashKey, readString } from './codec.js';
import type { CacheStore, LookupStats } from './types.js';

/** Confidence attached to every plan-filled candidate. */
export const PLAN_CONFIDENCE = 0.6;

export type PlanPatternName = 'TOP_N' | 'AGGREGATE_GROUPBY' | 'DATE_RANGE_FILTER' | 'LEARNED';

export interface PlanContext {
  snapshot: SchemaSnapshot;
  now: Date;
  defaultLimit: number;
  maxLimit: number;
}

export type PlanParameters = Record<string, string>;

export interface PlanPattern {
  readonly name: PlanPatternName;
  readonly categories: readonly QueryCategory[];
  readonly template: string;
  readonly required: readonly string[];
  /** Resolve whatever placeholders can be resolved; missing ones are left out. */
  resolve(processed: ProcessedQuery, context: PlanContext): PlanParameters;
}

export interface PlanDetection {
  pattern: PlanPatternName;
  parameters: PlanParameters;
  missing: string[];
}

export interface PlanMatch {
  pattern: PlanPatternName;
  parameters: PlanParameters;
  candidate: SQLCandidate;
}

const SAFE_IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;
const ASCENDING_CUES = /\b(?:bottom|lowest|least|smallest|worst|fewest)\b/;
const GROUP_MARKERS: ReadonlySet<string> = new Set(['by', 'per', 'each']);

export function fillTemplate(template: string, parameters: PlanParameters): string {
  return template.replace(/\{(\w+)\}/g, (whole, name: string) => parameters[name] ?? whole);
}

function safe(name: string | undefined): string | undefined {
  return name !== undefined && SAFE_IDENTIFIER.test(name) ? name : undefined;
}

function isPrimaryKey(table: TableInfo, column: string): boolean {
  return table.primaryKey.includes(column);
}

function resolveRowCount(processed: ProcessedQuery, context: PlanContext): string | undefined {
  const n = processed.limit;
  return n !== undefined && n >= 1 && n <= context.maxLimit ? String(n) : undefined;
}

/**
 * "top 5 products by sales" → ORDER BY the metric, LIMIT n.
 */
export const TOP_N: PlanPattern = {
  name: 'TOP_N',
  categories: ['ranking'],
  template: 'SELECT * FROM {table} ORDER BY {metric_column} {direction} LIMIT {n}',
  required: ['table', 'metric_column', 'direction', 'n'],
  resolve(processed, context) {
    const parameters: PlanParameters = {
      direction: ASCENDING_CUES.test(processed.normalizedText) ? 'ASC' : 'DESC',
    };
    const n = resolveRowCount(processed, context);
    if (n) parameters.n = n;

    const tableMatch = processed.tables[0];
    const table = tableMatch ? findTable(context.snapshot, tableMatch.table) : undefined;
    if (!table || !safe(table.name)) return parameters;
    parameters.table = table.name;

    const byIndex = words(processed.normalizedText).indexOf('by');
    const tablePositions = new Set(processed.tables.map((t) => t.position));
    const metrics = processed.columns.filter(
      (c) => c.table === table.name && !isPrimaryKey(table, c.column) && !tablePositions.has(c.position)
    );
    const metric = metrics.find((c) => byIndex >= 0 && c.position > byIndex) ?? metrics[0];
    const column = safe(metric?.column);
    if (column) parameters.metric_column = column;
    return parameters;
  },
};

/**
 * "count orders by status", "total amount per region".
 */
export const AGGREGATE_GROUPBY: PlanPattern = {
  name: 'AGGREGATE_GROUPBY',
  categories: ['group_by'],
  template:
    'SELECT {group_column}, {agg_func}({metric_column}) AS {alias} FROM {table} GROUP BY {group_column} ORDER BY {alias} DESC',
  required: ['group_column', 'agg_func', 'metric_column', 'alias', 'table'],
  resolve(processed, context) {
    const parameters: PlanParameters = {};
    const aggregate = processed.aggregations[0];
    if (aggregate) parameters.agg_func = aggregate.toUpperCase();

    const questionWords = words(processed.normalizedText);
    const grouped = processed.columns.filter((c) => GROUP_MARKERS.has(questionWords[c.position - 1] ?? ''));
    const mentioned = new Set(processed.tables.map((t) => t.table));
    const owners = grouped.filter((c) => mentioned.has(c.table));
    const group = owners.length > 0 ? owners[0] : grouped.length === 1 ? grouped[0] : undefined;
    if (!group) return parameters;

    const table = findTable(context.snapshot, group.table);
    if (!table || !safe(table.name) || !safe(group.column)) return parameters;
    parameters.table = table.name;
    parameters.group_column = group.column;

    if (aggregate === 'count') {
      parameters.metric_column = '*';
      parameters.alias = 'row_count';
      return parameters;
    }

    const metric = processed.columns
      .filter(
        (c) =>
          c.table === table.name &&
          c.position < group.position &&
          c.column !== group.column &&
          !isPrimaryKey(table, c.column)
      )
      .pop();
    const metricColumn = safe(metric?.column);
    if (metricColumn && aggregate) {
      parameters.metric_column = metricColumn;
      parameters.alias = `${aggregate}_${metricColumn}`;
    }
    return parameters;
  },
};

const CONVENTIONAL_DATE_COLUMNS = ['created_at', 'createdat', 'created', 'date'];

/**
 * "orders from last month" → half-open date range on the table's date column.
 */
export const DATE_RANGE_FILTER: PlanPattern = {
  name: 'DATE_RANGE_FILTER',
  categories: ['filter', 'lookup'],
  template:
    "SELECT * FROM {table} WHERE {date_column} >= '{start_date}' AND {date_column} < '{end_date}' LIMIT {limit}",
  required: ['table', 'date_column', 'start_date', 'end_date', 'limit'],
  resolve(processed, context) {
    const parameters: PlanParameters = { limit: String(context.defaultLimit) };

    const expression = processed.timeExpressions[0];
    const range = expression ? resolveTimeRange(expression, context.now) : undefined;
    if (range) {
      parameters.start_date = range.start;
      parameters.end_date = range.end;
    }

    const tableMatch = processed.tables[0];
    const table = tableMatch ? findTable(context.snapshot, tableMatch.table) : undefined;
    if (!table || !safe(table.name)) return parameters;
    parameters.table = table.name;

    const temporal = table.columns.filter((c) => isTemporalType(c.type));
    const mentioned = processed.columns.find(
      (c) => c.table === table.name && temporal.some((t) => t.name === c.column)
    );
    const chosen =
      mentioned?.column ??
      (temporal.length === 1
        ? temporal[0].name
        : temporal.find(
            (c) => CONVENTIONAL_DATE_COLUMNS.includes(c.name.toLowerCase()) || c.name.toLowerCase().endsWith('_date')
          )?.name);
    const column = safe(chosen);
    if (column) parameters.date_column = column;
    return parameters;
  },
};

export const BUILT_IN_PATTERNS: readonly PlanPattern[] = [TOP_N, AGGREGATE_GROUPBY, DATE_RANGE_FILTER];

export interface QueryPlanCacheOptions {
  patterns?: readonly PlanPattern[];
  ttlSeconds?: number;
  defaultLimit?: number;
  maxLimit?: number;
  now?: () => Date;
}

const LEARNED_LIMIT = /\bLIMIT\s+(\d+)\s*;?\s*$/i;

export class QueryPlanCache {
  private store: CacheStore;
  private patterns: readonly PlanPattern[];
  private ttlSeconds: number;
  private defaultLimit: number;
  private maxLimit: number;
  private now: () => Date;
  private hits = 0;
  private misses = 0;

  constructor(store: CacheStore, options: QueryPlanCacheOptions = {}) {
    this.store = store;
    this.patterns = options.patterns ?? BUILT_IN_PATTERNS;
    this.ttlSeconds = options.ttlSeconds ?? 86400;
    this.defaultLimit = options.defaultLimit ?? 100;
    this.maxLimit = options.maxLimit ?? 1000;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Every applicable pattern with what it could and could not resolve.
   */
  detect(processed: ProcessedQuery, snapshot: SchemaSnapshot): PlanDetection[] {
    const context = this.context(snapshot);
    return this.patterns
      .filter((pattern) => pattern.categories.includes(processed.category))
      .map((pattern) => {
        const parameters = pattern.resolve(processed, context);
        return {
          pattern: pattern.name,
          parameters,
          missing: pattern.required.filter((name) => !parameters[name]),
        };
      });
  }

  /**
   * First pattern whose placeholders all resolve, then learned templates.
   */
  async lookup(processed: ProcessedQuery, token: SchemaVersionToken): Promise<PlanMatch | undefined> {
    for (const detection of this.detect(processed, token.snapshot)) {
      if (detection.missing.length > 0) continue;
      const pattern = this.patterns.find((p) => p.name === detection.pattern);
      if (!pattern) continue;
      this.hits++;
      const statement = fillTemplate(pattern.template, detection.parameters);
      logger.debug(`Plan ${pattern.name} matched: ${statement}`);
      return {
        pattern: pattern.name,
        parameters: detection.parameters,
        candidate: this.candidate(statement, `Filled ${pattern.name} template`, detection.parameters),
      };
    }

    const learned = await this.lookupLearned(processed, token);
    if (learned) {
      this.hits++;
      return learned;
    }

    this.misses++;
    return undefined;
  }

  /**
   * Remember an accepted statement as a template over the requested row count.
   * Returns whether a template was stored.
   */
  async learn(processed: ProcessedQuery, candidate: SQLCandidate, version: SchemaVersion): Promise<boolean> {
    const shape = this.shapeOf(processed);
    const limit = LEARNED_LIMIT.exec(candidate.statement);
    if (!shape || !limit || Number(limit[1]) !== processed.limit) return false;

    const template = candidate.statement.replace(LEARNED_LIMIT, 'LIMIT {n}');
    await this.store.set(
      this.learnedKey(shape, version),
      { template, question: processed.original, tables: [...candidate.tablesReferenced] },
      'plan',
      version,
      this.ttlSeconds
    );
    logger.debug(`Learned plan for "${shape}"`);
    return true;
  }

  getStats(): LookupStats {
    return { hits: this.hits, misses: this.misses };
  }

  private async lookupLearned(processed: ProcessedQuery, token: SchemaVersionToken): Promise<PlanMatch | undefined> {
    const shape = this.shapeOf(processed);
    const n = resolveRowCount(processed, this.context(token.snapshot));
    if (!shape || !n) return undefined;

    const value = await this.store.get(this.learnedKey(shape, token.version), 'plan', token.version);
    if (!isJsonObject(value)) return undefined;
    const template = readString(value, 'template');
    if (!template) return undefined;

    const parameters = { n };
    const statement = fillTemplate(template, parameters);
    return {
      pattern: 'LEARNED',
      parameters,
      candidate: this.candidate(statement, `Reused plan learned from "${readString(value, 'question') ?? shape}"`, parameters),
    };
  }

  /**
   * Normalized text with the requested row count abstracted, or undefined
   * when the question carries none.
   */
  private shapeOf(processed: ProcessedQuery): string | undefined {
    if (processed.limit === undefined) return undefined;
    const pattern = new RegExp(`\\b${processed.limit}\\b`);
    return pattern.test(processed.normalizedText) ? processed.normalizedText.replace(pattern, '{n}') : undefined;
  }

  private learnedKey(shape: string, version: SchemaVersion): string {
    return `${version}:learned:${hashKey(shape)}`;
  }

  private context(snapshot: SchemaSnapshot): PlanContext {
    return { snapshot, now: this.now(), defaultLimit: this.defaultLimit, maxLimit: this.maxLimit };
  }

  private candidate(statement: string, explanation: string, parameters: PlanParameters): SQLCandidate {
    const tables = parameters.table ? [parameters.table] : [];
    return { statement, explanation, confidence: PLAN_CONFIDENCE, tablesReferenced: tables };
  }
}
