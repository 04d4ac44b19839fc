/**
 * Schema context compaction: pick the tables relevant to a question and render
 * them in a terse form for the generation prompt.
 */

import type {
  CompactSchemaContext,
  JoinHint,
  ProcessedQuery,
  SchemaSnapshot,
  TableInfo,
} from '../types/models.js';
import { simplifyType } from './snapshot.js';

export interface SchemaOptimizerOptions {
  /** Upper bound on selected tables. */
  maxTables?: number;
  /** Size of the fallback set when nothing in the question matches. */
  fallbackSize?: number;
  /** Append simplified column types (`id:int`). */
  includeTypes?: boolean;
}

const TABLE_MATCH_SCORE = 10;
const COLUMN_MATCH_SCORE = 3;

export class SchemaOptimizer {
  private maxTables: number;
  private fallbackSize: number;
  private includeTypes: boolean;

  constructor(options: SchemaOptimizerOptions = {}) {
    this.maxTables = options.maxTables ?? 8;
    this.fallbackSize = options.fallbackSize ?? 5;
    this.includeTypes = options.includeTypes ?? false;
  }

  /**
   * Ordered, bounded selection of table names. Never empty for a non-empty
   * schema.
   */
  selectRelevant(snapshot: SchemaSnapshot, processed: ProcessedQuery): string[] {
    if (snapshot.tables.size === 0) return [];

    // (a) direct matches
    const scores = new Map<string, number>();
    const bump = (table: string, by: number) => scores.set(table, (scores.get(table) ?? 0) + by);
    for (const match of processed.tables) bump(match.table, TABLE_MATCH_SCORE);
    for (const match of processed.columns) bump(match.table, COLUMN_MATCH_SCORE);

    const direct = [...scores.entries()]
      .filter(([table]) => snapshot.tables.has(table))
      .sort((a, b) => b[1] - a[1])
      .map(([table]) => table);

    if (direct.length === 0 || processed.category === 'schema_meta') {
      return this.fallback(snapshot, direct);
    }

    // (b) one FK hop from any direct match, in declaration order
    const selected = [...direct];
    const directSet = new Set(direct);
    for (const table of snapshot.tables.values()) {
      if (selected.includes(table.name)) continue;
      if (this.neighbours(snapshot, table.name).some((n) => directSet.has(n))) {
        selected.push(table.name);
      }
    }

    return selected.slice(0, this.maxTables);
  }

  /**
   * Render the selected tables, one line each, followed by the FK edges among them.
   */
  render(snapshot: SchemaSnapshot, tables: readonly string[]): { text: string; joinHints: JoinHint[] } {
    const selected = new Set(tables);
    const lines: string[] = [];
    const joinHints: JoinHint[] = [];

    for (const name of tables) {
      const table = snapshot.tables.get(name);
      if (!table) continue;
      lines.push(this.renderTable(table));
      for (const fk of table.foreignKeys) {
        if (selected.has(fk.referencedTable)) {
          joinHints.push({
            fromTable: table.name,
            fromColumn: fk.column,
            toTable: fk.referencedTable,
            toColumn: fk.referencedColumn,
          });
        }
      }
    }

    if (joinHints.length > 0) {
      lines.push('', '# relationships');
      for (const hint of joinHints) {
        lines.push(`${hint.fromTable}.${hint.fromColumn} -> ${hint.toTable}.${hint.toColumn}`);
      }
    }

    return { text: lines.join('\n'), joinHints };
  }

  buildContext(snapshot: SchemaSnapshot, processed: ProcessedQuery): CompactSchemaContext {
    const relevantTables = this.selectRelevant(snapshot, processed);
    const { text, joinHints } = this.render(snapshot, relevantTables);
    return { relevantTables, renderedText: text, joinHints };
  }

  /**
   * Join path between two tables: direct FK, or through one intermediate table.
   * Returns undefined when the tables are further apart.
   */
  findJoinPath(snapshot: SchemaSnapshot, from: string, to: string): JoinHint[] | undefined {
    const direct = this.edgesBetween(snapshot, from, to);
    if (direct.length > 0) return [direct[0]];

    for (const middle of snapshot.tables.keys()) {
      if (middle === from || middle === to) continue;
      const first = this.edgesBetween(snapshot, from, middle);
      const second = this.edgesBetween(snapshot, middle, to);
      if (first.length > 0 && second.length > 0) return [first[0], second[0]];
    }
    return undefined;
  }

  private renderTable(table: TableInfo): string {
    const primary = new Set(table.primaryKey);
    const columns = table.columns.map((column) => {
      const marker = primary.has(column.name) ? '*' : '';
      const type = this.includeTypes ? `:${simplifyType(column.type)}` : '';
      return `${marker}${column.name}${type}`;
    });
    return `${table.name}(${columns.join(', ')})`;
  }

  private fallback(snapshot: SchemaSnapshot, seed: readonly string[]): string[] {
    const degree = new Map<string, number>();
    for (const table of snapshot.tables.values()) {
      degree.set(table.name, this.neighbours(snapshot, table.name).length);
    }
    // Stable sort keeps declaration order among equally connected tables
    const hubs = [...snapshot.tables.keys()].sort((a, b) => (degree.get(b) ?? 0) - (degree.get(a) ?? 0));
    const limit = Math.min(Math.max(this.fallbackSize, seed.length), this.maxTables);
    const result = [...seed];
    for (const name of hubs) {
      if (result.length >= limit) break;
      if (!result.includes(name)) result.push(name);
    }
    return result.slice(0, this.maxTables);
  }

  private neighbours(snapshot: SchemaSnapshot, name: string): string[] {
    const result = new Set<string>();
    const table = snapshot.tables.get(name);
    for (const fk of table?.foreignKeys ?? []) result.add(fk.referencedTable);
    for (const other of snapshot.tables.values()) {
      if (other.foreignKeys.some((fk) => fk.referencedTable === name)) result.add(other.name);
    }
    result.delete(name);
    return [...result];
  }

  private edgesBetween(snapshot: SchemaSnapshot, a: string, b: string): JoinHint[] {
    const edges: JoinHint[] = [];
    for (const [from, to] of [
      [a, b],
      [b, a],
    ]) {
      const table = snapshot.tables.get(from);
      for (const fk of table?.foreignKeys ?? []) {
        if (fk.referencedTable === to) {
          edges.push({ fromTable: from, fromColumn: fk.column, toTable: to, toColumn: fk.referencedColumn });
        }
      }
    }
    return edges;
  }
}
