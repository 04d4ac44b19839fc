/**
 * Schema snapshot construction and lookup helpers.
 */

import type { ColumnInfo, ForeignKey, SchemaSnapshot, TableInfo } from '../types/models.js';

export interface TableDefinition {
  name: string;
  columns: Array<{ name: string; type?: string; nullable?: boolean }>;
  primaryKey?: string[];
  foreignKeys?: ForeignKey[];
}

/**
 * Build an immutable snapshot. Tables keep the order they are given in.
 */
export function createSnapshot(tables: readonly TableDefinition[], dialect?: string): SchemaSnapshot {
  const entries = new Map<string, TableInfo>();
  for (const table of tables) {
    const columns: ColumnInfo[] = table.columns.map((column) =>
      Object.freeze({
        name: column.name,
        type: column.type ?? 'unknown',
        nullable: column.nullable ?? true,
      })
    );
    entries.set(
      table.name,
      Object.freeze({
        name: table.name,
        columns: Object.freeze(columns),
        primaryKey: Object.freeze([...(table.primaryKey ?? [])]),
        foreignKeys: Object.freeze((table.foreignKeys ?? []).map((fk) => Object.freeze({ ...fk }))),
      })
    );
  }
  return Object.freeze({ tables: entries, dialect });
}

/**
 * Case-insensitive table lookup.
 */
export function findTable(snapshot: SchemaSnapshot, name: string): TableInfo | undefined {
  const exact = snapshot.tables.get(name);
  if (exact) return exact;
  const lower = name.toLowerCase();
  for (const table of snapshot.tables.values()) {
    if (table.name.toLowerCase() === lower) return table;
  }
  return undefined;
}

export function findColumn(table: TableInfo, name: string): ColumnInfo | undefined {
  const lower = name.toLowerCase();
  return table.columns.find((column) => column.name.toLowerCase() === lower);
}

export function tableNames(snapshot: SchemaSnapshot): string[] {
  return [...snapshot.tables.keys()];
}

/**
 * Map a database type name to a short family tag.
 */
export function simplifyType(type: string): string {
  const lower = type.toLowerCase();
  if (/bool/.test(lower)) return 'bool';
  if (/int|serial/.test(lower)) return 'int';
  if (/date|time/.test(lower)) return 'dt';
  if (/dec|num|float|double|real|money/.test(lower)) return 'num';
  if (/json/.test(lower)) return 'json';
  if (/char|text|string|clob|uuid/.test(lower)) return 'str';
  return lower;
}

export function isTemporalType(type: string): boolean {
  return simplifyType(type) === 'dt';
}
