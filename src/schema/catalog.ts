/**
 * Answers for questions about the database structure itself.
 */

import type { SchemaSnapshot } from '../types/models.js';

/**
 * Statement listing the user tables through the dialect's own catalog.
 * Unknown dialects fall back to SQLite's.
 */
export function catalogStatement(dialect: string | undefined): string {
  const name = (dialect ?? '').toLowerCase();
  if (/^(pg|postgres)/.test(name)) {
    return "SELECT tablename FROM pg_catalog.pg_tables WHERE schemaname NOT IN ('pg_catalog', 'information_schema') ORDER BY tablename";
  }
  if (/mysql|maria/.test(name)) {
    return 'SELECT TABLE_NAME FROM INFORMATION_SCHEMA.TABLES WHERE TABLE_SCHEMA = DATABASE() ORDER BY TABLE_NAME';
  }
  if (/mssql|sql ?server|tedious/.test(name)) {
    return "SELECT TABLE_NAME FROM INFORMATION_SCHEMA.TABLES WHERE TABLE_TYPE = 'BASE TABLE' ORDER BY TABLE_NAME";
  }
  return "SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name";
}

/**
 * One line per table: column count and primary key.
 */
export function describeSchema(snapshot: SchemaSnapshot): string {
  const lines = [`The database has ${plural(snapshot.tables.size, 'table')}:`];
  for (const table of snapshot.tables.values()) {
    const pk = table.primaryKey.length > 0 ? ` (PK: ${table.primaryKey.join(', ')})` : '';
    lines.push(`  - ${table.name}: ${plural(table.columns.length, 'column')}${pk}`);
  }
  return lines.join('\n');
}

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}
