/**
 * Schema versioning: content digests over the structure and an atomic
 * current-version pointer with a short change history.
 */

import { createHash } from 'crypto';
import type { SchemaSnapshot, SchemaVersion, SchemaVersionToken, TableInfo } from '../types/models.js';
import { logger } from '../utils/logger.js';

export interface SchemaChanges {
  readonly added: readonly string[];
  readonly removed: readonly string[];
  readonly modified: readonly string[];
}

export interface VersionUpdate {
  readonly changed: boolean;
  readonly version: SchemaVersion;
  readonly previous?: SchemaVersion;
  readonly changes: SchemaChanges;
}

export interface VersionRecord {
  readonly version: SchemaVersion;
  readonly activatedAt: Date;
  readonly tableCount: number;
  readonly changes: SchemaChanges;
}

function compare(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function canonicalTable(table: TableInfo) {
  return {
    name: table.name,
    columns: [...table.columns]
      .sort((a, b) => compare(a.name, b.name))
      .map((column) => [column.name, column.type.toLowerCase(), column.nullable]),
    primaryKey: [...table.primaryKey].sort(),
    foreignKeys: [...table.foreignKeys]
      .sort(
        (a, b) =>
          compare(a.column, b.column) ||
          compare(a.referencedTable, b.referencedTable) ||
          compare(a.referencedColumn, b.referencedColumn)
      )
      .map((fk) => [fk.column, fk.referencedTable, fk.referencedColumn]),
  };
}

/**
 * Digest of the schema structure. Declaration order of tables, columns and
 * foreign keys does not affect the result.
 */
export function computeSchemaVersion(snapshot: SchemaSnapshot): SchemaVersion {
  const tables = [...snapshot.tables.values()]
    .map(canonicalTable)
    .sort((a, b) => compare(a.name, b.name));

  return createHash('sha256').update(JSON.stringify(tables)).digest('hex').substring(0, 16);
}

function diffSnapshots(previous: SchemaSnapshot | undefined, next: SchemaSnapshot): SchemaChanges {
  if (!previous) {
    return { added: [...next.tables.keys()], removed: [], modified: [] };
  }
  const added: string[] = [];
  const removed: string[] = [];
  const modified: string[] = [];

  for (const [name, table] of next.tables) {
    const before = previous.tables.get(name);
    if (!before) {
      added.push(name);
    } else if (JSON.stringify(canonicalTable(before)) !== JSON.stringify(canonicalTable(table))) {
      modified.push(name);
    }
  }
  for (const name of previous.tables.keys()) {
    if (!next.tables.has(name)) removed.push(name);
  }
  return { added, removed, modified };
}

/**
 * Owns the live schema version. Swapping is a single assignment, so a request
 * holding an older token keeps a consistent snapshot while new requests see the
 * new one.
 */
export class VersionManager {
  private currentToken: SchemaVersionToken | undefined;
  private records: VersionRecord[] = [];
  private maxHistory: number;

  constructor(maxHistory: number = 10) {
    this.maxHistory = maxHistory;
  }

  computeVersion(snapshot: SchemaSnapshot): SchemaVersion {
    return computeSchemaVersion(snapshot);
  }

  /**
   * Install a snapshot. Returns whether the structure actually changed.
   */
  update(snapshot: SchemaSnapshot): VersionUpdate {
    const version = computeSchemaVersion(snapshot);
    const previous = this.currentToken;

    if (previous && previous.version === version) {
      return { changed: false, version, previous: previous.version, changes: { added: [], removed: [], modified: [] } };
    }

    const changes = diffSnapshots(previous?.snapshot, snapshot);
    this.currentToken = Object.freeze({ version, snapshot });
    this.records.push({ version, activatedAt: new Date(), tableCount: snapshot.tables.size, changes });
    if (this.records.length > this.maxHistory) {
      this.records = this.records.slice(-this.maxHistory);
    }

    if (previous) {
      logger.info(
        `Schema version ${previous.version} -> ${version} (added: ${changes.added.length}, removed: ${changes.removed.length}, modified: ${changes.modified.length})`
      );
    } else {
      logger.info(`Schema version ${version} loaded (${snapshot.tables.size} tables)`);
    }

    return { changed: true, version, previous: previous?.version, changes };
  }

  current(): SchemaVersionToken | undefined {
    return this.currentToken;
  }

  currentVersion(): SchemaVersion | undefined {
    return this.currentToken?.version;
  }

  isCurrent(version: SchemaVersion): boolean {
    return this.currentToken?.version === version;
  }

  history(): readonly VersionRecord[] {
    return [...this.records];
  }
}
