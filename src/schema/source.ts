/**
 * Schema sources: where snapshots come from.
 */

import type { Knex } from 'knex';
import { SchemaInspector } from 'knex-schema-inspector';
import type { SchemaSnapshot, SchemaSource } from '../types/models.js';
import { SchemaError } from '../types/errors.js';
import { logger } from '../utils/logger.js';
import { createSnapshot, type TableDefinition } from './snapshot.js';

/**
 * Fixed table definitions, e.g. loaded from a file or written in tests.
 */
export class StaticSchemaSource implements SchemaSource {
  private definitions: TableDefinition[];

  constructor(definitions: TableDefinition[], private dialect?: string) {
    this.definitions = definitions;
  }

  /**
   * Swap the definitions; the next load() returns the new structure.
   */
  replace(definitions: TableDefinition[]): void {
    this.definitions = definitions;
  }

  async load(): Promise<SchemaSnapshot> {
    return createSnapshot(this.definitions, this.dialect);
  }
}

/**
 * Reads tables, columns, primary keys and foreign keys from a live database.
 */
export class KnexSchemaSource implements SchemaSource {
  private inspector: ReturnType<typeof SchemaInspector>;

  constructor(db: Knex, private dialect?: string) {
    this.inspector = SchemaInspector(db);
  }

  async load(): Promise<SchemaSnapshot> {
    try {
      const tables = await this.inspector.tables();
      const foreignKeys = await this.inspector.foreignKeys();
      const definitions: TableDefinition[] = [];

      for (const table of tables) {
        const columns = await this.inspector.columnInfo(table);
        definitions.push({
          name: table,
          columns: columns.map((column) => ({
            name: column.name,
            type: column.data_type,
            nullable: column.is_nullable,
          })),
          primaryKey: columns.filter((column) => column.is_primary_key).map((column) => column.name),
          foreignKeys: foreignKeys
            .filter((fk) => fk.table === table)
            .map((fk) => ({
              column: fk.column,
              referencedTable: fk.foreign_key_table,
              referencedColumn: fk.foreign_key_column,
            })),
        });
      }

      logger.debug(`Loaded schema: ${definitions.length} tables`);
      return createSnapshot(definitions, this.dialect);
    } catch (error) {
      throw new SchemaError(`Failed to read database schema: ${error instanceof Error ? error.message : String(error)}`, undefined, {
        cause: error,
      });
    }
  }
}
