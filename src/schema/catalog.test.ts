import test from 'node:test';
import assert from 'node:assert/strict';
import { shopSnapshot } from '../testing/fixtures.js';
import { catalogStatement, describeSchema } from './catalog.js';
import { createSnapshot } from './snapshot.js';

test('each dialect lists tables through its own catalog', () => {
  assert.equal(
    catalogStatement('pg'),
    "SELECT tablename FROM pg_catalog.pg_tables WHERE schemaname NOT IN ('pg_catalog', 'information_schema') ORDER BY tablename"
  );
  assert.equal(
    catalogStatement('mysql2'),
    'SELECT TABLE_NAME FROM INFORMATION_SCHEMA.TABLES WHERE TABLE_SCHEMA = DATABASE() ORDER BY TABLE_NAME'
  );
  assert.equal(
    catalogStatement('mssql'),
    "SELECT TABLE_NAME FROM INFORMATION_SCHEMA.TABLES WHERE TABLE_TYPE = 'BASE TABLE' ORDER BY TABLE_NAME"
  );
  assert.equal(
    catalogStatement(undefined),
    "SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name"
  );
});

test('the schema description lists columns and primary keys per table', () => {
  assert.equal(
    describeSchema(shopSnapshot()),
    [
      'The database has 5 tables:',
      '  - users: 4 columns (PK: id)',
      '  - categories: 3 columns (PK: id)',
      '  - products: 5 columns (PK: id)',
      '  - orders: 5 columns (PK: id)',
      '  - order_items: 4 columns (PK: id)',
    ].join('\n')
  );
  assert.equal(
    describeSchema(createSnapshot([{ name: 'events', columns: [{ name: 'payload' }] }])),
    'The database has 1 table:\n  - events: 1 column'
  );
});
