import test from 'node:test';
import assert from 'node:assert/strict';
import { createSnapshot, type TableDefinition } from './snapshot.js';
import { computeSchemaVersion, VersionManager } from './version-manager.js';
import { SHOP_TABLES } from '../testing/fixtures.js';

function reversed(tables: readonly TableDefinition[]): TableDefinition[] {
  return [...tables].reverse().map((table) => ({ ...table, columns: [...table.columns].reverse() }));
}

test('declaration order does not change the version', () => {
  const a = computeSchemaVersion(createSnapshot(SHOP_TABLES));
  const b = computeSchemaVersion(createSnapshot(reversed(SHOP_TABLES)));
  assert.equal(a, b);
  assert.match(a, /^[0-9a-f]{16}$/);
});

test('foreign key order does not change the version', () => {
  const links = (keys: Array<[string, string]>): TableDefinition[] => [
    { name: 'accounts', columns: [{ name: 'id' }, { name: 'code' }], primaryKey: ['id'] },
    {
      name: 'transfers',
      columns: [{ name: 'id' }, { name: 'account_ref' }],
      foreignKeys: keys.map(([column, referencedColumn]) => ({ column, referencedTable: 'accounts', referencedColumn })),
    },
  ];
  const forward = links([['account_ref', 'id'], ['account_ref', 'code']]);
  const backward = links([['account_ref', 'code'], ['account_ref', 'id']]);
  assert.equal(computeSchemaVersion(createSnapshot(forward)), computeSchemaVersion(createSnapshot(backward)));
});

test('a column type change produces a new version', () => {
  const changed: TableDefinition[] = SHOP_TABLES.map((table) =>
    table.name === 'users'
      ? { ...table, columns: table.columns.map((c) => (c.name === 'email' ? { ...c, type: 'text' } : c)) }
      : table
  );
  assert.notEqual(computeSchemaVersion(createSnapshot(SHOP_TABLES)), computeSchemaVersion(createSnapshot(changed)));
});

test('update reports whether the structure changed and what changed', () => {
  const versions = new VersionManager();

  const first = versions.update(createSnapshot(SHOP_TABLES));
  assert.equal(first.changed, true);
  assert.equal(first.previous, undefined);
  assert.deepEqual(first.changes.added, ['users', 'categories', 'products', 'orders', 'order_items']);

  const same = versions.update(createSnapshot(reversed(SHOP_TABLES)));
  assert.equal(same.changed, false);
  assert.equal(same.version, first.version);

  const next: TableDefinition[] = SHOP_TABLES.filter((table) => table.name !== 'categories').map((table) =>
    table.name === 'orders' ? { ...table, columns: [...table.columns, { name: 'note', type: 'text' }] } : table
  );
  next.push({ name: 'reviews', columns: [{ name: 'id', type: 'integer' }], primaryKey: ['id'] });

  const second = versions.update(createSnapshot(next));
  assert.equal(second.changed, true);
  assert.equal(second.previous, first.version);
  assert.deepEqual(second.changes, { added: ['reviews'], removed: ['categories'], modified: ['orders'] });

  assert.equal(versions.isCurrent(second.version), true);
  assert.equal(versions.isCurrent(first.version), false);
  assert.equal(versions.current()?.snapshot.tables.has('reviews'), true);
  assert.deepEqual(
    versions.history().map((record) => record.version),
    [first.version, second.version]
  );
});

test('history is bounded', () => {
  const versions = new VersionManager(2);
  for (let i = 0; i < 4; i++) {
    versions.update(createSnapshot([{ name: `t${i}`, columns: [{ name: 'id' }] }]));
  }
  assert.equal(versions.history().length, 2);
  assert.equal(versions.history()[1].version, versions.currentVersion());
});
