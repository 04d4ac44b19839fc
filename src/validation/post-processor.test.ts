import test from 'node:test';
import assert from 'node:assert/strict';
import { SQLPostProcessor } from './post-processor.js';
import { SQLValidator } from './validator.js';
import { shopSnapshot } from '../testing/fixtures.js';

const postProcessor = new SQLPostProcessor();

test('drops the trailing semicolon and bounds plain SELECTs', () => {
  assert.equal(postProcessor.process('SELECT name FROM users;'), 'SELECT name FROM users LIMIT 100');
});

test('drops comments and collapses whitespace', () => {
  assert.equal(
    postProcessor.process('SELECT  id,\n  name -- the name\nFROM users /* everyone */ LIMIT 5'),
    'SELECT id, name FROM users LIMIT 5'
  );
});

test('keeps adjacent tokens adjacent', () => {
  assert.equal(postProcessor.process('SELECT u.name FROM users u'), 'SELECT u.name FROM users u LIMIT 100');
  assert.equal(postProcessor.process('SELECT COUNT(*) FROM users'), 'SELECT COUNT(*) FROM users');
});

test('leaves string literals untouched', () => {
  const sql = "SELECT name FROM users WHERE name = 'a   b' LIMIT 5";
  assert.equal(postProcessor.process(sql), sql);
});

test('uses the configured default limit', () => {
  assert.equal(new SQLPostProcessor({ defaultLimit: 25 }).process('SELECT * FROM orders'), 'SELECT * FROM orders LIMIT 25');
});

test('an OFFSET without LIMIT is left alone', () => {
  assert.equal(postProcessor.process('SELECT * FROM orders OFFSET 10'), 'SELECT * FROM orders OFFSET 10');
});

test('processing is idempotent', () => {
  const once = postProcessor.process('SELECT\tname  FROM users ; ');
  assert.equal(once, 'SELECT name FROM users LIMIT 100');
  assert.equal(postProcessor.process(once), once);
});

test('statements that do not scan are only trimmed', () => {
  assert.equal(postProcessor.process("  SELECT 'oops FROM users  "), "SELECT 'oops FROM users");
});

test('limits inside subqueries do not count for the outer query', () => {
  assert.equal(
    postProcessor.process('SELECT * FROM users WHERE id IN (SELECT user_id FROM orders LIMIT 5)'),
    'SELECT * FROM users WHERE id IN (SELECT user_id FROM orders LIMIT 5) LIMIT 100'
  );
  assert.equal(
    postProcessor.process('SELECT id, COUNT(*) OVER () AS n FROM orders'),
    'SELECT id, COUNT(*) OVER () AS n FROM orders LIMIT 100'
  );
});

test('backslash escapes follow the dialect', () => {
  const sql = "SELECT name FROM users WHERE name = 'C:\\'";
  assert.equal(postProcessor.process(sql, 'sqlite'), `${sql} LIMIT 100`);
  assert.equal(postProcessor.process(sql, 'mysql2'), sql);
});

test('post-processing an accepted statement adds no violation', () => {
  const validator = new SQLValidator();
  const snapshot = shopSnapshot();
  const accepted = [
    'SELECT name FROM users;',
    'SELECT u.name, o.total FROM users u JOIN orders o ON o.user_id = u.id -- recent\nORDER BY o.created_at DESC',
    'SELECT status, COUNT(*) AS n FROM orders GROUP BY status',
    "SELECT name FROM users WHERE email LIKE '%@example.com'",
    'SELECT * FROM users WHERE id IN (SELECT user_id FROM orders LIMIT 5)',
    'WITH recent AS (SELECT * FROM orders LIMIT 10) SELECT r.total FROM recent r',
    'SELECT u.name, o.total FROM users u, orders o WHERE o.user_id = u.id',
  ];

  for (const statement of accepted) {
    const before = validator.validate(statement, snapshot);
    assert.equal(before.isValid, true, statement);

    const after = validator.validate(postProcessor.process(statement), snapshot);
    assert.equal(after.isValid, true, statement);
    const known = new Set(before.violations.map((v) => v.kind));
    assert.deepEqual(after.violations.filter((v) => !known.has(v.kind)), [], statement);
  }
});
