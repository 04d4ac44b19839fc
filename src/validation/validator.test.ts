import test from 'node:test';
import assert from 'node:assert/strict';
import { SQLValidator } from './validator.js';
import { findSimilarNames } from './similar-names.js';
import { createSnapshot } from '../schema/snapshot.js';
import { SHOP_TABLES, shopSnapshot } from '../testing/fixtures.js';

const validator = new SQLValidator();
const snapshot = shopSnapshot();
const validate = (sql: string) => validator.validate(sql, snapshot);

test('accepts a bounded query over known tables', () => {
  const result = validate('SELECT u.name, o.total FROM users u JOIN orders o ON o.user_id = u.id LIMIT 10');
  assert.equal(result.isValid, true);
  assert.deepEqual(result.violations, []);
  assert.deepEqual(result.tablesReferenced, ['users', 'orders']);
});

test('unknown tables are fatal and come with suggestions', () => {
  const result = validate('SELECT * FROM user LIMIT 5');
  assert.equal(result.isValid, false);
  assert.equal(result.requiresCorrection, true);
  assert.deepEqual(result.violations, [
    { kind: 'unknown_table', detail: "Table 'user' does not exist. Did you mean: users?", fatal: true },
  ]);
});

test('unknown qualified columns name the table', () => {
  const result = validate('SELECT u.nme FROM users u LIMIT 5');
  assert.deepEqual(result.violations, [
    { kind: 'unknown_column', detail: "Column 'nme' does not exist in table 'users'. Did you mean: name?", fatal: true },
  ]);
});

test('undefined qualifiers are reported once', () => {
  const result = validate('SELECT x.name, x.email FROM users LIMIT 5');
  assert.deepEqual(result.violations, [
    { kind: 'unknown_table', detail: "Table or alias 'x' is not defined in the statement.", fatal: true },
  ]);
});

test('unknown bare columns are checked against every source table', () => {
  const result = validate('SELECT email_address FROM users LIMIT 10');
  assert.deepEqual(result.violations, [
    {
      kind: 'unknown_column',
      detail: "Column 'email_address' does not exist in 'users'. Did you mean: email?",
      fatal: true,
    },
  ]);
});

test('data-modifying statements are dangerous and not correctable', () => {
  const result = validate('DELETE FROM users');
  assert.equal(result.isValid, false);
  assert.equal(result.requiresCorrection, false);
  assert.deepEqual(
    result.violations.map((v) => v.kind),
    ['syntax_error', 'dangerous_operation']
  );
});

test('a second statement is rejected', () => {
  const result = validate('SELECT * FROM users LIMIT 1; DROP TABLE users');
  assert.ok(result.violations.some((v) => v.detail === 'Expected a single statement, found 2'));
  assert.ok(result.violations.some((v) => v.detail === 'Statement contains DROP; only read-only queries are allowed'));
});

test('SELECT INTO and file exports are dangerous', () => {
  assert.ok(
    validate('SELECT name INTO backup FROM users').violations.some(
      (v) => v.detail === 'Statement contains SELECT INTO; only read-only queries are allowed'
    )
  );
  assert.ok(
    validate("SELECT name FROM users INTO OUTFILE '/tmp/users.csv'").violations.some(
      (v) => v.detail === 'Statement contains INTO OUTFILE; only read-only queries are allowed'
    )
  );
});

test('keywords inside string literals and comments are ignored', () => {
  const result = validate("SELECT name FROM users WHERE name = 'DROP TABLE users' LIMIT 5 -- DELETE");
  assert.deepEqual(result.violations, []);
});

test('missing LIMIT is a warning only', () => {
  const result = validate('SELECT name FROM users');
  assert.equal(result.isValid, true);
  assert.deepEqual(result.violations, [
    { kind: 'missing_limit', detail: 'Unbounded SELECT without LIMIT may return a very large result', fatal: false },
  ]);
});

test('aggregates need no LIMIT', () => {
  assert.deepEqual(validate('SELECT status, COUNT(*) AS n FROM orders GROUP BY status').violations, []);
});

test('limits and aggregates inside subqueries do not bound the outer query', () => {
  const kinds = (sql: string) => validate(sql).violations.map((v) => v.kind);
  assert.deepEqual(kinds('SELECT * FROM orders WHERE total > (SELECT AVG(total) FROM orders)'), ['missing_limit']);
  assert.deepEqual(kinds('SELECT * FROM users WHERE id IN (SELECT user_id FROM orders LIMIT 5)'), ['missing_limit']);
});

test('window aggregates do not bound the query', () => {
  const result = validate('SELECT id, COUNT(*) OVER () AS n FROM orders');
  assert.deepEqual(result.violations.map((v) => v.kind), ['missing_limit']);
});

test('comma joins without a condition warn about cartesian products', () => {
  const result = validate('SELECT u.name, o.total FROM users u, orders o LIMIT 10');
  assert.equal(result.isValid, true);
  assert.deepEqual(
    result.violations.map((v) => v.kind),
    ['implicit_join', 'cartesian_risk']
  );
});

test('columns of CTEs and subqueries are not checked against the schema', () => {
  const result = validate('WITH recent AS (SELECT * FROM orders LIMIT 10) SELECT r.total FROM recent r LIMIT 10');
  assert.deepEqual(result.violations, []);
  assert.deepEqual(result.tablesReferenced, ['orders']);
});

test('FROM inside EXTRACT is not a table clause', () => {
  const result = validate('SELECT EXTRACT(YEAR FROM created_at) AS yr, COUNT(*) FROM orders GROUP BY yr');
  assert.deepEqual(result.violations, []);
});

test('unterminated literals are syntax errors', () => {
  const result = validate("SELECT name FROM users WHERE name = 'oops");
  assert.deepEqual(result.violations, [{ kind: 'syntax_error', detail: 'Unterminated string literal', fatal: true }]);
});

test('similar names are ranked by edit distance', () => {
  assert.deepEqual(findSimilarNames('prodcts', ['products', 'orders', 'categories']), ['products']);
  assert.deepEqual(findSimilarNames('order', ['orders', 'order_items', 'users']), ['orders', 'order_items']);
  assert.deepEqual(findSimilarNames('zzz', ['users']), []);
});

test('backslashes end no literal outside MySQL', () => {
  const sql = "SELECT name FROM users WHERE name = 'C:\\' LIMIT 5";
  assert.deepEqual(validate(sql).violations, []);

  const mysql = validator.validate(sql, createSnapshot(SHOP_TABLES, 'mysql2'));
  assert.deepEqual(mysql.violations, [{ kind: 'syntax_error', detail: 'Unterminated string literal', fatal: true }]);
});

test('escape strings honour backslashes', () => {
  assert.deepEqual(validate("SELECT name FROM users WHERE name = E'it\\'s' LIMIT 5").violations, []);
});

test('type names after a cast are not columns', () => {
  assert.deepEqual(validate('SELECT id, created_at::timestamptz FROM orders LIMIT 5').violations, []);
});
