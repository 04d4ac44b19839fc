import test from 'node:test';
import assert from 'node:assert/strict';
import { analyzeExecutionError, buildExecutionCorrection, buildValidationCorrection, isRetryable } from './feedback.js';
import { shopSnapshot } from './testing/fixtures.js';

const snapshot = shopSnapshot();

test('missing tables suggest similar names', () => {
  const analysis = analyzeExecutionError('no such table: user', 'SELECT * FROM user', snapshot);
  assert.equal(analysis.type, 'table_not_found');
  assert.equal(analysis.element, 'user');
  assert.equal(analysis.suggestion, 'Did you mean: users?');
});

test('missing columns suggest columns of the referenced tables', () => {
  const analysis = analyzeExecutionError('no such column: nme', 'SELECT nme FROM users', snapshot);
  assert.equal(analysis.type, 'column_not_found');
  assert.equal(analysis.suggestion, 'Did you mean: name?');
});

test('without a close name the table columns are listed', () => {
  const analysis = analyzeExecutionError('column "emial" does not exist', 'SELECT emial FROM users', snapshot);
  assert.equal(analysis.type, 'column_not_found');
  assert.equal(analysis.element, 'emial');
  assert.equal(analysis.suggestion, 'Columns in users: id, name, email, created_at');
});

test('ambiguous columns ask for a qualifier', () => {
  const analysis = analyzeExecutionError('ambiguous column name: id', 'SELECT id FROM users JOIN orders', snapshot);
  assert.equal(analysis.type, 'ambiguous_column');
  assert.equal(analysis.suggestion, "Qualify 'id' with a table alias (e.g. t.id)");
});

test('permission and connection errors are not retryable', () => {
  const permission = analyzeExecutionError('permission denied for table users', 'SELECT 1');
  assert.equal(permission.type, 'permission');
  assert.equal(isRetryable(permission), false);

  const connection = analyzeExecutionError('connect ECONNREFUSED 127.0.0.1:5432', 'SELECT 1');
  assert.equal(connection.type, 'connection');
  assert.equal(isRetryable(connection), false);
});

test('unrecognised errors are retryable', () => {
  const analysis = analyzeExecutionError('SQLITE_BUSY: database is locked', 'SELECT 1');
  assert.equal(analysis.type, 'unknown');
  assert.equal(isRetryable(analysis), true);
});

test('validation corrections list only fatal violations', () => {
  const correction = buildValidationCorrection('SELECT * FROM user', [
    { kind: 'unknown_table', detail: "Table 'user' does not exist.", fatal: true },
    { kind: 'missing_limit', detail: 'Unbounded SELECT', fatal: false },
  ]);
  assert.ok(correction.includes("- [unknown_table] Table 'user' does not exist."));
  assert.ok(!correction.includes('missing_limit'));
  assert.ok(correction.includes('SELECT * FROM user'));
});

test('execution corrections carry the error and the suggestion', () => {
  const analysis = analyzeExecutionError('no such table: user', 'SELECT * FROM user', snapshot);
  const lines = buildExecutionCorrection('SELECT * FROM user', analysis).split('\n');
  assert.ok(lines.includes('Error type: table_not_found'));
  assert.ok(lines.includes('Error message: no such table: user'));
  assert.ok(lines.includes('Problematic element: user'));
  assert.ok(lines.includes('Suggestion: Did you mean: users?'));
});
