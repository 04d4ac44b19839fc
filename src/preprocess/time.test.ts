import test from 'node:test';
import assert from 'node:assert/strict';
import { extractTimeExpressions, resolveTimeRange } from './time.js';

// Friday
const NOW = new Date('2024-03-15T10:30:00Z');

test('extracts time expressions in order of appearance', () => {
  assert.deepEqual(extractTimeExpressions('orders from last month and yesterday'), ['last month', 'yesterday']);
  assert.deepEqual(extractTimeExpressions('signups in the past 30 days'), ['past 30 days']);
  assert.deepEqual(extractTimeExpressions('orders on 2024-02-29 or in 2023'), ['2024-02-29', 'in 2023']);
  assert.deepEqual(extractTimeExpressions('all products'), []);
});

test('resolves single days', () => {
  assert.deepEqual(resolveTimeRange('today', NOW), { start: '2024-03-15', end: '2024-03-16' });
  assert.deepEqual(resolveTimeRange('yesterday', NOW), { start: '2024-03-14', end: '2024-03-15' });
  assert.deepEqual(resolveTimeRange('2024-02-29', NOW), { start: '2024-02-29', end: '2024-03-01' });
});

test('weeks start on Monday', () => {
  assert.deepEqual(resolveTimeRange('this week', NOW), { start: '2024-03-11', end: '2024-03-18' });
  assert.deepEqual(resolveTimeRange('last week', NOW), { start: '2024-03-04', end: '2024-03-11' });
});

test('resolves calendar months, quarters and years', () => {
  assert.deepEqual(resolveTimeRange('this month', NOW), { start: '2024-03-01', end: '2024-04-01' });
  assert.deepEqual(resolveTimeRange('last month', NOW), { start: '2024-02-01', end: '2024-03-01' });
  assert.deepEqual(resolveTimeRange('this quarter', NOW), { start: '2024-01-01', end: '2024-04-01' });
  assert.deepEqual(resolveTimeRange('last quarter', NOW), { start: '2023-10-01', end: '2024-01-01' });
  assert.deepEqual(resolveTimeRange('last year', NOW), { start: '2023-01-01', end: '2024-01-01' });
  assert.deepEqual(resolveTimeRange('in 2023', NOW), { start: '2023-01-01', end: '2024-01-01' });
});

test('rolling spans end tomorrow so today is included', () => {
  assert.deepEqual(resolveTimeRange('last 7 days', NOW), { start: '2024-03-08', end: '2024-03-16' });
  assert.deepEqual(resolveTimeRange('past 2 months', NOW), { start: '2024-01-15', end: '2024-03-16' });
});

test('unknown expressions resolve to nothing', () => {
  assert.equal(resolveTimeRange('someday', NOW), undefined);
});
