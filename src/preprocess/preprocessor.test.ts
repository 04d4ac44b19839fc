import test from 'node:test';
import assert from 'node:assert/strict';
import { QueryPreprocessor } from './preprocessor.js';
import { contentTokens, identifierWords, singularize } from './text.js';
import { shopSnapshot } from '../testing/fixtures.js';

const preprocessor = new QueryPreprocessor();
const snapshot = shopSnapshot();

function approximately(actual: number, expected: number): void {
  assert.ok(Math.abs(actual - expected) < 1e-9, `expected ${expected}, got ${actual}`);
}

test('normalizes case and punctuation and folds synonyms', () => {
  assert.equal(preprocessor.process('How many USERS?').normalizedText, 'count users');
  assert.equal(preprocessor.process('  Show   me the Average price!! ').normalizedText, 'show me the avg price');
});

test('folds localized phrasings into the canonical vocabulary', () => {
  const processed = preprocessor.process('Số lượng đơn hàng', snapshot);
  assert.equal(processed.normalizedText, 'count order');
  assert.equal(processed.category, 'aggregation');
  assert.deepEqual(processed.entities, ['orders']);
});

test('classifies by the first matching category', () => {
  const cases: Array<[string, string]> = [
    ['hello', 'non_query'],
    ['what tables are there', 'schema_meta'],
    ['Top 5 products by sales', 'ranking'],
    ['count users', 'aggregation'],
    ['count orders by status', 'group_by'],
    ['users who never ordered', 'nested'],
    ['orders with their user details', 'join'],
    ['products where price > 100', 'filter'],
    ['orders from last month', 'filter'],
    ['list user names', 'lookup'],
  ];
  for (const [question, category] of cases) {
    assert.equal(preprocessor.process(question, snapshot).category, category, question);
  }
});

test('confidence grows with the number of matching cues', () => {
  approximately(preprocessor.process('Top 5 products by sales').confidence, 0.7);
  approximately(preprocessor.process('count orders by status').confidence, 0.9);
  assert.equal(preprocessor.process('').confidence, 0);
});

test('matches tables and columns by singular form', () => {
  const processed = preprocessor.process('Top 5 products by sales', snapshot);
  assert.deepEqual(processed.tables, [{ table: 'products', position: 2 }]);
  assert.deepEqual(processed.columns, [{ table: 'products', column: 'sales', position: 4 }]);
  assert.deepEqual(processed.entities, ['products', 'sales']);
});

test('a multi-word table name hides the shorter table inside it', () => {
  const processed = preprocessor.process('order items for each product', snapshot);
  assert.deepEqual(
    processed.tables.map((t) => t.table),
    ['order_items', 'products']
  );
});

test('entities stay empty without a snapshot', () => {
  const processed = preprocessor.process('Top 5 products by sales');
  assert.deepEqual(processed.entities, []);
  assert.deepEqual(processed.tables, []);
});

test('extracts aggregations in order of appearance', () => {
  assert.deepEqual(preprocessor.process('average price and max sales').aggregations, ['avg', 'max']);
  assert.deepEqual(preprocessor.process('total revenue and number of orders').aggregations, ['sum', 'count']);
});

test('extracts the requested row count but not time spans', () => {
  assert.equal(preprocessor.process('top 5 products').limit, 5);
  assert.equal(preprocessor.process('the 3 most expensive products').limit, 3);

  const span = preprocessor.process('orders in the last 3 months');
  assert.equal(span.limit, undefined);
  assert.deepEqual(span.timeExpressions, ['last 3 months']);
});

test('text helpers', () => {
  assert.equal(singularize('categories'), 'category');
  assert.equal(singularize('status'), 'status');
  assert.equal(singularize('boxes'), 'box');
  assert.deepEqual(identifierWords('createdAt'), ['created', 'at']);
  assert.deepEqual(identifierWords('order_items'), ['order', 'items']);
  assert.deepEqual(contentTokens('count all the users'), ['count', 'user']);
});
