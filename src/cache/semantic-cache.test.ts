import test from 'node:test';
import assert from 'node:assert/strict';
import { MemoryCacheStore } from './memory-store.js';
import { SemanticCache } from './semantic-cache.js';
import { TokenOverlapSimilarity, type SimilarityStrategy } from './similarity.js';
import { QueryPreprocessor } from '../preprocess/preprocessor.js';
import { shopSnapshot } from '../testing/fixtures.js';
import type { SQLCandidate } from '../types/models.js';

const preprocessor = new QueryPreprocessor();
const snapshot = shopSnapshot();
const prep = (question: string) => preprocessor.process(question, snapshot);

const countUsers: SQLCandidate = {
  statement: 'SELECT COUNT(*) FROM users',
  explanation: 'Counts users',
  confidence: 0.9,
  tablesReferenced: ['users'],
};

test('exact questions hit with similarity 1', async () => {
  const cache = new SemanticCache(new MemoryCacheStore());
  await cache.put(prep('How many users?'), countUsers, 'v1');

  const match = await cache.lookup(prep('how many users'), 'v1');
  assert.equal(match?.exact, true);
  assert.equal(match?.similarity, 1);
  assert.equal(match?.matchedQuestion, 'How many users?');
  assert.deepEqual(match?.candidate, countUsers);
});

test('close rephrasings of the same category hit', async () => {
  const cache = new SemanticCache(new MemoryCacheStore());
  await cache.put(prep('How many users?'), countUsers, 'v1');

  const match = await cache.lookup(prep('Count all the users'), 'v1');
  assert.equal(match?.exact, false);
  assert.equal(match?.similarity, 1);
  assert.equal(match?.candidate.statement, 'SELECT COUNT(*) FROM users');
});

test('numbers keep top-N questions apart', async () => {
  const cache = new SemanticCache(new MemoryCacheStore());
  await cache.put(prep('top 5 products by sales'), countUsers, 'v1');

  assert.equal(await cache.lookup(prep('top 10 products by sales'), 'v1'), undefined);
  assert.deepEqual(cache.getStats(), { hits: 0, misses: 1 });
});

test('entries of another schema version are not served', async () => {
  const cache = new SemanticCache(new MemoryCacheStore());
  await cache.put(prep('How many users?'), countUsers, 'v1');
  assert.equal(await cache.lookup(prep('How many users?'), 'v2'), undefined);
});

test('only questions of the same category are scored', async () => {
  const scored: string[][] = [];
  const recording: SimilarityStrategy = {
    name: 'recording',
    async score(query, candidates) {
      scored.push([...candidates]);
      return new TokenOverlapSimilarity().score(query, candidates);
    },
  };
  const cache = new SemanticCache(new MemoryCacheStore(), { similarity: recording });
  await cache.put(prep('How many users?'), countUsers, 'v1');
  await cache.put(prep('list user names'), { ...countUsers, statement: 'SELECT name FROM users LIMIT 100' }, 'v1');

  await cache.lookup(prep('count every user'), 'v1');
  assert.deepEqual(scored, [['count users']]);
});

test('the candidate set is bounded to the most recent questions', async () => {
  const cache = new SemanticCache(new MemoryCacheStore(), { maxCandidates: 1 });
  await cache.put(prep('How many users?'), countUsers, 'v1');
  await cache.put(prep('how many orders'), { ...countUsers, statement: 'SELECT COUNT(*) FROM orders' }, 'v1');

  assert.equal(await cache.lookup(prep('count all users'), 'v1'), undefined);
  const orders = await cache.lookup(prep('count all orders'), 'v1');
  assert.equal(orders?.candidate.statement, 'SELECT COUNT(*) FROM orders');
});

test('concurrent puts keep every question in the candidate set', async () => {
  const cache = new SemanticCache(new MemoryCacheStore());
  await Promise.all([
    cache.put(prep('How many users?'), countUsers, 'v1'),
    cache.put(prep('how many orders'), { ...countUsers, statement: 'SELECT COUNT(*) FROM orders' }, 'v1'),
  ]);

  const users = await cache.lookup(prep('count all users'), 'v1');
  const orders = await cache.lookup(prep('count all orders'), 'v1');
  assert.equal(users?.candidate.statement, 'SELECT COUNT(*) FROM users');
  assert.equal(orders?.candidate.statement, 'SELECT COUNT(*) FROM orders');
});
