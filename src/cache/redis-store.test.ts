import test from 'node:test';
import assert from 'node:assert/strict';
import { RedisCacheStore, type RedisCommands } from './redis-store.js';

/**
 * In-process stand-in for the handful of commands the store uses.
 */
class FakeRedis implements RedisCommands {
  data = new Map<string, string>();
  ttls = new Map<string, number>();
  failWrites = false;

  async get(key: string): Promise<string | null> {
    return this.data.get(key) ?? null;
  }

  async set(key: string, value: string, _mode: 'EX', seconds: number): Promise<unknown> {
    if (this.failWrites) throw new Error('READONLY You can\'t write against a read only replica.');
    this.data.set(key, value);
    this.ttls.set(key, seconds);
    return 'OK';
  }

  async del(...keys: string[]): Promise<number> {
    let removed = 0;
    for (const key of keys) {
      if (this.data.delete(key)) removed++;
    }
    return removed;
  }

  async scan(_cursor: string, _match: 'MATCH', pattern: string): Promise<[string, string[]]> {
    const prefix = pattern.slice(0, -1).replace(/\\(.)/g, '$1');
    return ['0', [...this.data.keys()].filter((key) => key.startsWith(prefix))];
  }

  async quit(): Promise<unknown> {
    return 'OK';
  }
}

test('entries are JSON envelopes written with their TTL', async () => {
  const redis = new FakeRedis();
  const store = new RedisCacheStore(redis, 'qw:');

  await store.set('k', { statement: 'SELECT 1' }, 'semantic', 'v1', 60);

  assert.equal(redis.ttls.get('qw:semantic:k'), 60);
  const raw = redis.data.get('qw:semantic:k') ?? '';
  assert.match(raw, /"value":\{"statement":"SELECT 1"\}/);
  assert.match(raw, /"schemaVersion":"v1"/);
});

test('an entry written under another schema version is a miss', async () => {
  const store = new RedisCacheStore(new FakeRedis(), 'qw:');
  await store.set('k', 'cached', 'plan', 'v1', 60);

  assert.equal(await store.get('k', 'plan', 'v2'), undefined);
  assert.equal(await store.get('k', 'plan', 'v1'), 'cached');

  const stats = await store.stats();
  assert.deepEqual(stats.byTier.plan, { hits: 1, misses: 1, size: 1 });
});

test('unreadable entries are misses', async () => {
  const redis = new FakeRedis();
  redis.data.set('qw:generic:k', 'not json');
  const store = new RedisCacheStore(redis, 'qw:');
  assert.equal(await store.get('k', 'generic', 'v1'), undefined);
});

test('invalidate removes the keys under a prefix only', async () => {
  const redis = new FakeRedis();
  const store = new RedisCacheStore(redis, 'qw:');
  await store.set('a', 1, 'plan', 'v1', 60);
  await store.set('b', 2, 'plan', 'v1', 60);
  await store.set('a', 3, 'semantic', 'v1', 60);

  assert.equal(await store.invalidate('plan:'), 2);
  assert.deepEqual([...redis.data.keys()], ['qw:semantic:a']);
  assert.equal(await store.delete('a', 'semantic'), true);
  assert.equal(await store.delete('a', 'semantic'), false);
});

test('failed writes are logged, not thrown', async () => {
  const redis = new FakeRedis();
  redis.failWrites = true;
  const store = new RedisCacheStore(redis, 'qw:');

  await store.set('k', 1, 'plan', 'v1', 60);
  assert.equal(await store.get('k', 'plan', 'v1'), undefined);
});
