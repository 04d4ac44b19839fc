import test from 'node:test';
import assert from 'node:assert/strict';
import { Querywright } from './Querywright.js';
import { StaticSchemaSource } from './schema/source.js';
import { ScriptedGenerator, SHOP_TABLES } from './testing/fixtures.js';
import { ConfigError, SchemaError } from './types/errors.js';

function create(script: string[]) {
  const generator = new ScriptedGenerator(script);
  const qw = new Querywright({ generator, schemaSource: new StaticSchemaSource(SHOP_TABLES, 'sqlite') });
  return { qw, generator };
}

test('a generator or LLM settings are required', () => {
  assert.throws(() => new Querywright({}), ConfigError);
});

test('using an instance before init() fails', async () => {
  const { qw } = create([]);
  await assert.rejects(qw.convert('How many users?'), SchemaError);
});

test('init loads the schema and exposes the compact context', async () => {
  const { qw } = create([]);
  const update = await qw.init();
  assert.equal(update.changed, true);

  const { version, context } = await qw.getCompactSchema('Top 5 products by sales');
  assert.equal(version, update.version);
  assert.deepEqual(context.relevantTables, ['products', 'categories', 'order_items']);
  await qw.close();
});

test('validate normalises statements that pass', async () => {
  const { qw } = create([]);
  await qw.init();
  const { validation, statement } = await qw.validate('SELECT name FROM users;');
  assert.equal(validation.isValid, true);
  assert.equal(statement, 'SELECT name FROM users LIMIT 100');
  await qw.close();
});

test('stats aggregate conversions and cache hit rates', async () => {
  const { qw, generator } = create(['SELECT COUNT(*) FROM users']);
  await qw.init();

  await qw.convert('How many users?');
  await qw.convert('Count all users');
  await qw.convert('Top 5 products by sales');

  const stats = await qw.getCacheStats();
  assert.equal(stats.conversions, 3);
  assert.equal(stats.generationCalls, 1);
  assert.deepEqual(stats.plan, { hits: 1, misses: 2 });
  assert.deepEqual(stats.semantic, { hits: 1, misses: 1 });
  assert.equal(stats.hitRates.plan, 1 / 3);
  assert.equal(stats.hitRates.semantic, 1 / 3);

  assert.equal(await qw.clearCache(), 4);
  const again = await qw.convert('How many users?');
  assert.equal(again.fromCache, false);
  assert.equal(generator.calls.length, 2);
  await qw.close();
});

test('batches keep input order and bound concurrency', async () => {
  let inFlight = 0;
  let peak = 0;
  const generator = new ScriptedGenerator(['SELECT COUNT(*) FROM users'], async (call) => {
    if (call.question === 'list all products') throw new Error('provider unavailable');
    inFlight++;
    peak = Math.max(peak, inFlight);
    await new Promise((resolve) => setImmediate(resolve));
    inFlight--;
  });
  const qw = new Querywright({ generator, schemaSource: new StaticSchemaSource(SHOP_TABLES, 'sqlite') });
  await qw.init();

  const questions = ['How many users?', 'hello', 'average order total', 'list all products', 'orders with their users'];
  const items = await qw.convertBatch(questions, { concurrency: 2 });

  assert.deepEqual(
    items.map((item) => item.question),
    questions
  );
  assert.deepEqual(
    items.map((item) => item.ok),
    [true, true, true, false, true]
  );

  const greeting = items[1];
  assert.ok(greeting.ok);
  assert.equal(greeting.result.failure?.kind, 'input');

  const rejected = items[3];
  assert.ok(!rejected.ok);
  assert.equal(rejected.error.message, 'provider unavailable');

  assert.equal(peak, 2);
  await qw.close();
});

test('an aborted batch rejects', async () => {
  const { qw } = create(['SELECT COUNT(*) FROM users']);
  await qw.init();
  const controller = new AbortController();
  controller.abort();

  await assert.rejects(qw.convertBatch(['How many users?', 'list all products'], { signal: controller.signal }), {
    name: 'AbortError',
  });
  await qw.close();
});
