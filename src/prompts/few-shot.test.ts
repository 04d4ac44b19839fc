import test from 'node:test';
import assert from 'node:assert/strict';
import { FEW_SHOT_EXAMPLES, formatExamples, scoreExample, selectExamples } from './few-shot.js';

test('examples are ranked by shared words, SQL cues, category and tables', () => {
  const picked = selectExamples('How many users do we have?', { category: 'aggregation', tables: ['users'] });
  assert.deepEqual(
    picked.map((e) => e.question),
    ['How many users do we have?', 'Count orders per status', "What's the average order amount?"]
  );
});

test('category and ranking cues add up', () => {
  const ranking = FEW_SHOT_EXAMPLES.find((e) => e.question === 'Show top 10 customers by total spending');
  assert.ok(ranking);
  // "top" shared, ORDER BY cue, ranking category
  assert.equal(scoreExample(ranking, 'top 3 spenders', { category: 'ranking' }), 8);
});

test('ties keep list order and max bounds the selection', () => {
  const picked = selectExamples('users', { max: 2 });
  assert.deepEqual(
    picked.map((e) => e.question),
    ['Show me all users', 'How many users do we have?']
  );
  assert.deepEqual(selectExamples('users', { max: 0 }), []);
});

test('unrelated questions get no examples', () => {
  assert.deepEqual(selectExamples('zzz qqq'), []);
});

test('examples are formatted as numbered blocks', () => {
  const count = FEW_SHOT_EXAMPLES.find((e) => e.question === 'How many users do we have?');
  assert.ok(count);
  assert.equal(
    formatExamples([count]),
    'Example 1:\nQuestion: How many users do we have?\nSQL: SELECT COUNT(*) AS total_users FROM users\nExplanation: Counts the rows of the users table'
  );
});
