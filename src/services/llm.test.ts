import test from 'node:test';
import assert from 'node:assert/strict';
import { FEW_SHOT_EXAMPLES } from '../prompts/few-shot.js';
import type { CompactSchemaContext } from '../types/models.js';
import { buildSystemPrompt } from './llm.js';

const context: CompactSchemaContext = {
  relevantTables: ['users'],
  renderedText: 'users(*id, name)',
  joinHints: [],
};

test('the system prompt carries dialect, schema and row limit', () => {
  const prompt = buildSystemPrompt(context, 'SQLite', 100);
  assert.ok(prompt.startsWith('You are an expert SQL generator for SQLite databases.'));
  assert.ok(prompt.includes('<schema>\nusers(*id, name)\n</schema>'));
  assert.ok(prompt.includes('6. Add LIMIT 100 to queries that return rows'));
  assert.equal(prompt.includes('<examples>'), false);
});

test('selected examples are appended after the rules', () => {
  const prompt = buildSystemPrompt(context, 'SQLite', 100, FEW_SHOT_EXAMPLES.slice(0, 1));
  assert.ok(
    prompt.endsWith(
      '</rules>\n\nWorked examples follow. They may use tables that do not exist here: copy their shape, and take names only from the schema above.\n' +
        '<examples>\nExample 1:\nQuestion: Show me all users\nSQL: SELECT * FROM users LIMIT 100\n' +
        'Explanation: Every column of the users table, capped at 100 rows\n</examples>'
    )
  );
});
