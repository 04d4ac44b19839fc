/**
 * Worked question → SQL examples shown to the generator, picked per question.
 */

import { z } from 'zod';
import type { QueryCategory } from '../types/models.js';
import examples from './examples.json' with { type: 'json' };

const CATEGORIES = [
  'lookup',
  'aggregation',
  'join',
  'group_by',
  'ranking',
  'filter',
  'nested',
  'schema_meta',
  'non_query',
] as const satisfies readonly QueryCategory[];

const FewShotExampleSchema = z.object({
  question: z.string(),
  sql: z.string(),
  explanation: z.string(),
  categories: z.array(z.enum(CATEGORIES)),
  tables: z.array(z.string()),
});

export type FewShotExample = z.infer<typeof FewShotExampleSchema>;

export const FEW_SHOT_EXAMPLES: readonly FewShotExample[] = z.array(FewShotExampleSchema).parse(examples);

export interface ExampleSelection {
  category?: QueryCategory;
  /** Tables of the schema context; overlapping examples rank higher. */
  tables?: readonly string[];
  max?: number;
}

/**
 * Keyword cues: when the question says one of `words` and the example's SQL
 * contains `sql`, the example gains `weight`.
 */
const CUES: ReadonlyArray<{ words: readonly string[]; sql: string; weight: number }> = [
  { words: ['count', 'many', 'number'], sql: 'COUNT(', weight: 5 },
  { words: ['average', 'avg', 'mean'], sql: 'AVG(', weight: 5 },
  { words: ['join', 'with'], sql: 'JOIN', weight: 3 },
  { words: ['top', 'most', 'best', 'highest'], sql: 'ORDER BY', weight: 3 },
];

const CATEGORY_WEIGHT = 4;
const TABLE_WEIGHT = 2;

function words(text: string): Set<string> {
  return new Set(text.toLowerCase().split(/[^\p{L}\p{N}_]+/u).filter(Boolean));
}

export function scoreExample(example: FewShotExample, question: string, selection: ExampleSelection = {}): number {
  const asked = words(question);
  let score = 0;

  for (const word of words(example.question)) {
    if (asked.has(word)) score++;
  }
  for (const cue of CUES) {
    if (cue.words.some((w) => asked.has(w)) && example.sql.includes(cue.sql)) score += cue.weight;
  }
  if (selection.category && example.categories.includes(selection.category)) score += CATEGORY_WEIGHT;
  if (selection.tables) {
    score += example.tables.filter((t) => selection.tables?.includes(t)).length * TABLE_WEIGHT;
  }
  return score;
}

/**
 * Best-scoring examples for a question, highest first. Ties keep list order;
 * examples that share nothing with the question are never returned.
 */
export function selectExamples(
  question: string,
  selection: ExampleSelection = {},
  pool: readonly FewShotExample[] = FEW_SHOT_EXAMPLES
): FewShotExample[] {
  const max = selection.max ?? 3;
  if (max <= 0) return [];

  return pool
    .map((example) => ({ example, score: scoreExample(example, question, selection) }))
    .filter(({ score }) => score > 0)
    .sort((a, b) => b.score - a.score)
    .slice(0, max)
    .map(({ example }) => example);
}

export function formatExamples(selected: readonly FewShotExample[]): string {
  return selected
    .map((example, i) => `Example ${i + 1}:\nQuestion: ${example.question}\nSQL: ${example.sql}\nExplanation: ${example.explanation}`)
    .join('\n\n');
}
