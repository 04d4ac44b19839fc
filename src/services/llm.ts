/**
 * SQL generation through the Vercel AI SDK.
 * Structured outputs guarantee the response matches the candidate schema.
 */

import { generateObject } from 'ai';
import type { LanguageModel } from 'ai';
import { z } from 'zod';
import type { GeneratorSettings } from '../config.js';
import { LLMError } from '../types/errors.js';
import { formatExamples, selectExamples, type FewShotExample } from '../prompts/few-shot.js';
import type { CompactSchemaContext, GenerateOptions, SQLCandidate, SQLGenerator } from '../types/models.js';
import { logger } from '../utils/logger.js';
import { referencedTables } from '../validation/analyzer.js';

/**
 * Zod schema for the generated candidate (structured outputs).
 */
export const CandidateSchema = z.object({
  sql: z.string().describe('A single read-only SQL query'),
  explanation: z.string().describe('What the query does and any assumptions made'),
  confidence: z.number().min(0).max(1).describe('Confidence that the query answers the question'),
});

const SYSTEM_PROMPT = `You are an expert SQL generator for {dialect} databases.

<schema>
{schema}
</schema>

Schema notation: table(*primary_key, column, ...). Lines under "# relationships" are foreign keys written child.column -> parent.column.

<rules>
1. Generate exactly ONE read-only SELECT statement (a WITH ... SELECT is allowed)
2. NEVER use INSERT, UPDATE, DELETE, DROP, ALTER, CREATE, TRUNCATE, REPLACE or any administrative command
3. Use ONLY tables and columns listed in the schema; never invent names
4. Use explicit JOIN ... ON conditions following the listed relationships, never comma-separated tables
5. Qualify columns with table aliases whenever more than one table is involved
6. Add LIMIT {limit} to queries that return rows, unless the question asks for a specific count
7. When combining queries with UNION, wrap each side that has ORDER BY or LIMIT in parentheses
8. If the question cannot be answered from the schema, set confidence below 0.3 and explain why
</rules>`;

const EXAMPLES_HEADER =
  'Worked examples follow. They may use tables that do not exist here: copy their shape, and take names only from the schema above.';

/**
 * Load the language model for a provider. Provider packages load lazily.
 */
async function initializeModel(settings: GeneratorSettings): Promise<LanguageModel> {
  logger.info(`Initializing LLM: ${settings.provider}/${settings.model}`);

  switch (settings.provider) {
    case 'anthropic': {
      const { createAnthropic } = await import('@ai-sdk/anthropic');
      return createAnthropic({ apiKey: settings.apiKey })(settings.model);
    }

    case 'openai': {
      const { createOpenAI } = await import('@ai-sdk/openai');
      return createOpenAI({ apiKey: settings.apiKey })(settings.model);
    }
  }
}

export interface LLMGeneratorOptions {
  dialect?: string;
  defaultLimit?: number;
  /** Worked examples per prompt; 0 disables them. */
  maxExamples?: number;
}

/**
 * SQLGenerator backed by a hosted language model. Transport retries are
 * left to the SDK (`maxRetries`); failures reject with LLMError.
 */
export class LLMGenerator implements SQLGenerator {
  private settings: GeneratorSettings;
  private dialect: string;
  private defaultLimit: number;
  private maxExamples: number;
  private model: LanguageModel | null = null;

  constructor(settings: GeneratorSettings, options: LLMGeneratorOptions = {}) {
    this.settings = settings;
    this.dialect = options.dialect ?? 'SQLite';
    this.defaultLimit = options.defaultLimit ?? 100;
    this.maxExamples = options.maxExamples ?? 3;
  }

  async generate(
    context: CompactSchemaContext,
    question: string,
    correction?: string,
    options: GenerateOptions = {}
  ): Promise<SQLCandidate> {
    const model = await this.getModel();
    const examples = selectExamples(question, {
      category: options.category,
      tables: context.relevantTables,
      max: this.maxExamples,
    });
    const system = buildSystemPrompt(context, this.dialect, this.defaultLimit, examples);
    const prompt = correction ? `Question: ${question}\n\n${correction}` : `Question: ${question}`;

    try {
      const { object, usage } = await generateObject({
        model,
        schema: CandidateSchema,
        system,
        prompt,
        temperature: 0,
        maxOutputTokens: this.settings.maxTokens,
        maxRetries: this.settings.maxRetries,
        abortSignal: options.signal,
      });

      logger.info(`LLM API call successful - Input: ${usage.inputTokens}, Output: ${usage.outputTokens}`);

      return {
        statement: object.sql.trim(),
        explanation: object.explanation,
        confidence: object.confidence,
        tablesReferenced: referencedTables(object.sql),
      };
    } catch (error) {
      // Cancellation is the caller's decision, not a provider failure
      if (options.signal?.aborted) throw options.signal.reason;
      logger.warn(`LLM API call failed: ${error}`);
      throw new LLMError(`SQL generation failed: ${error instanceof Error ? error.message : String(error)}`, undefined, {
        cause: error,
      });
    }
  }

  private async getModel(): Promise<LanguageModel> {
    if (!this.model) {
      this.model = await initializeModel(this.settings);
    }
    return this.model;
  }
}

export function buildSystemPrompt(
  context: CompactSchemaContext,
  dialect: string,
  defaultLimit: number,
  examples: readonly FewShotExample[] = []
): string {
  const prompt = SYSTEM_PROMPT.replace('{dialect}', dialect)
    .replace('{schema}', context.renderedText)
    .replace('{limit}', String(defaultLimit));
  if (examples.length === 0) return prompt;
  return `${prompt}\n\n${EXAMPLES_HEADER}\n<examples>\n${formatExamples(examples)}\n</examples>`;
}
