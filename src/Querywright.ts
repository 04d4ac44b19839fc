/**
 * Main Querywright class - programmatic API for question → SQL conversion.
 */

import type { Knex } from 'knex';
import pLimit from 'p-limit';
import { createCacheStore, createSimilarity } from './cache/index.js';
import { QueryPlanCache } from './cache/plan-cache.js';
import { SemanticCache } from './cache/semantic-cache.js';
import type { SimilarityStrategy } from './cache/similarity.js';
import type { CacheStats, CacheStore, LookupStats } from './cache/types.js';
import { MemoryCacheStore } from './cache/memory-store.js';
import { buildKnexConfig, config, resolveGeneratorSettings, type Config, type GeneratorSettings } from './config.js';
import { SQLConverter, type ConversionResult, type ConvertOptions } from './converter.js';
import { SchemaOptimizer } from './schema/optimizer.js';
import { KnexSchemaSource } from './schema/source.js';
import type { VersionUpdate } from './schema/version-manager.js';
import { createDatabase, describeClient, supportsQueryCancel } from './services/database.js';
import { KnexExecutor } from './services/executor.js';
import { LLMGenerator } from './services/llm.js';
import { ConfigError, SchemaError } from './types/errors.js';
import type {
  CompactSchemaContext,
  SchemaSource,
  SchemaVersion,
  SQLExecutor,
  SQLGenerator,
  ValidationResult,
} from './types/models.js';
import { logger } from './utils/logger.js';
import { SQLPostProcessor } from './validation/post-processor.js';

export interface QuerywrightCacheOptions {
  store?: CacheStore;
  similarity?: SimilarityStrategy;
  similarityThreshold?: number;
  maxCandidates?: number;
  semanticTtlSeconds?: number;
  planTtlSeconds?: number;
  genericTtlSeconds?: number;
}

export interface QuerywrightLimits {
  maxCorrections?: number;
  maxQuestionLength?: number;
  defaultLimit?: number;
  maxLimit?: number;
  maxTables?: number;
  includeTypes?: boolean;
  /** Statement timeout; cancelled server-side where the client supports it. */
  queryTimeoutMs?: number;
}

export interface QuerywrightOptions {
  /** Knex config; a connection is opened on init(). */
  database?: Knex.Config;
  /** LLM settings, used when no generator is given. */
  llm?: GeneratorSettings;
  generator?: SQLGenerator;
  executor?: SQLExecutor;
  schemaSource?: SchemaSource;
  cache?: QuerywrightCacheOptions;
  limits?: QuerywrightLimits;
  /** SQL dialect named in the generation prompt. */
  dialect?: string;
}

export interface BatchOptions extends ConvertOptions {
  /** Conversions running at once. Defaults to 5. */
  concurrency?: number;
}

/**
 * One entry per question, in input order. A rejected conversion is reported
 * here instead of failing the batch.
 */
export type BatchItem =
  | { question: string; ok: true; result: ConversionResult }
  | { question: string; ok: false; error: Error };

export interface QuerywrightStats {
  store: CacheStats;
  plan: LookupStats;
  semantic: LookupStats;
  conversions: number;
  generationCalls: number;
  hitRates: { plan: number; semantic: number };
}

/**
 * @example
 * ```typescript
 * const qw = new Querywright({
 *   database: { client: 'pg', connection: process.env.DATABASE_URL },
 *   llm: {
 *     provider: 'anthropic',
 *     model: 'claude-sonnet-4-5-20250929',
 *     apiKey: process.env.ANTHROPIC_API_KEY ?? '',
 *     maxTokens: 1024,
 *     maxRetries: 2,
 *   },
 * });
 * await qw.init();
 *
 * const result = await qw.convert('top 5 products by sales', { execute: true });
 * console.log(result.candidate.statement, result.execution?.rows);
 * ```
 */
export class Querywright {
  private db: Knex | null = null;
  private converter: SQLConverter | null = null;
  private store: CacheStore;
  private conversions = 0;
  private generationCalls = 0;

  constructor(private options: QuerywrightOptions) {
    if (!options.generator && !options.llm) {
      throw new ConfigError('Either a generator or LLM settings are required', [
        'Pass llm: { provider, model, apiKey, maxTokens, maxRetries }',
        'Or pass a custom generator implementing SQLGenerator',
      ]);
    }
    this.store = options.cache?.store ?? new MemoryCacheStore();
  }

  /**
   * Build a ready instance from environment configuration.
   */
  static async fromEnv(cfg: Config = config): Promise<Querywright> {
    const instance = new Querywright({
      database: buildKnexConfig(cfg),
      llm: resolveGeneratorSettings(cfg),
      dialect: cfg.DATABASE_TYPE,
      cache: {
        store: createCacheStore(cfg),
        similarity: await createSimilarity(cfg),
        similarityThreshold: cfg.SIMILARITY_THRESHOLD,
        maxCandidates: cfg.SEMANTIC_MAX_CANDIDATES,
        semanticTtlSeconds: cfg.CACHE_TTL_SEMANTIC,
        planTtlSeconds: cfg.CACHE_TTL_PLAN,
        genericTtlSeconds: cfg.CACHE_TTL_GENERIC,
      },
      limits: {
        maxCorrections: cfg.MAX_CORRECTIONS,
        maxQuestionLength: cfg.MAX_QUESTION_LENGTH,
        defaultLimit: cfg.DEFAULT_LIMIT,
        maxLimit: cfg.MAX_LIMIT,
        maxTables: cfg.SCHEMA_MAX_TABLES,
        includeTypes: cfg.SCHEMA_INCLUDE_TYPES,
        queryTimeoutMs: cfg.QUERY_TIMEOUT_MS,
      },
    });
    await instance.init();
    return instance;
  }

  /**
   * Connect, wire the pipeline and load the schema. Must be called before use.
   */
  async init(): Promise<VersionUpdate> {
    const { options } = this;
    const limits = options.limits ?? {};
    const cache = options.cache ?? {};
    const defaultLimit = limits.defaultLimit ?? 100;
    const maxLimit = limits.maxLimit ?? 1000;

    if (options.database && !this.db) {
      this.db = await createDatabase(options.database);
    }
    const dialect = options.dialect ?? (options.database ? describeClient(options.database) : undefined);

    const schemaSource = options.schemaSource ?? (this.db ? new KnexSchemaSource(this.db, dialect) : undefined);
    if (!schemaSource) {
      throw new SchemaError('No schema source available', ['Pass database settings or a schemaSource']);
    }

    const generator =
      options.generator ?? (options.llm ? new LLMGenerator(options.llm, { dialect, defaultLimit }) : undefined);
    if (!generator) {
      throw new ConfigError('Either a generator or LLM settings are required');
    }

    this.converter = new SQLConverter({
      generator,
      store: this.store,
      executor:
        options.executor ??
        (this.db
          ? new KnexExecutor(this.db, {
              maxRows: maxLimit,
              timeoutMs: limits.queryTimeoutMs,
              cancelOnTimeout: supportsQueryCancel(dialect),
            })
          : undefined),
      schemaSource,
      optimizer: new SchemaOptimizer({ maxTables: limits.maxTables, includeTypes: limits.includeTypes }),
      postProcessor: new SQLPostProcessor({ defaultLimit }),
      semanticCache: new SemanticCache(this.store, {
        similarity: cache.similarity,
        threshold: cache.similarityThreshold,
        ttlSeconds: cache.semanticTtlSeconds,
        maxCandidates: cache.maxCandidates,
      }),
      planCache: new QueryPlanCache(this.store, { ttlSeconds: cache.planTtlSeconds, defaultLimit, maxLimit }),
      maxCorrections: limits.maxCorrections,
      maxQuestionLength: limits.maxQuestionLength,
      contextTtlSeconds: cache.genericTtlSeconds,
    });

    const update = await this.converter.reloadSchema();
    logger.info(`Querywright ready (schema ${update.version}, cache ${this.store.getType()})`);
    return update;
  }

  async convert(question: string, options: ConvertOptions = {}): Promise<ConversionResult> {
    const result = await this.requireConverter().convert(question, options);
    this.conversions++;
    this.generationCalls += result.generationCalls;
    return result;
  }

  /**
   * Convert several questions with bounded concurrency. Results keep the
   * input order; an aborted signal rejects the whole batch.
   */
  async convertBatch(questions: readonly string[], options: BatchOptions = {}): Promise<BatchItem[]> {
    this.requireConverter();
    const { concurrency = 5, ...convertOptions } = options;
    const limit = pLimit(concurrency);

    return Promise.all(
      questions.map((question) =>
        limit(async (): Promise<BatchItem> => {
          try {
            return { question, ok: true, result: await this.convert(question, convertOptions) };
          } catch (error) {
            if (convertOptions.signal?.aborted) throw error;
            logger.error(`Batch conversion failed for "${question.slice(0, 50)}": ${error}`);
            return { question, ok: false, error: error instanceof Error ? error : new Error(String(error)) };
          }
        })
      )
    );
  }

  /**
   * Re-read the schema; cached entries of the previous version stop matching.
   */
  async reloadSchema(): Promise<VersionUpdate> {
    return this.requireConverter().reloadSchema();
  }

  async getCompactSchema(question?: string): Promise<{ version: SchemaVersion; context: CompactSchemaContext }> {
    return this.requireConverter().getCompactSchema(question);
  }

  async validate(statement: string): Promise<{ validation: ValidationResult; statement: string }> {
    return this.requireConverter().validate(statement);
  }

  async getCacheStats(): Promise<QuerywrightStats> {
    const lookups = this.requireConverter().getLookupStats();
    const store = await this.store.stats();
    const rate = (hits: number) => (this.conversions > 0 ? hits / this.conversions : 0);
    return {
      store,
      plan: lookups.plan,
      semantic: lookups.semantic,
      conversions: this.conversions,
      generationCalls: this.generationCalls,
      hitRates: { plan: rate(lookups.plan.hits), semantic: rate(lookups.semantic.hits) },
    };
  }

  /**
   * Drop every cached entry. Returns the number removed.
   */
  async clearCache(): Promise<number> {
    const removed = await this.store.invalidate('');
    logger.info(`Cleared ${removed} cache entries`);
    return removed;
  }

  async close(): Promise<void> {
    await this.store.close();
    if (this.db) {
      await this.db.destroy();
      this.db = null;
      logger.info('Database connection closed');
    }
  }

  private requireConverter(): SQLConverter {
    if (!this.converter) {
      throw new SchemaError('Querywright is not initialized', ['Call init() before converting questions']);
    }
    return this.converter;
  }
}
