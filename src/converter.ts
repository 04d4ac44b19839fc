/**
 * Question → SQL conversion pipeline.
 *
 * An explicit state machine:
 *
 *   preprocess → cache_lookup → cache_hit | generate → validate → accept | correct
 *   → execute_feedback → accept | correct → done | failed
 *
 * Questions about the structure itself go preprocess → schema_answer and are
 * answered from the snapshot; pleasantries fail at preprocess. Neither
 * reaches the generator.
 *
 * Validation and execution failures share one correction budget. Unsafe
 * statements fail at once. Provider errors reject the whole call.
 */

import { hashKey, decodeContext, encodeContext } from './cache/codec.js';
import { QueryPlanCache } from './cache/plan-cache.js';
import { SemanticCache } from './cache/semantic-cache.js';
import type { CacheStore } from './cache/types.js';
import { analyzeExecutionError, buildExecutionCorrection, buildValidationCorrection, isRetryable } from './feedback.js';
import { QueryPreprocessor } from './preprocess/preprocessor.js';
import { catalogStatement, describeSchema } from './schema/catalog.js';
import { SchemaOptimizer } from './schema/optimizer.js';
import { VersionManager, type VersionUpdate } from './schema/version-manager.js';
import { SchemaError, SQLExecutionError } from './types/errors.js';
import type {
  CompactSchemaContext,
  ExecutionOutcome,
  ProcessedQuery,
  SchemaSnapshot,
  SchemaSource,
  SchemaVersion,
  SchemaVersionToken,
  SQLCandidate,
  SQLExecutor,
  SQLGenerator,
  ValidationResult,
} from './types/models.js';
import { logger } from './utils/logger.js';
import { SQLPostProcessor } from './validation/post-processor.js';
import { SQLValidator } from './validation/validator.js';

export type Stage =
  | 'preprocess'
  | 'schema_answer'
  | 'cache_lookup'
  | 'cache_hit'
  | 'generate'
  | 'validate'
  | 'correct'
  | 'execute_feedback'
  | 'accept'
  | 'done'
  | 'failed';

export type CandidateSource = 'generated' | 'semantic' | 'plan' | 'catalog';

export type FailureKind = 'input' | 'validation' | 'safety' | 'execution';

export interface ConversionFailure {
  kind: FailureKind;
  /** Last violation or database error, for display. */
  detail: string;
  rationale?: string;
}

export interface ConvertOptions {
  /** Version the caller believes is live; a mismatch reloads the schema first. */
  schemaVersionHint?: SchemaVersion;
  execute?: boolean;
  maxCorrections?: number;
  /** Skip cache reads and writes. */
  useCache?: boolean;
  signal?: AbortSignal;
}

export interface ConversionResult {
  status: 'done' | 'failed';
  question: string;
  processed: ProcessedQuery;
  candidate: SQLCandidate;
  validation: ValidationResult;
  execution?: ExecutionOutcome;
  fromCache: boolean;
  cacheTier?: 'semantic' | 'plan';
  similarity?: number;
  schemaVersion: SchemaVersion;
  attempts: number;
  generationCalls: number;
  failure?: ConversionFailure;
  trace: Stage[];
  latencyMs: number;
}

export const SAFETY_RATIONALE =
  'Statement contains a data-modifying or administrative operation; only read-only queries are permitted.';

export const NON_QUERY_DETAIL = 'Question does not ask for data';

export interface SQLConverterOptions {
  generator: SQLGenerator;
  store: CacheStore;
  executor?: SQLExecutor;
  schemaSource?: SchemaSource;
  versions?: VersionManager;
  preprocessor?: QueryPreprocessor;
  optimizer?: SchemaOptimizer;
  validator?: SQLValidator;
  postProcessor?: SQLPostProcessor;
  semanticCache?: SemanticCache;
  planCache?: QueryPlanCache;
  maxCorrections?: number;
  maxQuestionLength?: number;
  /** TTL of cached schema contexts (generic tier). */
  contextTtlSeconds?: number;
}

/**
 * Mutable per-request state threaded through the stages.
 */
interface RunState {
  stage: Stage;
  token: SchemaVersionToken;
  question: string;
  processed?: ProcessedQuery;
  context?: CompactSchemaContext;
  candidate?: SQLCandidate;
  source: CandidateSource;
  similarity?: number;
  validation?: ValidationResult;
  execution?: ExecutionOutcome;
  correction?: string;
  failure?: ConversionFailure;
  attempts: number;
  generationCalls: number;
  trace: Stage[];
}

export class SQLConverter {
  private generator: SQLGenerator;
  private store: CacheStore;
  private executor?: SQLExecutor;
  private schemaSource?: SchemaSource;
  private versions: VersionManager;
  private preprocessor: QueryPreprocessor;
  private optimizer: SchemaOptimizer;
  private validator: SQLValidator;
  private postProcessor: SQLPostProcessor;
  private semanticCache: SemanticCache;
  private planCache: QueryPlanCache;
  private maxCorrections: number;
  private maxQuestionLength: number;
  private contextTtlSeconds: number;

  constructor(options: SQLConverterOptions) {
    this.generator = options.generator;
    this.store = options.store;
    this.executor = options.executor;
    this.schemaSource = options.schemaSource;
    this.versions = options.versions ?? new VersionManager();
    this.preprocessor = options.preprocessor ?? new QueryPreprocessor();
    this.optimizer = options.optimizer ?? new SchemaOptimizer();
    this.validator = options.validator ?? new SQLValidator();
    this.postProcessor = options.postProcessor ?? new SQLPostProcessor();
    this.semanticCache = options.semanticCache ?? new SemanticCache(options.store);
    this.planCache = options.planCache ?? new QueryPlanCache(options.store);
    this.maxCorrections = options.maxCorrections ?? 2;
    this.maxQuestionLength = options.maxQuestionLength ?? 500;
    this.contextTtlSeconds = options.contextTtlSeconds ?? 3600;
  }

  /**
   * Install a snapshot directly (no schema source needed).
   */
  setSchema(snapshot: SchemaSnapshot): VersionUpdate {
    return this.versions.update(snapshot);
  }

  /**
   * Re-read the schema from the source and swap the version pointer if the
   * structure changed. Entries of the old version become unreachable.
   */
  async reloadSchema(): Promise<VersionUpdate> {
    if (!this.schemaSource) {
      throw new SchemaError('No schema source configured', ['Pass a schemaSource, or install a snapshot with setSchema()']);
    }
    const snapshot = await this.schemaSource.load();
    return this.versions.update(snapshot);
  }

  /**
   * The live version token, loading the schema on first use.
   */
  async currentToken(): Promise<SchemaVersionToken> {
    const existing = this.versions.current();
    if (existing) return existing;
    await this.reloadSchema();
    const loaded = this.versions.current();
    if (!loaded) throw new SchemaError('Schema source returned no snapshot');
    return loaded;
  }

  getVersionManager(): VersionManager {
    return this.versions;
  }

  /**
   * Schema context that would be sent to the generator for a question.
   */
  async getCompactSchema(question?: string): Promise<{ version: SchemaVersion; context: CompactSchemaContext }> {
    const token = await this.currentToken();
    const processed = this.preprocessor.process(question ?? '', token.snapshot);
    return { version: token.version, context: this.optimizer.buildContext(token.snapshot, processed) };
  }

  /**
   * Validate and normalise a statement against the live schema.
   */
  async validate(statement: string): Promise<{ validation: ValidationResult; statement: string }> {
    const token = await this.currentToken();
    const validation = this.validator.validate(statement, token.snapshot);
    if (!validation.isValid) return { validation, statement };
    const processed = this.postProcessor.process(statement, token.snapshot.dialect);
    return { validation: this.validator.validate(processed, token.snapshot), statement: processed };
  }

  getLookupStats() {
    return { semantic: this.semanticCache.getStats(), plan: this.planCache.getStats() };
  }

  async convert(question: string, options: ConvertOptions = {}): Promise<ConversionResult> {
    const startTime = Date.now();
    const { signal } = options;
    const execute = options.execute ?? false;
    const useCache = options.useCache ?? true;
    const maxCorrections = options.maxCorrections ?? this.maxCorrections;

    if (execute && !this.executor) {
      throw new SQLExecutionError('Execution requested but no executor is configured');
    }

    if (options.schemaVersionHint && options.schemaVersionHint !== this.versions.currentVersion() && this.schemaSource) {
      logger.info(`Schema version hint ${options.schemaVersionHint} differs from live version; reloading`);
      await this.reloadSchema();
    }

    let text = question;
    if (text.length > this.maxQuestionLength) {
      logger.warn(`Question truncated from ${text.length} to ${this.maxQuestionLength} characters`);
      text = text.slice(0, this.maxQuestionLength);
    }

    const state: RunState = {
      stage: 'preprocess',
      token: await this.currentToken(),
      question: text,
      source: 'generated',
      attempts: 0,
      generationCalls: 0,
      trace: [],
    };

    while (state.stage !== 'done' && state.stage !== 'failed') {
      signal?.throwIfAborted();
      state.trace.push(state.stage);

      switch (state.stage) {
        case 'preprocess':
          state.processed = this.preprocessor.process(state.question, state.token.snapshot);
          logger.debug(`Classified as ${state.processed.category} (${state.processed.confidence.toFixed(2)})`);
          if (state.processed.category === 'non_query') {
            this.rejectNonQuery(state);
            state.stage = 'failed';
          } else if (state.processed.category === 'schema_meta') {
            state.stage = 'schema_answer';
          } else {
            state.stage = useCache ? 'cache_lookup' : 'generate';
          }
          break;

        case 'schema_answer':
          state.stage = await this.answerFromSchema(state, execute, signal);
          break;

        case 'cache_lookup':
          state.stage = (await this.lookupCaches(state)) ? 'cache_hit' : 'generate';
          break;

        case 'cache_hit':
          // A hit is validated like any other candidate
          state.stage = 'validate';
          break;

        case 'generate':
          await this.generate(state, signal);
          state.stage = 'validate';
          break;

        case 'validate':
          state.stage = this.validateCandidate(state, execute, maxCorrections);
          break;

        case 'execute_feedback':
          state.stage = await this.executeCandidate(state, maxCorrections, signal);
          break;

        case 'correct':
          state.attempts++;
          state.source = 'generated';
          logger.info(`Correction attempt ${state.attempts}/${maxCorrections}`);
          state.stage = 'generate';
          break;

        case 'accept':
          if (useCache) await this.writeCaches(state);
          state.stage = 'done';
          break;
      }
    }
    state.trace.push(state.stage);

    const { processed, candidate, validation } = state;
    if (!processed || !candidate || !validation) {
      throw new Error(`Conversion ended in ${state.stage} without a candidate`);
    }

    const cacheTier = state.source === 'semantic' || state.source === 'plan' ? state.source : undefined;
    return {
      status: state.stage === 'done' ? 'done' : 'failed',
      question,
      processed,
      candidate,
      validation,
      execution: state.execution,
      fromCache: cacheTier !== undefined,
      cacheTier,
      similarity: state.similarity,
      schemaVersion: state.token.version,
      attempts: state.attempts,
      generationCalls: state.generationCalls,
      failure: state.failure,
      trace: state.trace,
      latencyMs: Date.now() - startTime,
    };
  }

  /**
   * Plan templates first (no generation at all), then semantic matches.
   */
  private async lookupCaches(state: RunState): Promise<boolean> {
    const processed = this.requireProcessed(state);

    const plan = await this.planCache.lookup(processed, state.token);
    if (plan) {
      logger.info(`Plan cache HIT (${plan.pattern})`);
      state.candidate = plan.candidate;
      state.source = 'plan';
      return true;
    }

    const match = await this.semanticCache.lookup(processed, state.token.version);
    if (match) {
      logger.info(`Semantic cache HIT (${match.similarity.toFixed(3)}) for "${match.matchedQuestion}"`);
      state.candidate = match.candidate;
      state.source = 'semantic';
      state.similarity = match.similarity;
      return true;
    }

    logger.info('Cache MISS - generating');
    return false;
  }

  private async generate(state: RunState, signal?: AbortSignal): Promise<void> {
    const processed = this.requireProcessed(state);
    state.context ??= await this.contextFor(processed, state.token);
    state.generationCalls++;
    state.candidate = await this.generator.generate(state.context, state.question, state.correction, {
      signal,
      category: processed.category,
    });
    state.source = 'generated';
    state.similarity = undefined;
  }

  /**
   * List the tables through the dialect's catalog; the explanation is built
   * from the snapshot. Catalog tables are not part of the snapshot, so the
   * fixed statement skips validation and is never cached.
   */
  private async answerFromSchema(state: RunState, execute: boolean, signal?: AbortSignal): Promise<Stage> {
    const { snapshot } = state.token;
    const statement = catalogStatement(snapshot.dialect);
    state.candidate = { statement, explanation: describeSchema(snapshot), confidence: 1, tablesReferenced: [] };
    state.validation = { isValid: true, violations: [], requiresCorrection: false, tablesReferenced: [] };
    state.source = 'catalog';
    logger.info('Schema question answered from the snapshot');

    if (!execute) return 'done';
    if (!this.executor) throw new SQLExecutionError('Execution requested but no executor is configured');

    const outcome = await this.executor.execute(statement, { signal });
    state.execution = outcome;
    if (outcome.success) return 'done';
    state.failure = { kind: 'execution', detail: outcome.errorMessage ?? 'Unknown error' };
    return 'failed';
  }

  private rejectNonQuery(state: RunState): void {
    state.candidate = { statement: '', explanation: NON_QUERY_DETAIL, confidence: 0, tablesReferenced: [] };
    state.validation = { isValid: false, violations: [], requiresCorrection: false, tablesReferenced: [] };
    state.failure = {
      kind: 'input',
      detail: NON_QUERY_DETAIL,
      rationale: 'Ask about the data, for example "how many orders were placed last month"',
    };
  }

  private validateCandidate(state: RunState, execute: boolean, maxCorrections: number): Stage {
    const candidate = this.requireCandidate(state);
    const validation = this.validator.validate(candidate.statement, state.token.snapshot);
    state.validation = validation;

    if (validation.violations.some((v) => v.kind === 'dangerous_operation')) {
      const detail = validation.violations.find((v) => v.kind === 'dangerous_operation')?.detail ?? SAFETY_RATIONALE;
      state.failure = { kind: 'safety', detail, rationale: SAFETY_RATIONALE };
      return 'failed';
    }

    if (!validation.isValid) {
      const fatal = validation.violations.filter((v) => v.fatal);
      logger.info(`Validation failed: ${fatal.map((v) => v.kind).join(', ')}`);
      if (state.attempts >= maxCorrections) {
        state.failure = { kind: 'validation', detail: fatal.map((v) => v.detail).join('; ') };
        return 'failed';
      }
      state.correction = buildValidationCorrection(candidate.statement, validation.violations);
      return 'correct';
    }

    // Normalise before execution so the executed and cached statement match
    const statement = this.postProcessor.process(candidate.statement, state.token.snapshot.dialect);
    if (statement !== candidate.statement) {
      state.candidate = { ...candidate, statement };
      state.validation = this.validator.validate(statement, state.token.snapshot);
    }
    return execute ? 'execute_feedback' : 'accept';
  }

  private async executeCandidate(state: RunState, maxCorrections: number, signal?: AbortSignal): Promise<Stage> {
    const candidate = this.requireCandidate(state);
    if (!this.executor) throw new SQLExecutionError('Execution requested but no executor is configured');

    const outcome = await this.executor.execute(candidate.statement, { signal });
    state.execution = outcome;
    if (outcome.success) return 'accept';

    const analysis = analyzeExecutionError(outcome.errorMessage ?? 'Unknown error', candidate.statement, state.token.snapshot);
    logger.info(`Execution failed (${analysis.type}): ${analysis.message}`);

    if (!isRetryable(analysis)) {
      state.failure = { kind: 'execution', detail: analysis.message, rationale: analysis.suggestion };
      return 'failed';
    }
    if (state.attempts >= maxCorrections) {
      state.failure = { kind: 'execution', detail: analysis.message };
      return 'failed';
    }
    state.correction = buildExecutionCorrection(candidate.statement, analysis);
    return 'correct';
  }

  /**
   * Cache writes re-check the version: a request that started before a
   * schema swap must not publish results under the old structure.
   */
  private async writeCaches(state: RunState): Promise<void> {
    const processed = this.requireProcessed(state);
    const candidate = this.requireCandidate(state);
    const { version } = state.token;

    if (!this.versions.isCurrent(version)) {
      logger.info(`Schema changed during request; skipping cache write for version ${version}`);
      return;
    }

    if (state.source !== 'semantic') {
      await this.semanticCache.put(processed, candidate, version);
    }
    if (state.source === 'generated') {
      await this.planCache.learn(processed, candidate, version);
    }
  }

  /**
   * Compact schema context, cached in the generic tier per question.
   */
  private async contextFor(processed: ProcessedQuery, token: SchemaVersionToken): Promise<CompactSchemaContext> {
    const key = `${token.version}:context:${hashKey(processed.normalizedText)}`;
    const cached = decodeContext(await this.store.get(key, 'generic', token.version));
    if (cached) return cached;

    const context = this.optimizer.buildContext(token.snapshot, processed);
    if (this.versions.isCurrent(token.version)) {
      await this.store.set(key, encodeContext(context), 'generic', token.version, this.contextTtlSeconds);
    }
    return context;
  }

  private requireProcessed(state: RunState): ProcessedQuery {
    if (!state.processed) throw new Error(`Stage ${state.stage} reached before preprocessing`);
    return state.processed;
  }

  private requireCandidate(state: RunState): SQLCandidate {
    if (!state.candidate) throw new Error(`Stage ${state.stage} reached without a candidate`);
    return state.candidate;
  }
}
