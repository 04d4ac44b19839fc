/**
 * querywright - questions to validated, read-only SQL.
 */

export { Querywright } from './Querywright.js';
export type {
  BatchItem,
  BatchOptions,
  QuerywrightOptions,
  QuerywrightCacheOptions,
  QuerywrightLimits,
  QuerywrightStats,
} from './Querywright.js';

export { SQLConverter, SAFETY_RATIONALE, NON_QUERY_DETAIL } from './converter.js';
export type {
  ConversionFailure,
  ConversionResult,
  ConvertOptions,
  CandidateSource,
  FailureKind,
  SQLConverterOptions,
  Stage,
} from './converter.js';

export { QueryPreprocessor } from './preprocess/preprocessor.js';
export { extractTimeExpressions, resolveTimeRange } from './preprocess/time.js';
export type { DateRange } from './preprocess/time.js';

export { createSnapshot } from './schema/snapshot.js';
export type { TableDefinition } from './schema/snapshot.js';
export { VersionManager, computeSchemaVersion } from './schema/version-manager.js';
export type { VersionUpdate, SchemaChanges } from './schema/version-manager.js';
export { SchemaOptimizer } from './schema/optimizer.js';
export { StaticSchemaSource, KnexSchemaSource } from './schema/source.js';
export { catalogStatement, describeSchema } from './schema/catalog.js';

export {
  createCacheStore,
  createSimilarity,
  MemoryCacheStore,
  RedisCacheStore,
  SemanticCache,
  QueryPlanCache,
  BUILT_IN_PATTERNS,
  TokenOverlapSimilarity,
  EmbeddingSimilarity,
} from './cache/index.js';
export type { CacheStore, CacheTier, CacheStats, LayerStats, LookupStats, SimilarityStrategy } from './cache/index.js';

export { SQLValidator, DANGEROUS_KEYWORDS } from './validation/validator.js';
export { SQLPostProcessor } from './validation/post-processor.js';
export { analyzeExecutionError, isRetryable } from './feedback.js';
export type { ErrorAnalysis, ExecutionErrorType } from './feedback.js';

export { LLMGenerator, buildSystemPrompt } from './services/llm.js';
export { FEW_SHOT_EXAMPLES, selectExamples, formatExamples } from './prompts/few-shot.js';
export type { FewShotExample, ExampleSelection } from './prompts/few-shot.js';
export { KnexExecutor } from './services/executor.js';
export { createDatabase } from './services/database.js';

export { QuerywrightError, LLMError, SQLExecutionError, SchemaError, CacheError, ConfigError } from './types/errors.js';
export type * from './types/models.js';
export type { JsonValue, JsonObject } from './types/utils.js';
