/**
 * Cache store factory.
 *
 * Redis when REDIS_URL is set, in-process memory otherwise.
 */

import type { Config } from '../config.js';
import { logger } from '../utils/logger.js';
import { MemoryCacheStore } from './memory-store.js';
import { RedisCacheStore } from './redis-store.js';
import { EmbeddingSimilarity, loadOpenAIEmbeddingModel, TokenOverlapSimilarity, type SimilarityStrategy } from './similarity.js';
import type { CacheStore } from './types.js';

export function createCacheStore(cfg: Pick<Config, 'REDIS_URL' | 'REDIS_KEY_PREFIX' | 'CACHE_MAX_ENTRIES'>): CacheStore {
  if (cfg.REDIS_URL) {
    logger.info('REDIS_URL detected. Using Redis cache store');
    return new RedisCacheStore(cfg.REDIS_URL, cfg.REDIS_KEY_PREFIX);
  }
  logger.info('No REDIS_URL found. Using in-memory cache store');
  return new MemoryCacheStore({ maxEntries: cfg.CACHE_MAX_ENTRIES });
}

/**
 * Similarity strategy for the semantic cache. The embedding strategy needs an
 * OpenAI key; without one it falls back to token overlap.
 */
export async function createSimilarity(
  cfg: Pick<Config, 'SIMILARITY_STRATEGY' | 'EMBEDDING_MODEL' | 'OPENAI_API_KEY'>
): Promise<SimilarityStrategy> {
  if (cfg.SIMILARITY_STRATEGY === 'embedding') {
    if (cfg.OPENAI_API_KEY) {
      const model = await loadOpenAIEmbeddingModel(cfg.EMBEDDING_MODEL, cfg.OPENAI_API_KEY);
      return new EmbeddingSimilarity({ model });
    }
    logger.warn('SIMILARITY_STRATEGY=embedding requires OPENAI_API_KEY; using token overlap');
  }
  return new TokenOverlapSimilarity();
}

export { MemoryCacheStore } from './memory-store.js';
export { RedisCacheStore } from './redis-store.js';
export type { RedisCommands } from './redis-store.js';
export { SemanticCache } from './semantic-cache.js';
export { QueryPlanCache, BUILT_IN_PATTERNS } from './plan-cache.js';
export { TokenOverlapSimilarity, EmbeddingSimilarity } from './similarity.js';
export type { SimilarityStrategy } from './similarity.js';
export type { CacheStore, CacheTier, CacheStats, LayerStats, LookupStats } from './types.js';
