/**
 * Cache store contracts shared by all tiers.
 */

import type { SchemaVersion } from '../types/models.js';
import type { JsonValue } from '../types/utils.js';

export type CacheTier = 'semantic' | 'plan' | 'generic';

export const CACHE_TIERS: readonly CacheTier[] = ['semantic', 'plan', 'generic'];

/**
 * Stored envelope around an opaque payload.
 */
export interface CacheEntry {
  key: string;
  value: JsonValue;
  tier: CacheTier;
  schemaVersion: SchemaVersion;
  createdAt: number;
  ttlSeconds: number;
}

export interface LayerStats {
  size: number;
  hits: number;
  misses: number;
}

/**
 * Hit/miss counts of one cache's lookups (as opposed to raw store reads).
 */
export interface LookupStats {
  hits: number;
  misses: number;
}

export interface CacheStats {
  hits: number;
  misses: number;
  byTier: Record<CacheTier, LayerStats>;
}

/**
 * Generic TTL key/value store.
 *
 * Entries written under one schema version read as misses under any other;
 * they are never swept eagerly, they just expire. Stores must be safe for
 * concurrent use by interleaved requests.
 */
export interface CacheStore {
  getType(): string;
  get(key: string, tier: CacheTier, version: SchemaVersion): Promise<JsonValue | undefined>;
  set(key: string, value: JsonValue, tier: CacheTier, version: SchemaVersion, ttlSeconds: number): Promise<void>;
  delete(key: string, tier: CacheTier): Promise<boolean>;
  /** Remove every entry whose physical key starts with `prefix`; returns the count. */
  invalidate(prefix: string): Promise<number>;
  stats(): Promise<CacheStats>;
  close(): Promise<void>;
}

/**
 * Physical key layout: `<tier>:<key>`.
 */
export function physicalKey(tier: CacheTier, key: string): string {
  return `${tier}:${key}`;
}

export function emptyStats(): CacheStats {
  return {
    hits: 0,
    misses: 0,
    byTier: {
      semantic: { size: 0, hits: 0, misses: 0 },
      plan: { size: 0, hits: 0, misses: 0 },
      generic: { size: 0, hits: 0, misses: 0 },
    },
  };
}
