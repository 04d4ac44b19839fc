/**
 * In-memory cache store (default).
 * Map insertion order doubles as recency order for LRU eviction.
 */

import type { SchemaVersion } from '../types/models.js';
import type { JsonValue } from '../types/utils.js';
import { CACHE_TIERS, emptyStats, physicalKey, type CacheEntry, type CacheStats, type CacheStore, type CacheTier } from './types.js';

export interface MemoryCacheStoreOptions {
  maxEntries?: number;
  /** Clock in milliseconds. */
  now?: () => number;
}

export class MemoryCacheStore implements CacheStore {
  private entries = new Map<string, CacheEntry>();
  private maxEntries: number;
  private now: () => number;
  private counters = emptyStats();

  constructor(options: MemoryCacheStoreOptions = {}) {
    this.maxEntries = options.maxEntries ?? 1000;
    this.now = options.now ?? Date.now;
  }

  getType(): string {
    return 'memory';
  }

  async get(key: string, tier: CacheTier, version: SchemaVersion): Promise<JsonValue | undefined> {
    const id = physicalKey(tier, key);
    const entry = this.entries.get(id);

    if (!entry || this.isExpired(entry)) {
      if (entry) this.entries.delete(id);
      this.recordMiss(tier);
      return undefined;
    }

    // Written under another schema: a miss, left in place until it expires
    if (entry.schemaVersion !== version) {
      this.recordMiss(tier);
      return undefined;
    }

    // Refresh recency
    this.entries.delete(id);
    this.entries.set(id, entry);
    this.recordHit(tier);
    return structuredClone(entry.value);
  }

  async set(key: string, value: JsonValue, tier: CacheTier, version: SchemaVersion, ttlSeconds: number): Promise<void> {
    const id = physicalKey(tier, key);
    this.entries.delete(id);

    while (this.entries.size >= this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }

    this.entries.set(id, {
      key,
      value: structuredClone(value),
      tier,
      schemaVersion: version,
      createdAt: this.now(),
      ttlSeconds,
    });
  }

  async delete(key: string, tier: CacheTier): Promise<boolean> {
    return this.entries.delete(physicalKey(tier, key));
  }

  async invalidate(prefix: string): Promise<number> {
    let removed = 0;
    for (const id of [...this.entries.keys()]) {
      if (id.startsWith(prefix)) {
        this.entries.delete(id);
        removed++;
      }
    }
    return removed;
  }

  async stats(): Promise<CacheStats> {
    const result = emptyStats();
    result.hits = this.counters.hits;
    result.misses = this.counters.misses;
    for (const tier of CACHE_TIERS) {
      result.byTier[tier].hits = this.counters.byTier[tier].hits;
      result.byTier[tier].misses = this.counters.byTier[tier].misses;
    }
    for (const entry of this.entries.values()) {
      if (!this.isExpired(entry)) result.byTier[entry.tier].size++;
    }
    return result;
  }

  async close(): Promise<void> {
    this.entries.clear();
  }

  private isExpired(entry: CacheEntry): boolean {
    return this.now() - entry.createdAt >= entry.ttlSeconds * 1000;
  }

  private recordHit(tier: CacheTier): void {
    this.counters.hits++;
    this.counters.byTier[tier].hits++;
  }

  private recordMiss(tier: CacheTier): void {
    this.counters.misses++;
    this.counters.byTier[tier].misses++;
  }
}
