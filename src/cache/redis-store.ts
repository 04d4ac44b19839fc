/**
 * Redis cache store (shared across processes).
 *
 * Entries are JSON envelopes written with an EX TTL. Read and write failures
 * are logged and behave as misses so a flaky Redis degrades to generation
 * instead of failing requests.
 */

import { Redis } from 'ioredis';
import type { SchemaVersion } from '../types/models.js';
import { isJsonObject, type JsonValue } from '../types/utils.js';
import { CacheError } from '../types/errors.js';
import { logger } from '../utils/logger.js';
import { CACHE_TIERS, emptyStats, physicalKey, type CacheStats, type CacheStore, type CacheTier } from './types.js';

function escapeGlob(value: string): string {
  return value.replace(/[*?[\]\\]/g, '\\$&');
}

/**
 * The Redis commands the store issues. An ioredis client satisfies it.
 */
export interface RedisCommands {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, mode: 'EX', seconds: number): Promise<unknown>;
  del(...keys: string[]): Promise<number>;
  scan(cursor: string, match: 'MATCH', pattern: string, count: 'COUNT', size: number): Promise<[string, string[]]>;
  quit(): Promise<unknown>;
}

export class RedisCacheStore implements CacheStore {
  private redis: RedisCommands;
  private readonly prefix: string;
  private counters = emptyStats();

  constructor(connection: string | RedisCommands, prefix: string = 'querywright:') {
    this.prefix = prefix;

    if (typeof connection !== 'string') {
      this.redis = connection;
      return;
    }

    const client = new Redis(connection, {
      maxRetriesPerRequest: 3,
      retryStrategy(times: number) {
        if (times > 5) {
          logger.warn('Redis connection unstable. Retrying...');
          return 5000;
        }
        return Math.min(times * 50, 2000);
      },
    });

    client.on('error', (err: Error) => {
      logger.error(`Redis Error: ${err.message}`);
    });

    client.on('connect', () => {
      logger.info('Redis cache connected');
    });

    this.redis = client;
  }

  getType(): string {
    return 'redis';
  }

  private key(tier: CacheTier, key: string): string {
    return `${this.prefix}${physicalKey(tier, key)}`;
  }

  async get(key: string, tier: CacheTier, version: SchemaVersion): Promise<JsonValue | undefined> {
    let raw: string | null;
    try {
      raw = await this.redis.get(this.key(tier, key));
    } catch (e) {
      logger.error(`Redis get error: ${e}`);
      this.recordMiss(tier);
      return undefined;
    }

    const envelope = raw === null ? undefined : this.parse(raw);
    if (!envelope || envelope.schemaVersion !== version) {
      this.recordMiss(tier);
      return undefined;
    }

    this.recordHit(tier);
    return envelope.value;
  }

  async set(key: string, value: JsonValue, tier: CacheTier, version: SchemaVersion, ttlSeconds: number): Promise<void> {
    const envelope = JSON.stringify({
      key,
      value,
      tier,
      schemaVersion: version,
      createdAt: Date.now(),
      ttlSeconds,
    });
    try {
      await this.redis.set(this.key(tier, key), envelope, 'EX', ttlSeconds);
    } catch (e) {
      logger.error(`Redis set error: ${e}`);
    }
  }

  async delete(key: string, tier: CacheTier): Promise<boolean> {
    const removed = await this.redis.del(this.key(tier, key));
    return removed > 0;
  }

  async invalidate(prefix: string): Promise<number> {
    try {
      const keys = await this.scan(`${this.prefix}${prefix}`);
      if (keys.length === 0) return 0;
      let removed = 0;
      for (let i = 0; i < keys.length; i += 500) {
        removed += await this.redis.del(...keys.slice(i, i + 500));
      }
      return removed;
    } catch (e) {
      throw new CacheError(`Failed to invalidate "${prefix}": ${e}`, undefined, { cause: e });
    }
  }

  async stats(): Promise<CacheStats> {
    const result = emptyStats();
    result.hits = this.counters.hits;
    result.misses = this.counters.misses;
    for (const tier of CACHE_TIERS) {
      result.byTier[tier].hits = this.counters.byTier[tier].hits;
      result.byTier[tier].misses = this.counters.byTier[tier].misses;
      try {
        result.byTier[tier].size = (await this.scan(`${this.prefix}${tier}:`)).length;
      } catch (e) {
        logger.error(`Redis stats error: ${e}`);
      }
    }
    return result;
  }

  async close(): Promise<void> {
    await this.redis.quit();
  }

  private async scan(prefix: string): Promise<string[]> {
    const keys: string[] = [];
    let cursor = '0';
    do {
      const [next, batch] = await this.redis.scan(cursor, 'MATCH', `${escapeGlob(prefix)}*`, 'COUNT', 200);
      keys.push(...batch);
      cursor = next;
    } while (cursor !== '0');
    return keys;
  }

  private parse(raw: string): { schemaVersion: string; value: JsonValue } | undefined {
    try {
      const parsed: JsonValue = JSON.parse(raw);
      if (!isJsonObject(parsed) || !('value' in parsed)) {
        return undefined;
      }
      const schemaVersion = parsed.schemaVersion;
      return typeof schemaVersion === 'string' ? { schemaVersion, value: parsed.value } : undefined;
    } catch (e) {
      logger.warn(`Discarding unreadable cache entry: ${e}`);
      return undefined;
    }
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
