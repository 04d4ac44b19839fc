/**
 * Semantic cache: reuse a previously accepted statement for a question that is
 * the same, or close enough, under the current schema version.
 *
 * Lookup tries the exact key first, then scores a bounded candidate set (the
 * most recent questions of the same category) with the configured similarity
 * strategy. Candidates live in a per-version index entry in the store.
 */

import type { ProcessedQuery, QueryCategory, SchemaVersion, SQLCandidate } from '../types/models.js';
import { isJsonObject, type JsonObject, type JsonValue } from '../types/utils.js';
import { logger } from '../utils/logger.js';
import { decodeCandidate, encodeCandidate, hashKey, readString } from './codec.js';
import { TokenOverlapSimilarity, type SimilarityStrategy } from './similarity.js';
import type { CacheStore, LookupStats } from './types.js';

export interface SemanticCacheOptions {
  similarity?: SimilarityStrategy;
  threshold?: number;
  ttlSeconds?: number;
  /** Bound on the candidate set scored per lookup. */
  maxCandidates?: number;
}

export interface SemanticMatch {
  candidate: SQLCandidate;
  similarity: number;
  matchedQuestion: string;
  exact: boolean;
}

interface IndexItem {
  key: string;
  normalizedText: string;
  category: QueryCategory;
}

const INDEX_KEY = 'index';

export class SemanticCache {
  private store: CacheStore;
  private similarity: SimilarityStrategy;
  private threshold: number;
  private ttlSeconds: number;
  private maxCandidates: number;
  private hits = 0;
  private misses = 0;
  private indexWrites = new Map<SchemaVersion, Promise<void>>();

  constructor(store: CacheStore, options: SemanticCacheOptions = {}) {
    this.store = store;
    this.similarity = options.similarity ?? new TokenOverlapSimilarity();
    this.threshold = options.threshold ?? 0.85;
    this.ttlSeconds = options.ttlSeconds ?? 1800;
    this.maxCandidates = options.maxCandidates ?? 200;
  }

  /**
   * Cache key: normalized text plus schema version.
   */
  key(normalizedText: string, version: SchemaVersion): string {
    return `${version}:${hashKey(normalizedText)}`;
  }

  async lookup(processed: ProcessedQuery, version: SchemaVersion): Promise<SemanticMatch | undefined> {
    const exact = await this.read(this.key(processed.normalizedText, version), version);
    if (exact) {
      this.hits++;
      return { candidate: exact.candidate, similarity: 1, matchedQuestion: exact.question, exact: true };
    }

    const pool = (await this.readIndex(version)).filter(
      (item) => item.category === processed.category && item.normalizedText !== processed.normalizedText
    );
    if (pool.length === 0) {
      this.misses++;
      return undefined;
    }

    const scores = await this.similarity.score(
      processed.normalizedText,
      pool.map((item) => item.normalizedText)
    );

    let best: { item: IndexItem; score: number } | undefined;
    for (let i = 0; i < pool.length; i++) {
      const score = scores[i] ?? 0;
      if (score >= this.threshold && (!best || score > best.score)) {
        best = { item: pool[i], score };
      }
    }

    if (best) {
      const entry = await this.read(best.item.key, version);
      if (entry) {
        this.hits++;
        logger.debug(`Semantic match ${best.score.toFixed(2)}: "${processed.normalizedText}" ~ "${best.item.normalizedText}"`);
        return { candidate: entry.candidate, similarity: best.score, matchedQuestion: entry.question, exact: false };
      }
    }

    this.misses++;
    return undefined;
  }

  async put(processed: ProcessedQuery, candidate: SQLCandidate, version: SchemaVersion): Promise<void> {
    const key = this.key(processed.normalizedText, version);
    const entry: JsonObject = {
      question: processed.original,
      normalizedText: processed.normalizedText,
      category: processed.category,
      candidate: encodeCandidate(candidate),
    };
    await this.store.set(key, entry, 'semantic', version, this.ttlSeconds);

    await this.appendToIndex(version, { key, normalizedText: processed.normalizedText, category: processed.category });
  }

  getStats(): LookupStats {
    return { hits: this.hits, misses: this.misses };
  }

  /**
   * Index updates for one version run one after another, so concurrent puts
   * never read the same old index.
   */
  private async appendToIndex(version: SchemaVersion, item: IndexItem): Promise<void> {
    const previous = this.indexWrites.get(version) ?? Promise.resolve();
    const run = () => this.writeIndex(version, item);
    const next = previous.then(run, run);
    this.indexWrites.set(version, next);
    try {
      await next;
    } finally {
      if (this.indexWrites.get(version) === next) {
        this.indexWrites.delete(version);
      }
    }
  }

  private async writeIndex(version: SchemaVersion, item: IndexItem): Promise<void> {
    const index = (await this.readIndex(version)).filter((existing) => existing.key !== item.key);
    index.push(item);
    const bounded = index.slice(-this.maxCandidates);
    await this.store.set(
      this.indexKey(version),
      bounded.map((entry) => ({ key: entry.key, normalizedText: entry.normalizedText, category: entry.category })),
      'semantic',
      version,
      this.ttlSeconds
    );
  }

  private indexKey(version: SchemaVersion): string {
    return `${version}:${INDEX_KEY}`;
  }

  private async read(key: string, version: SchemaVersion): Promise<{ question: string; candidate: SQLCandidate } | undefined> {
    const value = await this.store.get(key, 'semantic', version);
    if (!isJsonObject(value)) return undefined;
    const candidate = decodeCandidate(value.candidate);
    const question = readString(value, 'question');
    return candidate && question !== undefined ? { question, candidate } : undefined;
  }

  private async readIndex(version: SchemaVersion): Promise<IndexItem[]> {
    const value: JsonValue | undefined = await this.store.get(this.indexKey(version), 'semantic', version);
    if (!Array.isArray(value)) return [];
    const items: IndexItem[] = [];
    for (const raw of value) {
      if (!isJsonObject(raw)) continue;
      const key = readString(raw, 'key');
      const normalizedText = readString(raw, 'normalizedText');
      const category = readString(raw, 'category');
      if (key && normalizedText !== undefined && isCategory(category)) {
        items.push({ key, normalizedText, category });
      }
    }
    return items;
  }
}

const CATEGORIES: ReadonlySet<string> = new Set<QueryCategory>([
  'lookup', 'aggregation', 'join', 'group_by', 'ranking', 'filter', 'nested', 'schema_meta', 'non_query',
]);

function isCategory(value: string | undefined): value is QueryCategory {
  return value !== undefined && CATEGORIES.has(value);
}
