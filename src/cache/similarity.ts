/**
 * Similarity strategies for the semantic cache.
 */

import { cosineSimilarity, embedMany, type EmbeddingModel } from 'ai';
import { contentTokens } from '../preprocess/text.js';
import { LLMError } from '../types/errors.js';

/**
 * Scores a normalized question against candidate normalized questions.
 * Scores are in [0, 1]; one score per candidate, in order.
 */
export interface SimilarityStrategy {
  readonly name: string;
  score(query: string, candidates: readonly string[]): Promise<number[]>;
}

const HEAVY_TOKENS: ReadonlySet<string> = new Set([
  'count', 'sum', 'total', 'avg', 'max', 'min', 'top', 'bottom', 'highest', 'lowest',
  'largest', 'smallest', 'most', 'least', 'first', 'last', 'not', 'without', 'distinct',
]);

/**
 * Weighted Jaccard over content tokens. Aggregation, ranking and negation
 * words and numbers weigh double: "top 5" and "top 10" must not collide.
 */
export class TokenOverlapSimilarity implements SimilarityStrategy {
  readonly name = 'token';

  async score(query: string, candidates: readonly string[]): Promise<number[]> {
    const queryTokens = new Set(contentTokens(query));
    return candidates.map((candidate) => this.compare(queryTokens, new Set(contentTokens(candidate))));
  }

  private weight(token: string): number {
    return HEAVY_TOKENS.has(token) || /^\d+$/.test(token) ? 2 : 1;
  }

  private compare(a: ReadonlySet<string>, b: ReadonlySet<string>): number {
    if (a.size === 0 && b.size === 0) return 1;
    let shared = 0;
    let union = 0;
    for (const token of new Set([...a, ...b])) {
      const weight = this.weight(token);
      union += weight;
      if (a.has(token) && b.has(token)) shared += weight;
    }
    return union === 0 ? 0 : shared / union;
  }
}

export interface EmbeddingSimilarityOptions {
  model: EmbeddingModel<string>;
  /** Bound on remembered embeddings. */
  maxCached?: number;
}

/**
 * Cosine similarity between embeddings from an ai SDK embedding model.
 * Embeddings are remembered per text so candidates are embedded once.
 */
export class EmbeddingSimilarity implements SimilarityStrategy {
  readonly name = 'embedding';
  private model: EmbeddingModel<string>;
  private maxCached: number;
  private embeddings = new Map<string, number[]>();

  constructor(options: EmbeddingSimilarityOptions) {
    this.model = options.model;
    this.maxCached = options.maxCached ?? 2000;
  }

  async score(query: string, candidates: readonly string[]): Promise<number[]> {
    if (candidates.length === 0) return [];
    const missing = [...new Set([query, ...candidates])].filter((text) => !this.embeddings.has(text));

    if (missing.length > 0) {
      try {
        const { embeddings } = await embedMany({ model: this.model, values: missing });
        missing.forEach((text, i) => this.remember(text, embeddings[i]));
      } catch (error) {
        throw new LLMError(`Embedding request failed: ${error instanceof Error ? error.message : String(error)}`, undefined, {
          cause: error,
        });
      }
    }

    const queryEmbedding = this.embeddings.get(query) ?? [];
    return candidates.map((candidate) => {
      const embedding = this.embeddings.get(candidate);
      return embedding && queryEmbedding.length > 0 ? cosineSimilarity(queryEmbedding, embedding) : 0;
    });
  }

  private remember(text: string, embedding: number[]): void {
    if (this.embeddings.size >= this.maxCached) {
      const oldest = this.embeddings.keys().next();
      if (!oldest.done) this.embeddings.delete(oldest.value);
    }
    this.embeddings.set(text, embedding);
  }
}

/**
 * Load an OpenAI embedding model lazily, passing the API key directly.
 */
export async function loadOpenAIEmbeddingModel(model: string, apiKey: string): Promise<EmbeddingModel<string>> {
  const { createOpenAI } = await import('@ai-sdk/openai');
  const openai = createOpenAI({ apiKey });
  return openai.textEmbeddingModel(model);
}
