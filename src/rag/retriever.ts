/**
 * Retriever
 *
 * Embeds a query, searches the vector index, and ranks what comes back:
 * metadata filters, an optional score floor, and a per-document cap are
 * applied in score order before truncating to top-k.
 */

import { logger } from '../logger.js';
import { LRUCache } from '../utils/lru-cache.js';
import type { LRUCacheOptions } from '../utils/lru-cache.js';
import { throwIfAborted } from '../utils/abort.js';
import { CancelledError, ConfigurationError, RetrievalError, toError } from './errors.js';
import type { RetrievalStage } from './errors.js';
import type { Embedder } from './embeddings/base.js';
import { CHUNK_METADATA_KEYS } from './types.js';
import type { MetadataFilter, RetrievalResult, SearchHit } from './types.js';
import type { VectorIndex } from './vector-index/types.js';

export interface RetrieveOptions {
  signal?: AbortSignal;
}

/**
 * Anything that turns a query into ranked results.
 */
export interface ChunkRetriever {
  retrieve(
    query: string,
    topK: number,
    filters?: MetadataFilter,
    options?: RetrieveOptions
  ): Promise<RetrievalResult[]>;
}

export interface RetrieverOptions {
  /** Search depth multiplier used when filters are supplied (default: 4) */
  fetchMultiplier?: number;
  /** Keep at most this many chunks per document */
  maxChunksPerDocument?: number | null;
  /** Drop hits scoring below this */
  minScore?: number | null;
}

/**
 * Retriever over an embedder and a vector index.
 */
export class Retriever implements ChunkRetriever {
  private fetchMultiplier: number;
  private maxChunksPerDocument: number | null;
  private minScore: number | null;

  constructor(
    private embedder: Embedder,
    private index: VectorIndex,
    options: RetrieverOptions = {}
  ) {
    this.fetchMultiplier = options.fetchMultiplier ?? 4;
    this.maxChunksPerDocument = options.maxChunksPerDocument ?? null;
    this.minScore = options.minScore ?? null;

    if (!Number.isInteger(this.fetchMultiplier) || this.fetchMultiplier < 1) {
      throw new ConfigurationError(`fetchMultiplier must be an integer >= 1, got ${this.fetchMultiplier}`);
    }
    if (this.maxChunksPerDocument !== null && (!Number.isInteger(this.maxChunksPerDocument) || this.maxChunksPerDocument < 1)) {
      throw new ConfigurationError(`maxChunksPerDocument must be a positive integer, got ${this.maxChunksPerDocument}`);
    }
  }

  async retrieve(
    query: string,
    topK: number,
    filters?: MetadataFilter,
    options: RetrieveOptions = {}
  ): Promise<RetrievalResult[]> {
    if (!Number.isInteger(topK) || topK <= 0) {
      throw new ConfigurationError(`topK must be a positive integer, got ${topK}`);
    }
    const { signal } = options;
    const started = Date.now();
    const hasFilters = filters !== undefined && Object.keys(filters).length > 0;

    const vector = await this.stage(query, 'embed', signal, () =>
      this.embedder.embedOne(query, { signal })
    );
    const depth = hasFilters ? topK * this.fetchMultiplier : topK;
    const hits = await this.stage(query, 'search', signal, () => this.index.search(vector, depth));

    let ranked = hits;
    if (filters && hasFilters) {
      ranked = ranked.filter((hit) => matchesFilters(hit, filters));
    }
    if (this.minScore !== null) {
      const floor = this.minScore;
      ranked = ranked.filter((hit) => hit.score >= floor);
    }
    if (this.maxChunksPerDocument !== null) {
      ranked = capPerDocument(ranked, this.maxChunksPerDocument);
    }

    const results = ranked.slice(0, topK).map((hit, rank) => ({
      chunkId: hit.chunkId,
      text: hit.text,
      metadata: hit.metadata,
      score: hit.score,
      rank,
    }));

    logger.retrieval(query, hits.length, results.length, Date.now() - started);
    return results;
  }

  /**
   * Run one stage, surfacing failures as RetrievalError with the query
   * and stage attached. Cancellation passes through unwrapped.
   */
  private async stage<T>(
    query: string,
    stage: RetrievalStage,
    signal: AbortSignal | undefined,
    fn: () => Promise<T>
  ): Promise<T> {
    throwIfAborted(signal, `retrieval ${stage}`);
    try {
      return await fn();
    } catch (error) {
      if (error instanceof CancelledError) throw error;
      throw new RetrievalError(query, stage, toError(error));
    }
  }
}

/**
 * Exact-match test of every filter key against hit metadata.
 */
export function matchesFilters(hit: SearchHit, filters: MetadataFilter): boolean {
  return Object.entries(filters).every(([key, value]) => hit.metadata[key] === value);
}

/**
 * Keep the first `limit` hits of each document, preserving order.
 * Hits without a document id count as their own document.
 */
export function capPerDocument(hits: SearchHit[], limit: number): SearchHit[] {
  const counts = new Map<string, number>();
  return hits.filter((hit) => {
    const documentId = hit.metadata[CHUNK_METADATA_KEYS.documentId];
    const key = typeof documentId === 'string' ? documentId : `chunk:${hit.chunkId}`;
    const seen = counts.get(key) ?? 0;
    if (seen >= limit) return false;
    counts.set(key, seen + 1);
    return true;
  });
}

/**
 * Retriever decorator that caches results per exact query, top-k and
 * filters. Entries are keyed by the index revision, so any upsert or
 * delete makes earlier results unreachable.
 */
export class CachedRetriever implements ChunkRetriever {
  private cache: LRUCache<RetrievalResult[]>;

  constructor(
    private inner: ChunkRetriever,
    private index: Pick<VectorIndex, 'getRevision'>,
    options: LRUCacheOptions = {}
  ) {
    this.cache = new LRUCache<RetrievalResult[]>({ maxSize: 100, ttlMinutes: 5, ...options });
  }

  async retrieve(
    query: string,
    topK: number,
    filters?: MetadataFilter,
    options: RetrieveOptions = {}
  ): Promise<RetrievalResult[]> {
    const key = this.key(query, topK, filters);
    const cached = this.cache.get(key);
    if (cached) {
      logger.debug(`Retrieval cache hit for "${query.slice(0, 60)}"`);
      return cached.map(copyResult);
    }

    const results = await this.inner.retrieve(query, topK, filters, options);
    this.cache.set(key, results.map(copyResult));
    return results;
  }

  getStats(): { size: number; maxSize: number; hits: number; misses: number } {
    return this.cache.getStats();
  }

  clear(): void {
    this.cache.clear();
  }

  private key(query: string, topK: number, filters?: MetadataFilter): string {
    const filterKey = filters
      ? JSON.stringify(Object.entries(filters).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)))
      : '';
    return `${this.index.getRevision()}\u0000${topK}\u0000${filterKey}\u0000${query}`;
  }
}

function copyResult(result: RetrievalResult): RetrievalResult {
  return { ...result, metadata: { ...result.metadata } };
}

/**
 * Format results as a numbered list for terminal output.
 */
export function formatResults(results: RetrievalResult[]): string {
  if (results.length === 0) {
    return 'No relevant passages found.';
  }

  const lines: string[] = [`Found ${results.length} relevant passages:\n`];

  for (const result of results) {
    const source = result.metadata[CHUNK_METADATA_KEYS.sourceUri];
    const location = typeof source === 'string' ? source : result.chunkId;
    lines.push(`${result.rank + 1}. ${location} (${Math.round(result.score * 100)}% match)`);

    const text = result.text.length > 300 ? result.text.slice(0, 300) + ' ...' : result.text;
    lines.push(text.replace(/^/gm, '   '));
    lines.push('');
  }

  return lines.join('\n');
}
