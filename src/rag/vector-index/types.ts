// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Vector Index
 *
 * Contract shared by every index backend, plus the validation and
 * ordering helpers they all use.
 */

import { ConfigurationError, DimensionMismatchError } from '../errors.js';
import type { EmbeddingVector, IndexEntry, Metadata, SearchHit } from '../types.js';
import { cosineSimilarity, dotProduct } from '../../utils/vector.js';

/**
 * Similarity metric, fixed per index instance.
 */
export type SimilarityMetric = 'cosine' | 'dot';

/**
 * Stores (vector, passage, metadata) entries keyed by chunk id.
 *
 * Every mutation is atomic: a search never sees half of an upsert or
 * delete call.
 */
export interface VectorIndex {
  /** Length every stored and query vector must have */
  readonly dimensions: number;
  readonly metric: SimilarityMetric;

  /**
   * Counter bumped by every mutation; lets caches detect stale results.
   */
  getRevision(): number;

  /**
   * Insert or replace entries by chunk id.
   * Rejects the whole call with DimensionMismatchError if any vector has
   * the wrong length.
   */
  upsert(entries: IndexEntry[]): Promise<void>;

  /**
   * Up to `topK` hits ordered by non-increasing score, ties by chunk id.
   */
  search(query: EmbeddingVector, topK: number): Promise<SearchHit[]>;

  /**
   * Remove entries. Unknown ids are ignored.
   * @returns number of entries removed
   */
  delete(chunkIds: string[]): Promise<number>;

  get(chunkId: string): Promise<IndexEntry | undefined>;

  size(): Promise<number>;

  clear(): Promise<void>;

  /** Write the index state to durable storage */
  persist(path: string): Promise<void>;

  /** Replace the index state with one written by `persist` */
  restore(path: string): Promise<void>;
}

/**
 * Score two vectors with the given metric.
 */
export function similarity(metric: SimilarityMetric, a: number[], b: number[]): number {
  return metric === 'dot' ? dotProduct(a, b) : cosineSimilarity(a, b);
}

/**
 * Order hits by descending score, then ascending chunk id.
 */
export function compareHits(a: SearchHit, b: SearchHit): number {
  if (b.score !== a.score) return b.score - a.score;
  return a.chunkId < b.chunkId ? -1 : a.chunkId > b.chunkId ? 1 : 0;
}

export function assertTopK(topK: number): void {
  if (!Number.isInteger(topK) || topK <= 0) {
    throw new ConfigurationError(`topK must be a positive integer, got ${topK}`);
  }
}

export function assertVector(vector: EmbeddingVector, dimensions: number, context: string): void {
  if (vector.length !== dimensions) {
    throw new DimensionMismatchError(dimensions, vector.length, context);
  }
  if (vector.some((x) => typeof x !== 'number' || !Number.isFinite(x))) {
    throw new ConfigurationError(`${context} contains a non-finite component`);
  }
}

/**
 * Check a whole upsert batch before any of it is applied.
 */
export function assertEntries(entries: IndexEntry[], dimensions: number): void {
  for (const entry of entries) {
    if (typeof entry.chunkId !== 'string' || entry.chunkId === '') {
      throw new ConfigurationError('Index entries need a non-empty chunkId');
    }
    assertVector(entry.vector, dimensions, `entry ${entry.chunkId}`);
  }
}

/**
 * Copy an entry so later caller mutations cannot reach the index.
 */
export function cloneEntry(entry: IndexEntry): IndexEntry {
  return {
    chunkId: entry.chunkId,
    vector: [...entry.vector],
    text: entry.text,
    metadata: { ...entry.metadata },
  };
}

/**
 * Read a metadata object from untrusted storage, keeping scalar values only.
 */
export function readMetadata(value: unknown): Metadata {
  const metadata: Metadata = {};
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return metadata;
  }
  for (const [key, item] of Object.entries(value)) {
    if (typeof item === 'string' || typeof item === 'number' || typeof item === 'boolean') {
      metadata[key] = item;
    }
  }
  return metadata;
}
