// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Base Embedding Provider
 *
 * The Embedder capability and the abstract class that concrete providers
 * extend. The base class owns batching, cancellation and output checks so
 * every provider honours the same contract: one vector per input, same
 * order, fixed dimension, and all-or-nothing failure.
 */

import { logger } from '../../logger.js';
import { abortable, throwIfAborted } from '../../utils/abort.js';
import { CancelledError, ConfigurationError, DimensionMismatchError, EmbeddingError, toError } from '../errors.js';
import type { EmbeddingVector } from '../types.js';

/**
 * Options for a single embed call.
 */
export interface EmbedOptions {
  /** Aborts in-flight provider calls with CancelledError */
  signal?: AbortSignal;
}

/**
 * Maps texts to fixed-length vectors.
 */
export interface Embedder {
  /** Provider name (e.g., "OpenAI", "Ollama") */
  getName(): string;
  /** Model identifier */
  getModel(): string;
  /** Length of every vector this embedder returns */
  getDimensions(): number;
  /**
   * Embed texts. Resolves to exactly one vector per text in input order,
   * or rejects for the whole call.
   */
  embed(texts: string[], options?: EmbedOptions): Promise<EmbeddingVector[]>;
  /** Embed a single text (a one-item batch) */
  embedOne(text: string, options?: EmbedOptions): Promise<EmbeddingVector>;
}

export interface BaseEmbeddingProviderOptions {
  /** Maximum texts sent to the provider per request */
  batchSize?: number;
}

/**
 * The one vector of a single-input embed() call.
 */
export function singleEmbedding(embeddings: EmbeddingVector[], provider: string): EmbeddingVector {
  if (embeddings.length !== 1) {
    throw new EmbeddingError(`${provider} returned ${embeddings.length} embeddings for 1 input`, [0], provider);
  }
  return embeddings[0];
}

/**
 * Abstract base class for embedding providers.
 */
export abstract class BaseEmbeddingProvider implements Embedder {
  protected readonly batchSize: number;

  constructor(options: BaseEmbeddingProviderOptions = {}) {
    this.batchSize = Math.max(1, options.batchSize ?? 100);
  }

  abstract getName(): string;

  abstract getModel(): string;

  abstract getDimensions(): number;

  /**
   * Check if the provider is available and properly configured.
   */
  abstract isAvailable(): Promise<boolean>;

  /**
   * Embed one provider batch. Implementations may throw EmbeddingError
   * with indices relative to `texts`; any other error fails the batch.
   */
  protected abstract embedBatch(texts: string[], signal?: AbortSignal): Promise<number[][]>;

  async embed(texts: string[], options: EmbedOptions = {}): Promise<EmbeddingVector[]> {
    const { signal } = options;
    if (texts.length === 0) return [];
    throwIfAborted(signal, 'embedding');

    const embeddings: EmbeddingVector[] = [];

    for (let offset = 0; offset < texts.length; offset += this.batchSize) {
      const batch = texts.slice(offset, offset + this.batchSize);
      const started = Date.now();

      let vectors: number[][];
      try {
        vectors = await abortable(this.embedBatch(batch, signal), signal, 'embedding');
      } catch (error) {
        throw this.toBatchError(error, offset, batch.length, signal);
      }

      this.checkBatch(vectors, batch.length, offset);
      logger.embeddingBatch(this.getName(), this.getModel(), batch.length, Date.now() - started);
      embeddings.push(...vectors);
    }

    return embeddings;
  }

  async embedOne(text: string, options: EmbedOptions = {}): Promise<EmbeddingVector> {
    return singleEmbedding(await this.embed([text], options), this.getName());
  }

  /**
   * Map a provider failure onto the caller's indices.
   */
  private toBatchError(
    error: unknown,
    offset: number,
    size: number,
    signal: AbortSignal | undefined
  ): Error {
    if (error instanceof CancelledError) return error;
    if (signal?.aborted) return new CancelledError('embedding');
    if (error instanceof DimensionMismatchError) return error;
    // Missing keys and bad settings are fatal, never a retryable batch failure
    if (error instanceof ConfigurationError) return error;

    if (error instanceof EmbeddingError) {
      return new EmbeddingError(
        error.message,
        error.failedIndices.map((i) => i + offset),
        this.getName(),
        { cause: error.cause ?? error }
      );
    }

    const cause = toError(error);
    return new EmbeddingError(
      `${this.getName()} embedding failed for inputs ${offset}-${offset + size - 1}: ${cause.message}`,
      range(offset, size),
      this.getName(),
      { cause }
    );
  }

  /**
   * Reject short, long, malformed or wrongly sized provider output.
   */
  private checkBatch(vectors: number[][], expected: number, offset: number): void {
    if (!Array.isArray(vectors) || vectors.length !== expected) {
      const got = Array.isArray(vectors) ? vectors.length : 0;
      throw new EmbeddingError(
        `${this.getName()} returned ${got} embeddings for ${expected} inputs`,
        range(offset, expected),
        this.getName()
      );
    }

    const dimensions = this.getDimensions();
    vectors.forEach((vector, i) => {
      if (!Array.isArray(vector) || vector.some((x) => typeof x !== 'number' || !Number.isFinite(x))) {
        throw new EmbeddingError(
          `${this.getName()} returned a malformed embedding for input ${offset + i}`,
          [offset + i],
          this.getName()
        );
      }
      if (vector.length !== dimensions) {
        throw new DimensionMismatchError(dimensions, vector.length, `${this.getName()} embedding of input ${offset + i}`);
      }
    });
  }
}

function range(start: number, count: number): number[] {
  return Array.from({ length: count }, (_, i) => start + i);
}
