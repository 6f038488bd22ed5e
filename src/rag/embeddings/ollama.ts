// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Ollama Embedding Provider
 *
 * Uses Ollama's local embedding models for generating embeddings.
 */

import { BaseEmbeddingProvider } from './base.js';
import { EmbeddingError, toError } from '../errors.js';
import { processInParallel } from '../../utils/semaphore.js';

/**
 * Model dimensions for common Ollama embedding models.
 */
const MODEL_DIMENSIONS: Record<string, number> = {
  'nomic-embed-text': 768,
  'mxbai-embed-large': 1024,
  'all-minilm': 384,
  'snowflake-arctic-embed': 1024,
};

/** Concurrent requests per batch; /api/embeddings takes one prompt at a time */
const PARALLEL_REQUESTS = 5;

/**
 * Read the embedding out of an Ollama /api/embeddings response body.
 */
function readEmbedding(data: unknown): number[] | null {
  if (typeof data !== 'object' || data === null || !('embedding' in data)) return null;
  const { embedding } = data;
  if (!Array.isArray(embedding)) return null;
  const vector: number[] = [];
  for (const value of embedding) {
    if (typeof value !== 'number') return null;
    vector.push(value);
  }
  return vector;
}

/**
 * Model names listed by /api/tags.
 */
function readModelNames(data: unknown): string[] {
  if (typeof data !== 'object' || data === null || !('models' in data) || !Array.isArray(data.models)) {
    return [];
  }
  const names: string[] = [];
  for (const model of data.models) {
    if (typeof model === 'object' && model !== null && 'name' in model && typeof model.name === 'string') {
      names.push(model.name);
    }
  }
  return names;
}

export interface OllamaEmbeddingOptions {
  /** Output size when the model is not in the known list */
  dimensions?: number;
  batchSize?: number;
}

/**
 * Ollama embedding provider implementation.
 */
export class OllamaEmbeddingProvider extends BaseEmbeddingProvider {
  private baseUrl: string;
  private model: string;
  private dimensions: number;

  constructor(
    model: string = 'nomic-embed-text',
    baseUrl: string = 'http://localhost:11434',
    options: OllamaEmbeddingOptions = {}
  ) {
    super({ batchSize: options.batchSize ?? 32 });
    this.model = model;
    this.baseUrl = baseUrl.replace(/\/+$/, '');
    this.dimensions = options.dimensions ?? MODEL_DIMENSIONS[model] ?? 768;
  }

  getName(): string {
    return 'Ollama';
  }

  getModel(): string {
    return this.model;
  }

  getDimensions(): number {
    return this.dimensions;
  }

  /**
   * Embed a single text and return its embedding.
   */
  private async embedSingle(text: string, signal?: AbortSignal): Promise<number[]> {
    const response = await fetch(`${this.baseUrl}/api/embeddings`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({
        model: this.model,
        prompt: text,
      }),
      signal,
    });

    if (!response.ok) {
      throw new Error(
        `Ollama embedding request failed: ${response.status} ${response.statusText}`
      );
    }

    const embedding = readEmbedding(await response.json());
    if (!embedding) {
      throw new Error('Ollama response has no embedding');
    }
    return embedding;
  }

  protected async embedBatch(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    return processInParallel(
      texts,
      async (text, index) => {
        try {
          return await this.embedSingle(text, signal);
        } catch (error) {
          const cause = toError(error);
          throw new EmbeddingError(
            `Ollama embedding failed for input ${index}: ${cause.message}`,
            [index],
            this.getName(),
            { cause }
          );
        }
      },
      PARALLEL_REQUESTS
    );
  }

  async isAvailable(): Promise<boolean> {
    try {
      const response = await fetch(`${this.baseUrl}/api/tags`, {
        method: 'GET',
      });

      if (!response.ok) {
        return false;
      }

      // Check if the model is pulled
      const models = readModelNames(await response.json());
      return models.some(
        (name) => name === this.model || name.startsWith(`${this.model}:`)
      );
    } catch {
      return false;
    }
  }
}
