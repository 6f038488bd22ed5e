// Copyright 2026 Layne Penney
// SPDX-License-Identifier: Apache-2.0

/**
 * OpenAI Embedding Provider
 *
 * Uses OpenAI's text-embedding models for generating embeddings.
 */

import OpenAI from 'openai';
import { BaseEmbeddingProvider } from './base.js';
import { ConfigurationError } from '../errors.js';

/**
 * Model dimensions for OpenAI embedding models.
 */
const MODEL_DIMENSIONS: Record<string, number> = {
  'text-embedding-3-small': 1536,
  'text-embedding-3-large': 3072,
  'text-embedding-ada-002': 1536,
};

export interface OpenAIEmbeddingOptions {
  apiKey?: string;
  baseUrl?: string;
  /** Requested output size; text-embedding-3 models can shorten their vectors */
  dimensions?: number;
  /** Inputs per request (OpenAI caps batch size) */
  batchSize?: number;
}

/**
 * OpenAI embedding provider implementation.
 */
export class OpenAIEmbeddingProvider extends BaseEmbeddingProvider {
  private client: OpenAI | null = null;
  private model: string;
  private options: OpenAIEmbeddingOptions;

  constructor(model: string = 'text-embedding-3-small', options: OpenAIEmbeddingOptions = {}) {
    super({ batchSize: options.batchSize ?? 100 });
    this.model = model;
    this.options = options;
  }

  getName(): string {
    return 'OpenAI';
  }

  getModel(): string {
    return this.model;
  }

  getDimensions(): number {
    return this.options.dimensions ?? MODEL_DIMENSIONS[this.model] ?? 1536;
  }

  private getClient(): OpenAI {
    if (!this.client) {
      if (!this.options.apiKey) {
        throw new ConfigurationError('OpenAI embeddings need an API key', [
          'Set OPENAI_API_KEY or openaiApiKey in the config file',
        ]);
      }
      this.client = new OpenAI({ apiKey: this.options.apiKey, baseURL: this.options.baseUrl });
    }
    return this.client;
  }

  protected async embedBatch(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    const response = await this.getClient().embeddings.create(
      {
        model: this.model,
        input: texts,
        ...(this.options.dimensions !== undefined ? { dimensions: this.options.dimensions } : {}),
      },
      { signal }
    );

    // Sort by index to maintain order
    const sorted = [...response.data].sort((a, b) => a.index - b.index);
    return sorted.map((d) => d.embedding);
  }

  async isAvailable(): Promise<boolean> {
    if (!this.options.apiKey) {
      return false;
    }

    try {
      // Make a minimal request to verify the API key works
      await this.getClient().embeddings.create({
        model: this.model,
        input: 'test',
      });
      return true;
    } catch {
      return false;
    }
  }
}
