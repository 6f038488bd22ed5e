// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { OpenAIEmbeddingProvider } from '../src/rag/embeddings/openai.js';
import { OllamaEmbeddingProvider } from '../src/rag/embeddings/ollama.js';
import { HashingEmbeddingProvider, fnv1a } from '../src/rag/embeddings/hashing.js';
import { BaseEmbeddingProvider, singleEmbedding } from '../src/rag/embeddings/base.js';
import type { Embedder } from '../src/rag/embeddings/base.js';
import { CachedEmbeddingProvider } from '../src/rag/embeddings/cache.js';
import {
  createEmbedder,
  createEmbeddingProvider,
  detectAvailableProviders,
} from '../src/rag/embeddings/index.js';
import { CancelledError, ConfigurationError, DimensionMismatchError, EmbeddingError } from '../src/rag/errors.js';
import { DEFAULT_RAG_CONFIG } from '../src/config/types.js';
import { cosineSimilarity, vectorNorm } from '../src/utils/vector.js';

const { mockCreate } = vi.hoisted(() => ({ mockCreate: vi.fn() }));

// Mock OpenAI client
vi.mock('openai', () => {
  const OpenAI = vi.fn(() => ({
    embeddings: { create: mockCreate },
  }));

  return { default: OpenAI, OpenAI };
});

// Mock fetch for Ollama
const mockFetch = vi.fn();
global.fetch = mockFetch;

/**
 * Provider with scripted batch results, for testing the base class.
 */
class ScriptedProvider extends BaseEmbeddingProvider {
  calls: string[][] = [];

  constructor(
    private respond: (texts: string[]) => Promise<number[][]>,
    batchSize: number,
    private dimensions = 2
  ) {
    super({ batchSize });
  }

  getName(): string {
    return 'Scripted';
  }

  getModel(): string {
    return 'scripted-1';
  }

  getDimensions(): number {
    return this.dimensions;
  }

  async isAvailable(): Promise<boolean> {
    return true;
  }

  protected async embedBatch(texts: string[]): Promise<number[][]> {
    this.calls.push(texts);
    return this.respond(texts);
  }
}

describe('Embedding Providers', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  describe('OpenAIEmbeddingProvider', () => {
    it('creates provider with default model', () => {
      const provider = new OpenAIEmbeddingProvider();

      expect(provider.getName()).toBe('OpenAI');
      expect(provider.getModel()).toBe('text-embedding-3-small');
      expect(provider.getDimensions()).toBe(1536);
    });

    it('creates provider with custom model', () => {
      const provider = new OpenAIEmbeddingProvider('text-embedding-3-large');

      expect(provider.getModel()).toBe('text-embedding-3-large');
      expect(provider.getDimensions()).toBe(3072);
    });

    it('honours requested dimensions', () => {
      const provider = new OpenAIEmbeddingProvider('text-embedding-3-small', { dimensions: 256 });

      expect(provider.getDimensions()).toBe(256);
    });

    it('generates embeddings for multiple texts in index order', async () => {
      mockCreate.mockResolvedValue({
        data: [
          { index: 1, embedding: [0.3, 0.4] },
          { index: 0, embedding: [0.1, 0.2] },
        ],
      });

      const provider = new OpenAIEmbeddingProvider('text-embedding-3-small', {
        apiKey: 'test-api-key',
        dimensions: 2,
      });
      const result = await provider.embed(['text1', 'text2']);

      expect(result).toEqual([
        [0.1, 0.2],
        [0.3, 0.4],
      ]);
      expect(mockCreate).toHaveBeenCalledWith(
        { model: 'text-embedding-3-small', input: ['text1', 'text2'], dimensions: 2 },
        { signal: undefined }
      );
    });

    it('handles empty input', async () => {
      const provider = new OpenAIEmbeddingProvider('text-embedding-3-small', { apiKey: 'test-api-key' });
      const result = await provider.embed([]);

      expect(result).toEqual([]);
      expect(mockCreate).not.toHaveBeenCalled();
    });

    it('fails with a non-retryable ConfigurationError without an API key', async () => {
      const provider = new OpenAIEmbeddingProvider('text-embedding-3-small', {});

      const error = await provider.embed(['hello']).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ConfigurationError);
      expect(error).not.toBeInstanceOf(EmbeddingError);
      expect(error).toMatchObject({ message: 'OpenAI embeddings need an API key', retryable: false });
      expect(mockCreate).not.toHaveBeenCalled();
    });

    it('maps API failures to EmbeddingError for the whole batch', async () => {
      mockCreate.mockRejectedValue(new Error('rate limited'));
      const provider = new OpenAIEmbeddingProvider('text-embedding-3-small', { apiKey: 'test-api-key' });

      const error = await provider.embed(['a', 'b', 'c']).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(EmbeddingError);
      expect(error).toMatchObject({ failedIndices: [0, 1, 2], provider: 'OpenAI', retryable: true });
    });

    it('isAvailable returns false when API key is missing', async () => {
      const provider = new OpenAIEmbeddingProvider();

      expect(await provider.isAvailable()).toBe(false);
      expect(mockCreate).not.toHaveBeenCalled();
    });
  });

  describe('OllamaEmbeddingProvider', () => {
    it('creates provider with default model', () => {
      const provider = new OllamaEmbeddingProvider();

      expect(provider.getName()).toBe('Ollama');
      expect(provider.getModel()).toBe('nomic-embed-text');
      expect(provider.getDimensions()).toBe(768);
    });

    it('creates provider with custom model and URL', () => {
      const provider = new OllamaEmbeddingProvider('mxbai-embed-large', 'http://remote:11434');

      expect(provider.getModel()).toBe('mxbai-embed-large');
      expect(provider.getDimensions()).toBe(1024);
    });

    it('generates embeddings for single text', async () => {
      const mockEmbed = [0.1, 0.2, 0.3];
      mockFetch.mockResolvedValue({
        ok: true,
        json: () => Promise.resolve({ embedding: mockEmbed }),
      });

      const provider = new OllamaEmbeddingProvider('nomic-embed-text', 'http://localhost:11434', { dimensions: 3 });
      const result = await provider.embedOne('test text');

      expect(result).toEqual(mockEmbed);
      expect(mockFetch).toHaveBeenCalledWith(
        'http://localhost:11434/api/embeddings',
        expect.objectContaining({
          method: 'POST',
          body: JSON.stringify({ model: 'nomic-embed-text', prompt: 'test text' }),
        })
      );
    });

    it('generates embeddings for multiple texts', async () => {
      mockFetch.mockImplementation(async (_url: string, init: { body: string }) => {
        const { prompt } = JSON.parse(init.body);
        return { ok: true, json: async () => ({ embedding: prompt === 'text1' ? [1, 0] : [0, 1] }) };
      });

      const provider = new OllamaEmbeddingProvider('nomic-embed-text', 'http://localhost:11434', { dimensions: 2 });
      const result = await provider.embed(['text1', 'text2']);

      expect(result).toEqual([
        [1, 0],
        [0, 1],
      ]);
      expect(mockFetch).toHaveBeenCalledTimes(2);
    });

    it('handles API errors', async () => {
      mockFetch.mockResolvedValue({
        ok: false,
        status: 500,
        statusText: 'Internal Server Error',
      });

      const provider = new OllamaEmbeddingProvider();

      await expect(provider.embedOne('test')).rejects.toThrow('Ollama embedding request failed: 500 Internal Server Error');
    });

    it('rejects vectors of the wrong size', async () => {
      mockFetch.mockResolvedValue({
        ok: true,
        json: () => Promise.resolve({ embedding: [0.1, 0.2, 0.3] }),
      });

      const provider = new OllamaEmbeddingProvider();

      await expect(provider.embedOne('test')).rejects.toThrow(DimensionMismatchError);
    });

    it('is available when Ollama is running and model exists', async () => {
      mockFetch.mockResolvedValue({
        ok: true,
        json: () => Promise.resolve({
          models: [{ name: 'nomic-embed-text:latest' }],
        }),
      });

      const provider = new OllamaEmbeddingProvider();

      expect(await provider.isAvailable()).toBe(true);
      expect(mockFetch).toHaveBeenCalledWith('http://localhost:11434/api/tags', { method: 'GET' });
    });

    it('is not available when Ollama is not running', async () => {
      mockFetch.mockRejectedValue(new Error('Connection refused'));

      const provider = new OllamaEmbeddingProvider();

      expect(await provider.isAvailable()).toBe(false);
    });

    it('is not available when the model is not pulled', async () => {
      mockFetch.mockResolvedValue({
        ok: true,
        json: () => Promise.resolve({ models: [{ name: 'llama3.2:latest' }] }),
      });

      const provider = new OllamaEmbeddingProvider();

      expect(await provider.isAvailable()).toBe(false);
    });
  });

  describe('HashingEmbeddingProvider', () => {
    it('hashes with 32-bit FNV-1a', () => {
      expect(fnv1a('')).toBe(0x811c9dc5);
      expect(fnv1a('a')).toBe(0xe40c292c);
    });

    it('returns unit vectors of the configured size', async () => {
      const provider = new HashingEmbeddingProvider(64);
      const [vector] = await provider.embed(['Retrieval pipelines need chunks']);

      expect(vector).toHaveLength(64);
      expect(vectorNorm(vector)).toBeCloseTo(1, 10);
    });

    it('is deterministic and case-insensitive', () => {
      const provider = new HashingEmbeddingProvider(128);

      expect(provider.vectorize('Vector Index')).toEqual(provider.vectorize('vector index'));
    });

    it('scores shared vocabulary above unrelated text', () => {
      const provider = new HashingEmbeddingProvider(1024);
      const query = provider.vectorize('persist the vector index');

      const related = cosineSimilarity(query, provider.vectorize('the vector index can persist to disk'));
      const unrelated = cosineSimilarity(query, provider.vectorize('bake bread at home'));

      expect(related).toBeGreaterThan(unrelated);
    });

    it('embeds text without words as the zero vector', () => {
      const provider = new HashingEmbeddingProvider(8);

      expect(provider.vectorize('  ...  ')).toEqual(new Array(8).fill(0));
    });

    it('rejects a non-positive dimension', () => {
      expect(() => new HashingEmbeddingProvider(0)).toThrow(ConfigurationError);
    });
  });

  describe('BaseEmbeddingProvider', () => {
    it('splits input into batches and keeps order', async () => {
      const provider = new ScriptedProvider(async (texts) => texts.map((t) => [t.length, 1]), 2);

      const result = await provider.embed(['a', 'bb', 'ccc', 'dddd', 'eeeee']);

      expect(provider.calls).toEqual([['a', 'bb'], ['ccc', 'dddd'], ['eeeee']]);
      expect(result).toEqual([[1, 1], [2, 1], [3, 1], [4, 1], [5, 1]]);
    });

    it('reports failing indices relative to the whole call', async () => {
      let call = 0;
      const provider = new ScriptedProvider(async (texts) => {
        call++;
        if (call === 2) throw new EmbeddingError('bad input', [1], 'Scripted');
        return texts.map(() => [0, 1]);
      }, 2);

      const error = await provider.embed(['a', 'b', 'c', 'd']).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(EmbeddingError);
      expect(error).toMatchObject({ failedIndices: [3] });
    });

    it('fails the batch when the provider returns too few vectors', async () => {
      const provider = new ScriptedProvider(async () => [[0, 1]], 10);

      const error = await provider.embed(['a', 'b']).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(EmbeddingError);
      expect(error).toMatchObject({ failedIndices: [0, 1] });
    });

    it('rejects non-finite components', async () => {
      const provider = new ScriptedProvider(async () => [[0, 1], [Number.NaN, 1]], 10);

      const error = await provider.embed(['a', 'b']).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(EmbeddingError);
      expect(error).toMatchObject({ failedIndices: [1] });
    });

    it('passes configuration failures through without making them retryable', async () => {
      const provider = new ScriptedProvider(async () => {
        throw new ConfigurationError('Scripted needs a key');
      }, 10);

      const error = await provider.embed(['a', 'b']).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ConfigurationError);
      expect(error).toMatchObject({ message: 'Scripted needs a key', retryable: false });
    });

    it('takes exactly one vector for a single text', () => {
      expect(singleEmbedding([[0, 1]], 'Scripted')).toEqual([0, 1]);
      expect(() => singleEmbedding([], 'Scripted')).toThrow('Scripted returned 0 embeddings for 1 input');
      expect(() => singleEmbedding([[0, 1], [1, 0]], 'Scripted')).toThrow(EmbeddingError);
    });

    it('rejects vectors of the wrong dimension', async () => {
      const provider = new ScriptedProvider(async () => [[0, 1, 2]], 10);

      await expect(provider.embedOne('a')).rejects.toThrow('Dimension mismatch');
    });

    it('throws CancelledError for an already aborted signal', async () => {
      const provider = new ScriptedProvider(async (texts) => texts.map(() => [0, 1]), 10);
      const controller = new AbortController();
      controller.abort();

      await expect(provider.embed(['a'], { signal: controller.signal })).rejects.toThrow(CancelledError);
      expect(provider.calls).toEqual([]);
    });

    it('throws CancelledError when aborted mid-request', async () => {
      const controller = new AbortController();
      const provider = new ScriptedProvider(
        () => new Promise<number[][]>(() => {
          controller.abort();
        }),
        10
      );

      await expect(provider.embed(['a'], { signal: controller.signal })).rejects.toThrow(CancelledError);
    });
  });

  describe('CachedEmbeddingProvider', () => {
    it('embeds each distinct uncached text once', async () => {
      const inner = new ScriptedProvider(async (texts) => texts.map((t) => [t.length, 0]), 10);
      const cached = new CachedEmbeddingProvider(inner);

      const first = await cached.embed(['aa', 'b', 'aa']);
      const second = await cached.embed(['b', 'ccc']);

      expect(first).toEqual([[2, 0], [1, 0], [2, 0]]);
      expect(second).toEqual([[1, 0], [3, 0]]);
      expect(inner.calls).toEqual([['aa', 'b'], ['ccc']]);
      expect(cached.getStats()).toMatchObject({ size: 3, hits: 1 });
    });

    it('returns copies that callers cannot corrupt', async () => {
      const inner = new ScriptedProvider(async (texts) => texts.map(() => [1, 0]), 10);
      const cached = new CachedEmbeddingProvider(inner);

      const [vector] = await cached.embed(['x']);
      vector[0] = 99;

      expect(await cached.embedOne('x')).toEqual([1, 0]);
    });

    it('maps failed indices back to the caller positions', async () => {
      const inner = new ScriptedProvider(async () => {
        throw new EmbeddingError('second text rejected', [1], 'Scripted');
      }, 10);
      const cached = new CachedEmbeddingProvider(inner);

      const error = await cached.embed(['ok', 'bad', 'ok', 'bad']).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(EmbeddingError);
      expect(error).toMatchObject({ failedIndices: [1, 3] });
    });

    it('fails every position when the wrapped embedder returns too few vectors', async () => {
      const short: Embedder = {
        getName: () => 'Short',
        getModel: () => 'short-1',
        getDimensions: () => 2,
        embed: async () => [],
        embedOne: async () => [0, 1],
      };
      const cached = new CachedEmbeddingProvider(short);

      const error = await cached.embed(['a', 'b', 'a']).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(EmbeddingError);
      expect(error).toMatchObject({ message: 'Short returned 0 embeddings for 2 inputs', failedIndices: [0, 1, 2] });
      await expect(cached.embedOne('a')).rejects.toThrow(EmbeddingError);
      expect(cached.getStats().size).toBe(0);
    });

    it('delegates identity to the wrapped provider', () => {
      const cached = new CachedEmbeddingProvider(new HashingEmbeddingProvider(32));

      expect(cached.getName()).toBe('Hashing');
      expect(cached.getModel()).toBe('bag-of-words-fnv1a');
      expect(cached.getDimensions()).toBe(32);
    });
  });

  describe('createEmbeddingProvider', () => {
    it('creates the hashing provider by default', () => {
      const provider = createEmbeddingProvider(DEFAULT_RAG_CONFIG);

      expect(provider).toBeInstanceOf(HashingEmbeddingProvider);
      expect(provider.getDimensions()).toBe(512);
    });

    it('creates OpenAI provider when configured', () => {
      const provider = createEmbeddingProvider({
        ...DEFAULT_RAG_CONFIG,
        embeddingProvider: 'openai',
        openaiModel: 'text-embedding-3-large',
      });

      expect(provider).toBeInstanceOf(OpenAIEmbeddingProvider);
      expect(provider.getModel()).toBe('text-embedding-3-large');
    });

    it('creates Ollama provider when configured', () => {
      const provider = createEmbeddingProvider({
        ...DEFAULT_RAG_CONFIG,
        embeddingProvider: 'ollama',
        ollamaModel: 'all-minilm',
      });

      expect(provider).toBeInstanceOf(OllamaEmbeddingProvider);
      expect(provider.getDimensions()).toBe(384);
    });

    it('passes the configured dimension through', () => {
      const provider = createEmbeddingProvider({ ...DEFAULT_RAG_CONFIG, embeddingDimensions: 96 });

      expect(provider.getDimensions()).toBe(96);
    });

    it('wraps the provider in a cache unless disabled', () => {
      expect(createEmbedder(DEFAULT_RAG_CONFIG)).toBeInstanceOf(CachedEmbeddingProvider);
      expect(createEmbedder({ ...DEFAULT_RAG_CONFIG, embeddingCacheSize: 0 })).toBeInstanceOf(HashingEmbeddingProvider);
    });
  });

  describe('detectAvailableProviders', () => {
    it('reports Ollama availability and OpenAI without a key as unavailable', async () => {
      mockFetch.mockResolvedValue({
        ok: true,
        json: () => Promise.resolve({ models: [{ name: 'nomic-embed-text' }] }),
      });

      const result = await detectAvailableProviders(DEFAULT_RAG_CONFIG);

      expect(result).toEqual({ openai: false, ollama: true, hashing: true });
    });
  });
});
