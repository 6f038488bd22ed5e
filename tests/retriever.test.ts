// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { CachedRetriever, Retriever, capPerDocument, formatResults, matchesFilters } from '../src/rag/retriever.js';
import { MemoryVectorIndex } from '../src/rag/vector-index/memory.js';
import type { Embedder } from '../src/rag/embeddings/base.js';
import { CancelledError, ConfigurationError, RetrievalError } from '../src/rag/errors.js';
import type { IndexEntry, Metadata, RetrievalResult } from '../src/rag/types.js';

const QUERY_VECTOR = [1, 0];

function stubEmbedder(embed: (text: string) => Promise<number[]> = async () => QUERY_VECTOR) {
  const embedOne = vi.fn(embed);
  const embedder: Embedder = {
    getName: () => 'Stub',
    getModel: () => 'stub-1',
    getDimensions: () => 2,
    embed: async (texts) => Promise.all(texts.map((t) => embedOne(t))),
    embedOne,
  };
  return { embedder, embedOne };
}

function entry(chunkId: string, vector: number[], metadata: Metadata): IndexEntry {
  return { chunkId, vector, text: `passage ${chunkId}`, metadata };
}

// Cosine scores against [1, 0]: c1 1, c2 0.96, c3 0.8, c4 0.6, c5 0.28, c6 0
const ENTRIES = [
  entry('c1', [1, 0], { documentId: 'A', lang: 'en', page: 1 }),
  entry('c2', [0.96, 0.28], { documentId: 'A', lang: 'de' }),
  entry('c3', [0.8, 0.6], { documentId: 'B', lang: 'en' }),
  entry('c4', [0.6, 0.8], { documentId: 'B', lang: 'de' }),
  entry('c5', [0.28, 0.96], { documentId: 'C', lang: 'de' }),
  entry('c6', [0, 1], { documentId: 'C', lang: 'en' }),
];

describe('Retriever', () => {
  let index: MemoryVectorIndex;

  beforeEach(async () => {
    index = new MemoryVectorIndex(2);
    await index.upsert(ENTRIES);
  });

  it('returns the top-k hits with ranks', async () => {
    const { embedder } = stubEmbedder();
    const retriever = new Retriever(embedder, index);

    const results = await retriever.retrieve('what is c1', 3);

    expect(results.map((r) => [r.chunkId, r.rank])).toEqual([
      ['c1', 0],
      ['c2', 1],
      ['c3', 2],
    ]);
    expect(results[0]).toMatchObject({ text: 'passage c1', metadata: { documentId: 'A', lang: 'en', page: 1 } });
    expect(results[0].score).toBeCloseTo(1, 10);
  });

  it('searches top-k deep without filters', async () => {
    const { embedder } = stubEmbedder();
    const search = vi.spyOn(index, 'search');

    await new Retriever(embedder, index).retrieve('q', 3);

    expect(search).toHaveBeenCalledWith(QUERY_VECTOR, 3);
  });

  it('searches deeper when filters are supplied', async () => {
    const { embedder } = stubEmbedder();
    const search = vi.spyOn(index, 'search');

    const results = await new Retriever(embedder, index).retrieve('q', 2, { lang: 'de' });

    expect(search).toHaveBeenCalledWith(QUERY_VECTOR, 8);
    expect(results.map((r) => [r.chunkId, r.rank])).toEqual([
      ['c2', 0],
      ['c4', 1],
    ]);
  });

  it('only filters the candidates the search returned', async () => {
    const { embedder } = stubEmbedder();
    const retriever = new Retriever(embedder, index, { fetchMultiplier: 1 });

    const results = await retriever.retrieve('q', 2, { lang: 'de' });

    expect(results.map((r) => r.chunkId)).toEqual(['c2']);
  });

  it('matches filter values by type as well as value', async () => {
    const { embedder } = stubEmbedder();
    const retriever = new Retriever(embedder, index);

    expect(await retriever.retrieve('q', 5, { page: '1' })).toEqual([]);
    expect((await retriever.retrieve('q', 5, { page: 1 })).map((r) => r.chunkId)).toEqual(['c1']);
  });

  it('treats an empty filter object as no filter', async () => {
    const { embedder } = stubEmbedder();
    const search = vi.spyOn(index, 'search');

    await new Retriever(embedder, index).retrieve('q', 2, {});

    expect(search).toHaveBeenCalledWith(QUERY_VECTOR, 2);
  });

  it('drops hits below the score floor', async () => {
    const { embedder } = stubEmbedder();
    const retriever = new Retriever(embedder, index, { minScore: 0.7 });

    const results = await retriever.retrieve('q', 6);

    expect(results.map((r) => r.chunkId)).toEqual(['c1', 'c2', 'c3']);
  });

  it('caps the chunks taken from one document', async () => {
    const { embedder } = stubEmbedder();
    const retriever = new Retriever(embedder, index, { maxChunksPerDocument: 1 });

    const results = await retriever.retrieve('q', 4);

    expect(results.map((r) => [r.chunkId, r.rank])).toEqual([
      ['c1', 0],
      ['c3', 1],
    ]);
  });

  it('caps within the filtered candidates', async () => {
    const { embedder } = stubEmbedder();
    const retriever = new Retriever(embedder, index, { maxChunksPerDocument: 1 });

    const results = await retriever.retrieve('q', 3, { lang: 'de' });

    expect(results.map((r) => r.chunkId)).toEqual(['c2', 'c4', 'c5']);
  });

  it('returns an empty list for an empty index', async () => {
    const { embedder } = stubEmbedder();

    expect(await new Retriever(embedder, new MemoryVectorIndex(2)).retrieve('q', 5)).toEqual([]);
  });

  it('rejects a non-positive topK', async () => {
    const { embedder, embedOne } = stubEmbedder();

    await expect(new Retriever(embedder, index).retrieve('q', 0)).rejects.toThrow(ConfigurationError);
    expect(embedOne).not.toHaveBeenCalled();
  });

  it('rejects a fetch multiplier below one', () => {
    const { embedder } = stubEmbedder();

    expect(() => new Retriever(embedder, index, { fetchMultiplier: 0 })).toThrow(ConfigurationError);
  });

  it('wraps embedding failures with the query and stage', async () => {
    const { embedder } = stubEmbedder(async () => {
      throw new Error('offline');
    });

    const error = await new Retriever(embedder, index).retrieve('where is it', 2).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RetrievalError);
    expect(error).toMatchObject({
      query: 'where is it',
      stage: 'embed',
      message: 'Retrieval failed at embed stage for query "where is it": offline',
    });
  });

  it('wraps search failures with the search stage', async () => {
    const { embedder } = stubEmbedder(async () => [1, 0, 0]);

    const error = await new Retriever(embedder, index).retrieve('q', 2).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RetrievalError);
    expect(error).toMatchObject({ stage: 'search' });
  });

  it('throws CancelledError for an aborted signal', async () => {
    const { embedder, embedOne } = stubEmbedder();
    const controller = new AbortController();
    controller.abort();

    await expect(
      new Retriever(embedder, index).retrieve('q', 2, undefined, { signal: controller.signal })
    ).rejects.toThrow(CancelledError);
    expect(embedOne).not.toHaveBeenCalled();
  });

  it('passes cancellation from the embedder through unwrapped', async () => {
    const { embedder } = stubEmbedder(async () => {
      throw new CancelledError('embedding');
    });

    await expect(new Retriever(embedder, index).retrieve('q', 2)).rejects.toThrow(CancelledError);
  });
});

describe('matchesFilters', () => {
  const hit = { chunkId: 'x', score: 1, text: '', metadata: { lang: 'en', page: 2 } };

  it('requires every key to match', () => {
    expect(matchesFilters(hit, { lang: 'en', page: 2 })).toBe(true);
    expect(matchesFilters(hit, { lang: 'en', page: 3 })).toBe(false);
  });

  it('fails for keys the metadata lacks', () => {
    expect(matchesFilters(hit, { author: 'kim' })).toBe(false);
  });
});

describe('capPerDocument', () => {
  it('counts hits without a document id separately', () => {
    const hits = [
      { chunkId: 'a', score: 1, text: '', metadata: {} },
      { chunkId: 'b', score: 0.9, text: '', metadata: {} },
    ];

    expect(capPerDocument(hits, 1).map((h) => h.chunkId)).toEqual(['a', 'b']);
  });
});

describe('CachedRetriever', () => {
  let index: MemoryVectorIndex;

  beforeEach(async () => {
    index = new MemoryVectorIndex(2);
    await index.upsert(ENTRIES);
  });

  function setup() {
    const { embedder, embedOne } = stubEmbedder();
    const retriever = new CachedRetriever(new Retriever(embedder, index), index);
    return { retriever, embedOne };
  }

  it('serves a repeated query from the cache', async () => {
    const { retriever, embedOne } = setup();

    const first = await retriever.retrieve('q', 2);
    const second = await retriever.retrieve('q', 2);

    expect(second).toEqual(first);
    expect(embedOne).toHaveBeenCalledTimes(1);
    expect(retriever.getStats().hits).toBe(1);
  });

  it('ignores the order of filter keys', async () => {
    const { retriever, embedOne } = setup();

    await retriever.retrieve('q', 2, { lang: 'de', documentId: 'B' });
    await retriever.retrieve('q', 2, { documentId: 'B', lang: 'de' });

    expect(embedOne).toHaveBeenCalledTimes(1);
  });

  it('keys on top-k', async () => {
    const { retriever, embedOne } = setup();

    await retriever.retrieve('q', 2);
    await retriever.retrieve('q', 3);

    expect(embedOne).toHaveBeenCalledTimes(2);
  });

  it('misses after the index changes', async () => {
    const { retriever, embedOne } = setup();

    await retriever.retrieve('q', 2);
    await index.delete(['c1']);
    const results = await retriever.retrieve('q', 2);

    expect(embedOne).toHaveBeenCalledTimes(2);
    expect(results.map((r) => r.chunkId)).toEqual(['c2', 'c3']);
  });

  it('returns copies of cached results', async () => {
    const { retriever } = setup();

    const first = await retriever.retrieve('q', 1);
    first[0].metadata.lang = 'changed';
    const second = await retriever.retrieve('q', 1);

    expect(second[0].metadata.lang).toBe('en');
  });
});

describe('formatResults', () => {
  it('reports when nothing was found', () => {
    expect(formatResults([])).toBe('No relevant passages found.');
  });

  it('lists results with source and match percentage', () => {
    const results: RetrievalResult[] = [
      {
        chunkId: 'c1',
        text: 'line one\nline two',
        metadata: { sourceUri: 'docs/a.md' },
        score: 0.876,
        rank: 0,
      },
    ];

    expect(formatResults(results)).toBe(
      'Found 1 relevant passages:\n\n1. docs/a.md (88% match)\n   line one\n   line two\n'
    );
  });

  it('falls back to the chunk id and truncates long passages', () => {
    const results: RetrievalResult[] = [
      { chunkId: 'c9', text: 'x'.repeat(301), metadata: {}, score: 0.5, rank: 1 },
    ];

    expect(formatResults(results)).toBe(
      `Found 1 relevant passages:\n\n2. c9 (50% match)\n   ${'x'.repeat(300)} ...\n`
    );
  });
});
