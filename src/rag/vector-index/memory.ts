// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Memory Vector Index
 *
 * Exact brute-force index held in memory and persisted as a single JSON
 * file. Mutations run under a write lock and are applied synchronously
 * once validated, so concurrent searches see either the old or the new
 * state of an entry.
 */

import * as fs from 'fs';
import * as path from 'path';
import { logger } from '../../logger.js';
import { Semaphore } from '../../utils/semaphore.js';
import { ConfigurationError, DimensionMismatchError, IndexIOError, toError } from '../errors.js';
import type { EmbeddingVector, IndexEntry, SearchHit } from '../types.js';
import {
  assertEntries,
  assertTopK,
  assertVector,
  cloneEntry,
  compareHits,
  readMetadata,
  similarity,
} from './types.js';
import type { SimilarityMetric, VectorIndex } from './types.js';

/** Identifies files written by this index */
const FORMAT = 'groundwork-memory-index';
const FORMAT_VERSION = 1;

/**
 * On-disk layout.
 */
interface PersistedIndex {
  format: typeof FORMAT;
  version: number;
  dimensions: number;
  metric: SimilarityMetric;
  entries: IndexEntry[];
}

export class MemoryVectorIndex implements VectorIndex {
  readonly dimensions: number;
  readonly metric: SimilarityMetric;
  private entries = new Map<string, IndexEntry>();
  private writeLock = new Semaphore(1);
  private revision = 0;

  constructor(dimensions: number, metric: SimilarityMetric = 'cosine') {
    if (!Number.isInteger(dimensions) || dimensions <= 0) {
      throw new ConfigurationError(`Index dimensions must be a positive integer, got ${dimensions}`);
    }
    this.dimensions = dimensions;
    this.metric = metric;
  }

  /**
   * Open a persisted index, taking dimensions and metric from the file.
   */
  static async fromFile(filePath: string): Promise<MemoryVectorIndex> {
    const data = await readPersisted(filePath);
    const index = new MemoryVectorIndex(data.dimensions, data.metric);
    index.load(data, filePath);
    return index;
  }

  getRevision(): number {
    return this.revision;
  }

  async upsert(entries: IndexEntry[]): Promise<void> {
    if (entries.length === 0) return;
    assertEntries(entries, this.dimensions);
    const copies = entries.map(cloneEntry);

    await this.writeLock.run(async () => {
      for (const entry of copies) {
        this.entries.set(entry.chunkId, entry);
      }
      this.revision++;
    });
  }

  async search(query: EmbeddingVector, topK: number): Promise<SearchHit[]> {
    assertTopK(topK);
    assertVector(query, this.dimensions, 'query vector');

    const hits: SearchHit[] = [];
    for (const entry of this.entries.values()) {
      hits.push({
        chunkId: entry.chunkId,
        score: similarity(this.metric, query, entry.vector),
        text: entry.text,
        metadata: { ...entry.metadata },
      });
    }

    return hits.sort(compareHits).slice(0, topK);
  }

  async delete(chunkIds: string[]): Promise<number> {
    if (chunkIds.length === 0) return 0;

    return this.writeLock.run(async () => {
      let removed = 0;
      for (const id of chunkIds) {
        if (this.entries.delete(id)) removed++;
      }
      if (removed > 0) this.revision++;
      return removed;
    });
  }

  async get(chunkId: string): Promise<IndexEntry | undefined> {
    const entry = this.entries.get(chunkId);
    return entry ? cloneEntry(entry) : undefined;
  }

  async size(): Promise<number> {
    return this.entries.size;
  }

  async clear(): Promise<void> {
    await this.writeLock.run(async () => {
      this.entries.clear();
      this.revision++;
    });
  }

  /**
   * Write all entries to `filePath` (via a temp file and rename, so a
   * crash never leaves a partial file).
   */
  async persist(filePath: string): Promise<void> {
    await this.writeLock.run(async () => {
      const data: PersistedIndex = {
        format: FORMAT,
        version: FORMAT_VERSION,
        dimensions: this.dimensions,
        metric: this.metric,
        entries: Array.from(this.entries.values()),
      };
      const tempPath = `${filePath}.${process.pid}.tmp`;

      try {
        await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
        await fs.promises.writeFile(tempPath, JSON.stringify(data), 'utf-8');
        await fs.promises.rename(tempPath, filePath);
      } catch (error) {
        await fs.promises.rm(tempPath, { force: true });
        throw new IndexIOError(`Failed to persist index to ${filePath}: ${toError(error).message}`, filePath, {
          cause: error,
        });
      }

      logger.indexPersisted('persist', filePath, data.entries.length);
    });
  }

  /**
   * Replace the contents with a persisted index. The file must have been
   * written with the same dimensions and metric.
   */
  async restore(filePath: string): Promise<void> {
    const data = await readPersisted(filePath);

    if (data.metric !== this.metric) {
      throw new ConfigurationError(
        `Index at ${filePath} uses the ${data.metric} metric, this index uses ${this.metric}`,
        ['Rebuild the index or configure the metric it was built with']
      );
    }
    if (data.dimensions !== this.dimensions) {
      throw new DimensionMismatchError(this.dimensions, data.dimensions, `index at ${filePath}`);
    }

    await this.writeLock.run(async () => {
      this.load(data, filePath);
    });
  }

  private load(data: PersistedIndex, filePath: string): void {
    const next = new Map<string, IndexEntry>();
    for (const entry of data.entries) {
      next.set(entry.chunkId, entry);
    }
    this.entries = next;
    this.revision++;
    logger.indexPersisted('restore', filePath, next.size);
  }
}

/**
 * Read and check a persisted index file.
 */
async function readPersisted(filePath: string): Promise<PersistedIndex> {
  let raw: unknown;
  try {
    raw = JSON.parse(await fs.promises.readFile(filePath, 'utf-8'));
  } catch (error) {
    throw new IndexIOError(`Failed to read index from ${filePath}: ${toError(error).message}`, filePath, {
      cause: error,
    });
  }

  if (
    typeof raw !== 'object' || raw === null ||
    !('format' in raw) || raw.format !== FORMAT ||
    !('dimensions' in raw) || typeof raw.dimensions !== 'number' ||
    !('metric' in raw) || (raw.metric !== 'cosine' && raw.metric !== 'dot') ||
    !('entries' in raw) || !Array.isArray(raw.entries)
  ) {
    throw new IndexIOError(`${filePath} is not a persisted memory index`, filePath);
  }

  const dimensions = raw.dimensions;
  const entries: IndexEntry[] = raw.entries.map((item: unknown, i: number) => readEntry(item, i, filePath));
  for (const entry of entries) {
    if (entry.vector.length !== dimensions) {
      throw new IndexIOError(`Entry ${entry.chunkId} in ${filePath} has ${entry.vector.length} dimensions`, filePath);
    }
  }

  return {
    format: FORMAT,
    version: 'version' in raw && typeof raw.version === 'number' ? raw.version : FORMAT_VERSION,
    dimensions,
    metric: raw.metric,
    entries,
  };
}

function readEntry(item: unknown, position: number, filePath: string): IndexEntry {
  if (
    typeof item !== 'object' || item === null ||
    !('chunkId' in item) || typeof item.chunkId !== 'string' ||
    !('vector' in item) || !Array.isArray(item.vector) ||
    !('text' in item) || typeof item.text !== 'string'
  ) {
    throw new IndexIOError(`Malformed entry at position ${position} in ${filePath}`, filePath);
  }

  const vector: number[] = [];
  for (const x of item.vector) {
    if (typeof x !== 'number' || !Number.isFinite(x)) {
      throw new IndexIOError(`Entry ${item.chunkId} in ${filePath} has a non-numeric component`, filePath);
    }
    vector.push(x);
  }

  return {
    chunkId: item.chunkId,
    vector,
    text: item.text,
    metadata: readMetadata('metadata' in item ? item.metadata : undefined),
  };
}
