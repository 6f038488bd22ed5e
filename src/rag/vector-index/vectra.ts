// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Vectra Vector Index
 *
 * Keeps entries in a vectra LocalIndex folder. Vectra scores by cosine
 * similarity only, and writes its folder on every committed update, so
 * persisting to the index's own folder is a no-op.
 */

import { LocalIndex } from 'vectra';
import type { IndexItem } from 'vectra';
import * as path from 'path';
import { logger } from '../../logger.js';
import { Semaphore } from '../../utils/semaphore.js';
import { ConfigurationError, DimensionMismatchError, IndexIOError, isRagError, toError } from '../errors.js';
import type { EmbeddingVector, IndexEntry, SearchHit } from '../types.js';
import { assertEntries, assertTopK, assertVector, compareHits, readMetadata } from './types.js';
import type { SimilarityMetric, VectorIndex } from './types.js';

/**
 * Metadata stored with each vector. Entry metadata is kept as JSON so
 * arbitrary keys never collide with the passage text.
 */
type VectraMetadata = {
  text: string;
  metadata: string;
};

export class VectraVectorIndex implements VectorIndex {
  readonly dimensions: number;
  readonly metric: SimilarityMetric = 'cosine';
  readonly folderPath: string;
  private index: LocalIndex<VectraMetadata>;
  private writeLock = new Semaphore(1);
  private revision = 0;
  private ready: Promise<void> | null = null;

  constructor(folderPath: string, dimensions: number, metric: SimilarityMetric = 'cosine') {
    if (metric !== 'cosine') {
      throw new ConfigurationError(`The vectra index backend only supports the cosine metric, got ${metric}`, [
        'Set "metric" to "cosine" or use the memory index backend',
      ]);
    }
    if (!Number.isInteger(dimensions) || dimensions <= 0) {
      throw new ConfigurationError(`Index dimensions must be a positive integer, got ${dimensions}`);
    }
    this.folderPath = path.resolve(folderPath);
    this.dimensions = dimensions;
    this.index = new LocalIndex<VectraMetadata>(this.folderPath);
  }

  /**
   * Create the index folder if it does not exist yet. Called lazily by
   * every operation; safe to call more than once.
   */
  initialize(): Promise<void> {
    if (!this.ready) {
      this.ready = this.guard('open', this.folderPath, async () => {
        if (!(await this.index.isIndexCreated())) {
          await this.index.createIndex({ version: 1 });
        }
      }).catch((error: unknown) => {
        // Allow a retry after a failed open
        this.ready = null;
        throw error;
      });
    }
    return this.ready;
  }

  getRevision(): number {
    return this.revision;
  }

  async upsert(entries: IndexEntry[]): Promise<void> {
    if (entries.length === 0) return;
    assertEntries(entries, this.dimensions);
    await this.initialize();

    await this.writeLock.run(() =>
      this.update('upsert', async () => {
        for (const entry of entries) {
          await this.index.upsertItem(toItem(entry));
        }
      })
    );
  }

  async search(query: EmbeddingVector, topK: number): Promise<SearchHit[]> {
    assertTopK(topK);
    assertVector(query, this.dimensions, 'query vector');
    await this.initialize();

    // vectra cuts at topK in insertion order among equal scores, so rank every item here
    const stats = await this.guard('search', this.folderPath, () => this.index.getIndexStats());
    const results = await this.guard('search', this.folderPath, () =>
      this.index.queryItems(query, '', Math.max(stats.items, topK))
    );
    return results
      .map((r) => {
        const entry = fromItem(r.item, this.folderPath);
        return { chunkId: entry.chunkId, score: r.score, text: entry.text, metadata: entry.metadata };
      })
      .sort(compareHits)
      .slice(0, topK);
  }

  async delete(chunkIds: string[]): Promise<number> {
    if (chunkIds.length === 0) return 0;
    await this.initialize();

    return this.writeLock.run(async () => {
      const present: string[] = [];
      for (const id of new Set(chunkIds)) {
        if (await this.guard('lookup', this.folderPath, () => this.index.getItem(id))) {
          present.push(id);
        }
      }
      if (present.length === 0) return 0;

      await this.update('delete', async () => {
        for (const id of present) {
          await this.index.deleteItem(id);
        }
      });
      return present.length;
    });
  }

  async get(chunkId: string): Promise<IndexEntry | undefined> {
    await this.initialize();
    const item = await this.guard('lookup', this.folderPath, () => this.index.getItem(chunkId));
    return item ? fromItem(item, this.folderPath) : undefined;
  }

  async size(): Promise<number> {
    await this.initialize();
    const stats = await this.guard('stats', this.folderPath, () => this.index.getIndexStats());
    return stats.items;
  }

  async clear(): Promise<void> {
    await this.initialize();
    await this.writeLock.run(async () => {
      await this.guard('clear', this.folderPath, () => this.index.createIndex({ version: 1, deleteIfExists: true }));
      this.revision++;
    });
  }

  /**
   * Copy every entry into a vectra folder at `target`.
   */
  async persist(target: string): Promise<void> {
    await this.initialize();
    const targetPath = path.resolve(target);

    await this.writeLock.run(async () => {
      const items = await this.guard('persist', this.folderPath, () => this.index.listItems());
      if (targetPath !== this.folderPath) {
        const copy = new LocalIndex<VectraMetadata>(targetPath);
        await this.guard('persist', targetPath, async () => {
          await copy.createIndex({ version: 1, deleteIfExists: true });
          await copy.beginUpdate();
          try {
            for (const item of items) {
              await copy.upsertItem({ id: item.id, vector: item.vector, metadata: item.metadata });
            }
            await copy.endUpdate();
          } catch (error) {
            copy.cancelUpdate();
            throw error;
          }
        });
      }
      logger.indexPersisted('persist', targetPath, items.length);
    });
  }

  /**
   * Replace the contents with the entries of the vectra folder at `source`.
   */
  async restore(source: string): Promise<void> {
    await this.initialize();
    const sourcePath = path.resolve(source);
    const origin = new LocalIndex<VectraMetadata>(sourcePath);

    const items = await this.guard('restore', sourcePath, async () => {
      if (!(await origin.isIndexCreated())) {
        throw new Error('no vectra index found');
      }
      return origin.listItems();
    });
    const entries = items.map((item) => fromItem(item, sourcePath));
    for (const entry of entries) {
      if (entry.vector.length !== this.dimensions) {
        throw new DimensionMismatchError(this.dimensions, entry.vector.length, `index at ${sourcePath}`);
      }
    }

    await this.writeLock.run(async () => {
      if (sourcePath !== this.folderPath) {
        await this.guard('restore', this.folderPath, () => this.index.createIndex({ version: 1, deleteIfExists: true }));
        await this.update('restore', async () => {
          for (const entry of entries) {
            await this.index.upsertItem(toItem(entry));
          }
        });
      } else {
        this.revision++;
      }
      logger.indexPersisted('restore', sourcePath, entries.length);
    });
  }

  /**
   * Run mutations inside a single vectra update so searches see all of
   * them or none.
   */
  private async update(action: string, fn: () => Promise<void>): Promise<void> {
    await this.guard(action, this.folderPath, async () => {
      await this.index.beginUpdate();
      try {
        await fn();
        await this.index.endUpdate();
      } catch (error) {
        this.index.cancelUpdate();
        throw error;
      }
    });
    this.revision++;
  }

  /**
   * Map vectra and file-system failures to IndexIOError.
   */
  private async guard<T>(action: string, location: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (isRagError(error)) throw error;
      throw new IndexIOError(`Vectra ${action} failed at ${location}: ${toError(error).message}`, location, {
        cause: error,
      });
    }
  }
}

function toItem(entry: IndexEntry): Partial<IndexItem<VectraMetadata>> {
  return {
    id: entry.chunkId,
    vector: [...entry.vector],
    metadata: { text: entry.text, metadata: JSON.stringify(entry.metadata) },
  };
}

function fromItem(item: IndexItem<VectraMetadata>, location: string): IndexEntry {
  let metadata: unknown;
  try {
    metadata = JSON.parse(item.metadata.metadata);
  } catch (error) {
    throw new IndexIOError(`Stored metadata for ${item.id} in ${location} is not valid JSON`, location, { cause: error });
  }
  return {
    chunkId: item.id,
    vector: [...item.vector],
    text: item.metadata.text,
    metadata: readMetadata(metadata),
  };
}
