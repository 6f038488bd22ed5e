// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Source Registry
 *
 * Tracks which chunk ids each source URI currently owns in the index, so
 * re-ingesting or removing a source deletes exactly its previous chunks.
 * Saved beside the index so the mapping survives restarts.
 */

import * as fs from 'fs';
import * as path from 'path';
import { IndexIOError, toError } from './errors.js';

/**
 * What the index holds for one source.
 */
export interface SourceRecord {
  documentId: string;
  chunkIds: string[];
  /** ISO timestamp of the last successful ingestion */
  ingestedAt: string;
}

/** Persisted registry state */
interface RegistryFile {
  version: number;
  sources: Record<string, SourceRecord>;
}

const REGISTRY_VERSION = 1;

export class SourceRegistry {
  private sources = new Map<string, SourceRecord>();

  get(sourceUri: string): SourceRecord | undefined {
    const record = this.sources.get(sourceUri);
    return record ? { ...record, chunkIds: [...record.chunkIds] } : undefined;
  }

  set(sourceUri: string, record: SourceRecord): void {
    this.sources.set(sourceUri, { ...record, chunkIds: [...record.chunkIds] });
  }

  delete(sourceUri: string): boolean {
    return this.sources.delete(sourceUri);
  }

  has(sourceUri: string): boolean {
    return this.sources.has(sourceUri);
  }

  /** Registered source URIs in sorted order */
  list(): string[] {
    return Array.from(this.sources.keys()).sort();
  }

  get size(): number {
    return this.sources.size;
  }

  /** Chunks owned by all sources */
  totalChunks(): number {
    let total = 0;
    for (const record of this.sources.values()) {
      total += record.chunkIds.length;
    }
    return total;
  }

  clear(): void {
    this.sources.clear();
  }

  toJSON(): RegistryFile {
    const sources: Record<string, SourceRecord> = {};
    for (const uri of this.list()) {
      const record = this.sources.get(uri);
      if (record) sources[uri] = record;
    }
    return { version: REGISTRY_VERSION, sources };
  }

  /**
   * Rebuild a registry from parsed JSON. Returns null if the shape is wrong.
   */
  static fromJSON(data: unknown): SourceRegistry | null {
    if (typeof data !== 'object' || data === null || !('sources' in data)) {
      return null;
    }
    const { sources } = data;
    if (typeof sources !== 'object' || sources === null || Array.isArray(sources)) {
      return null;
    }

    const registry = new SourceRegistry();
    for (const [uri, value] of Object.entries(sources)) {
      const record = readRecord(value);
      if (!record) return null;
      registry.sources.set(uri, record);
    }
    return registry;
  }

  /**
   * Write the registry to `filePath` via a temp file and rename.
   */
  async save(filePath: string): Promise<void> {
    const tempPath = `${filePath}.${process.pid}.tmp`;
    try {
      await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
      await fs.promises.writeFile(tempPath, JSON.stringify(this.toJSON(), null, 2), 'utf-8');
      await fs.promises.rename(tempPath, filePath);
    } catch (error) {
      await fs.promises.rm(tempPath, { force: true });
      throw new IndexIOError(`Failed to save source registry to ${filePath}: ${toError(error).message}`, filePath, {
        cause: error,
      });
    }
  }

  /**
   * Load a saved registry. A missing file yields an empty registry.
   */
  static async load(filePath: string): Promise<SourceRegistry> {
    let raw: string;
    try {
      raw = await fs.promises.readFile(filePath, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return new SourceRegistry();
      }
      throw new IndexIOError(`Failed to read source registry ${filePath}: ${toError(error).message}`, filePath, {
        cause: error,
      });
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new IndexIOError(`Source registry ${filePath} is not valid JSON`, filePath, { cause: error });
    }

    const registry = SourceRegistry.fromJSON(parsed);
    if (!registry) {
      throw new IndexIOError(`Source registry ${filePath} has an unexpected format`, filePath);
    }
    return registry;
  }
}

function readRecord(value: unknown): SourceRecord | null {
  if (
    typeof value !== 'object' || value === null ||
    !('documentId' in value) || typeof value.documentId !== 'string' ||
    !('chunkIds' in value) || !Array.isArray(value.chunkIds)
  ) {
    return null;
  }

  const chunkIds: string[] = [];
  for (const id of value.chunkIds) {
    if (typeof id !== 'string') return null;
    chunkIds.push(id);
  }

  const ingestedAt = 'ingestedAt' in value && typeof value.ingestedAt === 'string' ? value.ingestedAt : '';
  return { documentId: value.documentId, chunkIds, ingestedAt };
}
