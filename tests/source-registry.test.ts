// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { SourceRegistry } from '../src/rag/source-registry.js';
import { IndexIOError } from '../src/rag/errors.js';

describe('SourceRegistry', () => {
  let registry: SourceRegistry;

  beforeEach(() => {
    registry = new SourceRegistry();
  });

  it('returns copies of records', () => {
    registry.set('a.md', { documentId: 'a', chunkIds: ['a-1'], ingestedAt: '2026-01-01T00:00:00.000Z' });

    const record = registry.get('a.md');
    record?.chunkIds.push('a-2');

    expect(registry.get('a.md')?.chunkIds).toEqual(['a-1']);
  });

  it('lists sources in sorted order and counts chunks', () => {
    registry.set('b.md', { documentId: 'b', chunkIds: ['b-1', 'b-2'], ingestedAt: '' });
    registry.set('a.md', { documentId: 'a', chunkIds: ['a-1'], ingestedAt: '' });

    expect(registry.list()).toEqual(['a.md', 'b.md']);
    expect(registry.size).toBe(2);
    expect(registry.totalChunks()).toBe(3);
  });

  it('deletes and clears sources', () => {
    registry.set('a.md', { documentId: 'a', chunkIds: [], ingestedAt: '' });

    expect(registry.delete('a.md')).toBe(true);
    expect(registry.delete('a.md')).toBe(false);

    registry.set('b.md', { documentId: 'b', chunkIds: [], ingestedAt: '' });
    registry.clear();
    expect(registry.size).toBe(0);
  });

  describe('fromJSON', () => {
    it('reads records and defaults a missing timestamp', () => {
      const restored = SourceRegistry.fromJSON({
        version: 1,
        sources: { 'a.md': { documentId: 'a', chunkIds: ['a-1'] } },
      });

      expect(restored?.get('a.md')).toEqual({ documentId: 'a', chunkIds: ['a-1'], ingestedAt: '' });
    });

    it('returns null for unexpected shapes', () => {
      expect(SourceRegistry.fromJSON(null)).toBeNull();
      expect(SourceRegistry.fromJSON({ version: 1 })).toBeNull();
      expect(SourceRegistry.fromJSON({ sources: [] })).toBeNull();
      expect(SourceRegistry.fromJSON({ sources: { 'a.md': { documentId: 'a', chunkIds: [1] } } })).toBeNull();
      expect(SourceRegistry.fromJSON({ sources: { 'a.md': { chunkIds: [] } } })).toBeNull();
    });
  });

  describe('persistence', () => {
    let tempDir: string;

    beforeEach(() => {
      tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'groundwork-registry-'));
    });

    afterEach(() => {
      fs.rmSync(tempDir, { recursive: true, force: true });
    });

    it('saves and loads the registry', async () => {
      const filePath = path.join(tempDir, 'nested', 'sources.json');
      registry.set('a.md', { documentId: 'a', chunkIds: ['a-1', 'a-2'], ingestedAt: '2026-01-01T00:00:00.000Z' });

      await registry.save(filePath);
      const loaded = await SourceRegistry.load(filePath);

      expect(loaded.list()).toEqual(['a.md']);
      expect(loaded.get('a.md')).toEqual({
        documentId: 'a',
        chunkIds: ['a-1', 'a-2'],
        ingestedAt: '2026-01-01T00:00:00.000Z',
      });
      expect(fs.readdirSync(path.dirname(filePath))).toEqual(['sources.json']);
    });

    it('loads an empty registry when the file is missing', async () => {
      const loaded = await SourceRegistry.load(path.join(tempDir, 'missing.json'));

      expect(loaded.size).toBe(0);
    });

    it('rejects a file that is not JSON', async () => {
      const filePath = path.join(tempDir, 'sources.json');
      fs.writeFileSync(filePath, '{ not json');

      await expect(SourceRegistry.load(filePath)).rejects.toThrow(IndexIOError);
      await expect(SourceRegistry.load(filePath)).rejects.toThrow(`Source registry ${filePath} is not valid JSON`);
    });

    it('rejects a file with the wrong shape', async () => {
      const filePath = path.join(tempDir, 'sources.json');
      fs.writeFileSync(filePath, JSON.stringify({ sources: { 'a.md': 'oops' } }));

      await expect(SourceRegistry.load(filePath)).rejects.toThrow('has an unexpected format');
    });
  });
});
