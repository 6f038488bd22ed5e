/**
 * Vector index backends.
 */

import * as path from 'path';
import type { RagConfig } from '../../config/types.js';
import { MemoryVectorIndex } from './memory.js';
import { VectraVectorIndex } from './vectra.js';
import type { VectorIndex } from './types.js';

export * from './types.js';
export { MemoryVectorIndex } from './memory.js';
export { VectraVectorIndex } from './vectra.js';

type IndexConfig = Pick<RagConfig, 'indexBackend' | 'metric' | 'indexPath'>;

/**
 * Where the configured backend keeps its state under `indexPath`:
 * a JSON file for the memory index, a folder for vectra.
 */
export function getIndexLocation(config: Pick<RagConfig, 'indexBackend' | 'indexPath'>): string {
  return config.indexBackend === 'vectra'
    ? path.join(config.indexPath, 'vectra')
    : path.join(config.indexPath, 'vectors.json');
}

/**
 * Create the configured index backend.
 */
export function createVectorIndex(config: IndexConfig, dimensions: number): VectorIndex {
  switch (config.indexBackend) {
    case 'vectra':
      return new VectraVectorIndex(getIndexLocation(config), dimensions, config.metric);
    case 'memory':
      return new MemoryVectorIndex(dimensions, config.metric);
  }
}
