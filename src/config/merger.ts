// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Configuration Merger
 *
 * Functions for merging configuration from multiple sources.
 * Priority: CLI options > environment > workspace config > defaults
 */

import * as path from 'path';
import { DEFAULT_RAG_CONFIG } from './types.js';
import type { RagConfig, WorkspaceConfig } from './types.js';

/**
 * Merge config layers over the defaults; later layers win.
 * Undefined values never override, arrays are replaced rather than joined.
 */
export function mergeConfig(...layers: Array<WorkspaceConfig | null | undefined>): RagConfig {
  const merged: RagConfig = {
    ...DEFAULT_RAG_CONFIG,
    includePatterns: [...DEFAULT_RAG_CONFIG.includePatterns],
    excludePatterns: [...DEFAULT_RAG_CONFIG.excludePatterns],
  };

  for (const layer of layers) {
    if (!layer) continue;
    const defined = Object.fromEntries(
      Object.entries(layer).filter(([, value]) => value !== undefined)
    );
    Object.assign(merged, defined);
    if (layer.includePatterns) merged.includePatterns = [...layer.includePatterns];
    if (layer.excludePatterns) merged.excludePatterns = [...layer.excludePatterns];
  }

  return merged;
}

/**
 * Resolve relative paths in the config against a base directory.
 */
export function resolveConfigPaths(config: RagConfig, baseDir: string): RagConfig {
  return {
    ...config,
    indexPath: path.resolve(baseDir, config.indexPath),
  };
}
