// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Configuration Module
 *
 * - types.ts     - RagConfig and its defaults
 * - loader.ts    - File and environment I/O
 * - validator.ts - Parsing of untrusted files, validation of resolved config
 * - merger.ts    - Layer merging with priority handling
 */

import { logger } from '../logger.js';
import { loadEnvironmentConfig, loadWorkspaceConfig } from './loader.js';
import { mergeConfig, resolveConfigPaths } from './merger.js';
import { assertValidConfig, validateConfig } from './validator.js';
import type { RagConfig, WorkspaceConfig } from './types.js';

export type {
  RagConfig,
  WorkspaceConfig,
  EmbeddingProviderName,
  IndexBackend,
  GenerationProviderName,
} from './types.js';
export {
  DEFAULT_RAG_CONFIG,
  EMBEDDING_PROVIDERS,
  INDEX_BACKENDS,
  SIMILARITY_METRICS,
  SIZE_UNITS,
  GENERATION_PROVIDERS,
} from './types.js';
export { CONFIG_FILES, loadWorkspaceConfig, loadEnvironmentConfig, initConfig } from './loader.js';
export { parseWorkspaceConfig, validateConfig, assertValidConfig } from './validator.js';
export { mergeConfig, resolveConfigPaths } from './merger.js';

/**
 * Load, merge, resolve and check configuration for a working directory.
 * Throws ConfigurationError if the result is unusable.
 */
export function loadConfig(
  cwd: string = process.cwd(),
  overrides: WorkspaceConfig = {},
  env: NodeJS.ProcessEnv = process.env
): RagConfig {
  const { config: fileConfig } = loadWorkspaceConfig(cwd);
  const config = resolveConfigPaths(
    mergeConfig(fileConfig, loadEnvironmentConfig(env), overrides),
    cwd
  );

  for (const warning of validateConfig(config)) {
    logger.warn(warning);
  }
  assertValidConfig(config);
  return config;
}
