// Copyright 2026 Layne Penney
// SPDX-License-Identifier: Apache-2.0

/**
 * Groundwork library entry.
 */

export * from './rag/index.js';
export {
  DEFAULT_RAG_CONFIG,
  loadConfig,
  mergeConfig,
  validateConfig,
  assertValidConfig,
} from './config/index.js';
export type { RagConfig, WorkspaceConfig } from './config/index.js';
export { logger, LogLevel, parseLogLevel } from './logger.js';
export { VERSION } from './version.js';
