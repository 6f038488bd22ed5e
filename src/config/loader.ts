// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Configuration Loader
 *
 * Functions for loading and saving configuration files from disk, and for
 * reading provider settings from the environment. This is the only place
 * that looks at process.env; everything downstream receives a RagConfig.
 */

import * as fs from 'fs';
import * as path from 'path';
import { logger } from '../logger.js';
import { parseWorkspaceConfig } from './validator.js';
import type { RagConfig, WorkspaceConfig } from './types.js';

/**
 * Configuration file names (checked in order).
 */
export const CONFIG_FILES = ['.groundwork.json', '.groundwork/config.json', 'groundwork.config.json'];

/**
 * Find and load workspace configuration from a directory.
 * A file that fails to parse is reported and skipped.
 */
export function loadWorkspaceConfig(cwd: string = process.cwd()): {
  config: WorkspaceConfig | null;
  configPath: string | null;
} {
  for (const fileName of CONFIG_FILES) {
    const configPath = path.join(cwd, fileName);
    if (!fs.existsSync(configPath)) continue;

    try {
      const content = fs.readFileSync(configPath, 'utf-8');
      const { config, warnings } = parseWorkspaceConfig(JSON.parse(content));
      for (const warning of warnings) {
        logger.warn(`${configPath}: ${warning}`);
      }
      return { config, configPath };
    } catch (error) {
      logger.warn(`Failed to parse ${configPath}: ${error instanceof Error ? error.message : error}`);
      return { config: null, configPath };
    }
  }
  return { config: null, configPath: null };
}

/**
 * Read provider settings from environment variables.
 */
export function loadEnvironmentConfig(env: NodeJS.ProcessEnv = process.env): WorkspaceConfig {
  const config: WorkspaceConfig = {};
  if (env.OPENAI_API_KEY) config.openaiApiKey = env.OPENAI_API_KEY;
  if (env.OPENAI_BASE_URL) config.openaiBaseUrl = env.OPENAI_BASE_URL;
  if (env.OLLAMA_BASE_URL) config.ollamaBaseUrl = env.OLLAMA_BASE_URL;
  return config;
}

/**
 * Write a starter .groundwork.json. Returns the path, or null if a config
 * file already exists.
 */
export function initConfig(cwd: string = process.cwd(), defaults: RagConfig): string | null {
  const existing = loadWorkspaceConfig(cwd);
  if (existing.configPath) {
    return null;
  }

  const configPath = path.join(cwd, CONFIG_FILES[0]);
  const starter: WorkspaceConfig = {
    embeddingProvider: defaults.embeddingProvider,
    chunkSize: defaults.chunkSize,
    chunkOverlap: defaults.chunkOverlap,
    indexBackend: defaults.indexBackend,
    indexPath: defaults.indexPath,
    topK: defaults.topK,
    maxContextTokens: defaults.maxContextTokens,
    includePatterns: defaults.includePatterns,
  };
  fs.writeFileSync(configPath, JSON.stringify(starter, null, 2) + '\n', 'utf-8');
  return configPath;
}
