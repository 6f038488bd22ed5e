// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Logger
 *
 * Level-aware logging utilities for pipeline output.
 * Provides graduated verbosity: NORMAL → VERBOSE → DEBUG → TRACE
 */

import chalk from 'chalk';

/**
 * Log levels for graduated verbosity.
 */
export enum LogLevel {
  /** Normal output - only essential information */
  NORMAL = 0,
  /** Verbose - per-document ingestion and per-query timing */
  VERBOSE = 1,
  /** Debug - embedding batches, index operations */
  DEBUG = 2,
  /** Trace - full prompts and query vectors */
  TRACE = 3,
}

/**
 * Parse log level from CLI options.
 */
export function parseLogLevel(options: {
  verbose?: boolean;
  debug?: boolean;
  trace?: boolean;
}): LogLevel {
  if (options.trace) return LogLevel.TRACE;
  if (options.debug) return LogLevel.DEBUG;
  if (options.verbose) return LogLevel.VERBOSE;
  return LogLevel.NORMAL;
}

/**
 * Centralized logger with level-aware output.
 */
class Logger {
  private level: LogLevel = LogLevel.NORMAL;

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  /**
   * Check if a specific level is enabled.
   */
  isLevelEnabled(level: LogLevel): boolean {
    return this.level >= level;
  }

  // ============================================
  // Level-aware logging methods
  // ============================================

  /**
   * Log at VERBOSE level (shows at VERBOSE, DEBUG, TRACE).
   */
  verbose(message: string): void {
    if (this.isLevelEnabled(LogLevel.VERBOSE)) {
      console.log(chalk.dim(message));
    }
  }

  /**
   * Log at DEBUG level (shows at DEBUG, TRACE).
   */
  debug(message: string): void {
    if (this.isLevelEnabled(LogLevel.DEBUG)) {
      console.log(chalk.dim(`[Debug] ${message}`));
    }
  }

  /**
   * Log at TRACE level (shows only at TRACE).
   */
  trace(message: string): void {
    if (this.isLevelEnabled(LogLevel.TRACE)) {
      console.log(chalk.gray(`[Trace] ${message}`));
    }
  }

  // ============================================
  // Formatted output helpers
  // ============================================

  /**
   * Log a successfully ingested document at VERBOSE level.
   */
  documentIngested(documentId: string, chunkCount: number, removed: number, durationMs: number): void {
    if (this.isLevelEnabled(LogLevel.VERBOSE)) {
      const removedStr = removed > 0 ? `, replaced ${removed}` : '';
      console.log(
        chalk.green(`✓ ${documentId}`) +
        chalk.dim(` (${chunkCount} chunks${removedStr}, ${(durationMs / 1000).toFixed(2)}s)`)
      );
    }
  }

  /**
   * Log a document that failed to ingest at VERBOSE level.
   */
  documentFailed(documentId: string, error: Error): void {
    if (this.isLevelEnabled(LogLevel.VERBOSE)) {
      console.log(chalk.red(`✗ ${documentId}`) + chalk.dim(` (${error.name})`));
      if (this.level >= LogLevel.DEBUG) {
        console.log(chalk.red(chalk.dim(`   ${error.message.slice(0, 200)}`)));
      }
    }
  }

  /**
   * Log an ingestion summary at VERBOSE level.
   */
  ingestSummary(accepted: number, failed: number, chunksIndexed: number, chunksRemoved: number): void {
    if (this.isLevelEnabled(LogLevel.VERBOSE)) {
      console.log(chalk.dim(
        `[Ingest] ${accepted} accepted, ${failed} failed, ` +
        `${chunksIndexed} chunks indexed, ${chunksRemoved} removed`
      ));
    }
  }

  /**
   * Log an embedding batch at DEBUG level.
   */
  embeddingBatch(provider: string, model: string, size: number, durationMs: number): void {
    if (this.isLevelEnabled(LogLevel.DEBUG)) {
      console.log(chalk.dim(
        `[Embed] ${provider}/${model}: ${size} texts in ${(durationMs / 1000).toFixed(2)}s`
      ));
    }
  }

  /**
   * Log a retrieval at DEBUG level.
   */
  retrieval(query: string, fetched: number, returned: number, durationMs: number): void {
    if (this.isLevelEnabled(LogLevel.DEBUG)) {
      const shown = query.length > 60 ? query.slice(0, 60) + '...' : query;
      console.log(chalk.dim(
        `[Retrieve] "${this.sanitize(shown)}": ${fetched} hits, ${returned} results, ` +
        `${(durationMs / 1000).toFixed(2)}s`
      ));
    }
  }

  /**
   * Log a composed prompt at DEBUG level, and its full text at TRACE level.
   */
  promptComposed(included: number, offered: number, usedUnits: number, budget: number, text?: string): void {
    if (this.isLevelEnabled(LogLevel.DEBUG)) {
      console.log(chalk.dim(
        `[Prompt] ${included}/${offered} passages, ${usedUnits.toLocaleString()}/${budget.toLocaleString()} units`
      ));
    }
    if (text !== undefined && this.isLevelEnabled(LogLevel.TRACE)) {
      console.log(chalk.gray('\n' + '='.repeat(60)));
      console.log(chalk.gray('[Prompt]'));
      console.log(chalk.gray('='.repeat(60)));
      console.log(chalk.gray(text));
      console.log(chalk.gray('='.repeat(60) + '\n'));
    }
  }

  /**
   * Log index persistence at DEBUG level.
   */
  indexPersisted(action: 'persist' | 'restore', path: string, entries: number): void {
    if (this.isLevelEnabled(LogLevel.DEBUG)) {
      const verb = action === 'persist' ? 'Wrote' : 'Loaded';
      console.log(chalk.dim(`[Index] ${verb} ${entries} entries ${action === 'persist' ? 'to' : 'from'} ${path}`));
    }
  }

  /**
   * Sanitize a string for safe terminal output.
   */
  private sanitize(str: string): string {
    return str
      .replace(/[\x00-\x08\x0B\x0C\x0E-\x1F\x7F]/g, '') // Remove control chars except \t, \n, \r
      .replace(/\r?\n/g, '\\n')
      .replace(/\t/g, '\\t');
  }

  /**
   * Log an error with optional stack trace at DEBUG level.
   */
  error(message: string, error?: Error): void {
    console.error(chalk.red(`Error: ${message}`));
    if (error && this.level >= LogLevel.DEBUG) {
      console.error(chalk.dim(error.stack || 'No stack trace available'));
    }
  }

  warn(message: string): void {
    console.warn(chalk.yellow(`Warning: ${message}`));
  }

  info(message: string): void {
    console.log(chalk.blue(`Info: ${message}`));
  }
}

/**
 * Singleton logger instance for global use.
 */
export const logger = new Logger();
