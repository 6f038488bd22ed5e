// Copyright 2026 Layne Penney
// SPDX-License-Identifier: Apache-2.0

/**
 * Size measurement in the configured unit.
 *
 * The chunker and the prompt composer must agree on what "size" means, so
 * both measure through these helpers:
 * - characters: UTF-16 code units, i.e. `text.length`
 * - tokens: maximal runs of non-whitespace characters
 */

import type { SizeUnit } from '../rag/types.js';

/**
 * Character span of one whitespace-delimited token.
 */
export interface TokenSpan {
  /** Offset of the first character (inclusive) */
  start: number;
  /** Offset after the last character (exclusive) */
  end: number;
}

const TOKEN_PATTERN = /\S+/g;

/**
 * Split text into whitespace-delimited tokens with their offsets.
 */
export function tokenize(text: string): TokenSpan[] {
  const spans: TokenSpan[] = [];
  for (const match of text.matchAll(TOKEN_PATTERN)) {
    const start = match.index ?? 0;
    spans.push({ start, end: start + match[0].length });
  }
  return spans;
}

/**
 * Count tokens without materializing spans.
 */
export function countTokens(text: string): number {
  if (!text) return 0;
  let count = 0;
  let inToken = false;
  for (let i = 0; i < text.length; i++) {
    const isSpace = /\s/.test(text[i]);
    if (!isSpace && !inToken) count++;
    inToken = !isSpace;
  }
  return count;
}

/**
 * Size of a text in the given unit.
 */
export function measure(text: string, unit: SizeUnit): number {
  return unit === 'tokens' ? countTokens(text) : text.length;
}

/**
 * Cut text so that it measures at most `limit` units.
 * In token mode the cut falls right after the last kept token.
 */
export function truncateTo(text: string, unit: SizeUnit, limit: number): string {
  if (limit <= 0) return '';
  if (unit === 'characters') {
    return text.length > limit ? text.slice(0, limit) : text;
  }

  const spans = tokenize(text);
  if (spans.length <= limit) return text;
  return text.slice(0, spans[limit - 1].end);
}
