/**
 * Text Chunker
 *
 * Splits a document's text into overlapping passages. A window of
 * `chunkSize` units slides over the text; each window end is pulled back
 * to the nearest paragraph, sentence or word break within the boundary
 * tolerance before falling back to a hard cut.
 */

import * as crypto from 'crypto';
import { ConfigurationError } from './errors.js';
import { CHUNK_METADATA_KEYS } from './types.js';
import type { Chunk, Document, SizeUnit } from './types.js';
import { tokenize } from '../utils/token-counter.js';

/**
 * Configuration for the chunker.
 */
export interface ChunkerConfig {
  /** Window size in `unit`s */
  chunkSize: number;
  /** Units shared by consecutive chunks */
  overlap: number;
  /** Unit of chunkSize and overlap */
  unit: SizeUnit;
  /** Fraction of chunkSize the window end may move back to reach a natural break */
  boundaryTolerance: number;
}

/**
 * Default chunker configuration.
 */
export const DEFAULT_CHUNKER_CONFIG: ChunkerConfig = {
  chunkSize: 1000,
  overlap: 200,
  unit: 'characters',
  boundaryTolerance: 0.1,
};

/**
 * Strength of a break between two units. Higher wins.
 */
enum BreakStrength {
  NONE = 0,
  WORD = 1,
  SENTENCE = 2,
  PARAGRAPH = 3,
}

/**
 * View of a text as a sequence of units with character spans.
 */
interface UnitLayout {
  count: number;
  start(i: number): number;
  end(i: number): number;
  /** Strength of cutting right before unit k (0 < k < count) */
  breakBefore(k: number): BreakStrength;
  /** Largest cut position <= k that does not split a character */
  align(k: number): number;
}

const SENTENCE_END = /[.!?]["')\]]?$/;
const WHITESPACE = /\s/;

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

function isLowSurrogate(code: number): boolean {
  return code >= 0xdc00 && code <= 0xdfff;
}

function characterLayout(text: string): UnitLayout {
  return {
    count: text.length,
    start: (i) => i,
    end: (i) => i + 1,
    breakBefore: (k) => {
      const prev = text[k - 1];
      const next = text[k];
      if (text.startsWith('\n\n', k) && prev !== '\n') return BreakStrength.PARAGRAPH;
      if (!WHITESPACE.test(next) || WHITESPACE.test(prev)) return BreakStrength.NONE;
      return SENTENCE_END.test(text.slice(Math.max(0, k - 2), k))
        ? BreakStrength.SENTENCE
        : BreakStrength.WORD;
    },
    align: (k) =>
      k > 0 && isLowSurrogate(text.charCodeAt(k)) && isHighSurrogate(text.charCodeAt(k - 1)) ? k - 1 : k,
  };
}

function tokenLayout(text: string): UnitLayout {
  const spans = tokenize(text);
  return {
    count: spans.length,
    start: (i) => spans[i].start,
    end: (i) => spans[i].end,
    breakBefore: (k) => {
      const gap = text.slice(spans[k - 1].end, spans[k].start);
      if (/\n\s*\n/.test(gap)) return BreakStrength.PARAGRAPH;
      const previous = text.slice(spans[k - 1].start, spans[k - 1].end);
      return SENTENCE_END.test(previous) ? BreakStrength.SENTENCE : BreakStrength.WORD;
    },
    // Tokens never split a character
    align: (k) => k,
  };
}

/**
 * Overlapping, boundary-aware text chunker.
 */
export class TextChunker {
  private config: ChunkerConfig;

  constructor(config: Partial<ChunkerConfig> = {}) {
    this.config = { ...DEFAULT_CHUNKER_CONFIG, ...config };
    validateChunkParameters(this.config.chunkSize, this.config.overlap, this.config.boundaryTolerance);
  }

  getConfig(): ChunkerConfig {
    return { ...this.config };
  }

  /**
   * Chunk a document. Identical input and parameters always yield
   * identical boundaries and ids.
   */
  chunk(
    document: Document,
    chunkSize: number = this.config.chunkSize,
    overlap: number = this.config.overlap
  ): Chunk[] {
    validateChunkParameters(chunkSize, overlap, this.config.boundaryTolerance);

    const text = document.rawText;
    if (text.trim() === '') {
      return [];
    }

    const layout = this.config.unit === 'tokens' ? tokenLayout(text) : characterLayout(text);
    const n = layout.count;
    // Keeps every chunk longer than the overlap so starts strictly increase
    const lookback = Math.min(
      Math.floor(chunkSize * this.config.boundaryTolerance),
      chunkSize - overlap - 1
    );

    const chunks: Chunk[] = [];
    let start = 0;

    for (;;) {
      let end = start + chunkSize >= n ? n : layout.align(this.findBreak(layout, start + chunkSize, lookback));
      // A one-unit window over a surrogate pair still takes the whole pair
      if (end <= start) end = start + 2;
      chunks.push(this.buildChunk(document, chunks.length, layout.start(start), layout.end(end - 1)));

      if (end >= n) break;
      // Nothing but whitespace left past this chunk
      if (text.slice(layout.start(end)).trim() === '') break;

      let next = layout.align(end - overlap);
      if (next <= start) next = layout.align(start + 2);
      start = next;
    }

    return chunks;
  }

  /**
   * Pick the cut position: the strongest break within the lookback window,
   * the latest one among equals, or the hard cut if none.
   */
  private findBreak(layout: UnitLayout, hardCut: number, lookback: number): number {
    let best = hardCut;
    let bestStrength = BreakStrength.NONE;

    for (let k = hardCut; k >= hardCut - lookback; k--) {
      const strength = layout.breakBefore(k);
      if (strength > bestStrength) {
        best = k;
        bestStrength = strength;
        if (strength === BreakStrength.PARAGRAPH) break;
      }
    }

    return best;
  }

  private buildChunk(document: Document, index: number, startOffset: number, endOffset: number): Chunk {
    return {
      id: generateChunkId(document.id, startOffset),
      documentId: document.id,
      text: document.rawText.slice(startOffset, endOffset),
      startOffset,
      endOffset,
      metadata: {
        ...document.metadata,
        [CHUNK_METADATA_KEYS.documentId]: document.id,
        [CHUNK_METADATA_KEYS.sourceUri]: document.sourceUri,
        [CHUNK_METADATA_KEYS.chunkIndex]: index,
        [CHUNK_METADATA_KEYS.startOffset]: startOffset,
        [CHUNK_METADATA_KEYS.endOffset]: endOffset,
      },
    };
  }
}

/**
 * Generate the chunk id for a document offset.
 */
export function generateChunkId(documentId: string, startOffset: number): string {
  return crypto
    .createHash('md5')
    .update(`${documentId}:${startOffset}`)
    .digest('hex')
    .slice(0, 16);
}

/**
 * Throw ConfigurationError unless 0 <= overlap < chunkSize and the
 * boundary tolerance is a fraction in [0, 1).
 */
export function validateChunkParameters(chunkSize: number, overlap: number, boundaryTolerance: number = 0): void {
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new ConfigurationError(`chunkSize must be a positive integer, got ${chunkSize}`);
  }
  if (!Number.isInteger(overlap) || overlap < 0 || overlap >= chunkSize) {
    throw new ConfigurationError(
      `overlap must be an integer with 0 <= overlap < chunkSize (${chunkSize}), got ${overlap}`,
      ['Lower the overlap or raise the chunk size']
    );
  }
  if (!(boundaryTolerance >= 0 && boundaryTolerance < 1)) {
    throw new ConfigurationError(`boundaryTolerance must be in [0, 1), got ${boundaryTolerance}`);
  }
}
