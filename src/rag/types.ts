/**
 * Retrieval Pipeline Types
 *
 * Documents, chunks, index entries, retrieval results and composed prompts
 * shared by every stage of the pipeline.
 */

/** Scalar value allowed in document and chunk metadata */
export type MetadataValue = string | number | boolean;

/** Metadata attached to documents, chunks and index entries */
export type Metadata = Record<string, MetadataValue>;

/** Unit in which chunk sizes and prompt budgets are measured */
export type SizeUnit = 'characters' | 'tokens';

/** Fixed-dimension embedding of a text */
export type EmbeddingVector = number[];

/**
 * Shape in which documents arrive from an extractor.
 * At least one of `id` and `sourceUri` must be present.
 */
export interface DocumentInput {
  id?: string;
  sourceUri?: string;
  rawText: string;
  metadata?: Metadata;
}

/**
 * A document accepted for ingestion. Never mutated; re-ingesting the same
 * `sourceUri` supersedes it.
 */
export interface Document {
  readonly id: string;
  readonly sourceUri: string;
  readonly rawText: string;
  readonly metadata: Readonly<Metadata>;
}

/**
 * A contiguous span of a document used as the retrieval unit.
 */
export interface Chunk {
  /** Derived from documentId and startOffset */
  id: string;
  /** Back-reference to the owning document */
  documentId: string;
  text: string;
  /** Character offset into the document's raw text (inclusive) */
  startOffset: number;
  /** Character offset into the document's raw text (exclusive) */
  endOffset: number;
  /** Document metadata extended with chunk location keys */
  metadata: Metadata;
}

/**
 * Metadata keys the pipeline writes onto every chunk.
 */
export const CHUNK_METADATA_KEYS = {
  documentId: 'documentId',
  sourceUri: 'sourceUri',
  chunkIndex: 'chunkIndex',
  startOffset: 'startOffset',
  endOffset: 'endOffset',
} as const;

/**
 * A stored vector with its passage, keyed by chunk id.
 */
export interface IndexEntry {
  chunkId: string;
  vector: EmbeddingVector;
  text: string;
  metadata: Metadata;
}

/**
 * Raw hit from a vector index search.
 */
export interface SearchHit {
  chunkId: string;
  /** Similarity, higher is more relevant */
  score: number;
  text: string;
  metadata: Metadata;
}

/**
 * Exact-match predicates over entry metadata.
 */
export type MetadataFilter = Record<string, MetadataValue>;

/**
 * Ranked result produced by the retriever.
 */
export interface RetrievalResult {
  chunkId: string;
  text: string;
  metadata: Metadata;
  score: number;
  /** 0-based position in the final ordering */
  rank: number;
}

/**
 * Link from a citation marker in the context block to its source.
 */
export interface Citation {
  /** Marker text as it appears in the prompt, e.g. "[2]" */
  marker: string;
  /** 1-based citation number */
  index: number;
  chunkId: string;
  documentId: string | null;
  sourceUri: string | null;
  score: number;
  /** Whether the passage was cut to fit the context budget */
  truncated: boolean;
  metadata: Metadata;
}

/**
 * Prompt assembled from retrieved passages, ready for a generator.
 */
export interface ComposedPrompt {
  systemText: string;
  contextBlock: string;
  userText: string;
  citations: Citation[];
}

/**
 * A source attached to a final answer.
 */
export interface AnswerSource {
  id: string;
  title: string;
  snippet: string;
  score: number;
}

/**
 * Per-document ingestion failure.
 */
export interface IngestFailure {
  documentId: string;
  sourceUri: string | null;
  error: Error;
}

/**
 * Outcome of an ingestion run.
 */
export interface IngestReport {
  accepted: number;
  failed: IngestFailure[];
  chunksIndexed: number;
  chunksRemoved: number;
}

/**
 * Progress callback for ingestion runs.
 */
export type IngestProgressCallback = (done: number, total: number, documentId: string) => void;
