/**
 * pdfdex 인덱스 타입 정의
 * Documents, chunks, index entries and search results
 */

// ============================================================================
// Stored records
// ============================================================================

/**
 * One ingested PDF. At most one record exists per canonical path.
 */
export interface DocumentRecord {
  /** Content-derived identifier (equal to contentHash) */
  id: string;
  /** Canonical absolute path, the storage key */
  path: string;
  filename: string;
  /** SHA-256 hex digest of the full file bytes */
  contentHash: string;
  /** File modification time in epoch milliseconds, as reported by stat */
  mtime: number;
  sizeBytes: number;
  /** Epoch milliseconds of the last successful (re)indexing */
  indexedAt: number;
}

/**
 * Page-bounded slice of extracted text, before it is bound to a document
 */
export interface PageChunk {
  /** 1-based, inclusive */
  pageStart: number;
  /** 1-based, inclusive (pageStart <= pageEnd) */
  pageEnd: number;
  /** Normalized text of the covered pages */
  text: string;
}

/**
 * Stored chunk. Its id is random: chunk identity is local to one ingestion.
 */
export interface ChunkRecord extends PageChunk {
  id: string;
  /** Content identifier of the owning document */
  documentId: string;
  /** Storage key of the owning document */
  documentPath: string;
}

/**
 * Chunking bounds
 */
export interface ChunkingOptions {
  /** Upper bound on a chunk's joined length, relaxed only to avoid runts */
  maxChars: number;
  /** Chunks shorter than this absorb the next page even when it overflows maxChars */
  minChars: number;
  /** Upper bound on pages spanned, counted by page position */
  maxPagesPerChunk: number;
}

/**
 * File facts the change detector compares
 */
export interface FileStat {
  mtime: number;
  sizeBytes: number;
}

// ============================================================================
// Search
// ============================================================================

export interface SearchOptions {
  /** Maximum number of results */
  topK: number;
  /** Upper bound on snippet length in characters */
  snippetChars: number;
}

export interface SearchResult {
  docId: string;
  filename: string;
  path: string;
  pageStart: number;
  pageEnd: number;
  /** bm25 score; lower is better, results are already sorted best first */
  score: number;
  /** Excerpt with matched terms wrapped in [ and ], elisions marked with … */
  snippet: string;
}

// ============================================================================
// Ingestion
// ============================================================================

export interface IngestOptions {
  /** Reindex even when mtime and size are unchanged */
  force?: boolean;
}

/**
 * Outcome of one file in a batch
 */
export type FileIngestResult =
  | { status: "indexed"; file: string; document: DocumentRecord; chunkCount: number }
  | { status: "skipped"; file: string; path: string }
  | { status: "error"; file: string; error: string };

export interface IngestError {
  file: string;
  error: string;
}

export interface BatchIngestResult {
  indexed: number;
  skipped: number;
  errors: IngestError[];
  /** Per-file outcomes in input order */
  files: FileIngestResult[];
}

export interface IndexStats {
  documentCount: number;
  chunkCount: number;
}
