// pdfdex 인덱싱/검색 모듈

export type {
  DocumentRecord,
  PageChunk,
  ChunkRecord,
  ChunkingOptions,
  FileStat,
  SearchOptions,
  SearchResult,
  IngestOptions,
  FileIngestResult,
  IngestError,
  BatchIngestResult,
  IndexStats,
} from "./types.js";

export { identifyFile, identifyBytes, stableDocId, type ContentIdentity } from "./contentIdentity.js";

export { UnpdfPageExtractor, type PageExtractor, type PdfDocumentHandle, type PdfOpener } from "./extractor.js";

export {
  PageChunker,
  chunkPages,
  flush,
  step,
  EMPTY_STATE,
  PAGE_SEPARATOR,
  type ChunkerState,
  type ChunkerStep,
  type PageChunkerInterface,
} from "./chunker.js";

export { shouldReindex, statForChangeDetection } from "./changeDetector.js";

export { IndexStore, SCHEMA_VERSION } from "./indexStore.js";

export { SearchEngine, expandPages, snippetTokenWindow, clampSnippet } from "./searchEngine.js";

export {
  IngestionOrchestrator,
  collectPdfPaths,
  canonicalPath,
  type CollectOptions,
  type IngestProgress,
  type IngestionOrchestratorConfig,
} from "./ingestion.js";

export {
  PdfdexService,
  type IngestRequest,
  type QueryOptions,
  type PdfdexServiceDependencies,
} from "./service.js";
