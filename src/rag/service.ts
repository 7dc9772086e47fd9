/**
 * pdfdex Service - 통합 인덱싱/검색 서비스
 * Owns the index store for its lifetime; created with open(), released with close().
 * There is no shared instance: callers pass the service to whatever needs it.
 */

import type { PdfdexConfig } from "../utils/config.js";
import { getLogger } from "../utils/logger.js";
import { PageChunker, type PageChunkerInterface } from "./chunker.js";
import { UnpdfPageExtractor, type PageExtractor } from "./extractor.js";
import { IndexStore } from "./indexStore.js";
import { IngestionOrchestrator, canonicalPath, collectPdfPaths, type CollectOptions, type IngestProgress } from "./ingestion.js";
import { SearchEngine } from "./searchEngine.js";
import type { BatchIngestResult, DocumentRecord, IndexStats, SearchResult } from "./types.js";

/**
 * Ingestion request in its validated form
 */
export interface IngestRequest extends CollectOptions {
  force?: boolean;
}

/**
 * Search options; omitted values use the configured defaults
 */
export interface QueryOptions {
  topK?: number;
  snippetChars?: number;
}

/**
 * Collaborators that can be swapped, mainly for tests
 */
export interface PdfdexServiceDependencies {
  extractor?: PageExtractor;
  chunker?: PageChunkerInterface;
  /** Clock for indexed_at (default: Date.now) */
  now?: () => number;
}

export class PdfdexService {
  readonly config: PdfdexConfig;
  private readonly store: IndexStore;
  private readonly orchestrator: IngestionOrchestrator;
  private readonly engine: SearchEngine;

  private constructor(config: PdfdexConfig, store: IndexStore, deps: PdfdexServiceDependencies) {
    this.config = config;
    this.store = store;
    this.orchestrator = new IngestionOrchestrator({
      store,
      extractor: deps.extractor ?? new UnpdfPageExtractor(),
      chunker:
        deps.chunker ??
        new PageChunker({
          maxChars: config.maxChunkChars,
          minChars: config.minChunkChars,
          maxPagesPerChunk: config.maxPagesPerChunk,
        }),
      concurrency: config.ingestConcurrency,
      now: deps.now,
    });
    this.engine = new SearchEngine(store);
  }

  /**
   * Open the index named by `config.dbPath`
   *
   * @throws {StorageError} If the database cannot be opened
   * @throws {ValidationError} If the chunking bounds are invalid
   */
  static open(config: PdfdexConfig, deps: PdfdexServiceDependencies = {}): PdfdexService {
    const store = IndexStore.open(config.dbPath);
    try {
      const service = new PdfdexService(config, store, deps);
      getLogger().debug(`[PdfdexService] ready, index at ${store.location}`);
      return service;
    } catch (err) {
      store.close();
      throw err;
    }
  }

  get storageLocation(): string {
    return this.store.location;
  }

  get isOpen(): boolean {
    return this.store.isOpen;
  }

  /**
   * Resolve the request's candidate files and ingest them
   */
  async ingest(request: IngestRequest = {}, onProgress?: (progress: IngestProgress) => void): Promise<BatchIngestResult> {
    const files = await collectPdfPaths(request, this.config.docsDir);
    getLogger().debug(`[PdfdexService] ${files.length} candidate file(s)`);
    return this.orchestrator.ingestBatch(files, { force: request.force ?? false }, onProgress);
  }

  /**
   * Ingest an explicit list of paths without filtering them first
   */
  ingestPaths(files: readonly string[], force: boolean = false): Promise<BatchIngestResult> {
    return this.orchestrator.ingestBatch(files, { force });
  }

  /**
   * @throws {ValidationError} On a blank or malformed query
   */
  search(query: string, options: QueryOptions = {}): SearchResult[] {
    return this.engine.search(query, {
      topK: options.topK ?? this.config.defaultTopK,
      snippetChars: options.snippetChars ?? this.config.defaultSnippetChars,
    });
  }

  listDocuments(limit: number = 200): DocumentRecord[] {
    return this.store.listDocuments(limit);
  }

  /**
   * Look a document up by any path that resolves to its stored one
   */
  async getDocument(documentPath: string): Promise<DocumentRecord | null> {
    return this.store.getDocumentByPath(await canonicalPath(documentPath));
  }

  /**
   * @returns Whether a document was stored under that path
   */
  async removeDocument(documentPath: string): Promise<boolean> {
    const target = await canonicalPath(documentPath);
    const removed = this.store.removeDocument(target);
    if (removed) {
      getLogger().debug(`[PdfdexService] removed ${target}`);
    }
    return removed;
  }

  stats(): IndexStats {
    return this.store.stats();
  }

  close(): void {
    this.store.close();
  }
}
