/**
 * Ingestion Orchestrator
 * Candidate PDF paths -> change detection -> extraction -> chunking -> atomic replace.
 *
 * Each file produces exactly one FileIngestResult; a failing file never aborts
 * the batch. Extraction may run concurrently, but commits are applied one at a
 * time in input order so the batch outcome matches sequential ingestion.
 */

import type { Stats } from "node:fs";
import fs from "node:fs/promises";
import path from "node:path";
import crypto from "node:crypto";
import { glob } from "glob";
import pLimit from "p-limit";
import { expandPath } from "../utils/config.js";
import { FileSystemError, errorMessage, isErrnoException } from "../utils/errors.js";
import { getLogger } from "../utils/logger.js";
import { shouldReindex, statForChangeDetection } from "./changeDetector.js";
import { identifyFile, type ContentIdentity } from "./contentIdentity.js";
import type { PageChunkerInterface } from "./chunker.js";
import type { PageExtractor } from "./extractor.js";
import type { IndexStore } from "./indexStore.js";
import type {
  BatchIngestResult,
  ChunkRecord,
  DocumentRecord,
  FileIngestResult,
  FileStat,
  IngestOptions,
  PageChunk,
} from "./types.js";

// ============================================================================
// Candidate collection
// ============================================================================

export interface CollectOptions {
  /** Directory to scan; falls back to the configured docs directory */
  inputDir?: string;
  /** Explicit files; when non-empty the directory is ignored */
  files?: string[];
  /** Scan subdirectories (default: true) */
  recursive?: boolean;
}

function isPdfName(filePath: string): boolean {
  return path.extname(filePath).toLowerCase() === ".pdf";
}

async function statOrNull(filePath: string): Promise<Stats | null> {
  try {
    return await fs.stat(filePath);
  } catch (err) {
    getLogger().debug(`[Ingestion] cannot stat ${filePath}`, err);
    return null;
  }
}

/**
 * Resolve the list of PDFs an ingestion request refers to.
 *
 * Explicit files are kept when they exist as regular files with a .pdf
 * extension (any case), in the given order. Otherwise the directory is
 * scanned; a missing directory yields no files.
 *
 * @example
 * ```typescript
 * const paths = await collectPdfPaths({ inputDir: "~/papers", recursive: false }, config.docsDir);
 * ```
 */
export async function collectPdfPaths(options: CollectOptions, defaultDir: string): Promise<string[]> {
  if (options.files && options.files.length > 0) {
    const kept: string[] = [];
    for (const file of options.files) {
      const resolved = expandPath(file);
      const stat = await statOrNull(resolved);
      if (stat?.isFile() && isPdfName(resolved)) {
        kept.push(resolved);
      }
    }
    return kept;
  }

  const dir = expandPath(options.inputDir ?? defaultDir);
  const stat = await statOrNull(dir);
  if (!stat) {
    return [];
  }
  if (stat.isFile()) {
    return isPdfName(dir) ? [dir] : [];
  }

  const recursive = options.recursive ?? true;
  const matches = await glob(recursive ? "**/*.pdf" : "*.pdf", {
    cwd: dir,
    nodir: true,
    absolute: true,
    nocase: true,
    windowsPathsNoEscape: process.platform === "win32",
  });
  return matches.sort();
}

/**
 * Canonical absolute form of a path; symlinks are resolved when the file exists
 */
export async function canonicalPath(filePath: string): Promise<string> {
  const resolved = expandPath(filePath);
  try {
    return await fs.realpath(resolved);
  } catch (err) {
    // Missing files keep their resolved path; the stat that follows reports them
    getLogger().debug(`[Ingestion] realpath failed for ${resolved}`, err);
    return resolved;
  }
}

// ============================================================================
// Orchestrator
// ============================================================================

/**
 * Progress information for a batch
 */
export interface IngestProgress {
  total: number;
  processed: number;
  currentFile: string;
  status: FileIngestResult["status"];
}

/**
 * Configuration for IngestionOrchestrator
 */
export interface IngestionOrchestratorConfig {
  /** Storage handle; the orchestrator never opens or closes it */
  store: IndexStore;
  extractor: PageExtractor;
  chunker: PageChunkerInterface;
  /** Files extracted at once (default: 2) */
  concurrency?: number;
  /** Clock for indexed_at, epoch milliseconds (default: Date.now) */
  now?: () => number;
}

/**
 * Work done before the commit step. Only "ready" touches the store afterwards.
 */
type PreparedFile =
  | { kind: "ready"; file: string; path: string; identity: ContentIdentity; stat: FileStat; chunks: PageChunk[] }
  | { kind: "done"; result: FileIngestResult };

function newChunkId(): string {
  return crypto.randomUUID().replace(/-/g, "");
}

async function statForStorage(filePath: string): Promise<FileStat> {
  try {
    const stat = await fs.stat(filePath);
    return { mtime: stat.mtimeMs, sizeBytes: stat.size };
  } catch (err) {
    if (isErrnoException(err)) {
      throw FileSystemError.fromNodeError(err, filePath, "stat");
    }
    throw err;
  }
}

/**
 * @example
 * ```typescript
 * const orchestrator = new IngestionOrchestrator({
 *   store,
 *   extractor: new UnpdfPageExtractor(),
 *   chunker: new PageChunker({ maxChars: 8000, minChars: 1200, maxPagesPerChunk: 3 }),
 * });
 * const result = await orchestrator.ingestBatch(paths, { force: false });
 * console.log(`Indexed: ${result.indexed}, Skipped: ${result.skipped}`);
 * ```
 */
export class IngestionOrchestrator {
  private readonly store: IndexStore;
  private readonly extractor: PageExtractor;
  private readonly chunker: PageChunkerInterface;
  private readonly concurrency: number;
  private readonly now: () => number;

  constructor(config: IngestionOrchestratorConfig) {
    this.store = config.store;
    this.extractor = config.extractor;
    this.chunker = config.chunker;
    this.concurrency = Math.max(1, Math.floor(config.concurrency ?? 2));
    this.now = config.now ?? Date.now;
  }

  /**
   * Ingest one file. Never throws; failures come back as the error variant.
   */
  async ingestFile(file: string, options: IngestOptions = {}): Promise<FileIngestResult> {
    const prepared = await this.prepare(file, options.force ?? false);
    return this.commit(prepared, options.force ?? false);
  }

  /**
   * Ingest files in order. Results and counts follow input order.
   *
   * @param onProgress - Called after each file is committed
   */
  async ingestBatch(
    files: readonly string[],
    options: IngestOptions = {},
    onProgress?: (progress: IngestProgress) => void
  ): Promise<BatchIngestResult> {
    const force = options.force ?? false;
    const limit = pLimit(this.concurrency);
    const pending = files.map((file) => limit(() => this.prepare(file, force)));

    const result: BatchIngestResult = { indexed: 0, skipped: 0, errors: [], files: [] };
    for (const [index, task] of pending.entries()) {
      const outcome = this.commit(await task, force);
      result.files.push(outcome);
      switch (outcome.status) {
        case "indexed":
          result.indexed++;
          break;
        case "skipped":
          result.skipped++;
          break;
        case "error":
          result.errors.push({ file: outcome.file, error: outcome.error });
          break;
      }
      onProgress?.({ total: files.length, processed: index + 1, currentFile: outcome.file, status: outcome.status });
    }

    getLogger().debug(
      `[Ingestion] ${result.indexed} indexed, ${result.skipped} skipped, ${result.errors.length} failed`
    );
    return result;
  }

  /**
   * Everything up to (not including) the store write. Never rejects.
   */
  private async prepare(file: string, force: boolean): Promise<PreparedFile> {
    try {
      const canonical = await canonicalPath(file);
      const existing = this.store.getDocumentByPath(canonical);
      const current = await statForChangeDetection(canonical);

      if (!shouldReindex(existing, current, force)) {
        getLogger().debug(`[Ingestion] unchanged, skipping ${canonical}`);
        return { kind: "done", result: { status: "skipped", file, path: canonical } };
      }

      const stat = current ?? (await statForStorage(canonical));
      const identity = await identifyFile(canonical);
      const pages = await this.extractor.extractPages(canonical);
      const chunks = this.chunker.chunk(pages);

      return { kind: "ready", file, path: canonical, identity, stat, chunks };
    } catch (err) {
      return { kind: "done", result: this.failure(file, err) };
    }
  }

  /**
   * Apply prepared work. Synchronous, so commits cannot interleave.
   */
  private commit(prepared: PreparedFile, force: boolean): FileIngestResult {
    if (prepared.kind === "done") {
      return prepared.result;
    }

    const { file, path: documentPath, identity, stat, chunks } = prepared;
    try {
      // The same path may have been committed earlier in this batch
      if (!force && !shouldReindex(this.store.getDocumentByPath(documentPath), stat, false)) {
        return { status: "skipped", file, path: documentPath };
      }

      const document: DocumentRecord = {
        id: identity.stableId,
        path: documentPath,
        filename: path.basename(documentPath),
        contentHash: identity.contentHash,
        mtime: stat.mtime,
        sizeBytes: stat.sizeBytes,
        indexedAt: this.now(),
      };
      const records: ChunkRecord[] = chunks.map((chunk) => ({
        ...chunk,
        id: newChunkId(),
        documentId: document.id,
        documentPath: document.path,
      }));

      this.store.replaceDocument(document, records);
      getLogger().debug(`[Ingestion] indexed ${documentPath} (${records.length} chunks)`);
      return { status: "indexed", file, document, chunkCount: records.length };
    } catch (err) {
      return this.failure(file, err);
    }
  }

  private failure(file: string, err: unknown): FileIngestResult {
    const message = errorMessage(err);
    getLogger().warn(`[Ingestion] failed ${file}: ${message}`);
    return { status: "error", file, error: message };
  }
}
