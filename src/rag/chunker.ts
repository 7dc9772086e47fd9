/**
 * Page Chunker
 * Partitions per-page PDF text into page-bounded retrieval units.
 *
 * Greedy forward accumulation:
 * - pages are never split, so one oversized page is its own chunk
 * - empty pages neither start nor extend a chunk
 * - a chunk below minChars absorbs the next page even past maxChars,
 *   as long as the page span stays within maxPagesPerChunk
 */

import { ErrorCode, ValidationError } from "../utils/errors.js";
import { codePointLength, normalizeText } from "../utils/text.js";
import type { ChunkingOptions, PageChunk } from "./types.js";

/** Separator used when joining buffered pages; counts toward chunk length */
export const PAGE_SEPARATOR = "\n";

/**
 * Accumulator state. An empty buffer means no chunk is open and the
 * page fields are meaningless.
 */
export interface ChunkerState {
  readonly buffer: readonly string[];
  readonly chunkStartPage: number;
  readonly chunkEndPage: number;
}

export interface ChunkerStep {
  state: ChunkerState;
  /** Chunk completed by this step, if any */
  emitted: PageChunk | null;
}

export const EMPTY_STATE: ChunkerState = { buffer: [], chunkStartPage: 0, chunkEndPage: 0 };

/** Chunk sizes are measured in code points */
function joinedLength(buffer: readonly string[]): number {
  return codePointLength(buffer.join(PAGE_SEPARATOR));
}

/**
 * Close the open chunk.
 * Returns null when nothing is buffered or the text normalizes to empty.
 */
export function flush(state: ChunkerState): PageChunk | null {
  if (state.buffer.length === 0) {
    return null;
  }
  const text = normalizeText(state.buffer.join(PAGE_SEPARATOR));
  if (!text) {
    return null;
  }
  return { pageStart: state.chunkStartPage, pageEnd: state.chunkEndPage, text };
}

function open(pageNumber: number, text: string): ChunkerState {
  return { buffer: [text], chunkStartPage: pageNumber, chunkEndPage: pageNumber };
}

function extend(state: ChunkerState, pageNumber: number, text: string): ChunkerState {
  return {
    buffer: [...state.buffer, text],
    chunkStartPage: state.chunkStartPage,
    chunkEndPage: pageNumber,
  };
}

/**
 * Feed one page (1-based number) into the accumulator
 */
export function step(
  state: ChunkerState,
  pageNumber: number,
  pageText: string,
  options: ChunkingOptions
): ChunkerStep {
  if (!normalizeText(pageText)) {
    return { state, emitted: null };
  }

  if (state.buffer.length === 0) {
    return { state: open(pageNumber, pageText), emitted: null };
  }

  const candidateLength = joinedLength(state.buffer) + codePointLength(PAGE_SEPARATOR) + codePointLength(pageText);
  const pagesSpanned = pageNumber - state.chunkStartPage + 1;
  const withinPages = pagesSpanned <= options.maxPagesPerChunk;

  if (candidateLength <= options.maxChars && withinPages) {
    return { state: extend(state, pageNumber, pageText), emitted: null };
  }

  // Accept an oversized chunk rather than emit a runt
  if (joinedLength(state.buffer) < options.minChars && withinPages) {
    return { state: extend(state, pageNumber, pageText), emitted: null };
  }

  return { state: open(pageNumber, pageText), emitted: flush(state) };
}

/**
 * @throws {ValidationError} If a bound is not a usable integer
 */
export function validateChunkingOptions(options: ChunkingOptions): void {
  const checks: Array<[keyof ChunkingOptions, number]> = [
    ["maxChars", 1],
    ["minChars", 0],
    ["maxPagesPerChunk", 1],
  ];
  for (const [field, min] of checks) {
    const value = options[field];
    if (!Number.isInteger(value) || value < min) {
      throw new ValidationError(
        ErrorCode.VALIDATION_INVALID_FORMAT,
        `${field} must be an integer >= ${min}`,
        { field, value }
      );
    }
  }
}

/**
 * Chunk a document given its pages in order (pages[i] is page i + 1).
 * A document whose pages are all empty yields no chunks.
 */
export function chunkPages(pages: readonly string[], options: ChunkingOptions): PageChunk[] {
  validateChunkingOptions(options);

  const chunks: PageChunk[] = [];
  let state = EMPTY_STATE;

  pages.forEach((pageText, index) => {
    const next = step(state, index + 1, pageText, options);
    if (next.emitted) {
      chunks.push(next.emitted);
    }
    state = next.state;
  });

  const last = flush(state);
  if (last) {
    chunks.push(last);
  }
  return chunks;
}

/**
 * Interface for page chunkers, so the orchestrator can take a custom one
 */
export interface PageChunkerInterface {
  chunk(pages: readonly string[]): PageChunk[];
}

/**
 * Chunker bound to fixed options
 *
 * @example
 * ```typescript
 * const chunker = new PageChunker({ maxChars: 8000, minChars: 1200, maxPagesPerChunk: 3 });
 * const chunks = chunker.chunk(["Intro", "", "Body"]);
 * ```
 */
export class PageChunker implements PageChunkerInterface {
  readonly options: ChunkingOptions;

  constructor(options: ChunkingOptions) {
    validateChunkingOptions(options);
    this.options = { ...options };
  }

  chunk(pages: readonly string[]): PageChunk[] {
    return chunkPages(pages, this.options);
  }
}
