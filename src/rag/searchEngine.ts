/**
 * Ranked full-text search over indexed chunks.
 *
 * Matching and ranking are FTS5's: bm25 is lower-is-better, so ordering by it
 * ascending puts the best result first. Snippets come from FTS5's snippet()
 * with a token window derived from the requested character budget.
 */

import { ErrorCode, StorageError, ValidationError, errorMessage } from "../utils/errors.js";
import { getLogger } from "../utils/logger.js";
import { FTS_TEXT_COLUMN, type IndexStore } from "./indexStore.js";
import type { SearchOptions, SearchResult } from "./types.js";

export const HIGHLIGHT_OPEN = "[";
export const HIGHLIGHT_CLOSE = "]";
export const ELLIPSIS = "…";

/** Rough characters per token used to size the snippet window */
const CHARS_PER_TOKEN = 6;
/** FTS5 accepts at most 64 tokens per snippet */
const MAX_SNIPPET_TOKENS = 64;

interface SearchRow {
  document_id: string;
  filename: string;
  path: string;
  page_start: number;
  page_end: number;
  score: number;
  snippet: string;
}

/**
 * Number of tokens to ask snippet() for, given a character budget
 */
export function snippetTokenWindow(snippetChars: number): number {
  return Math.min(MAX_SNIPPET_TOKENS, Math.max(1, Math.ceil(snippetChars / CHARS_PER_TOKEN)));
}

/**
 * Cut a snippet to `maxChars` code points, marking the cut with an ellipsis.
 * A highlight the cut would leave open is dropped whole.
 */
export function clampSnippet(snippet: string, maxChars: number): string {
  const chars = Array.from(snippet);
  if (chars.length <= maxChars) {
    return snippet;
  }
  if (maxChars <= 1) {
    return chars.slice(0, maxChars).join("");
  }
  let kept = chars.slice(0, maxChars - 1).join("");
  const open = kept.lastIndexOf(HIGHLIGHT_OPEN);
  if (open > kept.lastIndexOf(HIGHLIGHT_CLOSE)) {
    kept = kept.slice(0, open);
  }
  return kept.trimEnd() + ELLIPSIS;
}

/**
 * Inclusive page range as a list, for display
 */
export function expandPages(pageStart: number, pageEnd: number): number[] {
  const pages: number[] = [];
  for (let page = pageStart; page <= pageEnd; page++) {
    pages.push(page);
  }
  return pages;
}

function requirePositiveInt(value: number, field: string): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new ValidationError(ErrorCode.VALIDATION_INVALID_FORMAT, `${field} must be a positive integer`, {
      field,
      value,
    });
  }
}

/** Messages FTS5 uses for a MATCH expression it cannot parse */
const QUERY_ERROR_MARKERS = ["fts5:", "syntax error", "unterminated string", "no such column", "unknown special query"];

function isQuerySyntaxError(error: unknown): boolean {
  const message = errorMessage(error);
  return QUERY_ERROR_MARKERS.some((marker) => message.includes(marker));
}

export class SearchEngine {
  private readonly store: IndexStore;

  constructor(store: IndexStore) {
    this.store = store;
  }

  /**
   * @throws {ValidationError} On a blank or unparsable query, or bad options
   * @throws {StorageError} If the index cannot be read
   */
  search(query: string, options: SearchOptions): SearchResult[] {
    const trimmed = query.trim();
    if (!trimmed) {
      throw new ValidationError(ErrorCode.VALIDATION_REQUIRED_FIELD, "Missing 'query'", { field: "query" });
    }
    requirePositiveInt(options.topK, "top_k");
    requirePositiveInt(options.snippetChars, "snippet_chars");

    const statement = this.store.connection.prepare<[number, string, number], SearchRow>(`
      SELECT
        document_id,
        filename,
        path,
        page_start,
        page_end,
        bm25(chunks_fts) AS score,
        snippet(chunks_fts, ${FTS_TEXT_COLUMN}, '${HIGHLIGHT_OPEN}', '${HIGHLIGHT_CLOSE}', '${ELLIPSIS}', ?) AS snippet
      FROM chunks_fts
      WHERE chunks_fts MATCH ?
      ORDER BY score
      LIMIT ?
    `);

    let rows: SearchRow[];
    try {
      rows = statement.all(snippetTokenWindow(options.snippetChars), trimmed, options.topK);
    } catch (err) {
      if (isQuerySyntaxError(err)) {
        throw new ValidationError(ErrorCode.VALIDATION_INVALID_QUERY, `Invalid query: ${errorMessage(err)}`, {
          field: "query",
          value: trimmed,
          cause: err instanceof Error ? err : undefined,
        });
      }
      throw new StorageError(ErrorCode.STORAGE_QUERY_FAILED, `Search failed: ${errorMessage(err)}`, {
        cause: err instanceof Error ? err : undefined,
        operation: "search",
      });
    }

    getLogger().debug(`[SearchEngine] "${trimmed}" -> ${rows.length} result(s)`);

    return rows.map((row) => ({
      docId: String(row.document_id),
      filename: String(row.filename),
      path: String(row.path),
      pageStart: Number(row.page_start),
      pageEnd: Number(row.page_end),
      score: Number(row.score),
      snippet: clampSnippet(String(row.snippet), options.snippetChars),
    }));
  }
}
