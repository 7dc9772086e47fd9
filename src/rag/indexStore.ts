/**
 * SQLite-backed index store
 *
 * Three structures kept mutually consistent by every write path:
 * - documents: one row per canonical path (path is the storage key)
 * - chunks: owned by a document path, deleted with it
 * - chunks_fts: FTS5 index over chunk text with denormalized display fields
 *
 * Document ids are content hashes, so two paths with identical bytes share an
 * id. Ownership therefore goes through the path, never the id.
 */

import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import type BetterSqlite3 from "better-sqlite3";
import { ErrorCode, StorageError, errorMessage } from "../utils/errors.js";
import { getLogger } from "../utils/logger.js";
import type { ChunkRecord, DocumentRecord, IndexStats } from "./types.js";

/** Bumped whenever the schema below changes incompatibly */
export const SCHEMA_VERSION = 1;

/** Position of the `text` column in chunks_fts, needed by snippet() */
export const FTS_TEXT_COLUMN = 6;

const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS documents (
    path TEXT PRIMARY KEY,
    id TEXT NOT NULL,
    filename TEXT NOT NULL,
    content_hash TEXT NOT NULL,
    mtime REAL NOT NULL,
    size_bytes INTEGER NOT NULL,
    indexed_at REAL NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_documents_id ON documents(id);
  CREATE INDEX IF NOT EXISTS idx_documents_indexed_at ON documents(indexed_at);

  CREATE TABLE IF NOT EXISTS chunks (
    id TEXT PRIMARY KEY,
    document_path TEXT NOT NULL REFERENCES documents(path) ON DELETE CASCADE,
    document_id TEXT NOT NULL,
    page_start INTEGER NOT NULL,
    page_end INTEGER NOT NULL,
    text TEXT NOT NULL,
    CHECK (page_start >= 1 AND page_start <= page_end)
  );

  CREATE INDEX IF NOT EXISTS idx_chunks_document_path ON chunks(document_path);

  CREATE VIRTUAL TABLE IF NOT EXISTS chunks_fts USING fts5(
    chunk_id UNINDEXED,
    document_id UNINDEXED,
    filename UNINDEXED,
    path UNINDEXED,
    page_start UNINDEXED,
    page_end UNINDEXED,
    text,
    tokenize = 'unicode61'
  );
`;

interface DocumentRow {
  path: string;
  id: string;
  filename: string;
  content_hash: string;
  mtime: number;
  size_bytes: number;
  indexed_at: number;
}

interface ChunkRow {
  id: string;
  document_path: string;
  document_id: string;
  page_start: number;
  page_end: number;
  text: string;
}

function toDocument(row: DocumentRow): DocumentRecord {
  return {
    id: row.id,
    path: row.path,
    filename: row.filename,
    contentHash: row.content_hash,
    mtime: row.mtime,
    sizeBytes: row.size_bytes,
    indexedAt: row.indexed_at,
  };
}

function toChunk(row: ChunkRow): ChunkRecord {
  return {
    id: row.id,
    documentPath: row.document_path,
    documentId: row.document_id,
    pageStart: row.page_start,
    pageEnd: row.page_end,
    text: row.text,
  };
}

/**
 * Owned handle on the index database. One instance per process holds the
 * single writer connection; pass it to the components that need it.
 *
 * @example
 * ```typescript
 * const store = IndexStore.open("./data/pdfdex.sqlite3");
 * try {
 *   store.replaceDocument(document, chunks);
 * } finally {
 *   store.close();
 * }
 * ```
 */
export class IndexStore {
  readonly location: string;
  private db: BetterSqlite3.Database | null;

  private constructor(location: string, db: BetterSqlite3.Database) {
    this.location = location;
    this.db = db;
  }

  /**
   * Open (creating if needed) the database at `dbPath`. ":memory:" is accepted.
   *
   * @throws {StorageError} If the database cannot be opened or migrated
   */
  static open(dbPath: string): IndexStore {
    const location = dbPath === ":memory:" ? dbPath : path.resolve(dbPath);
    let store: IndexStore;
    try {
      store = new IndexStore(location, connect(location));
    } catch (err) {
      throw new StorageError(ErrorCode.STORAGE_OPEN_FAILED, `Cannot open index at ${location}: ${errorMessage(err)}`, {
        cause: err instanceof Error ? err : undefined,
        operation: "open",
      });
    }
    getLogger().debug(`[IndexStore] opened ${location}`);
    return store;
  }

  /**
   * Underlying connection, for read queries owned by other components
   *
   * @throws {StorageError} If the store was closed
   */
  get connection(): BetterSqlite3.Database {
    if (!this.db) {
      throw new StorageError(ErrorCode.STORAGE_CLOSED, undefined, { operation: "connection" });
    }
    return this.db;
  }

  get isOpen(): boolean {
    return this.db !== null;
  }

  getDocumentByPath(documentPath: string): DocumentRecord | null {
    const row = this.connection
      .prepare<[string], DocumentRow>("SELECT * FROM documents WHERE path = ? LIMIT 1")
      .get(documentPath);
    return row ? toDocument(row) : null;
  }

  /**
   * All documents whose content hashes to `id` (one per path)
   */
  getDocumentsById(id: string): DocumentRecord[] {
    return this.connection
      .prepare<[string], DocumentRow>("SELECT * FROM documents WHERE id = ? ORDER BY path")
      .all(id)
      .map(toDocument);
  }

  /**
   * Most recently indexed first
   */
  listDocuments(limit: number = 200): DocumentRecord[] {
    return this.connection
      .prepare<[number], DocumentRow>("SELECT * FROM documents ORDER BY indexed_at DESC, path ASC LIMIT ?")
      .all(limit)
      .map(toDocument);
  }

  /**
   * Chunks of one document in page order
   */
  listChunks(documentPath: string): ChunkRecord[] {
    return this.connection
      .prepare<[string], ChunkRow>("SELECT * FROM chunks WHERE document_path = ? ORDER BY page_start, rowid")
      .all(documentPath)
      .map(toChunk);
  }

  countChunks(documentPath?: string): number {
    const row = documentPath === undefined
      ? this.connection.prepare<[], { n: number }>("SELECT COUNT(*) AS n FROM chunks").get()
      : this.connection.prepare<[string], { n: number }>("SELECT COUNT(*) AS n FROM chunks WHERE document_path = ?").get(documentPath);
    return row?.n ?? 0;
  }

  /**
   * Number of full-text entries, which must always equal the chunk count
   */
  countIndexEntries(documentPath?: string): number {
    const row = documentPath === undefined
      ? this.connection.prepare<[], { n: number }>("SELECT COUNT(*) AS n FROM chunks_fts").get()
      : this.connection.prepare<[string], { n: number }>("SELECT COUNT(*) AS n FROM chunks_fts WHERE path = ?").get(documentPath);
    return row?.n ?? 0;
  }

  stats(): IndexStats {
    const row = this.connection
      .prepare<[], { documents: number; chunks: number }>(
        "SELECT (SELECT COUNT(*) FROM documents) AS documents, (SELECT COUNT(*) FROM chunks) AS chunks"
      )
      .get();
    return { documentCount: row?.documents ?? 0, chunkCount: row?.chunks ?? 0 };
  }

  /**
   * Atomically replace everything stored under `document.path`: prior chunks
   * and index entries go, the document row is upserted by path, and the new
   * chunks and entries are inserted. Readers see the old set or the new set.
   *
   * @throws {StorageError} If any statement fails; nothing is changed then
   */
  replaceDocument(document: DocumentRecord, chunks: readonly ChunkRecord[]): void {
    const foreign = chunks.find((c) => c.documentPath !== document.path || c.documentId !== document.id);
    if (foreign) {
      throw new StorageError(
        ErrorCode.STORAGE_TRANSACTION_FAILED,
        `Chunk ${foreign.id} does not belong to ${document.path}`,
        { operation: "replaceDocument", recoverable: false }
      );
    }

    const db = this.connection;
    const deleteEntries = db.prepare<[string]>("DELETE FROM chunks_fts WHERE path = ?");
    const deleteChunks = db.prepare<[string]>("DELETE FROM chunks WHERE document_path = ?");
    const upsertDocument = db.prepare<[DocumentRow]>(`
      INSERT INTO documents (path, id, filename, content_hash, mtime, size_bytes, indexed_at)
      VALUES (@path, @id, @filename, @content_hash, @mtime, @size_bytes, @indexed_at)
      ON CONFLICT(path) DO UPDATE SET
        id = excluded.id,
        filename = excluded.filename,
        content_hash = excluded.content_hash,
        mtime = excluded.mtime,
        size_bytes = excluded.size_bytes,
        indexed_at = excluded.indexed_at
    `);
    const insertChunk = db.prepare<[ChunkRow]>(`
      INSERT INTO chunks (id, document_path, document_id, page_start, page_end, text)
      VALUES (@id, @document_path, @document_id, @page_start, @page_end, @text)
    `);
    const insertEntry = db.prepare<[string, string, string, string, number, number, string]>(`
      INSERT INTO chunks_fts (chunk_id, document_id, filename, path, page_start, page_end, text)
      VALUES (?, ?, ?, ?, ?, ?, ?)
    `);

    const replace = db.transaction(() => {
      deleteEntries.run(document.path);
      deleteChunks.run(document.path);
      upsertDocument.run({
        path: document.path,
        id: document.id,
        filename: document.filename,
        content_hash: document.contentHash,
        mtime: document.mtime,
        size_bytes: document.sizeBytes,
        indexed_at: document.indexedAt,
      });
      for (const chunk of chunks) {
        insertChunk.run({
          id: chunk.id,
          document_path: chunk.documentPath,
          document_id: chunk.documentId,
          page_start: chunk.pageStart,
          page_end: chunk.pageEnd,
          text: chunk.text,
        });
        insertEntry.run(
          chunk.id,
          document.id,
          document.filename,
          document.path,
          chunk.pageStart,
          chunk.pageEnd,
          chunk.text
        );
      }
    });

    try {
      replace();
    } catch (err) {
      throw StorageError.fromDriverError(err, "replaceDocument");
    }
  }

  /**
   * Delete a document, its chunks and its index entries
   *
   * @returns Whether a document was stored under that path
   */
  removeDocument(documentPath: string): boolean {
    const db = this.connection;
    const remove = db.transaction((target: string): boolean => {
      db.prepare<[string]>("DELETE FROM chunks_fts WHERE path = ?").run(target);
      db.prepare<[string]>("DELETE FROM chunks WHERE document_path = ?").run(target);
      return db.prepare<[string]>("DELETE FROM documents WHERE path = ?").run(target).changes > 0;
    });

    try {
      return remove(documentPath);
    } catch (err) {
      throw StorageError.fromDriverError(err, "removeDocument");
    }
  }

  close(): void {
    if (this.db) {
      this.db.close();
      this.db = null;
      getLogger().debug(`[IndexStore] closed ${this.location}`);
    }
  }
}

function connect(location: string): BetterSqlite3.Database {
  if (location !== ":memory:") {
    fs.mkdirSync(path.dirname(location), { recursive: true });
  }
  const db = new Database(location);
  try {
    db.pragma("journal_mode = WAL");
    db.pragma("synchronous = NORMAL");
    db.pragma("temp_store = MEMORY");
    db.pragma("foreign_keys = ON");
    initSchema(db);
  } catch (err) {
    db.close();
    throw err;
  }
  return db;
}

function initSchema(db: BetterSqlite3.Database): void {
  const current = db.pragma("user_version", { simple: true });
  if (typeof current === "number" && current > SCHEMA_VERSION) {
    throw new Error(`index schema v${current} is newer than supported v${SCHEMA_VERSION}`);
  }
  db.exec(SCHEMA_SQL);
  db.pragma(`user_version = ${SCHEMA_VERSION}`);
}
