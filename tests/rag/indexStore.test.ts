/**
 * Tests for the SQLite index store
 */

import { describe, it, expect, beforeEach, afterEach } from "@jest/globals";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { IndexStore, SCHEMA_VERSION } from "../../src/rag/indexStore.js";
import { ErrorCode, StorageError } from "../../src/utils/errors.js";
import { makeChunks, makeDocument } from "../helpers/records.js";

describe("IndexStore", () => {
  let tempDir: string;
  let dbPath: string;
  let store: IndexStore;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "pdfdex-store-"));
    dbPath = path.join(tempDir, "nested", "index.sqlite3");
    store = IndexStore.open(dbPath);
  });

  afterEach(async () => {
    store.close();
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  describe("open", () => {
    it("should create the database and its parent directory", async () => {
      await expect(fs.stat(dbPath)).resolves.toBeDefined();
      expect(store.location).toBe(dbPath);
      expect(store.connection.pragma("user_version", { simple: true })).toBe(SCHEMA_VERSION);
      expect(store.stats()).toEqual({ documentCount: 0, chunkCount: 0 });
    });

    it("should enable foreign keys and WAL", () => {
      expect(store.connection.pragma("foreign_keys", { simple: true })).toBe(1);
      expect(store.connection.pragma("journal_mode", { simple: true })).toBe("wal");
    });

    it("should fail with a storage error when the location is unusable", async () => {
      const blocker = path.join(tempDir, "blocker");
      await fs.writeFile(blocker, "not a directory");

      expect(() => IndexStore.open(path.join(blocker, "index.sqlite3"))).toThrow(StorageError);
    });

    it("should accept an in-memory database", () => {
      const memory = IndexStore.open(":memory:");
      try {
        expect(memory.location).toBe(":memory:");
        expect(memory.stats()).toEqual({ documentCount: 0, chunkCount: 0 });
      } finally {
        memory.close();
      }
    });
  });

  describe("replaceDocument", () => {
    it("should store the document, its chunks and one index entry per chunk", () => {
      const doc = makeDocument({ path: "/docs/report.pdf" });
      const chunks = makeChunks(doc, [
        { pageStart: 1, pageEnd: 2, text: "first chunk" },
        { pageStart: 3, pageEnd: 3, text: "second chunk" },
      ]);

      store.replaceDocument(doc, chunks);

      expect(store.getDocumentByPath("/docs/report.pdf")).toEqual(doc);
      expect(store.listChunks("/docs/report.pdf")).toEqual(chunks);
      expect(store.countChunks("/docs/report.pdf")).toBe(2);
      expect(store.countIndexEntries("/docs/report.pdf")).toBe(2);
    });

    it("should leave no chunks from the previous version", () => {
      const doc = makeDocument({ path: "/docs/report.pdf" });
      store.replaceDocument(
        doc,
        makeChunks(doc, [
          { pageStart: 1, pageEnd: 1, text: "old one" },
          { pageStart: 2, pageEnd: 2, text: "old two" },
          { pageStart: 3, pageEnd: 3, text: "old three" },
        ])
      );

      const updated = makeDocument({ path: "/docs/report.pdf", id: "b".repeat(64), sizeBytes: 4096 });
      const fresh = makeChunks(updated, [{ pageStart: 1, pageEnd: 3, text: "new content" }]);
      store.replaceDocument(updated, fresh);

      expect(store.getDocumentByPath("/docs/report.pdf")).toEqual(updated);
      expect(store.listChunks("/docs/report.pdf")).toEqual(fresh);
      expect(store.countIndexEntries()).toBe(1);
      expect(store.stats()).toEqual({ documentCount: 1, chunkCount: 1 });
    });

    it("should keep documents with shared content separate", () => {
      const first = makeDocument({ path: "/docs/a.pdf" });
      const second = makeDocument({ path: "/docs/copy/a.pdf" });
      store.replaceDocument(first, makeChunks(first, [{ pageStart: 1, pageEnd: 1, text: "shared" }]));
      store.replaceDocument(second, makeChunks(second, [{ pageStart: 1, pageEnd: 1, text: "shared" }]));

      expect(store.getDocumentsById(first.id).map((doc) => doc.path)).toEqual(["/docs/a.pdf", "/docs/copy/a.pdf"]);

      // Reindexing one copy must not touch the other's chunks
      store.replaceDocument(first, makeChunks(first, [{ pageStart: 1, pageEnd: 1, text: "changed" }]));
      expect(store.countChunks("/docs/copy/a.pdf")).toBe(1);
      expect(store.countIndexEntries("/docs/copy/a.pdf")).toBe(1);
      expect(store.stats()).toEqual({ documentCount: 2, chunkCount: 2 });
    });

    it("should roll back everything when an insert fails", () => {
      const doc = makeDocument({ path: "/docs/report.pdf" });
      const original = makeChunks(doc, [{ pageStart: 1, pageEnd: 1, text: "original" }]);
      store.replaceDocument(doc, original);

      const updated = makeDocument({ path: "/docs/report.pdf", sizeBytes: 9999 });
      const [duplicate] = makeChunks(updated, [{ pageStart: 1, pageEnd: 1, text: "one" }]);

      expect(() => store.replaceDocument(updated, [duplicate, { ...duplicate, text: "two" }])).toThrow(StorageError);

      expect(store.getDocumentByPath("/docs/report.pdf")).toEqual(doc);
      expect(store.listChunks("/docs/report.pdf")).toEqual(original);
      expect(store.countIndexEntries("/docs/report.pdf")).toBe(1);
    });

    it("should reject chunks that belong to another document", () => {
      const doc = makeDocument({ path: "/docs/report.pdf" });
      const other = makeDocument({ path: "/docs/other.pdf" });

      expect(() =>
        store.replaceDocument(doc, makeChunks(other, [{ pageStart: 1, pageEnd: 1, text: "x" }]))
      ).toThrow("does not belong to /docs/report.pdf");
      expect(store.getDocumentByPath("/docs/report.pdf")).toBeNull();
    });

    it("should accept a document with no chunks", () => {
      const doc = makeDocument({ path: "/docs/blank.pdf" });

      store.replaceDocument(doc, []);

      expect(store.getDocumentByPath("/docs/blank.pdf")).toEqual(doc);
      expect(store.countChunks("/docs/blank.pdf")).toBe(0);
    });
  });

  describe("listDocuments", () => {
    it("should list most recently indexed first, then by path", () => {
      store.replaceDocument(makeDocument({ path: "/docs/old.pdf", indexedAt: 1000 }), []);
      store.replaceDocument(makeDocument({ path: "/docs/b.pdf", indexedAt: 3000 }), []);
      store.replaceDocument(makeDocument({ path: "/docs/a.pdf", indexedAt: 3000 }), []);

      expect(store.listDocuments().map((doc) => doc.path)).toEqual(["/docs/a.pdf", "/docs/b.pdf", "/docs/old.pdf"]);
      expect(store.listDocuments(1).map((doc) => doc.path)).toEqual(["/docs/a.pdf"]);
    });
  });

  describe("removeDocument", () => {
    it("should delete the document with its chunks and index entries", () => {
      const doc = makeDocument({ path: "/docs/report.pdf" });
      store.replaceDocument(doc, makeChunks(doc, [{ pageStart: 1, pageEnd: 1, text: "gone soon" }]));

      expect(store.removeDocument("/docs/report.pdf")).toBe(true);

      expect(store.getDocumentByPath("/docs/report.pdf")).toBeNull();
      expect(store.countChunks()).toBe(0);
      expect(store.countIndexEntries()).toBe(0);
    });

    it("should report an unknown path", () => {
      expect(store.removeDocument("/docs/never.pdf")).toBe(false);
    });
  });

  describe("close", () => {
    it("should persist data across reopen", () => {
      const doc = makeDocument({ path: "/docs/report.pdf" });
      store.replaceDocument(doc, makeChunks(doc, [{ pageStart: 1, pageEnd: 1, text: "kept" }]));
      store.close();

      store = IndexStore.open(dbPath);
      expect(store.getDocumentByPath("/docs/report.pdf")).toEqual(doc);
      expect(store.countIndexEntries()).toBe(1);
    });

    it("should refuse use after close and tolerate a second close", () => {
      store.close();

      expect(store.isOpen).toBe(false);
      expect(() => store.stats()).toThrow(expect.objectContaining({ code: ErrorCode.STORAGE_CLOSED }));
      expect(() => store.close()).not.toThrow();
    });
  });
});
