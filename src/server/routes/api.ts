/**
 * pdfdex API Routes
 * Ingestion, search and document listing over one PdfdexService
 */

import { Router, type NextFunction, type Request, type Response } from "express";
import type { PdfdexService } from "../../rag/service.js";
import { expandPages } from "../../rag/searchEngine.js";
import type { DocumentRecord, IngestError, SearchResult } from "../../rag/types.js";
import { APP_NAME, APP_VERSION } from "../../version.js";
import { ErrorCode, StorageError } from "../../utils/errors.js";
import {
  IngestRequestSchema,
  ListDocsQuerySchema,
  QueryRequestSchema,
  RemoveDocQuerySchema,
  parseRequest,
} from "../schemas.js";

/**
 * Document as listed by GET /docs
 */
interface DocumentJSON {
  id: string;
  filename: string;
  path: string;
  content_hash: string;
  mtime: number;
  size_bytes: number;
  indexed_at: number;
}

/**
 * POST /ingest response
 */
interface IngestAPIResponse {
  indexed: number;
  skipped: number;
  errors: IngestError[];
  storage_location: string;
}

/**
 * One POST /query result
 */
interface QueryResultJSON {
  doc_id: string;
  filename: string;
  path: string;
  pages: number[];
  page_start: number;
  page_end: number;
  score: number;
  snippet: string;
}

interface QueryAPIResponse {
  query: string;
  top_k: number;
  results: QueryResultJSON[];
}

export const ENDPOINTS: Record<string, string> = {
  "GET /health": "Health check endpoint",
  "GET /docs": "List indexed documents (query param: limit)",
  "DELETE /docs": "Remove an indexed document (query param: path)",
  "POST /ingest": "Ingest PDF files for indexing",
  "POST /query": "Search the indexed documents",
};

function toDocumentJSON(doc: DocumentRecord): DocumentJSON {
  return {
    id: doc.id,
    filename: doc.filename,
    path: doc.path,
    content_hash: doc.contentHash,
    mtime: doc.mtime,
    size_bytes: doc.sizeBytes,
    indexed_at: doc.indexedAt,
  };
}

function toQueryResultJSON(result: SearchResult): QueryResultJSON {
  return {
    doc_id: result.docId,
    filename: result.filename,
    path: result.path,
    pages: expandPages(result.pageStart, result.pageEnd),
    page_start: result.pageStart,
    page_end: result.pageEnd,
    score: result.score,
    snippet: result.snippet,
  };
}

/**
 * Create the API router
 */
export function createApiRouter(service: PdfdexService): Router {
  const router = Router();

  // GET / - Name, version and available routes
  router.get("/", (_req: Request, res: Response) => {
    res.json({ name: APP_NAME, version: APP_VERSION, endpoints: ENDPOINTS });
  });

  // GET /health
  router.get("/health", (_req: Request, res: Response) => {
    res.json({ status: "ok" });
  });

  // GET /docs - Most recently indexed first
  router.get("/docs", (req: Request, res: Response, next: NextFunction) => {
    try {
      const { limit } = parseRequest(ListDocsQuerySchema, req.query);
      res.json({ documents: service.listDocuments(limit).map(toDocumentJSON) });
    } catch (error) {
      next(error);
    }
  });

  // DELETE /docs?path= - Remove a document with its chunks
  router.delete("/docs", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { path } = parseRequest(RemoveDocQuerySchema, req.query);
      if (!(await service.removeDocument(path))) {
        throw new StorageError(ErrorCode.STORAGE_NOT_FOUND, `No document indexed at ${path}`, { operation: "removeDocument" });
      }
      res.json({ removed: path });
    } catch (error) {
      next(error);
    }
  });

  // POST /ingest
  router.post("/ingest", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = parseRequest(IngestRequestSchema, req.body);
      const result = await service.ingest({
        inputDir: body.input_dir,
        files: body.files,
        recursive: body.recursive,
        force: body.force,
      });
      const response: IngestAPIResponse = {
        indexed: result.indexed,
        skipped: result.skipped,
        errors: result.errors,
        storage_location: service.storageLocation,
      };
      res.json(response);
    } catch (error) {
      next(error);
    }
  });

  // POST /query
  router.post("/query", (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = parseRequest(QueryRequestSchema, req.body);
      const query = (body.query ?? "").trim();
      const topK = body.top_k ?? service.config.defaultTopK;
      const results = service.search(query, {
        topK,
        snippetChars: body.snippet_chars ?? service.config.defaultSnippetChars,
      });
      const response: QueryAPIResponse = {
        query,
        top_k: topK,
        results: results.map(toQueryResultJSON),
      };
      res.json(response);
    } catch (error) {
      next(error);
    }
  });

  return router;
}
