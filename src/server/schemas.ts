/**
 * Request schemas for the HTTP API
 *
 * Bodies use snake_case field names. Numeric fields accept numeric strings.
 */

import { z } from "zod";
import { ErrorCode, ValidationError } from "../utils/errors.js";

// ============================================================================
// POST /ingest
// ============================================================================

export const IngestRequestSchema = z.object({
  /** Directory to scan (default: configured docs directory) */
  input_dir: z.string().min(1, "input_dir must not be empty").optional(),
  /** Explicit PDF paths; when non-empty, input_dir is ignored */
  files: z.array(z.string().min(1, "files entries must not be empty")).optional(),
  /** Scan subdirectories of input_dir */
  recursive: z.boolean().default(true),
  /** Reindex unchanged files */
  force: z.boolean().default(false),
});

export type IngestRequestBody = z.infer<typeof IngestRequestSchema>;

// ============================================================================
// POST /query
// ============================================================================

export const QueryRequestSchema = z.object({
  /** Checked for blankness by the search engine */
  query: z.string().nullish(),
  top_k: z.coerce.number().int().positive("top_k must be positive").max(1000).nullish(),
  snippet_chars: z.coerce.number().int().positive("snippet_chars must be positive").max(100_000).nullish(),
});

export type QueryRequestBody = z.infer<typeof QueryRequestSchema>;

// ============================================================================
// GET /docs, DELETE /docs
// ============================================================================

export const DOCS_LIMIT_DEFAULT = 200;
export const DOCS_LIMIT_MAX = 10_000;

export const ListDocsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(DOCS_LIMIT_MAX).default(DOCS_LIMIT_DEFAULT),
});

export const RemoveDocQuerySchema = z.object({
  path: z.string().trim().min(1, "path must not be empty"),
});

/**
 * Validate input against a schema, reporting the first issue as a ValidationError
 *
 * @throws {ValidationError}
 */
export function parseRequest<T extends z.ZodTypeAny>(schema: T, input: unknown): z.output<T> {
  const result = schema.safeParse(input ?? {});
  if (result.success) {
    return result.data;
  }
  const issue = result.error.issues[0];
  const field = issue && issue.path.length > 0 ? issue.path.join(".") : undefined;
  const message = issue ? (field ? `${field}: ${issue.message}` : issue.message) : "Invalid request";
  throw new ValidationError(ErrorCode.VALIDATION_INVALID_FORMAT, message, { field });
}
