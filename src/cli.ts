/**
 * pdfdex CLI
 *
 * Subcommands:
 *   serve   - Run the HTTP API
 *   ingest  - Index PDFs from a directory or explicit files
 *   query   - Full-text search over indexed chunks
 *   docs    - List indexed documents
 *   remove  - Drop a document from the index
 *
 * Exit codes:
 *   0 - Success
 *   1 - Invalid arguments or configuration
 *   2 - Ingestion finished with per-file errors
 *   3 - Execution failed
 */

import { loadConfig, type PdfdexConfig } from "./utils/config.js";
import { formatErrorForUser, ValidationError } from "./utils/errors.js";
import { configureLogger, loggerOptionsFromEnv, type Logger } from "./utils/logger.js";
import { PdfdexService, type PdfdexServiceDependencies } from "./rag/service.js";
import { expandPages } from "./rag/searchEngine.js";
import type { IngestProgress } from "./rag/ingestion.js";
import type { BatchIngestResult, DocumentRecord, SearchResult } from "./rag/types.js";
import { handleSignals, startServer } from "./server/startServer.js";
import { APP_NAME, APP_VERSION } from "./version.js";

// Exit codes
export const EXIT_SUCCESS = 0;
export const EXIT_VALIDATION_FAILED = 1;
export const EXIT_INGEST_ERRORS = 2;
export const EXIT_EXECUTION_FAILED = 3;

// Types
export type CliCommand =
  | { name: "serve" }
  | { name: "ingest"; dir?: string; files: string[]; recursive: boolean; force: boolean }
  | { name: "query"; text: string; topk?: number; snippetChars?: number }
  | { name: "docs"; limit: number }
  | { name: "remove"; path: string }
  | { name: "help" };

export interface CliOptions {
  command: CliCommand;
  verbose: boolean;
  /** Print machine-readable JSON instead of text */
  json: boolean;
}

export type ParseResult = { ok: true; options: CliOptions } | { ok: false; error: string };

/**
 * I/O and collaborators, replaceable in tests
 */
export interface CliContext {
  env?: NodeJS.ProcessEnv;
  stdout?: (line: string) => void;
  stderr?: (line: string) => void;
  deps?: PdfdexServiceDependencies;
  /** Install SIGINT/SIGTERM handlers for `serve` (default: true) */
  handleSignals?: boolean;
}

const SUBCOMMANDS = ["serve", "ingest", "query", "docs", "remove"] as const;
type Subcommand = (typeof SUBCOMMANDS)[number];

function isSubcommand(value: string): value is Subcommand {
  return SUBCOMMANDS.some((name) => name === value);
}

function parsePositiveInt(value: string): number | null {
  if (!/^\d+$/.test(value)) {
    return null;
  }
  const parsed = parseInt(value, 10);
  return parsed >= 1 ? parsed : null;
}

function fail(error: string): ParseResult {
  return { ok: false, error };
}

/**
 * Parse command-line arguments (without the node and script entries)
 */
export function parseArgs(args: readonly string[]): ParseResult {
  let verbose = false;
  let json = false;
  let help = false;
  let subcommand: Subcommand | null = null;
  const positionals: string[] = [];

  // ingest
  let dir: string | undefined;
  const files: string[] = [];
  let recursive = true;
  let force = false;
  // query / docs
  let topk: number | undefined;
  let snippetChars: number | undefined;
  let limit = 200;

  let i = 0;
  while (i < args.length) {
    const arg = args[i];
    const next = args[i + 1];

    if (arg === "-v" || arg === "--verbose") {
      verbose = true;
    } else if (arg === "-h" || arg === "--help") {
      help = true;
    } else if (arg === "--json") {
      json = true;
    } else if (arg === "--dir") {
      if (next === undefined) return fail("--dir requires a path");
      dir = next;
      i++;
    } else if (arg === "--file") {
      if (next === undefined) return fail("--file requires a path");
      files.push(next);
      i++;
    } else if (arg === "--no-recursive") {
      recursive = false;
    } else if (arg === "--force") {
      force = true;
    } else if (arg === "--topk" || arg === "--snippet-chars" || arg === "--limit") {
      const value = next === undefined ? null : parsePositiveInt(next);
      if (value === null) return fail(`${arg} requires a positive integer`);
      if (arg === "--topk") topk = value;
      else if (arg === "--snippet-chars") snippetChars = value;
      else limit = value;
      i++;
    } else if (arg.startsWith("-") && arg !== "-") {
      return fail(`Unknown option "${arg}"`);
    } else if (subcommand === null) {
      if (!isSubcommand(arg)) return fail(`Unknown command "${arg}"`);
      subcommand = arg;
    } else {
      positionals.push(arg);
    }

    i++;
  }

  if (help || subcommand === null) {
    return { ok: true, options: { command: { name: "help" }, verbose, json } };
  }

  let command: CliCommand;
  switch (subcommand) {
    case "serve":
      command = { name: "serve" };
      break;
    case "ingest":
      // Bare paths are taken as files
      command = { name: "ingest", dir, files: [...files, ...positionals], recursive, force };
      break;
    case "query": {
      const text = positionals.join(" ").trim();
      if (!text) return fail("query requires search text");
      command = { name: "query", text, topk, snippetChars };
      break;
    }
    case "docs":
      if (limit > 10_000) return fail("--limit must be at most 10000");
      command = { name: "docs", limit };
      break;
    case "remove":
      if (positionals.length !== 1) return fail("remove requires exactly one path");
      command = { name: "remove", path: positionals[0] };
      break;
  }

  return { ok: true, options: { command, verbose, json } };
}

/**
 * Print usage information
 */
export function usage(): string {
  return `
${APP_NAME} ${APP_VERSION} - PDF page-chunk indexer and full-text search

Usage:
  ${APP_NAME} <command> [options]

Commands:
  serve                       Run the HTTP API (PDFDEX_HOST, PDFDEX_PORT)
  ingest [paths...]           Index PDFs
    --dir <path>              Directory to scan (default: PDFDEX_DOCS_DIR)
    --file <path>             Explicit PDF, repeatable
    --no-recursive            Do not scan subdirectories
    --force                   Reindex unchanged files
  query <text...>             Search indexed chunks
    --topk <n>                Number of results (default: PDFDEX_DEFAULT_TOP_K)
    --snippet-chars <n>       Snippet length (default: PDFDEX_DEFAULT_SNIPPET_CHARS)
  docs                        List indexed documents
    --limit <n>               Maximum documents (default: 200)
  remove <path>               Remove a document from the index

Options:
  --json                      Print JSON output
  -v, --verbose               Enable debug logging
  -h, --help                  Show this help message

Exit Codes:
  0 - Success
  1 - Invalid arguments or configuration
  2 - Ingestion finished with per-file errors
  3 - Execution failed
`;
}

// ============================================================================
// Output formatting
// ============================================================================

export function formatIngestResult(result: BatchIngestResult): string[] {
  const lines = [`Indexed: ${result.indexed}, Skipped: ${result.skipped}, Errors: ${result.errors.length}`];
  for (const { file, error } of result.errors) {
    lines.push(`  ✗ ${file}: ${error}`);
  }
  return lines;
}

export function formatSearchResults(results: SearchResult[]): string[] {
  if (results.length === 0) {
    return ["No results."];
  }
  const lines: string[] = [];
  results.forEach((result, index) => {
    const pages = expandPages(result.pageStart, result.pageEnd).join(", ");
    lines.push(`${index + 1}. ${result.filename} (pages ${pages}) score=${result.score.toFixed(4)}`);
    lines.push(`   ${result.snippet}`);
    lines.push(`   ${result.path}`);
  });
  return lines;
}

export function formatDocuments(documents: DocumentRecord[]): string[] {
  if (documents.length === 0) {
    return ["No documents indexed."];
  }
  return documents.map(
    (doc) => `${new Date(doc.indexedAt).toISOString()}  ${doc.contentHash.slice(0, 12)}  ${doc.path}`
  );
}

// ============================================================================
// Entry
// ============================================================================

/**
 * Run the CLI. `serve` returns once the server is listening.
 */
export async function runCli(args: readonly string[], context: CliContext = {}): Promise<number> {
  const out = context.stdout ?? ((line: string) => console.log(line));
  const err = context.stderr ?? ((line: string) => console.error(line));

  const parsed = parseArgs(args);
  if (!parsed.ok) {
    err(`Error: ${parsed.error}`);
    err(`Use "${APP_NAME} --help" for usage information.`);
    return EXIT_VALIDATION_FAILED;
  }

  const { command, verbose, json } = parsed.options;
  if (command.name === "help") {
    out(usage());
    return EXIT_SUCCESS;
  }

  const env = context.env ?? process.env;

  let logger: Logger;
  let config: PdfdexConfig;
  try {
    logger = await configureLogger({ ...loggerOptionsFromEnv(env), ...(verbose ? { debug: true } : {}) });
    config = await loadConfig({ env });
  } catch (error) {
    err(`Error: ${formatErrorForUser(error, verbose ? "detailed" : "medium")}`);
    return EXIT_VALIDATION_FAILED;
  }

  if (command.name === "serve") {
    try {
      const running = await startServer(config, context.deps);
      if (context.handleSignals ?? true) {
        handleSignals(running);
      }
      out(`Listening at ${running.server.url}`);
      return EXIT_SUCCESS;
    } catch (error) {
      err(`Error: ${formatErrorForUser(error, verbose ? "detailed" : "medium")}`);
      return EXIT_EXECUTION_FAILED;
    }
  }

  let service: PdfdexService | null = null;
  try {
    service = PdfdexService.open(config, context.deps);

    switch (command.name) {
      case "ingest": {
        const onProgress = verbose
          ? (p: IngestProgress) => err(`[${p.processed}/${p.total}] ${p.status} ${p.currentFile}`)
          : undefined;
        const result = await service.ingest(
          { inputDir: command.dir, files: command.files, recursive: command.recursive, force: command.force },
          onProgress
        );
        if (json) {
          out(JSON.stringify({ indexed: result.indexed, skipped: result.skipped, errors: result.errors }, null, 2));
        } else {
          formatIngestResult(result).forEach((line) => out(line));
        }
        return result.errors.length > 0 ? EXIT_INGEST_ERRORS : EXIT_SUCCESS;
      }

      case "query": {
        const results = service.search(command.text, { topK: command.topk, snippetChars: command.snippetChars });
        if (json) {
          out(JSON.stringify(results, null, 2));
        } else {
          formatSearchResults(results).forEach((line) => out(line));
        }
        return EXIT_SUCCESS;
      }

      case "docs": {
        const documents = service.listDocuments(command.limit);
        if (json) {
          out(JSON.stringify(documents, null, 2));
        } else {
          formatDocuments(documents).forEach((line) => out(line));
        }
        return EXIT_SUCCESS;
      }

      case "remove": {
        if (!(await service.removeDocument(command.path))) {
          err(`Not indexed: ${command.path}`);
          return EXIT_EXECUTION_FAILED;
        }
        out(`Removed ${command.path}`);
        return EXIT_SUCCESS;
      }
    }
    return EXIT_SUCCESS;
  } catch (error) {
    err(`Error: ${formatErrorForUser(error, verbose ? "detailed" : "medium")}`);
    return error instanceof ValidationError ? EXIT_VALIDATION_FAILED : EXIT_EXECUTION_FAILED;
  } finally {
    service?.close();
    await logger.close();
  }
}
