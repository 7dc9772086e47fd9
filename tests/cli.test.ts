/**
 * Tests for CLI argument parsing and command execution
 */

import { describe, it, expect, beforeEach, afterEach, jest } from "@jest/globals";
import crypto from "node:crypto";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import {
  EXIT_EXECUTION_FAILED,
  EXIT_INGEST_ERRORS,
  EXIT_SUCCESS,
  EXIT_VALIDATION_FAILED,
  formatIngestResult,
  parseArgs,
  runCli,
  usage,
} from "../src/cli.js";
import { JsonPageExtractor, writeCorruptPdf, writePdf } from "./helpers/fakeExtractor.js";

describe("parseArgs", () => {
  it("should show help without a command", () => {
    expect(parseArgs([])).toEqual({ ok: true, options: { command: { name: "help" }, verbose: false, json: false } });
    expect(parseArgs(["query", "x", "-h"])).toMatchObject({ ok: true, options: { command: { name: "help" } } });
  });

  it("should parse ingest options and bare paths", () => {
    expect(parseArgs(["ingest", "--dir", "~/papers", "--file", "a.pdf", "b.pdf", "--no-recursive", "--force"])).toEqual({
      ok: true,
      options: {
        command: { name: "ingest", dir: "~/papers", files: ["a.pdf", "b.pdf"], recursive: false, force: true },
        verbose: false,
        json: false,
      },
    });
  });

  it("should join query words", () => {
    expect(parseArgs(["query", "topic", "A", "--topk", "3", "--snippet-chars", "120", "--json", "-v"])).toEqual({
      ok: true,
      options: {
        command: { name: "query", text: "topic A", topk: 3, snippetChars: 120 },
        verbose: true,
        json: true,
      },
    });
  });

  it("should default the docs limit", () => {
    expect(parseArgs(["docs"])).toMatchObject({ ok: true, options: { command: { name: "docs", limit: 200 } } });
  });

  it.each([
    [["frobnicate"], 'Unknown command "frobnicate"'],
    [["query", "--bogus"], 'Unknown option "--bogus"'],
    [["query"], "query requires search text"],
    [["query", "x", "--topk", "0"], "--topk requires a positive integer"],
    [["query", "x", "--topk"], "--topk requires a positive integer"],
    [["docs", "--limit", "10001"], "--limit must be at most 10000"],
    [["remove"], "remove requires exactly one path"],
    [["remove", "a.pdf", "b.pdf"], "remove requires exactly one path"],
    [["ingest", "--dir"], "--dir requires a path"],
  ])("should reject %j", (args, error) => {
    expect(parseArgs(args)).toEqual({ ok: false, error });
  });
});

describe("formatIngestResult", () => {
  it("should list failures under the summary", () => {
    expect(
      formatIngestResult({ indexed: 1, skipped: 2, errors: [{ file: "/x/bad.pdf", error: "Cannot open PDF" }], files: [] })
    ).toEqual(["Indexed: 1, Skipped: 2, Errors: 1", "  ✗ /x/bad.pdf: Cannot open PDF"]);
  });
});

describe("runCli", () => {
  let tempDir: string;
  let docsDir: string;
  let stdout: string[];
  let stderr: string[];

  function run(args: string[], env: NodeJS.ProcessEnv = {}): Promise<number> {
    return runCli(args, {
      env: { PDFDEX_DB_PATH: path.join(tempDir, "index.sqlite3"), PDFDEX_DOCS_DIR: docsDir, PDFDEX_MIN_CHUNK_CHARS: "10", ...env },
      stdout: (line) => stdout.push(line),
      stderr: (line) => stderr.push(line),
      deps: { extractor: new JsonPageExtractor(), now: () => 0 },
    });
  }

  beforeEach(async () => {
    tempDir = await fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), "pdfdex-cli-")));
    docsDir = path.join(tempDir, "docs");
    stdout = [];
    stderr = [];
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it("should print usage for help", async () => {
    expect(await run(["--help"])).toBe(EXIT_SUCCESS);
    expect(stdout).toEqual([usage()]);
  });

  it("should report argument errors with exit code 1", async () => {
    expect(await run(["query"])).toBe(EXIT_VALIDATION_FAILED);
    expect(stderr).toEqual(["Error: query requires search text", 'Use "pdfdex --help" for usage information.']);
  });

  it("should report configuration errors with exit code 1", async () => {
    const code = await run(["docs"], { PDFDEX_CONFIG: path.join(tempDir, "absent.yaml") });

    expect(code).toBe(EXIT_VALIDATION_FAILED);
    expect(stderr).toHaveLength(1);
    expect(stderr[0].startsWith("Error: ")).toBe(true);
  });

  it("should ingest, search, list and remove", async () => {
    const pages = ["Intro text", "", "Body text covering topic A", "More body text"];
    const file = await writePdf(docsDir, "guide.pdf", pages);
    const hash = crypto.createHash("sha256").update(JSON.stringify(pages)).digest("hex");

    expect(await run(["ingest"])).toBe(EXIT_SUCCESS);
    expect(stdout).toEqual(["Indexed: 1, Skipped: 0, Errors: 0"]);

    stdout = [];
    expect(await run(["query", "topic", "A"])).toBe(EXIT_SUCCESS);
    expect(stdout).toHaveLength(3);
    expect(stdout[0]).toMatch(/^1\. guide\.pdf \(pages 1, 2, 3\) score=-?\d+\.\d{4}$/);
    expect(stdout.slice(1)).toEqual(["   Intro text Body text covering [topic] [A]", `   ${file}`]);

    stdout = [];
    expect(await run(["docs"])).toBe(EXIT_SUCCESS);
    expect(stdout).toEqual([`1970-01-01T00:00:00.000Z  ${hash.slice(0, 12)}  ${file}`]);

    stdout = [];
    expect(await run(["remove", file])).toBe(EXIT_SUCCESS);
    expect(stdout).toEqual([`Removed ${file}`]);

    stdout = [];
    expect(await run(["docs"])).toBe(EXIT_SUCCESS);
    expect(stdout).toEqual(["No documents indexed."]);
  });

  it("should print JSON output when asked", async () => {
    await writePdf(docsDir, "guide.pdf", ["Alpha page"]);

    expect(await run(["ingest", "--json"])).toBe(EXIT_SUCCESS);
    expect(JSON.parse(stdout.join("\n"))).toEqual({ indexed: 1, skipped: 0, errors: [] });

    stdout = [];
    expect(await run(["query", "nothingmatches", "--json"])).toBe(EXIT_SUCCESS);
    expect(stdout).toEqual(["[]"]);
  });

  it("should exit 2 when some files fail", async () => {
    await writePdf(docsDir, "good.pdf", ["Fine"]);
    const corrupt = await writeCorruptPdf(docsDir, "zz.pdf");

    expect(await run(["ingest"])).toBe(EXIT_INGEST_ERRORS);
    expect(stdout).toEqual(["Indexed: 1, Skipped: 0, Errors: 1", `  ✗ ${corrupt}: Cannot open PDF: no page list`]);
  });

  it("should log to the file named by the environment", async () => {
    jest.spyOn(console, "warn").mockImplementation(() => {});
    await writePdf(docsDir, "good.pdf", ["Fine"]);
    const corrupt = await writeCorruptPdf(docsDir, "zz.pdf");
    const logDir = path.join(tempDir, "logs");

    expect(await run(["ingest"], { PDFDEX_LOG_TO_FILE: "true", PDFDEX_LOG_DIR: logDir })).toBe(EXIT_INGEST_ERRORS);

    const [logFile] = await fs.readdir(logDir);
    const records = (await fs.readFile(path.join(logDir, logFile), "utf-8")).trim().split("\n");
    expect(records).toHaveLength(1);
    expect(JSON.parse(records[0])).toMatchObject({
      level: "warn",
      message: `[Ingestion] failed ${corrupt}: Cannot open PDF: no page list`,
    });
  });

  it("should print no results for an unmatched query", async () => {
    expect(await run(["query", "anything"])).toBe(EXIT_SUCCESS);
    expect(stdout).toEqual(["No results."]);
  });

  it("should exit 1 on a malformed full-text query", async () => {
    expect(await run(["query", "topic", "AND"])).toBe(EXIT_VALIDATION_FAILED);
    expect(stderr).toHaveLength(1);
  });

  it("should exit 3 when removing a path that is not indexed", async () => {
    const missing = path.join(tempDir, "missing.pdf");

    expect(await run(["remove", missing])).toBe(EXIT_EXECUTION_FAILED);
    expect(stderr).toEqual([`Not indexed: ${missing}`]);
  });
});
