import fs from "node:fs/promises";
import path from "node:path";
import os from "node:os";
import yaml from "yaml";
import { z } from "zod";
import { ConfigError, ErrorCode } from "./errors.js";
import { getLogger } from "./logger.js";

/**
 * Expand tilde (~) to home directory in a path.
 * Also handles Windows %USERPROFILE% environment variable.
 *
 * @param inputPath - The path to expand
 * @returns The expanded absolute path
 *
 * @example
 * expandPath("~/papers"); // "/Users/username/papers" on macOS
 * expandPath("./data/pdfdex.sqlite3"); // resolved against the working directory
 */
export function expandPath(inputPath: string): string {
  if (!inputPath) return inputPath;

  // Handle Unix-style tilde expansion
  if (inputPath.startsWith("~/")) {
    return path.join(os.homedir(), inputPath.slice(2));
  }
  if (inputPath === "~") {
    return os.homedir();
  }

  // Handle Windows %USERPROFILE% expansion
  if (process.platform === "win32" && inputPath.includes("%USERPROFILE%")) {
    return path.resolve(inputPath.replace(/%USERPROFILE%/gi, os.homedir()));
  }

  return path.resolve(inputPath);
}

export interface PdfdexConfig {
  /** SQLite database file holding documents, chunks and the full-text index */
  dbPath: string;
  /** Directory ingested when a request names neither files nor a directory */
  docsDir: string;
  maxChunkChars: number;
  minChunkChars: number;
  maxPagesPerChunk: number;
  defaultTopK: number;
  defaultSnippetChars: number;
  /** How many files are extracted at once; commits stay serialized */
  ingestConcurrency: number;
  host: string;
  port: number;
}

export const DEFAULT_CONFIG: PdfdexConfig = {
  dbPath: "./data/pdfdex.sqlite3",
  docsDir: "./docs",
  maxChunkChars: 8000,
  minChunkChars: 1200,
  maxPagesPerChunk: 3,
  defaultTopK: 5,
  defaultSnippetChars: 800,
  ingestConcurrency: 2,
  host: "127.0.0.1",
  port: 8000,
};

/**
 * Schema for the optional YAML config file. Keys mirror the env variables in
 * snake_case so one file can be moved between the two forms.
 */
const ConfigFileSchema = z
  .object({
    db_path: z.string().min(1),
    docs_dir: z.string().min(1),
    max_chunk_chars: z.number().int().positive(),
    min_chunk_chars: z.number().int().nonnegative(),
    max_pages_per_chunk: z.number().int().positive(),
    default_top_k: z.number().int().positive(),
    default_snippet_chars: z.number().int().positive(),
    ingest_concurrency: z.number().int().positive(),
    host: z.string().min(1),
    port: z.number().int().min(0).max(65535),
  })
  .partial()
  .strict();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

type IntKey =
  | "maxChunkChars"
  | "minChunkChars"
  | "maxPagesPerChunk"
  | "defaultTopK"
  | "defaultSnippetChars"
  | "ingestConcurrency"
  | "port";

/**
 * Environment variable and config file key of every setting
 */
const SETTINGS: { readonly [K in keyof PdfdexConfig]: { env: string; file: keyof ConfigFile } } = {
  dbPath: { env: "PDFDEX_DB_PATH", file: "db_path" },
  docsDir: { env: "PDFDEX_DOCS_DIR", file: "docs_dir" },
  maxChunkChars: { env: "PDFDEX_MAX_CHUNK_CHARS", file: "max_chunk_chars" },
  minChunkChars: { env: "PDFDEX_MIN_CHUNK_CHARS", file: "min_chunk_chars" },
  maxPagesPerChunk: { env: "PDFDEX_MAX_PAGES_PER_CHUNK", file: "max_pages_per_chunk" },
  defaultTopK: { env: "PDFDEX_DEFAULT_TOP_K", file: "default_top_k" },
  defaultSnippetChars: { env: "PDFDEX_DEFAULT_SNIPPET_CHARS", file: "default_snippet_chars" },
  ingestConcurrency: { env: "PDFDEX_INGEST_CONCURRENCY", file: "ingest_concurrency" },
  host: { env: "PDFDEX_HOST", file: "host" },
  port: { env: "PDFDEX_PORT", file: "port" },
};

const INT_KEYS: readonly IntKey[] = [
  "maxChunkChars",
  "minChunkChars",
  "maxPagesPerChunk",
  "defaultTopK",
  "defaultSnippetChars",
  "ingestConcurrency",
  "port",
];

const CONFIG_KEYS: ReadonlyArray<keyof PdfdexConfig> = ["dbPath", "docsDir", "host", ...INT_KEYS];

/**
 * Read an integer environment variable.
 * Blank or non-integer values fall back to the given default.
 */
export function envInt(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") {
    return fallback;
  }
  const trimmed = raw.trim();
  if (!/^[+-]?\d+$/.test(trimmed)) {
    getLogger().warn(`Ignoring ${name}: not an integer`, { value: raw });
    return fallback;
  }
  return parseInt(trimmed, 10);
}

function envString(env: NodeJS.ProcessEnv, name: string, fallback: string): string {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") {
    return fallback;
  }
  return raw.trim();
}

/**
 * Read and validate a YAML config file.
 *
 * @throws {ConfigError} If the file is missing, is not YAML, or has unknown/invalid keys
 */
export async function loadConfigFile(configPath: string): Promise<ConfigFile> {
  let content: string;
  try {
    content = await fs.readFile(configPath, "utf-8");
  } catch (err) {
    throw new ConfigError(ErrorCode.CONFIG_NOT_FOUND, `Config file not readable: ${configPath}`, {
      cause: err instanceof Error ? err : undefined,
    });
  }

  let parsed: unknown;
  try {
    parsed = yaml.parse(content);
  } catch (err) {
    throw new ConfigError(ErrorCode.CONFIG_PARSE_ERROR, `Config file is not valid YAML: ${configPath}`, {
      cause: err instanceof Error ? err : undefined,
    });
  }

  // An empty file parses to null
  const result = ConfigFileSchema.safeParse(parsed ?? {});
  if (!result.success) {
    const issue = result.error.issues[0];
    const key = issue?.path.join(".") || undefined;
    throw new ConfigError(
      ErrorCode.CONFIG_INVALID_VALUE,
      `Invalid config ${key ? `"${key}"` : "file"}: ${issue?.message ?? "unknown issue"}`,
      { configKey: key }
    );
  }
  return result.data;
}

export interface LoadConfigOptions {
  /** Environment to read (defaults to process.env) */
  env?: NodeJS.ProcessEnv;
  /** YAML file to seed values from (defaults to $PDFDEX_CONFIG) */
  configPath?: string;
}

/**
 * Load the pdfdex configuration.
 *
 * Precedence: environment variables, then the YAML file, then defaults.
 * Paths are expanded to absolute form.
 *
 * @example
 * const config = await loadConfig();
 * console.log(config.dbPath); // /abs/cwd/data/pdfdex.sqlite3
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<PdfdexConfig> {
  const env = options.env ?? process.env;
  const configPath = options.configPath ?? (env.PDFDEX_CONFIG?.trim() || undefined);

  const file: ConfigFile = configPath ? await loadConfigFile(expandPath(configPath)) : {};

  const base: PdfdexConfig = {
    dbPath: file.db_path ?? DEFAULT_CONFIG.dbPath,
    docsDir: file.docs_dir ?? DEFAULT_CONFIG.docsDir,
    maxChunkChars: file.max_chunk_chars ?? DEFAULT_CONFIG.maxChunkChars,
    minChunkChars: file.min_chunk_chars ?? DEFAULT_CONFIG.minChunkChars,
    maxPagesPerChunk: file.max_pages_per_chunk ?? DEFAULT_CONFIG.maxPagesPerChunk,
    defaultTopK: file.default_top_k ?? DEFAULT_CONFIG.defaultTopK,
    defaultSnippetChars: file.default_snippet_chars ?? DEFAULT_CONFIG.defaultSnippetChars,
    ingestConcurrency: file.ingest_concurrency ?? DEFAULT_CONFIG.ingestConcurrency,
    host: file.host ?? DEFAULT_CONFIG.host,
    port: file.port ?? DEFAULT_CONFIG.port,
  };

  const config: PdfdexConfig = {
    ...base,
    dbPath: expandPath(envString(env, SETTINGS.dbPath.env, base.dbPath)),
    docsDir: expandPath(envString(env, SETTINGS.docsDir.env, base.docsDir)),
    host: envString(env, SETTINGS.host.env, base.host),
  };
  for (const key of INT_KEYS) {
    config[key] = envInt(env, SETTINGS[key].env, base[key]);
  }

  return validateConfig(config);
}

/**
 * Check the merged settings against the config file rules, so values from the
 * environment get the same bounds as values from YAML
 *
 * @throws {ConfigError} Naming the environment variable of the first bad setting
 */
export function validateConfig(config: PdfdexConfig): PdfdexConfig {
  const asFile: Record<string, unknown> = {};
  for (const key of CONFIG_KEYS) {
    asFile[SETTINGS[key].file] = config[key];
  }

  const result = ConfigFileSchema.required().safeParse(asFile);
  if (result.success) {
    return config;
  }
  const issue = result.error.issues[0];
  const fileKey = issue?.path.join(".");
  const key = CONFIG_KEYS.find((candidate) => SETTINGS[candidate].file === fileKey);
  const name = key ? SETTINGS[key].env : fileKey || "config";
  throw new ConfigError(ErrorCode.CONFIG_INVALID_VALUE, `Invalid setting ${name}: ${issue?.message ?? "unknown issue"}`, {
    configKey: name,
  });
}
