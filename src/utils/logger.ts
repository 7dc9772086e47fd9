/**
 * pdfdex logger
 *
 * Colored lines on the console; optionally the same records as JSON lines in
 * `<logDir>/pdfdex-YYYY-MM-DD.log`, written in batches. Debug records are
 * dropped unless debug mode is on.
 */

import fs from "node:fs/promises";
import path from "node:path";
import os from "node:os";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogRecord {
  time: string;
  level: LogLevel;
  message: string;
  data?: unknown;
  stack?: string;
}

export interface LoggerOptions {
  debug?: boolean;
  logToFile?: boolean;
  /** Directory for log files (default: ~/.pdfdex/logs) */
  logDir?: string;
  /** How often queued records are written (default: 5000 ms) */
  flushIntervalMs?: number;
}

const RESET = "\x1b[0m";

const CONSOLE: Record<LogLevel, { color: string; write: (line: string) => void }> = {
  debug: { color: "\x1b[36m", write: (line) => console.log(line) },
  info: { color: "\x1b[32m", write: (line) => console.log(line) },
  warn: { color: "\x1b[33m", write: (line) => console.warn(line) },
  error: { color: "\x1b[31m", write: (line) => console.error(line) },
};

/**
 * Logger settings from PDFDEX_DEBUG, PDFDEX_LOG_TO_FILE and PDFDEX_LOG_DIR
 */
export function loggerOptionsFromEnv(env: NodeJS.ProcessEnv = process.env): LoggerOptions {
  return {
    debug: env.PDFDEX_DEBUG === "true",
    logToFile: env.PDFDEX_LOG_TO_FILE === "true",
    logDir: env.PDFDEX_LOG_DIR?.trim() || undefined,
  };
}

export class Logger {
  private debugMode: boolean;
  readonly logToFile: boolean;
  readonly logDir: string;
  private readonly flushIntervalMs: number;
  private pending: LogRecord[] = [];
  private timer: NodeJS.Timeout | null = null;
  private ready = false;

  constructor(options: LoggerOptions = {}) {
    this.debugMode = options.debug ?? false;
    this.logToFile = options.logToFile ?? false;
    this.logDir = options.logDir ?? path.join(os.homedir(), ".pdfdex", "logs");
    this.flushIntervalMs = options.flushIntervalMs ?? 5000;
  }

  /**
   * Create the log directory and start the flush timer. Idempotent.
   */
  async init(): Promise<void> {
    if (this.ready) return;
    if (this.logToFile) {
      await fs.mkdir(this.logDir, { recursive: true });
      this.timer = setInterval(() => {
        void this.flush();
      }, this.flushIntervalMs);
      this.timer.unref();
    }
    this.ready = true;
  }

  debug(message: string, data?: unknown): void {
    this.write("debug", message, data);
  }

  info(message: string, data?: unknown): void {
    this.write("info", message, data);
  }

  warn(message: string, data?: unknown): void {
    this.write("warn", message, data);
  }

  error(message: string, error?: unknown): void {
    this.write("error", message, error);
  }

  setDebugMode(enabled: boolean): void {
    this.debugMode = enabled;
  }

  isDebugMode(): boolean {
    return this.debugMode;
  }

  /** File the records of the current day go to */
  currentLogFile(): string {
    return path.join(this.logDir, `pdfdex-${new Date().toISOString().slice(0, 10)}.log`);
  }

  /**
   * Append queued records to the log file. A failed write is reported on stderr.
   */
  async flush(): Promise<void> {
    if (this.pending.length === 0) return;
    const batch = this.pending;
    this.pending = [];
    const lines = batch.map((record) => JSON.stringify(record)).join("\n") + "\n";
    try {
      await fs.appendFile(this.currentLogFile(), lines, "utf-8");
    } catch (err) {
      console.error("Failed to write to log file:", err);
    }
  }

  async close(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    await this.flush();
    this.ready = false;
  }

  private write(level: LogLevel, message: string, data?: unknown): void {
    if (level === "debug" && !this.debugMode) return;

    const record: LogRecord = { time: new Date().toISOString(), level, message };
    if (data !== undefined) record.data = data;
    if (data instanceof Error) record.stack = data.stack;

    CONSOLE[level].write(formatLine(record));
    if (this.logToFile) {
      this.pending.push(record);
    }
  }
}

function formatLine(record: LogRecord): string {
  const { color } = CONSOLE[record.level];
  let line = `${color}${`[${record.level.toUpperCase()}]`.padEnd(7)}${RESET} ${record.message}`;
  if (record.stack) {
    line += `\n${record.stack}`;
  } else if (record.data !== undefined) {
    line += ` ${JSON.stringify(record.data)}`;
  }
  return line;
}

let shared: Logger | null = null;

/**
 * Shared logger; created from the process environment on first use
 */
export function getLogger(): Logger {
  if (!shared) {
    shared = new Logger(loggerOptionsFromEnv());
  }
  return shared;
}

/**
 * Replace the shared logger, closing the previous one first
 */
export async function configureLogger(options: LoggerOptions): Promise<Logger> {
  const previous = shared;
  const next = new Logger(options);
  shared = next;
  if (previous) {
    await previous.close();
  }
  await next.init();
  return next;
}
