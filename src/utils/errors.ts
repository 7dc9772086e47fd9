/**
 * pdfdex Custom Error Classes
 *
 * Provides hierarchical error classes with:
 * - Error codes (enum)
 * - User-friendly messages
 * - Original cause tracking
 * - Recoverability indicators
 * - HTTP status mapping for the API layer
 */

// ============================================================================
// Error Codes
// ============================================================================

export enum ErrorCode {
  // Base errors (1000-1099)
  UNKNOWN = 1000,
  INTERNAL = 1001,

  // Validation errors (3000-3099)
  VALIDATION_REQUIRED_FIELD = 3000,
  VALIDATION_INVALID_FORMAT = 3001,
  VALIDATION_INVALID_PATH = 3002,
  VALIDATION_INVALID_QUERY = 3003,

  // File system errors (4000-4099)
  FS_FILE_NOT_FOUND = 4000,
  FS_PERMISSION_DENIED = 4001,
  FS_NO_SPACE = 4002,
  FS_PATH_TOO_LONG = 4003,
  FS_DIRECTORY_NOT_FOUND = 4004,
  FS_READ_ERROR = 4006,
  FS_WRITE_ERROR = 4007,

  // Config errors (5000-5099)
  CONFIG_NOT_FOUND = 5000,
  CONFIG_PARSE_ERROR = 5001,
  CONFIG_INVALID_VALUE = 5002,

  // Extraction errors (6000-6099)
  EXTRACTION_FAILED = 6000,
  EXTRACTION_UNSUPPORTED = 6001,

  // Storage errors (7000-7099)
  STORAGE_OPEN_FAILED = 7000,
  STORAGE_TRANSACTION_FAILED = 7001,
  STORAGE_QUERY_FAILED = 7002,
  STORAGE_CLOSED = 7003,
  STORAGE_NOT_FOUND = 7004,
}

// ============================================================================
// User-friendly error messages
// ============================================================================

interface ErrorMessages {
  minimal: string;
  medium: string;
}

const ERROR_MESSAGES: Record<ErrorCode, ErrorMessages> = {
  [ErrorCode.UNKNOWN]: { minimal: "Unknown error", medium: "An unexpected error occurred." },
  [ErrorCode.INTERNAL]: { minimal: "Internal error", medium: "An internal error occurred." },
  [ErrorCode.VALIDATION_REQUIRED_FIELD]: { minimal: "Missing field", medium: "A required field is missing." },
  [ErrorCode.VALIDATION_INVALID_FORMAT]: { minimal: "Invalid input", medium: "The input has an invalid format." },
  [ErrorCode.VALIDATION_INVALID_PATH]: { minimal: "Invalid path", medium: "The given path is not usable." },
  [ErrorCode.VALIDATION_INVALID_QUERY]: { minimal: "Invalid query", medium: "The search query could not be parsed." },
  [ErrorCode.FS_FILE_NOT_FOUND]: { minimal: "File not found", medium: "The file does not exist." },
  [ErrorCode.FS_PERMISSION_DENIED]: { minimal: "Permission denied", medium: "Permission denied while accessing the file." },
  [ErrorCode.FS_NO_SPACE]: { minimal: "Disk full", medium: "There is no space left on the device." },
  [ErrorCode.FS_PATH_TOO_LONG]: { minimal: "Path too long", medium: "The file path is too long." },
  [ErrorCode.FS_DIRECTORY_NOT_FOUND]: { minimal: "Directory not found", medium: "The directory does not exist." },
  [ErrorCode.FS_READ_ERROR]: { minimal: "Read failed", medium: "The file could not be read." },
  [ErrorCode.FS_WRITE_ERROR]: { minimal: "Write failed", medium: "The file could not be written." },
  [ErrorCode.CONFIG_NOT_FOUND]: { minimal: "Config not found", medium: "The configuration file does not exist." },
  [ErrorCode.CONFIG_PARSE_ERROR]: { minimal: "Config parse error", medium: "The configuration file is not valid YAML." },
  [ErrorCode.CONFIG_INVALID_VALUE]: { minimal: "Invalid config", medium: "The configuration contains an invalid value." },
  [ErrorCode.EXTRACTION_FAILED]: { minimal: "Extraction failed", medium: "Text could not be extracted from the PDF." },
  [ErrorCode.EXTRACTION_UNSUPPORTED]: { minimal: "Unsupported PDF", medium: "The PDF uses an unsupported structure." },
  [ErrorCode.STORAGE_OPEN_FAILED]: { minimal: "Storage unavailable", medium: "The index database could not be opened." },
  [ErrorCode.STORAGE_TRANSACTION_FAILED]: { minimal: "Write failed", medium: "The index transaction failed and was rolled back." },
  [ErrorCode.STORAGE_QUERY_FAILED]: { minimal: "Query failed", medium: "The index query failed." },
  [ErrorCode.STORAGE_CLOSED]: { minimal: "Storage closed", medium: "The index database is closed." },
  [ErrorCode.STORAGE_NOT_FOUND]: { minimal: "Not found", medium: "No document is indexed under that path." },
};

// Recoverability flags
const RECOVERABLE_ERRORS = new Set<ErrorCode>([
  ErrorCode.FS_NO_SPACE,
  ErrorCode.STORAGE_TRANSACTION_FAILED,
]);

// ============================================================================
// Base Error Class
// ============================================================================

export class PdfdexError extends Error {
  public readonly code: ErrorCode;
  public readonly recoverable: boolean;
  public readonly cause?: Error;
  public readonly timestamp: Date;

  constructor(
    code: ErrorCode,
    message?: string,
    options?: {
      cause?: Error;
      recoverable?: boolean;
    }
  ) {
    super(message || ERROR_MESSAGES[code].medium);

    this.name = "PdfdexError";
    this.code = code;
    this.cause = options?.cause;
    this.recoverable = options?.recoverable ?? RECOVERABLE_ERRORS.has(code);
    this.timestamp = new Date();

    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Get user-friendly message at specified detail level
   */
  getUserMessage(level: "minimal" | "medium" = "medium"): string {
    return ERROR_MESSAGES[this.code][level] || this.message;
  }

  /**
   * Serialize error for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      recoverable: this.recoverable,
      timestamp: this.timestamp.toISOString(),
      cause: this.cause ? {
        name: this.cause.name,
        message: this.cause.message,
      } : undefined,
      stack: this.stack,
    };
  }
}

// ============================================================================
// Specialized Error Classes
// ============================================================================

/**
 * Input errors: empty queries, malformed request bodies, bad CLI arguments.
 * Surfaced directly to the caller with a client-error status.
 */
export class ValidationError extends PdfdexError {
  public readonly field?: string;
  public readonly value?: unknown;

  constructor(
    code: ErrorCode,
    message?: string,
    options?: {
      cause?: Error;
      field?: string;
      value?: unknown;
    }
  ) {
    super(code, message, options);
    this.name = "ValidationError";
    this.field = options?.field;
    this.value = options?.value;
  }
}

/**
 * Malformed or unsupported PDF. Recorded per file, never fatal to a batch.
 */
export class ExtractionError extends PdfdexError {
  public readonly filePath?: string;

  constructor(
    code: ErrorCode,
    message?: string,
    options?: {
      cause?: Error;
      filePath?: string;
    }
  ) {
    super(code, message, options);
    this.name = "ExtractionError";
    this.filePath = options?.filePath;
  }
}

/**
 * Transaction or query failure inside the index store.
 */
export class StorageError extends PdfdexError {
  public readonly operation?: string;

  constructor(
    code: ErrorCode,
    message?: string,
    options?: {
      cause?: Error;
      operation?: string;
      recoverable?: boolean;
    }
  ) {
    super(code, message, options);
    this.name = "StorageError";
    this.operation = options?.operation;
  }

  /**
   * Wrap a driver error raised while running `operation`
   */
  static fromDriverError(error: unknown, operation: string): StorageError {
    if (error instanceof StorageError) {
      return error;
    }
    const cause = error instanceof Error ? error : undefined;
    return new StorageError(
      ErrorCode.STORAGE_TRANSACTION_FAILED,
      `${operation} failed: ${errorMessage(error)}`,
      { cause, operation }
    );
  }
}

/**
 * File system errors
 */
export class FileSystemError extends PdfdexError {
  public readonly path?: string;
  public readonly operation?: "read" | "write" | "stat" | "access";

  constructor(
    code: ErrorCode,
    message?: string,
    options?: {
      cause?: Error;
      path?: string;
      operation?: "read" | "write" | "stat" | "access";
      recoverable?: boolean;
    }
  ) {
    super(code, message, options);
    this.name = "FileSystemError";
    this.path = options?.path;
    this.operation = options?.operation;
  }

  /**
   * Create FileSystemError from Node.js error
   */
  static fromNodeError(error: NodeJS.ErrnoException, path?: string, operation?: FileSystemError["operation"]): FileSystemError {
    const detail = error.message;

    switch (error.code) {
      case "ENOENT":
        return new FileSystemError(ErrorCode.FS_FILE_NOT_FOUND, detail, { cause: error, path, operation });
      case "EACCES":
      case "EPERM":
        return new FileSystemError(ErrorCode.FS_PERMISSION_DENIED, detail, { cause: error, path, operation });
      case "ENOSPC":
        return new FileSystemError(ErrorCode.FS_NO_SPACE, detail, { cause: error, path, operation });
      case "ENAMETOOLONG":
        return new FileSystemError(ErrorCode.FS_PATH_TOO_LONG, detail, { cause: error, path, operation });
      case "ENOTDIR":
        return new FileSystemError(ErrorCode.FS_DIRECTORY_NOT_FOUND, detail, { cause: error, path, operation });
      default:
        if (operation === "write") {
          return new FileSystemError(ErrorCode.FS_WRITE_ERROR, detail, { cause: error, path, operation });
        }
        return new FileSystemError(ErrorCode.FS_READ_ERROR, detail, { cause: error, path, operation });
    }
  }
}

/**
 * Configuration errors
 */
export class ConfigError extends PdfdexError {
  public readonly configKey?: string;

  constructor(
    code: ErrorCode,
    message?: string,
    options?: {
      cause?: Error;
      configKey?: string;
    }
  ) {
    super(code, message, options);
    this.name = "ConfigError";
    this.configKey = options?.configKey;
  }
}

// ============================================================================
// Error Formatter Utilities
// ============================================================================

/**
 * Plain message of any thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error && typeof error.code === "string";
}

/**
 * Convert any error to a pdfdex error
 */
export function toPdfdexError(error: unknown): PdfdexError {
  if (error instanceof PdfdexError) {
    return error;
  }

  if (isErrnoException(error) && error.code && ["ENOENT", "EACCES", "EPERM", "ENOSPC", "ENAMETOOLONG", "ENOTDIR", "EISDIR"].includes(error.code)) {
    return FileSystemError.fromNodeError(error);
  }

  return new PdfdexError(ErrorCode.UNKNOWN, errorMessage(error), {
    cause: error instanceof Error ? error : undefined,
  });
}

/**
 * Format error for user display based on detail level
 */
export function formatErrorForUser(error: unknown, level: "minimal" | "medium" | "detailed" = "medium"): string {
  if (error instanceof PdfdexError) {
    if (level === "minimal") {
      return error.getUserMessage("minimal");
    }
    let message = error.message;
    if (level === "detailed") {
      message += `\n[code ${error.code}]`;
      if (error.cause) {
        message += `\n[cause ${error.cause.message}]`;
      }
      if (error instanceof FileSystemError && error.path) {
        message += `\n[path ${error.path}]`;
      }
    }
    return message;
  }

  if (level === "minimal") {
    return ERROR_MESSAGES[ErrorCode.UNKNOWN].minimal;
  }
  return errorMessage(error);
}

/**
 * HTTP status the API answers with for a given error
 */
export function httpStatusFor(error: unknown): number {
  if (error instanceof ValidationError) {
    return 400;
  }
  if (error instanceof FileSystemError && error.code === ErrorCode.FS_FILE_NOT_FOUND) {
    return 404;
  }
  if (error instanceof StorageError && error.code === ErrorCode.STORAGE_NOT_FOUND) {
    return 404;
  }
  return 500;
}

/**
 * Check if an error is recoverable
 */
export function isRecoverableError(error: unknown): boolean {
  if (error instanceof PdfdexError) {
    return error.recoverable;
  }
  return false;
}
