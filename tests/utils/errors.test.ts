/**
 * Tests for the error hierarchy and its helpers
 */

import { describe, it, expect } from "@jest/globals";
import {
  ConfigError,
  ErrorCode,
  ExtractionError,
  FileSystemError,
  PdfdexError,
  StorageError,
  ValidationError,
  errorMessage,
  formatErrorForUser,
  httpStatusFor,
  isErrnoException,
  isRecoverableError,
  toPdfdexError,
} from "../../src/utils/errors.js";

function errnoError(code: string, message: string): NodeJS.ErrnoException {
  return Object.assign(new Error(message), { code });
}

describe("PdfdexError", () => {
  it("should fall back to the catalogue message", () => {
    const error = new PdfdexError(ErrorCode.STORAGE_CLOSED);

    expect(error.message).toBe("The index database is closed.");
    expect(error.getUserMessage("minimal")).toBe("Storage closed");
  });

  it("should derive recoverability from the code unless given", () => {
    expect(new PdfdexError(ErrorCode.STORAGE_TRANSACTION_FAILED).recoverable).toBe(true);
    expect(new PdfdexError(ErrorCode.EXTRACTION_FAILED).recoverable).toBe(false);
    expect(new PdfdexError(ErrorCode.EXTRACTION_FAILED, "x", { recoverable: true }).recoverable).toBe(true);
  });

  it("should serialize code, message and cause", () => {
    const cause = new Error("disk I/O error");
    const json = new StorageError(ErrorCode.STORAGE_TRANSACTION_FAILED, "write failed", { cause }).toJSON();

    expect(json).toMatchObject({
      name: "StorageError",
      code: ErrorCode.STORAGE_TRANSACTION_FAILED,
      message: "write failed",
      cause: { name: "Error", message: "disk I/O error" },
    });
  });
});

describe("StorageError.fromDriverError", () => {
  it("should prefix the operation", () => {
    const error = StorageError.fromDriverError(new Error("UNIQUE constraint failed: chunks.id"), "replaceDocument");

    expect(error.code).toBe(ErrorCode.STORAGE_TRANSACTION_FAILED);
    expect(error.message).toBe("replaceDocument failed: UNIQUE constraint failed: chunks.id");
    expect(error.operation).toBe("replaceDocument");
  });

  it("should pass storage errors through", () => {
    const original = new StorageError(ErrorCode.STORAGE_CLOSED);
    expect(StorageError.fromDriverError(original, "removeDocument")).toBe(original);
  });
});

describe("FileSystemError.fromNodeError", () => {
  it.each([
    ["ENOENT", ErrorCode.FS_FILE_NOT_FOUND],
    ["EACCES", ErrorCode.FS_PERMISSION_DENIED],
    ["EPERM", ErrorCode.FS_PERMISSION_DENIED],
    ["ENOTDIR", ErrorCode.FS_DIRECTORY_NOT_FOUND],
    ["EIO", ErrorCode.FS_READ_ERROR],
  ])("should map %s", (code, expected) => {
    const error = FileSystemError.fromNodeError(errnoError(code, `${code}: failure`), "/tmp/a.pdf", "read");

    expect(error.code).toBe(expected);
    expect(error.path).toBe("/tmp/a.pdf");
    expect(error.message).toBe(`${code}: failure`);
  });
});

describe("helpers", () => {
  it("errorMessage should stringify non-errors", () => {
    expect(errorMessage(new Error("boom"))).toBe("boom");
    expect(errorMessage("plain")).toBe("plain");
    expect(errorMessage(42)).toBe("42");
  });

  it("isErrnoException should require a string code", () => {
    expect(isErrnoException(errnoError("ENOENT", "missing"))).toBe(true);
    expect(isErrnoException(new Error("no code"))).toBe(false);
    expect(isErrnoException({ code: "ENOENT" })).toBe(false);
  });

  it("toPdfdexError should wrap file system and unknown errors", () => {
    expect(toPdfdexError(errnoError("ENOENT", "missing")).code).toBe(ErrorCode.FS_FILE_NOT_FOUND);

    const unknown = toPdfdexError("something odd");
    expect(unknown.code).toBe(ErrorCode.UNKNOWN);
    expect(unknown.message).toBe("something odd");
  });

  it("formatErrorForUser should vary with the detail level", () => {
    const error = new ExtractionError(ErrorCode.EXTRACTION_FAILED, "Cannot open PDF: bad xref", {
      cause: new Error("bad xref"),
    });

    expect(formatErrorForUser(error, "minimal")).toBe("Extraction failed");
    expect(formatErrorForUser(error, "medium")).toBe("Cannot open PDF: bad xref");
    expect(formatErrorForUser(error, "detailed")).toBe(
      `Cannot open PDF: bad xref\n[code ${ErrorCode.EXTRACTION_FAILED}]\n[cause bad xref]`
    );
    expect(formatErrorForUser(new Error("raw"), "minimal")).toBe("Unknown error");
    expect(formatErrorForUser(new Error("raw"))).toBe("raw");
  });

  it("httpStatusFor should map input errors to 400 and missing things to 404", () => {
    expect(httpStatusFor(new ValidationError(ErrorCode.VALIDATION_REQUIRED_FIELD, "Missing 'query'"))).toBe(400);
    expect(httpStatusFor(new FileSystemError(ErrorCode.FS_FILE_NOT_FOUND))).toBe(404);
    expect(httpStatusFor(new StorageError(ErrorCode.STORAGE_NOT_FOUND))).toBe(404);
    expect(httpStatusFor(new StorageError(ErrorCode.STORAGE_QUERY_FAILED))).toBe(500);
    expect(httpStatusFor(new ConfigError(ErrorCode.CONFIG_INVALID_VALUE))).toBe(500);
    expect(httpStatusFor(new Error("anything"))).toBe(500);
  });

  it("isRecoverableError should only trust pdfdex errors", () => {
    expect(isRecoverableError(new PdfdexError(ErrorCode.FS_NO_SPACE))).toBe(true);
    expect(isRecoverableError(new Error("plain"))).toBe(false);
  });
});
