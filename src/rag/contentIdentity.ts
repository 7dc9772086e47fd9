/**
 * Content-addressed document identity.
 * The stable id of a document IS the SHA-256 of its bytes.
 */

import fs from "node:fs";
import crypto from "node:crypto";
import { FileSystemError, isErrnoException } from "../utils/errors.js";

/** Block size used when streaming a file through the hash */
export const HASH_BLOCK_SIZE = 1024 * 1024;

export interface ContentIdentity {
  /** SHA-256 hex digest of the full content */
  contentHash: string;
  /** Equal to contentHash */
  stableId: string;
}

export function stableDocId(contentHash: string): string {
  return contentHash;
}

export function identifyBytes(bytes: Uint8Array): ContentIdentity {
  const contentHash = crypto.createHash("sha256").update(bytes).digest("hex");
  return { contentHash, stableId: stableDocId(contentHash) };
}

/**
 * Hash a file without holding it in memory
 *
 * @throws {FileSystemError} If the file cannot be read
 */
export async function identifyFile(filePath: string): Promise<ContentIdentity> {
  const hash = crypto.createHash("sha256");
  try {
    for await (const block of fs.createReadStream(filePath, { highWaterMark: HASH_BLOCK_SIZE })) {
      hash.update(block);
    }
  } catch (err) {
    if (isErrnoException(err)) {
      throw FileSystemError.fromNodeError(err, filePath, "read");
    }
    throw err;
  }
  const contentHash = hash.digest("hex");
  return { contentHash, stableId: stableDocId(contentHash) };
}
