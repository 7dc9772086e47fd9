/**
 * Cheap pre-filter deciding whether a file needs reindexing.
 *
 * Compares mtime and size only; the content hash is computed during the
 * actual reindex. Content changes that preserve both mtime and size are
 * missed, which is accepted.
 */

import fs from "node:fs/promises";
import { getLogger } from "../utils/logger.js";
import type { DocumentRecord, FileStat } from "./types.js";

/**
 * @param existing - Stored document for the same canonical path, if any
 * @param current - Current stat of the file, or null if stat failed
 * @param force - Reindex unconditionally
 */
export function shouldReindex(
  existing: Pick<DocumentRecord, "mtime" | "sizeBytes"> | null,
  current: FileStat | null,
  force: boolean
): boolean {
  if (force) {
    return true;
  }
  if (!existing) {
    return true;
  }
  if (!current) {
    return true;
  }
  // Exact equality, no tolerance
  return !(existing.mtime === current.mtime && existing.sizeBytes === current.sizeBytes);
}

/**
 * Stat a file for change detection. Failure yields null, which reindexes.
 */
export async function statForChangeDetection(filePath: string): Promise<FileStat | null> {
  try {
    const stat = await fs.stat(filePath);
    return { mtime: stat.mtimeMs, sizeBytes: stat.size };
  } catch (err) {
    getLogger().debug(`[ChangeDetector] stat failed for ${filePath}, will reindex`, err);
    return null;
  }
}
