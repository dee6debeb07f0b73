/**
 * Read-only file I/O for the file-backed store
 *
 * Invariants:
 * - Reads are UTF-8 only; a missing file reads as null
 * - Listings are sorted and contain regular files only (no symlinks)
 * - A missing directory lists as empty
 */

import * as fs from "node:fs/promises";
import { DocumentReadError, ListFilesError } from "./errors.js";

function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

/**
 * Read a document from a file
 * @param filePath - File path to read
 * @returns File contents as UTF-8 string, or null if the file doesn't exist
 * @throws DocumentReadError for other read failures
 */
export async function readDocument(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, "utf-8");
  } catch (err) {
    if (errorCode(err) === "ENOENT") {
      return null;
    }
    throw new DocumentReadError(filePath, { cause: err });
  }
}

/**
 * List files in a directory, optionally filtering by extension
 * @param dirPath - Directory path to list
 * @param extension - Optional file extension to filter by (e.g., ".json")
 * @returns Sorted array of filenames (not full paths)
 * @throws ListFilesError if the directory exists but cannot be read
 */
export async function listFiles(dirPath: string, extension?: string): Promise<string[]> {
  try {
    const entries = await fs.readdir(dirPath, { withFileTypes: true });

    let files = entries
      .filter((entry) => entry.isFile() && !entry.isSymbolicLink())
      .map((entry) => entry.name);

    if (extension) {
      const ext = extension.startsWith(".") ? extension : `.${extension}`;
      files = files.filter((name) => name.endsWith(ext));
    }

    // Return sorted list for determinism
    return files.sort();
  } catch (err) {
    if (errorCode(err) === "ENOENT") {
      return [];
    }

    throw new ListFilesError(dirPath, { cause: err });
  }
}
