/**
 * Atomic file I/O operations for crash-safe writes
 *
 * Invariants:
 * - Writes are atomic: never observe partial file contents
 * - Temp files always reside in the same directory as target (same filesystem for atomic rename)
 * - Temp files are removed on failure paths
 * - Reads are UTF-8 only; missing files read as null
 * - Removes are idempotent and report whether a file was removed
 *
 * Pattern: write → fsync → rename (or link, for create-only writes) → fsync directory
 */

import { randomUUID } from "node:crypto";
import * as fs from "node:fs/promises";
import { dirname, basename, join } from "node:path";
import {
  DocumentReadError,
  DocumentWriteError,
  DocumentRemoveError,
  DirectoryError,
  ListFilesError,
} from "./errors.js";

/**
 * Feature flag to control directory fsync (can be disabled on problematic platforms)
 */
const ENABLE_DIR_FSYNC = true;

/**
 * Extract the errno code of a filesystem error, if it has one
 */
export function errnoCode(err: unknown): string | undefined {
  if (typeof err === "object" && err !== null && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

/**
 * Thrown by atomicCreate when the target already exists
 */
export class FileExistsError extends Error {
  readonly code = "EEXIST";

  constructor(public readonly filePath: string) {
    super(`File already exists: ${filePath}`);
    this.name = "FileExistsError";
  }
}

/**
 * Ensure a directory exists, creating it and parent directories as needed
 * @param dirPath - Directory path to create
 */
export async function ensureDirectory(dirPath: string): Promise<void> {
  if (!dirPath) {
    throw new DirectoryError(String(dirPath), {
      cause: new TypeError("Directory path must be a non-empty string"),
    });
  }

  try {
    await fs.mkdir(dirPath, { recursive: true });
  } catch (err) {
    throw new DirectoryError(dirPath, { cause: err });
  }
}

/**
 * Write content to a fresh temp file beside `filePath` and flush it
 * @returns Path of the temp file
 */
async function writeTemp(filePath: string, content: string): Promise<string> {
  const tmp = join(dirname(filePath), `.${basename(filePath)}.${randomUUID()}.tmp`);
  const fileHandle = await fs.open(tmp, "w", 0o600);

  try {
    await fileHandle.writeFile(content, "utf-8");

    // Sync file data to disk (prefer datasync for performance, fall back to sync)
    try {
      await fileHandle.datasync();
    } catch (err) {
      // ENOTSUP/ENOSYS: not supported on this platform
      // EINVAL: some CIFS/FUSE mounts report this instead
      const code = errnoCode(err);
      if (code === "ENOTSUP" || code === "ENOSYS" || code === "EINVAL") {
        await fileHandle.sync();
      } else {
        throw err;
      }
    }
  } finally {
    await fileHandle.close();
  }

  return tmp;
}

/**
 * Fsync a directory so a rename or link inside it is durable (best-effort)
 */
async function syncDirectory(dir: string): Promise<void> {
  if (!ENABLE_DIR_FSYNC) return;

  try {
    const dirHandle = await fs.open(dir, "r");
    try {
      await dirHandle.sync();
    } finally {
      await dirHandle.close();
    }
  } catch (err) {
    // Platforms without directory fsync report EINVAL, ENOTSUP or EBADF
    const code = errnoCode(err);
    if (code !== "EINVAL" && code !== "ENOTSUP" && code !== "EBADF" && process.env.PATCHDB_DEBUG) {
      console.warn(`Directory fsync failed for ${dir}:`, String(err));
    }
  }
}

/**
 * Remove a temp file left behind by a failed write
 */
async function discardTemp(tmp: string | null): Promise<void> {
  if (!tmp) return;
  try {
    await fs.unlink(tmp);
  } catch (err) {
    if (errnoCode(err) !== "ENOENT" && process.env.PATCHDB_DEBUG) {
      console.warn(`Failed to remove temp file ${tmp}:`, String(err));
    }
  }
}

/**
 * Atomically write content to a file using write-rename-sync pattern
 * @param filePath - Target file path
 * @param content - Content to write (UTF-8 string)
 */
export async function atomicWrite(filePath: string, content: string): Promise<void> {
  const dir = dirname(filePath);
  await ensureDirectory(dir);

  let tmp: string | null = null;
  try {
    tmp = await writeTemp(filePath, content);

    // Atomic rename (last-writer-wins for concurrent writes)
    try {
      await fs.rename(tmp, filePath);
    } catch (err) {
      // On Windows, rename may fail transiently when antivirus or indexing grabs the file
      const code = errnoCode(err);
      if (
        (code === "EPERM" || code === "EACCES" || code === "EBUSY") &&
        process.platform === "win32"
      ) {
        await new Promise((resolve) => setTimeout(resolve, 10));
        await fs.rename(tmp, filePath);
      } else {
        throw err;
      }
    }
    tmp = null;

    await syncDirectory(dir);
  } catch (err) {
    await discardTemp(tmp);
    throw new DocumentWriteError(filePath, { cause: err });
  }
}

/**
 * Atomically create a file that must not exist yet
 *
 * The content is staged in a temp file and hard-linked into place, so readers
 * see either no file or the complete file.
 * @param filePath - Target file path
 * @param content - Content to write (UTF-8 string)
 * @throws {FileExistsError} If the target already exists
 */
export async function atomicCreate(filePath: string, content: string): Promise<void> {
  const dir = dirname(filePath);
  await ensureDirectory(dir);

  let tmp: string | null = null;
  try {
    tmp = await writeTemp(filePath, content);

    try {
      await fs.link(tmp, filePath);
    } catch (err) {
      if (errnoCode(err) === "EEXIST") {
        throw new FileExistsError(filePath);
      }
      throw err;
    }

    await syncDirectory(dir);
  } catch (err) {
    if (err instanceof FileExistsError) {
      throw err;
    }
    throw new DocumentWriteError(filePath, { cause: err });
  } finally {
    await discardTemp(tmp);
  }
}

/**
 * Read a document from a file
 * @param filePath - File path to read
 * @returns File contents as UTF-8 string, or null if the file doesn't exist
 * @throws {DocumentReadError} For other read failures
 */
export async function readDocument(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, "utf-8");
  } catch (err) {
    if (errnoCode(err) === "ENOENT") {
      return null;
    }
    throw new DocumentReadError(filePath, { cause: err });
  }
}

/**
 * Remove a document file (idempotent - no error if file doesn't exist)
 * @param filePath - File path to remove
 * @returns true if a file was removed
 * @throws {DocumentRemoveError} If removal fails for reasons other than file not found
 */
export async function removeDocument(filePath: string): Promise<boolean> {
  try {
    await fs.unlink(filePath);
    return true;
  } catch (err) {
    if (errnoCode(err) === "ENOENT") {
      return false;
    }
    throw new DocumentRemoveError(filePath, { cause: err });
  }
}

/**
 * List files in a directory, optionally filtering by extension
 * @param dirPath - Directory path to list
 * @param extension - Optional file extension to filter by (e.g., ".json")
 * @returns Sorted array of filenames (not full paths)
 */
export async function listFiles(dirPath: string, extension?: string): Promise<string[]> {
  try {
    const entries = await fs.readdir(dirPath, { withFileTypes: true });

    // Filter to files only, exclude symlinks and dotfiles (temp files)
    let files = entries
      .filter((entry) => entry.isFile() && !entry.isSymbolicLink() && !entry.name.startsWith("."))
      .map((entry) => entry.name);

    if (extension) {
      // Normalize extension to have leading dot
      const ext = extension.startsWith(".") ? extension : `.${extension}`;
      files = files.filter((name) => name.endsWith(ext));
    }

    // Return sorted list for determinism
    return files.sort();
  } catch (err) {
    // Return empty array if directory doesn't exist (simplifies callers)
    if (errnoCode(err) === "ENOENT") {
      return [];
    }

    throw new ListFilesError(dirPath, { cause: err });
  }
}

/**
 * List subdirectory names of a directory, sorted
 * @returns Empty array if the directory doesn't exist
 */
export async function listDirectories(dirPath: string): Promise<string[]> {
  try {
    const entries = await fs.readdir(dirPath, { withFileTypes: true });
    return entries
      .filter((entry) => entry.isDirectory())
      .map((entry) => entry.name)
      .sort();
  } catch (err) {
    if (errnoCode(err) === "ENOENT") {
      return [];
    }
    throw new ListFilesError(dirPath, { cause: err });
  }
}

/**
 * Check whether a path is an existing directory
 */
export async function isDirectory(dirPath: string): Promise<boolean> {
  try {
    return (await fs.stat(dirPath)).isDirectory();
  } catch (err) {
    const code = errnoCode(err);
    if (code === "ENOENT" || code === "ENOTDIR") {
      return false;
    }
    throw new DirectoryError(dirPath, { cause: err });
  }
}
