/**
 * File system test utilities
 */

import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { openDatabase } from "@patchdb/sdk";
import type { Database, DatabaseOptions } from "@patchdb/sdk";

/**
 * Create a unique temporary directory for testing
 * @param prefix - Prefix for the temp directory (default: "patchdb-test-")
 * @returns Absolute path to temp directory
 */
export async function createTempStoreRoot(prefix = "patchdb-test-"): Promise<string> {
  return await mkdtemp(join(tmpdir(), prefix));
}

/**
 * Remove a directory recursively
 */
export async function removeDir(path: string): Promise<void> {
  await rm(path, { recursive: true, force: true });
}

/**
 * Execute a function with a file-backed database in a temporary root, cleaning up after
 * @param fn - Function to execute with the database and its root
 * @param options - Optional database options (root and backend are overridden)
 * @returns Result of fn
 */
export async function withTempDatabase<T>(
  fn: (db: Database, root: string) => Promise<T>,
  options?: Omit<DatabaseOptions, "root" | "backend">
): Promise<T> {
  const root = await createTempStoreRoot();
  let db: Database;
  try {
    db = openDatabase({ ...options, root });
  } catch (err) {
    await removeDir(root);
    throw err;
  }

  try {
    return await fn(db, root);
  } finally {
    try {
      await db.close();
    } finally {
      await removeDir(root);
    }
  }
}

/**
 * Execute a function with a clean temp directory
 * @param fn - Function to execute with temp directory path
 * @returns Result of fn
 */
export async function withTempDir<T>(fn: (dir: string) => Promise<T>): Promise<T> {
  const dir = await createTempStoreRoot();
  try {
    return await fn(dir);
  } finally {
    await removeDir(dir);
  }
}
