/**
 * File-system storage backend
 *
 * Layout under the data root:
 *   <collection>/docs/<key>.json         one file per document
 *   <collection>/constraints/<key>.json  one file per named check
 *   .locks/<collection>.lock             cross-process write lock
 *
 * Invariants:
 * - A collection exists exactly when its docs/ directory exists
 * - Creation and drop are single directory renames
 * - New documents and checks are created with an exclusive link, so an id or
 *   check name can only be taken once
 * - Scans read files in sorted key order and skip files removed mid-scan
 */

import { createHash, randomUUID } from "node:crypto";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import {
  DirectoryError,
  DocumentReadError,
  DocumentWriteError,
  DuplicateIdError,
} from "../errors.js";
import {
  FileExistsError,
  atomicCreate,
  atomicWrite,
  ensureDirectory,
  errnoCode,
  isDirectory,
  listDirectories,
  listFiles,
  readDocument,
  removeDocument,
} from "../io.js";
import { DOCUMENT_KEY_ORDER, stableStringify } from "../format.js";
import { toConstraint } from "../constraints.js";
import { FileLock, KeyedMutex } from "../lock.js";
import { logger as defaultLogger, type Logger } from "../observability/logs.js";
import { isDocument, isJsonObject, matches } from "../query.js";
import type { Constraint, Document, Query, StorageBackend, StoredCheck } from "../types.js";

const DOCS_DIR = "docs";
const CONSTRAINTS_DIR = "constraints";
const LOCKS_DIR = ".locks";

/** Encoded keys longer than this are replaced by a hash */
const MAX_KEY_LENGTH = 200;

export interface FileBackendOptions {
  /** Data root directory */
  root: string;
  /** Number of spaces for JSON indentation (default: 2) */
  indent?: number;
  /** Maximum time to wait for a collection lock (default: 10000) */
  lockTimeoutMs?: number;
  /** Delay between lock attempts (default: 25) */
  lockRetryMs?: number;
  logger?: Logger;
}

/**
 * Map an arbitrary id or check name to a safe file name
 * @example encodeKey("a/b") // "bYS9i.json"
 */
export function encodeKey(key: string): string {
  const encoded = `b${Buffer.from(key, "utf-8").toString("base64url")}`;
  if (encoded.length <= MAX_KEY_LENGTH) {
    return `${encoded}.json`;
  }
  return `h${createHash("sha256").update(key, "utf-8").digest("hex")}.json`;
}

export class FileBackend implements StorageBackend {
  #root: string;
  #indent: number;
  #lockTimeoutMs: number;
  #lockRetryMs: number;
  #logger: Logger;
  #mutex = new KeyedMutex();

  constructor(options: FileBackendOptions) {
    this.#root = path.resolve(options.root);
    this.#indent = options.indent ?? 2;
    this.#lockTimeoutMs = options.lockTimeoutMs ?? 10000;
    this.#lockRetryMs = options.lockRetryMs ?? 25;
    this.#logger = options.logger ?? defaultLogger;
  }

  /** Absolute data root */
  get root(): string {
    return this.#root;
  }

  async exists(collection: string): Promise<boolean> {
    return isDirectory(this.#docsDir(collection));
  }

  async createIfAbsent(collection: string): Promise<boolean> {
    if (await this.exists(collection)) {
      return false;
    }

    await ensureDirectory(this.#root);
    const staging = path.join(this.#root, `.staging-${randomUUID()}`);
    try {
      await ensureDirectory(path.join(staging, DOCS_DIR));
      await ensureDirectory(path.join(staging, CONSTRAINTS_DIR));

      try {
        await fs.rename(staging, this.#collectionDir(collection));
        return true;
      } catch (err) {
        const code = errnoCode(err);
        // Another writer created it first
        if (code === "ENOTEMPTY" || code === "EEXIST") {
          return false;
        }
        throw new DirectoryError(this.#collectionDir(collection), { cause: err });
      }
    } finally {
      await fs.rm(staging, { recursive: true, force: true });
    }
  }

  async drop(collection: string): Promise<boolean> {
    const trash = path.join(this.#root, `.trash-${randomUUID()}`);
    try {
      await fs.rename(this.#collectionDir(collection), trash);
    } catch (err) {
      if (errnoCode(err) === "ENOENT") {
        return false;
      }
      throw new DirectoryError(this.#collectionDir(collection), { cause: err });
    }

    try {
      await fs.rm(trash, { recursive: true, force: true });
    } catch (err) {
      // Collection is already gone from its path; leftover trash is only disk usage
      this.#logger.warn("collection.trash_cleanup_failed", {
        collection,
        message: trash,
        details: { error: String(err) },
      });
    }
    return true;
  }

  async listCollections(): Promise<string[]> {
    const names: string[] = [];
    for (const name of await listDirectories(this.#root)) {
      if (name.startsWith(".")) continue;
      if (await isDirectory(path.join(this.#root, name, DOCS_DIR))) {
        names.push(name);
      }
    }
    return names;
  }

  async put(collection: string, id: string, doc: Document): Promise<void> {
    const filePath = this.#docPath(collection, id);
    await this.#requireCollection(collection, filePath);

    try {
      await atomicCreate(filePath, stableStringify(doc, this.#indent, DOCUMENT_KEY_ORDER));
    } catch (err) {
      if (err instanceof FileExistsError) {
        throw new DuplicateIdError(collection, id, { cause: err });
      }
      throw err;
    }
  }

  async get(collection: string, id: string): Promise<Document | null> {
    const filePath = this.#docPath(collection, id);
    const doc = await this.#readDocumentFile(filePath);
    return doc && doc._id === id ? doc : null;
  }

  async replace(collection: string, id: string, doc: Document): Promise<boolean> {
    const filePath = this.#docPath(collection, id);
    if ((await readDocument(filePath)) === null) {
      return false;
    }
    await atomicWrite(filePath, stableStringify(doc, this.#indent, DOCUMENT_KEY_ORDER));
    return true;
  }

  /**
   * Scan a snapshot of the collection
   *
   * Files are read in full before anything is yielded. If the docs directory was
   * renamed away or replaced meanwhile (a drop), the scan yields nothing.
   */
  async *scanMatching(collection: string, query: Query): AsyncIterable<Document> {
    const dir = this.#docsDir(collection);
    const before = await directoryIdentity(dir);
    if (before === null) return;

    const docs: Document[] = [];
    for (const file of await listFiles(dir, ".json")) {
      const doc = await this.#readDocumentFile(path.join(dir, file));
      if (doc) docs.push(doc);
    }

    if ((await directoryIdentity(dir)) !== before) return;

    for (const doc of docs) {
      if (matches(doc, query)) {
        yield doc;
      }
    }
  }

  async deleteMatching(collection: string, query: Query, limit = Infinity): Promise<Document[]> {
    const dir = this.#docsDir(collection);
    const deleted: Document[] = [];

    for (const file of await listFiles(dir, ".json")) {
      if (deleted.length >= limit) break;
      const filePath = path.join(dir, file);
      const doc = await this.#readDocumentFile(filePath);
      if (doc && matches(doc, query) && (await removeDocument(filePath))) {
        deleted.push(doc);
      }
    }
    return deleted;
  }

  async deleteById(collection: string, id: string): Promise<boolean> {
    return removeDocument(this.#docPath(collection, id));
  }

  async addCheck(collection: string, name: string, constraint: Constraint): Promise<boolean> {
    const filePath = this.#checkPath(collection, name);
    await this.#requireCollection(collection, filePath);

    try {
      await atomicCreate(filePath, stableStringify({ name, constraint }, this.#indent));
      return true;
    } catch (err) {
      if (err instanceof FileExistsError) {
        return false;
      }
      throw err;
    }
  }

  async dropCheck(collection: string, name: string): Promise<boolean> {
    return removeDocument(this.#checkPath(collection, name));
  }

  async listChecks(collection: string): Promise<StoredCheck[]> {
    const dir = path.join(this.#collectionDir(collection), CONSTRAINTS_DIR);
    const checks: StoredCheck[] = [];

    for (const file of await listFiles(dir, ".json")) {
      const filePath = path.join(dir, file);
      const parsed = await this.#readJsonFile(filePath);
      if (parsed === null) continue;

      const constraint = isJsonObject(parsed) ? toConstraint(parsed.constraint) : null;
      if (!isJsonObject(parsed) || typeof parsed.name !== "string" || !constraint) {
        throw new DocumentReadError(filePath, {
          cause: new Error("File does not hold a constraint record"),
        });
      }
      checks.push({ name: parsed.name, constraint });
    }
    return checks;
  }

  async withCollectionLock<T>(collection: string, fn: () => Promise<T>): Promise<T> {
    return this.#mutex.run(collection, () => {
      const lock = new FileLock(path.join(this.#root, LOCKS_DIR, `${collection}.lock`), {
        timeoutMs: this.#lockTimeoutMs,
        retryMs: this.#lockRetryMs,
        logger: this.#logger,
      });
      return lock.withLock(fn);
    });
  }

  async close(): Promise<void> {
    // No handles are held between operations
  }

  #collectionDir(collection: string): string {
    return path.join(this.#root, collection);
  }

  #docsDir(collection: string): string {
    return path.join(this.#collectionDir(collection), DOCS_DIR);
  }

  #docPath(collection: string, id: string): string {
    return path.join(this.#docsDir(collection), encodeKey(id));
  }

  #checkPath(collection: string, name: string): string {
    return path.join(this.#collectionDir(collection), CONSTRAINTS_DIR, encodeKey(name));
  }

  async #requireCollection(collection: string, filePath: string): Promise<void> {
    if (!(await this.exists(collection))) {
      throw new DocumentWriteError(filePath, {
        cause: new Error(`Collection "${collection}" does not exist`),
      });
    }
  }

  /**
   * Read and parse a JSON file
   * @returns null if the file no longer exists
   */
  async #readJsonFile(filePath: string): Promise<unknown> {
    const content = await readDocument(filePath);
    if (content === null) return null;

    try {
      const parsed: unknown = JSON.parse(content);
      return parsed;
    } catch (err) {
      throw new DocumentReadError(filePath, { cause: err });
    }
  }

  async #readDocumentFile(filePath: string): Promise<Document | null> {
    const parsed = await this.#readJsonFile(filePath);
    if (parsed === null) return null;
    if (!isDocument(parsed)) {
      throw new DocumentReadError(filePath, {
        cause: new Error("File does not hold a document with a string _id"),
      });
    }
    return parsed;
  }
}

/**
 * Device and inode of a directory, or null if it does not exist
 */
async function directoryIdentity(dir: string): Promise<string | null> {
  try {
    const stats = await fs.stat(dir);
    return stats.isDirectory() ? `${stats.dev}:${stats.ino}` : null;
  } catch (err) {
    const code = errnoCode(err);
    if (code === "ENOENT" || code === "ENOTDIR") {
      return null;
    }
    throw new DirectoryError(dir, { cause: err });
  }
}
