/**
 * Collection write locks
 *
 * KeyedMutex serializes writers inside one process; FileLock extends that
 * across processes sharing a data root, using exclusive file creation.
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { LockTimeoutError } from "./errors.js";
import { errnoCode } from "./io.js";
import { logger as defaultLogger, type Logger } from "./observability/logs.js";

/**
 * In-process mutex keyed by name
 */
export class KeyedMutex {
  #tails = new Map<string, Promise<void>>();

  /**
   * Run `fn` once every earlier holder of `key` has finished
   */
  async run<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.#tails.get(key) ?? Promise.resolve();
    const result = previous.then(fn);
    // Next waiter proceeds whether this holder succeeded or failed
    const tail = result.then(
      () => undefined,
      () => undefined
    );
    this.#tails.set(key, tail);

    try {
      return await result;
    } finally {
      if (this.#tails.get(key) === tail) {
        this.#tails.delete(key);
      }
    }
  }

  /**
   * Check whether a key currently has a holder or waiters
   */
  isLocked(key: string): boolean {
    return this.#tails.has(key);
  }
}

export interface FileLockOptions {
  /** Maximum time to wait for the lock (default: 10000ms) */
  timeoutMs?: number;
  /** Time between attempts (default: 25ms) */
  retryMs?: number;
  logger?: Logger;
}

/**
 * File-based lock using exclusive open
 */
export class FileLock {
  #lockPath: string;
  #fd?: fs.FileHandle;
  #acquired = false;
  #timeoutMs: number;
  #retryMs: number;
  #logger: Logger;

  constructor(lockPath: string, options: FileLockOptions = {}) {
    this.#lockPath = lockPath;
    this.#timeoutMs = options.timeoutMs ?? 10000;
    this.#retryMs = options.retryMs ?? 25;
    this.#logger = options.logger ?? defaultLogger;
  }

  get path(): string {
    return this.#lockPath;
  }

  /**
   * Acquire the lock (blocking with retries)
   * @throws {LockTimeoutError} If the lock is still held after the timeout
   */
  async acquire(): Promise<void> {
    if (this.#acquired) {
      throw new Error("Lock already acquired");
    }

    const startTime = Date.now();
    let waited = false;

    // Ensure parent directory exists
    await fs.mkdir(path.dirname(this.#lockPath), { recursive: true });

    while (true) {
      const handle = await this.#openExclusive();
      if (handle) {
        this.#fd = handle;
        this.#acquired = true;

        // Write PID and timestamp for debugging; a lock we cannot record is given back
        try {
          await handle.writeFile(
            JSON.stringify({ pid: process.pid, acquiredAt: new Date().toISOString() })
          );
        } catch (err) {
          await this.release();
          throw err;
        }
        return;
      }

      if (Date.now() - startTime > this.#timeoutMs) {
        throw new LockTimeoutError(this.#lockPath, this.#timeoutMs);
      }

      if (!waited) {
        waited = true;
        this.#logger.debug("lock.wait", { message: this.#lockPath });
      }
      await new Promise((resolve) => setTimeout(resolve, this.#retryMs));
    }
  }

  /**
   * Create the lock file exclusively
   * @returns null if another holder owns it
   */
  async #openExclusive(): Promise<fs.FileHandle | null> {
    try {
      return await fs.open(this.#lockPath, "wx");
    } catch (err) {
      if (errnoCode(err) === "EEXIST") {
        return null;
      }
      throw err;
    }
  }

  /**
   * Release the lock
   */
  async release(): Promise<void> {
    if (!this.#acquired) {
      return; // Nothing to release
    }

    try {
      if (this.#fd) {
        await this.#fd.close();
        this.#fd = undefined;
      }

      await fs.unlink(this.#lockPath);
    } catch (err) {
      // Already cleaned up
      if (errnoCode(err) !== "ENOENT") {
        throw err;
      }
    } finally {
      this.#acquired = false;
    }
  }

  /**
   * Check if lock is acquired
   */
  isAcquired(): boolean {
    return this.#acquired;
  }

  /**
   * Execute a function with the lock held
   */
  async withLock<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      await this.release();
    }
  }
}
