/**
 * Collection registry
 *
 * Thin layer over the backend's own collection metadata: names are validated
 * here, and creation and drop are logged.
 */

import { logger as defaultLogger, type Logger } from "./observability/logs.js";
import { validateCollectionName } from "./validation.js";
import type { StorageBackend } from "./types.js";

export class CollectionRegistry {
  #backend: StorageBackend;
  #logger: Logger;

  constructor(backend: StorageBackend, logger: Logger = defaultLogger) {
    this.#backend = backend;
    this.#logger = logger;
  }

  /**
   * Check whether a collection exists
   * @throws {InputTypeError} If the name is invalid
   */
  async exists(name: string): Promise<boolean> {
    validateCollectionName(name);
    return this.#backend.exists(name);
  }

  /**
   * Create a collection unless it exists
   * @returns true only for the caller that created it
   * @throws {InputTypeError} If the name is invalid
   */
  async create(name: string): Promise<boolean> {
    validateCollectionName(name);
    const created = await this.#backend.createIfAbsent(name);
    if (created) {
      this.#logger.info("collection.create", { collection: name });
    }
    return created;
  }

  /**
   * Names of all collections, sorted
   */
  async list(): Promise<string[]> {
    return this.#backend.listCollections();
  }

  /**
   * Drop a collection with its documents and constraints
   * @returns true if it existed
   * @throws {InputTypeError} If the name is invalid
   */
  async drop(name: string): Promise<boolean> {
    validateCollectionName(name);
    const dropped = await this.#backend.drop(name);
    if (dropped) {
      this.#logger.info("collection.drop", { collection: name });
    }
    return dropped;
  }
}
