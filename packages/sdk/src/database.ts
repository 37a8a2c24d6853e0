/**
 * Main database implementation
 */

import { FileBackend } from "./backend/file.js";
import { MemoryBackend } from "./backend/memory.js";
import { CollectionRegistry } from "./collections.js";
import { ConstraintManager } from "./constraints.js";
import { QueryCursor } from "./cursor.js";
import { generateId, nextId } from "./id.js";
import { Logger, logger as defaultLogger } from "./observability/logs.js";
import {
  toJsonObject,
  toQuery,
  validateCollectionName,
  validateDocumentId,
} from "./validation.js";
import type {
  Collection,
  Constraint,
  ConstraintSpec,
  Cursor,
  Database,
  DatabaseOptions,
  Document,
  JsonObject,
  Query,
  StorageBackend,
} from "./types.js";

/**
 * Document database over a pluggable storage backend
 *
 * Writes hold the collection's lock for their whole read-check-write sequence.
 * Reads take no lock and never create a collection.
 *
 * @example
 * ```typescript
 * const db = openDatabase({ root: "./data" });
 *
 * const id = await db.insert("users", { name: "Ann", tags: ["admin", "ops"] });
 * await db.addConstraint("users", { name: { $required: true, $type: "string" } });
 *
 * const admins = await db.find("users", { tags: ["admin"] }).toArray();
 * ```
 */
class PatchDatabase implements Database {
  #backend: StorageBackend;
  #logger: Logger;
  #registry: CollectionRegistry;
  #constraints: ConstraintManager;
  #generateId: () => string;
  #closed = false;

  constructor(options: DatabaseOptions = {}) {
    this.#logger = resolveLogger(options);
    this.#backend =
      options.backend ??
      (options.root !== undefined
        ? new FileBackend({
            root: options.root,
            indent: options.indent,
            lockTimeoutMs: options.lockTimeoutMs,
            lockRetryMs: options.lockRetryMs,
            logger: this.#logger,
          })
        : new MemoryBackend());
    this.#registry = new CollectionRegistry(this.#backend, this.#logger);
    this.#constraints = new ConstraintManager(this.#backend, this.#logger);
    this.#generateId = options.generateId ?? generateId;
  }

  async listCollections(): Promise<string[]> {
    return this.#registry.list();
  }

  async collectionExists(collection: string): Promise<boolean> {
    return this.#registry.exists(collection);
  }

  async createCollection(collection: string): Promise<boolean> {
    validateCollectionName(collection);
    return this.#backend.withCollectionLock(collection, () => this.#registry.create(collection));
  }

  async dropCollection(collection: string): Promise<boolean> {
    validateCollectionName(collection);
    return this.#backend.withCollectionLock(collection, () => this.#registry.drop(collection));
  }

  async insert(collection: string, doc: JsonObject): Promise<string> {
    validateCollectionName(collection);
    const body = toJsonObject(doc);
    if (Object.hasOwn(body, "_id")) {
      validateDocumentId(body._id);
    }

    return this.#backend.withCollectionLock(collection, async () => {
      await this.#registry.create(collection);
      return this.#insertLocked(collection, body);
    });
  }

  async save(collection: string, doc: JsonObject): Promise<string> {
    validateCollectionName(collection);
    const body = toJsonObject(doc);
    const id = body._id;
    if (Object.hasOwn(body, "_id")) {
      validateDocumentId(id);
    }

    return this.#backend.withCollectionLock(collection, async () => {
      await this.#registry.create(collection);

      if (typeof id === "string" && (await this.#backend.get(collection, id)) !== null) {
        const record: Document = { ...body, _id: id };
        await this.#constraints.enforce(collection, record);
        await this.#backend.replace(collection, id, record);
        this.#logger.debug("document.replace", { collection, message: id });
        return id;
      }

      return this.#insertLocked(collection, body);
    });
  }

  find(collection: string, query: Query = {}): Cursor<Document> {
    validateCollectionName(collection);
    const q = toQuery(query);
    const backend = this.#backend;

    return new QueryCursor<Document>(async function* () {
      if (!(await backend.exists(collection))) return;
      yield* backend.scanMatching(collection, q);
    });
  }

  async findOne(collection: string, query: Query = {}): Promise<Document | null> {
    return this.find(collection, query).first();
  }

  async findOneById(collection: string, id: string): Promise<Document | null> {
    validateCollectionName(collection);
    validateDocumentId(id);
    if (!(await this.#backend.exists(collection))) {
      return null;
    }
    return this.#backend.get(collection, id);
  }

  async count(collection: string, query: Query = {}): Promise<number> {
    let n = 0;
    for await (const _doc of this.find(collection, query)) {
      n++;
    }
    return n;
  }

  async remove(collection: string, query: Query): Promise<number> {
    return this.#removeMatching(collection, query);
  }

  async removeOne(collection: string, query: Query): Promise<number> {
    return this.#removeMatching(collection, query, 1);
  }

  async removeOneById(collection: string, id: string): Promise<number> {
    validateCollectionName(collection);
    validateDocumentId(id);

    return this.#backend.withCollectionLock(collection, async () => {
      if (!(await this.#backend.exists(collection))) {
        return 0;
      }
      const removed = await this.#backend.deleteById(collection, id);
      if (removed) {
        this.#logger.debug("document.remove", { collection, message: id });
      }
      return removed ? 1 : 0;
    });
  }

  async addConstraint(collection: string, spec: ConstraintSpec): Promise<boolean> {
    validateCollectionName(collection);
    return this.#backend.withCollectionLock(collection, () =>
      this.#constraints.add(collection, spec)
    );
  }

  async removeConstraint(collection: string, spec: ConstraintSpec): Promise<boolean> {
    validateCollectionName(collection);
    return this.#backend.withCollectionLock(collection, () =>
      this.#constraints.remove(collection, spec)
    );
  }

  async listConstraints(collection: string): Promise<Constraint[]> {
    validateCollectionName(collection);
    return this.#constraints.list(collection);
  }

  collection(name: string): Collection {
    validateCollectionName(name);
    return new CollectionHandle(this, name);
  }

  async close(): Promise<void> {
    if (this.#closed) return;
    this.#closed = true;
    await this.#backend.close();
  }

  /**
   * Assign an id if needed, enforce constraints and store a new document
   * Caller holds the collection lock and has created the collection.
   */
  async #insertLocked(collection: string, body: JsonObject): Promise<string> {
    const given = body._id;
    let record: Document;
    if (typeof given === "string") {
      record = { ...body, _id: given };
    } else {
      // Generated ids lead the stored object
      record = { _id: nextId(this.#generateId), ...body };
    }

    await this.#constraints.enforce(collection, record);
    await this.#backend.put(collection, record._id, record);
    this.#logger.debug("document.insert", { collection, message: record._id });
    return record._id;
  }

  async #removeMatching(collection: string, query: Query, limit?: number): Promise<number> {
    validateCollectionName(collection);
    const q = toQuery(query);

    return this.#backend.withCollectionLock(collection, async () => {
      if (!(await this.#backend.exists(collection))) {
        return 0;
      }
      const removed = await this.#backend.deleteMatching(collection, q, limit);
      if (removed.length > 0) {
        this.#logger.debug("document.remove", {
          collection,
          message: `${removed.length} document(s)`,
        });
      }
      return removed.length;
    });
  }
}

/**
 * Operations bound to one collection name
 */
class CollectionHandle implements Collection {
  constructor(
    private readonly db: Database,
    readonly name: string
  ) {}

  insert(doc: JsonObject): Promise<string> {
    return this.db.insert(this.name, doc);
  }

  save(doc: JsonObject): Promise<string> {
    return this.db.save(this.name, doc);
  }

  find(query?: Query): Cursor<Document> {
    return this.db.find(this.name, query);
  }

  findOne(query?: Query): Promise<Document | null> {
    return this.db.findOne(this.name, query);
  }

  findOneById(id: string): Promise<Document | null> {
    return this.db.findOneById(this.name, id);
  }

  count(query?: Query): Promise<number> {
    return this.db.count(this.name, query);
  }

  remove(query: Query): Promise<number> {
    return this.db.remove(this.name, query);
  }

  removeOne(query: Query): Promise<number> {
    return this.db.removeOne(this.name, query);
  }

  removeOneById(id: string): Promise<number> {
    return this.db.removeOneById(this.name, id);
  }

  addConstraint(spec: ConstraintSpec): Promise<boolean> {
    return this.db.addConstraint(this.name, spec);
  }

  removeConstraint(spec: ConstraintSpec): Promise<boolean> {
    return this.db.removeConstraint(this.name, spec);
  }

  listConstraints(): Promise<Constraint[]> {
    return this.db.listConstraints(this.name);
  }

  exists(): Promise<boolean> {
    return this.db.collectionExists(this.name);
  }

  drop(): Promise<boolean> {
    return this.db.dropCollection(this.name);
  }
}

function resolveLogger(options: DatabaseOptions): Logger {
  if (options.logger) {
    return options.logLevel ? options.logger.withLevel(options.logLevel) : options.logger;
  }
  return options.logLevel ? new Logger(options.logLevel) : defaultLogger;
}

/**
 * Open a database
 *
 * With `root`, documents live in JSON files under that directory; with
 * `backend`, in the given store; with neither, in memory.
 */
export function openDatabase(options: DatabaseOptions = {}): Database {
  return new PatchDatabase(options);
}
