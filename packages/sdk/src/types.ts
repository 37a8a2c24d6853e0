/**
 * Core types for patchdb
 */

import type { LogLevel, Logger } from "./observability/logs.js";

/**
 * JSON scalar value
 */
export type JsonPrimitive = string | number | boolean | null;

/**
 * Any JSON value
 */
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;

/**
 * JSON object with string keys
 */
export interface JsonObject {
  [key: string]: JsonValue;
}

/**
 * JSON type names a `$type` constraint may declare
 */
export type JsonType = "string" | "number" | "object" | "array" | "boolean";

/**
 * JSON type names as reported by `jsonTypeOf` (includes "null")
 */
export type JsonTypeName = JsonType | "null";

/**
 * Stored document - every document carries a string `_id` unique within its collection
 */
export type Document = JsonObject & { _id: string };

/**
 * Containment query: a JSON object whose structure must be present in a document
 */
export type Query = JsonObject;

/**
 * Constraint rule kinds
 */
export type ConstraintKind = "required" | "notnull" | "type";

/**
 * Schema rule bound to one field of one collection
 */
export type Constraint =
  | { field: string; kind: "required" }
  | { field: string; kind: "notnull" }
  | { field: string; kind: "type"; type: JsonType };

/**
 * Rule tokens for a single field in a constraint spec
 * @example { "$required": true, "$type": "string" }
 */
export interface ConstraintRuleSpec {
  $required?: unknown;
  $notnull?: unknown;
  $type?: string;
}

/**
 * Constraint spec document: field name → rule tokens
 * @example { "email": { "$required": true, "$notnull": true, "$type": "string" } }
 */
export type ConstraintSpec = Record<string, ConstraintRuleSpec>;

/**
 * A constraint as persisted by a backend, keyed by its deterministic name
 */
export interface StoredCheck {
  name: string;
  constraint: Constraint;
}

/**
 * One failed rule found while validating a document
 */
export interface ConstraintViolation {
  /** Rule that failed */
  constraint: Constraint;
  /** Human-readable description naming the field and rule */
  message: string;
}

/**
 * Result of validating a document against a collection's constraints
 */
export interface ValidationResult {
  /** True if every constraint passed */
  ok: boolean;
  /** Failed rules (empty if ok is true) */
  violations: ConstraintViolation[];
}

/**
 * Persistent store the document layer runs on
 *
 * Every method is atomic on its own. Queries are evaluated with `matches`.
 */
export interface StorageBackend {
  /** Check whether a collection exists */
  exists(collection: string): Promise<boolean>;

  /**
   * Create a collection unless it exists, in one atomic step
   * @returns true only for the caller that created it
   */
  createIfAbsent(collection: string): Promise<boolean>;

  /**
   * Remove a collection with all its documents and checks
   * @returns true if the collection existed
   */
  drop(collection: string): Promise<boolean>;

  /** Names of all collections, sorted */
  listCollections(): Promise<string[]>;

  /**
   * Store a new document
   * @throws {DuplicateIdError} If the id is already taken in the collection
   */
  put(collection: string, id: string, doc: Document): Promise<void>;

  /** Fetch a document by id, or null */
  get(collection: string, id: string): Promise<Document | null>;

  /**
   * Replace the body of an existing document
   * @returns false if no document has that id
   */
  replace(collection: string, id: string, doc: Document): Promise<boolean>;

  /** Lazily yield documents containing the query; empty for a missing collection */
  scanMatching(collection: string, query: Query): AsyncIterable<Document>;

  /**
   * Delete documents containing the query, in scan order
   * @param limit - Stop after this many deletions (default: unlimited)
   * @returns The deleted documents
   */
  deleteMatching(collection: string, query: Query, limit?: number): Promise<Document[]>;

  /** Delete one document by id; false if it did not exist */
  deleteById(collection: string, id: string): Promise<boolean>;

  /**
   * Persist a constraint under its name
   * @returns false if a check with that name already exists
   */
  addCheck(collection: string, name: string, constraint: Constraint): Promise<boolean>;

  /** Remove a named check; false if it did not exist */
  dropCheck(collection: string, name: string): Promise<boolean>;

  /** All checks of a collection; empty for a missing collection */
  listChecks(collection: string): Promise<StoredCheck[]>;

  /**
   * Run `fn` while holding the collection's write lock
   */
  withCollectionLock<T>(collection: string, fn: () => Promise<T>): Promise<T>;

  /** Release backend resources */
  close(): Promise<void>;
}

/**
 * Configuration options for opening a database
 */
export interface DatabaseOptions {
  /** Root directory for file storage; omit (with no backend) for an in-memory database */
  root?: string;
  /** Custom storage backend; takes precedence over root */
  backend?: StorageBackend;
  /** Number of spaces for JSON indentation in stored files (default: 2) */
  indent?: number;
  /** Maximum time to wait for a collection lock file (default: 10000) */
  lockTimeoutMs?: number;
  /** Delay between lock attempts (default: 25) */
  lockRetryMs?: number;
  /** Minimum log level (default: PATCHDB_LOG_LEVEL, else "warn"); with `logger`, applies to a copy of it */
  logLevel?: LogLevel;
  /** Logger instance (default: shared logger) */
  logger?: Logger;
  /** Identifier generator for documents inserted without `_id` */
  generateId?: () => string;
}

/**
 * Operations bound to one collection
 */
export interface Collection {
  /** Collection name */
  readonly name: string;
  insert(doc: JsonObject): Promise<string>;
  save(doc: JsonObject): Promise<string>;
  find(query?: Query): Cursor<Document>;
  findOne(query?: Query): Promise<Document | null>;
  findOneById(id: string): Promise<Document | null>;
  count(query?: Query): Promise<number>;
  remove(query: Query): Promise<number>;
  removeOne(query: Query): Promise<number>;
  removeOneById(id: string): Promise<number>;
  addConstraint(spec: ConstraintSpec): Promise<boolean>;
  removeConstraint(spec: ConstraintSpec): Promise<boolean>;
  listConstraints(): Promise<Constraint[]>;
  exists(): Promise<boolean>;
  drop(): Promise<boolean>;
}

/**
 * Lazy, restartable sequence of results
 */
export interface Cursor<T> extends AsyncIterable<T> {
  /** Run the query and collect every result */
  toArray(): Promise<T[]>;
  /** Run the query and return the first result, or null */
  first(): Promise<T | null>;
}

/**
 * Main database interface
 */
export interface Database {
  /**
   * Names of all collections, sorted
   */
  listCollections(): Promise<string[]>;

  /**
   * Check whether a collection exists
   */
  collectionExists(collection: string): Promise<boolean>;

  /**
   * Create a collection
   * @returns true if it was created, false if it already existed
   */
  createCollection(collection: string): Promise<boolean>;

  /**
   * Drop a collection with its documents and constraints
   * @returns true if it existed
   */
  dropCollection(collection: string): Promise<boolean>;

  /**
   * Insert a new document, creating the collection if needed
   * @returns The document's `_id` (generated when absent)
   */
  insert(collection: string, doc: JsonObject): Promise<string>;

  /**
   * Replace the document with the same `_id`, or insert it
   * @returns The document's `_id`
   */
  save(collection: string, doc: JsonObject): Promise<string>;

  /**
   * Find documents containing the query
   */
  find(collection: string, query?: Query): Cursor<Document>;

  /**
   * Find the first document containing the query
   */
  findOne(collection: string, query?: Query): Promise<Document | null>;

  /**
   * Fetch a document by `_id`
   */
  findOneById(collection: string, id: string): Promise<Document | null>;

  /**
   * Count documents containing the query
   */
  count(collection: string, query?: Query): Promise<number>;

  /**
   * Remove every document containing the query
   * @returns Number of documents removed
   */
  remove(collection: string, query: Query): Promise<number>;

  /**
   * Remove the first document containing the query
   * @returns 1 if a document was removed, 0 otherwise
   */
  removeOne(collection: string, query: Query): Promise<number>;

  /**
   * Remove a document by `_id`
   * @returns 1 if a document was removed, 0 otherwise
   */
  removeOneById(collection: string, id: string): Promise<number>;

  /**
   * Add constraints described by a spec document
   * @returns true if at least one constraint was newly added
   */
  addConstraint(collection: string, spec: ConstraintSpec): Promise<boolean>;

  /**
   * Remove constraints described by a spec document
   * @returns true if at least one constraint existed and was removed
   */
  removeConstraint(collection: string, spec: ConstraintSpec): Promise<boolean>;

  /**
   * Active constraints of a collection, sorted by name
   */
  listConstraints(collection: string): Promise<Constraint[]>;

  /**
   * Handle bound to one collection
   */
  collection(name: string): Collection;

  /**
   * Close the database and release backend resources
   */
  close(): Promise<void>;
}
