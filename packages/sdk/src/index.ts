/**
 * patchdb SDK
 *
 * JSON document collections with containment queries and per-field constraints
 */

// Re-export types
export type {
  JsonPrimitive,
  JsonValue,
  JsonObject,
  JsonType,
  JsonTypeName,
  Document,
  Query,
  ConstraintKind,
  Constraint,
  ConstraintRuleSpec,
  ConstraintSpec,
  StoredCheck,
  ConstraintViolation,
  ValidationResult,
  StorageBackend,
  DatabaseOptions,
  Collection,
  Cursor,
  Database,
} from "./types.js";

// Database
export { openDatabase } from "./database.js";
export { QueryCursor } from "./cursor.js";
export { CollectionRegistry } from "./collections.js";

// Backends
export { MemoryBackend } from "./backend/memory.js";
export { FileBackend, encodeKey, type FileBackendOptions } from "./backend/file.js";
export { KeyedMutex, FileLock, type FileLockOptions } from "./lock.js";

// Utilities
export { generateId, nextId, ID_BYTES } from "./id.js";
export { matches, jsonTypeOf, isJsonObject, isDocument } from "./query.js";
export {
  ConstraintManager,
  JSON_TYPES,
  isJsonType,
  constraintName,
  parseConstraintSpec,
  checkDocument,
} from "./constraints.js";
export {
  validateCollectionName,
  validateDocumentId,
  validateConstraintSpec,
  toJsonValue,
  toJsonObject,
  toQuery,
} from "./validation.js";
export { stableStringify } from "./format.js";

// Re-export I/O operations
export {
  atomicWrite,
  atomicCreate,
  readDocument,
  removeDocument,
  ensureDirectory,
  listFiles,
} from "./io.js";

// Logging
export {
  Logger,
  logger,
  resolveLogLevel,
  isLogLevel,
  type LogLevel,
  type LogEntry,
} from "./observability/logs.js";

// Re-export errors
export {
  PatchDbError,
  InputTypeError,
  ConflictError,
  DuplicateIdError,
  TypeConstraintConflictError,
  ConstraintViolationError,
  IdGenerationError,
  StoreError,
  DocumentReadError,
  DocumentWriteError,
  DocumentRemoveError,
  DirectoryError,
  ListFilesError,
  LockTimeoutError,
} from "./errors.js";
