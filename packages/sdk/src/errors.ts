/**
 * Error types for patchdb operations
 *
 * Invariants:
 * - All errors support a `cause` property for wrapping underlying errors
 * - All errors have stable `name` and `code` fields for programmatic handling
 * - Store errors include the absolute target path in the message
 */

import type { ConstraintViolation, JsonType } from "./types.js";

/**
 * Base class for all patchdb errors
 */
export abstract class PatchDbError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown when caller input has the wrong JSON type or shape
 */
export class InputTypeError extends PatchDbError {
  readonly code = "E_INPUT_TYPE";
}

/**
 * Thrown when a write would contradict existing state
 */
export class ConflictError extends PatchDbError {
  readonly code = "E_CONFLICT";
}

/**
 * Thrown when an insert reuses an `_id` already present in the collection
 */
export class DuplicateIdError extends ConflictError {
  constructor(
    public readonly collection: string,
    public readonly id: string,
    options?: ErrorOptions
  ) {
    super(`Document with _id "${id}" already exists in collection "${collection}"`, options);
  }
}

/**
 * Thrown when a `$type` constraint is added to a field that already has a different one
 */
export class TypeConstraintConflictError extends ConflictError {
  constructor(
    public readonly field: string,
    public readonly existing: JsonType,
    public readonly requested: JsonType,
    options?: ErrorOptions
  ) {
    super(
      `Contradictory $type "${requested}" constraint on field "${field}": ` +
        `remove the existing $type "${existing}" constraint first`,
      options
    );
  }
}

/**
 * Thrown when a written document fails one or more constraints
 */
export class ConstraintViolationError extends PatchDbError {
  readonly code = "E_CONSTRAINT";

  constructor(
    public readonly collection: string,
    public readonly violations: ConstraintViolation[],
    options?: ErrorOptions
  ) {
    super(
      `Document violates ${violations.length} constraint(s) on collection "${collection}": ` +
        violations.map((v) => v.message).join("; "),
      options
    );
  }
}

/**
 * Thrown when no usable document identifier can be produced
 */
export class IdGenerationError extends PatchDbError {
  readonly code = "E_ID_GENERATION";
}

/**
 * Base class for failures of the underlying store
 */
export abstract class StoreError extends PatchDbError {}

/**
 * Thrown when a document read operation fails
 */
export class DocumentReadError extends StoreError {
  readonly code = "READ_ERROR";

  constructor(filePath: string, options?: ErrorOptions) {
    super(`Failed to read document: ${filePath}`, options);
  }
}

/**
 * Thrown when a document write operation fails
 */
export class DocumentWriteError extends StoreError {
  readonly code = "WRITE_ERROR";

  constructor(filePath: string, options?: ErrorOptions) {
    super(`Failed to write document: ${filePath}`, options);
  }
}

/**
 * Thrown when a document removal operation fails
 */
export class DocumentRemoveError extends StoreError {
  readonly code = "REMOVE_ERROR";

  constructor(filePath: string, options?: ErrorOptions) {
    super(`Failed to remove document: ${filePath}`, options);
  }
}

/**
 * Thrown when a directory operation fails
 */
export class DirectoryError extends StoreError {
  readonly code = "DIRECTORY_ERROR";

  constructor(dirPath: string, options?: ErrorOptions) {
    super(`Directory operation failed: ${dirPath}`, options);
  }
}

/**
 * Thrown when listing files in a directory fails
 */
export class ListFilesError extends StoreError {
  readonly code = "LIST_ERROR";

  constructor(dirPath: string, options?: ErrorOptions) {
    super(`Failed to list files in directory: ${dirPath}`, options);
  }
}

/**
 * Thrown when a collection lock cannot be acquired in time
 */
export class LockTimeoutError extends StoreError {
  readonly code = "LOCK_TIMEOUT";

  constructor(
    public readonly lockPath: string,
    public readonly timeoutMs: number,
    options?: ErrorOptions
  ) {
    super(
      `Failed to acquire lock after ${timeoutMs}ms. Lock file: ${lockPath}. ` +
        `This may indicate a stale lock from a crashed process - ` +
        `manually delete the lock file if safe.`,
      options
    );
  }
}
