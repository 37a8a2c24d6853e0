/**
 * Validation utilities for database input
 */

import AjvModule from "ajv";
import type { ErrorObject, SchemaObject, ValidateFunction } from "ajv";
import { InputTypeError } from "./errors.js";
import { isJsonObject } from "./query.js";
import type { ConstraintSpec, JsonObject, JsonValue, Query } from "./types.js";

const Ajv = AjvModule.default;

/**
 * Valid characters for collection names: alphanumeric, underscore, dash, dot
 */
const VALID_NAME_PATTERN = /^[A-Za-z0-9_.-]+$/;

const MAX_NAME_LENGTH = 128;

/**
 * Windows reserved device names (case-insensitive)
 */
const WINDOWS_RESERVED_NAMES = new Set([
  "con",
  "prn",
  "aux",
  "nul",
  "com1",
  "com2",
  "com3",
  "com4",
  "com5",
  "com6",
  "com7",
  "com8",
  "com9",
  "lpt1",
  "lpt2",
  "lpt3",
  "lpt4",
  "lpt5",
  "lpt6",
  "lpt7",
  "lpt8",
  "lpt9",
]);

/**
 * Validate a collection name
 * @throws {InputTypeError} If invalid
 */
export function validateCollectionName(value: unknown): asserts value is string {
  if (typeof value !== "string" || value.length === 0) {
    throw new InputTypeError("Collection name must be a non-empty string");
  }

  if (value.length > MAX_NAME_LENGTH) {
    throw new InputTypeError(
      `Collection name cannot be longer than ${MAX_NAME_LENGTH} characters: "${value.slice(0, 16)}..."`
    );
  }

  if (!VALID_NAME_PATTERN.test(value)) {
    throw new InputTypeError(
      `Collection name contains invalid characters: "${value}". ` +
        `Only alphanumeric, underscore, dash, and dot are allowed.`
    );
  }

  if (value.startsWith(".") || value.startsWith("-")) {
    throw new InputTypeError(`Collection name cannot start with "." or "-": "${value}"`);
  }

  if (value.includes("..")) {
    throw new InputTypeError(`Collection name cannot contain "..": "${value}"`);
  }

  // Windows: reject trailing dots
  if (value.endsWith(".")) {
    throw new InputTypeError(`Collection name cannot end with ".": "${value}"`);
  }

  // Windows: reject reserved device names (case-insensitive)
  const baseName = (value.split(".")[0] ?? value).toLowerCase();
  if (WINDOWS_RESERVED_NAMES.has(baseName)) {
    throw new InputTypeError(
      `Collection name cannot be a Windows reserved name: "${value}". ` +
        `Reserved names: CON, PRN, AUX, NUL, COM1-9, LPT1-9`
    );
  }
}

/**
 * Validate a document `_id` argument
 * @throws {InputTypeError} If the id is not a string
 */
export function validateDocumentId(value: unknown): asserts value is string {
  if (typeof value !== "string") {
    throw new InputTypeError(
      `The _id field is not a string: ${describeValue(value)}. The _id field must be a string`
    );
  }
}

function describeValue(value: unknown): string {
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}

function escapePointer(key: string): string {
  return key.replace(/~/g, "~0").replace(/\//g, "~1");
}

function isPlainObject(value: object): boolean {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Convert caller input to a detached JSON value
 *
 * Object properties holding `undefined` are dropped, as JSON.stringify would.
 * @param value - Input to convert
 * @param pointer - JSON Pointer of `value`, used in error messages
 * @throws {InputTypeError} If the input holds anything JSON cannot represent
 */
export function toJsonValue(value: unknown, pointer = ""): JsonValue {
  return convertValue(value, pointer, new WeakSet());
}

function convertValue(value: unknown, pointer: string, ancestors: WeakSet<object>): JsonValue {
  const where = pointer === "" ? "document root" : pointer;

  if (value === null) return null;

  switch (typeof value) {
    case "string":
    case "boolean":
      return value;
    case "number":
      if (!Number.isFinite(value)) {
        throw new InputTypeError(`Value at ${where} is not a finite number: ${value}`);
      }
      return value;
    case "object": {
      // Shared references are fine; only a path back to an ancestor is a cycle
      if (ancestors.has(value)) {
        throw new InputTypeError(`Circular reference at ${where}`);
      }
      ancestors.add(value);
      try {
        return convertContainer(value, pointer, ancestors);
      } finally {
        ancestors.delete(value);
      }
    }
    default:
      throw new InputTypeError(`Value at ${where} is not JSON-serializable (${typeof value})`);
  }
}

function convertContainer(value: object, pointer: string, ancestors: WeakSet<object>): JsonValue {
  if (Array.isArray(value)) {
    return value.map((item: unknown, i) => {
      if (item === undefined) {
        throw new InputTypeError(`Value at ${pointer}/${i} is undefined`);
      }
      return convertValue(item, `${pointer}/${i}`, ancestors);
    });
  }

  if (!isPlainObject(value)) {
    throw new InputTypeError(
      `Value at ${pointer === "" ? "document root" : pointer} is not a plain JSON object (${value.constructor.name})`
    );
  }

  const out: JsonObject = {};
  for (const [key, item] of Object.entries(value)) {
    if (item === undefined) continue;
    const converted = convertValue(item, `${pointer}/${escapePointer(key)}`, ancestors);
    if (key === "__proto__") {
      Object.defineProperty(out, key, {
        value: converted,
        enumerable: true,
        writable: true,
        configurable: true,
      });
    } else {
      out[key] = converted;
    }
  }
  return out;
}

/**
 * Convert caller input to a detached JSON object
 * @param label - What the object is, for error messages ("Document", "Query", ...)
 * @throws {InputTypeError} If the input is not a JSON object
 */
export function toJsonObject(value: unknown, label = "Document"): JsonObject {
  if (!isJsonObject(value)) {
    throw new InputTypeError(
      `${label} must be a JSON object, got ${Array.isArray(value) ? "array" : value === null ? "null" : typeof value}`
    );
  }
  const converted = toJsonValue(value);
  if (!isJsonObject(converted)) {
    throw new InputTypeError(`${label} must be a JSON object`);
  }
  return converted;
}

/**
 * Validate and copy a containment query
 * @throws {InputTypeError} If the query is not a JSON object
 */
export function toQuery(value: unknown): Query {
  return toJsonObject(value, "Query");
}

/**
 * JSON Schema for constraint spec documents
 */
export const CONSTRAINT_SPEC_SCHEMA: SchemaObject = {
  type: "object",
  additionalProperties: {
    type: "object",
    properties: {
      $required: {},
      $notnull: {},
      $type: { type: "string" },
    },
    additionalProperties: false,
  },
};

let specValidator: ValidateFunction<ConstraintSpec> | null = null;

function getSpecValidator(): ValidateFunction<ConstraintSpec> {
  if (!specValidator) {
    const ajv = new Ajv({ allErrors: true, strict: true });
    specValidator = ajv.compile<ConstraintSpec>(CONSTRAINT_SPEC_SCHEMA);
  }
  return specValidator;
}

/**
 * Decode a JSON Pointer into its segments
 */
function pointerSegments(pointer: string): string[] {
  return pointer
    .split("/")
    .slice(1)
    .map((p) => p.replace(/~1/g, "/").replace(/~0/g, "~"));
}

/**
 * Normalize an Ajv error to a message about the spec document
 */
function describeSpecError(error: ErrorObject): string {
  const [field, rule] = pointerSegments(error.instancePath);

  if (field === undefined) {
    return "Constraint spec must be an object mapping field names to rules";
  }

  if (error.keyword === "additionalProperties") {
    const token: unknown = error.params.additionalProperty;
    return `Unknown constraint rule "${String(token)}" for field "${field}"`;
  }

  if (rule === "$type") {
    return `$type for field "${field}" must be a string naming a JSON type`;
  }

  return `Constraint rules for field "${field}" must be an object`;
}

/**
 * Validate the shape of a constraint spec document
 * @throws {InputTypeError} If the spec is not a mapping of field names to rule objects
 */
export function validateConstraintSpec(spec: unknown): asserts spec is ConstraintSpec {
  const validate = getSpecValidator();
  if (validate(spec)) return;

  const messages = (validate.errors ?? []).map(describeSpecError);
  throw new InputTypeError(
    Array.from(new Set(messages)).join("; ") || "Invalid constraint spec"
  );
}
