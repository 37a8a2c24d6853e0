/**
 * Per-collection schema constraints
 *
 * Invariants:
 * - A constraint's name is derived from its field, kind and (for $type) declared type
 * - Adding an existing constraint is a no-op; removing a missing one is a no-op
 * - At most one $type constraint per field
 * - Adding a constraint never re-validates documents already stored
 */

import { ConstraintViolationError, InputTypeError, TypeConstraintConflictError } from "./errors.js";
import { logger as defaultLogger, type Logger } from "./observability/logs.js";
import { jsonTypeOf } from "./query.js";
import { validateConstraintSpec } from "./validation.js";
import type {
  Constraint,
  ConstraintViolation,
  JsonObject,
  JsonType,
  StorageBackend,
  ValidationResult,
} from "./types.js";

/**
 * JSON types a `$type` constraint may declare
 */
export const JSON_TYPES: readonly JsonType[] = ["string", "number", "object", "array", "boolean"];

/**
 * Check whether a string names a declarable JSON type
 */
export function isJsonType(value: string): value is JsonType {
  return JSON_TYPES.some((t) => t === value);
}

/**
 * Deterministic name of a constraint
 * @example constraintName({ field: "age", kind: "type", type: "number" }) // "age:type:number"
 */
export function constraintName(constraint: Constraint): string {
  switch (constraint.kind) {
    case "required":
      return `${constraint.field}:required`;
    case "notnull":
      return `${constraint.field}:notnull`;
    case "type":
      return `${constraint.field}:type:${constraint.type}`;
  }
}

/**
 * Rebuild a constraint from its persisted form
 * @returns null if the value is not a well-formed constraint
 */
export function toConstraint(value: unknown): Constraint | null {
  if (typeof value !== "object" || value === null || !("field" in value) || !("kind" in value)) {
    return null;
  }
  const { field, kind } = value;
  if (typeof field !== "string") return null;

  switch (kind) {
    case "required":
      return { field, kind: "required" };
    case "notnull":
      return { field, kind: "notnull" };
    case "type": {
      const type = "type" in value ? value.type : undefined;
      return typeof type === "string" && isJsonType(type) ? { field, kind: "type", type } : null;
    }
    default:
      return null;
  }
}

/**
 * Expand a spec document into constraints, in spec order
 * @param spec - Spec document, e.g. `{ "age": { "$required": true, "$type": "number" } }`
 * @param checkTypes - Reject `$type` names outside the JSON type enum
 * @throws {InputTypeError} If the spec is malformed
 */
export function parseConstraintSpec(spec: unknown, checkTypes = true): Constraint[] {
  validateConstraintSpec(spec);

  const constraints: Constraint[] = [];
  for (const [field, rules] of Object.entries(spec)) {
    for (const token of Object.keys(rules)) {
      switch (token) {
        case "$required":
          constraints.push({ field, kind: "required" });
          break;
        case "$notnull":
          constraints.push({ field, kind: "notnull" });
          break;
        case "$type": {
          const type = rules.$type ?? "";
          if (isJsonType(type)) {
            constraints.push({ field, kind: "type", type });
          } else if (checkTypes) {
            throw new InputTypeError(
              `Invalid $type ("${type}") specified for field "${field}". ` +
                `Please specify the name of a json type: ${JSON_TYPES.join(", ")}`
            );
          }
          break;
        }
      }
    }
  }
  return constraints;
}

/**
 * Check one document against a set of constraints
 * @returns Every failed rule, in constraint order
 */
export function checkDocument(doc: JsonObject, constraints: Constraint[]): ConstraintViolation[] {
  const violations: ConstraintViolation[] = [];

  for (const constraint of constraints) {
    const { field } = constraint;
    const present = Object.hasOwn(doc, field);
    const value = doc[field];

    switch (constraint.kind) {
      case "required":
        if (!present) {
          violations.push({ constraint, message: `Field "${field}" is required` });
        }
        break;
      case "notnull":
        if (!present || value === null) {
          violations.push({ constraint, message: `Field "${field}" must be present and not null` });
        }
        break;
      case "type":
        if (present && value !== undefined && value !== null) {
          const actual = jsonTypeOf(value);
          if (actual !== constraint.type) {
            violations.push({
              constraint,
              message: `Field "${field}" must be of type ${constraint.type} or null (got ${actual})`,
            });
          }
        }
        break;
    }
  }

  return violations;
}

/**
 * Constraint registration and enforcement on top of a storage backend
 *
 * Callers hold the collection lock around add/remove and around writes that call enforce.
 */
export class ConstraintManager {
  #backend: StorageBackend;
  #logger: Logger;

  constructor(backend: StorageBackend, logger: Logger = defaultLogger) {
    this.#backend = backend;
    this.#logger = logger;
  }

  /**
   * Add every constraint in a spec
   *
   * The whole spec is checked (type names, contradictory $type) before anything is applied.
   * @returns true if at least one constraint was newly added
   * @throws {InputTypeError} If the spec is malformed or names an invalid type
   * @throws {TypeConstraintConflictError} If a field already has a different $type
   */
  async add(collection: string, spec: unknown): Promise<boolean> {
    const requested = parseConstraintSpec(spec);
    if (requested.length === 0) {
      return false;
    }

    const existing = await this.list(collection);
    for (const constraint of requested) {
      if (constraint.kind !== "type") continue;
      for (const current of existing) {
        if (
          current.kind === "type" &&
          current.field === constraint.field &&
          current.type !== constraint.type
        ) {
          throw new TypeConstraintConflictError(constraint.field, current.type, constraint.type);
        }
      }
    }

    await this.#backend.createIfAbsent(collection);

    let added = false;
    for (const constraint of requested) {
      const name = constraintName(constraint);
      if (await this.#backend.addCheck(collection, name, constraint)) {
        added = true;
        this.#logger.info("constraint.add", { collection, field: constraint.field, message: name });
      }
    }
    return added;
  }

  /**
   * Remove every constraint in a spec that exists
   * @returns true if at least one constraint was removed
   * @throws {InputTypeError} If the spec is malformed
   */
  async remove(collection: string, spec: unknown): Promise<boolean> {
    const requested = parseConstraintSpec(spec, false);

    let removed = false;
    for (const constraint of requested) {
      const name = constraintName(constraint);
      if (await this.#backend.dropCheck(collection, name)) {
        removed = true;
        this.#logger.info("constraint.remove", {
          collection,
          field: constraint.field,
          message: name,
        });
      }
    }
    return removed;
  }

  /**
   * Active constraints, sorted by name
   */
  async list(collection: string): Promise<Constraint[]> {
    const checks = await this.#backend.listChecks(collection);
    return checks
      .slice()
      .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))
      .map((check) => check.constraint);
  }

  /**
   * Check a document against the collection's active constraints
   */
  async validate(collection: string, doc: JsonObject): Promise<ValidationResult> {
    const violations = checkDocument(doc, await this.list(collection));
    return { ok: violations.length === 0, violations };
  }

  /**
   * Validate a document and reject it if any constraint fails
   * @throws {ConstraintViolationError} Listing every failed rule
   */
  async enforce(collection: string, doc: JsonObject): Promise<void> {
    const result = await this.validate(collection, doc);
    if (result.ok) return;

    this.#logger.warn("document.rejected", {
      collection,
      message: `${result.violations.length} constraint violation(s)`,
      details: { constraints: result.violations.map((v) => constraintName(v.constraint)) },
    });
    throw new ConstraintViolationError(collection, result.violations);
  }
}
