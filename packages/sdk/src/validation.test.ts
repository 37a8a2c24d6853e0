import { describe, it, expect } from "vitest";
import {
  toJsonObject,
  toJsonValue,
  toQuery,
  validateCollectionName,
  validateConstraintSpec,
  validateDocumentId,
} from "./validation.js";
import { InputTypeError } from "./errors.js";

describe("validateCollectionName", () => {
  it("should accept valid names", () => {
    for (const name of ["users", "user_events", "log-2024.01", "A1"]) {
      expect(() => validateCollectionName(name)).not.toThrow();
    }
  });

  it("should reject invalid names", () => {
    for (const name of ["", ".hidden", "-dash", "a..b", "trailing.", "with space", "a/b", "CON", "nul.txt"]) {
      expect(() => validateCollectionName(name)).toThrow(InputTypeError);
    }
  });

  it("should reject non-strings", () => {
    expect(() => validateCollectionName(42)).toThrow("Collection name must be a non-empty string");
  });

  it("should reject names longer than 128 characters", () => {
    expect(() => validateCollectionName("a".repeat(128))).not.toThrow();
    expect(() => validateCollectionName("a".repeat(129))).toThrow(InputTypeError);
  });
});

describe("validateDocumentId", () => {
  it("should accept strings", () => {
    expect(() => validateDocumentId("abc")).not.toThrow();
  });

  it("should reject null and numbers", () => {
    expect(() => validateDocumentId(null)).toThrow(
      "The _id field is not a string: null. The _id field must be a string"
    );
    expect(() => validateDocumentId(7)).toThrow(
      "The _id field is not a string: 7. The _id field must be a string"
    );
  });
});

describe("toJsonValue", () => {
  it("should deep-copy JSON values", () => {
    const input = { a: { b: [1, { c: "x" }] } };
    const copy = toJsonValue(input);
    expect(copy).toEqual(input);
    expect(copy).not.toBe(input);
  });

  it("should drop undefined properties", () => {
    expect(toJsonValue({ a: 1, b: undefined })).toEqual({ a: 1 });
  });

  it("should reject undefined inside arrays", () => {
    expect(() => toJsonValue({ list: [1, undefined] })).toThrow(
      "Value at /list/1 is undefined"
    );
  });

  it("should reject non-finite numbers with a pointer", () => {
    expect(() => toJsonValue({ a: { b: NaN } })).toThrow("Value at /a/b is not a finite number: NaN");
  });

  it("should reject class instances", () => {
    expect(() => toJsonValue({ when: new Date(0) })).toThrow(
      "Value at /when is not a plain JSON object (Date)"
    );
  });

  it("should reject functions and bigints", () => {
    expect(() => toJsonValue({ f: () => 1 })).toThrow("Value at /f is not JSON-serializable (function)");
    expect(() => toJsonValue(10n)).toThrow("Value at document root is not JSON-serializable (bigint)");
  });

  it("should escape pointer segments", () => {
    expect(() => toJsonValue({ "a/b": { "c~d": Infinity } })).toThrow(
      "Value at /a~1b/c~0d is not a finite number: Infinity"
    );
  });

  it("should reject circular references with a pointer", () => {
    const doc: Record<string, unknown> = { name: "loop" };
    doc.self = doc;
    expect(() => toJsonValue(doc)).toThrow(InputTypeError);
    expect(() => toJsonValue(doc)).toThrow("Circular reference at /self");

    const list: unknown[] = [];
    list.push(list);
    expect(() => toJsonValue({ list })).toThrow("Circular reference at /list/0");
  });

  it("should accept a value referenced twice", () => {
    const shared = { x: 1 };
    expect(toJsonValue({ a: shared, b: [shared] })).toEqual({ a: { x: 1 }, b: [{ x: 1 }] });
  });

  it("should keep __proto__ as an own property", () => {
    const input: unknown = JSON.parse('{"__proto__": {"x": 1}}');
    const copy = toJsonValue(input);
    expect(Object.keys(copy ?? {})).toEqual(["__proto__"]);
    expect(Object.getPrototypeOf(copy)).toBe(Object.prototype);
  });
});

describe("toJsonObject / toQuery", () => {
  it("should reject arrays and scalars", () => {
    expect(() => toJsonObject([])).toThrow("Document must be a JSON object, got array");
    expect(() => toJsonObject(null)).toThrow("Document must be a JSON object, got null");
    expect(() => toQuery("x")).toThrow("Query must be a JSON object, got string");
  });

  it("should accept objects", () => {
    expect(toQuery({ a: 1 })).toEqual({ a: 1 });
  });
});

describe("validateConstraintSpec", () => {
  it("should accept well-formed specs", () => {
    expect(() =>
      validateConstraintSpec({ name: { $required: true, $notnull: 1, $type: "string" } })
    ).not.toThrow();
    expect(() => validateConstraintSpec({})).not.toThrow();
  });

  it("should reject a non-object spec", () => {
    expect(() => validateConstraintSpec([])).toThrow(
      "Constraint spec must be an object mapping field names to rules"
    );
  });

  it("should reject unknown rule tokens", () => {
    expect(() => validateConstraintSpec({ name: { $unique: true } })).toThrow(
      'Unknown constraint rule "$unique" for field "name"'
    );
  });

  it("should reject a non-string $type", () => {
    expect(() => validateConstraintSpec({ age: { $type: 5 } })).toThrow(
      '$type for field "age" must be a string naming a JSON type'
    );
  });

  it("should reject non-object rule sets", () => {
    expect(() => validateConstraintSpec({ age: "required" })).toThrow(
      'Constraint rules for field "age" must be an object'
    );
  });

  it("should raise InputTypeError", () => {
    expect(() => validateConstraintSpec(null)).toThrow(InputTypeError);
  });
});
