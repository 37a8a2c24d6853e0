import { describe, it, expect } from "vitest";
import { isDocument, isJsonObject, jsonTypeOf, matches } from "./query.js";
import type { JsonObject } from "./types.js";

describe("matches", () => {
  const doc: JsonObject = {
    _id: "u1",
    name: "Ann",
    age: 31,
    active: true,
    manager: null,
    address: { city: "Oslo", zip: "0150", geo: { lat: 59.9 } },
    tags: ["a", "b", "c"],
    roles: [{ name: "admin", scope: "all" }, { name: "ops" }],
  };

  describe("object queries", () => {
    it("should match the empty query", () => {
      expect(matches(doc, {})).toBe(true);
      expect(matches({}, {})).toBe(true);
    });

    it("should match a document against itself", () => {
      expect(matches(doc, doc)).toBe(true);
    });

    it("should ignore extra document keys", () => {
      expect(matches(doc, { name: "Ann" })).toBe(true);
      expect(matches(doc, { name: "Ann", age: 31 })).toBe(true);
    });

    it("should stay matched when a key of the document is added to the query", () => {
      const query: JsonObject = { name: "Ann" };
      expect(matches(doc, query)).toBe(true);
      expect(matches(doc, { ...query, age: doc.age ?? null })).toBe(true);
      expect(matches(doc, { ...query, address: doc.address ?? null })).toBe(true);
    });

    it("should not match when a query key is missing", () => {
      expect(matches(doc, { email: "ann@example.test" })).toBe(false);
    });

    it("should not match a missing key even when the query value is null", () => {
      expect(matches(doc, { email: null })).toBe(false);
      expect(matches(doc, { manager: null })).toBe(true);
    });

    it("should match nested objects partially", () => {
      expect(matches(doc, { address: { city: "Oslo" } })).toBe(true);
      expect(matches(doc, { address: { geo: { lat: 59.9 } } })).toBe(true);
      expect(matches(doc, { address: { city: "Bergen" } })).toBe(false);
    });

    it("should not treat inherited properties as present", () => {
      expect(matches({}, { toString: {} })).toBe(false);
    });
  });

  describe("array queries", () => {
    const tagged: JsonObject = { tags: ["a", "b", "c"] };

    it("should match when every queried element is present", () => {
      expect(matches(tagged, { tags: ["b"] })).toBe(true);
      expect(matches(tagged, { tags: ["c", "a"] })).toBe(true);
    });

    it("should not match when any queried element is absent", () => {
      expect(matches(tagged, { tags: ["b", "z"] })).toBe(false);
    });

    it("should match the empty array against any array", () => {
      expect(matches(tagged, { tags: [] })).toBe(true);
      expect(matches({ tags: [] }, { tags: [] })).toBe(true);
    });

    it("should ignore duplicates in the query", () => {
      expect(matches(tagged, { tags: ["a", "a", "a"] })).toBe(true);
    });

    it("should match objects inside arrays by containment", () => {
      expect(matches(doc, { roles: [{ name: "ops" }] })).toBe(true);
      expect(matches(doc, { roles: [{ scope: "all" }] })).toBe(true);
      expect(matches(doc, { roles: [{ name: "ops", scope: "all" }] })).toBe(false);
    });

    it("should match nested arrays element-wise", () => {
      const grid: JsonObject = { rows: [[1, 2], [3, 4]] };
      expect(matches(grid, { rows: [[4]] })).toBe(true);
      expect(matches(grid, { rows: [[1, 4]] })).toBe(false);
    });

    it("should not match a scalar against an array query", () => {
      expect(matches({ tags: "a" }, { tags: ["a"] })).toBe(false);
    });
  });

  describe("scalar queries", () => {
    it("should require strict equality", () => {
      expect(matches(doc, { age: 31 })).toBe(true);
      expect(matches(doc, { age: "31" })).toBe(false);
      expect(matches(doc, { active: 1 })).toBe(false);
      expect(matches({ flag: false }, { flag: 0 })).toBe(false);
    });

    it("should not match an array element by scalar query", () => {
      expect(matches(doc, { tags: "a" })).toBe(false);
    });
  });

  describe("kind mismatches", () => {
    it("should not match an object query against an array", () => {
      expect(matches({ value: [1] }, { value: {} })).toBe(false);
    });

    it("should not match an array query against an object", () => {
      expect(matches({ value: {} }, { value: [] })).toBe(false);
    });

    it("should not match an object query against a scalar", () => {
      expect(matches({ value: 1 }, { value: { a: 1 } })).toBe(false);
      expect(matches({ value: null }, { value: {} })).toBe(false);
    });
  });
});

describe("jsonTypeOf", () => {
  it("should name every JSON type", () => {
    expect(jsonTypeOf(null)).toBe("null");
    expect(jsonTypeOf("x")).toBe("string");
    expect(jsonTypeOf(0)).toBe("number");
    expect(jsonTypeOf(false)).toBe("boolean");
    expect(jsonTypeOf([])).toBe("array");
    expect(jsonTypeOf({})).toBe("object");
  });
});

describe("isJsonObject / isDocument", () => {
  it("should accept only non-array objects", () => {
    expect(isJsonObject({})).toBe(true);
    expect(isJsonObject([])).toBe(false);
    expect(isJsonObject(null)).toBe(false);
    expect(isJsonObject("x")).toBe(false);
  });

  it("should require a string _id for documents", () => {
    expect(isDocument({ _id: "a" })).toBe(true);
    expect(isDocument({ _id: 1 })).toBe(false);
    expect(isDocument({})).toBe(false);
  });
});
