import { describe, it, expect, beforeEach } from "vitest";
import { MemoryBackend } from "./memory.js";
import { DuplicateIdError } from "../errors.js";
import type { Document } from "../types.js";

async function collect(iterable: AsyncIterable<Document>): Promise<Document[]> {
  const out: Document[] = [];
  for await (const doc of iterable) out.push(doc);
  return out;
}

describe("MemoryBackend", () => {
  let backend: MemoryBackend;

  beforeEach(async () => {
    backend = new MemoryBackend();
    await backend.createIfAbsent("items");
  });

  describe("collections", () => {
    it("should create only once", async () => {
      expect(await backend.createIfAbsent("items")).toBe(false);
      expect(await backend.createIfAbsent("other")).toBe(true);
      expect(await backend.listCollections()).toEqual(["items", "other"]);
    });

    it("should drop documents and checks together", async () => {
      await backend.put("items", "a", { _id: "a" });
      await backend.addCheck("items", "x:required", { field: "x", kind: "required" });

      expect(await backend.drop("items")).toBe(true);
      expect(await backend.drop("items")).toBe(false);
      expect(await backend.exists("items")).toBe(false);

      await backend.createIfAbsent("items");
      expect(await backend.get("items", "a")).toBeNull();
      expect(await backend.listChecks("items")).toEqual([]);
    });
  });

  describe("documents", () => {
    it("should enforce id uniqueness", async () => {
      await backend.put("items", "a", { _id: "a", v: 1 });
      await expect(backend.put("items", "a", { _id: "a", v: 2 })).rejects.toThrow(DuplicateIdError);
      expect(await backend.get("items", "a")).toEqual({ _id: "a", v: 1 });
    });

    it("should isolate stored state from callers", async () => {
      const doc: Document = { _id: "a", nested: { v: 1 } };
      await backend.put("items", "a", doc);
      doc.nested = "changed";

      const read = await backend.get("items", "a");
      expect(read).toEqual({ _id: "a", nested: { v: 1 } });
      if (read) read.nested = "changed again";
      expect(await backend.get("items", "a")).toEqual({ _id: "a", nested: { v: 1 } });
    });

    it("should replace only existing documents", async () => {
      expect(await backend.replace("items", "a", { _id: "a" })).toBe(false);
      await backend.put("items", "a", { _id: "a", v: 1 });
      expect(await backend.replace("items", "a", { _id: "a", v: 2 })).toBe(true);
      expect(await backend.get("items", "a")).toEqual({ _id: "a", v: 2 });
    });

    it("should scan and delete by containment", async () => {
      await backend.put("items", "a", { _id: "a", tag: "x" });
      await backend.put("items", "b", { _id: "b", tag: "y" });
      await backend.put("items", "c", { _id: "c", tag: "x" });

      expect((await collect(backend.scanMatching("items", { tag: "x" }))).map((d) => d._id)).toEqual([
        "a",
        "c",
      ]);

      const removed = await backend.deleteMatching("items", { tag: "x" }, 1);
      expect(removed).toEqual([{ _id: "a", tag: "x" }]);
      expect(await backend.deleteMatching("items", {})).toHaveLength(2);
      expect(await collect(backend.scanMatching("items", {}))).toEqual([]);
    });

    it("should treat a missing collection as empty", async () => {
      expect(await backend.get("nope", "a")).toBeNull();
      expect(await collect(backend.scanMatching("nope", {}))).toEqual([]);
      expect(await backend.deleteMatching("nope", {})).toEqual([]);
      expect(await backend.deleteById("nope", "a")).toBe(false);
    });
  });

  describe("checks", () => {
    it("should add each name once", async () => {
      expect(await backend.addCheck("items", "x:notnull", { field: "x", kind: "notnull" })).toBe(true);
      expect(await backend.addCheck("items", "x:notnull", { field: "x", kind: "notnull" })).toBe(false);
      expect(await backend.listChecks("items")).toEqual([
        { name: "x:notnull", constraint: { field: "x", kind: "notnull" } },
      ]);
      expect(await backend.dropCheck("items", "x:notnull")).toBe(true);
      expect(await backend.dropCheck("items", "x:notnull")).toBe(false);
    });
  });

  describe("withCollectionLock()", () => {
    it("should serialize holders of the same collection", async () => {
      const events: string[] = [];
      const slow = backend.withCollectionLock("items", async () => {
        events.push("slow:start");
        await new Promise((resolve) => setTimeout(resolve, 20));
        events.push("slow:end");
      });
      const fast = backend.withCollectionLock("items", async () => {
        events.push("fast");
      });

      await Promise.all([slow, fast]);
      expect(events).toEqual(["slow:start", "slow:end", "fast"]);
    });
  });
});
