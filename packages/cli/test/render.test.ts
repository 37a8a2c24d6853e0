/**
 * Unit tests for command output
 */

import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from "vitest";
import { printJson, printLines, printStatus, colorize } from "../src/lib/render.js";

describe("render", () => {
  let logSpy: MockInstance<typeof console.log>;

  beforeEach(() => {
    logSpy = vi.spyOn(console, "log").mockImplementation(() => undefined);
  });

  afterEach(() => {
    logSpy.mockRestore();
  });

  it("should pretty-print JSON unless raw", () => {
    printJson({ _id: "a", n: 1 });
    printJson({ _id: "a", n: 1 }, { raw: true });
    expect(logSpy.mock.calls).toEqual([['{\n  "_id": "a",\n  "n": 1\n}'], ['{"_id":"a","n":1}']]);
  });

  it("should print one name per line", () => {
    printLines(["jobs", "users"]);
    expect(logSpy.mock.calls).toEqual([["jobs"], ["users"]]);
  });

  it("should print status lines unless quiet", () => {
    printStatus("Created collection users", {});
    printStatus("Dropped collection users", { quiet: true });
    expect(logSpy.mock.calls).toEqual([["Created collection users"]]);
  });

  describe("colorize", () => {
    const original = Object.getOwnPropertyDescriptor(process.stderr, "isTTY");

    afterEach(() => {
      if (original) {
        Object.defineProperty(process.stderr, "isTTY", original);
      } else {
        Reflect.deleteProperty(process.stderr, "isTTY");
      }
    });

    it("should leave text plain off a terminal", () => {
      Object.defineProperty(process.stderr, "isTTY", { value: false, configurable: true });
      expect(colorize("Error: boom", "red", process.stderr)).toBe("Error: boom");
    });

    it("should color text on a terminal", () => {
      Object.defineProperty(process.stderr, "isTTY", { value: true, configurable: true });
      expect(colorize("Error: boom", "red", process.stderr)).toBe("\x1b[31mError: boom\x1b[0m");
    });
  });
});
