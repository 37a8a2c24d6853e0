/**
 * Unit tests for environment resolution
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { resolveRoot, expandTilde } from "../src/lib/env.js";
import { homedir } from "node:os";
import * as path from "node:path";

describe("environment resolution", () => {
  let originalEnv: string | undefined;

  beforeEach(() => {
    originalEnv = process.env.PATCHDB_ROOT;
  });

  afterEach(() => {
    if (originalEnv !== undefined) {
      process.env.PATCHDB_ROOT = originalEnv;
    } else {
      delete process.env.PATCHDB_ROOT;
    }
  });

  describe("resolveRoot", () => {
    it("should use CLI option when provided", () => {
      process.env.PATCHDB_ROOT = "/env/path";
      const result = resolveRoot("/cli/path");
      expect(result).toBe(path.resolve("/cli/path"));
    });

    it("should use PATCHDB_ROOT env var when CLI option not provided", () => {
      process.env.PATCHDB_ROOT = "/env/path";
      const result = resolveRoot();
      expect(result).toBe(path.resolve("/env/path"));
    });

    it("should use default ./data when neither provided", () => {
      delete process.env.PATCHDB_ROOT;
      const result = resolveRoot();
      expect(result).toBe(path.resolve("./data"));
    });

    it("should resolve relative paths to absolute", () => {
      const result = resolveRoot("./my-data");
      expect(path.isAbsolute(result)).toBe(true);
      expect(result).toContain("my-data");
    });

    it("should handle absolute paths", () => {
      const result = resolveRoot("/absolute/path");
      expect(result).toBe("/absolute/path");
    });
  });

  describe("expandTilde", () => {
    it("should expand a bare tilde", () => {
      expect(expandTilde("~")).toBe(homedir());
    });

    it("should expand a tilde prefix", () => {
      expect(expandTilde("~/data")).toBe(path.join(homedir(), "data"));
    });

    it("should leave other paths untouched", () => {
      expect(expandTilde("~other/data")).toBe("~other/data");
      expect(expandTilde("/abs/~/x")).toBe("/abs/~/x");
    });
  });
});
