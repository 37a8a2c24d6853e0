import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { readdir, mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { createTempStoreRoot, removeDir } from "@patchdb/testkit";
import {
  FileExistsError,
  atomicCreate,
  atomicWrite,
  ensureDirectory,
  errnoCode,
  isDirectory,
  listDirectories,
  listFiles,
  readDocument,
  removeDocument,
} from "./io.js";
import { DirectoryError, DocumentRemoveError } from "./errors.js";

describe("io operations", () => {
  let testDir: string;

  beforeEach(async () => {
    // Create a unique temp directory for each test
    testDir = await createTempStoreRoot();
  });

  afterEach(async () => {
    await removeDir(testDir);
  });

  describe("atomicWrite and readDocument", () => {
    it("should write and read file successfully", async () => {
      const filePath = join(testDir, "test.json");
      const content = '{"test": "data"}';

      await atomicWrite(filePath, content);

      expect(await readDocument(filePath)).toBe(content);
    });

    it("should not leave temp files after successful write", async () => {
      const filePath = join(testDir, "test.json");

      await atomicWrite(filePath, "first");
      await atomicWrite(filePath, "second");

      expect(await readdir(testDir)).toEqual(["test.json"]);
      expect(await readDocument(filePath)).toBe("second");
    });

    it("should create parent directories", async () => {
      const filePath = join(testDir, "a", "b", "c.json");
      await atomicWrite(filePath, "x");
      expect(await readDocument(filePath)).toBe("x");
    });

    it("should read a missing file as null", async () => {
      expect(await readDocument(join(testDir, "missing.json"))).toBeNull();
    });
  });

  describe("atomicCreate", () => {
    it("should create a new file", async () => {
      const filePath = join(testDir, "new.json");
      await atomicCreate(filePath, "content");

      expect(await readDocument(filePath)).toBe("content");
      expect(await readdir(testDir)).toEqual(["new.json"]);
    });

    it("should refuse to overwrite and keep the original", async () => {
      const filePath = join(testDir, "new.json");
      await atomicCreate(filePath, "first");

      await expect(atomicCreate(filePath, "second")).rejects.toThrow(FileExistsError);
      expect(await readDocument(filePath)).toBe("first");
      expect(await readdir(testDir)).toEqual(["new.json"]);
    });

    it("should let exactly one concurrent creator win", async () => {
      const filePath = join(testDir, "race.json");
      const results = await Promise.allSettled(
        Array.from({ length: 8 }, (_, i) => atomicCreate(filePath, String(i)))
      );

      expect(results.filter((r) => r.status === "fulfilled")).toHaveLength(1);
      expect(await readdir(testDir)).toEqual(["race.json"]);
    });
  });

  describe("removeDocument", () => {
    it("should report whether a file was removed", async () => {
      const filePath = join(testDir, "doc.json");
      await atomicWrite(filePath, "x");

      expect(await removeDocument(filePath)).toBe(true);
      expect(await removeDocument(filePath)).toBe(false);
    });

    it("should throw for a directory", async () => {
      const dirPath = join(testDir, "dir");
      await mkdir(dirPath);
      await expect(removeDocument(dirPath)).rejects.toThrow(DocumentRemoveError);
    });
  });

  describe("listFiles and listDirectories", () => {
    it("should list sorted files, skipping dotfiles and directories", async () => {
      await writeFile(join(testDir, "b.json"), "{}");
      await writeFile(join(testDir, "a.json"), "{}");
      await writeFile(join(testDir, "notes.txt"), "");
      await writeFile(join(testDir, ".a.json.123.tmp"), "");
      await mkdir(join(testDir, "sub"));

      expect(await listFiles(testDir)).toEqual(["a.json", "b.json", "notes.txt"]);
      expect(await listFiles(testDir, "json")).toEqual(["a.json", "b.json"]);
      expect(await listDirectories(testDir)).toEqual(["sub"]);
    });

    it("should return empty arrays for missing directories", async () => {
      expect(await listFiles(join(testDir, "missing"))).toEqual([]);
      expect(await listDirectories(join(testDir, "missing"))).toEqual([]);
    });
  });

  describe("ensureDirectory and isDirectory", () => {
    it("should create nested directories", async () => {
      const dirPath = join(testDir, "x", "y");
      await ensureDirectory(dirPath);
      expect(await isDirectory(dirPath)).toBe(true);
    });

    it("should reject an empty path", async () => {
      await expect(ensureDirectory("")).rejects.toThrow(DirectoryError);
    });

    it("should report files and missing paths as non-directories", async () => {
      const filePath = join(testDir, "file");
      await writeFile(filePath, "");
      expect(await isDirectory(filePath)).toBe(false);
      expect(await isDirectory(join(testDir, "missing"))).toBe(false);
      expect(await isDirectory(join(filePath, "child"))).toBe(false);
    });
  });

  describe("errnoCode", () => {
    it("should extract string codes only", () => {
      expect(errnoCode(Object.assign(new Error("x"), { code: "ENOENT" }))).toBe("ENOENT");
      expect(errnoCode({ code: 5 })).toBeUndefined();
      expect(errnoCode("ENOENT")).toBeUndefined();
    });
  });
});
