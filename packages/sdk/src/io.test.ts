import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, readFile, readdir, mkdir, writeFile, stat } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { atomicWrite, readBlobFile, removeBlobFile, ensureDirectory, errorCode } from "./io.js";
import { BlobFileWriteError, BlobReadError, BlobRemoveError, DirectoryError } from "./errors.js";

describe("io", () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), "blobrepo-io-test-"));
  });

  afterEach(async () => {
    try {
      await rm(testDir, { recursive: true, force: true });
    } catch {
      // Ignore cleanup errors
    }
  });

  describe("atomicWrite", () => {
    it("should write content that reads back unchanged", async () => {
      const filePath = join(testDir, "User_id_1");
      await atomicWrite(filePath, "1:Alice");

      expect(await readFile(filePath, "utf-8")).toBe("1:Alice");
    });

    it("should not leave temp files behind", async () => {
      await atomicWrite(join(testDir, "User_IDs"), "1\n");

      expect(await readdir(testDir)).toEqual(["User_IDs"]);
    });

    it("should overwrite existing content", async () => {
      const filePath = join(testDir, "User_IDs");
      await atomicWrite(filePath, "1\n");
      await atomicWrite(filePath, "1\n2\n");

      expect(await readFile(filePath, "utf-8")).toBe("1\n2\n");
    });

    it("should leave one complete version after concurrent writes", async () => {
      const filePath = join(testDir, "User_IDs");
      const contents = ["a\n", "b\n", "c\n", "d\n", "e\n"];

      await Promise.all(contents.map((content) => atomicWrite(filePath, content)));

      expect(contents).toContain(await readFile(filePath, "utf-8"));
      expect(await readdir(testDir)).toEqual(["User_IDs"]);
    });

    it("should create missing parent directories", async () => {
      const filePath = join(testDir, "nested", "deeper", "User_id_1");
      await atomicWrite(filePath, "x");

      expect(await readFile(filePath, "utf-8")).toBe("x");
    });

    it("should wrap failures in BlobFileWriteError naming the target", async () => {
      const filePath = join(testDir, "occupied");
      await mkdir(filePath);

      const failure = atomicWrite(filePath, "x");
      await expect(failure).rejects.toBeInstanceOf(BlobFileWriteError);
      await expect(failure).rejects.toMatchObject({
        code: "FILE_WRITE_ERROR",
        message: `Failed to write blob file: ${filePath}`,
      });

      const leftovers = (await readdir(testDir)).filter((f) => f.endsWith(".tmp"));
      expect(leftovers).toEqual([]);
    });
  });

  describe("readBlobFile", () => {
    it("should return file contents", async () => {
      const filePath = join(testDir, "User_id_1");
      await writeFile(filePath, "1:Alice");

      expect(await readBlobFile(filePath)).toBe("1:Alice");
    });

    it("should return null when the file is missing", async () => {
      expect(await readBlobFile(join(testDir, "missing"))).toBeNull();
    });

    it("should throw BlobReadError for other failures", async () => {
      const dirPath = join(testDir, "is-a-directory");
      await mkdir(dirPath);

      const failure = readBlobFile(dirPath);
      await expect(failure).rejects.toBeInstanceOf(BlobReadError);
      await expect(failure).rejects.toMatchObject({
        code: "READ_ERROR",
        cause: { code: "EISDIR" },
      });
    });
  });

  describe("removeBlobFile", () => {
    it("should report whether a file was removed", async () => {
      const filePath = join(testDir, "User_id_1");
      await writeFile(filePath, "x");

      expect(await removeBlobFile(filePath)).toBe(true);
      expect(await removeBlobFile(filePath)).toBe(false);
    });

    it("should throw BlobRemoveError when the path cannot be unlinked", async () => {
      const dirPath = join(testDir, "is-a-directory");
      await mkdir(dirPath);

      await expect(removeBlobFile(dirPath)).rejects.toBeInstanceOf(BlobRemoveError);
    });
  });

  describe("ensureDirectory", () => {
    it("should create nested directories", async () => {
      const dirPath = join(testDir, "a", "b", "c");
      await ensureDirectory(dirPath);

      expect((await stat(dirPath)).isDirectory()).toBe(true);
    });

    it("should accept an existing directory", async () => {
      await ensureDirectory(testDir);
      await expect(ensureDirectory(testDir)).resolves.toBeUndefined();
    });

    it("should reject an empty path", async () => {
      const failure = ensureDirectory("");
      await expect(failure).rejects.toBeInstanceOf(DirectoryError);
      await expect(failure).rejects.toMatchObject({ cause: expect.any(TypeError) });
    });

    it("should reject a path that is a regular file", async () => {
      const filePath = join(testDir, "regular-file");
      await writeFile(filePath, "x");

      await expect(ensureDirectory(filePath)).rejects.toBeInstanceOf(DirectoryError);
    });
  });

  describe("errorCode", () => {
    it("should read the code of system errors", () => {
      const err = Object.assign(new Error("gone"), { code: "ENOENT" });
      expect(errorCode(err)).toBe("ENOENT");
    });

    it("should ignore values without a string code", () => {
      expect(errorCode(new Error("plain"))).toBeUndefined();
      expect(errorCode("ENOENT")).toBeUndefined();
      expect(errorCode(Object.assign(new Error("odd"), { code: 42 }))).toBeUndefined();
    });
  });
});
