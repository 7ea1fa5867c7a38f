import { describe, it, expect, beforeEach, afterEach, beforeAll, afterAll } from "vitest";
import { mkdtemp, rm, readdir, readFile, writeFile, mkdir } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { FileBlobStore, openFileBlobStore } from "./file.js";
import { logger } from "../observability/logs.js";

describe("FileBlobStore", () => {
  let testDir: string;
  let store: FileBlobStore;

  beforeAll(() => {
    logger.setEnabled(false);
  });

  afterAll(() => {
    logger.setEnabled(true);
  });

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), "blobrepo-test-"));
    store = new FileBlobStore(testDir);
  });

  afterEach(async () => {
    try {
      await rm(testDir, { recursive: true, force: true });
    } catch {
      // Ignore cleanup errors
    }
  });

  describe("create() and read()", () => {
    it("should store each blob as a file named after it", async () => {
      expect(await store.create("User_id_1", "1:Alice")).toBe(true);

      expect(await readFile(join(testDir, "User_id_1"), "utf-8")).toBe("1:Alice");
      expect(await store.read("User_id_1")).toBe("1:Alice");
    });

    it("should create the root directory on first write", async () => {
      const nested = new FileBlobStore(join(testDir, "nested", "root"));
      expect(await nested.create("a", "x")).toBe(true);
      expect(await nested.read("a")).toBe("x");
    });

    it("should not leave temp files behind", async () => {
      await store.create("a", "one");
      await store.create("a", "two");

      expect(await readdir(testDir)).toEqual(["a"]);
    });

    it("should read a missing blob as empty content", async () => {
      expect(await store.read("missing")).toBe("");
    });

    it("should read an unreadable blob as empty content", async () => {
      await mkdir(join(testDir, "dir_blob"));
      expect(await store.read("dir_blob")).toBe("");
    });
  });

  describe("update()", () => {
    it("should overwrite like create", async () => {
      await store.create("a", "one");
      expect(await store.update("a", "two")).toBe(true);
      expect(await store.read("a")).toBe("two");
    });
  });

  describe("delete()", () => {
    it("should report whether a file was removed", async () => {
      await store.create("a", "one");

      expect(await store.delete("a")).toBe(true);
      expect(await store.delete("a")).toBe(false);
      expect(await readdir(testDir)).toEqual([]);
    });

    it("should report false when the blob cannot be removed", async () => {
      await mkdir(join(testDir, "dir_blob"));
      expect(await store.delete("dir_blob")).toBe(false);
    });
  });

  describe("append()", () => {
    it("should concatenate onto existing content", async () => {
      await writeFile(join(testDir, "User_IDs"), "1\n");

      expect(await store.append("User_IDs", "2\n")).toBe(true);
      expect(await store.read("User_IDs")).toBe("1\n2\n");
    });

    it("should create the blob when missing", async () => {
      expect(await store.append("User_IDs", "1\n")).toBe(true);
      expect(await store.read("User_IDs")).toBe("1\n");
    });
  });

  describe("blob names", () => {
    it.each(["", "../escape", "a/b", ".hidden", "-dash", "trailing.", "con"])(
      "should refuse %j without touching disk",
      async (name) => {
        expect(await store.create(name, "x")).toBe(false);
        expect(await store.append(name, "x")).toBe(false);
        expect(await store.delete(name)).toBe(false);
        expect(await store.read(name)).toBe("");
        expect(await readdir(testDir)).toEqual([]);
      }
    );
  });

  describe("openFileBlobStore()", () => {
    const saved = process.env.BLOBREPO_ROOT;

    afterEach(() => {
      if (saved === undefined) {
        delete process.env.BLOBREPO_ROOT;
      } else {
        process.env.BLOBREPO_ROOT = saved;
      }
    });

    it("should prefer the explicit root", () => {
      process.env.BLOBREPO_ROOT = "/somewhere/else";
      expect(openFileBlobStore({ root: testDir }).root).toBe(testDir);
    });

    it("should fall back to BLOBREPO_ROOT", () => {
      process.env.BLOBREPO_ROOT = testDir;
      expect(openFileBlobStore().root).toBe(testDir);
    });
  });
});
