/**
 * File system test utilities
 */

import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { FileBlobStore } from "@blobrepo/sdk";

/**
 * Create a unique temporary directory for testing
 * @param prefix - Prefix for the temp directory (default: "blobrepo-test-")
 * @returns Absolute path to temp directory
 */
export async function createTempRoot(prefix = "blobrepo-test-"): Promise<string> {
  return await mkdtemp(join(tmpdir(), prefix));
}

/**
 * Remove a directory recursively
 */
export async function removeDir(path: string): Promise<void> {
  await rm(path, { recursive: true, force: true });
}

/**
 * Execute a function with a clean temp directory
 */
export async function withTempDir<T>(fn: (dir: string) => Promise<T>): Promise<T> {
  const dir = await createTempRoot();
  try {
    return await fn(dir);
  } finally {
    await removeDir(dir);
  }
}

/**
 * Execute a function with a file blob store rooted in a temp directory
 */
export async function withTempFileStore<T>(
  fn: (store: FileBlobStore, root: string) => Promise<T>
): Promise<T> {
  return withTempDir((root) => fn(new FileBlobStore(root), root));
}
