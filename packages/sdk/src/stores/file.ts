/**
 * File-backed blob store: one UTF-8 file per blob under a root directory
 *
 * Invariants:
 * - Writes are atomic (see io.ts)
 * - No operation throws: failures are logged and reported as false / ""
 * - Blob names that are not safe file names are rejected before touching disk
 */

import * as path from "node:path";
import type { BlobStore } from "../types.js";
import { atomicWrite, readBlobFile, removeBlobFile } from "../io.js";
import { validateBlobName } from "../validation.js";
import { resolveStoreRoot } from "../config.js";
import { logger } from "../observability/logs.js";

export interface FileBlobStoreOptions {
  /** Root directory (default: BLOBREPO_ROOT or "./data") */
  root?: string;
}

function messageOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * BlobStore over a directory of files
 *
 * @example
 * ```typescript
 * const store = openFileBlobStore({ root: "./data" });
 * await store.create("User_id_1", '{"id":1,"name":"Alice"}');
 * ```
 */
export class FileBlobStore implements BlobStore {
  readonly root: string;

  constructor(root: string) {
    this.root = path.resolve(root);
  }

  /**
   * File path for a blob, or null (logged) when the name is unsafe
   */
  #pathFor(name: string, op: string): string | null {
    try {
      validateBlobName(name);
    } catch (err) {
      logger.warn("blob.name.invalid", { blob: name, message: messageOf(err), details: { op } });
      return null;
    }
    return path.join(this.root, name);
  }

  async create(name: string, content: string): Promise<boolean> {
    const filePath = this.#pathFor(name, "create");
    if (!filePath) return false;

    try {
      await atomicWrite(filePath, content);
      return true;
    } catch (err) {
      logger.warn("blob.write.failed", { blob: name, message: messageOf(err) });
      return false;
    }
  }

  async read(name: string): Promise<string> {
    const filePath = this.#pathFor(name, "read");
    if (!filePath) return "";

    try {
      return (await readBlobFile(filePath)) ?? "";
    } catch (err) {
      logger.warn("blob.read.failed", { blob: name, message: messageOf(err) });
      return "";
    }
  }

  async update(name: string, content: string): Promise<boolean> {
    return this.create(name, content);
  }

  async delete(name: string): Promise<boolean> {
    const filePath = this.#pathFor(name, "delete");
    if (!filePath) return false;

    try {
      return await removeBlobFile(filePath);
    } catch (err) {
      logger.warn("blob.delete.failed", { blob: name, message: messageOf(err) });
      return false;
    }
  }

  async append(name: string, content: string): Promise<boolean> {
    const filePath = this.#pathFor(name, "append");
    if (!filePath) return false;

    try {
      const existing = (await readBlobFile(filePath)) ?? "";
      await atomicWrite(filePath, existing + content);
      return true;
    } catch (err) {
      logger.warn("blob.append.failed", { blob: name, message: messageOf(err) });
      return false;
    }
  }
}

/**
 * Open a file blob store, resolving the root from options or environment
 */
export function openFileBlobStore(options: FileBlobStoreOptions = {}): FileBlobStore {
  return new FileBlobStore(resolveStoreRoot(options.root));
}
