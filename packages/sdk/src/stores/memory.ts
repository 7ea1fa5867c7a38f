/**
 * In-memory blob store
 */

import type { BlobStore } from "../types.js";

/**
 * Map-backed BlobStore. Every operation succeeds except delete of an absent blob.
 *
 * @example
 * ```typescript
 * const store = new MemoryBlobStore();
 * const users = createRepository(store, userEntity);
 * ```
 */
export class MemoryBlobStore implements BlobStore {
  #blobs: Map<string, string>;

  constructor(seed?: Iterable<readonly [string, string]>) {
    this.#blobs = new Map(seed ?? []);
  }

  async create(name: string, content: string): Promise<boolean> {
    this.#blobs.set(name, content);
    return true;
  }

  async read(name: string): Promise<string> {
    return this.#blobs.get(name) ?? "";
  }

  async update(name: string, content: string): Promise<boolean> {
    return this.create(name, content);
  }

  async delete(name: string): Promise<boolean> {
    return this.#blobs.delete(name);
  }

  async append(name: string, content: string): Promise<boolean> {
    const existing = this.#blobs.get(name) ?? "";
    this.#blobs.set(name, existing + content);
    return true;
  }

  has(name: string): boolean {
    return this.#blobs.has(name);
  }

  /**
   * Sorted blob names
   */
  names(): string[] {
    return [...this.#blobs.keys()].sort();
  }

  get size(): number {
    return this.#blobs.size;
  }

  clear(): void {
    this.#blobs.clear();
  }
}
