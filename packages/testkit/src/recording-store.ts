/**
 * Blob store wrapper that records calls and injects failures
 */

import { MemoryBlobStore } from "@blobrepo/sdk";
import type { BlobStore } from "@blobrepo/sdk";

export type BlobOperation = "create" | "read" | "update" | "delete" | "append";

export interface BlobCall {
  op: BlobOperation;
  name: string;
  /** Content passed to create/update/append */
  content?: string;
}

const WRITE_OPS: ReadonlySet<BlobOperation> = new Set(["create", "update", "delete", "append"]);

/**
 * Records every call made to the wrapped store.
 * Operations registered with failWhen() report failure without reaching the inner store.
 *
 * @example
 * ```typescript
 * const store = new RecordingBlobStore();
 * store.failWhen("append", "User_IDs");
 * ```
 */
export class RecordingBlobStore implements BlobStore {
  readonly inner: BlobStore;
  readonly calls: BlobCall[] = [];
  #failures: Array<{ op: BlobOperation; name?: string }> = [];

  constructor(inner: BlobStore = new MemoryBlobStore()) {
    this.inner = inner;
  }

  /**
   * Make matching operations fail (return false, or "" for reads)
   * @param name - Only fail for this blob (default: every blob)
   */
  failWhen(op: BlobOperation, name?: string): void {
    this.#failures.push({ op, name });
  }

  clearFailures(): void {
    this.#failures = [];
  }

  /**
   * Calls that write, i.e. everything except read
   */
  writes(): BlobCall[] {
    return this.calls.filter((call) => WRITE_OPS.has(call.op));
  }

  callsTo(op: BlobOperation): BlobCall[] {
    return this.calls.filter((call) => call.op === op);
  }

  reset(): void {
    this.calls.length = 0;
  }

  async create(name: string, content: string): Promise<boolean> {
    this.calls.push({ op: "create", name, content });
    return this.#fails("create", name) ? false : this.inner.create(name, content);
  }

  async read(name: string): Promise<string> {
    this.calls.push({ op: "read", name });
    return this.#fails("read", name) ? "" : this.inner.read(name);
  }

  async update(name: string, content: string): Promise<boolean> {
    this.calls.push({ op: "update", name, content });
    return this.#fails("update", name) ? false : this.inner.update(name, content);
  }

  async delete(name: string): Promise<boolean> {
    this.calls.push({ op: "delete", name });
    return this.#fails("delete", name) ? false : this.inner.delete(name);
  }

  async append(name: string, content: string): Promise<boolean> {
    this.calls.push({ op: "append", name, content });
    return this.#fails("append", name) ? false : this.inner.append(name, content);
  }

  #fails(op: BlobOperation, name: string): boolean {
    return this.#failures.some((f) => f.op === op && (f.name === undefined || f.name === name));
  }
}
