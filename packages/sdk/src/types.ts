/**
 * Core types for the blob repository
 */

import type { TableLocks } from "./lock.js";

/**
 * Named-blob storage capability the repository is built on.
 *
 * Implementations report failure through the returned flag rather than by
 * throwing. The store is shared: repositories never close or own it.
 */
export interface BlobStore {
  /** Write `content` under `name`, replacing any existing blob */
  create(name: string, content: string): Promise<boolean>;
  /** Blob content, or "" when the blob is absent or unreadable */
  read(name: string): Promise<string>;
  /** Same as create: full overwrite */
  update(name: string, content: string): Promise<boolean>;
  /** Remove the blob; true only when a blob was actually removed */
  delete(name: string): Promise<boolean>;
  /** Concatenate `content` onto the blob, creating it when absent */
  append(name: string, content: string): Promise<boolean>;
}

/**
 * Textual form of primary keys, used in blob names and index lines
 */
export interface IdCodec<ID> {
  format(id: ID): string;
  /** Parse one index token; undefined when the token is not a valid ID */
  parse(token: string): ID | undefined;
}

/**
 * Type-level contract the repository needs from an entity type
 *
 * @example
 * ```typescript
 * const users: EntityDescriptor<User, number> = {
 *   tableName: "User",
 *   primaryKeyName: "id",
 *   ids: integerIds,
 *   primaryKeyOf: (u) => u.id,
 *   serialize: (u) => `${u.id}|${u.name}`,
 *   deserialize: (text) => { const [id, name] = text.split("|"); return { id: Number(id), name }; },
 * };
 * ```
 */
export interface EntityDescriptor<E, ID> {
  readonly tableName: string;
  readonly primaryKeyName: string;
  readonly ids: IdCodec<ID>;
  primaryKeyOf(entity: E): ID | undefined;
  serialize(entity: E): string;
  deserialize(content: string): E;
}

/**
 * What to do when save/update/delete receives an entity without a primary key
 * - "ignore": no I/O, the entity is returned unchanged (a warning is logged)
 * - "throw": reject with MissingPrimaryKeyError
 */
export type MissingKeyPolicy = "ignore" | "throw";

export interface RepositoryOptions {
  /** Missing primary key handling (default: BLOBREPO_MISSING_KEY or "ignore") */
  missingKey?: MissingKeyPolicy;
  /**
   * Per-table locks guarding index read-modify-write. Pass the same instance
   * to every repository sharing a store to serialize their index updates.
   * Default: a fresh instance per repository.
   */
  locks?: TableLocks;
}

/**
 * CRUD contract over entities addressed by primary key
 */
export interface Repository<E, ID> {
  save(entity: E): Promise<E>;
  saveAll(entities: Iterable<E>): Promise<E[]>;
  findById(id: ID): Promise<E | undefined>;
  findAll(): Promise<E[]>;
  findAllById(ids: Iterable<ID>): Promise<E[]>;
  findAllIds(): Promise<ID[]>;
  count(): Promise<number>;
  update(entity: E): Promise<E>;
  deleteById(id: ID): Promise<boolean>;
  delete(entity: E): Promise<boolean>;
  deleteAll(): Promise<number>;
  existsById(id: ID): Promise<boolean>;
}
