/**
 * Entity repository over a blob store
 *
 * Each entity lives in its own blob, `<table>_<primaryKeyName>_<id>`, and each
 * table keeps an ID index blob, `<table>_IDs`, listing one ID per line so that
 * findAll never has to enumerate the store.
 *
 * Invariants:
 * - save/update write at most one entity blob and append at most once to the index
 * - The index never gains an ID it already lists
 * - Index read-modify-write runs under the table's lock
 * - Nothing is cached: every call re-reads the store
 */

import type { BlobStore, EntityDescriptor, Repository, RepositoryOptions } from "./types.js";
import { entityBlobName, indexBlobName } from "./blob-name.js";
import {
  containsId,
  formatIdIndex,
  indexAppendText,
  isIndexableId,
  parseIdIndex,
  uniqueIds,
} from "./id-index.js";
import { validateEntityDescriptor } from "./entity.js";
import { resolveRepositoryOptions, type ResolvedRepositoryOptions } from "./config.js";
import {
  BlobWriteError,
  EntityDecodeError,
  IndexWriteError,
  InvalidIdError,
  MissingPrimaryKeyError,
} from "./errors.js";
import { logger } from "./observability/logs.js";

type KeyedOperation = "save" | "update" | "delete";

/**
 * Repository storing entities of one type in a shared blob store
 *
 * @example
 * ```typescript
 * const store = new MemoryBlobStore();
 * const users = createRepository(store, userEntity);
 *
 * await users.save({ id: 1, name: "Alice" });
 * await users.save({ id: 2, name: "Bob" });
 * await users.findAll(); // [Alice, Bob]
 *
 * await users.deleteById(1);
 * await users.existsById(1); // false
 * ```
 */
export class BlobRepository<E, ID> implements Repository<E, ID> {
  #store: BlobStore;
  #entity: EntityDescriptor<E, ID>;
  #options: ResolvedRepositoryOptions;
  #indexBlob: string;

  constructor(store: BlobStore, entity: EntityDescriptor<E, ID>, options?: RepositoryOptions) {
    validateEntityDescriptor(entity);
    this.#store = store;
    this.#entity = entity;
    this.#options = resolveRepositoryOptions(options);
    this.#indexBlob = indexBlobName(entity.tableName);
  }

  get tableName(): string {
    return this.#entity.tableName;
  }

  get indexBlob(): string {
    return this.#indexBlob;
  }

  /**
   * Blob name holding the entity with this ID
   */
  blobNameFor(id: ID): string {
    return entityBlobName(
      this.#entity.tableName,
      this.#entity.primaryKeyName,
      this.#entity.ids.format(id)
    );
  }

  /**
   * Create or overwrite the entity's blob and index its ID
   *
   * Entities without a primary key are returned untouched without any I/O
   * (or rejected, under `missingKey: "throw"`).
   *
   * @returns The same entity instance
   * @throws {InvalidIdError} If the ID cannot be listed in the index
   * @throws {BlobWriteError} If the store fails to write the entity blob
   * @throws {IndexWriteError} If the store fails to append to the index
   */
  async save(entity: E): Promise<E> {
    const id = this.#requireKey(entity, "save");
    if (id === undefined) return entity;

    this.#requireIndexable(id);
    const blob = this.blobNameFor(id);
    const ok = await this.#store.create(blob, this.#entity.serialize(entity));
    if (!ok) {
      throw new BlobWriteError(blob);
    }
    logger.debug("repo.save", { table: this.tableName, blob });

    await this.#indexId(id);
    return entity;
  }

  /**
   * Save each entity in order
   */
  async saveAll(entities: Iterable<E>): Promise<E[]> {
    const saved: E[] = [];
    for (const entity of entities) {
      saved.push(await this.save(entity));
    }
    return saved;
  }

  /**
   * Load one entity
   * @returns The entity, or undefined when its blob is missing or empty
   * @throws {EntityDecodeError} If the blob content cannot be deserialized
   */
  async findById(id: ID): Promise<E | undefined> {
    const blob = this.blobNameFor(id);
    const content = await this.#store.read(blob);
    if (content.length === 0) {
      return undefined;
    }
    return this.#decode(blob, content);
  }

  /**
   * Load every indexed entity, in index order
   *
   * IDs whose blob is missing are skipped.
   */
  async findAll(): Promise<E[]> {
    const ids = await this.findAllIds();
    const entities: E[] = [];

    for (const id of ids) {
      const blob = this.blobNameFor(id);
      const content = await this.#store.read(blob);
      if (content.length === 0) {
        logger.debug("repo.findAll.drift", {
          table: this.tableName,
          blob,
          message: "indexed ID has no entity blob",
        });
        continue;
      }
      entities.push(this.#decode(blob, content));
    }

    return entities;
  }

  /**
   * Load the given IDs in order, skipping those not found
   */
  async findAllById(ids: Iterable<ID>): Promise<E[]> {
    const entities: E[] = [];
    for (const id of ids) {
      const entity = await this.findById(id);
      if (entity !== undefined) {
        entities.push(entity);
      }
    }
    return entities;
  }

  /**
   * IDs listed in the table's index, de-duplicated, in index order
   */
  async findAllIds(): Promise<ID[]> {
    return uniqueIds(await this.#readIndex(), this.#entity.ids);
  }

  /**
   * Number of distinct IDs in the index. IDs whose blob was removed outside
   * the repository still count, so this can exceed `findAll().length`.
   */
  async count(): Promise<number> {
    return (await this.findAllIds()).length;
  }

  /**
   * Overwrite the entity's blob, indexing its ID if the index lacks it
   *
   * @returns The same entity instance
   * @throws {InvalidIdError} If the ID cannot be listed in the index
   * @throws {BlobWriteError} If the store fails to write the entity blob
   * @throws {IndexWriteError} If the store fails to append to the index
   */
  async update(entity: E): Promise<E> {
    const id = this.#requireKey(entity, "update");
    if (id === undefined) return entity;

    this.#requireIndexable(id);
    const blob = this.blobNameFor(id);
    const ok = await this.#store.update(blob, this.#entity.serialize(entity));
    if (!ok) {
      throw new BlobWriteError(blob);
    }
    logger.debug("repo.update", { table: this.tableName, blob });

    await this.#indexId(id);
    return entity;
  }

  /**
   * Remove the entity blob and drop the ID from the index
   *
   * The index is rewritten whenever it lists the ID, even when no blob
   * existed, so stale index entries are cleared too. An index that does not
   * list the ID is left untouched.
   *
   * @returns Whether an entity blob was removed
   * @throws {InvalidIdError} If the ID cannot be listed in the index
   * @throws {IndexWriteError} If the store fails to rewrite the index
   */
  async deleteById(id: ID): Promise<boolean> {
    this.#requireIndexable(id);
    const blob = this.blobNameFor(id);
    const removed = await this.#store.delete(blob);
    logger.debug("repo.delete", { table: this.tableName, blob, details: { removed } });

    const codec = this.#entity.ids;
    const target = codec.format(id);

    await this.#options.locks.withTable(this.tableName, async () => {
      const listed = await this.#readIndex();
      const remaining = listed.filter((other) => codec.format(other) !== target);
      if (remaining.length !== listed.length) {
        await this.#writeIndex(remaining);
      }
    });

    return removed;
  }

  /**
   * Delete by the entity's primary key
   * @returns Whether an entity blob was removed (false for a keyless entity)
   */
  async delete(entity: E): Promise<boolean> {
    const id = this.#requireKey(entity, "delete");
    if (id === undefined) return false;
    return this.deleteById(id);
  }

  /**
   * Delete every indexed entity and empty the index
   * @returns Number of entity blobs actually removed
   */
  async deleteAll(): Promise<number> {
    return this.#options.locks.withTable(this.tableName, async () => {
      let removed = 0;
      for (const id of uniqueIds(await this.#readIndex(), this.#entity.ids)) {
        if (await this.#store.delete(this.blobNameFor(id))) {
          removed++;
        }
      }
      await this.#writeIndex([]);
      return removed;
    });
  }

  /**
   * True when the entity blob has content. The index is not consulted.
   */
  async existsById(id: ID): Promise<boolean> {
    const content = await this.#store.read(this.blobNameFor(id));
    return content.length > 0;
  }

  /**
   * Primary key of the entity, applying the missing-key policy
   */
  #requireKey(entity: E, operation: KeyedOperation): ID | undefined {
    const id = this.#entity.primaryKeyOf(entity);
    if (id !== undefined) return id;

    if (this.#options.missingKey === "throw") {
      throw new MissingPrimaryKeyError(this.tableName, operation);
    }
    logger.warn("repo.no_key", {
      table: this.tableName,
      message: `${operation} skipped: entity has no primary key`,
    });
    return undefined;
  }

  #requireIndexable(id: ID): void {
    if (!isIndexableId(id, this.#entity.ids)) {
      throw new InvalidIdError(this.tableName, this.#entity.ids.format(id));
    }
  }

    #decode(blob: string, content: string): E {
    try {
      return this.#entity.deserialize(content);
    } catch (err) {
      const issues = err instanceof EntityDecodeError ? err.issues : [];
      throw new EntityDecodeError(blob, issues, { cause: err });
    }
  }

  async #readIndex(): Promise<ID[]> {
    const content = await this.#store.read(this.#indexBlob);
    return parseIdIndex(content, this.#entity.ids, (token) => {
      logger.warn("repo.index.bad_token", {
        table: this.tableName,
        blob: this.#indexBlob,
        message: `skipping unparseable index line: ${JSON.stringify(token)}`,
      });
    });
  }

  /**
   * Append the ID to the index unless already listed
   */
  async #indexId(id: ID): Promise<void> {
    await this.#options.locks.withTable(this.tableName, async () => {
      const content = await this.#store.read(this.#indexBlob);
      const listed = parseIdIndex(content, this.#entity.ids);
      if (containsId(listed, id, this.#entity.ids)) {
        return;
      }

      const text = indexAppendText(content, this.#entity.ids.format(id));
      const ok = await this.#store.append(this.#indexBlob, text);
      if (!ok) {
        throw new IndexWriteError(this.#indexBlob);
      }
      logger.debug("repo.index.append", { table: this.tableName, blob: this.#indexBlob });
    });
  }

  async #writeIndex(ids: readonly ID[]): Promise<void> {
    const ok = await this.#store.update(this.#indexBlob, formatIdIndex(ids, this.#entity.ids));
    if (!ok) {
      throw new IndexWriteError(this.#indexBlob);
    }
    logger.debug("repo.index.rewrite", {
      table: this.tableName,
      blob: this.#indexBlob,
      details: { ids: ids.length },
    });
  }
}

/**
 * Create a repository for one entity type over a shared store
 */
export function createRepository<E, ID>(
  store: BlobStore,
  entity: EntityDescriptor<E, ID>,
  options?: RepositoryOptions
): BlobRepository<E, ID> {
  return new BlobRepository(store, entity, options);
}
