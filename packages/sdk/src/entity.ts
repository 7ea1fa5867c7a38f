/**
 * Class-based entities and descriptor validation
 */

import type { EntityDescriptor, IdCodec } from "./types.js";
import { InvalidEntityTypeError } from "./errors.js";
import { integerIds } from "./id-index.js";

/**
 * Instance side of a class-based entity
 */
export interface Entity<ID> {
  getPrimaryKey(): ID | undefined;
  serialize(): string;
}

/**
 * Static side of a class-based entity
 *
 * @example
 * ```typescript
 * class User implements Entity<number> {
 *   static readonly tableName = "User";
 *   static readonly primaryKeyName = "id";
 *   constructor(readonly id: number | undefined, readonly name: string) {}
 *   getPrimaryKey() { return this.id; }
 *   serialize() { return JSON.stringify({ id: this.id, name: this.name }); }
 *   static deserialize(content: string): User { ... }
 * }
 * const users = createRepository(store, describeEntityClass(User));
 * ```
 */
export interface EntityClass<E extends Entity<ID>, ID> {
  readonly tableName: string;
  readonly primaryKeyName: string;
  /** ID codec (default: integerIds) */
  readonly ids?: IdCodec<ID>;
  deserialize(content: string): E;
}

/**
 * Check the naming half of the descriptor contract
 * @throws InvalidEntityTypeError if the table or key name is unusable
 */
export function validateEntityDescriptor<E, ID>(entity: EntityDescriptor<E, ID>): void {
  if (typeof entity.tableName !== "string" || entity.tableName.length === 0) {
    throw new InvalidEntityTypeError("tableName must be a non-empty string");
  }
  if (typeof entity.primaryKeyName !== "string" || entity.primaryKeyName.length === 0) {
    throw new InvalidEntityTypeError(
      `primaryKeyName of ${entity.tableName} must be a non-empty string`
    );
  }
}

/**
 * Adapt an entity class into a descriptor
 */
export function describeEntityClass<E extends Entity<number>>(
  cls: EntityClass<E, number>
): EntityDescriptor<E, number>;
export function describeEntityClass<E extends Entity<ID>, ID>(
  cls: EntityClass<E, ID> & { readonly ids: IdCodec<ID> }
): EntityDescriptor<E, ID>;
export function describeEntityClass<E extends Entity<ID>, ID>(
  cls: EntityClass<E, ID>,
  defaultIds: IdCodec<ID>
): EntityDescriptor<E, ID>;
export function describeEntityClass<E extends Entity<unknown>>(
  cls: EntityClass<E, unknown>,
  defaultIds?: IdCodec<unknown>
): EntityDescriptor<E, unknown> {
  const descriptor: EntityDescriptor<E, unknown> = {
    tableName: cls.tableName,
    primaryKeyName: cls.primaryKeyName,
    ids: cls.ids ?? defaultIds ?? integerIds,
    primaryKeyOf: (entity) => entity.getPrimaryKey(),
    serialize: (entity) => entity.serialize(),
    deserialize: (content) => cls.deserialize(content),
  };
  validateEntityDescriptor(descriptor);
  return descriptor;
}
