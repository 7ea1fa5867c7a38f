/**
 * Blob Repository SDK
 *
 * Generic entity CRUD over a pluggable blob store, with a per-table ID index
 */

// Re-export types
export type {
  BlobStore,
  IdCodec,
  EntityDescriptor,
  MissingKeyPolicy,
  RepositoryOptions,
  Repository,
} from "./types.js";

// Repository
export { BlobRepository, createRepository } from "./repository.js";

// Entity contracts and helpers
export type { Entity, EntityClass } from "./entity.js";
export { describeEntityClass, validateEntityDescriptor } from "./entity.js";
export type { JsonEntityOptions } from "./json-entity.js";
export { jsonEntity, toDecodeIssues } from "./json-entity.js";

// Naming and index codec
export { entityBlobName, indexBlobName } from "./blob-name.js";
export {
  integerIds,
  stringIds,
  tokenizeIdIndex,
  parseIdIndex,
  formatIdIndex,
  indexAppendText,
  isIndexableId,
  containsId,
  uniqueIds,
} from "./id-index.js";

// Stores
export { MemoryBlobStore } from "./stores/memory.js";
export type { FileBlobStoreOptions } from "./stores/file.js";
export { FileBlobStore, openFileBlobStore } from "./stores/file.js";

// Utilities
export { stableStringify } from "./format.js";
export type { KeyOrder } from "./format.js";
export { validateBlobName } from "./validation.js";
export { Mutex, TableLocks } from "./lock.js";
export type { ResolvedRepositoryOptions } from "./config.js";
export { resolveStoreRoot, resolveRepositoryOptions } from "./config.js";

// Logging
export type { LogLevel, LogEntry } from "./observability/logs.js";
export { Logger, logger, formatEntry } from "./observability/logs.js";

// Errors
export type { DecodeIssue } from "./errors.js";
export {
  BlobRepositoryError,
  MissingPrimaryKeyError,
  BlobWriteError,
  IndexWriteError,
  EntityDecodeError,
  InvalidEntityTypeError,
  InvalidIdError,
  InvalidBlobNameError,
  BlobReadError,
  BlobFileWriteError,
  BlobRemoveError,
  DirectoryError,
} from "./errors.js";
