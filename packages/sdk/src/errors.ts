/**
 * Error types for blob repository operations
 *
 * Invariants:
 * - Errors that concern a blob include the blob name in the message
 * - All errors support a `cause` property for wrapping underlying errors
 * - All errors have stable `name` and `code` fields for programmatic handling
 */

/**
 * Base class for all blob repository errors
 */
export abstract class BlobRepositoryError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown by save/update/delete when the entity has no primary key
 * and the repository runs with `missingKey: "throw"`
 */
export class MissingPrimaryKeyError extends BlobRepositoryError {
  readonly code = "E_NO_KEY";

  constructor(
    public readonly table: string,
    public readonly operation: string,
    options?: ErrorOptions
  ) {
    super(`Cannot ${operation} ${table} entity without a primary key`, options);
  }
}

/**
 * Thrown when the store reports failure writing an entity blob
 */
export class BlobWriteError extends BlobRepositoryError {
  readonly code = "WRITE_ERROR";

  constructor(
    public readonly blob: string,
    options?: ErrorOptions
  ) {
    super(`Failed to write blob: ${blob}`, options);
  }
}

/**
 * Thrown when the store reports failure appending to or rewriting an ID index
 */
export class IndexWriteError extends BlobRepositoryError {
  readonly code = "INDEX_WRITE_ERROR";

  constructor(
    public readonly blob: string,
    options?: ErrorOptions
  ) {
    super(`Failed to write ID index: ${blob}`, options);
  }
}

/**
 * A single problem found while decoding an entity
 */
export interface DecodeIssue {
  /** JSON Pointer to the failing field ("" for the whole record) */
  pointer: string;
  /** Human-readable message, already naming the field */
  message: string;
  keyword?: string;
}

/**
 * Thrown when blob content cannot be turned back into an entity
 */
export class EntityDecodeError extends BlobRepositoryError {
  readonly code = "DECODE_ERROR";

  constructor(
    public readonly source: string,
    public readonly issues: DecodeIssue[] = [],
    options?: ErrorOptions
  ) {
    super(`Failed to decode entity from ${source}${describeIssues(issues)}`, options);
  }
}

function describeIssues(issues: DecodeIssue[]): string {
  if (issues.length === 0) return "";
  return `: ${issues.map((issue) => issue.message).join("; ")}`;
}

/**
 * Thrown by save/update/delete when an ID's text form would not read back
 * from the ID index as the same ID
 */
export class InvalidIdError extends BlobRepositoryError {
  readonly code = "E_INVALID_ID";

  constructor(
    public readonly table: string,
    public readonly idText: string,
    options?: ErrorOptions
  ) {
    super(
      `Invalid ${table} ID ${JSON.stringify(idText)}: not representable in the ID index`,
      options
    );
  }
}

/**
 * Thrown when an entity type does not satisfy the descriptor contract
 */
export class InvalidEntityTypeError extends BlobRepositoryError {
  readonly code = "E_ENTITY_TYPE";

  constructor(reason: string, options?: ErrorOptions) {
    super(`Invalid entity type: ${reason}`, options);
  }
}

/**
 * Thrown when a blob name cannot be mapped onto a file
 */
export class InvalidBlobNameError extends BlobRepositoryError {
  readonly code = "E_BLOB_NAME";

  constructor(name: string, reason: string, options?: ErrorOptions) {
    super(`Invalid blob name "${name}": ${reason}`, options);
  }
}

/**
 * Thrown by file I/O when a blob file cannot be read
 */
export class BlobReadError extends BlobRepositoryError {
  readonly code = "READ_ERROR";

  constructor(filePath: string, options?: ErrorOptions) {
    super(`Failed to read blob file: ${filePath}`, options);
  }
}

/**
 * Thrown by file I/O when a blob file cannot be written
 */
export class BlobFileWriteError extends BlobRepositoryError {
  readonly code = "FILE_WRITE_ERROR";

  constructor(filePath: string, options?: ErrorOptions) {
    super(`Failed to write blob file: ${filePath}`, options);
  }
}

/**
 * Thrown by file I/O when a blob file cannot be removed
 */
export class BlobRemoveError extends BlobRepositoryError {
  readonly code = "REMOVE_ERROR";

  constructor(filePath: string, options?: ErrorOptions) {
    super(`Failed to remove blob file: ${filePath}`, options);
  }
}

/**
 * Thrown when a directory operation fails
 */
export class DirectoryError extends BlobRepositoryError {
  readonly code = "DIRECTORY_ERROR";

  constructor(dirPath: string, options?: ErrorOptions) {
    super(`Directory operation failed: ${dirPath}`, options);
  }
}
