/**
 * JSON-serialized plain-object entities with optional JSON Schema validation
 *
 * Records are written as compact, key-ordered JSON so equal records always
 * produce identical blobs. When a schema is given, every decoded record is
 * checked with Ajv before it reaches the caller.
 */

import AjvModule from "ajv";
import type { ErrorObject, Schema, ValidateFunction } from "ajv";
import addFormatsModule from "ajv-formats";
import type { EntityDescriptor, IdCodec } from "./types.js";
import { EntityDecodeError, InvalidEntityTypeError, type DecodeIssue } from "./errors.js";
import { stableStringify, type KeyOrder } from "./format.js";
import { validateEntityDescriptor } from "./entity.js";

// Both packages are CommonJS; under ESM the default import is `module.exports`
const Ajv = AjvModule.default;
const addFormats = addFormatsModule.default;

export interface JsonEntityOptions<K extends string, ID> {
  /** Table name used in blob names */
  table: string;
  /** Record field holding the primary key */
  primaryKey: K;
  ids: IdCodec<ID>;
  /** JSON Schema every decoded record must satisfy */
  schema?: Schema;
  /** Key order for serialized records (default: primary key first, then alphabetical) */
  order?: KeyOrder;
}

/**
 * Convert Ajv errors into decode issues with JSON Pointer paths
 */
export function toDecodeIssues(errors: readonly ErrorObject[]): DecodeIssue[] {
  return errors.map((err) => {
    const base = err.instancePath;
    const missing: unknown = err.params["missingProperty"];

    // For required errors, point at the missing property itself
    const pointer =
      err.keyword === "required" && typeof missing === "string" ? `${base}/${missing}` : base;

    return { pointer, message: describeAjvError(err), keyword: err.keyword };
  });
}

function describeAjvError(err: ErrorObject): string {
  const path = err.instancePath || "record";
  const params: Record<string, unknown> = err.params;

  switch (err.keyword) {
    case "required":
      return `${path} is missing required property: ${String(params["missingProperty"])}`;
    case "type":
      return `${path} must be ${String(params["type"])}`;
    case "format":
      return `${path} must match format "${String(params["format"])}"`;
    case "additionalProperties":
      return `${path} has unexpected property: ${String(params["additionalProperty"])}`;
    case "minimum":
      return `${path} must be >= ${String(params["limit"])}`;
    case "maximum":
      return `${path} must be <= ${String(params["limit"])}`;
    case "minLength":
      return `${path} must be at least ${String(params["limit"])} characters`;
    case "maxLength":
      return `${path} must be at most ${String(params["limit"])} characters`;
    default:
      return err.message ?? `validation failed at ${path}`;
  }
}

function compileSchema<T>(table: string, schema: Schema): ValidateFunction<T> {
  const ajv = new Ajv({ allErrors: true, strict: true });
  addFormats(ajv);
  try {
    return ajv.compile<T>(schema);
  } catch (err) {
    throw new InvalidEntityTypeError(`schema for ${table} does not compile`, { cause: err });
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Build a descriptor for plain-object records stored as JSON
 *
 * @example
 * ```typescript
 * interface User { id?: number; name: string }
 *
 * const users = jsonEntity<User, "id", number>({
 *   table: "User",
 *   primaryKey: "id",
 *   ids: integerIds,
 *   schema: {
 *     type: "object",
 *     required: ["id", "name"],
 *     properties: { id: { type: "integer" }, name: { type: "string" } },
 *   },
 * });
 * ```
 */
export function jsonEntity<T extends { [P in K]?: ID | null }, K extends string, ID>(
  options: JsonEntityOptions<K, ID>
): EntityDescriptor<T, ID> {
  const { table, primaryKey, ids } = options;
  const order = options.order ?? [primaryKey];
  const validate = options.schema ? compileSchema<T>(table, options.schema) : undefined;

  const descriptor: EntityDescriptor<T, ID> = {
    tableName: table,
    primaryKeyName: primaryKey,
    ids,

    primaryKeyOf(entity: T): ID | undefined {
      const value: ID | null | undefined = entity[primaryKey];
      return value ?? undefined;
    },

    serialize(entity: T): string {
      return stableStringify(entity, 0, order);
    },

    deserialize(content: string): T {
      let parsed: unknown;
      try {
        parsed = JSON.parse(content);
      } catch (err) {
        throw new EntityDecodeError(table, [{ pointer: "", message: "content is not valid JSON" }], {
          cause: err,
        });
      }

      if (!isRecord(parsed)) {
        throw new EntityDecodeError(table, [{ pointer: "", message: "record must be a JSON object" }]);
      }

      if (!validate) {
        // Without a schema the stored shape is trusted
        return parsed as T;
      }
      if (!validate(parsed)) {
        throw new EntityDecodeError(table, toDecodeIssues(validate.errors ?? []));
      }
      return parsed;
    },
  };

  validateEntityDescriptor(descriptor);
  return descriptor;
}
