/**
 * Deterministic blob names for entity records and table indexes
 */

/**
 * `<table>_<primaryKeyName>_<id>`
 */
export function entityBlobName(table: string, primaryKeyName: string, idText: string): string {
  return `${table}_${primaryKeyName}_${idText}`;
}

/**
 * `<table>_IDs`
 */
export function indexBlobName(table: string): string {
  return `${table}_IDs`;
}
