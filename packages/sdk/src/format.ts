/**
 * Deterministic JSON formatting utilities
 */

export type KeyOrder = "alpha" | readonly string[];

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null || Array.isArray(value)) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Stable, deterministic JSON stringification with guaranteed key ordering
 * @param value - Value to stringify
 * @param indent - Number of spaces for indentation (0 for compact output)
 * @param order - Key ordering: "alpha" or explicit array (unlisted keys follow alphabetically)
 * @returns Formatted JSON string with trailing newline
 */
export function stableStringify(value: unknown, indent = 2, order: KeyOrder = "alpha"): string {
  const seen = new WeakSet<object>();

  const sorter = (a: string, b: string): number => {
    if (order === "alpha") {
      return a.localeCompare(b);
    }
    const aIndex = order.indexOf(a);
    const bIndex = order.indexOf(b);

    if (aIndex !== -1 && bIndex !== -1) {
      return aIndex - bIndex;
    }
    if (aIndex !== -1) return -1;
    if (bIndex !== -1) return 1;
    return a.localeCompare(b);
  };

  const normalize = (input: unknown): unknown => {
    if (typeof input !== "object" || input === null) {
      return input;
    }

    if (seen.has(input)) {
      throw new Error("Circular reference detected in object");
    }
    seen.add(input);

    try {
      // Arrays: preserve order but normalize contents
      if (Array.isArray(input)) {
        return input.map(normalize);
      }
      // Dates and other class instances serialize through their own toJSON
      if (!isPlainRecord(input)) {
        return input;
      }

      const out: Record<string, unknown> = {};
      for (const k of Object.keys(input).sort(sorter)) {
        out[k] = normalize(input[k]);
      }
      return out;
    } finally {
      seen.delete(input);
    }
  };

  return JSON.stringify(normalize(value), null, indent) + "\n";
}
