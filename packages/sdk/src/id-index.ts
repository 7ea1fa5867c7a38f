/**
 * Line-oriented ID index codec
 *
 * Format: one ID per line, each line terminated by "\n".
 *
 * Invariants:
 * - Parsing accepts "\n", "\r" and "\r\n" terminators and a missing final terminator
 * - Blank lines and tokens the codec rejects are skipped, order is preserved
 * - Formatting always terminates every line, including the last
 */

import type { IdCodec } from "./types.js";

const INTEGER_TOKEN = /^[+-]?\d+$/;

/**
 * Integer primary keys ("42", "-7")
 */
export const integerIds: IdCodec<number> = {
  format(id: number): string {
    return String(id);
  },
  parse(token: string): number | undefined {
    const trimmed = token.trim();
    if (!INTEGER_TOKEN.test(trimmed)) return undefined;
    const value = Number(trimmed);
    return Number.isSafeInteger(value) ? value : undefined;
  },
};

/**
 * String primary keys, used verbatim
 */
export const stringIds: IdCodec<string> = {
  format(id: string): string {
    return id;
  },
  parse(token: string): string | undefined {
    const trimmed = token.trim();
    return trimmed.length > 0 ? trimmed : undefined;
  },
};

function isTerminator(ch: string): boolean {
  return ch === "\n" || ch === "\r";
}

/**
 * Split index content into raw tokens, one per non-empty line
 */
export function tokenizeIdIndex(content: string): string[] {
  const tokens: string[] = [];
  let token = "";

  for (const ch of content) {
    if (isTerminator(ch)) {
      if (token.length > 0) tokens.push(token);
      token = "";
    } else {
      token += ch;
    }
  }

  if (token.length > 0) tokens.push(token);
  return tokens;
}

/**
 * Parse index content into IDs
 * @param onReject - Called with each non-empty token the codec rejects
 */
export function parseIdIndex<ID>(
  content: string,
  codec: IdCodec<ID>,
  onReject?: (token: string) => void
): ID[] {
  const ids: ID[] = [];
  for (const token of tokenizeIdIndex(content)) {
    const id = codec.parse(token);
    if (id === undefined) {
      onReject?.(token);
      continue;
    }
    ids.push(id);
  }
  return ids;
}

/**
 * Render IDs as index content, every line terminated
 */
export function formatIdIndex<ID>(ids: Iterable<ID>, codec: IdCodec<ID>): string {
  let out = "";
  for (const id of ids) {
    out += `${codec.format(id)}\n`;
  }
  return out;
}

/**
 * Text to append to an index currently holding `current` so that `idText`
 * becomes its own line without corrupting the previous last line.
 */
export function indexAppendText(current: string, idText: string): string {
  if (current.length === 0) {
    return `${idText}\n`;
  }
  const last = current[current.length - 1] ?? "";
  return isTerminator(last) ? `${idText}\n` : `\n${idText}\n`;
}

/**
 * True when the ID's text is a single index line that parses back to the
 * same text. Anything else would be duplicated or lost on the next read.
 */
export function isIndexableId<ID>(id: ID, codec: IdCodec<ID>): boolean {
  const text = codec.format(id);
  if ([...text].some(isTerminator)) {
    return false;
  }
  const parsed = codec.parse(text);
  return parsed !== undefined && codec.format(parsed) === text;
}

/**
 * Membership by textual form, so codecs need no equality of their own
 */
export function containsId<ID>(ids: readonly ID[], id: ID, codec: IdCodec<ID>): boolean {
  const text = codec.format(id);
  return ids.some((candidate) => codec.format(candidate) === text);
}

/**
 * Drop repeated IDs, keeping the first occurrence
 */
export function uniqueIds<ID>(ids: readonly ID[], codec: IdCodec<ID>): ID[] {
  const seen = new Set<string>();
  const out: ID[] = [];
  for (const id of ids) {
    const text = codec.format(id);
    if (seen.has(text)) continue;
    seen.add(text);
    out.push(id);
  }
  return out;
}
