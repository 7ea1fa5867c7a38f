/**
 * Environment and configuration resolution
 */

import * as path from "node:path";
import { homedir } from "node:os";
import { TableLocks } from "./lock.js";
import type { MissingKeyPolicy, RepositoryOptions } from "./types.js";

export interface ResolvedRepositoryOptions {
  missingKey: MissingKeyPolicy;
  locks: TableLocks;
}

/**
 * Expand tilde (~) to home directory
 */
function expandTilde(input: string): string {
  if (!input.startsWith("~")) {
    return input;
  }

  if (input === "~") {
    return homedir();
  }

  const match = input.match(/^~([\\/]|$)(.*)/);
  if (!match) {
    // Leave "~user" style references untouched
    return input;
  }

  const rest = match[2] ?? "";
  return path.join(homedir(), rest);
}

/**
 * Resolve the file store root directory
 * Priority: explicit option > BLOBREPO_ROOT env var > default "./data"
 */
export function resolveStoreRoot(root?: string): string {
  const chosen = root ?? process.env.BLOBREPO_ROOT ?? "./data";
  return path.resolve(expandTilde(chosen));
}

function parseMissingKeyPolicy(value: string): MissingKeyPolicy {
  if (value === "ignore" || value === "throw") {
    return value;
  }
  throw new TypeError(`BLOBREPO_MISSING_KEY must be "ignore" or "throw", got "${value}"`);
}

/**
 * Fill in repository defaults
 * Priority for missingKey: explicit option > BLOBREPO_MISSING_KEY > "ignore"
 */
export function resolveRepositoryOptions(options: RepositoryOptions = {}): ResolvedRepositoryOptions {
  const fromEnv = process.env.BLOBREPO_MISSING_KEY;
  const missingKey =
    options.missingKey ?? (fromEnv ? parseMissingKeyPolicy(fromEnv) : "ignore");

  return {
    missingKey,
    locks: options.locks ?? new TableLocks(),
  };
}
