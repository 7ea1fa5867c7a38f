/**
 * Validation utilities for blob names
 */

import { InvalidBlobNameError } from "./errors.js";

/**
 * Valid characters for blob names: alphanumeric, underscore, dash, dot
 */
const VALID_NAME_PATTERN = /^[A-Za-z0-9_.-]+$/;

/**
 * Windows reserved device names (case-insensitive)
 */
const WINDOWS_RESERVED_NAMES = new Set([
  "con",
  "prn",
  "aux",
  "nul",
  "com1",
  "com2",
  "com3",
  "com4",
  "com5",
  "com6",
  "com7",
  "com8",
  "com9",
  "lpt1",
  "lpt2",
  "lpt3",
  "lpt4",
  "lpt5",
  "lpt6",
  "lpt7",
  "lpt8",
  "lpt9",
]);

/**
 * Validate that a blob name can be used as a file name inside the store root
 * @throws InvalidBlobNameError if invalid
 */
export function validateBlobName(name: string): void {
  if (!name) {
    throw new InvalidBlobNameError(name, "must be a non-empty string");
  }

  if (!VALID_NAME_PATTERN.test(name)) {
    throw new InvalidBlobNameError(
      name,
      "only alphanumeric, underscore, dash, and dot are allowed"
    );
  }

  if (name.startsWith(".") || name.startsWith("-")) {
    throw new InvalidBlobNameError(name, 'cannot start with "." or "-"');
  }

  if (name.includes("..")) {
    throw new InvalidBlobNameError(name, 'cannot contain ".."');
  }

  // Windows: reject trailing dots
  if (name.endsWith(".")) {
    throw new InvalidBlobNameError(name, 'cannot end with "."');
  }

  // Windows: reject reserved device names (case-insensitive)
  const baseName = (name.split(".")[0] ?? "").toLowerCase();
  if (WINDOWS_RESERVED_NAMES.has(baseName)) {
    throw new InvalidBlobNameError(name, "cannot be a Windows reserved name");
  }
}
