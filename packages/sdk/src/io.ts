/**
 * Atomic file I/O for the file-backed blob store
 *
 * Invariants:
 * - Writes are atomic: never observe partial file contents
 * - Temp files always reside in the same directory as target (same filesystem for atomic rename)
 * - Temp files are removed on failure paths
 * - Reads are UTF-8 only; a missing file reads as null
 * - Removing a missing file is not an error
 *
 * Pattern: write → fsync → rename → fsync directory
 */

import { randomUUID } from "node:crypto";
import * as fs from "node:fs/promises";
import { dirname, basename, join } from "node:path";
import { BlobFileWriteError, BlobReadError, BlobRemoveError, DirectoryError } from "./errors.js";
import { logger } from "./observability/logs.js";

/**
 * Feature flag to control directory fsync (can be disabled on problematic platforms)
 */
const ENABLE_DIR_FSYNC = true;

/**
 * Error code of a Node.js system error, if it is one
 */
export function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Ensure a directory exists, creating it and parent directories as needed
 */
export async function ensureDirectory(dirPath: string): Promise<void> {
  if (!dirPath) {
    throw new DirectoryError(String(dirPath), {
      cause: new TypeError("Directory path must be a non-empty string"),
    });
  }

  try {
    await fs.mkdir(dirPath, { recursive: true });
  } catch (err) {
    throw new DirectoryError(dirPath, { cause: err });
  }
}

async function syncFile(handle: fs.FileHandle): Promise<void> {
  // Prefer datasync, fall back to a full sync where unsupported
  try {
    await handle.datasync();
  } catch (err) {
    const code = errorCode(err);
    // EINVAL: some CIFS/FUSE mounts report this instead of ENOTSUP
    if (code === "ENOTSUP" || code === "ENOSYS" || code === "EINVAL") {
      await handle.sync();
    } else {
      throw err;
    }
  }
}

async function syncDirectory(dir: string): Promise<void> {
  try {
    const dirHandle = await fs.open(dir, "r");
    try {
      await dirHandle.sync();
    } finally {
      await dirHandle.close();
    }
  } catch (err) {
    const code = errorCode(err);
    // Platforms without directory fsync report one of these
    if (code !== "EINVAL" && code !== "ENOTSUP" && code !== "EBADF") {
      logger.debug("io.dir_fsync.failed", { message: errorMessage(err), details: { dir } });
    }
  }
}

/**
 * Atomically write content to a file using write-rename-sync pattern
 * @param filePath - Target file path
 * @param content - Content to write (UTF-8 string)
 */
export async function atomicWrite(filePath: string, content: string): Promise<void> {
  const dir = dirname(filePath);
  const tmp = join(dir, `.${basename(filePath)}.${randomUUID()}.tmp`);

  await ensureDirectory(dir);

  let fileHandle: fs.FileHandle | null = null;

  try {
    fileHandle = await fs.open(tmp, "w", 0o600);
    await fileHandle.writeFile(content, "utf-8");
    await syncFile(fileHandle);

    // Close the file handle before rename
    await fileHandle.close();
    fileHandle = null;

    // Atomic rename (last-writer-wins for concurrent writes)
    try {
      await fs.rename(tmp, filePath);
    } catch (err) {
      // On Windows, rename may fail transiently while antivirus or indexing holds the file
      const code = errorCode(err);
      if (
        (code === "EPERM" || code === "EACCES" || code === "EBUSY") &&
        process.platform === "win32"
      ) {
        await new Promise((resolve) => setTimeout(resolve, 10));
        await fs.rename(tmp, filePath);
      } else {
        throw err;
      }
    }

    if (ENABLE_DIR_FSYNC) {
      await syncDirectory(dir);
    }
  } catch (err) {
    if (fileHandle) {
      await fileHandle.close().catch((closeErr: unknown) => {
        logger.debug("io.close.failed", { message: errorMessage(closeErr), details: { tmp } });
      });
    }

    // Best-effort cleanup of temp file (it may never have been created)
    await fs.unlink(tmp).catch((unlinkErr: unknown) => {
      if (errorCode(unlinkErr) !== "ENOENT") {
        logger.debug("io.tmp_cleanup.failed", {
          message: errorMessage(unlinkErr),
          details: { tmp },
        });
      }
    });

    throw new BlobFileWriteError(filePath, { cause: err });
  }
}

/**
 * Read a blob file
 * @returns File contents as UTF-8 string, or null if the file doesn't exist
 * @throws BlobReadError for other read failures
 */
export async function readBlobFile(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, "utf-8");
  } catch (err) {
    if (errorCode(err) === "ENOENT") {
      return null;
    }
    throw new BlobReadError(filePath, { cause: err });
  }
}

/**
 * Remove a blob file
 * @returns true if a file was removed, false if it didn't exist
 * @throws BlobRemoveError if removal fails for reasons other than file not found
 */
export async function removeBlobFile(filePath: string): Promise<boolean> {
  try {
    await fs.unlink(filePath);
    return true;
  } catch (err) {
    if (errorCode(err) === "ENOENT") {
      return false;
    }
    throw new BlobRemoveError(filePath, { cause: err });
  }
}
