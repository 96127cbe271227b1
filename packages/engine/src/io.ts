/**
 * File I/O helpers shared by the record store and the mover
 *
 * Invariants:
 * - Writes through atomicWrite are atomic: never observe partial file contents
 * - Temp files always reside in the same directory as the target (same filesystem for rename)
 * - Temp files are removed on failure paths
 * - Existence checks never follow symlinks, so a dangling link still counts as present
 *
 * Pattern: write → fsync → rename → fsync directory
 */

import { randomUUID } from "node:crypto";
import * as fs from "node:fs/promises";
import type { Stats } from "node:fs";
import { dirname, basename, join } from "node:path";
import { IoFailureError, errnoCode } from "./errors.js";

/**
 * Feature flag to control directory fsync (can be disabled on problematic platforms)
 */
const ENABLE_DIR_FSYNC = true;

/**
 * Ensure a directory exists, creating it and parent directories as needed
 * @param dirPath - Directory path to create
 */
export async function ensureDirectory(dirPath: string): Promise<void> {
  try {
    await fs.mkdir(dirPath, { recursive: true });
  } catch (err) {
    throw new IoFailureError(dirPath, "prepare", { cause: err });
  }
}

/**
 * lstat that maps a missing path to null
 */
export async function lstatOrNull(filePath: string): Promise<Stats | null> {
  try {
    return await fs.lstat(filePath);
  } catch (err) {
    if (errnoCode(err) === "ENOENT" || errnoCode(err) === "ENOTDIR") {
      return null;
    }
    throw new IoFailureError(filePath, "inspect", { cause: err });
  }
}

/**
 * True if anything, including a dangling symlink, exists at the path
 */
export async function pathExists(filePath: string): Promise<boolean> {
  return (await lstatOrNull(filePath)) !== null;
}

/**
 * Remove a file or directory tree
 * @param force - Ignore a missing path
 */
export async function removeTree(filePath: string, force = false): Promise<void> {
  await fs.rm(filePath, { recursive: true, force });
}

/**
 * Atomically write content to a file using write-rename-sync pattern
 * @param filePath - Target file path
 * @param content - Content to write (UTF-8 string)
 */
export async function atomicWrite(filePath: string, content: string): Promise<void> {
  const dir = dirname(filePath);
  const base = basename(filePath);
  const tmp = join(dir, `.${base}.${randomUUID()}.tmp`);

  await ensureDirectory(dir);

  let fileHandle: fs.FileHandle | null = null;

  try {
    fileHandle = await fs.open(tmp, "w", 0o600);
    await fileHandle.writeFile(content, "utf-8");
    await syncHandle(fileHandle);
    await fileHandle.close();
    fileHandle = null;

    await fs.rename(tmp, filePath);

    if (ENABLE_DIR_FSYNC) {
      await syncDirectory(dir);
    }
  } catch (err) {
    if (fileHandle) {
      await fileHandle.close().catch(() => undefined);
    }
    // The temp file may never have been created
    await fs.rm(tmp, { force: true }).catch(() => undefined);

    throw new IoFailureError(filePath, "write", { cause: err });
  }
}

/**
 * Flush file data to disk, preferring datasync
 */
export async function syncHandle(fileHandle: fs.FileHandle): Promise<void> {
  try {
    await fileHandle.datasync();
  } catch (err) {
    // ENOTSUP/ENOSYS: not supported on this platform
    // EINVAL: some CIFS/FUSE mounts report this instead
    const code = errnoCode(err);
    if (code === "ENOTSUP" || code === "ENOSYS" || code === "EINVAL") {
      await fileHandle.sync();
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
    // Directory fsync is not supported everywhere
    const code = errnoCode(err);
    if (code !== "EINVAL" && code !== "ENOTSUP" && code !== "EBADF" && code !== "EISDIR") {
      throw err;
    }
  }
}
