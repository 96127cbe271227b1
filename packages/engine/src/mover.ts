/**
 * Physical relocation of files and directory trees
 *
 * Bury and unbury are symmetric: both call `relocate(source, dest)`.
 *
 * Pattern: rename → (EXDEV) copy tree → remove source
 *
 * Invariants:
 * - The destination's parent tree exists before the rename is attempted
 * - Symlinks are recreated, never dereferenced
 * - The source is only removed after every copy succeeded
 * - A failure in `remove-source` means the destination is complete
 */

import { execFile as execFileCallback } from "node:child_process";
import type { Dirent, Stats } from "node:fs";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { promisify } from "node:util";
import { IoFailureError, SpecialFileDeclinedError, errnoCode } from "./errors.js";
import { formatBytes } from "./inspect.js";
import { ensureDirectory, removeTree } from "./io.js";
import type { Logger } from "./observability/logs.js";
import type { Confirm, MoveReport, RenameFn } from "./types.js";

const execFile = promisify(execFileCallback);

/** Files above 500 MiB ask before being copied */
export const BIG_FILE_THRESHOLD = 500 * 1024 * 1024;

/** Content written in place of a special file the user chose to delete */
export const DELETED_MARKER =
  "This is a marker for a file that was permanently deleted.  Requiescat in pace.";

export interface MoverOptions {
  confirm: Confirm;
  logger?: Logger;
  /** Size above which a copy asks first (default: BIG_FILE_THRESHOLD) */
  bigFileThreshold?: number;
  /** Same-device rename (default: fs.rename) */
  rename?: RenameFn;
}

export class Mover {
  #confirm: Confirm;
  #logger?: Logger;
  #bigFileThreshold: number;
  #rename: RenameFn;

  constructor(options: MoverOptions) {
    this.#confirm = options.confirm;
    this.#logger = options.logger;
    this.#bigFileThreshold = options.bigFileThreshold ?? BIG_FILE_THRESHOLD;
    this.#rename = options.rename ?? ((source, dest) => fs.rename(source, dest));
  }

  /**
   * Move source to dest, across devices if needed
   * @throws IoFailureError with the failing phase
   * @throws SpecialFileDeclinedError when a special file may not be deleted
   */
  async relocate(source: string, dest: string): Promise<MoveReport> {
    await ensureDirectory(path.dirname(dest));

    try {
      await this.#rename(source, dest);
      this.#logger?.debug("mover.rename", { path: source, details: { dest } });
      return { method: "rename", discarded: [] };
    } catch (err) {
      if (errnoCode(err) !== "EXDEV") {
        throw new IoFailureError(source, "rename", { cause: err });
      }
    }

    this.#logger?.debug("mover.copy", { path: source, details: { dest } });

    const discarded: string[] = [];
    let stats: Stats;
    try {
      stats = await fs.lstat(source);
    } catch (err) {
      throw new IoFailureError(source, "inspect", { cause: err });
    }

    if (stats.isDirectory()) {
      await this.#copyTree(source, dest, discarded);
    } else {
      await this.#copyEntry(source, dest, stats, discarded);
    }

    try {
      await removeTree(source);
    } catch (err) {
      throw new IoFailureError(source, "remove-source", { cause: err });
    }

    return { method: "copy", discarded };
  }

  /**
   * Depth-first copy, recreating each directory before its children
   */
  async #copyTree(sourceDir: string, destDir: string, discarded: string[]): Promise<void> {
    try {
      await fs.mkdir(destDir, { recursive: true });
    } catch (err) {
      throw new IoFailureError(destDir, "copy", { cause: err });
    }

    let entries: Dirent[];
    try {
      entries = await fs.readdir(sourceDir, { withFileTypes: true });
    } catch (err) {
      throw new IoFailureError(sourceDir, "copy", { cause: err });
    }

    for (const entry of entries) {
      const srcPath = path.join(sourceDir, entry.name);
      const destPath = path.join(destDir, entry.name);

      if (entry.isDirectory()) {
        await this.#copyTree(srcPath, destPath, discarded);
      } else {
        let stats: Stats;
        try {
          stats = await fs.lstat(srcPath);
        } catch (err) {
          throw new IoFailureError(srcPath, "copy", { cause: err });
        }
        await this.#copyEntry(srcPath, destPath, stats, discarded);
      }
    }
  }

  /**
   * Copy one non-directory entry according to its type
   */
  async #copyEntry(
    source: string,
    dest: string,
    stats: Stats,
    discarded: string[]
  ): Promise<void> {
    if (stats.size > this.#bigFileThreshold) {
      const deleteInstead = await this.#confirm(
        `About to copy a big file (${source} is ${formatBytes(stats.size)}). ` +
          `Permanently delete this file instead?`
      );
      if (deleteInstead) {
        discarded.push(source);
        return;
      }
    }

    try {
      if (stats.isFile()) {
        await fs.copyFile(source, dest);
      } else if (stats.isSymbolicLink()) {
        await fs.symlink(await fs.readlink(source), dest);
      } else if (stats.isFIFO()) {
        // Node has no mkfifo binding
        await execFile("mkfifo", ["-m", (stats.mode & 0o777).toString(8), dest]);
      } else {
        await this.#replaceSpecialFile(source, dest, discarded);
      }
    } catch (err) {
      if (err instanceof SpecialFileDeclinedError) {
        throw err;
      }
      throw new IoFailureError(source, "copy", { cause: err });
    }
  }

  /**
   * Device nodes and sockets cannot be copied: delete them, leaving a marker, or fail
   */
  async #replaceSpecialFile(source: string, dest: string, discarded: string[]): Promise<void> {
    const deleteInstead = await this.#confirm(
      `Non-regular file or directory: ${source}. Permanently delete the file?`
    );
    if (!deleteInstead) {
      throw new SpecialFileDeclinedError(source);
    }

    await fs.writeFile(dest, DELETED_MARKER);
    discarded.push(source);
  }
}
