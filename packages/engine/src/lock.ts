/**
 * Advisory lock around mutations of a graveyard
 * Uses exclusive file open so only one rip mutates the record at a time
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { LockTimeoutError, errnoCode } from "./errors.js";
import type { Logger } from "./observability/logs.js";

export const LOCK_FILE = ".record.lock";

export interface LockOptions {
  /** Maximum time to wait for the lock (default: 10000ms) */
  timeoutMs?: number;
  /** Time between retry attempts (default: 100ms) */
  retryIntervalMs?: number;
  logger?: Logger;
}

export class FileLock {
  #lockPath: string;
  #fd?: fs.FileHandle;
  #acquired = false;
  #timeoutMs: number;
  #retryIntervalMs: number;
  #logger?: Logger;

  constructor(root: string, options: LockOptions = {}) {
    this.#lockPath = path.join(root, LOCK_FILE);
    this.#timeoutMs = options.timeoutMs ?? 10_000;
    this.#retryIntervalMs = options.retryIntervalMs ?? 100;
    this.#logger = options.logger;
  }

  get path(): string {
    return this.#lockPath;
  }

  /**
   * Acquire the lock, retrying until the timeout
   * @throws LockTimeoutError when another holder keeps the lock
   */
  async acquire(): Promise<void> {
    if (this.#acquired) {
      throw new Error("Lock already acquired");
    }

    const startTime = Date.now();

    await fs.mkdir(path.dirname(this.#lockPath), { recursive: true });

    while (true) {
      try {
        // Fails if the file already exists
        this.#fd = await fs.open(this.#lockPath, "wx");
        this.#acquired = true;

        const lockInfo = {
          pid: process.pid,
          acquiredAt: new Date().toISOString(),
        };
        await this.#fd.writeFile(JSON.stringify(lockInfo, null, 2));
        await this.#fd.sync();

        return;
      } catch (err) {
        if (errnoCode(err) !== "EEXIST") {
          await this.release();
          throw err;
        }

        if (Date.now() - startTime > this.#timeoutMs) {
          throw new LockTimeoutError(this.#lockPath, this.#timeoutMs);
        }

        await new Promise((resolve) => setTimeout(resolve, this.#retryIntervalMs));
      }
    }
  }

  /**
   * Release the lock
   * A lock file that disappeared with its directory (decompose) is not an error
   */
  async release(): Promise<void> {
    if (!this.#acquired) {
      return;
    }

    try {
      if (this.#fd) {
        await this.#fd.close();
        this.#fd = undefined;
      }

      await fs.unlink(this.#lockPath);
    } catch (err) {
      if (errnoCode(err) !== "ENOENT") {
        this.#logger?.warn("lock.release_failed", {
          path: this.#lockPath,
          message: err instanceof Error ? err.message : String(err),
        });
      }
    } finally {
      this.#acquired = false;
    }
  }

  isAcquired(): boolean {
    return this.#acquired;
  }

  /**
   * Execute a function with the lock held
   */
  async withLock<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      await this.release();
    }
  }
}
