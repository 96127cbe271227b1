/**
 * Append-only record log mapping original paths to grave paths
 *
 * Format: UTF-8, one entry per line, `<timestamp>\t<original>\t<grave>`.
 *
 * Invariants:
 * - Appends are chronological, so log order is burial order
 * - A line that does not split into exactly three fields fails the scan
 * - The log is only rewritten to drop entries, and the rewrite is atomic
 * - A missing log reads as empty
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { CorruptRecordError, RecordLogError, errnoCode } from "./errors.js";
import { atomicWrite, ensureDirectory, pathExists, syncHandle } from "./io.js";
import { assertRecordable } from "./paths.js";
import type { RecordEntry } from "./types.js";
import type { Logger } from "./observability/logs.js";

export const RECORD_FILE = ".record";

const WEEKDAYS = ["Sun", "Mon", "Tue", "Wed", "Thu", "Fri", "Sat"];
const MONTHS = ["Jan", "Feb", "Mar", "Apr", "May", "Jun", "Jul", "Aug", "Sep", "Oct", "Nov", "Dec"];

/**
 * Format a local time as `Www Mmm dd HH:MM:SS YYYY`, day of month space-padded
 * @example "Sun Oct  4 09:05:00 2026"
 */
export function formatTimestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  const day = String(date.getDate()).padStart(2, " ");
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
  return `${WEEKDAYS[date.getDay()]} ${MONTHS[date.getMonth()]} ${day} ${time} ${date.getFullYear()}`;
}

/**
 * Serialize an entry as one log line (without the newline)
 */
export function formatRecordLine(entry: RecordEntry): string {
  return `${entry.timestamp}\t${entry.originalPath}\t${entry.gravePath}`;
}

/**
 * Parse one log line
 * @throws CorruptRecordError when the line does not have exactly three fields
 */
export function parseRecordLine(line: string, recordPath: string, lineNumber: number): RecordEntry {
  const fields = line.split("\t");
  const [timestamp, originalPath, gravePath] = fields;
  if (fields.length !== 3 || timestamp === undefined || originalPath === undefined || gravePath === undefined) {
    throw new CorruptRecordError(recordPath, lineNumber);
  }
  return { timestamp, originalPath, gravePath };
}

export class RecordStore {
  #recordPath: string;
  #logger?: Logger;

  constructor(recordPath: string, options: { logger?: Logger } = {}) {
    this.#recordPath = recordPath;
    this.#logger = options.logger;
  }

  get path(): string {
    return this.#recordPath;
  }

  /**
   * Append one entry, creating the log on first use
   */
  async append(
    originalPath: string,
    gravePath: string,
    timestamp: string = formatTimestamp(new Date())
  ): Promise<RecordEntry> {
    assertRecordable(originalPath);
    assertRecordable(gravePath);

    const entry: RecordEntry = { timestamp, originalPath, gravePath };
    let fileHandle: fs.FileHandle | null = null;

    try {
      await ensureDirectory(path.dirname(this.#recordPath));
      fileHandle = await fs.open(this.#recordPath, "a", 0o600);
      await fileHandle.write(`${formatRecordLine(entry)}\n`);
      await syncHandle(fileHandle);
    } catch (err) {
      throw new RecordLogError(this.#recordPath, "append", { cause: err });
    } finally {
      await fileHandle?.close();
    }

    this.#logger?.debug("record.append", { path: gravePath, details: { originalPath } });
    return entry;
  }

  /**
   * Read every entry in log order
   * @throws CorruptRecordError on a malformed line
   * @throws RecordLogError when the log exists but cannot be read
   */
  async scan(): Promise<RecordEntry[]> {
    const lines = await this.#readLines();
    return lines.map(({ line, lineNumber }) => parseRecordLine(line, this.#recordPath, lineNumber));
  }

  /**
   * Rewrite the log without the lines whose grave path is in the set
   * @returns Number of lines dropped
   */
  async remove(gravePaths: Iterable<string>): Promise<number> {
    const drop = new Set(gravePaths);
    if (drop.size === 0) {
      return 0;
    }

    const lines = await this.#readLines();
    const kept: string[] = [];
    for (const { line, lineNumber } of lines) {
      const entry = parseRecordLine(line, this.#recordPath, lineNumber);
      if (!drop.has(entry.gravePath)) {
        kept.push(line);
      }
    }

    const removed = lines.length - kept.length;
    if (removed === 0) {
      return 0;
    }

    try {
      await atomicWrite(this.#recordPath, kept.map((line) => `${line}\n`).join(""));
    } catch (err) {
      throw new RecordLogError(this.#recordPath, "write", { cause: err });
    }

    this.#logger?.debug("record.remove", { details: { removed } });
    return removed;
  }

  /**
   * Most recent entry whose grave is in scope and still on disk
   *
   * In-scope entries found missing on the way are pruned from the log before returning.
   * @param inScope - Predicate on the grave path; all entries are in scope when omitted
   */
  async findLatest(inScope?: (gravePath: string) => boolean): Promise<RecordEntry | null> {
    const entries = await this.scan();
    const stale: string[] = [];
    let found: RecordEntry | null = null;

    for (const entry of [...entries].reverse()) {
      if (inScope && !inScope(entry.gravePath)) {
        continue;
      }

      if (await pathExists(entry.gravePath)) {
        found = entry;
        break;
      }
      stale.push(entry.gravePath);
    }

    if (stale.length > 0) {
      this.#logger?.debug("record.prune", { details: { stale } });
      await this.remove(stale);
    }

    return found;
  }

  async #readLines(): Promise<Array<{ line: string; lineNumber: number }>> {
    let content: string;
    try {
      content = await fs.readFile(this.#recordPath, "utf-8");
    } catch (err) {
      if (errnoCode(err) === "ENOENT") {
        return [];
      }
      throw new RecordLogError(this.#recordPath, "read", { cause: err });
    }

    const lines: Array<{ line: string; lineNumber: number }> = [];
    content.split("\n").forEach((raw, index) => {
      const line = raw.endsWith("\r") ? raw.slice(0, -1) : raw;
      if (line.length > 0) {
        lines.push({ line, lineNumber: index + 1 });
      }
    });
    return lines;
  }
}
