/**
 * Preview of a target shown before it is buried
 */

import { createReadStream } from "node:fs";
import type { Stats } from "node:fs";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { createInterface } from "node:readline";
import type { InspectionPreview } from "./types.js";

/** Lines of a file shown by a preview */
export const LINES_TO_INSPECT = 6;

/** Top-level entries of a directory shown by a preview */
export const FILES_TO_INSPECT = 6;

/**
 * Format bytes to human-readable string
 * @param bytes - Number of bytes
 * @returns Formatted string (e.g., "1.23 KB")
 */
export function formatBytes(bytes: number): string {
  if (!Number.isFinite(bytes) || bytes <= 0) return "0 B";

  const k = 1024;
  const sizes = ["B", "KB", "MB", "GB", "TB"];
  const magnitude = Math.floor(Math.log(bytes) / Math.log(k));
  const i = Math.min(Math.max(magnitude, 0), sizes.length - 1);
  const value = bytes / Math.pow(k, i);

  return `${value.toFixed(2)} ${sizes[i]}`;
}

/**
 * Total size of a tree, counting every entry without following symlinks
 */
export async function treeSize(root: string): Promise<number> {
  const stats = await fs.lstat(root);
  let total = stats.size;

  if (stats.isDirectory()) {
    const entries = await fs.readdir(root);
    for (const name of entries) {
      total += await treeSize(path.join(root, name));
    }
  }

  return total;
}

/**
 * Build the preview for a target
 * @param stats - lstat of the target
 */
export async function inspectPath(target: string, stats: Stats): Promise<InspectionPreview> {
  if (stats.isDirectory()) {
    const names = (await fs.readdir(target)).sort();
    return {
      kind: "directory",
      bytes: await treeSize(target),
      entries: names.slice(0, FILES_TO_INSPECT).map((name) => path.join(target, name)),
    };
  }

  if (stats.isSymbolicLink()) {
    return { kind: "symlink", bytes: stats.size, target: await fs.readlink(target) };
  }

  if (!stats.isFile()) {
    return { kind: "file", bytes: stats.size, lines: [], readable: false };
  }

  try {
    return { kind: "file", bytes: stats.size, lines: await readHead(target), readable: true };
  } catch {
    return { kind: "file", bytes: stats.size, lines: [], readable: false };
  }
}

/**
 * Render a preview as plain text lines
 * @param label - Name the user typed for the target
 */
export function formatPreview(label: string, preview: InspectionPreview): string {
  if (preview.kind === "directory") {
    return [`${label}: directory, ${formatBytes(preview.bytes)} including:`, ...preview.entries].join(
      "\n"
    );
  }

  if (preview.kind === "symlink") {
    return `${label}: symlink to ${preview.target}`;
  }

  const header = `${label}: file, ${formatBytes(preview.bytes)}`;
  if (!preview.readable) {
    return `${header}\nError: problem reading ${label}`;
  }
  return [header, ...preview.lines.map((line) => `> ${line}`)].join("\n");
}

async function readHead(filePath: string): Promise<string[]> {
  const stream = createReadStream(filePath, { encoding: "utf-8" });
  const reader = createInterface({ input: stream, crlfDelay: Infinity });
  const lines: string[] = [];

  try {
    for await (const line of reader) {
      lines.push(line);
      if (lines.length >= LINES_TO_INSPECT) {
        break;
      }
    }
  } finally {
    reader.close();
    stream.destroy();
  }

  return lines;
}
