/**
 * Shell-style glob selection of graves
 */

import fg from "fast-glob";
import * as path from "node:path";
import { pathExists } from "./io.js";

/**
 * True if a target should be expanded as a glob instead of joined as a path
 */
export function isGlobPattern(target: string): boolean {
  return target.startsWith("!") || fg.isDynamicPattern(target);
}

/**
 * Expand a pattern under a base directory
 *
 * Supports `*`, `**`, `?`, brace alternation and a leading `!` to negate.
 * Absolute patterns are re-rooted under the base, the way graves mirror absolute paths.
 * @param maxDepth - Deepest level matched; entries directly in the base are level 1
 * @returns Sorted absolute paths of matching files and directories
 */
export async function expandGlob(
  pattern: string,
  baseDirectory: string,
  maxDepth: number
): Promise<string[]> {
  if (maxDepth < 1 || !(await pathExists(baseDirectory))) {
    return [];
  }

  const negated = pattern.startsWith("!");
  const body = rerootPattern(negated ? pattern.slice(1) : pattern, baseDirectory);

  const matches = await fg(negated ? "**" : body, {
    cwd: baseDirectory,
    ignore: negated ? [body] : [],
    absolute: true,
    onlyFiles: false,
    dot: true,
    // Entries directly in the base are level 1 for fast-glob too
    deep: maxDepth,
    followSymbolicLinks: false,
    unique: true,
  });

  return matches.map((match) => path.normalize(match)).sort();
}

function rerootPattern(pattern: string, baseDirectory: string): string {
  if (!path.isAbsolute(pattern)) {
    return pattern;
  }

  const base = fg.convertPathToPattern(baseDirectory);
  const normalized = pattern.split(path.sep).join("/");
  if (normalized === base) {
    return "**";
  }
  if (normalized.startsWith(`${base}/`)) {
    return normalized.slice(base.length + 1);
  }
  return normalized.replace(/^\/+/, "");
}
