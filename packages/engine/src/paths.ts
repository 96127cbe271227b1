/**
 * Mapping between original paths and grave paths
 *
 * The graveyard mirrors the absolute layout of everything it holds:
 * `/a/b/c` is buried at `<root>/a/b/c`. Collisions get a `~N` suffix.
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { ConflictExhaustedError, UnrecordablePathError, errnoCode } from "./errors.js";
import { lstatOrNull, pathExists } from "./io.js";

const LEADING_ROOT = /^(?:[A-Za-z]:)?[\\/]+/;

/**
 * Mirror an original path under the graveyard root
 * The leading root marker is stripped so absolute and relative inputs join the same way
 */
export function gravePathFor(root: string, originalPath: string): string {
  return path.join(root, originalPath.replace(LEADING_ROOT, ""));
}

/**
 * Inverse of gravePathFor: the absolute path a grave mirrors
 * @returns null when the grave is not under the root
 */
export function originalPathFor(root: string, gravePath: string): string | null {
  if (!isUnder(gravePath, root)) {
    return null;
  }
  const relative = path.relative(root, gravePath);
  return path.join(path.sep, relative);
}

/**
 * True if `candidate` is `dir` itself or lies beneath it (segment-wise, not by string prefix)
 */
export function isUnder(candidate: string, dir: string): boolean {
  const relative = path.relative(path.resolve(dir), path.resolve(candidate));
  if (relative === "") {
    return true;
  }
  return relative !== ".." && !relative.startsWith(`..${path.sep}`) && !path.isAbsolute(relative);
}

/**
 * Return the candidate if it is free, otherwise the first free `candidate~N`
 * @param maxAttempts - Largest suffix to try
 * @throws ConflictExhaustedError when every suffix up to maxAttempts is taken
 */
export async function resolveConflict(
  candidate: string,
  maxAttempts: number = Number.MAX_SAFE_INTEGER
): Promise<string> {
  if (!(await pathExists(candidate))) {
    return candidate;
  }

  for (let i = 1; i <= maxAttempts; i++) {
    const renamed = `${candidate}~${i}`;
    if (!(await pathExists(renamed))) {
      return renamed;
    }
  }

  throw new ConflictExhaustedError(candidate);
}

/**
 * Walk from the path upward and return the first ancestor that exists but is not a directory
 * Such an ancestor prevents creating the path as a nested entry
 */
export async function findBlockingAncestor(candidate: string): Promise<string | null> {
  let current = path.resolve(candidate);

  while (true) {
    const stats = await lstatOrNull(current);
    if (stats && !(await isDirectoryLike(current, stats.isSymbolicLink(), stats.isDirectory()))) {
      return current;
    }

    const parent = path.dirname(current);
    if (parent === current) {
      return null;
    }
    current = parent;
  }
}

/**
 * Choose a free grave path for an original path
 *
 * 1. Mirror the original under the root
 * 2. If that name is taken, append the first free `~N`
 * 3. Else if an ancestor segment is a plain file, rename that segment and keep the rest
 */
export async function resolveGravePath(root: string, originalPath: string): Promise<string> {
  const candidate = gravePathFor(root, originalPath);

  if (await pathExists(candidate)) {
    return resolveConflict(candidate);
  }

  const blocker = await findBlockingAncestor(candidate);
  if (blocker === null) {
    return candidate;
  }

  const renamedBlocker = await resolveConflict(blocker);
  return path.join(renamedBlocker, path.relative(blocker, candidate));
}

/**
 * Refuse paths that would break the tab-separated record format
 * @throws UnrecordablePathError
 */
export function assertRecordable(filePath: string): void {
  if (/[\t\r\n]/.test(filePath)) {
    throw new UnrecordablePathError(filePath);
  }
}

async function isDirectoryLike(
  filePath: string,
  isSymlink: boolean,
  isDirectory: boolean
): Promise<boolean> {
  if (!isSymlink) {
    return isDirectory;
  }
  // A symlink to a directory can still be traversed
  try {
    return (await fs.stat(filePath)).isDirectory();
  } catch (err) {
    if (errnoCode(err) === "ENOENT" || errnoCode(err) === "ELOOP") {
      return false;
    }
    throw err;
  }
}
