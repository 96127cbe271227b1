/**
 * File system test utilities
 */

import { mkdtemp, rm, realpath } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { openGraveyard } from "@graveyard/engine";
import type { Graveyard, GraveyardOptions } from "@graveyard/engine";
import { scriptedConfirm } from "./prompt.js";

/**
 * Create a unique temporary directory for testing
 * @param prefix - Prefix for the temp directory (default: "graveyard-test-")
 * @returns Absolute, symlink-free path to the temp directory
 */
export async function createTempDir(prefix = "graveyard-test-"): Promise<string> {
  return await realpath(await mkdtemp(join(tmpdir(), prefix)));
}

/**
 * Remove a directory recursively
 * @param path - Path to remove
 */
export async function removeDir(path: string): Promise<void> {
  await rm(path, { recursive: true, force: true });
}

/**
 * Layout used by graveyard tests: a sandbox with a `home` to bury from and a `graveyard` root
 */
export interface Sandbox {
  /** Temp directory holding everything */
  dir: string;
  /** Where test files are created */
  home: string;
  /** Graveyard root (not created until first use) */
  root: string;
}

/**
 * Execute a function with a fresh graveyard, cleaning up after
 * @param fn - Function to execute with the graveyard and its sandbox
 * @param options - Optional graveyard options (root and cwd default to the sandbox)
 * @returns Result of fn
 */
export async function withTempGraveyard<T>(
  fn: (graveyard: Graveyard, sandbox: Sandbox) => Promise<T>,
  options?: Partial<GraveyardOptions>
): Promise<T> {
  const dir = await createTempDir();
  const sandbox: Sandbox = { dir, home: join(dir, "home"), root: join(dir, "graveyard") };

  try {
    const graveyard = openGraveyard({
      confirm: scriptedConfirm(false),
      cwd: sandbox.home,
      ...options,
      root: options?.root ?? sandbox.root,
    });
    return await fn(graveyard, sandbox);
  } finally {
    await removeDir(dir);
  }
}
