/**
 * Environment and configuration resolution
 */

import * as path from "node:path";
import { homedir } from "node:os";

/** Base of the per-user fallback graveyard */
const DEFAULT_GRAVEYARD = "/tmp/graveyard";

/**
 * Expand tilde (~) to home directory
 */
export function expandTilde(input: string, home: string = homedir()): string {
  if (!input.startsWith("~")) {
    return input;
  }

  if (input === "~") {
    return home;
  }

  const match = input.match(/^~([\\/]|$)(.*)/);
  if (!match) {
    // Leave "~user" style references untouched
    return input;
  }

  const rest = match[2] ?? "";
  return path.join(home, rest);
}

/**
 * Name of the invoking user, "unknown" when $USER is unset
 */
export function currentUser(env: NodeJS.ProcessEnv = process.env): string {
  return nonEmpty(env.USER) ?? "unknown";
}

/**
 * Resolve the graveyard root directory
 * Priority: --graveyard > $GRAVEYARD > $XDG_DATA_HOME/graveyard > /tmp/graveyard-$USER
 */
export function resolveGraveyard(
  cliGraveyard?: string,
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): string {
  const explicit = nonEmpty(cliGraveyard) ?? nonEmpty(env.GRAVEYARD);
  if (explicit !== undefined) {
    return path.resolve(cwd, expandTilde(explicit, nonEmpty(env.HOME)));
  }

  const dataHome = nonEmpty(env.XDG_DATA_HOME);
  if (dataHome !== undefined) {
    return path.resolve(cwd, expandTilde(dataHome, nonEmpty(env.HOME)), "graveyard");
  }

  return `${DEFAULT_GRAVEYARD}-${currentUser(env)}`;
}

/**
 * Check if timing metrics are enabled
 */
export function isVerbose(env: NodeJS.ProcessEnv = process.env): boolean {
  return env.GRAVEYARD_CLI_DEBUG === "1";
}

function nonEmpty(value: string | undefined): string | undefined {
  return value === undefined || value.length === 0 ? undefined : value;
}
