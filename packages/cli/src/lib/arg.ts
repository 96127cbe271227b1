/**
 * Argument parsing and validation helpers
 */

import { InvalidArgumentError } from "commander";
import type { ColorMode } from "./render.js";

/**
 * Parse a non-negative integer argument
 */
export function parseNonNegativeInt(value: string, name: string): number {
  const trimmed = value.trim();

  if (!/^\d+$/.test(trimmed)) {
    throw new InvalidArgumentError(`${name} must be a non-negative integer`);
  }

  const parsed = Number.parseInt(trimmed, 10);

  // Deeper walks than this are never what the user meant
  if (parsed > 10000) {
    throw new InvalidArgumentError(`${name} must be <= 10000`);
  }

  return parsed;
}

/**
 * Parse the --color mode
 */
export function parseColorMode(value: string): ColorMode {
  const mode = value.trim().toLowerCase();
  if (mode === "auto" || mode === "always" || mode === "never") {
    return mode;
  }
  throw new InvalidArgumentError("--color must be one of auto, always, never");
}
