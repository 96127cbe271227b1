/**
 * CLI error handling and exit code mapping
 */

import { CommanderError } from "commander";
import { NotFoundError } from "@graveyard/engine";

/** Exit code for a target that does not exist */
export const EXIT_NOT_FOUND = 2;

/** Exit code for invalid flags or arguments */
export const EXIT_USAGE = 3;

/**
 * Base CLI error class
 */
export class CliError extends Error {
  exitCode: number;

  constructor(message: string, options?: { exitCode?: number; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = "CliError";
    this.exitCode = options?.exitCode ?? 1;
  }
}

/**
 * Map errors to CLI exit codes
 * - 0: success, help or version
 * - 1: I/O, record or unknown error
 * - 2: target not found
 * - 3: usage error
 */
export function mapErrorToExitCode(error: unknown): number {
  // Check for CliError first (has exitCode property)
  if (error instanceof CliError) {
    return error.exitCode;
  }

  if (error instanceof CommanderError) {
    if (
      error.code === "commander.help" ||
      error.code === "commander.helpDisplayed" ||
      error.code === "commander.version"
    ) {
      return 0;
    }
    return EXIT_USAGE;
  }

  if (error instanceof NotFoundError) {
    return EXIT_NOT_FOUND;
  }

  // Default to exit code 1 for everything else
  return 1;
}

/**
 * Format an error for CLI output
 */
export function formatCliError(error: unknown, verbose = false): string {
  if (error instanceof Error) {
    let message = error.message;

    // Keep runaway messages readable
    if (message.length > 2000) {
      message = message.substring(0, 2000) + "... (truncated)";
    }

    if (verbose && error.cause instanceof Error) {
      message += `\n  Cause: ${error.cause.message}`;
    }

    if (verbose && error.stack) {
      message += `\n${error.stack}`;
    }

    return message;
  }

  return String(error);
}
