/**
 * Error types for graveyard operations
 *
 * Invariants:
 * - Every error names the path it concerns in its message
 * - Every error supports a `cause` property for wrapping underlying errors
 * - Every error has stable `name` and `code` fields for programmatic handling
 */

/**
 * Phase of a move or record operation in which a failure happened
 */
export type OperationPhase =
  | "inspect"
  | "resolve"
  | "prepare"
  | "rename"
  | "copy"
  | "remove-source"
  | "cleanup"
  | "delete"
  | "read"
  | "write"
  | "append";

/**
 * Base class for all graveyard errors
 */
export abstract class GraveyardError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown when a target to bury does not exist
 */
export class NotFoundError extends GraveyardError {
  readonly code = "ENOENT";

  constructor(
    public readonly path: string,
    options?: ErrorOptions
  ) {
    super(`Cannot remove ${path}: no such file or directory`, options);
  }
}

/**
 * Thrown when an underlying read, write, copy or rename fails
 */
export class IoFailureError extends GraveyardError {
  readonly code = "E_IO";

  constructor(
    public readonly path: string,
    public readonly phase: OperationPhase,
    options?: ErrorOptions
  ) {
    super(`${phase} failed for ${path}${describeCause(options?.cause)}`, options);
  }
}

/**
 * Thrown when no free `~N` suffix remains for a conflicting grave
 */
export class ConflictExhaustedError extends GraveyardError {
  readonly code = "E_CONFLICT";

  constructor(
    public readonly path: string,
    options?: ErrorOptions
  ) {
    super(`No free name left for ${path}`, options);
  }
}

/**
 * Thrown when a record log line does not split into exactly three tab fields
 */
export class CorruptRecordError extends GraveyardError {
  readonly code = "E_CORRUPT_RECORD";

  constructor(
    public readonly recordPath: string,
    public readonly lineNumber: number,
    options?: ErrorOptions
  ) {
    super(`Corrupt record at ${recordPath}:${lineNumber}: expected 3 tab-separated fields`, options);
  }
}

/**
 * Thrown when the record log cannot be read or written
 */
export class RecordLogError extends GraveyardError {
  readonly code = "E_RECORD";

  constructor(
    public readonly recordPath: string,
    public readonly phase: OperationPhase,
    options?: ErrorOptions
  ) {
    super(`Failed to ${phase} record at ${recordPath}${describeCause(options?.cause)}`, options);
  }
}

/**
 * Thrown when the user declines to permanently delete a file that cannot be copied
 */
export class SpecialFileDeclinedError extends GraveyardError {
  readonly code = "E_SPECIAL";

  constructor(
    public readonly path: string,
    options?: ErrorOptions
  ) {
    super(`Cannot copy special file ${path} and permanent deletion was declined`, options);
  }
}

/**
 * Thrown when a path cannot be written to the tab-separated record
 */
export class UnrecordablePathError extends GraveyardError {
  readonly code = "E_RECORD_PATH";

  constructor(
    public readonly path: string,
    options?: ErrorOptions
  ) {
    super(`Path contains a tab or newline and cannot be recorded: ${JSON.stringify(path)}`, options);
  }
}

/**
 * Thrown when the graveyard lock cannot be acquired in time
 */
export class LockTimeoutError extends GraveyardError {
  readonly code = "E_LOCK";

  constructor(
    public readonly lockPath: string,
    timeoutMs: number,
    options?: ErrorOptions
  ) {
    super(
      `Failed to acquire lock after ${timeoutMs}ms. Lock file: ${lockPath}. ` +
        `This may be a stale lock from a killed process; delete the lock file if no other rip is running.`,
      options
    );
  }
}

/**
 * Errors that abort the whole batch instead of a single target
 */
export function isFatalError(err: unknown): boolean {
  return (
    err instanceof CorruptRecordError ||
    err instanceof RecordLogError ||
    err instanceof LockTimeoutError
  );
}

/**
 * Read the errno code from a Node.js system error
 */
export function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    return `: ${cause.message}`;
  }
  return "";
}
