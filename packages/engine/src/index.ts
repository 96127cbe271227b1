/**
 * Graveyard engine
 *
 * Soft delete: files are moved into a graveyard that mirrors their absolute
 * paths, and an append-only record remembers where each one came from.
 */

export type {
  RecordEntry,
  Confirm,
  RenameFn,
  GraveyardOptions,
  BuryOperation,
  UnburyOperation,
  SeanceOperation,
  DecomposeOperation,
  Operation,
  MoveMethod,
  MoveReport,
  InspectionPreview,
  BuryOutcome,
  UnburyOutcome,
  FileKind,
  GraveMetadata,
  SeanceEntry,
  DecomposeOutcome,
  OperationResult,
  Graveyard,
} from "./types.js";

export { openGraveyard } from "./graveyard.js";

export {
  GraveyardError,
  NotFoundError,
  IoFailureError,
  ConflictExhaustedError,
  CorruptRecordError,
  RecordLogError,
  SpecialFileDeclinedError,
  UnrecordablePathError,
  LockTimeoutError,
  isFatalError,
  errnoCode,
} from "./errors.js";
export type { OperationPhase } from "./errors.js";

export {
  gravePathFor,
  originalPathFor,
  isUnder,
  resolveConflict,
  findBlockingAncestor,
  resolveGravePath,
  assertRecordable,
} from "./paths.js";

export {
  RECORD_FILE,
  RecordStore,
  formatTimestamp,
  formatRecordLine,
  parseRecordLine,
} from "./record.js";

export { Mover, BIG_FILE_THRESHOLD, DELETED_MARKER } from "./mover.js";
export type { MoverOptions } from "./mover.js";

export { expandGlob, isGlobPattern } from "./glob.js";

export { FileLock, LOCK_FILE } from "./lock.js";
export type { LockOptions } from "./lock.js";

export { formatBytes, formatPreview, inspectPath, LINES_TO_INSPECT, FILES_TO_INSPECT } from "./inspect.js";

export { DEFAULT_MAX_DEPTH } from "./ops/unbury.js";

export { Logger } from "./observability/logs.js";
export type { LogLevel, LogEntry, LoggerOptions } from "./observability/logs.js";
