/**
 * Core types for the graveyard engine
 */

import type { GraveyardError } from "./errors.js";

/**
 * One line of the record log
 */
export interface RecordEntry {
  /** Display timestamp, stored verbatim and never parsed */
  timestamp: string;
  /** Absolute path the item was buried from */
  originalPath: string;
  /** Absolute path of the item inside the graveyard */
  gravePath: string;
}

/**
 * Yes/no prompt the engine calls before destructive or expensive steps
 */
export type Confirm = (message: string) => Promise<boolean>;

/**
 * Same-device rename used by the mover before it falls back to copying
 */
export type RenameFn = (source: string, dest: string) => Promise<void>;

/**
 * Options for opening a graveyard
 */
export interface GraveyardOptions {
  /** Graveyard root directory */
  root: string;
  /** Directory that relative targets and local scope resolve against (default: process.cwd()) */
  cwd?: string;
  /** Confirmation boundary */
  confirm: Confirm;
  /** Emit debug diagnostics for intermediate decisions (default: false) */
  verbose?: boolean;
  /** How long mutating operations wait for the graveyard lock (default: 10000) */
  lockTimeoutMs?: number;
  /** Files larger than this ask before being copied across devices (default: 500 MiB) */
  bigFileThreshold?: number;
  /** Replacement for the same-device rename (default: fs.rename) */
  rename?: RenameFn;
}

export interface BuryOperation {
  kind: "bury";
  targets: string[];
  /** Show a preview and ask before burying each target */
  inspect: boolean;
}

export interface UnburyOperation {
  kind: "unbury";
  /** Explicit grave targets or glob patterns */
  targets: string[];
  /** Resolve targets and the last-bury fallback under the current directory */
  local: boolean;
  /** Also exhume every grave recorded under the current directory */
  seance: boolean;
  /** Maximum directory depth for glob expansion */
  maxDepth: number;
}

export interface SeanceOperation {
  kind: "seance";
  /** List the whole graveyard instead of the current directory */
  showAll: boolean;
  /** Skip the file type and modification time lookup */
  plain: boolean;
}

export interface DecomposeOperation {
  kind: "decompose";
}

/**
 * Operation mode, one payload per variant
 */
export type Operation = BuryOperation | UnburyOperation | SeanceOperation | DecomposeOperation;

/**
 * How the mover relocated an item
 */
export type MoveMethod = "rename" | "copy";

/**
 * Result of a successful relocation
 */
export interface MoveReport {
  method: MoveMethod;
  /** Source paths deleted outright instead of copied (large or special files) */
  discarded: string[];
}

/**
 * Size and leading content of a target shown before burying it
 */
export type InspectionPreview =
  | { kind: "file"; bytes: number; lines: string[]; readable: boolean }
  | { kind: "directory"; bytes: number; entries: string[] }
  | { kind: "symlink"; bytes: number; target: string };

export type BuryOutcome =
  | {
      kind: "buried";
      source: string;
      grave: string;
      entry: RecordEntry;
      method: MoveMethod;
      discarded: string[];
    }
  | { kind: "discarded"; source: string }
  | { kind: "deleted"; source: string }
  | { kind: "skipped"; source: string; reason: "inspection-declined" | "delete-declined" }
  | { kind: "failed"; target: string; error: GraveyardError };

export type UnburyOutcome =
  | {
      kind: "restored";
      grave: string;
      destination: string;
      entry: RecordEntry;
      /** True when the original location was occupied and a `~N` name was used */
      renamed: boolean;
      method: MoveMethod;
    }
  | { kind: "unrecorded"; grave: string }
  | { kind: "failed"; grave: string; error: GraveyardError };

export type FileKind = "file" | "dir" | "symlink" | "other" | "missing";

export interface GraveMetadata {
  fileType: FileKind;
  /** Modification time, null when the grave no longer exists */
  modified: Date | null;
}

export interface SeanceEntry {
  /** Position in the listing, starting at 0 */
  index: number;
  entry: RecordEntry;
  /** Grave path with the graveyard root stripped */
  relativePath: string;
  /** Absent for plain listings */
  metadata?: GraveMetadata;
}

export type DecomposeOutcome =
  | { kind: "declined" }
  | {
      kind: "decomposed";
      root: string;
      /** Entries the record held before it was erased */
      erased: Array<{ entry: RecordEntry; fileType: FileKind }>;
    };

export type OperationResult =
  | { kind: "bury"; outcomes: BuryOutcome[] }
  | { kind: "unbury"; outcomes: UnburyOutcome[] }
  | { kind: "seance"; entries: SeanceEntry[] }
  | { kind: "decompose"; outcome: DecomposeOutcome };

/**
 * Graveyard engine interface
 */
export interface Graveyard {
  /** Canonical graveyard root */
  readonly root: string;

  /** Absolute path of the record log */
  readonly recordPath: string;

  /**
   * Move targets into the graveyard and record them
   * @param targets - Paths, relative ones resolved against cwd
   */
  bury(targets: string[], options?: { inspect?: boolean }): Promise<BuryOutcome[]>;

  /**
   * Restore graves to their original locations
   */
  unbury(options: Omit<UnburyOperation, "kind">): Promise<UnburyOutcome[]>;

  /**
   * List recorded graves under the current directory or the whole graveyard
   */
  seance(options: Omit<SeanceOperation, "kind">): Promise<SeanceEntry[]>;

  /**
   * Erase the graveyard and its record after confirmation
   */
  decompose(): Promise<DecomposeOutcome>;

  /**
   * Dispatch a tagged operation
   */
  run(operation: Operation): Promise<OperationResult>;
}
