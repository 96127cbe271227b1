/**
 * Graveyard engine facade
 */

import * as fsSync from "node:fs";
import * as path from "node:path";
import { errnoCode } from "./errors.js";
import { FileLock } from "./lock.js";
import { Mover } from "./mover.js";
import { Logger } from "./observability/logs.js";
import { RECORD_FILE, RecordStore } from "./record.js";
import type {
  BuryOutcome,
  DecomposeOutcome,
  Graveyard,
  GraveyardOptions,
  Operation,
  OperationResult,
  SeanceEntry,
  UnburyOutcome,
} from "./types.js";
import type { EngineContext } from "./ops/context.js";
import { bury } from "./ops/bury.js";
import { decompose } from "./ops/decompose.js";
import { seance, type SeanceOptions } from "./ops/seance.js";
import { unbury, type UnburyOptions } from "./ops/unbury.js";

/**
 * Graveyard engine with a record log at `<root>/.record`
 *
 * Mutating operations (bury, unbury, decompose) hold an advisory lock on the
 * graveyard for their whole duration; seance reads without it.
 *
 * @example
 * ```typescript
 * const graveyard = openGraveyard({ root: "/tmp/graveyard-alice", confirm });
 *
 * await graveyard.bury(["notes.txt"]);
 * await graveyard.unbury({ targets: [], local: false, seance: false, maxDepth: 10 });
 * ```
 */
class FileGraveyard implements Graveyard {
  #ctx: EngineContext;
  #lock: FileLock;

  constructor(options: GraveyardOptions) {
    const root = canonicalize(options.root);
    const logger = new Logger({ verbose: options.verbose });

    this.#ctx = {
      root,
      cwd: canonicalize(options.cwd ?? process.cwd()),
      record: new RecordStore(path.join(root, RECORD_FILE), { logger }),
      mover: new Mover({
        confirm: options.confirm,
        logger,
        bigFileThreshold: options.bigFileThreshold,
        rename: options.rename,
      }),
      confirm: options.confirm,
      logger,
    };
    this.#lock = new FileLock(root, { timeoutMs: options.lockTimeoutMs, logger });
  }

  get root(): string {
    return this.#ctx.root;
  }

  get recordPath(): string {
    return this.#ctx.record.path;
  }

  async bury(targets: string[], options: { inspect?: boolean } = {}): Promise<BuryOutcome[]> {
    return this.#lock.withLock(() => bury(this.#ctx, targets, options));
  }

  async unbury(options: UnburyOptions): Promise<UnburyOutcome[]> {
    return this.#lock.withLock(() => unbury(this.#ctx, options));
  }

  async seance(options: SeanceOptions): Promise<SeanceEntry[]> {
    return seance(this.#ctx, options);
  }

  async decompose(): Promise<DecomposeOutcome> {
    return this.#lock.withLock(() => decompose(this.#ctx));
  }

  async run(operation: Operation): Promise<OperationResult> {
    switch (operation.kind) {
      case "bury":
        return {
          kind: "bury",
          outcomes: await this.bury(operation.targets, { inspect: operation.inspect }),
        };
      case "unbury":
        return {
          kind: "unbury",
          outcomes: await this.unbury({
            targets: operation.targets,
            local: operation.local,
            seance: operation.seance,
            maxDepth: operation.maxDepth,
          }),
        };
      case "seance":
        return {
          kind: "seance",
          entries: await this.seance({ showAll: operation.showAll, plain: operation.plain }),
        };
      case "decompose":
        return { kind: "decompose", outcome: await this.decompose() };
    }
  }
}

/**
 * Resolve a directory and follow symlinks when it exists, so prefix checks see real paths
 */
function canonicalize(dir: string): string {
  const resolved = path.resolve(dir);
  try {
    return fsSync.realpathSync(resolved);
  } catch (err) {
    if (errnoCode(err) !== "ENOENT") {
      throw err;
    }
    // Doesn't exist yet - use resolved path
    return resolved;
  }
}

/**
 * Open a graveyard
 */
export function openGraveyard(options: GraveyardOptions): Graveyard {
  return new FileGraveyard(options);
}
