/**
 * Collaborators shared by the operation orchestrators
 */

import type { Mover } from "../mover.js";
import type { Logger } from "../observability/logs.js";
import type { RecordStore } from "../record.js";
import type { Confirm } from "../types.js";
import { GraveyardError, IoFailureError } from "../errors.js";
import { removeTree } from "../io.js";

export interface EngineContext {
  /** Canonical graveyard root */
  root: string;
  /** Absolute directory for relative targets and local scope */
  cwd: string;
  record: RecordStore;
  mover: Mover;
  confirm: Confirm;
  logger: Logger;
}

/**
 * Wrap anything thrown by a step into a graveyard error naming the path
 */
export function toGraveyardError(err: unknown, filePath: string): GraveyardError {
  if (err instanceof GraveyardError) {
    return err;
  }
  return new IoFailureError(filePath, "resolve", { cause: err });
}

/**
 * A mover failure outside `remove-source` leaves an incomplete destination
 */
export function leftPartialDestination(err: unknown): boolean {
  return !(err instanceof IoFailureError && err.phase === "remove-source");
}

/**
 * Remove a half-written destination after a failed move
 * A failed cleanup is logged; the move error is what gets reported
 */
export async function removePartial(ctx: EngineContext, dest: string): Promise<void> {
  try {
    await removeTree(dest, true);
    ctx.logger.debug("cleanup.partial", { path: dest });
  } catch (err) {
    ctx.logger.warn("cleanup.failed", {
      path: dest,
      message: err instanceof Error ? err.message : String(err),
    });
  }
}
