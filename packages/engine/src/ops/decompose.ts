/**
 * Decompose: permanently erase the whole graveyard, record included
 */

import { IoFailureError } from "../errors.js";
import { removeTree } from "../io.js";
import type { DecomposeOutcome, FileKind, RecordEntry } from "../types.js";
import type { EngineContext } from "./context.js";
import { graveMetadata } from "./seance.js";

export async function decompose(ctx: EngineContext): Promise<DecomposeOutcome> {
  if (!(await ctx.confirm("Really unlink the entire graveyard?"))) {
    return { kind: "declined" };
  }

  const erased: Array<{ entry: RecordEntry; fileType: FileKind }> = [];
  for (const entry of await ctx.record.scan()) {
    erased.push({ entry, fileType: (await graveMetadata(entry.gravePath)).fileType });
  }

  try {
    await removeTree(ctx.root, true);
  } catch (err) {
    throw new IoFailureError(ctx.root, "delete", { cause: err });
  }

  ctx.logger.debug("decompose.done", { path: ctx.root, details: { erased: erased.length } });
  return { kind: "decomposed", root: ctx.root, erased };
}
