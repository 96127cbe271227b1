/**
 * Bury: move targets into the graveyard and record where they went
 */

import type { Stats } from "node:fs";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { IoFailureError, NotFoundError, isFatalError } from "../errors.js";
import { formatPreview, inspectPath } from "../inspect.js";
import { lstatOrNull, pathExists, removeTree } from "../io.js";
import { assertRecordable, isUnder, resolveGravePath } from "../paths.js";
import type { BuryOutcome, MoveReport } from "../types.js";
import {
  leftPartialDestination,
  removePartial,
  toGraveyardError,
  type EngineContext,
} from "./context.js";

export interface BuryOptions {
  /** Preview each target and ask before burying it */
  inspect?: boolean;
}

/**
 * Bury each target in turn
 * A failing target becomes a `failed` outcome; record-level failures abort the batch
 */
export async function bury(
  ctx: EngineContext,
  targets: string[],
  options: BuryOptions = {}
): Promise<BuryOutcome[]> {
  const outcomes: BuryOutcome[] = [];

  for (const target of targets) {
    try {
      outcomes.push(await buryOne(ctx, target, options));
    } catch (err) {
      if (isFatalError(err)) {
        throw err;
      }
      const error = toGraveyardError(err, target);
      ctx.logger.debug("bury.failed", { path: target, message: error.message });
      outcomes.push({ kind: "failed", target, error });
    }
  }

  return outcomes;
}

async function buryOne(
  ctx: EngineContext,
  target: string,
  options: BuryOptions
): Promise<BuryOutcome> {
  const absolute = path.resolve(ctx.cwd, target);
  const stats = await lstatOrNull(absolute);
  if (stats === null) {
    throw new NotFoundError(target);
  }

  const source = await canonicalSource(absolute, stats);
  ctx.logger.debug("bury.resolve", { path: source, details: { target } });

  if (options.inspect) {
    const preview = await inspectPath(source, stats);
    const accepted = await ctx.confirm(
      `${formatPreview(target, preview)}\nSend ${target} to the graveyard?`
    );
    if (!accepted) {
      return { kind: "skipped", source, reason: "inspection-declined" };
    }
  }

  if (isUnder(source, ctx.root)) {
    return deleteFromGraveyard(ctx, source);
  }

  assertRecordable(source);
  const grave = await resolveGravePath(ctx.root, source);
  assertRecordable(grave);
  ctx.logger.debug("bury.grave", { path: grave, details: { source } });

  let report: MoveReport;
  try {
    report = await ctx.mover.relocate(source, grave);
  } catch (err) {
    if (leftPartialDestination(err)) {
      await removePartial(ctx, grave);
    } else {
      // The grave is complete; keep it reachable before reporting the failure
      await ctx.record.append(source, grave);
    }
    throw err;
  }

  if (!(await pathExists(grave))) {
    // A large file deleted instead of copied leaves nothing to record
    return { kind: "discarded", source };
  }

  const entry = await ctx.record.append(source, grave);
  return {
    kind: "buried",
    source,
    grave,
    entry,
    method: report.method,
    discarded: report.discarded,
  };
}

/**
 * A target already inside the graveyard is permanently deleted instead, after confirmation
 */
async function deleteFromGraveyard(ctx: EngineContext, source: string): Promise<BuryOutcome> {
  const accepted = await ctx.confirm(
    `${source} is already in the graveyard. Permanently unlink it?`
  );
  if (!accepted) {
    return { kind: "skipped", source, reason: "delete-declined" };
  }

  try {
    await removeTree(source);
  } catch (err) {
    throw new IoFailureError(source, "delete", { cause: err });
  }
  await ctx.record.remove([source]);

  return { kind: "deleted", source };
}

/**
 * Canonicalize the target unless it is a symlink, which is buried itself
 */
async function canonicalSource(absolute: string, stats: Stats): Promise<string> {
  if (stats.isSymbolicLink()) {
    return absolute;
  }
  try {
    return await fs.realpath(absolute);
  } catch (err) {
    throw new IoFailureError(absolute, "resolve", { cause: err });
  }
}
