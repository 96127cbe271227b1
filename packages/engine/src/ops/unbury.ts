/**
 * Unbury: restore graves to the paths they were buried from
 *
 * Candidate graves are the union of, in order:
 * 1. explicit targets (a path already under the root, else joined under the root,
 *    or under root+cwd when local)
 * 2. glob expansions for targets with glob syntax
 * 3. every grave under root+cwd when `seance` is set
 * 4. if still empty, the most recent surviving bury, local or global
 */

import * as path from "node:path";
import { isFatalError } from "../errors.js";
import { expandGlob, isGlobPattern } from "../glob.js";
import { pathExists } from "../io.js";
import { gravePathFor, isUnder, resolveConflict } from "../paths.js";
import type { MoveReport, RecordEntry, UnburyOperation, UnburyOutcome } from "../types.js";
import {
  leftPartialDestination,
  removePartial,
  toGraveyardError,
  type EngineContext,
} from "./context.js";

export type UnburyOptions = Omit<UnburyOperation, "kind">;

/** Max depth for globbing; graveyards under $XDG_DATA_HOME are already deep */
export const DEFAULT_MAX_DEPTH = 10;

/**
 * Restore the selected graves and drop their record lines
 */
export async function unbury(ctx: EngineContext, options: UnburyOptions): Promise<UnburyOutcome[]> {
  const { explicit, candidates } = await collectCandidates(ctx, options);
  ctx.logger.debug("unbury.candidates", { details: { candidates: [...candidates] } });

  const entries = await ctx.record.scan();
  const outcomes: UnburyOutcome[] = [];
  const exhumed = new Set<string>();
  const recorded = new Set<string>();

  for (const entry of entries) {
    if (!candidates.has(entry.gravePath) || recorded.has(entry.gravePath)) {
      continue;
    }
    recorded.add(entry.gravePath);

    try {
      const outcome = await restoreOne(ctx, entry, exhumed);
      outcomes.push(outcome);
    } catch (err) {
      if (isFatalError(err)) {
        throw err;
      }
      const error = toGraveyardError(err, entry.gravePath);
      ctx.logger.debug("unbury.failed", { path: entry.gravePath, message: error.message });
      outcomes.push({ kind: "failed", grave: entry.gravePath, error });
    }
  }

  for (const grave of explicit) {
    if (!recorded.has(grave)) {
      outcomes.push({ kind: "unrecorded", grave });
    }
  }

  await ctx.record.remove(exhumed);
  return outcomes;
}

async function restoreOne(
  ctx: EngineContext,
  entry: RecordEntry,
  exhumed: Set<string>
): Promise<UnburyOutcome> {
  const occupied = await pathExists(entry.originalPath);
  const destination = occupied ? await resolveConflict(entry.originalPath) : entry.originalPath;
  ctx.logger.debug("unbury.restore", { path: entry.gravePath, details: { destination } });

  let report: MoveReport;
  try {
    report = await ctx.mover.relocate(entry.gravePath, destination);
  } catch (err) {
    if (leftPartialDestination(err)) {
      await removePartial(ctx, destination);
    } else {
      // Restored in full; only the grave's removal failed
      exhumed.add(entry.gravePath);
    }
    throw err;
  }

  exhumed.add(entry.gravePath);
  return {
    kind: "restored",
    grave: entry.gravePath,
    destination,
    entry,
    renamed: occupied,
    method: report.method,
  };
}

async function collectCandidates(
  ctx: EngineContext,
  options: UnburyOptions
): Promise<{ explicit: string[]; candidates: Set<string> }> {
  const localRoot = gravePathFor(ctx.root, ctx.cwd);
  const explicit: string[] = [];
  const candidates = new Set<string>();

  for (const target of options.targets) {
    if (isGlobPattern(target)) {
      const base = options.local ? localRoot : ctx.root;
      for (const match of await expandGlob(target, base, options.maxDepth)) {
        candidates.add(match);
      }
    } else {
      const grave = resolveTarget(ctx.root, localRoot, target, options.local);
      explicit.push(grave);
      candidates.add(grave);
    }
  }

  if (options.seance) {
    for (const entry of await ctx.record.scan()) {
      if (isUnder(entry.gravePath, localRoot)) {
        candidates.add(entry.gravePath);
      }
    }
  }

  if (candidates.size === 0) {
    ctx.logger.debug("unbury.last", { message: options.local ? "locally" : "globally" });
    const latest = await ctx.record.findLatest(
      options.local ? (grave) => isUnder(grave, localRoot) : undefined
    );
    if (latest) {
      candidates.add(latest.gravePath);
    }
  }

  return { explicit, candidates };
}

/**
 * Map an explicit target to a grave path: explicit root prefix first, then join under the root
 * Trailing separators are dropped so `dir/` names the same grave as `dir`
 */
function resolveTarget(root: string, localRoot: string, target: string, local: boolean): string {
  if (local) {
    return path.resolve(localRoot, target);
  }
  if (path.isAbsolute(target) && isUnder(target, root)) {
    return path.resolve(target);
  }
  return path.resolve(gravePathFor(root, target));
}
