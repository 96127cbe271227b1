/**
 * Seance: list recorded graves under a scope, in log order
 * Read-only: never prunes or rewrites the record
 */

import { lstatOrNull } from "../io.js";
import { gravePathFor, isUnder, originalPathFor } from "../paths.js";
import type { FileKind, GraveMetadata, SeanceEntry, SeanceOperation } from "../types.js";
import type { EngineContext } from "./context.js";

export type SeanceOptions = Omit<SeanceOperation, "kind">;

export async function seance(ctx: EngineContext, options: SeanceOptions): Promise<SeanceEntry[]> {
  const scope = options.showAll ? ctx.root : gravePathFor(ctx.root, ctx.cwd);
  const entries = (await ctx.record.scan()).filter((entry) => isUnder(entry.gravePath, scope));

  const listing: SeanceEntry[] = [];
  for (const [index, entry] of entries.entries()) {
    const relativePath = originalPathFor(ctx.root, entry.gravePath) ?? entry.gravePath;
    listing.push(
      options.plain
        ? { index, entry, relativePath }
        : { index, entry, relativePath, metadata: await graveMetadata(entry.gravePath) }
    );
  }

  return listing;
}

/**
 * File type and modification time of a grave, without following symlinks
 */
export async function graveMetadata(gravePath: string): Promise<GraveMetadata> {
  const stats = await lstatOrNull(gravePath);
  if (stats === null) {
    return { fileType: "missing", modified: null };
  }

  let fileType: FileKind = "other";
  if (stats.isFile()) {
    fileType = "file";
  } else if (stats.isDirectory()) {
    fileType = "dir";
  } else if (stats.isSymbolicLink()) {
    fileType = "symlink";
  }

  return { fileType, modified: stats.mtime };
}
