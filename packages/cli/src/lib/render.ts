/**
 * Output rendering helpers
 *
 * Renderers are pure: they return the lines for each stream and leave writing to the caller.
 */

import { isUnder } from "@graveyard/engine";
import type { BuryOutcome, DecomposeOutcome, SeanceEntry, UnburyOutcome } from "@graveyard/engine";

type Color = "red" | "green" | "yellow" | "magenta";

export type ColorMode = "auto" | "always" | "never";

export interface RenderOptions {
  /** Graveyard root, shown as $GRAVEYARD */
  root: string;
  /** Apply ANSI colors */
  color: boolean;
  /** Show grave paths instead of original-relative ones */
  fullPath: boolean;
  verbose: boolean;
}

/**
 * Lines destined for each output stream
 */
export interface Rendered {
  stdout: string[];
  stderr: string[];
}

/**
 * Decide whether to color output
 * `auto` colors a TTY unless NO_COLOR is set
 */
export function colorEnabled(mode: ColorMode, isTTY: boolean, env: NodeJS.ProcessEnv): boolean {
  if (mode === "never") {
    return false;
  }
  if (mode === "always") {
    return true;
  }
  return isTTY && !env.NO_COLOR;
}

/**
 * Apply ANSI color when enabled
 */
export function colorize(text: string, color: Color, enabled: boolean): string {
  if (!enabled) {
    return text;
  }

  const codes: Record<Color, string> = {
    red: "\x1b[31m",
    green: "\x1b[32m",
    yellow: "\x1b[33m",
    magenta: "\x1b[35m",
  };

  const reset = "\x1b[0m";
  return `${codes[color]}${text}${reset}`;
}

/**
 * Replace the graveyard root with the variable name, since it is usually long
 */
export function shortenGrave(grave: string, root: string): string {
  if (!isUnder(grave, root)) {
    return grave;
  }
  return `$GRAVEYARD${grave.slice(root.length)}`;
}

/**
 * Local time as `YYYY-MM-DD HH:MM:SS`, or N/A
 */
export function formatModified(date: Date | null): string {
  if (date === null) {
    return "N/A";
  }
  const pad = (n: number) => String(n).padStart(2, "0");
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

export function renderBury(outcomes: BuryOutcome[], options: RenderOptions): Rendered {
  const rendered: Rendered = { stdout: [], stderr: [] };
  const paint = (text: string, color: Color) => colorize(text, color, options.color);

  for (const outcome of outcomes) {
    switch (outcome.kind) {
      case "buried":
        if (options.verbose) {
          rendered.stdout.push(
            `Buried ${paint(outcome.source, "red")} at ${paint(shortenGrave(outcome.grave, options.root), "magenta")}`
          );
        }
        for (const discarded of outcome.discarded) {
          rendered.stdout.push(`Permanently deleted ${paint(discarded, "red")}`);
        }
        break;
      case "discarded":
      case "deleted":
        rendered.stdout.push(`Permanently deleted ${paint(outcome.source, "red")}`);
        break;
      case "skipped":
        rendered.stdout.push(`Skipping ${paint(outcome.source, "magenta")}`);
        break;
      case "failed":
        rendered.stderr.push(`Error: ${outcome.error.message}`);
        break;
    }
  }

  return rendered;
}

export function renderUnbury(outcomes: UnburyOutcome[], options: RenderOptions): Rendered {
  const rendered: Rendered = { stdout: [], stderr: [] };
  const paint = (text: string, color: Color) => colorize(text, color, options.color);

  if (outcomes.length === 0) {
    rendered.stderr.push("No graves to unbury");
    return rendered;
  }

  for (const outcome of outcomes) {
    switch (outcome.kind) {
      case "restored":
        rendered.stdout.push(
          options.fullPath
            ? `Returned ${paint(shortenGrave(outcome.grave, options.root), "magenta")} to ${paint(outcome.destination, "red")}`
            : `Returned ${paint(outcome.destination, "red")}`
        );
        break;
      case "unrecorded":
        rendered.stderr.push(`Error: No record of ${outcome.grave}`);
        break;
      case "failed":
        rendered.stderr.push(`Error: ${outcome.error.message}`);
        break;
    }
  }

  return rendered;
}

/**
 * Seance table: `index  modified  type  path`, columns aligned; plain prints paths only
 */
export function renderSeance(
  entries: SeanceEntry[],
  options: RenderOptions & { plain: boolean }
): Rendered {
  const paths = entries.map((entry) =>
    options.fullPath ? entry.entry.gravePath : entry.relativePath
  );

  if (options.plain) {
    return { stdout: paths.map((p) => colorize(p, "yellow", options.color)), stderr: [] };
  }

  const rows = entries.map((entry, i) => [
    String(entry.index),
    formatModified(entry.metadata?.modified ?? null),
    entry.metadata?.fileType ?? "",
    paths[i] ?? "",
  ]);
  const colors: Color[] = ["green", "magenta", "red", "yellow"];
  const widths = [0, 1, 2].map((col) => Math.max(0, ...rows.map((row) => (row[col] ?? "").length)));

  const stdout = rows.map((row) =>
    row
      .map((cell, col) => {
        const width = widths[col];
        const padded = width === undefined ? cell : cell.padEnd(width);
        return colorize(padded, colors[col] ?? "yellow", options.color);
      })
      .join("  ")
  );

  return { stdout, stderr: [] };
}

export function renderDecompose(outcome: DecomposeOutcome, options: RenderOptions): Rendered {
  const rendered: Rendered = { stdout: [], stderr: [] };
  if (outcome.kind === "declined" || !options.verbose) {
    return rendered;
  }

  for (const { entry, fileType } of outcome.erased) {
    rendered.stdout.push(
      `Erased ${colorize(shortenGrave(entry.gravePath, options.root), "magenta", options.color)} (${fileType})`
    );
  }
  rendered.stdout.push(`Decomposed ${outcome.root}`);
  return rendered;
}
