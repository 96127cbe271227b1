/**
 * rip command-line program
 *
 * Builds the tagged operation from flags, runs it against the graveyard and
 * renders the outcomes. Everything process-bound comes in through a CliRuntime,
 * so tests drive the whole program in-process.
 */

import { Command, CommanderError } from "commander";
import { DEFAULT_MAX_DEPTH, NotFoundError, openGraveyard } from "@graveyard/engine";
import type { Confirm, GraveyardError, Operation, OperationResult } from "@graveyard/engine";
import { parseColorMode, parseNonNegativeInt } from "./lib/arg.js";
import { resolveGraveyard } from "./lib/env.js";
import { CliError, EXIT_NOT_FOUND, EXIT_USAGE, formatCliError, mapErrorToExitCode } from "./lib/errors.js";
import { isStdoutTTY, writeStderr, writeStdout } from "./lib/io.js";
import { terminalConfirm } from "./lib/prompt.js";
import {
  colorEnabled,
  renderBury,
  renderDecompose,
  renderSeance,
  renderUnbury,
  type ColorMode,
  type Rendered,
  type RenderOptions,
} from "./lib/render.js";
import { withTiming } from "./lib/telemetry.js";

export const VERSION = "0.1.0";

/**
 * Process-bound collaborators of the CLI
 */
export interface CliRuntime {
  cwd: string;
  env: NodeJS.ProcessEnv;
  stdout: (content: string) => void;
  stderr: (content: string) => void;
  /** Whether stdout is a terminal, for --color auto */
  isTTY: boolean;
  confirm: Confirm;
}

/**
 * Parsed rip flags
 */
export type RipOptions = {
  graveyard?: string;
  decompose?: boolean;
  seance?: boolean;
  unbury?: boolean;
  inspect?: boolean;
  all?: boolean;
  local?: boolean;
  maxDepth: number;
  fullPath?: boolean;
  plain?: boolean;
  verbose?: boolean;
  color: ColorMode;
};

export function processRuntime(): CliRuntime {
  return {
    cwd: process.cwd(),
    env: process.env,
    stdout: writeStdout,
    stderr: writeStderr,
    isTTY: isStdoutTTY(),
    confirm: terminalConfirm(),
  };
}

/**
 * Turn flags into an operation
 * Precedence when several modes are given: unbury, seance, decompose, bury
 * @returns null when there is nothing to do and help should be shown
 */
export function buildOperation(targets: string[], opts: RipOptions): Operation | null {
  if (opts.all && !opts.seance) {
    throw new CliError("--all requires --seance", { exitCode: EXIT_USAGE });
  }
  if (opts.local && !opts.unbury) {
    throw new CliError("--local requires --unbury", { exitCode: EXIT_USAGE });
  }

  if (opts.unbury) {
    return {
      kind: "unbury",
      targets,
      local: opts.local ?? false,
      seance: opts.seance ?? false,
      maxDepth: opts.maxDepth,
    };
  }
  if (opts.seance) {
    return { kind: "seance", showAll: opts.all ?? false, plain: opts.plain ?? false };
  }
  if (opts.decompose) {
    return { kind: "decompose" };
  }
  if (targets.length === 0) {
    return null;
  }
  return { kind: "bury", targets, inspect: opts.inspect ?? false };
}

/**
 * Exit code for a finished operation: 0, 2 when every failure is a missing target, else 1
 */
export function exitCodeFor(result: OperationResult): number {
  const errors: GraveyardError[] = [];
  let unrecorded = false;

  if (result.kind === "bury") {
    for (const outcome of result.outcomes) {
      if (outcome.kind === "failed") errors.push(outcome.error);
    }
  } else if (result.kind === "unbury") {
    for (const outcome of result.outcomes) {
      if (outcome.kind === "failed") errors.push(outcome.error);
      if (outcome.kind === "unrecorded") unrecorded = true;
    }
  }

  if (errors.length === 0) {
    return unrecorded ? 1 : 0;
  }
  return !unrecorded && errors.every((error) => error instanceof NotFoundError) ? EXIT_NOT_FOUND : 1;
}

function render(result: OperationResult, options: RenderOptions & { plain: boolean }): Rendered {
  switch (result.kind) {
    case "bury":
      return renderBury(result.outcomes, options);
    case "unbury":
      return renderUnbury(result.outcomes, options);
    case "seance":
      return renderSeance(result.entries, options);
    case "decompose":
      return renderDecompose(result.outcome, options);
  }
}

/**
 * Build the commander program
 * @param onExit - Receives the exit code of a completed operation
 */
export function createProgram(runtime: CliRuntime, onExit: (code: number) => void): Command {
  const program = new Command();

  program
    .name("rip")
    .description("Remove files by sending them to a graveyard, from which they can be exhumed")
    .version(VERSION)
    .argument("[targets...]", "files and directories to bury, or graves and globs to unbury")
    .option("-G, --graveyard <path>", "directory where deleted files rest")
    .option("-d, --decompose", "permanently delete the graveyard")
    .option("-s, --seance", "list graves sent from the current directory")
    .option("-u, --unbury", "undo the last removal, or restore the given graves")
    .option("-i, --inspect", "show some info about each target before burying it")
    .option("-a, --all", "with --seance, list the whole graveyard")
    .option("-l, --local", "with --unbury, restrict to graves from the current directory")
    .option(
      "-m, --max-depth <n>",
      "maximum directory depth for glob matching",
      (value: string) => parseNonNegativeInt(value, "--max-depth"),
      DEFAULT_MAX_DEPTH
    )
    .option("-f, --full-path", "print grave paths in full")
    .option("-p, --plain", "print paths only, without index, time or type")
    .option("-v, --verbose", "print diagnostics")
    .option("--color <mode>", "auto, always or never", parseColorMode, "auto")
    .configureOutput({
      writeOut: runtime.stdout,
      writeErr: runtime.stderr,
    })
    .exitOverride()
    .action(async (targets: string[], _options: unknown, command: Command) => {
      const opts = command.opts<RipOptions>();
      const operation = buildOperation(targets, opts);

      if (operation === null) {
        program.outputHelp();
        onExit(0);
        return;
      }

      const root = resolveGraveyard(opts.graveyard, runtime.env, runtime.cwd);
      const graveyard = openGraveyard({
        root,
        cwd: runtime.cwd,
        confirm: runtime.confirm,
        verbose: opts.verbose === true || Boolean(runtime.env.GRAVEYARD_DEBUG),
      });

      const result = await withTiming(`cli.${operation.kind}`, () => graveyard.run(operation), {
        env: runtime.env,
        write: runtime.stderr,
      });

      const rendered = render(result, {
        root: graveyard.root,
        color: colorEnabled(opts.color, runtime.isTTY, runtime.env),
        fullPath: opts.fullPath ?? false,
        verbose: opts.verbose ?? false,
        plain: opts.plain ?? false,
      });
      for (const line of rendered.stdout) runtime.stdout(`${line}\n`);
      for (const line of rendered.stderr) runtime.stderr(`${line}\n`);

      onExit(exitCodeFor(result));
    });

  return program;
}

/**
 * Run rip with arguments (without the node and script entries)
 * @returns Process exit code
 */
export async function runCli(args: string[], runtime: CliRuntime = processRuntime()): Promise<number> {
  let exitCode = 0;
  const program = createProgram(runtime, (code) => {
    exitCode = code;
  });

  try {
    await program.parseAsync(args, { from: "user" });
    return exitCode;
  } catch (err) {
    // Commander has already printed its own usage errors
    if (!(err instanceof CommanderError)) {
      const verbose = program.opts<Partial<RipOptions>>().verbose ?? false;
      runtime.stderr(`Error: ${formatCliError(err, verbose)}\n`);
    }
    return mapErrorToExitCode(err);
  }
}
