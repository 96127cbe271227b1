/**
 * In-process CLI harness
 */

import { scriptedConfirm, type ScriptedConfirm } from "@graveyard/testkit";
import { runCli, type CliRuntime } from "../src/program.js";

/**
 * Result of a CLI run
 */
export interface CliResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export interface RunOptions {
  cwd: string;
  env?: NodeJS.ProcessEnv;
  confirm?: ScriptedConfirm;
}

/**
 * Run rip in-process with captured output
 */
export async function rip(args: string[], options: RunOptions): Promise<CliResult> {
  let stdout = "";
  let stderr = "";

  const runtime: CliRuntime = {
    cwd: options.cwd,
    env: options.env ?? {},
    stdout: (content) => {
      stdout += content;
    },
    stderr: (content) => {
      stderr += content;
    },
    isTTY: false,
    confirm: options.confirm ?? scriptedConfirm(false),
  };

  const exitCode = await runCli(args, runtime);
  return { stdout, stderr, exitCode };
}
