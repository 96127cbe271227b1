/**
 * Interactive yes/no confirmation on the terminal
 */

import { createInterface } from "node:readline/promises";
import type { Confirm } from "@graveyard/engine";

/**
 * True when the answer starts with y or Y
 */
export function isAffirmative(answer: string): boolean {
  return /^y/i.test(answer.trim());
}

/**
 * Confirm that asks on stdin, writing the prompt to stderr
 * A closed stdin answers no
 */
export function terminalConfirm(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stderr
): Confirm {
  return async (message: string): Promise<boolean> => {
    const rl = createInterface({ input, output });
    let closed = false;
    const ended = new Promise<string>((resolve) =>
      rl.once("close", () => {
        closed = true;
        resolve("");
      })
    );
    const asked = rl.question(`${message} [y/N] `).catch((err: unknown) => {
      if (closed) {
        return "";
      }
      throw err;
    });

    try {
      return isAffirmative(await Promise.race([asked, ended]));
    } finally {
      rl.close();
    }
  };
}
