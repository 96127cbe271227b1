/**
 * Scripted confirmation for tests
 */

import type { Confirm } from "@graveyard/engine";

/**
 * A Confirm that answers from a script and remembers every prompt
 */
export interface ScriptedConfirm extends Confirm {
  /** Prompts received, in order */
  readonly prompts: string[];
}

/**
 * Build a confirm that replays answers in order
 * @param answers - One answer for every prompt, or a list consumed in order
 * @param fallback - Answer once the list is exhausted (default: false)
 */
export function scriptedConfirm(answers: boolean | boolean[], fallback = false): ScriptedConfirm {
  const queue = Array.isArray(answers) ? [...answers] : [];
  const prompts: string[] = [];

  const confirm = async (message: string): Promise<boolean> => {
    prompts.push(message);
    if (!Array.isArray(answers)) {
      return answers;
    }
    return queue.shift() ?? fallback;
  };

  return Object.assign(confirm, { prompts });
}
