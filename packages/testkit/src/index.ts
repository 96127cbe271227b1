/**
 * Test helpers for the graveyard packages
 */

export { createTempDir, removeDir, withTempGraveyard } from "./fs.js";
export type { Sandbox } from "./fs.js";
export { scriptedConfirm } from "./prompt.js";
export type { ScriptedConfirm } from "./prompt.js";
