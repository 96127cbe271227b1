/**
 * Unit tests for terminal confirmation
 */

import { describe, it, expect } from "vitest";
import { PassThrough } from "node:stream";
import { isAffirmative, terminalConfirm } from "../src/lib/prompt.js";

describe("prompt", () => {
  describe("isAffirmative", () => {
    it("should accept answers starting with y", () => {
      expect(isAffirmative("y")).toBe(true);
      expect(isAffirmative("Yes")).toBe(true);
      expect(isAffirmative("  y\n")).toBe(true);
    });

    it("should refuse everything else", () => {
      expect(isAffirmative("")).toBe(false);
      expect(isAffirmative("n")).toBe(false);
      expect(isAffirmative("sure")).toBe(false);
    });
  });

  describe("terminalConfirm", () => {
    it("should ask with a y/N hint and read the answer", async () => {
      const input = new PassThrough();
      const output = new PassThrough();
      let written = "";
      output.on("data", (chunk: Buffer) => {
        written += chunk.toString();
      });

      const answer = terminalConfirm(input, output)("Really unlink the entire graveyard?");
      input.write("y\n");

      expect(await answer).toBe(true);
      expect(written).toBe("Really unlink the entire graveyard? [y/N] ");
    });

    it("should answer no when input ends", async () => {
      const input = new PassThrough();
      const output = new PassThrough();

      const answer = terminalConfirm(input, output)("Permanently unlink it?");
      input.end();

      expect(await answer).toBe(false);
    });
  });
});
