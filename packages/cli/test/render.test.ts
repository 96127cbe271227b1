/**
 * Unit tests for output rendering
 */

import { describe, it, expect } from "vitest";
import { NotFoundError } from "@graveyard/engine";
import type { RecordEntry } from "@graveyard/engine";
import {
  colorEnabled,
  colorize,
  formatModified,
  renderBury,
  renderDecompose,
  renderSeance,
  renderUnbury,
  shortenGrave,
  type RenderOptions,
} from "../src/lib/render.js";

const options: RenderOptions = { root: "/g", color: false, fullPath: false, verbose: false };

function entryFor(name: string): RecordEntry {
  return { timestamp: "Sun Oct  4 09:05:00 2026", originalPath: `/home/u/${name}`, gravePath: `/g/home/u/${name}` };
}

describe("rendering", () => {
  describe("colors", () => {
    it("should wrap text in ANSI codes only when enabled", () => {
      expect(colorize("x", "red", true)).toBe("\x1b[31mx\x1b[0m");
      expect(colorize("x", "red", false)).toBe("x");
    });

    it("should follow the color mode", () => {
      expect(colorEnabled("always", false, {})).toBe(true);
      expect(colorEnabled("never", true, {})).toBe(false);
      expect(colorEnabled("auto", true, {})).toBe(true);
      expect(colorEnabled("auto", false, {})).toBe(false);
      expect(colorEnabled("auto", true, { NO_COLOR: "1" })).toBe(false);
    });
  });

  describe("shortenGrave", () => {
    it("should replace the root with $GRAVEYARD", () => {
      expect(shortenGrave("/g/home/u/a.txt", "/g")).toBe("$GRAVEYARD/home/u/a.txt");
      expect(shortenGrave("/gone/a.txt", "/g")).toBe("/gone/a.txt");
    });
  });

  describe("formatModified", () => {
    it("should format local time", () => {
      expect(formatModified(new Date(2026, 9, 4, 9, 5, 0))).toBe("2026-10-04 09:05:00");
      expect(formatModified(null)).toBe("N/A");
    });
  });

  describe("renderBury", () => {
    it("should stay quiet on success unless verbose", () => {
      const outcome = {
        kind: "buried" as const,
        source: "/home/u/a.txt",
        grave: "/g/home/u/a.txt",
        entry: entryFor("a.txt"),
        method: "rename" as const,
        discarded: [],
      };

      expect(renderBury([outcome], options)).toEqual({ stdout: [], stderr: [] });
      expect(renderBury([outcome], { ...options, verbose: true }).stdout).toEqual([
        "Buried /home/u/a.txt at $GRAVEYARD/home/u/a.txt",
      ]);
    });

    it("should report skips, deletions and failures", () => {
      const rendered = renderBury(
        [
          { kind: "skipped", source: "/home/u/a.txt", reason: "inspection-declined" },
          { kind: "deleted", source: "/g/home/u/b.txt" },
          { kind: "failed", target: "missing.txt", error: new NotFoundError("missing.txt") },
        ],
        options
      );

      expect(rendered).toEqual({
        stdout: ["Skipping /home/u/a.txt", "Permanently deleted /g/home/u/b.txt"],
        stderr: ["Error: Cannot remove missing.txt: no such file or directory"],
      });
    });
  });

  describe("renderUnbury", () => {
    const restored = {
      kind: "restored" as const,
      grave: "/g/home/u/a.txt",
      destination: "/home/u/a.txt",
      entry: entryFor("a.txt"),
      renamed: false,
      method: "rename" as const,
    };

    it("should print the restored path", () => {
      expect(renderUnbury([restored], options).stdout).toEqual(["Returned /home/u/a.txt"]);
    });

    it("should print the grave too with full paths", () => {
      expect(renderUnbury([restored], { ...options, fullPath: true }).stdout).toEqual([
        "Returned $GRAVEYARD/home/u/a.txt to /home/u/a.txt",
      ]);
    });

    it("should complain when there was nothing to restore", () => {
      expect(renderUnbury([], options)).toEqual({ stdout: [], stderr: ["No graves to unbury"] });
    });

    it("should report unrecorded graves", () => {
      expect(renderUnbury([{ kind: "unrecorded", grave: "/g/x" }], options).stderr).toEqual([
        "Error: No record of /g/x",
      ]);
    });
  });

  describe("renderSeance", () => {
    const entries = [
      {
        index: 0,
        entry: entryFor("a.txt"),
        relativePath: "/home/u/a.txt",
        metadata: { fileType: "file" as const, modified: new Date(2026, 9, 4, 9, 5, 0) },
      },
      {
        index: 1,
        entry: entryFor("old"),
        relativePath: "/home/u/old",
        metadata: { fileType: "missing" as const, modified: null },
      },
    ];

    it("should align the table columns", () => {
      expect(renderSeance(entries, { ...options, plain: false }).stdout).toEqual([
        `0  2026-10-04 09:05:00  file     /home/u/a.txt`,
        `1  N/A${" ".repeat(18)}missing  /home/u/old`,
      ]);
    });

    it("should print only paths when plain", () => {
      expect(renderSeance(entries, { ...options, plain: true }).stdout).toEqual([
        "/home/u/a.txt",
        "/home/u/old",
      ]);
    });

    it("should print grave paths with full paths", () => {
      expect(renderSeance(entries, { ...options, plain: true, fullPath: true }).stdout).toEqual([
        "/g/home/u/a.txt",
        "/g/home/u/old",
      ]);
    });
  });

  describe("renderDecompose", () => {
    it("should list erased graves when verbose", () => {
      const outcome = {
        kind: "decomposed" as const,
        root: "/g",
        erased: [{ entry: entryFor("a.txt"), fileType: "file" as const }],
      };

      expect(renderDecompose(outcome, options).stdout).toEqual([]);
      expect(renderDecompose(outcome, { ...options, verbose: true }).stdout).toEqual([
        "Erased $GRAVEYARD/home/u/a.txt (file)",
        "Decomposed /g",
      ]);
    });
  });
});
