/**
 * Unit tests for argument parsing
 */

import { describe, it, expect } from "vitest";
import { InvalidArgumentError } from "commander";
import { parseColorMode, parseNonNegativeInt } from "../src/lib/arg.js";

describe("arg parsing", () => {
  describe("parseNonNegativeInt", () => {
    it("should parse valid integers", () => {
      expect(parseNonNegativeInt("0", "--max-depth")).toBe(0);
      expect(parseNonNegativeInt(" 10 ", "--max-depth")).toBe(10);
      expect(parseNonNegativeInt("10000", "--max-depth")).toBe(10000);
    });

    it("should reject negative numbers and junk", () => {
      expect(() => parseNonNegativeInt("-1", "--max-depth")).toThrow(InvalidArgumentError);
      expect(() => parseNonNegativeInt("deep", "--max-depth")).toThrow(
        "--max-depth must be a non-negative integer"
      );
      expect(() => parseNonNegativeInt("1.5", "--max-depth")).toThrow(InvalidArgumentError);
    });

    it("should reject values > 10000", () => {
      expect(() => parseNonNegativeInt("10001", "--max-depth")).toThrow("--max-depth must be <= 10000");
    });
  });

  describe("parseColorMode", () => {
    it("should accept the three modes in any case", () => {
      expect(parseColorMode("auto")).toBe("auto");
      expect(parseColorMode("ALWAYS")).toBe("always");
      expect(parseColorMode("never")).toBe("never");
    });

    it("should reject anything else", () => {
      expect(() => parseColorMode("sometimes")).toThrow("--color must be one of auto, always, never");
    });
  });
});
