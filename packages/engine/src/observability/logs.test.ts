import { describe, it, expect } from "vitest";
import { Logger } from "./logs.js";

describe("Logger", () => {
  it("should drop debug lines unless verbose", () => {
    const lines: string[] = [];
    const logger = new Logger({ verbose: false, write: (line) => lines.push(line) });

    logger.debug("bury.resolve", { path: "/home/u/a.txt" });

    expect(lines).toEqual([]);
  });

  it("should format level, event, path, message and details", () => {
    const lines: string[] = [];
    const logger = new Logger({ verbose: true, write: (line) => lines.push(line) });

    logger.warn("cleanup.failed", { path: "/g/a", message: "busy", details: { attempt: 1 } });

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(/^\[\d{4}-\d{2}-\d{2}T[\d:.]+Z\] \[WARN\] \[cleanup\.failed\] \/g\/a busy \{"attempt":1\}$/);
  });

  it("should stay silent when disabled", () => {
    const lines: string[] = [];
    const logger = new Logger({ verbose: true, write: (line) => lines.push(line) });

    logger.setEnabled(false);
    logger.error("record.append", { message: "disk full" });

    expect(lines).toEqual([]);
    expect(logger.verbose).toBe(true);
  });
});
