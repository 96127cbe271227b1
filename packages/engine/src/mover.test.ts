import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { execFile as execFileCallback } from "node:child_process";
import { lstat, mkdir, readFile, readlink, symlink, writeFile } from "node:fs/promises";
import { createServer, type Server } from "node:net";
import { join } from "node:path";
import { promisify } from "node:util";
import { createTempDir, removeDir, scriptedConfirm } from "@graveyard/testkit";
import { DELETED_MARKER, Mover } from "./mover.js";
import { IoFailureError, SpecialFileDeclinedError } from "./errors.js";
import { pathExists } from "./io.js";
import type { RenameFn } from "./types.js";

const execFile = promisify(execFileCallback);

function errnoError(code: string): Error {
  return Object.assign(new Error(`simulated ${code}`), { code });
}

/** Forces the copy path, as when the graveyard is on another filesystem */
const crossDevice: RenameFn = async () => {
  throw errnoError("EXDEV");
};

describe("Mover", () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await createTempDir();
  });

  afterEach(async () => {
    await removeDir(testDir);
  });

  describe("same filesystem", () => {
    it("should rename and create missing parents", async () => {
      const source = join(testDir, "notes.txt");
      const dest = join(testDir, "graveyard", "deep", "notes.txt");
      await writeFile(source, "hello");

      const mover = new Mover({ confirm: scriptedConfirm(false) });
      const report = await mover.relocate(source, dest);

      expect(report).toEqual({ method: "rename", discarded: [] });
      expect(await readFile(dest, "utf-8")).toBe("hello");
      expect(await pathExists(source)).toBe(false);
    });

    it("should report a failed rename with its phase", async () => {
      const source = join(testDir, "notes.txt");
      await writeFile(source, "hello");

      const mover = new Mover({
        confirm: scriptedConfirm(false),
        rename: async () => {
          throw errnoError("EACCES");
        },
      });

      const error = await mover.relocate(source, join(testDir, "dest")).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(IoFailureError);
      expect(error).toMatchObject({ phase: "rename", path: source });
      expect(await pathExists(source)).toBe(true);
    });
  });

  describe("across filesystems", () => {
    it("should copy a file and remove the source", async () => {
      const source = join(testDir, "notes.txt");
      const dest = join(testDir, "graveyard", "notes.txt");
      await writeFile(source, "hello");

      const mover = new Mover({ confirm: scriptedConfirm(false), rename: crossDevice });
      const report = await mover.relocate(source, dest);

      expect(report).toEqual({ method: "copy", discarded: [] });
      expect(await readFile(dest, "utf-8")).toBe("hello");
      expect(await pathExists(source)).toBe(false);
    });

    it("should copy a directory tree with nested and empty directories", async () => {
      const source = join(testDir, "project");
      await mkdir(join(source, "src", "lib"), { recursive: true });
      await mkdir(join(source, "empty"));
      await writeFile(join(source, "README"), "readme");
      await writeFile(join(source, "src", "lib", "a.ts"), "export {}");
      const dest = join(testDir, "graveyard", "project");

      const mover = new Mover({ confirm: scriptedConfirm(false), rename: crossDevice });
      await mover.relocate(source, dest);

      expect(await readFile(join(dest, "README"), "utf-8")).toBe("readme");
      expect(await readFile(join(dest, "src", "lib", "a.ts"), "utf-8")).toBe("export {}");
      expect((await lstat(join(dest, "empty"))).isDirectory()).toBe(true);
      expect(await pathExists(source)).toBe(false);
    });

    it("should recreate symlinks instead of following them", async () => {
      const source = join(testDir, "dir");
      await mkdir(source);
      await symlink("../elsewhere/target", join(source, "link"));
      const dest = join(testDir, "graveyard", "dir");

      const mover = new Mover({ confirm: scriptedConfirm(false), rename: crossDevice });
      await mover.relocate(source, dest);

      const linkStats = await lstat(join(dest, "link"));
      expect(linkStats.isSymbolicLink()).toBe(true);
      expect(await readlink(join(dest, "link"))).toBe("../elsewhere/target");
    });

    it("should recreate a named pipe", async () => {
      const source = join(testDir, "pipe");
      await execFile("mkfifo", ["-m", "640", source]);
      const dest = join(testDir, "graveyard", "pipe");

      const mover = new Mover({ confirm: scriptedConfirm(false), rename: crossDevice });
      await mover.relocate(source, dest);

      const stats = await lstat(dest);
      expect(stats.isFIFO()).toBe(true);
      expect(stats.mode & 0o777).toBe(0o640);
      expect(await pathExists(source)).toBe(false);
    });

    describe("special files", () => {
      let server: Server;
      let socketPath: string;

      beforeEach(async () => {
        socketPath = join(testDir, "sock");
        server = createServer();
        await new Promise<void>((resolve) => server.listen(socketPath, resolve));
      });

      afterEach(async () => {
        await new Promise<void>((resolve) => server.close(() => resolve()));
      });

      it("should fail without touching the source when deletion is declined", async () => {
        const confirm = scriptedConfirm(false);
        const mover = new Mover({ confirm, rename: crossDevice });

        await expect(mover.relocate(socketPath, join(testDir, "graveyard", "sock"))).rejects.toThrow(
          SpecialFileDeclinedError
        );
        expect(confirm.prompts).toEqual([
          `Non-regular file or directory: ${socketPath}. Permanently delete the file?`,
        ]);
        expect(await pathExists(socketPath)).toBe(true);
      });

      it("should leave a marker when deletion is accepted", async () => {
        const dest = join(testDir, "graveyard", "sock");
        const mover = new Mover({ confirm: scriptedConfirm(true), rename: crossDevice });

        const report = await mover.relocate(socketPath, dest);

        expect(report).toEqual({ method: "copy", discarded: [socketPath] });
        expect(await readFile(dest, "utf-8")).toBe(DELETED_MARKER);
        expect(await pathExists(socketPath)).toBe(false);
      });
    });

    describe("big files", () => {
      it("should discard a big file when the user prefers deletion", async () => {
        const source = join(testDir, "video.bin");
        await writeFile(source, "0123456789");
        const dest = join(testDir, "graveyard", "video.bin");
        const confirm = scriptedConfirm(true);

        const mover = new Mover({ confirm, bigFileThreshold: 4, rename: crossDevice });
        const report = await mover.relocate(source, dest);

        expect(confirm.prompts).toEqual([
          `About to copy a big file (${source} is 10.00 B). Permanently delete this file instead?`,
        ]);
        expect(report).toEqual({ method: "copy", discarded: [source] });
        expect(await pathExists(dest)).toBe(false);
        expect(await pathExists(source)).toBe(false);
      });

      it("should copy a big file when the user declines deletion", async () => {
        const source = join(testDir, "video.bin");
        await writeFile(source, "0123456789");
        const dest = join(testDir, "graveyard", "video.bin");

        const mover = new Mover({
          confirm: scriptedConfirm(false),
          bigFileThreshold: 4,
          rename: crossDevice,
        });
        const report = await mover.relocate(source, dest);

        expect(report).toEqual({ method: "copy", discarded: [] });
        expect(await readFile(dest, "utf-8")).toBe("0123456789");
      });

      it("should not ask about files at or under the threshold", async () => {
        const source = join(testDir, "small.txt");
        await writeFile(source, "1234");
        const confirm = scriptedConfirm(true);

        const mover = new Mover({ confirm, bigFileThreshold: 4, rename: crossDevice });
        await mover.relocate(source, join(testDir, "graveyard", "small.txt"));

        expect(confirm.prompts).toEqual([]);
      });
    });
  });
});
