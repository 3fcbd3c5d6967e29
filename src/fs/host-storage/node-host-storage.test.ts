import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { errnoCode } from "../errors.js";
import { NodeHostStorage } from "./node-host-storage.js";

describe("NodeHostStorage", () => {
  const storage = new NodeHostStorage();
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "node-host-storage-test-"));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it("should report node kinds without following symlinks", () => {
    fs.writeFileSync(path.join(tempDir, "f"), "x");
    fs.symlinkSync("missing-target", path.join(tempDir, "l"));
    expect(storage.kind(tempDir)).toBe("directory");
    expect(storage.kind(path.join(tempDir, "f"))).toBe("file");
    expect(storage.kind(path.join(tempDir, "l"))).toBe("symlink");
    expect(storage.kind(path.join(tempDir, "none"))).toBeNull();
    expect(storage.kind(path.join(tempDir, "f", "below"))).toBeNull();
  });

  it("should follow symlinks when checking for directories", () => {
    fs.mkdirSync(path.join(tempDir, "d"));
    fs.writeFileSync(path.join(tempDir, "f"), "x");
    fs.symlinkSync(path.join(tempDir, "d"), path.join(tempDir, "to-dir"));
    fs.symlinkSync(path.join(tempDir, "f"), path.join(tempDir, "to-file"));
    expect(storage.isDirectory(path.join(tempDir, "to-dir"))).toBe(true);
    expect(storage.isDirectory(path.join(tempDir, "to-file"))).toBe(false);
    expect(storage.isDirectory(path.join(tempDir, "none"))).toBe(false);
    expect(storage.isDirectory(path.join(tempDir, "f", "below"))).toBe(false);
  });

  it("should replace file content without leaving temp files", () => {
    const target = path.join(tempDir, "data.txt");
    storage.writeFile(target, new TextEncoder().encode("first"));
    storage.writeFile(target, new TextEncoder().encode("second"));
    expect(fs.readFileSync(target, "utf8")).toBe("second");
    expect(fs.readdirSync(tempDir)).toEqual(["data.txt"]);
  });

  it("should clean up the temp file when the write fails", () => {
    const target = path.join(tempDir, "dir");
    fs.mkdirSync(target);
    expect(() => storage.writeFile(target, new Uint8Array([1]))).toThrow();
    expect(fs.readdirSync(tempDir)).toEqual(["dir"]);
  });

  it("should append to files", () => {
    const target = path.join(tempDir, "log.txt");
    storage.writeFile(target, new TextEncoder().encode("a"));
    storage.appendFile(target, new TextEncoder().encode("b"));
    expect(new TextDecoder().decode(storage.readFile(target))).toBe("ab");
  });

  it("should read a symlink as its target path", () => {
    const link = path.join(tempDir, "link");
    fs.symlinkSync("some/target", link);
    expect(new TextDecoder().decode(storage.readFile(link))).toBe(
      "some/target",
    );
  });

  it("should only remove empty directories with removeDir", () => {
    const dir = path.join(tempDir, "d");
    storage.mkdir(dir);
    fs.writeFileSync(path.join(dir, "f"), "x");

    let code: string | undefined;
    try {
      storage.removeDir(dir);
    } catch (e) {
      code = errnoCode(e);
    }
    expect(code).toBe("ENOTEMPTY");

    storage.removeTree(dir);
    expect(fs.existsSync(dir)).toBe(false);
    storage.removeTree(dir);
  });

  it("should list directory entries sorted", () => {
    fs.writeFileSync(path.join(tempDir, "b"), "");
    fs.writeFileSync(path.join(tempDir, "a"), "");
    fs.mkdirSync(path.join(tempDir, "c"));
    expect(storage.readdir(tempDir)).toEqual(["a", "b", "c"]);
  });
});
