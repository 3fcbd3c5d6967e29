/**
 * Hello World Example
 *
 * Anchors a DirFs in a fresh directory under the OS temp directory, writes
 * a couple of files, reads them back and tears everything down again.
 * Run with: npx tsx main.ts
 */

import * as os from "node:os";
import * as path from "node:path";
import { DirFs, MapFs, type VfsLogger } from "../../src/index.js";

const logger: VfsLogger = {
  info: (message, data) => console.log(`[info] ${message}`, data ?? ""),
  debug: (message, data) => console.log(`[debug] ${message}`, data ?? ""),
  warn: (message, data) => console.warn(`[warn] ${message}`, data ?? ""),
};

const root = path.join(os.tmpdir(), `scoped-vfs-hello-${process.pid}`, "work");
const dfs = new DirFs({ root, logger });

try {
  console.log("=== DirFs ===\n");
  console.log(`root: ${dfs.root()}`);
  console.log(`created root parents: ${dfs.createdRootParents().join(", ")}`);

  dfs.mkfile("/greetings/hello.txt", "Hello, world!\n");
  dfs.append("/greetings/hello.txt", "Bye, world!\n");
  dfs.mkfile("/greetings/empty.txt");

  dfs.cd("/greetings");
  console.log(`cwd: ${dfs.cwd()}`);
  console.log(`ls: ${dfs.ls().join(" ")}`);
  console.log(`hello.txt on the host: ${dfs.toHost("hello.txt")}`);
  console.log(dfs.readText("hello.txt"));

  dfs.rm("empty.txt");
  console.log(`tree /: ${dfs.tree("/").join(" ")}`);
} finally {
  dfs.dispose();
}

console.log("\n=== MapFs ===\n");

const mfs = new MapFs({
  files: { "/project/src/main.ts": 'console.log("hi");\n' },
});
mfs.mkdir("/project/test");
console.log(`tree /project: ${mfs.tree("/project").join(" ")}`);
console.log(mfs.readText("/project/src/main.ts"));
mfs.cleanup();
console.log(`after cleanup: [${mfs.tree("/").join(", ")}]`);
