import fc from "fast-check";
import { describe, expect, it } from "vitest";
import { FakeHostStorage } from "../test-utils/fake-host-storage.js";
import { DirFs } from "./dir-fs/dir-fs.js";
import { isVfsError } from "./errors.js";
import type { VirtualFs } from "./interface.js";
import { MapFs } from "./map-fs/map-fs.js";
import { comparePaths, parentPath } from "./path.js";

type Operation =
  | { kind: "mkdir" | "mkfile" | "rm" | "cd" | "write" | "append"; path: string }
  | { kind: "cleanup" };

const pathArb = fc
  .tuple(
    fc.boolean(),
    fc.array(fc.constantFrom("a", "b", "c.txt", "..", "."), {
      minLength: 1,
      maxLength: 4,
    }),
  )
  .map(([absolute, parts]) => `${absolute ? "/" : ""}${parts.join("/")}`);

const operationArb: fc.Arbitrary<Operation> = fc.oneof(
  fc.record({
    kind: fc.constantFrom(
      "mkdir" as const,
      "mkfile" as const,
      "rm" as const,
      "cd" as const,
      "write" as const,
      "append" as const,
    ),
    path: pathArb,
  }),
  fc.constant({ kind: "cleanup" as const }),
);

/** Apply one operation; returns the error code, or "ok" */
function apply(vfs: VirtualFs, op: Operation): string {
  try {
    switch (op.kind) {
      case "mkdir":
        vfs.mkdir(op.path);
        break;
      case "mkfile":
        vfs.mkfile(op.path, "x");
        break;
      case "rm":
        vfs.rm(op.path);
        break;
      case "cd":
        vfs.cd(op.path);
        break;
      case "write":
        vfs.write(op.path, "y");
        break;
      case "append":
        vfs.append(op.path, "z");
        break;
      case "cleanup":
        vfs.cleanup();
        break;
    }
    return "ok";
  } catch (e) {
    if (!isVfsError(e)) throw e;
    return e.code;
  }
}

function expectConsistent(vfs: VirtualFs): void {
  expect(vfs.isDir("/")).toBe(true);
  expect(vfs.isDir(vfs.cwd())).toBe(true);

  const paths = vfs.tree("/");
  for (let i = 0; i < paths.length; i++) {
    const path = paths[i];
    if (i > 0) {
      expect(comparePaths(paths[i - 1], path)).toBeLessThan(0);
    }
    expect(vfs.isDir(parentPath(path))).toBe(true);
  }
}

describe("VirtualFs operation sequences", () => {
  it("should keep every entry under a tracked directory in MapFs", () => {
    fc.assert(
      fc.property(fc.array(operationArb, { maxLength: 30 }), (ops) => {
        const mfs = new MapFs();
        for (const op of ops) {
          const result = apply(mfs, op);
          expectConsistent(mfs);
          if (op.kind === "rm" && result === "ok") {
            expect(mfs.exists(op.path)).toBe(false);
          }
        }
      }),
    );
  });

  it("should mirror every tracked entry on the host in DirFs", () => {
    fc.assert(
      fc.property(fc.array(operationArb, { maxLength: 30 }), (ops) => {
        const storage = new FakeHostStorage(["/vfs"]);
        const dfs = new DirFs({ root: "/vfs", storage });
        for (const op of ops) {
          apply(dfs, op);
          expectConsistent(dfs);
          for (const path of dfs.tree("/")) {
            expect(storage.kind(dfs.toHost(path))).toBe(
              dfs.isDir(path) ? "directory" : "file",
            );
          }
        }

        dfs.dispose();
        expect(storage.readdir("/vfs")).toEqual([]);
      }),
    );
  });

  it("should behave the same in both backends", () => {
    fc.assert(
      fc.property(fc.array(operationArb, { maxLength: 30 }), (ops) => {
        const mfs = new MapFs();
        const dfs = new DirFs({
          root: "/vfs",
          storage: new FakeHostStorage(["/vfs"]),
        });
        for (const op of ops) {
          expect(apply(dfs, op)).toBe(apply(mfs, op));
          expect(dfs.cwd()).toBe(mfs.cwd());
        }
        expect(dfs.tree("/")).toEqual(mfs.tree("/"));
      }),
    );
  });
});
