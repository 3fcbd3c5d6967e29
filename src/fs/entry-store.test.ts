import fc from "fast-check";
import { describe, expect, it } from "vitest";
import { EntryStore } from "./entry-store.js";
import { isVfsError } from "./errors.js";
import type { Entry } from "./interface.js";
import { parentPath } from "./path.js";

const dir: Entry = { type: "directory" };
const file = (text = ""): Entry => ({
  type: "file",
  content: { location: "memory", bytes: new TextEncoder().encode(text) },
});

describe("EntryStore", () => {
  it("should start with only the root directory", () => {
    const store = new EntryStore();
    expect(store.paths()).toEqual(["/"]);
    expect(store.size).toBe(1);
    expect(store.get("/")).toEqual({ type: "directory" });
  });

  it("should refuse entries without a tracked parent", () => {
    const store = new EntryStore();
    expect(() => store.set("/a/b", dir)).toThrow(
      "ENOENT: no such file or directory, set '/a'",
    );
  });

  it("should refuse entries below a file", () => {
    const store = new EntryStore();
    store.set("/f", file());
    expect(() => store.set("/f/g", dir)).toThrow(
      "ENOTDIR: not a directory, set '/f'",
    );
  });

  it("should refuse changing the kind of an entry", () => {
    const store = new EntryStore();
    store.set("/f", file());
    store.set("/d", dir);
    expect(() => store.set("/f", dir)).toThrow("EEXIST");
    expect(() => store.set("/d", file())).toThrow("EISDIR");
  });

  it("should replace an entry of the same kind in place", () => {
    const store = new EntryStore();
    store.set("/f", file("old"));
    store.set("/f", file("new"));
    expect(store.paths()).toEqual(["/", "/f"]);
    expect(store.get("/f")).toEqual(file("new"));
  });

  it("should keep hierarchical order regardless of insertion order", () => {
    const store = new EntryStore();
    store.set("/a-b", dir);
    store.set("/a", dir);
    store.set("/b", file());
    store.set("/a/b", dir);
    expect(store.paths()).toEqual(["/", "/a", "/a/b", "/a-b", "/b"]);
  });

  describe("listing", () => {
    const build = () => {
      const store = new EntryStore();
      store.set("/project", dir);
      store.set("/project/main.ts", file());
      store.set("/project/src", dir);
      store.set("/project/src/lib.ts", file());
      store.set("/projects", dir);
      return store;
    };

    it("should list direct children only", () => {
      expect(build().children("/project")).toEqual([
        "/project/main.ts",
        "/project/src",
      ]);
    });

    it("should list every descendant", () => {
      expect(build().descendants("/project")).toEqual([
        "/project/main.ts",
        "/project/src",
        "/project/src/lib.ts",
      ]);
    });

    it("should list the root's children", () => {
      expect(build().children("/")).toEqual(["/project", "/projects"]);
    });

    it("should list a file as itself", () => {
      const store = build();
      expect(store.children("/project/main.ts")).toEqual(["/project/main.ts"]);
      expect(store.descendants("/project/main.ts")).toEqual([
        "/project/main.ts",
      ]);
    });

    it("should report missing targets against the operation", () => {
      expect(() => build().children("/nope")).toThrow(
        "ENOENT: no such file or directory, ls '/nope'",
      );
      expect(() => build().descendants("/nope")).toThrow(
        "ENOENT: no such file or directory, tree '/nope'",
      );
    });
  });

  describe("delete", () => {
    it("should remove a subtree and nothing else", () => {
      const store = new EntryStore();
      store.set("/a", dir);
      store.set("/a/b", dir);
      store.set("/a/b/c", dir);
      store.set("/a/file.txt", file());
      store.set("/ab", dir);

      expect(store.delete("/a")).toEqual([
        "/a",
        "/a/b",
        "/a/b/c",
        "/a/file.txt",
      ]);
      expect(store.paths()).toEqual(["/", "/ab"]);
    });

    it("should return nothing for an untracked path", () => {
      expect(new EntryStore().delete("/missing")).toEqual([]);
    });

    it("should never remove the root", () => {
      expect(() => new EntryStore().delete("/")).toThrow(
        "EINVAL: invalid path (the root cannot be removed), rm '/'",
      );
    });
  });

  describe("missingDirectories", () => {
    it("should list missing directories top-down", () => {
      const store = new EntryStore();
      store.set("/x", dir);
      expect(store.missingDirectories("/x/y/z", "mkdir")).toEqual([
        "/x/y",
        "/x/y/z",
      ]);
    });

    it("should return nothing for an existing directory", () => {
      expect(new EntryStore().missingDirectories("/", "mkdir")).toEqual([]);
    });

    it("should fail when the nearest tracked path is a file", () => {
      const store = new EntryStore();
      store.set("/f", file());
      expect(() => store.missingDirectories("/f/g", "mkfile")).toThrow(
        "ENOTDIR: not a directory, mkfile '/f'",
      );
      expect(() => store.missingDirectories("/f", "mkfile")).toThrow(
        "ENOTDIR: not a directory, mkfile '/f'",
      );
    });
  });

  it("should reset to the root on clear", () => {
    const store = new EntryStore();
    store.set("/a", dir);
    store.clear();
    expect(store.paths()).toEqual(["/"]);
  });

  it("should keep its invariants under any sequence of operations", () => {
    const segment = fc.constantFrom("a", "b", "a-b", "a.b");
    const pathArb = fc
      .array(segment, { minLength: 1, maxLength: 4 })
      .map((parts) => `/${parts.join("/")}`);
    const opArb = fc.tuple(
      fc.constantFrom("mkdir", "mkfile", "delete"),
      pathArb,
    );

    fc.assert(
      fc.property(fc.array(opArb, { maxLength: 40 }), (ops) => {
        const store = new EntryStore();
        for (const [op, path] of ops) {
          try {
            if (op === "delete") {
              store.delete(path);
              continue;
            }
            const target = op === "mkdir" ? path : parentPath(path);
            for (const missing of store.missingDirectories(target, op)) {
              store.set(missing, dir);
            }
            if (op === "mkfile") store.set(path, file());
          } catch (e) {
            if (!isVfsError(e)) throw e;
          }
          store.checkInvariants();
        }
      }),
    );
  });
});
