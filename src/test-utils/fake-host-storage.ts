/**
 * In-process HostStorage for tests.
 *
 * Mimics POSIX semantics closely enough for DirFs (errno codes included)
 * and lets a test make any single call fail.
 */

import * as nodePath from "node:path";
import type {
  HostEntryKind,
  HostStorage,
} from "../fs/host-storage/host-storage.js";

type FakeNode =
  | { kind: "directory" }
  | { kind: "file"; content: Uint8Array }
  | { kind: "symlink"; target: string };

export type FakeOperation =
  | "mkdir"
  | "readFile"
  | "writeFile"
  | "appendFile"
  | "removeFile"
  | "removeDir"
  | "removeTree"
  | "readdir";

const posix = nodePath.posix;
const textEncoder = new TextEncoder();

function errno(code: string, operation: string, hostPath: string): Error {
  return Object.assign(
    new Error(`${code}: simulated failure, ${operation} '${hostPath}'`),
    { code },
  );
}

export class FakeHostStorage implements HostStorage {
  private nodes = new Map<string, FakeNode>([["/", { kind: "directory" }]]);
  private failures: Map<string, string> = new Map();

  /** Every mutating call, as "operation path" */
  readonly calls: string[] = [];

  /**
   * @param directories host directories that exist up front
   */
  constructor(directories: string[] = []) {
    for (const dir of directories) {
      this.addDirectory(dir);
    }
  }

  /** mkdir -p without recording a call */
  addDirectory(hostPath: string): void {
    let current = "/";
    for (const part of hostPath.split("/").filter(Boolean)) {
      current = posix.join(current, part);
      if (!this.nodes.has(current)) {
        this.nodes.set(current, { kind: "directory" });
      }
    }
  }

  addFile(hostPath: string, content: string | Uint8Array = ""): void {
    this.addDirectory(posix.dirname(hostPath));
    this.nodes.set(hostPath, {
      kind: "file",
      content:
        typeof content === "string" ? textEncoder.encode(content) : content,
    });
  }

  addSymlink(hostPath: string, target: string): void {
    this.addDirectory(posix.dirname(hostPath));
    this.nodes.set(hostPath, { kind: "symlink", target });
  }

  /** Make the next matching calls fail with `code` until cleared */
  failOn(operation: FakeOperation, hostPath: string, code = "EACCES"): void {
    this.failures.set(`${operation} ${hostPath}`, code);
  }

  clearFailures(): void {
    this.failures.clear();
  }

  has(hostPath: string): boolean {
    return this.nodes.has(hostPath);
  }

  /** Text content of a fake file, for assertions */
  contentOf(hostPath: string): string | undefined {
    const node = this.nodes.get(hostPath);
    return node?.kind === "file"
      ? new TextDecoder().decode(node.content)
      : undefined;
  }

  kind(hostPath: string): HostEntryKind | null {
    return this.nodes.get(hostPath)?.kind ?? null;
  }

  isDirectory(hostPath: string): boolean {
    let current = hostPath;
    for (let hops = 0; hops < 8; hops++) {
      const node = this.nodes.get(current);
      if (node?.kind !== "symlink") return node?.kind === "directory";
      current = posix.resolve(posix.dirname(current), node.target);
    }
    return false;
  }

  mkdir(hostPath: string): void {
    this.begin("mkdir", hostPath);
    if (this.nodes.has(hostPath)) throw errno("EEXIST", "mkdir", hostPath);
    this.requireParentDir("mkdir", hostPath);
    this.nodes.set(hostPath, { kind: "directory" });
  }

  readFile(hostPath: string): Uint8Array {
    this.check("readFile", hostPath);
    const node = this.nodes.get(hostPath);
    if (!node) throw errno("ENOENT", "open", hostPath);
    if (node.kind === "directory") throw errno("EISDIR", "read", hostPath);
    if (node.kind === "symlink") return textEncoder.encode(node.target);
    return new Uint8Array(node.content);
  }

  writeFile(hostPath: string, content: Uint8Array): void {
    this.begin("writeFile", hostPath);
    this.requireParentDir("open", hostPath);
    if (this.nodes.get(hostPath)?.kind === "directory") {
      throw errno("EISDIR", "open", hostPath);
    }
    this.nodes.set(hostPath, { kind: "file", content: new Uint8Array(content) });
  }

  appendFile(hostPath: string, content: Uint8Array): void {
    this.begin("appendFile", hostPath);
    const node = this.nodes.get(hostPath);
    if (node?.kind === "directory") throw errno("EISDIR", "open", hostPath);
    const existing = node?.kind === "file" ? node.content : new Uint8Array(0);
    const combined = new Uint8Array(existing.length + content.length);
    combined.set(existing);
    combined.set(content, existing.length);
    this.nodes.set(hostPath, { kind: "file", content: combined });
  }

  removeFile(hostPath: string): void {
    this.begin("removeFile", hostPath);
    const node = this.nodes.get(hostPath);
    if (!node) throw errno("ENOENT", "unlink", hostPath);
    if (node.kind === "directory") throw errno("EISDIR", "unlink", hostPath);
    this.nodes.delete(hostPath);
  }

  removeDir(hostPath: string): void {
    this.begin("removeDir", hostPath);
    const node = this.nodes.get(hostPath);
    if (!node) throw errno("ENOENT", "rmdir", hostPath);
    if (node.kind !== "directory") throw errno("ENOTDIR", "rmdir", hostPath);
    if (this.childNames(hostPath).length > 0) {
      throw errno("ENOTEMPTY", "rmdir", hostPath);
    }
    this.nodes.delete(hostPath);
  }

  removeTree(hostPath: string): void {
    this.begin("removeTree", hostPath);
    for (const path of [...this.nodes.keys()]) {
      if (path === hostPath || path.startsWith(`${hostPath}/`)) {
        this.nodes.delete(path);
      }
    }
  }

  readdir(hostPath: string): string[] {
    this.check("readdir", hostPath);
    const node = this.nodes.get(hostPath);
    if (!node) throw errno("ENOENT", "scandir", hostPath);
    if (node.kind !== "directory") throw errno("ENOTDIR", "scandir", hostPath);
    return this.childNames(hostPath);
  }

  private begin(operation: FakeOperation, hostPath: string): void {
    this.calls.push(`${operation} ${hostPath}`);
    this.check(operation, hostPath);
  }

  private check(operation: FakeOperation, hostPath: string): void {
    const code = this.failures.get(`${operation} ${hostPath}`);
    if (code) throw errno(code, operation, hostPath);
  }

  private requireParentDir(operation: string, hostPath: string): void {
    const parent = this.nodes.get(posix.dirname(hostPath));
    if (!parent) throw errno("ENOENT", operation, hostPath);
    if (parent.kind !== "directory") throw errno("ENOTDIR", operation, hostPath);
  }

  private childNames(hostPath: string): string[] {
    const prefix = hostPath === "/" ? "/" : `${hostPath}/`;
    return [...this.nodes.keys()]
      .filter(
        (p) => p !== "/" && p.startsWith(prefix) && !p.slice(prefix.length).includes("/"),
      )
      .map((p) => p.slice(prefix.length))
      .sort();
  }
}
