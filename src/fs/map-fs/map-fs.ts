/**
 * MapFs - VFS held entirely in memory
 *
 * The entry store is the only source of truth; file bytes live in the
 * entries themselves. The root is advisory and only used by toHost().
 */

import * as nodePath from "node:path";
import { concatBytes, fromBytes, toBytes } from "../encoding.js";
import { VfsError } from "../errors.js";
import { EntryStore } from "../entry-store.js";
import type {
  BufferEncoding,
  ExistingFilePolicy,
  FileContent,
  FileEntry,
  MapFsOptions,
  VfsLogger,
  VirtualFs,
} from "../interface.js";
import { parentPath, resolvePath, ROOT, splitPath } from "../path.js";

export class MapFs implements VirtualFs {
  private hostRoot: string;
  private currentDir = ROOT;
  private readonly entries = new EntryStore();
  private readonly logger?: VfsLogger;
  private readonly existingFile: ExistingFilePolicy;

  constructor(options: MapFsOptions = {}) {
    this.logger = options.logger;
    this.existingFile = options.existingFile ?? "truncate";
    this.hostRoot = ROOT;
    if (options.root !== undefined) {
      this.setRoot(options.root);
    }

    if (options.files) {
      for (const [path, value] of Object.entries(options.files)) {
        const content =
          typeof value === "string" || value instanceof Uint8Array
            ? value
            : value.content;
        this.mkfile(path, content);
      }
    }
  }

  root(): string {
    return this.hostRoot;
  }

  /**
   * Change the advisory host root. Must be absolute.
   */
  setRoot(path: string): void {
    if (!path || !nodePath.isAbsolute(path)) {
      throw new VfsError("EINVAL", "root", path, {
        detail: "the root path must be absolute",
      });
    }
    this.hostRoot = nodePath.resolve(path);
  }

  cwd(): string {
    return this.currentDir;
  }

  toHost(path: string): string {
    const inner = this.resolve(path, "toHost");
    return inner === ROOT
      ? this.hostRoot
      : nodePath.join(this.hostRoot, ...splitPath(inner));
  }

  cd(path: string): void {
    const inner = this.resolve(path, "cd");
    if (this.entries.typeOf(inner, "cd") !== "directory") {
      throw new VfsError("ENOTDIR", "cd", path);
    }
    this.currentDir = inner;
  }

  exists(path: string): boolean {
    if (path.includes("\0")) return false;
    return this.entries.has(resolvePath(this.currentDir, path));
  }

  isDir(path: string): boolean {
    return this.entries.typeOf(this.resolve(path, "stat"), "stat") === "directory";
  }

  isFile(path: string): boolean {
    return this.entries.typeOf(this.resolve(path, "stat"), "stat") === "file";
  }

  ls(path = ""): string[] {
    return this.entries.children(this.resolve(path, "ls"), "ls");
  }

  tree(path = ""): string[] {
    return this.entries.descendants(this.resolve(path, "tree"), "tree");
  }

  mkdir(path: string): void {
    if (path === "") {
      throw new VfsError("EINVAL", "mkdir", path, { detail: "empty path" });
    }
    const inner = this.resolve(path, "mkdir");
    if (this.entries.has(inner)) {
      throw new VfsError("EEXIST", "mkdir", path);
    }
    this.createDirectories(inner, "mkdir");
  }

  mkfile(path: string, content?: FileContent, encoding?: BufferEncoding): void {
    if (path === "") {
      throw new VfsError("EINVAL", "mkfile", path, { detail: "empty path" });
    }
    const inner = this.resolve(path, "mkfile");
    const existing = this.entries.get(inner);
    if (existing?.type === "directory") {
      throw new VfsError("EISDIR", "mkfile", path);
    }
    if (existing && this.existingFile === "error") {
      throw new VfsError("EEXIST", "mkfile", path);
    }

    this.createDirectories(parentPath(inner), "mkfile");

    const bytes = toBytes(content, encoding);
    this.entries.set(inner, {
      type: "file",
      content: { location: "memory", bytes },
    });
    this.logger?.debug("mkfile", { path: inner, size: bytes.length });
  }

  read(path: string): Uint8Array {
    const entry = this.requireFile(path, "read");
    return new Uint8Array(this.bytesOf(entry));
  }

  readText(path: string, encoding?: BufferEncoding): string {
    return fromBytes(this.bytesOf(this.requireFile(path, "read")), encoding);
  }

  write(path: string, content: FileContent, encoding?: BufferEncoding): void {
    const entry = this.requireFile(path, "write");
    entry.content = { location: "memory", bytes: toBytes(content, encoding) };
  }

  append(path: string, content: FileContent, encoding?: BufferEncoding): void {
    const entry = this.requireFile(path, "append");
    entry.content = {
      location: "memory",
      bytes: concatBytes(this.bytesOf(entry), toBytes(content, encoding)),
    };
  }

  rm(path: string): void {
    if (path === "") {
      throw new VfsError("EINVAL", "rm", path, { detail: "empty path" });
    }
    const inner = this.resolve(path, "rm");
    if (inner === ROOT) {
      throw new VfsError("EINVAL", "rm", path, {
        detail: "the root cannot be removed",
      });
    }
    this.entries.require(inner, "rm");

    const removed = this.entries.delete(inner);
    this.relocateCwd();
    this.logger?.debug("rm", { path: inner, removed: removed.length });
  }

  /**
   * Drop every entry except the root. Cannot fail in memory.
   */
  cleanup(): boolean {
    const removed = this.entries.size - 1;
    this.entries.clear();
    this.currentDir = ROOT;
    this.logger?.info("cleanup", { ok: true, removed });
    return true;
  }

  private createDirectories(inner: string, operation: string): void {
    for (const dir of this.entries.missingDirectories(inner, operation)) {
      this.entries.set(dir, { type: "directory" });
      this.logger?.debug("mkdir", { path: dir });
    }
  }

  private requireFile(path: string, operation: string): FileEntry {
    const entry = this.entries.require(this.resolve(path, operation), operation);
    if (entry.type === "directory") {
      throw new VfsError("EISDIR", operation, path);
    }
    return entry;
  }

  private bytesOf(entry: FileEntry): Uint8Array {
    return entry.content.location === "memory"
      ? entry.content.bytes
      : new Uint8Array(0);
  }

  private resolve(path: string, operation: string): string {
    if (path.includes("\0")) {
      throw new VfsError("EINVAL", operation, path, { detail: "null byte" });
    }
    return resolvePath(this.currentDir, path);
  }

  private relocateCwd(): void {
    while (!this.entries.has(this.currentDir)) {
      this.currentDir = parentPath(this.currentDir);
    }
  }
}
