/**
 * DirFs - VFS mirrored onto a real host directory
 *
 * The entry store tracks what exists and of which kind; file content lives
 * on host storage only. Every mutation goes to the host first and is
 * recorded in the store once it succeeded, so the store never claims
 * something the host does not have.
 *
 * Only what the instance created (or was told to adopt with add()) is ever
 * removed. Call dispose() when done: with auto-clean enabled it removes
 * every tracked artifact and the directories created to make the root
 * exist. Skipping dispose() leaves those artifacts on host storage.
 */

import * as nodePath from "node:path";
import { fromBytes, toBytes } from "../encoding.js";
import { errnoCode, VfsError } from "../errors.js";
import { EntryStore } from "../entry-store.js";
import type { HostEntryKind, HostStorage } from "../host-storage/host-storage.js";
import { NodeHostStorage } from "../host-storage/node-host-storage.js";
import type {
  BufferEncoding,
  DirFsOptions,
  ExistingFilePolicy,
  FileContent,
  VfsLogger,
  VirtualFs,
} from "../interface.js";
import {
  ancestorsOf,
  parentPath,
  resolvePath,
  ROOT,
  splitPath,
} from "../path.js";
import {
  createRootDirectories,
  describeError,
  probeWritable,
  removeCreatedDirectories,
} from "./lifecycle.js";

export class DirFs implements VirtualFs {
  private readonly hostRoot: string;
  private readonly storage: HostStorage;
  private readonly logger?: VfsLogger;
  private readonly existingFile: ExistingFilePolicy;
  private readonly entries = new EntryStore();
  private rootParents: string[];
  private currentDir = ROOT;
  private isAutoClean: boolean;
  private isDisposed = false;

  constructor(options: DirFsOptions) {
    this.storage = options.storage ?? new NodeHostStorage();
    this.logger = options.logger;
    this.existingFile = options.existingFile ?? "truncate";
    this.isAutoClean = options.autoClean ?? true;

    const root = options.root;
    if (!root) {
      throw new VfsError("EINVAL", "root", root, { detail: "empty path" });
    }
    if (root.includes("\0")) {
      throw new VfsError("EINVAL", "root", root, { detail: "null byte" });
    }
    if (!nodePath.isAbsolute(root)) {
      throw new VfsError("EINVAL", "root", root, {
        detail: "the root path must be absolute",
      });
    }
    this.hostRoot = nodePath.resolve(root);

    let rootIsDirectory: boolean;
    try {
      rootIsDirectory =
        this.storage.kind(this.hostRoot) === null ||
        this.storage.isDirectory(this.hostRoot);
    } catch (e) {
      throw VfsError.fromHost(e, "root", root);
    }
    if (!rootIsDirectory) {
      throw new VfsError("ENOTDIR", "root", root);
    }
    this.rootParents = createRootDirectories(
      this.storage,
      this.hostRoot,
      this.logger,
    );

    if (!probeWritable(this.storage, this.hostRoot)) {
      removeCreatedDirectories(this.storage, this.rootParents, this.logger);
      throw new VfsError("EIO", "root", root, {
        detail: "EACCES: permission denied",
        hostCode: "EACCES",
      });
    }

    this.logger?.info("dirfs created", {
      root: this.hostRoot,
      createdRootParents: this.rootParents.length,
    });
  }

  root(): string {
    return this.hostRoot;
  }

  cwd(): string {
    return this.currentDir;
  }

  get autoClean(): boolean {
    return this.isAutoClean;
  }

  get disposed(): boolean {
    return this.isDisposed;
  }

  /**
   * Enable or disable removal of created artifacts on dispose()
   */
  setAutoClean(clean: boolean): void {
    this.isAutoClean = clean;
  }

  /**
   * Host directories created during construction, outermost first
   */
  createdRootParents(): string[] {
    return [...this.rootParents];
  }

  /**
   * Host path an inner path maps to. Pure; the path need not exist.
   */
  toHost(path: string): string {
    return this.hostPathOf(this.resolve(path, "toHost"));
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
    this.createDirectories(inner, "mkdir", path);
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

    this.createDirectories(parentPath(inner), "mkfile", path);

    const bytes = toBytes(content, encoding);
    try {
      this.storage.writeFile(this.hostPathOf(inner), bytes);
    } catch (e) {
      throw VfsError.fromHost(e, "mkfile", path);
    }
    this.entries.set(inner, { type: "file", content: { location: "host" } });
    this.logger?.debug("mkfile", { path: inner, size: bytes.length });
  }

  read(path: string): Uint8Array {
    const inner = this.requireFile(path, "read");
    try {
      return this.storage.readFile(this.hostPathOf(inner));
    } catch (e) {
      throw VfsError.fromHost(e, "read", path);
    }
  }

  readText(path: string, encoding?: BufferEncoding): string {
    return fromBytes(this.read(path), encoding);
  }

  write(path: string, content: FileContent, encoding?: BufferEncoding): void {
    const inner = this.requireFile(path, "write");
    try {
      this.storage.writeFile(this.hostPathOf(inner), toBytes(content, encoding));
    } catch (e) {
      throw VfsError.fromHost(e, "write", path);
    }
  }

  append(path: string, content: FileContent, encoding?: BufferEncoding): void {
    const inner = this.requireFile(path, "append");
    try {
      this.storage.appendFile(this.hostPathOf(inner), toBytes(content, encoding));
    } catch (e) {
      throw VfsError.fromHost(e, "append", path);
    }
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

    // Already gone from the host counts as removed
    const hostPath = this.hostPathOf(inner);
    try {
      const kind = this.storage.kind(hostPath);
      if (kind === "directory") {
        this.storage.removeTree(hostPath);
      } else if (kind !== null) {
        this.storage.removeFile(hostPath);
      }
    } catch (e) {
      throw VfsError.fromHost(e, "rm", path);
    }

    const removed = this.entries.delete(inner);
    this.relocateCwd();
    this.logger?.debug("rm", { path: inner, removed: removed.length });
  }

  /**
   * Remove every tracked entry except the root, deepest first. A failing
   * entry stays tracked, is reported through the logger, and does not stop
   * the pass.
   */
  cleanup(): boolean {
    let ok = true;

    for (const inner of this.entries.paths().reverse()) {
      if (inner === ROOT || !this.entries.has(inner)) continue;
      const hostPath = this.hostPathOf(inner);
      try {
        const kind = this.storage.kind(hostPath);
        if (kind === "directory") {
          this.storage.removeDir(hostPath);
        } else if (kind !== null) {
          this.storage.removeFile(hostPath);
        }
        this.entries.delete(inner);
      } catch (e) {
        if (errnoCode(e) === "ENOENT") {
          this.entries.delete(inner);
          continue;
        }
        ok = false;
        this.logger?.warn("unable to remove", {
          path: inner,
          error: describeError(e),
        });
      }
    }

    this.relocateCwd();
    this.logger?.info("cleanup", { ok, remaining: this.entries.size - 1 });
    return ok;
  }

  /**
   * Start tracking an artifact that already exists under the root.
   * Directories are adopted with everything below them; symlinks are
   * tracked as files. Adopted artifacts are removed by cleanup().
   *
   * Every host component between the root and the target must be a real
   * directory: a path through a symlink would reach outside the root.
   */
  add(path: string): void {
    const inner = this.resolve(path, "add");
    for (const ancestor of ancestorsOf(inner).reverse()) {
      if (ancestor === ROOT) continue;
      const ancestorKind = this.hostKind(this.hostPathOf(ancestor), "add", path);
      if (ancestorKind === null) {
        throw new VfsError("ENOENT", "add", ancestor);
      }
      if (ancestorKind !== "directory") {
        throw new VfsError("ENOTDIR", "add", ancestor);
      }
    }
    const hostPath = this.hostPathOf(inner);
    const kind = this.hostKind(hostPath, "add", path);
    if (kind === null) {
      throw new VfsError("ENOENT", "add", path);
    }

    // The host has every ancestor, so only the store needs them
    for (const dir of this.entries.missingDirectories(parentPath(inner), "add")) {
      this.entries.set(dir, { type: "directory" });
    }
    try {
      this.adopt(inner, hostPath, kind);
    } catch (e) {
      throw VfsError.fromHost(e, "add", path);
    }
  }

  /**
   * Stop tracking a path (and everything below it) without touching the host
   */
  forget(path: string): void {
    const inner = this.resolve(path, "forget");
    if (inner === ROOT) {
      throw new VfsError("EINVAL", "forget", path, {
        detail: "the root cannot be forgotten",
      });
    }
    this.entries.require(inner, "forget");
    const removed = this.entries.delete(inner);
    this.relocateCwd();
    this.logger?.debug("forget", { path: inner, removed: removed.length });
  }

  /**
   * Tear down the instance. Runs once; later calls do nothing.
   * With auto-clean enabled, removes every tracked artifact and then the
   * directories created for the root, newest first. Never throws: failures
   * are reported through the logger.
   */
  dispose(): void {
    if (this.isDisposed) return;
    this.isDisposed = true;

    if (!this.isAutoClean) {
      this.logger?.info("dispose", { root: this.hostRoot, autoClean: false });
      return;
    }

    const cleaned = this.cleanup();
    if (cleaned) {
      this.entries.clear();
      this.currentDir = ROOT;
    }
    const parentsRemoved = removeCreatedDirectories(
      this.storage,
      this.rootParents,
      this.logger,
    );
    this.rootParents = [];

    this.logger?.info("dispose", {
      root: this.hostRoot,
      autoClean: true,
      cleaned,
      parentsRemoved,
    });
  }

  private adopt(inner: string, hostPath: string, kind: HostEntryKind): void {
    if (kind === "directory") {
      if (inner !== ROOT) {
        this.entries.set(inner, { type: "directory" });
      }
      for (const name of this.storage.readdir(hostPath)) {
        const childHost = nodePath.join(hostPath, name);
        const childKind = this.storage.kind(childHost);
        if (childKind !== null) {
          this.adopt(inner === ROOT ? `/${name}` : `${inner}/${name}`, childHost, childKind);
        }
      }
    } else {
      this.entries.set(inner, { type: "file", content: { location: "host" } });
    }
    this.logger?.debug("add", { path: inner, kind });
  }

  /**
   * Create every missing directory down to `inner`, host first. Directories
   * created before a failure stay created and tracked.
   */
  private createDirectories(inner: string, operation: string, path: string): void {
    for (const dir of this.entries.missingDirectories(inner, operation)) {
      try {
        this.storage.mkdir(this.hostPathOf(dir));
      } catch (e) {
        throw VfsError.fromHost(e, operation, path);
      }
      this.entries.set(dir, { type: "directory" });
      this.logger?.debug("mkdir", { path: dir });
    }
  }

  private requireFile(path: string, operation: string): string {
    const inner = this.resolve(path, operation);
    if (this.entries.typeOf(inner, operation) === "directory") {
      throw new VfsError("EISDIR", operation, path);
    }
    return inner;
  }

  private resolve(path: string, operation: string): string {
    if (path.includes("\0")) {
      throw new VfsError("EINVAL", operation, path, { detail: "null byte" });
    }
    return resolvePath(this.currentDir, path);
  }

  private hostPathOf(inner: string): string {
    return inner === ROOT
      ? this.hostRoot
      : nodePath.join(this.hostRoot, ...splitPath(inner));
  }

  private hostKind(
    hostPath: string,
    operation: string,
    path: string,
  ): HostEntryKind | null {
    try {
      return this.storage.kind(hostPath);
    } catch (e) {
      throw VfsError.fromHost(e, operation, path);
    }
  }

  /** Move cwd up to the nearest directory that is still tracked */
  private relocateCwd(): void {
    while (!this.entries.has(this.currentDir)) {
      this.currentDir = parentPath(this.currentDir);
    }
  }
}
