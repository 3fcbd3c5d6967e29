/**
 * EntryStore - ordered map of canonical inner paths to entries
 *
 * Keys are kept sorted with comparePaths(), so a directory always precedes
 * its descendants and a subtree is one contiguous run of keys. Invariants
 * after every public call:
 * - "/" is present and is a directory
 * - every other key has its parent present as a directory
 * - every key is a canonical path
 */

import { VfsError } from "./errors.js";
import type { Entry, EntryType } from "./interface.js";
import {
  ancestorsOf,
  comparePaths,
  isDescendant,
  isWithin,
  parentPath,
  pathDepth,
  ROOT,
} from "./path.js";

export class EntryStore {
  private entries: Map<string, Entry> = new Map();
  private order: string[] = [];

  constructor() {
    this.clear();
  }

  get size(): number {
    return this.order.length;
  }

  has(path: string): boolean {
    return this.entries.has(path);
  }

  get(path: string): Entry | undefined {
    return this.entries.get(path);
  }

  /**
   * Entry at `path`, or ENOENT reported against `operation`
   */
  require(path: string, operation: string): Entry {
    const entry = this.entries.get(path);
    if (!entry) {
      throw new VfsError("ENOENT", operation, path);
    }
    return entry;
  }

  typeOf(path: string, operation: string): EntryType {
    return this.require(path, operation).type;
  }

  /**
   * Insert or replace an entry. The parent must already be tracked as a
   * directory; replacing a directory with a file (or back) is refused so
   * descendants can never end up under a file.
   */
  set(path: string, entry: Entry): void {
    if (path === ROOT) {
      throw new VfsError("EINVAL", "set", path, {
        detail: "the root cannot be replaced",
      });
    }
    const parent = this.entries.get(parentPath(path));
    if (!parent) {
      throw new VfsError("ENOENT", "set", parentPath(path));
    }
    if (parent.type !== "directory") {
      throw new VfsError("ENOTDIR", "set", parentPath(path));
    }

    const existing = this.entries.get(path);
    if (existing) {
      if (existing.type !== entry.type) {
        throw new VfsError(
          existing.type === "directory" ? "EISDIR" : "EEXIST",
          "set",
          path,
        );
      }
      this.entries.set(path, entry);
      return;
    }

    this.entries.set(path, entry);
    this.order.splice(this.insertionIndex(path), 0, path);
  }

  /**
   * Remove `path` and everything below it.
   * @returns the removed paths in hierarchical order
   */
  delete(path: string): string[] {
    if (path === ROOT) {
      throw new VfsError("EINVAL", "rm", path, {
        detail: "the root cannot be removed",
      });
    }
    const start = this.indexOf(path);
    if (start < 0) return [];

    let end = start + 1;
    while (end < this.order.length && isDescendant(this.order[end], path)) {
      end++;
    }

    const removed = this.order.splice(start, end - start);
    for (const p of removed) {
      this.entries.delete(p);
    }
    return removed;
  }

  /**
   * Direct children of `path`. A file yields itself.
   */
  children(path: string, operation = "ls"): string[] {
    const entry = this.require(path, operation);
    if (entry.type === "file") return [path];

    const depth = pathDepth(path) + 1;
    return this.subtree(path).filter((p) => pathDepth(p) === depth);
  }

  /**
   * Every descendant of `path`. A file yields itself.
   */
  descendants(path: string, operation = "tree"): string[] {
    const entry = this.require(path, operation);
    if (entry.type === "file") return [path];
    return this.subtree(path);
  }

  /**
   * All tracked paths, root included, in hierarchical order
   */
  paths(): string[] {
    return [...this.order];
  }

  /**
   * Directories that must be created, top-down, for `path` to exist as a
   * directory. Walks up to the nearest tracked ancestor, which must be a
   * directory (the root always ends the walk).
   */
  missingDirectories(path: string, operation: string): string[] {
    const missing: string[] = [];
    let current = path;

    while (!this.entries.has(current)) {
      missing.push(current);
      current = parentPath(current);
    }

    if (this.entries.get(current)?.type !== "directory") {
      throw new VfsError("ENOTDIR", operation, current);
    }
    return missing.reverse();
  }

  /**
   * Reset to the root directory only
   */
  clear(): void {
    this.entries = new Map<string, Entry>([[ROOT, { type: "directory" }]]);
    this.order = [ROOT];
  }

  /**
   * Verify the structural invariants; used by tests
   */
  checkInvariants(): void {
    if (this.entries.get(ROOT)?.type !== "directory") {
      throw new Error("root directory is missing");
    }
    for (let i = 0; i < this.order.length; i++) {
      const path = this.order[i];
      if (!this.entries.has(path)) {
        throw new Error(`order lists untracked path '${path}'`);
      }
      if (i > 0 && comparePaths(this.order[i - 1], path) >= 0) {
        throw new Error(`paths out of order at '${path}'`);
      }
      if (path === ROOT) continue;
      for (const ancestor of ancestorsOf(path)) {
        if (this.entries.get(ancestor)?.type !== "directory") {
          throw new Error(`'${path}' has no directory at '${ancestor}'`);
        }
      }
    }
    if (this.order.length !== this.entries.size) {
      throw new Error("order and entries disagree");
    }
  }

  private subtree(path: string): string[] {
    const start = this.indexOf(path);
    const result: string[] = [];
    for (let i = start + 1; i < this.order.length; i++) {
      const candidate = this.order[i];
      if (!isWithin(candidate, path)) break;
      result.push(candidate);
    }
    return result;
  }

  private indexOf(path: string): number {
    const index = this.insertionIndex(path);
    return this.order[index] === path ? index : -1;
  }

  /** Binary search for the first key not ordered before `path` */
  private insertionIndex(path: string): number {
    let low = 0;
    let high = this.order.length;
    while (low < high) {
      const mid = (low + high) >>> 1;
      if (comparePaths(this.order[mid], path) < 0) {
        low = mid + 1;
      } else {
        high = mid;
      }
    }
    return low;
  }
}
