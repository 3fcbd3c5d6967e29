/**
 * Storage port used by DirFs for every host effect.
 *
 * All paths are absolute host paths. Implementations throw errors carrying
 * an errno `code` (as node:fs does); DirFs wraps them into VfsError.
 */

export type HostEntryKind = "file" | "directory" | "symlink";

export interface HostStorage {
  /**
   * Kind of the node at `hostPath` without following a final symlink,
   * or null when nothing is there.
   */
  kind(hostPath: string): HostEntryKind | null;

  /** Whether `hostPath` is a directory, following symlinks */
  isDirectory(hostPath: string): boolean;

  /** Create one directory; the parent must exist */
  mkdir(hostPath: string): void;

  /**
   * Whole content of a file. For a symlink, the bytes of its target path.
   */
  readFile(hostPath: string): Uint8Array;

  /** Create or replace a file in one step */
  writeFile(hostPath: string, content: Uint8Array): void;

  appendFile(hostPath: string, content: Uint8Array): void;

  /** Remove a file or symlink */
  removeFile(hostPath: string): void;

  /** Remove an empty directory */
  removeDir(hostPath: string): void;

  /** Remove a directory and everything below it; absent paths are ignored */
  removeTree(hostPath: string): void;

  /** Names of the entries in a directory */
  readdir(hostPath: string): string[];
}
