import type { HostStorage } from "./host-storage/host-storage.js";

/**
 * Supported content encodings
 */
export type BufferEncoding =
  | "utf8"
  | "utf-8"
  | "ascii"
  | "binary"
  | "base64"
  | "hex"
  | "latin1";

/**
 * File content can be string or bytes
 */
export type FileContent = string | Uint8Array;

/**
 * Where a file's bytes live. Host-backed files keep their content on host
 * storage only; memory-backed files carry it in the entry.
 */
export type ContentLocation =
  | { location: "host" }
  | { location: "memory"; bytes: Uint8Array };

export interface FileEntry {
  type: "file";
  content: ContentLocation;
}

export interface DirectoryEntry {
  type: "directory";
}

export type Entry = FileEntry | DirectoryEntry;

export type EntryType = Entry["type"];

/**
 * What `mkfile` does when the target file is already tracked:
 * - "truncate": replace its content (empty when none is given)
 * - "error": fail with EEXIST
 */
export type ExistingFilePolicy = "truncate" | "error";

/**
 * Logger interface for VFS tracing.
 * Implement this interface to receive lifecycle and operation logs.
 */
export interface VfsLogger {
  /** Lifecycle events (construction, cleanup result, dispose) */
  info(message: string, data?: Record<string, unknown>): void;
  /** Per-entry events (created, removed, added, forgotten) */
  debug(message: string, data?: Record<string, unknown>): void;
  /** Failures that are reported instead of thrown (cleanup, teardown) */
  warn(message: string, data?: Record<string, unknown>): void;
}

export interface DirFsOptions {
  /**
   * Absolute host path the VFS is anchored at.
   * Missing directories are created and removed again on dispose.
   */
  root: string;

  /**
   * Remove everything the instance created when it is disposed.
   * Defaults to true.
   */
  autoClean?: boolean;

  /**
   * Host storage port. Defaults to NodeHostStorage (node:fs).
   */
  storage?: HostStorage;

  logger?: VfsLogger;

  /**
   * Defaults to "truncate".
   */
  existingFile?: ExistingFilePolicy;
}

/**
 * Initial files can be plain content or an object wrapping it
 */
export type InitialFiles = Record<string, FileContent | { content: FileContent }>;

export interface MapFsOptions {
  /**
   * Advisory host root, only used by toHost(). Defaults to "/".
   */
  root?: string;

  files?: InitialFiles;

  logger?: VfsLogger;

  /**
   * Defaults to "truncate".
   */
  existingFile?: ExistingFilePolicy;
}

/**
 * Common contract of every VFS backend.
 *
 * All paths may be absolute or relative to cwd(). Operations are
 * synchronous; an instance is not safe to share between workers.
 */
export interface VirtualFs {
  /** Host path the VFS is anchored at */
  root(): string;

  /** Current working directory as a canonical inner path */
  cwd(): string;

  /**
   * Change the current working directory.
   * @throws ENOENT if missing, ENOTDIR if the target is a file
   */
  cd(path: string): void;

  exists(path: string): boolean;

  /** @throws ENOENT if the path is not tracked */
  isDir(path: string): boolean;

  /** @throws ENOENT if the path is not tracked */
  isFile(path: string): boolean;

  /**
   * Direct children of a directory, in hierarchical order.
   * A file lists as itself.
   * @throws ENOENT if the path is not tracked
   */
  ls(path?: string): string[];

  /**
   * Every descendant of a directory, in hierarchical order.
   * A file lists as itself.
   * @throws ENOENT if the path is not tracked
   */
  tree(path?: string): string[];

  /**
   * Create a directory and any missing parents.
   * @throws EINVAL for an empty path, EEXIST if the target exists
   */
  mkdir(path: string): void;

  /**
   * Create a file, creating missing parent directories.
   * Behavior on an existing file follows the `existingFile` option.
   */
  mkfile(path: string, content?: FileContent, encoding?: BufferEncoding): void;

  /**
   * Read a whole file. Symbolic links are not followed.
   * @throws ENOENT if missing, EISDIR for a directory
   */
  read(path: string): Uint8Array;

  /** read() decoded as text (utf8 unless told otherwise) */
  readText(path: string, encoding?: BufferEncoding): string;

  /**
   * Replace the content of an existing file.
   * @throws ENOENT if missing, EISDIR for a directory
   */
  write(path: string, content: FileContent, encoding?: BufferEncoding): void;

  /**
   * Append to an existing file.
   * @throws ENOENT if missing, EISDIR for a directory
   */
  append(path: string, content: FileContent, encoding?: BufferEncoding): void;

  /**
   * Remove a file or a directory with everything below it.
   * @throws EINVAL for an empty path or the root, ENOENT if not tracked
   */
  rm(path: string): void;

  /**
   * Remove every tracked entry except the root.
   * @returns false if any entry could not be removed
   */
  cleanup(): boolean;
}
