/**
 * Host-side lifecycle helpers for DirFs: creating the root directory chain,
 * probing that the root is writable, and removing on teardown exactly the
 * directories that were created for the root.
 */

import * as nodePath from "node:path";
import { errnoCode, sanitizeErrorMessage, VfsError } from "../errors.js";
import type { HostStorage } from "../host-storage/host-storage.js";
import type { VfsLogger } from "../interface.js";

const PROBE_NAME = ".access";
const PROBE_CONTENT = new TextEncoder().encode("check");

export function describeError(e: unknown): string {
  return sanitizeErrorMessage(e instanceof Error ? e.message : String(e));
}

/**
 * Create every missing directory of `hostRoot`, outermost first.
 * The nearest existing component must be a directory or a link to one.
 * On failure the directories created so far are removed again.
 *
 * @returns the created directories in creation order
 */
export function createRootDirectories(
  storage: HostStorage,
  hostRoot: string,
  logger?: VfsLogger,
): string[] {
  const missing: string[] = [];
  let current = hostRoot;
  let nearestIsDirectory: boolean;

  try {
    while (storage.kind(current) === null) {
      missing.push(current);
      const parent = nodePath.dirname(current);
      if (parent === current) break;
      current = parent;
    }
    // A symlink to a directory is a valid place to create the root in
    nearestIsDirectory = storage.isDirectory(current);
  } catch (e) {
    throw VfsError.fromHost(e, "root", hostRoot);
  }

  if (!nearestIsDirectory) {
    throw new VfsError("ENOTDIR", "root", hostRoot);
  }

  const created: string[] = [];
  for (const dir of missing.reverse()) {
    try {
      storage.mkdir(dir);
    } catch (e) {
      removeCreatedDirectories(storage, created, logger);
      throw VfsError.fromHost(e, "root", hostRoot);
    }
    created.push(dir);
  }
  return created;
}

/**
 * Write and delete a sentinel file to make sure the root accepts writes.
 */
export function probeWritable(storage: HostStorage, hostRoot: string): boolean {
  const probe = nodePath.join(hostRoot, PROBE_NAME);
  try {
    storage.writeFile(probe, PROBE_CONTENT);
    storage.removeFile(probe);
    return true;
  } catch {
    // Either step failing means the root is not usable
    return false;
  }
}

/**
 * Remove directories in reverse creation order. Failures are reported
 * through the logger and never thrown.
 *
 * @returns true when every directory was removed (or was already gone)
 */
export function removeCreatedDirectories(
  storage: HostStorage,
  created: readonly string[],
  logger?: VfsLogger,
): boolean {
  let ok = true;
  for (const dir of [...created].reverse()) {
    try {
      storage.removeDir(dir);
    } catch (e) {
      if (errnoCode(e) === "ENOENT") continue;
      ok = false;
      logger?.warn("unable to remove created root directory", {
        path: dir,
        error: describeError(e),
      });
    }
  }
  return ok;
}
