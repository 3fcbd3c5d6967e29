/**
 * Inner path utilities.
 *
 * Inner paths always use `/` as separator and are absolute within the VFS
 * namespace. Everything here is pure: no I/O, no errors.
 */

export const ROOT = "/";

/**
 * Split a path into its components, ignoring empty segments.
 * `/a//b/` -> ["a", "b"]
 */
export function splitPath(path: string): string[] {
  return path.split("/").filter((part) => part.length > 0);
}

/**
 * Normalize a path into a canonical inner path: resolve `.` and `..`,
 * ensure a leading `/`, strip trailing slashes. Popping past the root
 * clamps to the root.
 */
export function normalizePath(path: string): string {
  const resolved: string[] = [];

  for (const part of splitPath(path)) {
    if (part === ".") continue;
    if (part === "..") {
      resolved.pop();
    } else {
      resolved.push(part);
    }
  }

  return `/${resolved.join("/")}`;
}

/**
 * Resolve a possibly relative path against `cwd`.
 * The empty string and `.` resolve to `cwd` itself, `..` to its parent.
 */
export function resolvePath(cwd: string, path: string): string {
  if (path === "" || path === ".") return normalizePath(cwd);
  if (path.startsWith("/")) return normalizePath(path);
  return normalizePath(`${cwd}/${path}`);
}

/**
 * Parent of a canonical path. The root is its own parent.
 */
export function parentPath(path: string): string {
  if (path === ROOT) return ROOT;
  const lastSlash = path.lastIndexOf("/");
  return lastSlash <= 0 ? ROOT : path.slice(0, lastSlash);
}

/** Number of components below the root: `/` -> 0, `/a/b` -> 2 */
export function pathDepth(path: string): number {
  return splitPath(path).length;
}

/**
 * Component-wise prefix check on canonical paths.
 * `/a/b` is within `/a`, `/ab` is not; a path is within itself.
 */
export function isWithin(path: string, ancestor: string): boolean {
  if (ancestor === ROOT) return true;
  return path === ancestor || path.startsWith(`${ancestor}/`);
}

/** Like {@link isWithin} but excludes the ancestor itself. */
export function isDescendant(path: string, ancestor: string): boolean {
  return path !== ancestor && isWithin(path, ancestor);
}

/**
 * Hierarchical ordering of canonical paths. Components are compared one by
 * one, so every directory sorts before its descendants and each subtree
 * occupies a contiguous range: `/a`, `/a/b`, `/a-b`.
 */
export function comparePaths(a: string, b: string): number {
  const left = splitPath(a);
  const right = splitPath(b);
  const shared = Math.min(left.length, right.length);

  for (let i = 0; i < shared; i++) {
    if (left[i] < right[i]) return -1;
    if (left[i] > right[i]) return 1;
  }
  return left.length - right.length;
}

/**
 * Every proper ancestor of a canonical path, nearest first, ending at the root.
 * `/a/b/c` -> ["/a/b", "/a", "/"]
 */
export function ancestorsOf(path: string): string[] {
  const ancestors: string[] = [];
  let current = path;
  while (current !== ROOT) {
    current = parentPath(current);
    ancestors.push(current);
  }
  return ancestors;
}
