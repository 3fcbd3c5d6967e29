/**
 * Error taxonomy shared by every VFS backend.
 *
 * Messages follow the node:fs shape, e.g.
 * `ENOENT: no such file or directory, read '/docs/note.txt'`,
 * so callers that only look at `message` still see the familiar code.
 */

export type VfsErrorCode =
  | "EINVAL"
  | "ENOENT"
  | "EEXIST"
  | "EISDIR"
  | "ENOTDIR"
  | "EIO";

const DESCRIPTIONS: Record<VfsErrorCode, string> = {
  EINVAL: "invalid path",
  ENOENT: "no such file or directory",
  EEXIST: "file already exists",
  EISDIR: "illegal operation on a directory",
  ENOTDIR: "not a directory",
  EIO: "i/o error",
};

export interface VfsErrorOptions {
  /** Extra context appended to the description */
  detail?: string;
  /** Errno code reported by host storage, for EIO */
  hostCode?: string;
  cause?: unknown;
}

export class VfsError extends Error {
  readonly code: VfsErrorCode;
  readonly operation: string;
  readonly path: string;
  readonly hostCode?: string;

  constructor(
    code: VfsErrorCode,
    operation: string,
    path: string,
    options: VfsErrorOptions = {},
  ) {
    const description = options.detail
      ? `${DESCRIPTIONS[code]} (${options.detail})`
      : DESCRIPTIONS[code];
    super(`${code}: ${description}, ${operation} '${path}'`, {
      cause: options.cause,
    });
    this.name = "VfsError";
    this.code = code;
    this.operation = operation;
    this.path = path;
    this.hostCode = options.hostCode;
  }

  /**
   * Wrap an error thrown by host storage. Errors that already are
   * VfsErrors pass through untouched.
   */
  static fromHost(e: unknown, operation: string, path: string): VfsError {
    if (e instanceof VfsError) return e;
    const hostCode = errnoCode(e);
    const message = e instanceof Error ? e.message : String(e);
    return new VfsError("EIO", operation, path, {
      detail: sanitizeErrorMessage(message),
      hostCode,
      cause: e,
    });
  }
}

export function isVfsError(e: unknown, code?: VfsErrorCode): e is VfsError {
  return e instanceof VfsError && (code === undefined || e.code === code);
}

/**
 * Read the `code` property node:fs puts on its errors, if any.
 */
export function errnoCode(e: unknown): string | undefined {
  if (typeof e === "object" && e !== null && "code" in e) {
    const { code } = e;
    return typeof code === "string" ? code : undefined;
  }
  return undefined;
}

/**
 * Strip real OS paths and stack trace lines from a host error message.
 * Error codes (ENOENT, EACCES, ...) survive.
 */
export function sanitizeErrorMessage(message: string): string {
  if (!message) return message;

  let sanitized = message.replace(/\n\s+at\s.*/g, "");

  sanitized = sanitized.replace(
    /(?:\/(?:Users|home|private|var|opt|Library|System|usr|etc|tmp|nix|snap|root))\b[^\s'",)}\]:]*/g,
    "<path>",
  );
  sanitized = sanitized.replace(/[A-Z]:\\[^\s'",)}\]:]+/g, "<path>");

  return sanitized;
}
