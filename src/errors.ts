export type ErrorCode =
  | "STORE_UNAVAILABLE"
  | "PATH_NOT_FOUND"
  | "PARTIAL_DELETE_FAILURE"
  | "RENDER_FAILURE"
  | "INVALID_ALBUM_NAME"
  | "CONFIG_ERROR";

export class CloudAlbumError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Transport or auth failure talking to the object store. */
export class StoreUnavailableError extends CloudAlbumError {
  readonly operation: string;

  constructor(operation: string, cause: unknown) {
    super("STORE_UNAVAILABLE", `Object store ${operation} failed: ${describeError(cause)}`, {
      cause,
    });
    this.operation = operation;
  }
}

export class PathNotFoundError extends CloudAlbumError {
  readonly path: string;

  constructor(path: string) {
    super("PATH_NOT_FOUND", `Path not found: ${path}`);
    this.path = path;
  }
}

export class PartialDeleteFailureError extends CloudAlbumError {
  readonly album: string;
  readonly deleted: string[];
  readonly failed: string[];

  constructor(album: string, deleted: string[], failed: string[], cause?: unknown) {
    super(
      "PARTIAL_DELETE_FAILURE",
      `Deleted ${deleted.length} of ${deleted.length + failed.length} objects in album "${album}"`,
      { cause }
    );
    this.album = album;
    this.deleted = deleted;
    this.failed = failed;
  }
}

export class RenderFailureError extends CloudAlbumError {
  /** Album being rendered, or null for the index page. */
  readonly album: string | null;

  constructor(album: string | null, cause: unknown) {
    const target = album === null ? "index page" : `album "${album}"`;
    super("RENDER_FAILURE", `Failed to render ${target}: ${describeError(cause)}`, { cause });
    this.album = album;
  }
}

export class InvalidAlbumNameError extends CloudAlbumError {
  constructor(name: string, reason: string) {
    super("INVALID_ALBUM_NAME", `Invalid album name: "${name}" (${reason})`);
  }
}

export class ConfigError extends CloudAlbumError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("CONFIG_ERROR", message, options);
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function hasErrorName(error: unknown, ...names: string[]): boolean {
  return error instanceof Error && names.includes(error.name);
}
