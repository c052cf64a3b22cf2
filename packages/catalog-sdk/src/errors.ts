export type MirrorErrorCode =
  | "INVALID_ARGUMENT"
  | "PARSE_ERROR"
  | "NETWORK_ERROR"
  | "FILESYSTEM_ERROR"
  | "INTEGRITY_ERROR"
  | "SYNC_IN_PROGRESS"
  | "UNKNOWN_ERROR";

/**
 * Base error for everything the mirror surfaces to a caller
 */
export class MirrorError extends Error {
  constructor(
    message: string,
    public readonly code: MirrorErrorCode,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      ...(this.cause instanceof Error && {
        cause: this.cause.message,
      }),
    };
  }
}

/**
 * A required parameter is missing or empty
 */
export class InvalidArgumentError extends MirrorError {
  constructor(
    public readonly argument: string,
    message = `Missing required argument: ${argument}`,
  ) {
    super(message, "INVALID_ARGUMENT");
  }
}

/**
 * A catalog payload is malformed or lacks the expected element shape
 */
export class ParseError extends MirrorError {
  constructor(message: string, cause?: unknown) {
    super(message, "PARSE_ERROR", cause);
  }
}

export class NetworkError extends MirrorError {
  constructor(
    message: string,
    public readonly url: string,
    public readonly status?: number,
    cause?: unknown,
  ) {
    super(message, "NETWORK_ERROR", cause);
  }

  toJSON() {
    return {
      ...super.toJSON(),
      url: this.url,
      ...(this.status !== undefined && { status: this.status }),
    };
  }
}

export class FilesystemError extends MirrorError {
  constructor(
    message: string,
    public readonly path: string,
    cause?: unknown,
  ) {
    super(message, "FILESYSTEM_ERROR", cause);
  }

  toJSON() {
    return {
      ...super.toJSON(),
      path: this.path,
    };
  }
}

/**
 * A downloaded package failed the trust check
 */
export class IntegrityError extends MirrorError {
  constructor(public readonly path: string) {
    super(`The signature on '${path}' is not valid - deleting`, "INTEGRITY_ERROR");
  }
}

/**
 * A sync was started on an engine that is already syncing
 */
export class SyncInProgressError extends MirrorError {
  constructor(public readonly cacheDirectory: string) {
    super(`A sync into '${cacheDirectory}' is already running`, "SYNC_IN_PROGRESS");
  }
}

/**
 * Convert unknown errors to MirrorError
 */
export function toMirrorError(error: unknown): MirrorError {
  if (error instanceof MirrorError) {
    return error;
  }

  if (error instanceof Error) {
    return new MirrorError(error.message, "UNKNOWN_ERROR", error);
  }

  return new MirrorError(String(error), "UNKNOWN_ERROR");
}

/**
 * Human-readable message plus the underlying cause, if any
 */
export function describeError(error: unknown): string {
  const mirrorError = toMirrorError(error);
  const cause = mirrorError.cause;

  if (cause instanceof Error && cause.message !== mirrorError.message) {
    return `${mirrorError.message} (cause: ${cause.message})`;
  }

  return mirrorError.message;
}

/**
 * Node.js error code of a failed fs call, if any
 */
export function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}
