export type TrackerErrorCode = "CONFIGURATION_ERROR" | "PERSISTENCE_ERROR" | "NOT_FOUND";

export class TrackerError extends Error {
  readonly retryable: boolean = false;

  constructor(
    message: string,
    public readonly code: TrackerErrorCode,
    cause?: unknown,
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = "TrackerError";
  }
}

/**
 * An invalid lifecycle call or argument: duplicate run id, exercise operation
 * outside RUNNING, completion without a matching start, bad config file.
 */
export class ConfigurationError extends TrackerError {
  constructor(message: string, cause?: unknown) {
    super(message, "CONFIGURATION_ERROR", cause);
    this.name = "ConfigurationError";
  }
}

/** A failed write, or a snapshot that cannot be read or does not validate. */
export class PersistenceError extends TrackerError {
  override readonly retryable = true;

  constructor(
    message: string,
    public readonly path: string,
    cause?: unknown,
  ) {
    super(message, "PERSISTENCE_ERROR", cause);
    this.name = "PersistenceError";
  }
}

export class NotFoundError extends TrackerError {
  constructor(message: string, cause?: unknown) {
    super(message, "NOT_FOUND", cause);
    this.name = "NotFoundError";
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

export function isErrnoException(e: unknown): e is NodeJS.ErrnoException {
  return e instanceof Error && "code" in e;
}
