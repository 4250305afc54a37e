/**
 * Error taxonomy for the reconciliation engine.
 */

/** Discriminant carried by every engine error */
export type EngineErrorCode = "IO_FAILURE" | "TIMEOUT" | "CANCELLED" | "ASSISTANT_FAILURE";

/** Base class for errors raised by the engine */
export class EngineError extends Error {
  constructor(
    message: string,
    public readonly code: EngineErrorCode
  ) {
    super(message);
    this.name = "EngineError";
  }
}

/** A file could not be read or written, or changed on disk since it was read */
export class IOFailureError extends EngineError {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly stale = false
  ) {
    super(message, "IO_FAILURE");
    this.name = "IOFailureError";
  }
}

/** A scan, read or assistant call exceeded its time bound */
export class TimeoutError extends EngineError {
  constructor(
    message: string,
    public readonly timeoutMs: number
  ) {
    super(message, "TIMEOUT");
    this.name = "TimeoutError";
  }
}

/** The run was cancelled through its abort signal */
export class CancelledError extends EngineError {
  constructor(message = "Run cancelled") {
    super(message, "CANCELLED");
    this.name = "CancelledError";
  }
}

/** The assistant service is unavailable or returned nothing usable */
export class AssistantError extends EngineError {
  constructor(message: string) {
    super(message, "ASSISTANT_FAILURE");
    this.name = "AssistantError";
  }
}

/** Configuration could not be loaded or validated */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * Get a human-readable error message from an unknown error
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === "string") {
    return error;
  }
  return "Unknown error";
}
