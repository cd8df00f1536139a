/**
 * Error types for the serial bridge.
 *
 * Every error carries a stable `code` so callers can branch on the
 * condition without matching message text.
 */

export type BridgeErrorCode =
  | "NOT_READY"
  | "BACKEND_OPERATION"
  | "BACKEND_INIT"
  | "TIMEOUT"
  | "ILLEGAL_STATE";

export class BridgeError extends Error {
  readonly code: BridgeErrorCode;

  constructor(code: BridgeErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "BridgeError";
    this.code = code;
  }
}

/** The backend was never initialized, failed to initialize, or was closed. */
export class NotReadyError extends BridgeError {
  constructor(operation: string) {
    super("NOT_READY", `Backend not initialized (operation: ${operation})`);
    this.name = "NotReadyError";
  }
}

/** A failure raised inside one operation, tagged with the operation name. */
export class BackendOperationError extends BridgeError {
  readonly operation: string;

  constructor(operation: string, cause: unknown) {
    super("BACKEND_OPERATION", `${operation} failed: ${extractErrorMessage(cause)}`, { cause });
    this.name = "BackendOperationError";
    this.operation = operation;
  }
}

export class BackendInitError extends BridgeError {
  constructor(cause: unknown) {
    super("BACKEND_INIT", `Backend initialization failed: ${extractErrorMessage(cause)}`, { cause });
    this.name = "BackendInitError";
  }
}

export class BridgeTimeoutError extends BridgeError {
  readonly operation: string;
  readonly timeoutMs: number;

  constructor(operation: string, timeoutMs: number) {
    super("TIMEOUT", `${operation} timed out after ${timeoutMs}ms`);
    this.name = "BridgeTimeoutError";
    this.operation = operation;
    this.timeoutMs = timeoutMs;
  }
}

export class IllegalStateError extends BridgeError {
  constructor(message: string) {
    super("ILLEGAL_STATE", message);
    this.name = "IllegalStateError";
  }
}

/**
 * Standard error extraction from various thrown values
 */
export function extractErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === "object" && error !== null) {
    return "message" in error && typeof error.message === "string"
      ? error.message
      : JSON.stringify(error);
  }
  return String(error);
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(extractErrorMessage(error));
}
