import { ERROR_MESSAGES } from "../constants";
import { getErrorMessage } from "../utils/error-message";

export class RepoFleetError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
    if (cause && cause.stack) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }
}

export class NotFoundError extends RepoFleetError {
  constructor(message: string, cause?: Error) {
    super(message, "NOT_FOUND", cause);
  }
}

export class NotAFileError extends RepoFleetError {
  constructor(
    public readonly path: string,
    public readonly reference: string,
  ) {
    super(`'${path}' is not a file at '${reference}'`, "NOT_A_FILE");
  }
}

export class NotADirectoryError extends RepoFleetError {
  constructor(
    public readonly path: string,
    public readonly reference: string,
  ) {
    super(`'${path}' is not a directory at '${reference}'`, "NOT_A_DIRECTORY");
  }
}

export class InvalidReferenceError extends RepoFleetError {
  constructor(
    public readonly reference: string,
    cause?: Error,
  ) {
    super(`Reference '${reference}' does not resolve to a commit, tag or branch`, "INVALID_REFERENCE", cause);
  }
}

export class AlreadyExistsError extends RepoFleetError {
  constructor(message: string) {
    super(message, "ALREADY_EXISTS");
  }
}

export class CheckoutConflictError extends RepoFleetError {
  constructor(
    public readonly path: string,
    reason: string,
    cause?: Error,
  ) {
    super(`Checkout conflict at '${path}': ${reason}`, "CHECKOUT_CONFLICT", cause);
  }
}

export class DirtyWorkdirError extends RepoFleetError {
  constructor(
    public readonly path: string,
    public readonly changes: string[],
    cause?: Error,
  ) {
    super(`Worktree at '${path}' has uncommitted changes: ${changes.join(", ")}`, "DIRTY_WORKDIR", cause);
  }
}

export class InUseError extends RepoFleetError {
  constructor(
    public readonly path: string,
    public readonly changes: string[],
  ) {
    super(`Worktree at '${path}' is in use (uncommitted changes: ${changes.join(", ")})`, "IN_USE");
  }
}

export class PermissionDeniedError extends RepoFleetError {
  constructor(message: string, cause?: Error) {
    super(message, "PERMISSION_DENIED", cause);
  }
}

export class NetworkFailureError extends RepoFleetError {
  constructor(message: string, cause?: Error) {
    super(message, "NETWORK_FAILURE", cause);
  }
}

export class TimeoutError extends RepoFleetError {
  constructor(
    public readonly operation: string,
    public readonly timeoutMs: number,
  ) {
    super(`Operation '${operation}' exceeded its ${timeoutMs}ms ceiling`, "TIMEOUT");
  }
}

export class CancelledError extends RepoFleetError {
  constructor(public readonly reason: string) {
    super(`Cancelled: ${reason}`, "CANCELLED");
  }
}

export class InvalidStateError extends RepoFleetError {
  constructor(message: string) {
    super(message, "INVALID_STATE");
  }
}

export class InvalidNameError extends RepoFleetError {
  constructor(
    public readonly field: string,
    public readonly value: string,
  ) {
    super(`Invalid ${field} '${value}'`, "INVALID_NAME");
  }
}

export class GitOperationError extends RepoFleetError {
  constructor(operation: string, details: string, cause?: Error) {
    super(`Git operation '${operation}' failed: ${details}`, "GIT_OPERATION_FAILED", cause);
  }
}

export class ConfigValidationError extends RepoFleetError {
  constructor(
    public readonly field: string,
    public readonly reason: string,
  ) {
    super(`Invalid configuration for '${field}': ${reason}`, "CONFIG_VALIDATION_FAILED");
  }
}

function matchesAny(message: string, patterns: readonly string[]): boolean {
  return patterns.some((pattern) => message.includes(pattern));
}

export function isPermissionError(error: unknown): boolean {
  return matchesAny(getErrorMessage(error), ERROR_MESSAGES.PERMISSION_DENIED);
}

export function isNetworkError(error: unknown): boolean {
  return matchesAny(getErrorMessage(error), ERROR_MESSAGES.NETWORK_FAILURE);
}

export function isRemoteNotFoundError(error: unknown): boolean {
  return matchesAny(getErrorMessage(error), ERROR_MESSAGES.REMOTE_NOT_FOUND);
}

/**
 * Maps a failure raised by a remote Git operation (clone, fetch) onto the
 * fleet's error kinds. Errors that already carry a kind pass through.
 */
export function classifyGitError(error: unknown, operation: string): RepoFleetError {
  if (error instanceof RepoFleetError) {
    return error;
  }

  const message = getErrorMessage(error);
  const cause = error instanceof Error ? error : undefined;

  if (isPermissionError(message)) {
    return new PermissionDeniedError(`Git operation '${operation}' was denied: ${message}`, cause);
  }
  if (isRemoteNotFoundError(message)) {
    return new NotFoundError(`Git operation '${operation}' could not find the remote: ${message}`, cause);
  }
  if (isNetworkError(message)) {
    return new NetworkFailureError(`Git operation '${operation}' could not reach the remote: ${message}`, cause);
  }

  return new GitOperationError(operation, message, cause);
}

/**
 * Failures that may go away on another attempt. Everything else (validation,
 * permission, state) is final.
 */
export function isTransientError(error: unknown): boolean {
  if (error instanceof NetworkFailureError || error instanceof TimeoutError) {
    return true;
  }
  if (error instanceof RepoFleetError) {
    return false;
  }

  const code = error && typeof error === "object" && "code" in error ? error.code : undefined;
  if (typeof code === "string" && ERROR_MESSAGES.TRANSIENT_FS_CODES.some((transient) => transient === code)) {
    return true;
  }

  return isNetworkError(error);
}
