import type { SyncStatus } from "./types";

export class MirrorSyncError extends Error {
  readonly retryable: boolean = false;

  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
    if (cause && cause.stack) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }
}

export class RequestTimeoutError extends MirrorSyncError {
  override readonly retryable = true;

  constructor(
    public readonly host: string,
    timeoutMs: number
  ) {
    super(`${host} request timed out after ${timeoutMs}ms`, "HTTP_TIMEOUT");
  }
}

export class UnavailableError extends MirrorSyncError {
  override readonly retryable = true;

  constructor(
    public readonly host: string,
    details: string,
    public readonly statusCode: number | null = null,
    cause?: Error
  ) {
    super(`${host} unavailable: ${details}`, "HOST_UNAVAILABLE", cause);
  }
}

export class RateLimitedError extends MirrorSyncError {
  override readonly retryable = true;

  constructor(
    public readonly host: string,
    public readonly retryAfterMs: number | null
  ) {
    super(
      `${host} rate limit exceeded${retryAfterMs === null ? "" : ` (retryAfterMs=${retryAfterMs})`}`,
      "HOST_RATE_LIMITED"
    );
  }
}

export class AuthError extends MirrorSyncError {
  constructor(
    public readonly host: string,
    public readonly statusCode: number | null,
    details: string
  ) {
    super(`${host} rejected credentials: ${details}`, "HOST_AUTH");
  }
}

export class NotFoundError extends MirrorSyncError {
  constructor(
    public readonly host: string,
    public readonly resource: string
  ) {
    super(`${host} resource not found: ${resource}`, "HOST_NOT_FOUND");
  }
}

export class ConflictError extends MirrorSyncError {
  constructor(public readonly repoName: string) {
    super(`Destination repository '${repoName}' already exists`, "DESTINATION_CONFLICT");
  }
}

export class NetworkError extends MirrorSyncError {
  override readonly retryable = true;

  constructor(operation: string, details: string, cause?: Error) {
    super(`Git ${operation} network failure: ${details}`, "GIT_NETWORK", cause);
  }
}

export class TransferTimeoutError extends MirrorSyncError {
  override readonly retryable = true;

  constructor(public readonly timeoutMs: number) {
    super(`Git transfer timed out after ${timeoutMs}ms`, "GIT_TIMEOUT");
  }
}

export class GitTransferError extends MirrorSyncError {
  constructor(operation: string, details: string, cause?: Error) {
    super(`Git ${operation} failed: ${details}`, "GIT_TRANSFER_FAILED", cause);
  }
}

export class InvalidEventError extends MirrorSyncError {
  constructor(
    public readonly field: string,
    public readonly reason: string
  ) {
    super(`Invalid star event field '${field}': ${reason}`, "EVENT_INVALID");
  }
}

export class IllegalTransitionError extends MirrorSyncError {
  constructor(
    public readonly from: SyncStatus,
    public readonly to: SyncStatus
  ) {
    super(`Illegal sync status transition ${from} -> ${to}`, "STATE_ILLEGAL_TRANSITION");
  }
}

export class StaleRecordError extends MirrorSyncError {
  constructor(
    public readonly recordId: number,
    public readonly expected: SyncStatus
  ) {
    super(
      `Sync record ${recordId} is no longer in status ${expected}`,
      "STATE_STALE_RECORD"
    );
  }
}

export class ConfigError extends MirrorSyncError {
  constructor(
    public readonly variable: string,
    reason: string
  ) {
    super(`Invalid configuration for ${variable}: ${reason}`, "CONFIG_INVALID");
  }
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }

  return String(error);
}
