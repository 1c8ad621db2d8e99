import { MirrorSyncError, getErrorMessage } from "../errors";

export type ErrorKind = "transient" | "permanent";

export interface ClassifiedError {
  kind: ErrorKind;
  code: string;
  message: string;
}

const CREDENTIALS_IN_URL = /([a-z][a-z0-9+.-]*:\/\/)[^/\s:@]+(?::[^/\s@]*)?@/gi;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/** Strips URL credentials and every known secret from upstream error text. */
export function sanitizeErrorMessage(message: string, secrets: readonly string[]): string {
  let sanitized = message.replace(CREDENTIALS_IN_URL, "$1***@");

  for (const secret of secrets) {
    if (secret.length === 0) {
      continue;
    }

    sanitized = sanitized.replace(new RegExp(escapeRegExp(secret), "g"), "***");
  }

  return sanitized;
}

/**
 * Unknown failures count as transient: they are retried until the record's
 * retry budget runs out rather than parked on first sight.
 */
export function classifyError(error: unknown, secrets: readonly string[]): ClassifiedError {
  const message = sanitizeErrorMessage(getErrorMessage(error), secrets);

  if (error instanceof MirrorSyncError) {
    return {
      kind: error.retryable ? "transient" : "permanent",
      code: error.code,
      message
    };
  }

  return { kind: "transient", code: "UNKNOWN", message };
}
