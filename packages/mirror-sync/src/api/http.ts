import {
  AuthError,
  MirrorSyncError,
  NotFoundError,
  RateLimitedError,
  RequestTimeoutError,
  UnavailableError
} from "../errors";
import { parseRateLimitResetMs, parseRetryAfterMs } from "./retryPolicy";

export type FetchLike = typeof fetch;

export interface HttpClientDependencies {
  fetchImpl?: FetchLike;
  now?: () => number;
}

export function normalizeBaseUrl(baseUrl: string): string {
  return baseUrl.endsWith("/") ? baseUrl : `${baseUrl}/`;
}

export function isRecordLike(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Sends a request and hands the response to `read` while the timeout is
 * still armed, so a stalled body counts against the same deadline as the
 * headers.
 */
export async function fetchWithTimeout<T>(
  host: string,
  fetchImpl: FetchLike,
  requestUrl: URL,
  requestInit: RequestInit,
  timeoutMs: number,
  read: (response: Response) => Promise<T>
): Promise<T> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => {
    controller.abort();
  }, timeoutMs);

  try {
    const response = await fetchImpl(requestUrl, {
      ...requestInit,
      signal: controller.signal
    });
    return await read(response);
  } catch (error) {
    if (controller.signal.aborted) {
      throw new RequestTimeoutError(host, timeoutMs);
    }

    if (error instanceof MirrorSyncError) {
      throw error;
    }

    const cause = error instanceof Error ? error : undefined;
    throw new UnavailableError(
      host,
      cause ? cause.message : String(error),
      null,
      cause
    );
  } finally {
    clearTimeout(timeoutId);
  }
}

async function readBodySnippet(response: Response): Promise<string> {
  const body = await response.text();
  return body.length > 200 ? `${body.slice(0, 200)}...` : body;
}

/**
 * Maps a non-success response onto the error taxonomy shared by both host
 * clients.
 */
export async function errorFromResponse(
  host: string,
  resource: string,
  response: Response,
  nowMs: number
): Promise<MirrorSyncError> {
  const status = response.status;

  const rateLimitWaitMs = parseRateLimitResetMs(
    response.headers.get("x-ratelimit-remaining"),
    response.headers.get("x-ratelimit-reset"),
    nowMs
  );
  if (status === 429 || (status === 403 && rateLimitWaitMs !== null)) {
    return new RateLimitedError(
      host,
      parseRetryAfterMs(response.headers.get("retry-after"), nowMs) ?? rateLimitWaitMs
    );
  }

  const body = await readBodySnippet(response);
  const details = body ? `status ${status}: ${body}` : `status ${status}`;

  if (status === 401 || status === 403) {
    return new AuthError(host, status, details);
  }

  if (status === 404) {
    return new NotFoundError(host, resource);
  }

  if (status >= 500) {
    return new UnavailableError(host, details, status);
  }

  return new MirrorSyncError(`${host} rejected request for ${resource}: ${details}`, "HOST_REJECTED");
}

export function withCredentials(rawUrl: string, username: string, password: string): string {
  if (!password) {
    return rawUrl;
  }

  const url = new URL(rawUrl);
  url.username = encodeURIComponent(username);
  url.password = encodeURIComponent(password);
  return url.toString();
}
