/**
 * Error Classification
 *
 * Maps a failed claims fetch to its attempt result tag and decides whether
 * the orchestrator should back off and try the backend again.
 *
 * @module error-classification
 */

import { ClaimsFetchError } from "./claims-http";
import type { ClaimsFetchResult } from "./types";

export type ClassifiedFetchError = {
  result: ClaimsFetchResult;
  httpStatus: number | null;
  message: string;
  retriable: boolean;
};

/** HTTP statuses worth another try after a backoff delay. */
export const RETRYABLE_HTTP_STATUS: ReadonlySet<number> = new Set([
  403, 408, 409, 412, 425, 429, 500, 502, 503, 504,
]);

const TIMEOUT_PATTERNS = [/timeout/i, /timed?\s*out/i, /ETIMEDOUT/i, /UND_ERR_.*TIMEOUT/i];

const NETWORK_PATTERNS = [
  /fetch failed/i,
  /ECONNRESET/i,
  /ECONNREFUSED/i,
  /ENOTFOUND/i,
  /EAI_AGAIN/i,
  /socket hang up/i,
  /network/i,
];

function statusResult(status: number): ClaimsFetchResult {
  switch (status) {
    case 403:
      return "fetch_blocked_403";
    case 412:
      return "fetch_blocked_412";
    case 503:
      return "fetch_blocked_503";
    case 429:
      return "fetch_failed_429";
    default:
      return "fetch_failed_http";
  }
}

function describe(error: unknown): { message: string; name: string; causeMessage: string } {
  if (error instanceof Error) {
    const cause: unknown = error.cause;
    const causeMessage =
      cause instanceof Error
        ? `${cause.message} ${"code" in cause && typeof cause.code === "string" ? cause.code : ""}`
        : "";
    return { message: error.message, name: error.name, causeMessage };
  }
  return { message: String(error), name: "", causeMessage: "" };
}

/**
 * Classify a fetch failure.
 */
export function classifyFetchError(error: unknown): ClassifiedFetchError {
  if (error instanceof ClaimsFetchError) {
    return {
      result: statusResult(error.status),
      httpStatus: error.status,
      message: error.message,
      retriable: RETRYABLE_HTTP_STATUS.has(error.status),
    };
  }

  const { message, name, causeMessage } = describe(error);
  const haystack = `${message} ${causeMessage}`;

  if (name === "TimeoutError" || name === "AbortError" || TIMEOUT_PATTERNS.some((p) => p.test(haystack))) {
    return { result: "fetch_timeout", httpStatus: null, message, retriable: true };
  }

  if (NETWORK_PATTERNS.some((p) => p.test(haystack))) {
    return { result: "fetch_failed_network", httpStatus: null, message, retriable: true };
  }

  return { result: "error", httpStatus: null, message, retriable: false };
}

/**
 * Results after which the backend may be tried again (with backoff).
 */
export function isRetriableResult(result: ClaimsFetchResult, httpStatus: number | null): boolean {
  switch (result) {
    case "fetch_blocked_403":
    case "fetch_blocked_412":
    case "fetch_blocked_503":
    case "fetch_failed_429":
    case "fetch_timeout":
    case "fetch_failed_network":
      return true;
    case "fetch_failed_http":
      return httpStatus !== null && RETRYABLE_HTTP_STATUS.has(httpStatus);
    default:
      return false;
  }
}
