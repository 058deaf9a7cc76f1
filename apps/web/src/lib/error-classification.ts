/**
 * Error Classification
 *
 * Classifies errors thrown by an LLM provider call so the reasoning client can
 * decide whether a retry is worthwhile. Anything classified here is a
 * transport-level failure; malformed output is handled separately as a parse
 * error and never reaches this module.
 *
 * @module error-classification
 */

export type ErrorCategory = "timeout" | "rate_limit" | "provider_outage" | "network" | "unknown";

export type ClassifiedError = {
  category: ErrorCategory;
  message: string;
  retriable: boolean;
  statusCode: number | null;
};

/** Patterns indicating LLM provider rate limiting or overload */
const LLM_RATE_LIMIT_PATTERNS = [
  /status\s*(?:code\s*)?429/i,
  /status\s*(?:code\s*)?529/i,
  /status\s*(?:code\s*)?503/i,
  /rate\s*limit/i,
  /too\s*many\s*requests/i,
  /overloaded/i,
  /capacity/i,
];

const LLM_AUTH_PATTERNS = [
  /api\s*key/i,
  /authentication/i,
  /unauthorized/i,
  /invalid.*key/i,
  /status\s*(?:code\s*)?401/i,
  /status\s*(?:code\s*)?403/i,
];

const TIMEOUT_PATTERNS = [
  /timeout/i,
  /timed?\s*out/i,
  /ETIMEDOUT/i,
];

const NETWORK_PATTERNS = [
  /ECONNRESET/i,
  /ECONNREFUSED/i,
  /EAI_AGAIN/i,
  /ENOTFOUND/i,
  /socket hang up/i,
  /fetch failed/i,
  /network/i,
];

function readStatusCode(error: unknown): number | null {
  if (!error || typeof error !== "object") return null;
  const status = "statusCode" in error ? error.statusCode : "status" in error ? error.status : undefined;
  return typeof status === "number" ? status : null;
}

function readIsRetryable(error: unknown): boolean | null {
  if (!error || typeof error !== "object" || !("isRetryable" in error)) return null;
  return typeof error.isRetryable === "boolean" ? error.isRetryable : null;
}

/**
 * Classify an error to determine its category and whether the call that
 * produced it may be retried.
 */
export function classifyError(error: unknown): ClassifiedError {
  const msg = error instanceof Error ? error.message : String(error);
  const name = error instanceof Error ? error.name : "";
  const statusCode = readStatusCode(error);

  if (name === "TimeoutError" || name === "AbortError" || TIMEOUT_PATTERNS.some((p) => p.test(msg))) {
    return { category: "timeout", message: msg, retriable: true, statusCode };
  }

  // Status codes from the AI SDK APICallError shape take precedence over message sniffing
  if (statusCode !== null) {
    if (statusCode === 401 || statusCode === 403) {
      return { category: "provider_outage", message: msg, retriable: false, statusCode };
    }
    if (statusCode === 429 || statusCode === 529) {
      return { category: "rate_limit", message: msg, retriable: true, statusCode };
    }
    if (statusCode >= 500) {
      return { category: "provider_outage", message: msg, retriable: true, statusCode };
    }
  }

  if (LLM_AUTH_PATTERNS.some((p) => p.test(msg))) {
    return { category: "provider_outage", message: msg, retriable: false, statusCode };
  }

  if (LLM_RATE_LIMIT_PATTERNS.some((p) => p.test(msg))) {
    return { category: "rate_limit", message: msg, retriable: true, statusCode };
  }

  if (NETWORK_PATTERNS.some((p) => p.test(msg))) {
    return { category: "network", message: msg, retriable: true, statusCode };
  }

  const isRetryable = readIsRetryable(error);
  if (isRetryable !== null) {
    return { category: "unknown", message: msg, retriable: isRetryable, statusCode };
  }

  return { category: "unknown", message: msg, retriable: false, statusCode };
}
