import {
  JobCancelledError,
  ProviderTimeoutError,
  ProviderUnavailableError,
  RateLimitedError,
  TransientProviderError,
} from "./errors";

export type ProviderErrorCategory =
  | "transient"
  | "rate_limited"
  | "timeout"
  | "unavailable"
  | "cancelled";

export type ProviderErrorClassification = {
  category: ProviderErrorCategory;
  // Consumes the stage's retry budget
  retryable: boolean;
  retryAfterMs: number | null;
  reason: string;
};

const RATE_LIMIT_PATTERNS = [
  /rate.?limit/i,
  /too.?many.?requests/i,
  /\b429\b/,
  /quota.?exceeded/i,
  /resource.?exhausted/i,
];

const TIMEOUT_PATTERNS = [/timed?.?out/i, /ETIMEDOUT/, /\b408\b/, /\b504\b/];

const UNAVAILABLE_PATTERNS = [
  /not.?installed/i,
  /not.?configured/i,
  /command not found/i,
  /\bENOENT\b/,
];

const RETRY_AFTER_PATTERNS = [
  /retry.?after[\s:=]+(\d+(?:\.\d+)?)\s*s/i,
  /retry in\s+(\d+(?:\.\d+)?)s/i,
  /"retryDelay"\s*:\s*"(\d+(?:\.\d+)?)s"/i,
];

export function parseRetryAfterMs(message: string): number | null {
  for (const pattern of RETRY_AFTER_PATTERNS) {
    const raw = message.match(pattern)?.[1];
    if (!raw) {
      continue;
    }
    const seconds = Number.parseFloat(raw);
    if (Number.isFinite(seconds) && seconds > 0) {
      return Math.ceil(seconds * 1000);
    }
  }
  return null;
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === "AbortError";
}

export function classifyProviderError(error: unknown): ProviderErrorClassification {
  if (error instanceof JobCancelledError) {
    return { category: "cancelled", retryable: false, retryAfterMs: null, reason: "cancelled" };
  }
  if (error instanceof ProviderUnavailableError) {
    return {
      category: "unavailable",
      retryable: false,
      retryAfterMs: null,
      reason: error.reason,
    };
  }
  if (error instanceof RateLimitedError) {
    return {
      category: "rate_limited",
      retryable: true,
      retryAfterMs: error.retryAfterMs,
      reason: error.message,
    };
  }
  if (error instanceof ProviderTimeoutError) {
    return { category: "timeout", retryable: true, retryAfterMs: null, reason: error.message };
  }
  if (error instanceof TransientProviderError) {
    return { category: "transient", retryable: true, retryAfterMs: null, reason: error.message };
  }
  if (isAbortError(error)) {
    return { category: "timeout", retryable: true, retryAfterMs: null, reason: "aborted" };
  }

  const message = error instanceof Error ? error.message : String(error);
  if (RATE_LIMIT_PATTERNS.some((pattern) => pattern.test(message))) {
    return {
      category: "rate_limited",
      retryable: true,
      retryAfterMs: parseRetryAfterMs(message),
      reason: message,
    };
  }
  if (TIMEOUT_PATTERNS.some((pattern) => pattern.test(message))) {
    return { category: "timeout", retryable: true, retryAfterMs: null, reason: message };
  }
  if (UNAVAILABLE_PATTERNS.some((pattern) => pattern.test(message))) {
    return { category: "unavailable", retryable: false, retryAfterMs: null, reason: message };
  }
  // Unknown failures spend retry budget rather than failing the stage outright
  return { category: "transient", retryable: true, retryAfterMs: null, reason: message };
}
