export interface StageBackoffOptions {
  // Stable seed so the same job/stage/attempt always waits the same time
  seed: string;
  // 1-based count of failed attempts against the current provider
  failedAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  jitterRatio?: number;
  retryAfterMs?: number | null;
}

export interface StageBackoffResult {
  delayMs: number;
  exponentialMs: number;
  jitterMs: number;
  retryAfterMs: number | null;
}

function deterministicJitter(seed: string, maxJitterMs: number): number {
  if (maxJitterMs <= 0) {
    return 0;
  }
  let hash = 0;
  for (let index = 0; index < seed.length; index += 1) {
    hash = (hash * 31 + seed.charCodeAt(index)) >>> 0;
  }
  return hash % (maxJitterMs + 1);
}

// base x 2^(failedAttempts - 1), capped; a provider retry hint wins when longer
export function computeStageBackoff(options: StageBackoffOptions): StageBackoffResult {
  const baseDelayMs = Math.max(0, Math.floor(options.baseDelayMs));
  const maxDelayMs = Math.max(baseDelayMs, Math.floor(options.maxDelayMs));
  const failedAttempts = Math.max(1, Math.floor(options.failedAttempts));
  const jitterRatio =
    options.jitterRatio !== undefined && Number.isFinite(options.jitterRatio)
      ? Math.min(Math.max(options.jitterRatio, 0), 1)
      : 0.1;
  const retryAfterMs =
    options.retryAfterMs !== undefined && options.retryAfterMs !== null && options.retryAfterMs > 0
      ? options.retryAfterMs
      : null;

  const exponentialMs = Math.min(maxDelayMs, baseDelayMs * 2 ** (failedAttempts - 1));
  if (retryAfterMs !== null && retryAfterMs >= exponentialMs) {
    return {
      delayMs: Math.min(maxDelayMs, retryAfterMs),
      exponentialMs,
      jitterMs: 0,
      retryAfterMs,
    };
  }

  const maxJitterMs = Math.floor(exponentialMs * jitterRatio);
  const jitterMs = deterministicJitter(`${options.seed}:${failedAttempts}`, maxJitterMs);
  return {
    delayMs: Math.min(maxDelayMs, exponentialMs + jitterMs),
    exponentialMs,
    jitterMs,
    retryAfterMs,
  };
}
