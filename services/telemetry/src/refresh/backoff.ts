export type BackoffOptions = {
  baseMs: number;
  maxMs: number;
  factor?: number;
  jitterRatio?: number;
  random?: () => number;
};

function clamp(value: number, min: number, max: number): number {
  if (Number.isNaN(value)) {
    return min;
  }
  return Math.min(Math.max(value, min), max);
}

/** Delay before retry number `attempt` (1-based), doubling from `baseMs` up to `maxMs`. */
export function computeExponentialBackoff(attempt: number, options: BackoffOptions): number {
  const normalizedAttempt = Math.max(1, Math.floor(attempt));
  const { baseMs, maxMs, factor = 2, jitterRatio = 0.2, random = Math.random } = options;

  const rawDelay = baseMs * Math.pow(factor, normalizedAttempt - 1);
  const cappedDelay = clamp(rawDelay, baseMs, maxMs);

  if (jitterRatio <= 0) {
    return Math.round(cappedDelay);
  }

  const jitterSpan = cappedDelay * jitterRatio;
  const jitter = (random() * 2 - 1) * jitterSpan;
  return Math.round(clamp(cappedDelay + jitter, baseMs, maxMs));
}
