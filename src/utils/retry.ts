export interface BackoffOptions {
  baseDelayMs: number;
  maxDelayMs: number;
  jitterMs?: number;
  random?: () => number;
}

/**
 * Exponential backoff with jitter for a zero-based attempt number:
 * min(maxDelay, base * 2^attempt + random * jitter).
 */
export function backoffDelay(
  attempt: number,
  { baseDelayMs, maxDelayMs, jitterMs = 0, random = Math.random }: BackoffOptions
): number {
  const jitter = jitterMs > 0 ? random() * jitterMs : 0;
  return Math.min(maxDelayMs, baseDelayMs * 2 ** attempt + jitter);
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
