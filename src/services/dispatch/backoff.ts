export interface BackoffConfig {
  baseDelayMs: number;
  maxDelayMs: number;
  multiplier: number;
  /** Total attempts allowed, the first one included. */
  maxAttempts: number;
}

export const DEFAULT_BACKOFF: BackoffConfig = {
  baseDelayMs: 30_000,
  maxDelayMs: 3_600_000, // 1 hour
  multiplier: 2,
  maxAttempts: 10,
};

/**
 * Delay before retry number `retry` (1-based): base, base*m, base*m^2, ...
 * capped at maxDelayMs.
 */
export function retryDelay(retry: number, config: Partial<BackoffConfig> = {}): number {
  const { baseDelayMs, maxDelayMs, multiplier } = { ...DEFAULT_BACKOFF, ...config };
  return Math.min(baseDelayMs * Math.pow(multiplier, Math.max(retry - 1, 0)), maxDelayMs);
}

/**
 * True while another attempt is allowed after `attemptsMade` failures.
 */
export function canRetry(attemptsMade: number, config: Partial<BackoffConfig> = {}): boolean {
  const { maxAttempts } = { ...DEFAULT_BACKOFF, ...config };
  return attemptsMade < maxAttempts;
}
