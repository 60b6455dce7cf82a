export interface BackoffPolicy {
  readonly minDelayMs: number;
  readonly maxDelayMs: number;
  /** 0 disables jitter; must stay within [0, 1] so delays never shrink */
  readonly jitter: number;
}

const BACKOFF_MULTIPLIER = 2;

export const DEFAULT_BACKOFF: BackoffPolicy = {
  minDelayMs: 1_000,
  maxDelayMs: 30_000,
  jitter: 1,
};

/**
 * Delay before retry number `attempt` (0-based).
 *
 * The base doubles per attempt and jitter stretches it by up to one more
 * step, so the result lies in [base, 2 * base) and is never below the
 * previous attempt's. Capped at maxDelayMs.
 */
export function computeBackoffDelay(
  attempt: number,
  policy: BackoffPolicy = DEFAULT_BACKOFF,
  random: () => number = Math.random,
): number {
  const jitter = Math.max(0, Math.min(1, policy.jitter));
  const step = Math.max(0, Math.floor(attempt));
  const base = policy.minDelayMs * Math.pow(BACKOFF_MULTIPLIER, step);
  const r = Math.max(0, Math.min(random(), 0.999_999));

  return Math.round(Math.min(base * (1 + jitter * r), policy.maxDelayMs));
}
