export interface BackoffPolicy {
    initialIntervalMs: number;
    multiplier: number;
    maxIntervalMs: number;
    jitterRatio: number;
}

export const DEFAULT_BACKOFF: BackoffPolicy = {
    initialIntervalMs: 1000,
    multiplier: 4,
    maxIntervalMs: 60_000,
    jitterRatio: 0.1,
};

// Exponential backoff: base-4 gives 1s → 4s → 16s → 64s (capped at maxIntervalMs).
// attempt is the 1-indexed attempt that just failed; attempt=1 waits initialIntervalMs.
export function calculateBackOff(
    attempt: number,
    policy: BackoffPolicy = DEFAULT_BACKOFF,
    random: () => number = Math.random,
): number {
    const delay = Math.min(
        policy.initialIntervalMs * Math.pow(policy.multiplier, attempt - 1),
        policy.maxIntervalMs,
    );
    // ±jitterRatio spread so retries from parallel tasks don't line up
    const jitter = delay * policy.jitterRatio;
    return Math.max(0, Math.floor(delay + (random() * 2 - 1) * jitter));
}
