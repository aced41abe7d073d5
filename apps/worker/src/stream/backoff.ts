/**
 * Exponential backoff with additive jitter.
 *
 * base delay = min(baseMs * 2^attempt, maxMs)
 * delay      = base delay + uniform jitter in [0, base delay)
 */

export interface BackoffDelay {
    /** Delay before jitter */
    baseDelayMs: number;
    /** Delay actually slept */
    delayMs: number;
}

export function computeBackoffDelay(
    attempt: number,
    baseMs: number,
    maxMs: number,
    random: () => number = Math.random
): BackoffDelay {
    const exponent = Math.max(0, attempt);
    const baseDelayMs = Math.min(baseMs * 2 ** exponent, maxMs);
    const jitter = Math.min(Math.max(random(), 0), 1 - Number.EPSILON) * baseDelayMs;
    return { baseDelayMs, delayMs: Math.floor(baseDelayMs + jitter) };
}
