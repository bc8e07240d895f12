/** Configuration for bounded exponential backoff. */
export interface RetryOptions {
    /** Maximum number of attempts (including the first). @default 3 */
    maxAttempts?: number;
    /** Delay in ms before the first retry. @default 1000 */
    baseDelayMs?: number;
    /** Multiplier applied to the delay after each failed attempt. @default 2 */
    backoffFactor?: number;
    /** Maximum delay cap in ms. @default 15000 */
    maxDelayMs?: number;
}

/** Where a retry sequence currently stands. */
export interface BackoffState {
    /** 1-based number of the attempt about to run (or that just failed). */
    attempt: number;
    /** Delay to wait after this attempt fails, before the next one. */
    delayMs: number;
}

export const RETRY_DEFAULTS: Required<RetryOptions> = {
    maxAttempts: 3,
    baseDelayMs: 1000,
    backoffFactor: 2,
    maxDelayMs: 15_000,
};

export function resolveRetryOptions(options: RetryOptions = {}): Required<RetryOptions> {
    return {
        maxAttempts: Math.max(1, Math.floor(options.maxAttempts ?? RETRY_DEFAULTS.maxAttempts)),
        baseDelayMs: Math.max(0, options.baseDelayMs ?? RETRY_DEFAULTS.baseDelayMs),
        backoffFactor: Math.max(1, options.backoffFactor ?? RETRY_DEFAULTS.backoffFactor),
        maxDelayMs: Math.max(0, options.maxDelayMs ?? RETRY_DEFAULTS.maxDelayMs),
    };
}

/** Delay before the retry that follows a failed `attempt`: base × factor^(attempt-1), capped. */
export function backoffDelay(attempt: number, options: Required<RetryOptions>): number {
    return Math.min(options.baseDelayMs * options.backoffFactor ** (attempt - 1), options.maxDelayMs);
}

export function initialBackoff(options: Required<RetryOptions>): BackoffState {
    return { attempt: 1, delayMs: backoffDelay(1, options) };
}

/**
 * Advance past a failed attempt.
 * Returns `null` once the attempt budget is spent.
 */
export function nextBackoff(state: BackoffState, options: Required<RetryOptions>): BackoffState | null {
    if (state.attempt >= options.maxAttempts) return null;
    const attempt = state.attempt + 1;
    return { attempt, delayMs: backoffDelay(attempt, options) };
}
