/**
 * Exponential backoff settings for the retry decorator.
 */
export interface RetryPolicy {
    readonly minDelayMs: number;
    readonly maxDelayMs: number;
    readonly factor: number;
    /** Total calls, the first one included. */
    readonly maxAttempts: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = Object.freeze({
    minDelayMs: 1000,
    maxDelayMs: 30000,
    factor: 2,
    maxAttempts: 4,
});

export class RetryPolicyError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'RetryPolicyError';
    }
}

/**
 * Merges overrides onto the defaults and validates the result.
 */
export function createRetryPolicy(overrides: Partial<RetryPolicy> = {}): RetryPolicy {
    const policy: RetryPolicy = { ...DEFAULT_RETRY_POLICY, ...overrides };

    if (!Number.isFinite(policy.minDelayMs) || policy.minDelayMs < 0) {
        throw new RetryPolicyError(`minDelayMs must be a non-negative number, got ${policy.minDelayMs}`);
    }
    if (!Number.isFinite(policy.maxDelayMs) || policy.maxDelayMs < policy.minDelayMs) {
        throw new RetryPolicyError(`maxDelayMs (${policy.maxDelayMs}) must be >= minDelayMs (${policy.minDelayMs})`);
    }
    if (!Number.isFinite(policy.factor) || policy.factor < 1) {
        throw new RetryPolicyError(`factor must be >= 1, got ${policy.factor}`);
    }
    if (!Number.isInteger(policy.maxAttempts) || policy.maxAttempts < 1) {
        throw new RetryPolicyError(`maxAttempts must be a positive integer, got ${policy.maxAttempts}`);
    }

    return Object.freeze(policy);
}

/**
 * Delay before retry number `attempt` (0 for the first retry):
 * minDelay * factor^attempt, clamped to [minDelay, maxDelay].
 */
export function computeRetryDelay(policy: RetryPolicy, attempt: number): number {
    const n = Math.max(0, Math.floor(attempt));
    const raw = policy.minDelayMs * Math.pow(policy.factor, n);
    // 0 * Infinity once factor^n overflows
    const delay = Number.isNaN(raw) ? policy.minDelayMs : raw;
    return Math.min(policy.maxDelayMs, Math.max(policy.minDelayMs, delay));
}
