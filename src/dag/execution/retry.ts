/**
 * @file Retry Policy
 *
 * Normalizes declared retry policies and computes the delay before
 * each retry.
 *
 * Delay for retry n (1-based):
 *   constant:    delayMs
 *   exponential: delayMs * 2^(n-1)
 * capped at maxDelayMs, then, with symmetric jitter, scaled by a
 * uniform factor in [0.5, 1.5).
 *
 * @module dag/execution
 */

import type { RetryPolicy, RetryPolicyInput } from '../graph/types.js';

/**
 * Fill defaults and validate a declared retry policy.
 *
 * @param defaultDelayMs - Delay used when the declaration omits one
 * @throws On negative or non-integer counts and negative delays
 */
export function retryPolicy_normalize(input: RetryPolicyInput, defaultDelayMs: number): RetryPolicy {
    if (!Number.isInteger(input.maxRetries) || input.maxRetries < 0) {
        throw new Error(`maxRetries must be a non-negative integer, got ${input.maxRetries}`);
    }
    const delayMs: number = input.delayMs ?? defaultDelayMs;
    if (!Number.isFinite(delayMs) || delayMs < 0) {
        throw new Error(`delayMs must be a non-negative number, got ${delayMs}`);
    }
    const maxDelayMs: number | null = input.maxDelayMs ?? null;
    if (maxDelayMs !== null && (!Number.isFinite(maxDelayMs) || maxDelayMs < 0)) {
        throw new Error(`maxDelayMs must be a non-negative number, got ${maxDelayMs}`);
    }
    return Object.freeze({
        maxRetries: input.maxRetries,
        delayMs,
        backoff: input.backoff ?? 'constant',
        jitter: input.jitter ?? 'none',
        maxDelayMs,
    });
}

/**
 * Delay in ms before retry number `retry` (1 for the first retry).
 *
 * @param random - Source of uniform [0, 1) values, used only for jitter
 */
export function retryDelay_compute(
    policy: RetryPolicy,
    retry: number,
    random: () => number = Math.random,
): number {
    let delay: number = policy.backoff === 'exponential'
        ? policy.delayMs * Math.pow(2, retry - 1)
        : policy.delayMs;

    if (policy.maxDelayMs !== null) {
        delay = Math.min(delay, policy.maxDelayMs);
    }
    if (policy.jitter === 'symmetric') {
        delay = delay * (0.5 + random());
    }
    return Math.round(delay);
}

/** Whether another attempt is allowed after `attempts` failed attempts. */
export function retry_allowed(policy: RetryPolicy | null, attempts: number): boolean {
    return policy !== null && attempts <= policy.maxRetries;
}
