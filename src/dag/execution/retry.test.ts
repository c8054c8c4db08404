/**
 * @file Retry Policy Tests
 *
 * @module dag/execution
 */

import { describe, it, expect } from 'vitest';
import { retryDelay_compute, retryPolicy_normalize, retry_allowed } from './retry.js';

describe('dag/execution/retry', (): void => {

    it('should fill defaults when normalizing', (): void => {
        expect(retryPolicy_normalize({ maxRetries: 2 }, 500)).toEqual({
            maxRetries: 2,
            delayMs: 500,
            backoff: 'constant',
            jitter: 'none',
            maxDelayMs: null,
        });
    });

    it('should reject negative retry counts and delays', (): void => {
        expect((): unknown => retryPolicy_normalize({ maxRetries: -1 }, 0)).toThrow(/maxRetries/);
        expect((): unknown => retryPolicy_normalize({ maxRetries: 1.5 }, 0)).toThrow(/maxRetries/);
        expect((): unknown => retryPolicy_normalize({ maxRetries: 1, delayMs: -5 }, 0)).toThrow(/delayMs/);
    });

    it('should keep a constant delay', (): void => {
        const policy = retryPolicy_normalize({ maxRetries: 3, delayMs: 100 }, 0);
        expect([1, 2, 3].map((n: number): number => retryDelay_compute(policy, n))).toEqual([100, 100, 100]);
    });

    it('should double the delay under exponential backoff', (): void => {
        const policy = retryPolicy_normalize({ maxRetries: 4, delayMs: 50, backoff: 'exponential' }, 0);
        expect([1, 2, 3, 4].map((n: number): number => retryDelay_compute(policy, n))).toEqual([50, 100, 200, 400]);
    });

    it('should cap the delay at maxDelayMs', (): void => {
        const policy = retryPolicy_normalize(
            { maxRetries: 5, delayMs: 100, backoff: 'exponential', maxDelayMs: 250 },
            0,
        );
        expect(retryDelay_compute(policy, 2)).toBe(200);
        expect(retryDelay_compute(policy, 3)).toBe(250);
        expect(retryDelay_compute(policy, 5)).toBe(250);
    });

    it('should scale by a factor in [0.5, 1.5) under symmetric jitter', (): void => {
        const policy = retryPolicy_normalize({ maxRetries: 1, delayMs: 100, jitter: 'symmetric' }, 0);
        expect(retryDelay_compute(policy, 1, (): number => 0)).toBe(50);
        expect(retryDelay_compute(policy, 1, (): number => 0.5)).toBe(100);
        expect(retryDelay_compute(policy, 1, (): number => 0.99)).toBe(149);
    });

    it('should allow exactly maxRetries retries', (): void => {
        const policy = retryPolicy_normalize({ maxRetries: 3 }, 0);
        expect(retry_allowed(policy, 1)).toBe(true);
        expect(retry_allowed(policy, 3)).toBe(true);
        expect(retry_allowed(policy, 4)).toBe(false);
        expect(retry_allowed(null, 1)).toBe(false);
    });
});
