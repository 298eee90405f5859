/**
 * Retry Policy Tests
 *
 * - calculateBackoffDelay: exponential formula, cap, jitter bounds
 * - withRetry: success on first attempt, retry on failure, exhaustion, shouldRetry veto
 * - isTransientOCIError: throttling, 5xx, client errors, connection failures
 */

import { describe, it, expect, vi } from 'vitest';
import { OCIError, ValidationError } from '@policy-audit/server/errors';
import {
	calculateBackoffDelay,
	isTransientOCIError,
	mergeRetryPolicy,
	withRetry,
	NO_RETRY,
	OCI_LIST_RETRY,
	type RetryPolicy
} from './retry.js';

const noSleep = vi.fn(async (_ms: number) => {});

// ── calculateBackoffDelay ─────────────────────────────────────────────────

describe('calculateBackoffDelay', () => {
	const policy: RetryPolicy = { maxRetries: 5, backoffMs: 100, backoffMultiplier: 2 };

	it('applies 2^attempt exponential formula', () => {
		// 100 * 2^0 = 100, 100 * 2^1 = 200, 100 * 2^2 = 400
		expect(calculateBackoffDelay(policy, 0)).toBe(100);
		expect(calculateBackoffDelay(policy, 1)).toBe(200);
		expect(calculateBackoffDelay(policy, 2)).toBe(400);
	});

	it('caps delay at maxBackoffMs', () => {
		// 1000 * 2^5 = 32000, capped at 5000
		expect(
			calculateBackoffDelay({ maxRetries: 10, backoffMs: 1000, backoffMultiplier: 2, maxBackoffMs: 5000 }, 5)
		).toBe(5000);
	});

	it('keeps jitter within ±25%', () => {
		for (let i = 0; i < 50; i++) {
			const delay = calculateBackoffDelay({ ...policy, jitter: true }, 0);
			expect(delay).toBeGreaterThanOrEqual(75);
			expect(delay).toBeLessThanOrEqual(125);
		}
	});
});

// ── withRetry ─────────────────────────────────────────────────────────────

describe('withRetry', () => {
	it('returns immediately on success', async () => {
		const fn = vi.fn(async () => 'ok');

		await expect(withRetry({ fn, policy: OCI_LIST_RETRY, sleep: noSleep })).resolves.toBe('ok');
		expect(fn).toHaveBeenCalledTimes(1);
	});

	it('retries until the operation succeeds', async () => {
		const fn = vi
			.fn<() => Promise<string>>()
			.mockRejectedValueOnce(new Error('reset'))
			.mockResolvedValueOnce('ok');
		const sleep = vi.fn(async (_ms: number) => {});

		const result = await withRetry({
			fn,
			policy: { maxRetries: 2, backoffMs: 10, backoffMultiplier: 2 },
			sleep
		});

		expect(result).toBe('ok');
		expect(sleep).toHaveBeenCalledWith(10);
	});

	it('throws the last error once retries are exhausted', async () => {
		const fn = vi
			.fn<() => Promise<string>>()
			.mockRejectedValueOnce(new Error('first'))
			.mockRejectedValueOnce(new Error('second'))
			.mockRejectedValueOnce(new Error('third'));

		await expect(
			withRetry({ fn, policy: mergeRetryPolicy(OCI_LIST_RETRY, { maxRetries: 2 }), sleep: noSleep })
		).rejects.toThrow('third');
		expect(fn).toHaveBeenCalledTimes(3);
	});

	it('runs once with NO_RETRY', async () => {
		const fn = vi.fn(async () => {
			throw new Error('nope');
		});

		await expect(withRetry({ fn, policy: NO_RETRY, sleep: noSleep })).rejects.toThrow('nope');
		expect(fn).toHaveBeenCalledTimes(1);
	});

	it('stops when shouldRetry rejects the failure', async () => {
		const fn = vi.fn(async () => {
			throw new OCIError('forbidden', { statusCode: 404 });
		});
		const onError = vi.fn();

		await expect(
			withRetry({ fn, policy: OCI_LIST_RETRY, shouldRetry: isTransientOCIError, onError, sleep: noSleep })
		).rejects.toThrow('forbidden');
		expect(fn).toHaveBeenCalledTimes(1);
		expect(onError).toHaveBeenCalledWith(expect.any(OCIError), 0, false);
	});
});

// ── mergeRetryPolicy ──────────────────────────────────────────────────────

describe('mergeRetryPolicy', () => {
	it('overrides only the given fields', () => {
		expect(mergeRetryPolicy(OCI_LIST_RETRY, { maxRetries: 5 })).toEqual({
			maxRetries: 5,
			backoffMs: 1000,
			backoffMultiplier: 2,
			maxBackoffMs: 30_000,
			jitter: true
		});
	});
});

// ── isTransientOCIError ───────────────────────────────────────────────────

describe('isTransientOCIError', () => {
	it('retries throttling and server errors', () => {
		expect(isTransientOCIError(new OCIError('throttled', { statusCode: 429 }))).toBe(true);
		expect(isTransientOCIError(new OCIError('unavailable', { statusCode: 503 }))).toBe(true);
		expect(isTransientOCIError({ statusCode: 500 })).toBe(true);
	});

	it('does not retry client errors', () => {
		expect(isTransientOCIError(new OCIError('not found', { statusCode: 404 }))).toBe(false);
		expect(isTransientOCIError({ statusCode: 401 })).toBe(false);
	});

	it('retries network failures without an HTTP status', () => {
		expect(isTransientOCIError(new Error('ECONNRESET'))).toBe(true);
		expect(isTransientOCIError(new OCIError('socket hang up', {}, new Error('ECONNRESET')))).toBe(true);
	});

	it('does not retry failures raised by the auditor itself', () => {
		expect(isTransientOCIError(new OCIError('Malformed response from identity.listPolicies'))).toBe(false);
		expect(isTransientOCIError(new ValidationError('OCI authentication has not been initialized'))).toBe(
			false
		);
	});
});
