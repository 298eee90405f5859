/**
 * Retry policy: exponential Backoff for OCI SDK calls
 *
 * Identity list operations are read-only and idempotent, so a transient
 * failure (throttling, 5xx, dropped connection) is retried before the
 * caller sees it. Permission and not-found errors are never retried.
 *
 * delay = min(backoffMs * backoffMultiplier^attempt, maxBackoffMs), optionally ±25% jitter.
 */

import { OCIError, isAuditError } from '@policy-audit/server/errors';

// ── Types ────────────────────────────────────────────────────────────────

/**
 * Retry policy configuration.
 * Controls how many times to retry and how long to wait between attempts.
 */
export interface RetryPolicy {
	/** Maximum number of retry attempts. 0 means no retries (try once). */
	maxRetries: number;
	/** Initial delay in milliseconds before the first retry. */
	backoffMs: number;
	/** Multiplier applied to the delay after each failure. Use 2 for doubling. */
	backoffMultiplier: number;
	/** Maximum delay cap in milliseconds. Defaults to 30,000ms. */
	maxBackoffMs?: number;
	/** Add random jitter (±25%) to the delay. Defaults to false. */
	jitter?: boolean;
}

/**
 * Options for a single retry execution.
 */
export interface RetryOptions<T> {
	/** The async operation to retry on failure */
	fn: () => Promise<T>;
	/** Retry policy configuration */
	policy: RetryPolicy;
	/** Decides whether a given failure is worth another attempt. Defaults to always. */
	shouldRetry?: (error: unknown) => boolean;
	/**
	 * Optional callback fired on each failed attempt.
	 * Receives the error, attempt number (0-based), and whether a retry will follow.
	 */
	onError?: (error: unknown, attempt: number, willRetry: boolean) => void;
	/** Injected for tests; defaults to a real timer. */
	sleep?: (ms: number) => Promise<void>;
}

// ── Preset Policies ──────────────────────────────────────────────────────

/** No retries: execute once and fail immediately on error. */
export const NO_RETRY: RetryPolicy = {
	maxRetries: 0,
	backoffMs: 0,
	backoffMultiplier: 1
};

/** Default for identity list calls: 2 retries starting at 1s, with jitter. */
export const OCI_LIST_RETRY: RetryPolicy = {
	maxRetries: 2,
	backoffMs: 1000,
	backoffMultiplier: 2,
	maxBackoffMs: 30_000,
	jitter: true
};

// ── Core Implementation ──────────────────────────────────────────────────

/**
 * Calculate the delay for a given attempt using exponential backoff.
 *
 * @param attempt - Zero-based attempt number (0 = first retry after initial failure)
 * @returns Delay in milliseconds
 */
export function calculateBackoffDelay(policy: RetryPolicy, attempt: number): number {
	const base = policy.backoffMs * Math.pow(policy.backoffMultiplier, attempt);
	const capped = Math.min(base, policy.maxBackoffMs ?? 30_000);

	if (policy.jitter) {
		const jitterFactor = 0.75 + Math.random() * 0.5;
		return Math.round(capped * jitterFactor);
	}

	return capped;
}

/**
 * Execute an async operation with retries and exponential backoff.
 *
 * Attempts to call `fn()` up to `maxRetries + 1` times total, stopping early
 * when `shouldRetry` rejects the failure.
 *
 * @throws The last error if all attempts fail.
 *
 * @example
 * const items = await withRetry({
 *   fn: () => listAllPages('listPolicies', { compartmentId }),
 *   policy: OCI_LIST_RETRY,
 *   shouldRetry: isTransientOCIError
 * });
 */
export async function withRetry<T>({
	fn,
	policy,
	shouldRetry = () => true,
	onError,
	sleep = defaultSleep
}: RetryOptions<T>): Promise<T> {
	for (let attempt = 0; ; attempt++) {
		try {
			return await fn();
		} catch (err) {
			const willRetry = attempt < policy.maxRetries && shouldRetry(err);

			onError?.(err, attempt, willRetry);

			if (!willRetry) throw err;

			await sleep(calculateBackoffDelay(policy, attempt));
		}
	}
}

/**
 * Merge a partial retry policy override with a base policy.
 *
 * @example
 * const policy = mergeRetryPolicy(OCI_LIST_RETRY, { maxRetries: 5 });
 */
export function mergeRetryPolicy(base: RetryPolicy, override: Partial<RetryPolicy>): RetryPolicy {
	return { ...base, ...override };
}

/**
 * Whether an OCI failure is transient: throttling (429), a server-side
 * error (5xx) or a call that failed without any HTTP status (connection
 * reset, timeout). Errors raised by the auditor itself, such as a malformed
 * payload or missing authentication, are never transient.
 */
export function isTransientOCIError(error: unknown): boolean {
	const statusCode = readStatusCode(error);
	if (statusCode !== undefined) return statusCode === 429 || statusCode >= 500;

	if (isAuditError(error)) {
		// An SDK failure without a status is wrapped with the network error as cause
		return error instanceof OCIError && error.cause !== undefined;
	}
	return true;
}

// ── Internal ─────────────────────────────────────────────────────────────

function readStatusCode(error: unknown): number | undefined {
	if (isAuditError(error)) {
		const status = error.context.statusCode;
		return typeof status === 'number' ? status : undefined;
	}
	if (error && typeof error === 'object' && 'statusCode' in error) {
		return typeof error.statusCode === 'number' ? error.statusCode : undefined;
	}
	return undefined;
}

function defaultSleep(ms: number): Promise<void> {
	return new Promise((resolve) => setTimeout(resolve, ms));
}
