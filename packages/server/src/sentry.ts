/**
 * Sentry error-tracking wrapper with graceful degradation.
 *
 * If `SENTRY_DSN` is not set, every function in this module is a safe no-op.
 * This lets us import and call Sentry helpers unconditionally, with no feature
 * flags or conditional imports needed.
 *
 * The `@sentry/node` SDK is loaded lazily on the first `initSentry()` call
 * that has a DSN, so a plain audit run never pays for it.
 *
 * Usage:
 *   await initSentry({ dsn: process.env.SENTRY_DSN });
 *   captureError(err);
 *   const items = await wrapWithSpan('oci.identity.listPolicies', 'oci.sdk', () => call());
 *   await closeSentry();
 */

import { createLogger } from './logger.js';
import { isAuditError, type AuditError } from './errors.js';

const log = createLogger('sentry');

type SentrySdk = typeof import('@sentry/node');

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

/** Sentry initialisation options. */
export interface SentryConfig {
	/** Sentry DSN. If empty/undefined, Sentry is disabled. */
	dsn?: string;
	/** Deployment environment label (e.g. 'production', 'cloud-shell'). */
	environment?: string;
	/** Release/version tag. Defaults to `process.env.APP_VERSION`. */
	release?: string;
	/** Error sample rate 0..1. Default 1.0 (capture everything). */
	sampleRate?: number;
	/** Performance traces sample rate 0..1. Default 0.1. */
	tracesSampleRate?: number;
}

// ---------------------------------------------------------------------------
// Internal state
// ---------------------------------------------------------------------------

let initialized = false;
let sentry: SentrySdk | null = null;

// ---------------------------------------------------------------------------
// Init
// ---------------------------------------------------------------------------

/**
 * Initialise Sentry. Safe to call multiple times; subsequent calls are no-ops.
 *
 * If `dsn` is falsy, Sentry remains disabled and all helpers become no-ops.
 */
export async function initSentry(config: SentryConfig = {}): Promise<void> {
	if (initialized) return;
	initialized = true;

	const dsn = config.dsn || process.env.SENTRY_DSN;
	if (!dsn) {
		log.debug('Sentry DSN not configured, error tracking disabled');
		return;
	}

	try {
		const sdk = await import('@sentry/node');
		sdk.init({
			dsn,
			environment: config.environment || process.env.NODE_ENV || 'development',
			release: config.release || process.env.APP_VERSION || '0.0.0',
			sampleRate: config.sampleRate ?? 1.0,
			tracesSampleRate: config.tracesSampleRate ?? 0.1
		});
		sentry = sdk;
		log.info({ environment: config.environment }, 'Sentry initialized');
	} catch (err) {
		log.warn({ err }, 'Failed to initialize Sentry, running without error tracking');
	}
}

// ---------------------------------------------------------------------------
// Error capture
// ---------------------------------------------------------------------------

/**
 * Report an error to Sentry.
 *
 * If the error is an `AuditError`, its `toSentryExtras()` context is
 * attached as Sentry extras. For plain `Error`s, only the default stack
 * trace is sent.
 *
 * No-op when Sentry is disabled.
 */
export function captureError(err: Error | AuditError, extra: Record<string, unknown> = {}): void {
	if (!sentry) return;

	try {
		const auditExtras = isAuditError(err) ? err.toSentryExtras() : {};
		sentry.captureException(err, {
			extra: { ...auditExtras, ...extra }
		});
	} catch (captureErr) {
		log.warn({ err: captureErr }, 'Failed to capture error in Sentry');
	}
}

// ---------------------------------------------------------------------------
// Spans (manual instrumentation)
// ---------------------------------------------------------------------------

/**
 * Wrap an async function in a Sentry performance span.
 *
 * If Sentry is disabled, the function is called directly.
 *
 * @param name  Human-readable span description (e.g. 'oci.sdk.identity.listCompartments').
 * @param op    Span operation category (e.g. 'oci.sdk', 'report').
 * @param fn    The async work to instrument.
 */
export async function wrapWithSpan<T>(
	name: string,
	op: string,
	fn: () => T | Promise<T>
): Promise<T> {
	if (!sentry) {
		return fn();
	}

	return sentry.startSpan({ name, op }, () => fn());
}

// ---------------------------------------------------------------------------
// Shutdown
// ---------------------------------------------------------------------------

/**
 * Flush pending Sentry events and shut down the SDK.
 * Call this before the process exits so fatal errors are delivered.
 */
export async function closeSentry(timeoutMs = 2000): Promise<void> {
	if (!sentry) return;

	try {
		await sentry.close(timeoutMs);
		log.debug('Sentry flushed and closed');
	} catch (err) {
		log.warn({ err }, 'Error closing Sentry');
	}
}

// ---------------------------------------------------------------------------
// Status
// ---------------------------------------------------------------------------

/** Check if Sentry is currently active. */
export function isSentryEnabled(): boolean {
	return sentry !== null;
}
