/**
 * Structured error hierarchy for the policy auditor.
 *
 * Every error carries a machine-readable `code`, the process `exitCode`
 * to use if it ends the run, and an arbitrary `context` bag for structured
 * logging. All errors serialise cleanly to JSON (for Pino) and to Sentry extras.
 *
 * Usage:
 *   throw new ValidationError('POLICY_AUDIT_MAX_DEPTH must be a positive integer', { value });
 *   throw new OCIError('listPolicies failed', { compartmentId, statusCode: 404 });
 */

// ---------------------------------------------------------------------------
// Base class
// ---------------------------------------------------------------------------

/**
 * Base error for all auditor-originated errors.
 *
 * Subclasses set a fixed `code` (e.g. `VALIDATION_ERROR`) and default `exitCode`.
 */
export class AuditError extends Error {
	/** Machine-readable error code (e.g. `VALIDATION_ERROR`, `OCI_ERROR`). */
	readonly code: string;

	/** Process exit code to use when this error aborts the run. */
	readonly exitCode: number;

	/** Arbitrary structured context for logging / diagnostics. */
	readonly context: Record<string, unknown>;

	/** Optional upstream error that caused this one. */
	readonly cause?: Error;

	constructor(
		code: string,
		message: string,
		exitCode: number,
		context: Record<string, unknown> = {},
		cause?: Error
	) {
		super(message, { cause });
		this.name = this.constructor.name;
		this.code = code;
		this.exitCode = exitCode;
		this.context = context;
		this.cause = cause;

		// Maintain proper stack trace in V8
		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, this.constructor);
		}
	}

	/**
	 * Serialise for Pino / JSON structured logging.
	 * Pino calls `toJSON()` automatically when an error is passed as a value.
	 */
	toJSON(): Record<string, unknown> {
		return {
			name: this.name,
			code: this.code,
			message: this.message,
			exitCode: this.exitCode,
			context: this.context,
			stack: this.stack,
			...(this.cause ? { cause: this.cause.message } : {})
		};
	}

	/**
	 * Extract extras for Sentry `captureException(err, { extra })`.
	 * Omits the stack (Sentry captures that separately).
	 */
	toSentryExtras(): Record<string, unknown> {
		return {
			code: this.code,
			exitCode: this.exitCode,
			...this.context,
			...(this.cause ? { causeMessage: this.cause.message } : {})
		};
	}
}

// ---------------------------------------------------------------------------
// Concrete subclasses
// ---------------------------------------------------------------------------

/** Invalid configuration or environment (bad env var, missing tenancy OCID). */
export class ValidationError extends AuditError {
	constructor(message: string, context: Record<string, unknown> = {}, cause?: Error) {
		super('VALIDATION_ERROR', message, 2, context, cause);
	}
}

/** An OCI SDK call failed or returned a payload we could not read. */
export class OCIError extends AuditError {
	constructor(message: string, context: Record<string, unknown> = {}, cause?: Error) {
		super('OCI_ERROR', message, 1, context, cause);
	}
}

/**
 * The directory service could not be reached at all.
 * Raised by the connectivity check before any discovery starts.
 */
export class ConnectivityError extends AuditError {
	constructor(message: string, context: Record<string, unknown> = {}, cause?: Error) {
		super('CONNECTIVITY_ERROR', message, 1, context, cause);
	}
}

/** A report file could not be written to the output directory. */
export class ReportWriteError extends AuditError {
	constructor(message: string, context: Record<string, unknown> = {}, cause?: Error) {
		super('REPORT_WRITE_ERROR', message, 3, context, cause);
	}
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Type guard: is the value an AuditError?
 */
export function isAuditError(err: unknown): err is AuditError {
	return err instanceof AuditError;
}

/**
 * Wrap an unknown caught value into an AuditError.
 * If it is already an AuditError, returns it unchanged.
 * Otherwise wraps it in a generic INTERNAL_ERROR with exit code 1.
 */
export function toAuditError(err: unknown, fallbackMessage = 'Unexpected error'): AuditError {
	if (isAuditError(err)) return err;

	const cause = err instanceof Error ? err : undefined;
	const message = err instanceof Error ? err.message : fallbackMessage;

	return new AuditError('INTERNAL_ERROR', message, 1, {}, cause);
}
