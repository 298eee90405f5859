/**
 * Structured Pino logger factory for the policy auditor.
 *
 * Every module creates a child logger via `createLogger(module)`.
 * The child automatically binds `{ module }` to every log line so a run
 * can be filtered by phase (`jq 'select(.module=="discovery")'`).
 *
 * Logs always go to stderr: stdout is reserved for the report output.
 * Interactive runs use pino-pretty for human-readable, colourised output;
 * production emits newline-delimited JSON.
 *
 * Usage:
 *   import { createLogger } from '@policy-audit/server/logger';
 *   const log = createLogger('discovery');
 *   log.info({ compartmentId, depth }, 'discovering compartment');
 *   log.warn({ err }, 'child list failed, treating as empty');
 */

import pino, { type Logger, type LoggerOptions } from 'pino';

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

/** Known module names for discoverability. Arbitrary strings are also accepted. */
export type KnownModule =
	| 'cli'
	| 'config'
	| 'discovery'
	| 'aggregator'
	| 'reports'
	| 'directory-client'
	| 'oci-sdk'
	| 'oci-sdk-auth'
	| 'retry'
	| 'sentry';

const isDev = process.env.NODE_ENV !== 'production';
const isTest = process.env.NODE_ENV === 'test' || process.env.VITEST !== undefined;

// ---------------------------------------------------------------------------
// Serialisers
// ---------------------------------------------------------------------------

/**
 * Custom Pino serialiser for Error objects.
 * Handles AuditError's extra fields (code, exitCode, context) as well
 * as plain Errors and OCI SDK errors (statusCode, serviceCode).
 */
function errorSerializer(err: Record<string, unknown>): Record<string, unknown> {
	if (!err || typeof err !== 'object') return err;

	const serialized: Record<string, unknown> = {
		message: err.message,
		stack: err.stack
	};

	if ('code' in err) serialized.code = err.code;
	if ('exitCode' in err) serialized.exitCode = err.exitCode;
	if ('context' in err) serialized.context = err.context;
	// Raw SDK errors
	if ('statusCode' in err) serialized.statusCode = err.statusCode;
	if ('serviceCode' in err) serialized.serviceCode = err.serviceCode;

	const cause = err.cause;
	if (cause instanceof Error) {
		serialized.cause = {
			message: cause.message,
			...('code' in cause && cause.code ? { code: cause.code } : {})
		};
	}

	return serialized;
}

// ---------------------------------------------------------------------------
// Transport (dev vs prod)
// ---------------------------------------------------------------------------

function buildTransport(): LoggerOptions['transport'] {
	// Tests and production write synchronously to stderr without a worker thread
	if (!isDev || isTest) return undefined;

	return {
		target: 'pino-pretty',
		options: {
			colorize: true,
			translateTime: 'HH:MM:ss.l',
			ignore: 'pid,hostname,service',
			destination: 2
		}
	};
}

// ---------------------------------------------------------------------------
// Root logger
// ---------------------------------------------------------------------------

const transport = buildTransport();

const rootOptions: LoggerOptions = {
	level: process.env.LOG_LEVEL || (isDev ? 'debug' : 'info'),
	serializers: {
		err: errorSerializer,
		error: errorSerializer
	},
	redact: {
		paths: [
			'passphrase',
			'privateKey',
			'securityToken',
			'*.passphrase',
			'*.privateKey',
			'*.securityToken'
		],
		censor: '[REDACTED]'
	},
	transport,
	// Bind the service name so all lines are attributable in aggregation
	base: { service: 'oci-policy-auditor' }
};

/**
 * Root Pino logger instance.
 * Prefer `createLogger(module)` for module-scoped logging.
 */
export const logger: Logger = transport
	? pino(rootOptions)
	: pino(rootOptions, pino.destination({ dest: 2, sync: true }));

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

/**
 * Create a child logger scoped to a module.
 *
 * The child inherits the root logger's level, serialisers, and transport,
 * and binds `{ module }` plus any extra context to every log line.
 *
 * @example
 * const log = createLogger('aggregator', { tenancyId });
 * log.info({ compartment: 'Network', policies: 3 }, 'policies found');
 * // => {"level":30,"module":"aggregator","tenancyId":"ocid1...","compartment":"Network","policies":3,"msg":"policies found"}
 */
export function createLogger(
	module: KnownModule | (string & {}),
	context: Record<string, unknown> = {}
): Logger {
	return logger.child({ module, ...context });
}
