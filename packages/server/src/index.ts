/**
 * @policy-audit/server - Process-level services shared by the auditor packages:
 * structured logging and optional error tracking.
 */

// Re-export error hierarchy from @policy-audit/types
export * from './errors.js';

export * from './logger.js';
export * from './sentry.js';
