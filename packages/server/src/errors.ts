/**
 * Re-export from @policy-audit/types for internal relative import compatibility.
 * Files in this package use `import { ... } from './errors.js'`.
 */
export * from '@policy-audit/types/errors';
