/**
 * @policy-audit/types - Shared TypeScript types and Zod schemas
 *
 * Audit data model, Directory Client payload schemas and the error
 * hierarchy used by every other package.
 */

export * from './audit/types.js';
export * from './errors.js';
