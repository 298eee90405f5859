import { z } from 'zod';

/**
 * Separator placed between ancestor names in a compartment breadcrumb path.
 */
export const PATH_SEPARATOR = ' > ';

// ── Directory Client payloads ─────────────────────────────────────────────

/**
 * A child compartment as returned by the directory (identity) service.
 * Items without an id or a name are dropped at the client boundary.
 */
export const CompartmentSummarySchema = z.object({
	id: z.string().min(1),
	name: z.string().min(1)
});

export type CompartmentSummary = z.infer<typeof CompartmentSummarySchema>;

/**
 * An IAM policy attached to a single compartment.
 * Statement order is the order assigned by the server and is preserved as-is.
 */
export const PolicyRecordSchema = z.object({
	id: z.string().min(1),
	name: z.string(),
	statements: z.array(z.string()).nullish().transform((statements) => statements ?? [])
});

export type PolicyRecord = z.infer<typeof PolicyRecordSchema>;

// ── Audit model ───────────────────────────────────────────────────────────

/**
 * One compartment discovered in the tenancy tree.
 *
 * `depth` is 0 only for the tenancy root. For every other node,
 * `depth === parent.depth + 1` and `path === parent.path + PATH_SEPARATOR + name`.
 */
export interface CompartmentNode {
	readonly id: string;
	readonly name: string;
	readonly depth: number;
	readonly path: string;
}

/**
 * Policy counts for exactly one compartment (non-recursive).
 * A policy may carry zero statements, so `statementCount >= policyCount` does not hold in general.
 */
export interface PolicyStats {
	readonly compartmentId: string;
	readonly policyCount: number;
	readonly statementCount: number;
}

/** Tenancy-wide counters folded from the full PolicyStats sequence. */
export interface TenancySummary {
	readonly totalCompartments: number;
	readonly totalPolicies: number;
	readonly totalStatements: number;
	readonly compartmentsWithPolicies: number;
	readonly compartmentsWithoutPolicies: number;
}

// ── Credentials ───────────────────────────────────────────────────────────

/**
 * Where the OCI SDK takes its credentials from.
 * - session-token: Cloud Shell delegation (security token in the shell's config profile)
 * - config-file: API key profile in ~/.oci/config
 * - instance-principal / resource-principal: OCI-hosted workloads
 */
export const CredentialSourceSchema = z.enum([
	'session-token',
	'config-file',
	'instance-principal',
	'resource-principal'
]);

export type CredentialSource = z.infer<typeof CredentialSourceSchema>;
