/**
 * Policy aggregation.
 *
 * For each discovered compartment, in discovery order, counts the policies
 * attached to exactly that compartment and their statements. Policies of a
 * parent never count toward a child.
 *
 * A failed or unreadable policy list counts as zero policies; the remaining
 * compartments are still aggregated.
 */
import type {
	CompartmentNode,
	PolicyRecord,
	PolicyStats,
	TenancySummary
} from '@policy-audit/types';
import { createLogger } from '@policy-audit/server/logger';

const log = createLogger('aggregator');

/** Anything that can list the policies attached to a compartment. */
export interface PolicySource {
	listPolicies(compartmentId: string): Promise<readonly PolicyRecord[]>;
}

export interface AggregationOptions {
	/** Progress hook, fired once per compartment after its policies were counted. */
	onCompartment?: (node: CompartmentNode, stats: PolicyStats) => void;
}

export interface AggregationResult {
	/** One entry per node, in the order the nodes were given. */
	stats: PolicyStats[];
	summary: TenancySummary;
}

export async function aggregatePolicies(
	nodes: readonly CompartmentNode[],
	source: PolicySource,
	options: AggregationOptions = {}
): Promise<AggregationResult> {
	const stats: PolicyStats[] = [];

	for (const node of nodes) {
		const policies = await listPoliciesOrEmpty(source, node);
		const entry = countPolicies(node.id, policies);

		if (entry.policyCount > 0) {
			log.info(
				{ compartment: node.name, policies: entry.policyCount, statements: entry.statementCount },
				'Policies found'
			);
		} else {
			log.info({ compartment: node.name }, 'No policies');
		}

		stats.push(entry);
		options.onCompartment?.(node, entry);
	}

	return { stats, summary: summarizePolicyStats(stats) };
}

/** Policy and statement counts for one compartment's policy list. */
export function countPolicies(compartmentId: string, policies: readonly PolicyRecord[]): PolicyStats {
	return Object.freeze({
		compartmentId,
		policyCount: policies.length,
		statementCount: policies.reduce((sum, policy) => sum + policy.statements.length, 0)
	});
}

/**
 * Fold the per-compartment stats into tenancy-wide counters.
 * Always recomputed from the full sequence.
 */
export function summarizePolicyStats(stats: readonly PolicyStats[]): TenancySummary {
	return stats.reduce<TenancySummary>(
		(summary, entry) => ({
			totalCompartments: summary.totalCompartments + 1,
			totalPolicies: summary.totalPolicies + entry.policyCount,
			totalStatements: summary.totalStatements + entry.statementCount,
			compartmentsWithPolicies: summary.compartmentsWithPolicies + (entry.policyCount > 0 ? 1 : 0),
			compartmentsWithoutPolicies:
				summary.compartmentsWithoutPolicies + (entry.policyCount > 0 ? 0 : 1)
		}),
		{
			totalCompartments: 0,
			totalPolicies: 0,
			totalStatements: 0,
			compartmentsWithPolicies: 0,
			compartmentsWithoutPolicies: 0
		}
	);
}

async function listPoliciesOrEmpty(
	source: PolicySource,
	node: CompartmentNode
): Promise<readonly PolicyRecord[]> {
	try {
		return await source.listPolicies(node.id);
	} catch (err) {
		log.warn({ err, compartment: node.path }, 'Could not list policies, counting as none');
		return [];
	}
}
