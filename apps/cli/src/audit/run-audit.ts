/**
 * The audit pipeline: discover the tree, count policies per compartment,
 * render both documents. Each phase runs to completion before the next,
 * one compartment at a time.
 */
import type {
	CompartmentNode,
	PolicyRecord,
	PolicyStats,
	TenancySummary
} from '@policy-audit/types';
import type { DirectoryClient } from '@policy-audit/shared/oci/directory-client';
import { createLogger } from '@policy-audit/server/logger';
import { aggregatePolicies, type AggregationOptions } from './aggregator.js';
import type { ReportHeader } from './banner.js';
import { renderDetailReport } from './detail-report.js';
import { discoverCompartmentTree, type DiscoveryOptions } from './discovery.js';
import { PolicyCache } from './policy-cache.js';
import { renderSummaryReport } from './summary-report.js';

const log = createLogger('cli');

export interface AuditRequest {
	client: Pick<DirectoryClient, 'listChildCompartments' | 'listPolicies'>;
	tenancyId: string;
	header: ReportHeader;
	/** Named in the summary footer. */
	detailFileName: string;
	maxDepth?: number;
	/** Fired once per compartment during discovery. */
	onDiscovered?: DiscoveryOptions['onCompartment'];
	/** Fired once per compartment after its policies were counted. */
	onCounted?: AggregationOptions['onCompartment'];
}

export interface AuditResult {
	nodes: CompartmentNode[];
	stats: PolicyStats[];
	summary: TenancySummary;
	detailReport: string;
	summaryReport: string;
}

export async function runAudit(request: AuditRequest): Promise<AuditResult> {
	const { client, header } = request;

	log.info('Phase 1: discovering the compartment tree');
	const nodes = await discoverCompartmentTree(
		client,
		{ id: request.tenancyId, name: header.tenancyName },
		{ maxDepth: request.maxDepth, onCompartment: request.onDiscovered }
	);
	log.info({ compartments: nodes.length }, 'Compartment tree discovered');

	log.info('Phase 2: searching policies');
	const cache = new PolicyCache(client);
	const { stats, summary } = await aggregatePolicies(nodes, cache, {
		onCompartment: request.onCounted
	});
	log.info(
		{ policies: summary.totalPolicies, statements: summary.totalStatements },
		'Policy search completed'
	);

	log.info('Phase 3: generating reports');
	const policies = await collectPolicies(nodes, stats, cache);
	const detailReport = renderDetailReport({ header, nodes, stats, policies });
	const summaryReport = renderSummaryReport({
		header,
		nodes,
		stats,
		summary,
		detailFileName: request.detailFileName
	});

	return { nodes, stats, summary, detailReport, summaryReport };
}

/**
 * Policy lists for every compartment that has policies. A non-zero count
 * means the list was read during aggregation, so these are cache hits.
 */
async function collectPolicies(
	nodes: readonly CompartmentNode[],
	stats: readonly PolicyStats[],
	cache: PolicyCache
): Promise<Map<string, readonly PolicyRecord[]>> {
	const withPolicies = new Set(
		stats.filter((entry) => entry.policyCount > 0).map((entry) => entry.compartmentId)
	);
	const policies = new Map<string, readonly PolicyRecord[]>();

	for (const node of nodes) {
		if (withPolicies.has(node.id)) {
			policies.set(node.id, await cache.listPolicies(node.id));
		}
	}

	return policies;
}
