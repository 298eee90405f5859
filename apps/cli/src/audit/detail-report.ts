/**
 * Hierarchical detail report.
 *
 * Compartments are listed shallowest first (stable within a depth, so
 * siblings stay in discovery order), indented four spaces per level, each
 * with its path, counts and, when it has policies, every policy with its
 * statements reproduced verbatim and in their original order.
 */
import type { CompartmentNode, PolicyRecord, PolicyStats } from '@policy-audit/types';
import { renderBanner, type ReportHeader } from './banner.js';

export const DETAIL_REPORT_TITLE = 'OCI POLICIES - HIERARCHICAL ANALYSIS';
const HIERARCHY_HEADING = 'COMPARTMENT AND POLICY HIERARCHY:';
const INDENT = '    ';

export interface DetailReportInput {
	header: ReportHeader;
	nodes: readonly CompartmentNode[];
	stats: readonly PolicyStats[];
	/** Policy lists for compartments with a non-zero policy count. */
	policies: ReadonlyMap<string, readonly PolicyRecord[]>;
}

/** Stable sort by depth, ascending. Does not modify its input. */
export function sortByDepth(nodes: readonly CompartmentNode[]): CompartmentNode[] {
	return [...nodes].sort((a, b) => a.depth - b.depth);
}

export function renderDetailReport(input: DetailReportInput): string {
	const statsById = new Map(input.stats.map((entry) => [entry.compartmentId, entry]));
	const lines = [
		...renderBanner(DETAIL_REPORT_TITLE, input.header, { includeRegion: true }),
		HIERARCHY_HEADING,
		'='.repeat(HIERARCHY_HEADING.length),
		''
	];

	for (const node of sortByDepth(input.nodes)) {
		const stats = statsById.get(node.id);
		lines.push(
			...renderCompartment(
				node,
				stats?.policyCount ?? 0,
				stats?.statementCount ?? 0,
				input.policies.get(node.id) ?? []
			)
		);
	}

	return lines.join('\n') + '\n';
}

function renderCompartment(
	node: CompartmentNode,
	policyCount: number,
	statementCount: number,
	policies: readonly PolicyRecord[]
): string[] {
	const indent = INDENT.repeat(node.depth);
	const lines = [
		node.depth === 0 ? `[ROOT] ${node.name}` : `${indent}└── ${node.name}`,
		`${INDENT}${indent}Path: ${node.path}`,
		`${INDENT}${indent}Policies: ${policyCount} | Statements: ${statementCount}`
	];

	if (policyCount > 0) {
		const policyIndent = `${INDENT}${INDENT}${indent}`;
		for (const policy of policies) {
			lines.push(
				'',
				`${policyIndent}Policy: ${policy.name}`,
				`${policyIndent}  ID: ${policy.id}`,
				`${policyIndent}  Statements:`,
				...policy.statements.map((statement) => `${policyIndent}    - ${statement}`)
			);
		}
	}

	lines.push('');
	return lines;
}
