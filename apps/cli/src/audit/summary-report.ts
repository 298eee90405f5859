/**
 * Executive summary: general statistics, the per-compartment distribution
 * table (in aggregation order), derived security metrics and recommendations.
 */
import type { CompartmentNode, PolicyStats, TenancySummary } from '@policy-audit/types';
import { buildRecommendations, computeSecurityMetrics, type Recommendation } from './analysis.js';
import { AUDITOR_NAME, AUDITOR_VERSION, RULE_WIDTH, renderBanner, type ReportHeader } from './banner.js';

export const SUMMARY_REPORT_TITLE = 'EXECUTIVE SUMMARY - OCI POLICIES';

export const NAME_COLUMN_WIDTH = 35;
export const COUNT_COLUMN_WIDTH = 10;
const PATH_RULE_WIDTH = 20;
const STATISTIC_LABEL_WIDTH = 29;

export interface SummaryReportInput {
	header: ReportHeader;
	nodes: readonly CompartmentNode[];
	stats: readonly PolicyStats[];
	summary: TenancySummary;
	/** File name of the companion detail report, named in the footer. */
	detailFileName: string;
}

export function renderSummaryReport(input: SummaryReportInput): string {
	const lines = [
		...renderBanner(SUMMARY_REPORT_TITLE, input.header, { includeRegion: false }),
		...section('GENERAL STATISTICS', renderStatistics(input.summary)),
		'',
		...section('DISTRIBUTION BY COMPARTMENT', renderDistribution(input.nodes, input.stats)),
		'',
		...section('SECURITY ANALYSIS', renderSecurityAnalysis(input.summary)),
		'',
		...section('RECOMMENDATIONS', buildRecommendations(input.summary).flatMap(renderRecommendation)),
		'',
		'='.repeat(RULE_WIDTH),
		`Detail file: ${input.detailFileName}`,
		`Generated by: ${AUDITOR_NAME} v${AUDITOR_VERSION}`,
		'='.repeat(RULE_WIDTH)
	];

	return lines.join('\n') + '\n';
}

/** One row of the distribution table; names and paths are never truncated. */
export function formatDistributionRow(name: string, count: string, path: string): string {
	return `${name.padEnd(NAME_COLUMN_WIDTH)} | ${count.padEnd(COUNT_COLUMN_WIDTH)} | ${path}`;
}

function section(heading: string, body: string[]): string[] {
	return [heading, '='.repeat(heading.length), ...body];
}

function renderStatistics(summary: TenancySummary): string[] {
	const rows: Array<[string, number]> = [
		['Compartments analyzed', summary.totalCompartments],
		['Compartments with policies', summary.compartmentsWithPolicies],
		['Compartments without policies', summary.compartmentsWithoutPolicies],
		['Total policies', summary.totalPolicies],
		['Total statements', summary.totalStatements]
	];
	return rows.map(([label, value]) => `  ${label.padEnd(STATISTIC_LABEL_WIDTH)} : ${value}`);
}

function renderDistribution(
	nodes: readonly CompartmentNode[],
	stats: readonly PolicyStats[]
): string[] {
	const statsById = new Map(stats.map((entry) => [entry.compartmentId, entry]));
	return [
		formatDistributionRow('COMPARTMENT', 'POLICIES', 'PATH'),
		`${'-'.repeat(NAME_COLUMN_WIDTH)}-+-${'-'.repeat(COUNT_COLUMN_WIDTH)}-+-${'-'.repeat(PATH_RULE_WIDTH)}`,
		...nodes.map((node) =>
			formatDistributionRow(node.name, String(statsById.get(node.id)?.policyCount ?? 0), node.path)
		)
	];
}

function renderSecurityAnalysis(summary: TenancySummary): string[] {
	const metrics = computeSecurityMetrics(summary);
	const lines: string[] = [];

	if (metrics.coveragePercent !== undefined) {
		lines.push(`  Policy coverage: ${metrics.coveragePercent}%`);
	}
	if (metrics.averagePoliciesPerCompartment !== undefined) {
		lines.push(`  Average policies/compartment: ${metrics.averagePoliciesPerCompartment}`);
	}
	if (metrics.averageStatementsPerPolicy !== undefined) {
		lines.push(`  Average statements/policy: ${metrics.averageStatementsPerPolicy}`);
	}

	return lines;
}

function renderRecommendation(recommendation: Recommendation): string[] {
	const marker = recommendation.level === 'ok' ? '[OK]' : '[!]';
	return [
		`  ${marker} ${recommendation.message}`,
		...(recommendation.detail ? [`      ${recommendation.detail}`] : [])
	];
}
