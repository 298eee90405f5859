/**
 * Derived metrics and rule-based recommendations for the executive summary.
 *
 * All ratios use integer arithmetic: a value is scaled by 100, truncated,
 * and split into whole units and hundredths.
 */
import type { TenancySummary } from '@policy-audit/types';

/** Below this many policies in the whole tenancy, the summary warns. */
export const LOW_POLICY_THRESHOLD = 5;

export interface SecurityMetrics {
	/** Whole-number percentage of compartments with at least one policy. Absent for an empty tree. */
	coveragePercent?: number;
	/** e.g. '0.33'. Absent for an empty tree. */
	averagePoliciesPerCompartment?: string;
	/** e.g. '3.00'. Absent when no policy was found. */
	averageStatementsPerPolicy?: string;
}

export type RecommendationLevel = 'warning' | 'ok';

export interface Recommendation {
	level: RecommendationLevel;
	message: string;
	/** Second line, indented under the message. */
	detail?: string;
}

/**
 * `numerator / denominator` to two decimals, truncated.
 *
 * @example formatHundredths(1, 3) // '0.33'
 * @example formatHundredths(21, 20) // '1.05'
 */
export function formatHundredths(numerator: number, denominator: number): string {
	const scaled = Math.floor((numerator * 100) / denominator);
	const whole = Math.floor(scaled / 100);
	const hundredths = scaled % 100;
	return `${whole}.${String(hundredths).padStart(2, '0')}`;
}

export function computeSecurityMetrics(summary: TenancySummary): SecurityMetrics {
	const metrics: SecurityMetrics = {};

	if (summary.totalCompartments > 0) {
		metrics.coveragePercent = Math.floor(
			(summary.compartmentsWithPolicies * 100) / summary.totalCompartments
		);
		metrics.averagePoliciesPerCompartment = formatHundredths(
			summary.totalPolicies,
			summary.totalCompartments
		);
	}

	if (summary.totalPolicies > 0) {
		metrics.averageStatementsPerPolicy = formatHundredths(
			summary.totalStatements,
			summary.totalPolicies
		);
	}

	return metrics;
}

/**
 * Evaluated in fixed order: the balance rule always yields exactly one entry,
 * the low-count rule adds a second one independently.
 */
export function buildRecommendations(summary: TenancySummary): Recommendation[] {
	const recommendations: Recommendation[] = [];

	if (summary.compartmentsWithoutPolicies > summary.compartmentsWithPolicies) {
		recommendations.push({
			level: 'warning',
			message: 'More compartments without policies than with policies.',
			detail: 'Review whether this is intentional or configuration is missing.'
		});
	} else {
		recommendations.push({
			level: 'ok',
			message: 'Policy distribution appears to be balanced.'
		});
	}

	if (summary.totalPolicies < LOW_POLICY_THRESHOLD) {
		recommendations.push({
			level: 'warning',
			message: `Very few policies detected (${summary.totalPolicies}).`,
			detail: 'Verify permission configuration.'
		});
	}

	return recommendations;
}
