import type { PolicyRecord } from '@policy-audit/types';
import type { PolicySource } from './aggregator.js';

/**
 * Per-run memo of policy lists, keyed by compartment id.
 *
 * Aggregation fills it; the detail report reads the same lists back instead
 * of fetching every compartment twice. Failures are not cached, so a later
 * read retries the underlying source.
 */
export class PolicyCache implements PolicySource {
	private readonly entries = new Map<string, readonly PolicyRecord[]>();

	constructor(private readonly source: PolicySource) {}

	async listPolicies(compartmentId: string): Promise<readonly PolicyRecord[]> {
		const cached = this.entries.get(compartmentId);
		if (cached) return cached;

		const policies = Object.freeze([...(await this.source.listPolicies(compartmentId))]);
		this.entries.set(compartmentId, policies);
		return policies;
	}
}
