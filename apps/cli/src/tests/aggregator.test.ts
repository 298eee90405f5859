/**
 * Policy aggregation tests: per-compartment counts, tenancy totals,
 * fail-soft listing and the policy cache.
 */

import { describe, it, expect, vi } from 'vitest';
import type { CompartmentNode, PolicyStats } from '@policy-audit/types';
import {
	aggregatePolicies,
	countPolicies,
	summarizePolicyStats,
	type PolicySource
} from '../audit/aggregator.js';
import { discoverCompartmentTree } from '../audit/discovery.js';
import { PolicyCache } from '../audit/policy-cache.js';
import { FakeDirectory, policy, sampleTree } from './fake-directory.js';

const ROOT = { id: 'ocid1.tenancy.oc1..root', name: 'root' };

function node(id: string, name: string, depth = 1): CompartmentNode {
	return { id, name, depth, path: depth === 0 ? name : `root > ${name}` };
}

// ── aggregatePolicies ─────────────────────────────────────────────────────

describe('aggregatePolicies', () => {
	it('counts policies and statements per compartment, in node order', async () => {
		const directory = new FakeDirectory(sampleTree());
		const nodes = await discoverCompartmentTree(directory, ROOT);

		const { stats, summary } = await aggregatePolicies(nodes, directory);

		expect(stats).toEqual([
			{ compartmentId: 'ocid1.tenancy.oc1..root', policyCount: 0, statementCount: 0 },
			{ compartmentId: 'ocid1.compartment.oc1..a', policyCount: 1, statementCount: 3 },
			{ compartmentId: 'ocid1.compartment.oc1..a1', policyCount: 0, statementCount: 0 },
			{ compartmentId: 'ocid1.compartment.oc1..b', policyCount: 0, statementCount: 0 }
		]);
		expect(summary).toEqual({
			totalCompartments: 4,
			totalPolicies: 1,
			totalStatements: 3,
			compartmentsWithPolicies: 1,
			compartmentsWithoutPolicies: 3
		});
	});

	it('does not attribute a parent policy to its children', async () => {
		const directory = new FakeDirectory(sampleTree());
		const nodes = await discoverCompartmentTree(directory, ROOT);

		const { stats } = await aggregatePolicies(nodes, directory);

		const a1 = stats.find((entry) => entry.compartmentId === 'ocid1.compartment.oc1..a1');
		expect(a1?.policyCount).toBe(0);
	});

	it('aggregates a tenancy with only a root and root policies', async () => {
		const directory = new FakeDirectory({
			id: ROOT.id,
			name: 'root',
			policies: [
				policy('p1', 'one', ['s1', 's2']),
				policy('p2', 'two', ['s3']),
				policy('p3', 'three', ['s4', 's5', 's6'])
			]
		});

		const { summary } = await aggregatePolicies([node(ROOT.id, 'root', 0)], directory);

		expect(summary).toEqual({
			totalCompartments: 1,
			totalPolicies: 3,
			totalStatements: 6,
			compartmentsWithPolicies: 1,
			compartmentsWithoutPolicies: 0
		});
	});

	it('counts a failed policy listing as zero and keeps going', async () => {
		const directory = new FakeDirectory(
			{
				id: ROOT.id,
				name: 'root',
				children: [
					{ id: 'x', name: 'X', policies: [policy('p1', 'x-pol', ['s1'])] },
					{ id: 'y', name: 'Y', policies: [policy('p2', 'y-pol', ['s2', 's3'])] }
				]
			},
			{ failPolicies: ['x'] }
		);
		const nodes = [node(ROOT.id, 'root', 0), node('x', 'X'), node('y', 'Y')];

		const { stats, summary } = await aggregatePolicies(nodes, directory);

		expect(stats.map((entry) => entry.policyCount)).toEqual([0, 0, 1]);
		expect(summary.totalPolicies).toBe(1);
		expect(summary.totalStatements).toBe(2);
		expect(summary.compartmentsWithoutPolicies).toBe(2);
	});

	it('counts a policy with zero statements as a policy', async () => {
		const source: PolicySource = {
			listPolicies: async () => [policy('p1', 'empty', [])]
		};

		const { stats } = await aggregatePolicies([node('x', 'X')], source);

		expect(stats).toEqual([{ compartmentId: 'x', policyCount: 1, statementCount: 0 }]);
	});

	it('produces identical results when run twice over the same data', async () => {
		const directory = new FakeDirectory(sampleTree());
		const nodes = await discoverCompartmentTree(directory, ROOT);

		const first = await aggregatePolicies(nodes, directory);
		const second = await aggregatePolicies(nodes, directory);

		expect(second).toEqual(first);
	});

	it('reports progress once per compartment', async () => {
		const directory = new FakeDirectory(sampleTree());
		const nodes = await discoverCompartmentTree(directory, ROOT);
		const onCompartment = vi.fn();

		await aggregatePolicies(nodes, directory, { onCompartment });

		expect(onCompartment).toHaveBeenCalledTimes(4);
		expect(onCompartment).toHaveBeenNthCalledWith(2, nodes[1], {
			compartmentId: 'ocid1.compartment.oc1..a',
			policyCount: 1,
			statementCount: 3
		});
	});
});

// ── countPolicies / summarizePolicyStats ──────────────────────────────────

describe('countPolicies', () => {
	it('sums statements over every policy', () => {
		const stats = countPolicies('c', [policy('p1', 'a', ['1', '2']), policy('p2', 'b', ['3'])]);

		expect(stats).toEqual({ compartmentId: 'c', policyCount: 2, statementCount: 3 });
	});
});

describe('summarizePolicyStats', () => {
	it('returns zeros for an empty sequence', () => {
		expect(summarizePolicyStats([])).toEqual({
			totalCompartments: 0,
			totalPolicies: 0,
			totalStatements: 0,
			compartmentsWithPolicies: 0,
			compartmentsWithoutPolicies: 0
		});
	});

	it('keeps with + without equal to the total', () => {
		const stats: PolicyStats[] = [
			{ compartmentId: 'a', policyCount: 2, statementCount: 5 },
			{ compartmentId: 'b', policyCount: 0, statementCount: 0 },
			{ compartmentId: 'c', policyCount: 1, statementCount: 0 }
		];

		const summary = summarizePolicyStats(stats);

		expect(summary.compartmentsWithPolicies + summary.compartmentsWithoutPolicies).toBe(
			summary.totalCompartments
		);
		expect(summary).toEqual({
			totalCompartments: 3,
			totalPolicies: 3,
			totalStatements: 5,
			compartmentsWithPolicies: 2,
			compartmentsWithoutPolicies: 1
		});
	});
});

// ── PolicyCache ───────────────────────────────────────────────────────────

describe('PolicyCache', () => {
	it('fetches each compartment once', async () => {
		const directory = new FakeDirectory(sampleTree());
		const cache = new PolicyCache(directory);

		const first = await cache.listPolicies('ocid1.compartment.oc1..a');
		const second = await cache.listPolicies('ocid1.compartment.oc1..a');

		expect(second).toBe(first);
		expect(directory.policyCalls).toEqual(['ocid1.compartment.oc1..a']);
	});

	it('does not cache failures', async () => {
		const listPolicies = vi
			.fn<PolicySource['listPolicies']>()
			.mockRejectedValueOnce(new Error('throttled'))
			.mockResolvedValueOnce([policy('p1', 'late', ['s1'])]);
		const cache = new PolicyCache({ listPolicies });

		await expect(cache.listPolicies('x')).rejects.toThrow('throttled');
		await expect(cache.listPolicies('x')).resolves.toEqual([policy('p1', 'late', ['s1'])]);
		expect(listPolicies).toHaveBeenCalledTimes(2);
	});
});
