/**
 * In-memory DirectoryClient for tests: a compartment tree with policies,
 * per-compartment failure injection and call recording.
 */
import type { CompartmentSummary, PolicyRecord } from '@policy-audit/types';
import type { DirectoryClient } from '@policy-audit/shared/oci/directory-client';
import { ConnectivityError, OCIError } from '@policy-audit/server/errors';

export interface FakeCompartment {
	id: string;
	name: string;
	children?: FakeCompartment[];
	policies?: PolicyRecord[];
}

export interface FakeDirectoryOptions {
	tenancyName?: string;
	homeRegion?: string;
	/** Compartment ids whose child listing fails. */
	failChildren?: string[];
	/** Compartment ids whose policy listing fails. */
	failPolicies?: string[];
	/** Makes checkConnectivity throw. */
	connectivityError?: ConnectivityError;
}

export class FakeDirectory implements DirectoryClient {
	readonly childCalls: string[] = [];
	readonly policyCalls: string[] = [];
	private readonly byId = new Map<string, FakeCompartment>();

	constructor(
		private readonly root: FakeCompartment,
		private readonly options: FakeDirectoryOptions = {}
	) {
		const index = (compartment: FakeCompartment): void => {
			this.byId.set(compartment.id, compartment);
			compartment.children?.forEach(index);
		};
		index(root);
	}

	async listChildCompartments(compartmentId: string): Promise<CompartmentSummary[]> {
		this.childCalls.push(compartmentId);
		if (this.options.failChildren?.includes(compartmentId)) {
			throw new OCIError('identity.listCompartments failed', { compartmentId, statusCode: 404 });
		}
		return (this.byId.get(compartmentId)?.children ?? []).map(({ id, name }) => ({ id, name }));
	}

	async listPolicies(compartmentId: string): Promise<PolicyRecord[]> {
		this.policyCalls.push(compartmentId);
		if (this.options.failPolicies?.includes(compartmentId)) {
			throw new OCIError('identity.listPolicies failed', { compartmentId, statusCode: 404 });
		}
		return [...(this.byId.get(compartmentId)?.policies ?? [])];
	}

	async resolveTenancyName(tenancyId: string): Promise<string | undefined> {
		return tenancyId === this.root.id ? this.options.tenancyName : undefined;
	}

	async resolveHomeRegion(): Promise<string | undefined> {
		return this.options.homeRegion;
	}

	async checkConnectivity(): Promise<void> {
		if (this.options.connectivityError) throw this.options.connectivityError;
	}
}

export function policy(id: string, name: string, statements: string[]): PolicyRecord {
	return { id, name, statements };
}

/**
 * root
 * ├── A (1 policy, 3 statements)
 * │   └── A1
 * └── B
 */
export function sampleTree(): FakeCompartment {
	return {
		id: 'ocid1.tenancy.oc1..root',
		name: 'root',
		children: [
			{
				id: 'ocid1.compartment.oc1..a',
				name: 'A',
				policies: [
					policy('ocid1.policy.oc1..p1', 'net-admins', [
						'Allow group NetAdmins to manage virtual-network-family in compartment A',
						'Allow group NetAdmins to read instances in compartment A',
						'Allow group NetAdmins to use load-balancers in compartment A'
					])
				],
				children: [{ id: 'ocid1.compartment.oc1..a1', name: 'A1' }]
			},
			{ id: 'ocid1.compartment.oc1..b', name: 'B' }
		]
	};
}
