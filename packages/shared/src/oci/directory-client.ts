/**
 * Directory Client: the auditor's only window onto OCI.
 *
 * Read-only access to the identity service: child compartments, attached
 * policies, tenancy name and home region. Paging and retry are handled here;
 * callers get plain validated records.
 */
import * as oci from 'oci-sdk';
import { z } from 'zod';
import {
	CompartmentSummarySchema,
	PolicyRecordSchema,
	type CompartmentSummary,
	type PolicyRecord
} from '@policy-audit/types';
import { ConnectivityError, OCIError } from '@policy-audit/server/errors';
import { createLogger } from '@policy-audit/server/logger';
import { executeOCISDK, listAllPages } from './executor-sdk.js';
import { OCI_LIST_RETRY, isTransientOCIError, withRetry, type RetryPolicy } from './retry.js';

const log = createLogger('directory-client');

/**
 * Read-only view of the tenancy's compartment and policy directory.
 * List operations throw on failure; callers decide whether to degrade.
 */
export interface DirectoryClient {
	/** ACTIVE direct children of a compartment, in API order, all pages. */
	listChildCompartments(compartmentId: string): Promise<CompartmentSummary[]>;
	/** Policies attached to exactly this compartment, all pages, statements in server order. */
	listPolicies(compartmentId: string): Promise<PolicyRecord[]>;
	/** Tenancy display name, or undefined when it cannot be resolved. */
	resolveTenancyName(tenancyId: string): Promise<string | undefined>;
	/** Home region name (e.g. 'eu-frankfurt-1'), or undefined when it cannot be resolved. */
	resolveHomeRegion(tenancyId: string): Promise<string | undefined>;
	/** Throws ConnectivityError when the identity service cannot be reached at all. */
	checkConnectivity(): Promise<void>;
}

export interface OciDirectoryClientOptions {
	retryPolicy?: RetryPolicy;
}

const TenancySchema = z.object({ name: z.string().min(1) });

const RegionSubscriptionSchema = z.object({
	regionName: z.string().min(1),
	isHomeRegion: z.boolean().optional()
});

/**
 * DirectoryClient backed by the oci-sdk IdentityClient.
 * Requires `initOCIAuth()` to have run first.
 */
export class OciDirectoryClient implements DirectoryClient {
	private readonly retryPolicy: RetryPolicy;

	constructor(options: OciDirectoryClientOptions = {}) {
		this.retryPolicy = options.retryPolicy ?? OCI_LIST_RETRY;
	}

	async listChildCompartments(compartmentId: string): Promise<CompartmentSummary[]> {
		const items = await this.retry('listCompartments', compartmentId, () =>
			listAllPages<oci.identity.requests.ListCompartmentsRequest, oci.identity.models.Compartment>(
				'listCompartments',
				{
					compartmentId,
					lifecycleState: oci.identity.models.Compartment.LifecycleState.Active
				},
				(client, request) => client.listCompartments(request)
			)
		);
		return parseItems('listCompartments', compartmentId, items, CompartmentSummarySchema);
	}

	async listPolicies(compartmentId: string): Promise<PolicyRecord[]> {
		const items = await this.retry('listPolicies', compartmentId, () =>
			listAllPages<oci.identity.requests.ListPoliciesRequest, oci.identity.models.Policy>('listPolicies', { compartmentId }, (client, request) =>
				client.listPolicies(request)
			)
		);
		return parseItems('listPolicies', compartmentId, items, PolicyRecordSchema);
	}

	async resolveTenancyName(tenancyId: string): Promise<string | undefined> {
		try {
			const response = await executeOCISDK('getTenancy', (client) =>
				client.getTenancy({ tenancyId })
			);
			const parsed = TenancySchema.safeParse(response.tenancy);
			return parsed.success ? parsed.data.name : undefined;
		} catch (err) {
			log.warn({ err, tenancyId }, 'Could not resolve tenancy name');
			return undefined;
		}
	}

	async resolveHomeRegion(tenancyId: string): Promise<string | undefined> {
		try {
			const response = await executeOCISDK('listRegionSubscriptions', (client) =>
				client.listRegionSubscriptions({ tenancyId })
			);
			const subscriptions = z.array(RegionSubscriptionSchema).safeParse(response.items);
			if (!subscriptions.success || subscriptions.data.length === 0) return undefined;

			const home = subscriptions.data.find((s) => s.isHomeRegion) ?? subscriptions.data[0];
			return home.regionName;
		} catch (err) {
			log.warn({ err, tenancyId }, 'Could not resolve home region');
			return undefined;
		}
	}

	async checkConnectivity(): Promise<void> {
		try {
			await executeOCISDK('listRegions', (client) => client.listRegions({}));
		} catch (err) {
			const cause = err instanceof Error ? err : undefined;
			const context = err instanceof OCIError ? err.context : {};
			throw new ConnectivityError(
				`Could not connect to OCI: ${cause?.message ?? String(err)}`,
				context,
				cause
			);
		}
	}

	private retry<T>(operation: string, compartmentId: string, fn: () => Promise<T>): Promise<T> {
		return withRetry({
			fn,
			policy: this.retryPolicy,
			shouldRetry: isTransientOCIError,
			onError: (err, attempt, willRetry) => {
				if (willRetry) {
					log.debug({ err, operation, compartmentId, attempt }, 'Transient OCI error, retrying');
				}
			}
		});
	}
}

/**
 * Validate list items one by one. Items that do not match (missing id or name)
 * are skipped; a payload where nothing is readable at all is malformed.
 */
function parseItems<T>(
	operation: string,
	compartmentId: string,
	items: readonly unknown[],
	schema: z.ZodType<T, z.ZodTypeDef, unknown>
): T[] {
	const parsed: T[] = [];
	for (const item of items) {
		const result = schema.safeParse(item);
		if (result.success) {
			parsed.push(result.data);
		} else {
			log.debug({ operation, compartmentId, issues: result.error.issues }, 'Skipping unreadable item');
		}
	}

	if (items.length > 0 && parsed.length === 0) {
		throw new OCIError(`Malformed response from identity.${operation}`, {
			operation,
			compartmentId,
			itemCount: items.length
		});
	}

	return parsed;
}
