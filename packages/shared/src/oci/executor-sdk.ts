/**
 * OCI SDK Executor Adapter
 *
 * Runs identity client operations with standardized error handling and tracing.
 * Wraps SDK errors in OCIError so every caller sees the same shape
 * (service, operation, statusCode, serviceCode, opcRequestId).
 */
import type * as oci from 'oci-sdk';
import { OCIError } from '@policy-audit/server/errors';
import { wrapWithSpan, captureError } from '@policy-audit/server/sentry';
import { getIdentityClient } from './sdk-auth.js';

type IdentityClient = oci.identity.IdentityClient;

/** A paged list response as returned by every `list*` identity operation. */
export interface PagedResponse<I> {
	items: I[];
	opcNextPage?: string;
}

/**
 * Execute an identity SDK operation with standardized error handling and tracing.
 *
 * @param operation - Operation name used for spans and error context (e.g. 'listPolicies')
 * @param call - Invokes the operation on the client
 *
 * @example
 * const response = await executeOCISDK('getTenancy', (client) =>
 *   client.getTenancy({ tenancyId: 'ocid1.tenancy...' })
 * );
 */
export async function executeOCISDK<T>(
	operation: string,
	call: (client: IdentityClient) => Promise<T>,
	context: Record<string, unknown> = {}
): Promise<T> {
	return wrapWithSpan(`oci.sdk.identity.${operation}`, 'oci.sdk', async () => {
		try {
			return await call(getIdentityClient());
		} catch (error: unknown) {
			const ociErr = toOCIError(error, operation, context);
			captureError(ociErr);
			throw ociErr;
		}
	});
}

/**
 * Follow `opcNextPage` until the service reports no further page and
 * return every item in server order.
 *
 * @example
 * const policies = await listAllPages('listPolicies', { compartmentId }, (client, request) =>
 *   client.listPolicies(request)
 * );
 */
export async function listAllPages<R extends { page?: string }, I>(
	operation: string,
	request: R,
	call: (client: IdentityClient, request: R) => Promise<PagedResponse<I>>
): Promise<I[]> {
	const items: I[] = [];
	let page: string | undefined;

	do {
		const pageRequest: R = page ? { ...request, page } : request;
		const response = await executeOCISDK(
			operation,
			(client) => call(client, pageRequest),
			{ request }
		);

		if (!response || !Array.isArray(response.items)) {
			throw new OCIError(`Malformed response from identity.${operation}`, {
				service: 'identity',
				operation,
				request
			});
		}

		items.push(...response.items);
		page = response.opcNextPage || undefined;
	} while (page);

	return items;
}

/**
 * Map any thrown value to an OCIError.
 * SDK errors carry statusCode, serviceCode, message and opcRequestId.
 */
export function toOCIError(
	error: unknown,
	operation: string,
	context: Record<string, unknown> = {}
): OCIError {
	// Already an OCIError
	if (error instanceof OCIError) return error;

	const sdkError = readSDKErrorFields(error);

	return new OCIError(
		sdkError.message ?? `OCI SDK error: identity.${operation}`,
		{
			...context,
			service: 'identity',
			operation,
			statusCode: sdkError.statusCode,
			serviceCode: sdkError.serviceCode,
			opcRequestId: sdkError.opcRequestId
		},
		error instanceof Error ? error : undefined
	);
}

// ── Internal helpers ────────────────────────────────────────────────────

interface SDKErrorFields {
	message?: string;
	statusCode?: number;
	serviceCode?: string;
	opcRequestId?: string;
}

function readSDKErrorFields(error: unknown): SDKErrorFields {
	if (!error || typeof error !== 'object') return {};

	const fields: SDKErrorFields = {};
	if ('message' in error && typeof error.message === 'string') fields.message = error.message;
	if ('statusCode' in error && typeof error.statusCode === 'number') {
		fields.statusCode = error.statusCode;
	}
	if ('serviceCode' in error && typeof error.serviceCode === 'string') {
		fields.serviceCode = error.serviceCode;
	}
	if ('opcRequestId' in error && typeof error.opcRequestId === 'string') {
		fields.opcRequestId = error.opcRequestId;
	}
	return fields;
}
