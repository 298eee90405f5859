/**
 * @policy-audit/shared - OCI access for the auditor: SDK authentication,
 * the identity executor and the Directory Client.
 */

export * from './oci/sdk-auth.js';
export * from './oci/executor-sdk.js';
export * from './oci/retry.js';
export * from './oci/directory-client.js';
