/**
 * OCI SDK Authentication Provider
 *
 * Configures and caches OCI SDK authentication for the identity client.
 * Supports Cloud Shell session tokens, config-file API keys (local runs),
 * instance principals (OCI VMs) and resource principals (OCI Functions/Containers).
 */
import * as oci from 'oci-sdk';
import type { CredentialSource } from '@policy-audit/types';
import { ValidationError } from '@policy-audit/server/errors';
import { createLogger } from '@policy-audit/server/logger';

const log = createLogger('oci-sdk-auth');

export interface OCISDKAuthOptions {
	/** Credential source to use. Auto-detected from environment if not specified. */
	source?: CredentialSource;
	/** Config file path for 'config-file' / 'session-token'. Defaults to ~/.oci/config */
	configFilePath?: string;
	/** Config profile name. Defaults to 'DEFAULT' */
	profile?: string;
	/** Override region (otherwise from config/IMDS) */
	region?: string;
}

/**
 * Cached auth provider singleton.
 * The OCI SDK provider reads config/certs once and reuses them for all calls.
 */
let cachedProvider: oci.common.AuthenticationDetailsProvider | null = null;
let cachedRegion: string | null = null;
let cachedIdentityClient: oci.identity.IdentityClient | null = null;

/**
 * Initialize the OCI SDK authentication provider.
 * Call this once at startup before any SDK calls.
 * Instance/resource principal sources require async init (IMDS calls).
 */
export async function initOCIAuth(
	options: OCISDKAuthOptions = {}
): Promise<oci.common.AuthenticationDetailsProvider> {
	if (cachedProvider) return cachedProvider;

	const source = options.source ?? detectCredentialSource();
	cachedProvider = await buildProvider(source, options);

	if (options.region) {
		cachedRegion = options.region;
	}

	return cachedProvider;
}

/**
 * Read the tenancy OCID recorded in a config-file profile.
 * Used when the environment does not provide it (local runs outside Cloud Shell).
 */
export function readTenancyFromProfile(
	options: Pick<OCISDKAuthOptions, 'configFilePath' | 'profile'> = {}
): string {
	const profile = options.profile ?? 'DEFAULT';
	try {
		const provider = new oci.common.ConfigFileAuthenticationDetailsProvider(
			options.configFilePath,
			profile
		);
		const tenancyId = provider.getTenantId();
		if (!tenancyId) {
			throw new ValidationError(`No tenancy OCID in profile '${profile}'`, { profile });
		}
		return tenancyId;
	} catch (err) {
		if (err instanceof ValidationError) throw err;
		throw new ValidationError(
			`Could not read the tenancy OCID for profile '${profile}'`,
			{ profile, configFilePath: options.configFilePath ?? '~/.oci/config' },
			err instanceof Error ? err : undefined
		);
	}
}

/**
 * Get the cached auth provider. Fails when `initOCIAuth()` has not run.
 */
export function getOCIAuthProvider(): oci.common.AuthenticationDetailsProvider {
	if (!cachedProvider) {
		throw new ValidationError('OCI authentication has not been initialized');
	}
	return cachedProvider;
}

/**
 * Get the configured OCI region.
 */
export function getOCIRegion(): string | undefined {
	return cachedRegion ?? process.env.OCI_CLI_REGION ?? process.env.OCI_REGION ?? undefined;
}

// ── SDK Client Factory ──────────────────────────────────────────────────

/**
 * Get the identity service client.
 * Created lazily with the cached auth provider and reused for the lifetime of the process.
 *
 * @example
 * const client = getIdentityClient();
 * const result = await client.listPolicies({ compartmentId: '...' });
 */
export function getIdentityClient(): oci.identity.IdentityClient {
	if (!cachedIdentityClient) {
		const client = new oci.identity.IdentityClient({
			authenticationDetailsProvider: getOCIAuthProvider()
		});

		const region = getOCIRegion();
		if (region) {
			client.regionId = region;
		}

		cachedIdentityClient = client;
		log.debug({ region }, 'Created OCI identity client');
	}
	return cachedIdentityClient;
}

/**
 * Close the cached SDK client (before the process exits).
 */
export function closeIdentityClient(): void {
	const client = cachedIdentityClient;
	cachedIdentityClient = null;
	if (!client) return;

	try {
		if ('close' in client && typeof client.close === 'function') {
			client.close();
		}
	} catch (err) {
		log.warn({ err }, 'Error closing identity client');
	}
}

// ── Environment detection ───────────────────────────────────────────────

/**
 * Auto-detect the credential source from the environment.
 * Cloud Shell exposes both OCI_TENANCY and OCI_CS_USER_OCID.
 */
export function detectCredentialSource(env: NodeJS.ProcessEnv = process.env): CredentialSource {
	if (env.OCI_TENANCY && env.OCI_CS_USER_OCID) {
		return 'session-token';
	}
	if (env.OCI_RESOURCE_PRINCIPAL_VERSION) {
		return 'resource-principal';
	}
	if (env.OCI_INSTANCE_PRINCIPAL) {
		return 'instance-principal';
	}
	return 'config-file';
}

// ── Internal helpers ────────────────────────────────────────────────────

async function buildProvider(
	source: CredentialSource,
	options: OCISDKAuthOptions
): Promise<oci.common.AuthenticationDetailsProvider> {
	const profile = options.profile ?? 'DEFAULT';
	const configPath = options.configFilePath;

	switch (source) {
		case 'instance-principal':
			log.info('Using instance principal authentication');
			return new oci.common.InstancePrincipalsAuthenticationDetailsProviderBuilder().build();

		case 'resource-principal':
			log.info('Using resource principal authentication');
			return oci.common.ResourcePrincipalAuthenticationDetailsProvider.builder();

		case 'session-token':
			log.info(
				{ profile, configPath: configPath ?? '~/.oci/config' },
				'Using session token authentication'
			);
			return new oci.common.SessionAuthDetailProvider(configPath, profile);

		case 'config-file':
			log.info(
				{ profile, configPath: configPath ?? '~/.oci/config' },
				'Using config file authentication'
			);
			return new oci.common.ConfigFileAuthenticationDetailsProvider(configPath, profile);
	}
}
