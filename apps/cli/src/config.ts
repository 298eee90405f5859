/**
 * Run configuration, read from the environment.
 *
 * The auditor takes no flags. Credentials, tenancy and output location all
 * come from environment variables; Cloud Shell provides what it needs by
 * itself, a local run reads the tenancy from the selected config profile.
 */
import { z } from 'zod';
import { ValidationError } from '@policy-audit/server/errors';
import type { CredentialSource } from '@policy-audit/types';
import { detectCredentialSource } from '@policy-audit/shared/oci/sdk-auth';
import { DEFAULT_MAX_DEPTH } from './audit/discovery.js';

/** Unset and empty variables are treated alike. */
const optionalString = z.preprocess(
	(value) => (value === '' ? undefined : value),
	z.string().optional()
);

const EnvSchema = z.object({
	OCI_TENANCY: optionalString,
	OCI_TENANCY_ID: optionalString,
	OCI_CLI_PROFILE: optionalString,
	OCI_CLI_CONFIG_FILE: optionalString,
	OCI_REGION: optionalString,
	POLICY_AUDIT_OUTPUT_DIR: optionalString,
	POLICY_AUDIT_MAX_DEPTH: z.preprocess(
		(value) => (value === '' ? undefined : value),
		z.coerce.number().int().positive().default(DEFAULT_MAX_DEPTH)
	),
	POLICY_AUDIT_MAX_RETRIES: z.preprocess(
		(value) => (value === '' ? undefined : value),
		z.coerce.number().int().min(0).max(10).default(2)
	),
	SENTRY_DSN: optionalString
});

export interface AuditConfig {
	credentialSource: CredentialSource;
	/** Config-file profile; undefined until chosen for a local run. */
	profile?: string;
	configFilePath?: string;
	/** Tenancy OCID provided by the environment, if any. */
	tenancyId?: string;
	/** Region from the environment; otherwise looked up as the tenancy's home region. */
	region?: string;
	outputDir: string;
	maxDepth: number;
	maxRetries: number;
	sentryDsn?: string;
}

/**
 * @throws ValidationError when a variable has an unusable value.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AuditConfig {
	const parsed = EnvSchema.safeParse(env);
	if (!parsed.success) {
		throw new ValidationError('Invalid environment configuration', {
			issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
		});
	}

	const vars = parsed.data;
	const credentialSource = detectCredentialSource(env);

	return {
		credentialSource,
		profile: vars.OCI_CLI_PROFILE,
		configFilePath: vars.OCI_CLI_CONFIG_FILE,
		tenancyId: credentialSource === 'session-token' ? vars.OCI_TENANCY : vars.OCI_TENANCY_ID,
		region: vars.OCI_REGION,
		outputDir: vars.POLICY_AUDIT_OUTPUT_DIR ?? '.',
		maxDepth: vars.POLICY_AUDIT_MAX_DEPTH,
		maxRetries: vars.POLICY_AUDIT_MAX_RETRIES,
		sentryDsn: vars.SENTRY_DSN
	};
}

/** Whether the user should be asked which config profile to use. */
export function needsProfilePrompt(config: AuditConfig): boolean {
	return config.credentialSource === 'config-file' && config.profile === undefined;
}

/**
 * The tenancy OCID: from the environment when present, otherwise from the
 * config-file profile. Principal-based runs must provide it explicitly.
 */
export function resolveTenancyId(
	config: AuditConfig,
	readFromProfile: (options: { configFilePath?: string; profile?: string }) => string
): string {
	if (config.tenancyId) return config.tenancyId;

	switch (config.credentialSource) {
		case 'session-token':
		case 'config-file':
			return readFromProfile({ configFilePath: config.configFilePath, profile: config.profile });
		case 'instance-principal':
		case 'resource-principal':
			throw new ValidationError(
				'OCI_TENANCY_ID must be set when authenticating with a principal',
				{ credentialSource: config.credentialSource }
			);
	}
}

/** Environment label shown in report headers. */
export function environmentLabel(config: AuditConfig): string {
	switch (config.credentialSource) {
		case 'session-token':
			return 'Cloud Shell';
		case 'config-file':
			return `Local (profile: ${config.profile ?? 'DEFAULT'})`;
		case 'instance-principal':
			return 'Instance principal';
		case 'resource-principal':
			return 'Resource principal';
	}
}
