/**
 * CLI orchestration: configuration → authentication → connectivity check →
 * audit → report files → terminal output. Returns the process exit code.
 *
 * Collaborators with side effects are injected so the whole run can be
 * exercised in-process against a fake directory.
 */
import type { DirectoryClient } from '@policy-audit/shared/oci/directory-client';
import { ConnectivityError, toAuditError } from '@policy-audit/server/errors';
import { createLogger } from '@policy-audit/server/logger';
import { captureError, initSentry } from '@policy-audit/server/sentry';
import { runAudit } from './audit/run-audit.js';
import {
	environmentLabel,
	loadConfig,
	needsProfilePrompt,
	resolveTenancyId,
	type AuditConfig
} from './config.js';
import {
	renderCompletionMessage,
	renderConnectivityFailure,
	renderDiscoveryProgress,
	renderPolicyProgress
} from './console-output.js';
import { DEFAULT_PROFILE } from './prompt.js';
import { reportFileNames, writeReports } from './report-files.js';

const log = createLogger('cli');

export const FALLBACK_TENANCY_NAME = 'Tenancy';
export const FALLBACK_REGION = 'N/A';

export interface TextSink {
	write(text: string): unknown;
}

export interface CliDependencies {
	env: NodeJS.ProcessEnv;
	stdout: TextSink;
	stderr: TextSink;
	/** Whether the user can be asked questions (stdin is a terminal). */
	interactive: boolean;
	promptProfile: () => Promise<string>;
	readTenancyFromProfile: (options: { configFilePath?: string; profile?: string }) => string;
	/** Sets up SDK authentication and returns the client the run will use. */
	connect: (config: AuditConfig) => Promise<DirectoryClient>;
	now: () => Date;
}

export async function runCli(deps: CliDependencies): Promise<number> {
	let config: AuditConfig | undefined;

	try {
		config = await resolveConfig(deps);
		await initSentry({ dsn: config.sentryDsn, environment: config.credentialSource });

		const tenancyId = resolveTenancyId(config, deps.readTenancyFromProfile);
		log.info({ credentialSource: config.credentialSource, tenancyId }, 'Configuration resolved');

		const client = await connect(deps, config);

		log.info('Checking connectivity with OCI');
		await client.checkConnectivity();
		log.info('Connectivity verified');

		const tenancyName = (await client.resolveTenancyName(tenancyId)) ?? FALLBACK_TENANCY_NAME;
		const region =
			config.region ?? (await client.resolveHomeRegion(tenancyId)) ?? FALLBACK_REGION;
		log.info({ tenancy: tenancyName, region }, 'Starting hierarchical policy analysis');

		const generatedAt = deps.now();
		const names = reportFileNames(generatedAt);
		const result = await runAudit({
			client,
			tenancyId,
			header: { tenancyName, generatedAt, environment: environmentLabel(config), region },
			detailFileName: names.detail,
			maxDepth: config.maxDepth,
			onDiscovered: (node, childCount) =>
				deps.stderr.write(renderDiscoveryProgress(node, childCount)),
			onCounted: (node, stats) => deps.stderr.write(renderPolicyProgress(node, stats))
		});

		const written = await writeReports(config.outputDir, names, result);

		deps.stdout.write(renderCompletionMessage(written, result.summary));
		deps.stdout.write(result.summaryReport);
		return 0;
	} catch (err) {
		if (err instanceof ConnectivityError && config) {
			log.error({ err }, 'Could not connect to OCI');
			deps.stderr.write(renderConnectivityFailure(err, config));
			captureError(err);
			return err.exitCode;
		}

		const auditErr = toAuditError(err);
		log.fatal({ err: auditErr }, 'Policy analysis failed');
		deps.stderr.write(`Error: ${auditErr.message}\n`);
		captureError(auditErr);
		return auditErr.exitCode;
	}
}

async function resolveConfig(deps: CliDependencies): Promise<AuditConfig> {
	const config = loadConfig(deps.env);
	if (!needsProfilePrompt(config)) return config;

	const profile = deps.interactive ? await deps.promptProfile() : DEFAULT_PROFILE;
	return { ...config, profile };
}

/** Authentication set-up failures get the same diagnostics as a failed connectivity check. */
async function connect(deps: CliDependencies, config: AuditConfig): Promise<DirectoryClient> {
	try {
		return await deps.connect(config);
	} catch (err) {
		if (err instanceof ConnectivityError) throw err;
		const cause = err instanceof Error ? err : undefined;
		throw new ConnectivityError(
			`Could not set up OCI authentication: ${cause?.message ?? String(err)}`,
			{ credentialSource: config.credentialSource },
			cause
		);
	}
}
