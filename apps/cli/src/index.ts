/**
 * OCI Policy Hierarchy Auditor entry point.
 *
 * Wires the real SDK-backed collaborators into `runCli` and sets the exit code.
 */
import { createLogger } from '@policy-audit/server/logger';
import { closeSentry } from '@policy-audit/server/sentry';
import { OciDirectoryClient } from '@policy-audit/shared/oci/directory-client';
import { OCI_LIST_RETRY, mergeRetryPolicy } from '@policy-audit/shared/oci/retry';
import {
	closeIdentityClient,
	initOCIAuth,
	readTenancyFromProfile
} from '@policy-audit/shared/oci/sdk-auth';
import { runCli } from './cli.js';
import { promptForProfile } from './prompt.js';

const log = createLogger('cli');

async function main(): Promise<number> {
	try {
		return await runCli({
			env: process.env,
			stdout: process.stdout,
			stderr: process.stderr,
			interactive: process.stdin.isTTY === true,
			promptProfile: () => promptForProfile(),
			readTenancyFromProfile,
			connect: async (config) => {
				await initOCIAuth({
					source: config.credentialSource,
					configFilePath: config.configFilePath,
					profile: config.profile,
					region: config.region
				});
				return new OciDirectoryClient({
					retryPolicy: mergeRetryPolicy(OCI_LIST_RETRY, { maxRetries: config.maxRetries })
				});
			},
			now: () => new Date()
		});
	} finally {
		closeIdentityClient();
		await closeSentry();
	}
}

main().then(
	(code) => {
		process.exitCode = code;
	},
	(err: unknown) => {
		log.fatal({ err }, 'Unhandled error');
		process.exitCode = 1;
	}
);
