/**
 * Text the CLI prints to the terminal (not part of the report files).
 */
import type {
	CompartmentNode,
	CredentialSource,
	PolicyStats,
	TenancySummary
} from '@policy-audit/types';
import type { ConnectivityError } from '@policy-audit/server/errors';
import type { WrittenReports } from './report-files.js';

const SEPARATOR = '='.repeat(82);
const HINT_RULE = '═'.repeat(63);

/** Printed on stdout once both reports are written, before the summary itself. */
export function renderCompletionMessage(reports: WrittenReports, summary: TenancySummary): string {
	return [
		SEPARATOR,
		'ANALYSIS COMPLETED',
		SEPARATOR,
		'Generated files:',
		`  Full detail       : ${reports.detailPath}`,
		`  Executive summary : ${reports.summaryPath}`,
		'',
		'Statistics:',
		`  Compartments : ${summary.totalCompartments}`,
		`  Policies     : ${summary.totalPolicies}`,
		`  Statements   : ${summary.totalStatements}`,
		`  Coverage     : ${summary.compartmentsWithPolicies}/${summary.totalCompartments} compartments with policies`,
		'',
		'Executive summary:',
		SEPARATOR,
		''
	].join('\n');
}

/** Progress for one compartment once its children have been listed. */
export function renderDiscoveryProgress(node: CompartmentNode, childCount: number): string {
	return [
		`[PHASE 1] Discovering: ${node.name} (level ${node.depth})`,
		`    └── ${childCount} subcompartments${childCount > 0 ? ' found' : ''}`,
		''
	].join('\n');
}

/** Progress for one compartment once its policies have been counted. */
export function renderPolicyProgress(node: CompartmentNode, stats: PolicyStats): string {
	return [
		`[PHASE 2] Analyzing: ${node.name}`,
		stats.policyCount > 0 ? `    └── ${stats.policyCount} policies found` : '    └── No policies',
		''
	].join('\n');
}

export interface ConnectivityHintContext {
	credentialSource: CredentialSource;
	profile?: string;
	configFilePath?: string;
}

/**
 * Printed on stderr when the connectivity check fails: the raw diagnostic
 * from the SDK, then what to try for the environment the run is in.
 */
export function renderConnectivityFailure(
	error: ConnectivityError,
	context: ConnectivityHintContext
): string {
	const diagnostic = error.cause?.message ?? error.message;
	return [
		'Error: could not connect to OCI.',
		'',
		'Error detail:',
		diagnostic,
		...(typeof error.context.serviceCode === 'string'
			? [`Service code: ${error.context.serviceCode}`]
			: []),
		...(typeof error.context.opcRequestId === 'string'
			? [`Request id: ${error.context.opcRequestId}`]
			: []),
		'',
		...connectivityHints(context),
		''
	].join('\n');
}

function connectivityHints(context: ConnectivityHintContext): string[] {
	switch (context.credentialSource) {
		case 'session-token':
			return [
				HINT_RULE,
				'Possible fixes for Cloud Shell:',
				HINT_RULE,
				'  1. Close this terminal and open a new one',
				'  2. If the problem persists, sign out of the OCI Console and sign in again',
				'  3. Check that your user is allowed to list regions',
				'',
				'Manual test command:',
				'  oci iam region list --auth security_token'
			];
		case 'config-file':
			return [
				`Check that profile '${context.profile ?? 'DEFAULT'}' is configured correctly in ${context.configFilePath ?? '~/.oci/config'}`
			];
		case 'instance-principal':
		case 'resource-principal':
			return [
				`Check that the ${context.credentialSource} has a dynamic group and policy allowing it to read the tenancy`
			];
	}
}
