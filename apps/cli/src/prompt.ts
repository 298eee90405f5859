import { createInterface } from 'node:readline/promises';

export const DEFAULT_PROFILE = 'DEFAULT';

/**
 * Ask which OCI config profile to use. An empty answer selects DEFAULT.
 * The question goes to stderr so stdout only ever carries report output.
 */
export async function promptForProfile(
	input: NodeJS.ReadableStream = process.stdin,
	output: NodeJS.WritableStream = process.stderr
): Promise<string> {
	const rl = createInterface({ input, output });
	try {
		const answer = await rl.question(`OCI config profile to use [${DEFAULT_PROFILE}]: `);
		return answer.trim() || DEFAULT_PROFILE;
	} finally {
		rl.close();
	}
}
