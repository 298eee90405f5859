/**
 * Report file naming and writing. Both files of a run share one timestamp.
 */
import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { ReportWriteError } from '@policy-audit/server/errors';
import { createLogger } from '@policy-audit/server/logger';
import { formatFileTimestamp } from './audit/banner.js';

const log = createLogger('reports');

export interface ReportFileNames {
	detail: string;
	summary: string;
}

export interface WrittenReports {
	detailPath: string;
	summaryPath: string;
}

/** @example reportFileNames(date) // { detail: 'oci_policies_complete_20261018_093005.txt', ... } */
export function reportFileNames(generatedAt: Date): ReportFileNames {
	const timestamp = formatFileTimestamp(generatedAt);
	return {
		detail: `oci_policies_complete_${timestamp}.txt`,
		summary: `oci_policies_summary_${timestamp}.txt`
	};
}

/**
 * Write both documents into `outputDir`, creating it if needed.
 *
 * @throws ReportWriteError when the directory or a file cannot be written.
 */
export async function writeReports(
	outputDir: string,
	names: ReportFileNames,
	documents: { detailReport: string; summaryReport: string }
): Promise<WrittenReports> {
	const detailPath = join(outputDir, names.detail);
	const summaryPath = join(outputDir, names.summary);

	try {
		await mkdir(outputDir, { recursive: true });
		await writeFile(detailPath, documents.detailReport, 'utf-8');
		await writeFile(summaryPath, documents.summaryReport, 'utf-8');
	} catch (err) {
		throw new ReportWriteError(
			`Could not write reports to ${outputDir}`,
			{ outputDir, detailPath, summaryPath },
			err instanceof Error ? err : undefined
		);
	}

	log.info({ detailPath, summaryPath }, 'Reports written');
	return { detailPath, summaryPath };
}
