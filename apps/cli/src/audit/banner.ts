/**
 * Report header shared by the detail and summary documents, plus the
 * timestamp formats used in headers and file names (local time).
 */

export const AUDITOR_NAME = 'OCI Policy Hierarchy Auditor';
export const AUDITOR_VERSION = '1.0.0';

export const RULE_WIDTH = 80;

export interface ReportHeader {
	tenancyName: string;
	generatedAt: Date;
	/** e.g. 'Cloud Shell' or 'Local (profile: DEFAULT)' */
	environment: string;
	region: string;
}

export interface BannerOptions {
	includeRegion: boolean;
}

/** Banner lines, ending with an empty line. */
export function renderBanner(title: string, header: ReportHeader, options: BannerOptions): string[] {
	const rule = '#'.repeat(RULE_WIDTH);
	return [
		rule,
		`#  ${title}`,
		rule,
		'#',
		`#  Tenancy : ${header.tenancyName}`,
		`#  Date    : ${formatDateTime(header.generatedAt)}`,
		`#  Env     : ${header.environment}`,
		...(options.includeRegion ? [`#  Region  : ${header.region}`] : []),
		'#',
		rule,
		''
	];
}

/** `YYYY-MM-DD HH:MM:SS` */
export function formatDateTime(date: Date): string {
	const { year, month, day, hours, minutes, seconds } = dateParts(date);
	return `${year}-${month}-${day} ${hours}:${minutes}:${seconds}`;
}

/** `YYYYMMDD_HHMMSS`, used in report file names. */
export function formatFileTimestamp(date: Date): string {
	const { year, month, day, hours, minutes, seconds } = dateParts(date);
	return `${year}${month}${day}_${hours}${minutes}${seconds}`;
}

function dateParts(date: Date) {
	const pad = (n: number) => String(n).padStart(2, '0');
	return {
		year: String(date.getFullYear()),
		month: pad(date.getMonth() + 1),
		day: pad(date.getDate()),
		hours: pad(date.getHours()),
		minutes: pad(date.getMinutes()),
		seconds: pad(date.getSeconds())
	};
}
