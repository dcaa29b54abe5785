/**
 * Filename parsing steps for document identity.
 *
 * Each step works on the filename stem (extension already removed) and is
 * exported so it can be tested on its own.
 */

const MONTH =
	'jan(?:uary)?|feb(?:ruary)?|mar(?:ch)?|apr(?:il)?|may|june?|july?|aug(?:ust)?|sep(?:t(?:ember)?)?|oct(?:ober)?|nov(?:ember)?|dec(?:ember)?';

/** Month name followed by at least 10 digits at the end of the stem */
const EXPORT_TIMESTAMP = new RegExp(`[\\s_.-]*(?:${MONTH})[\\s_.-]*\\d{10,}$`, 'i');

/** " (2)", " - Copy", " - Copy (3)" */
const DUPLICATE_MARKERS = [/\s*\(\d+\)$/, /\s*-\s*copy$/i];

/**
 * Explicit version marker preceded by a separator (or the start of the stem)
 * and followed by a separator (or the end of the stem).
 */
const EXPLICIT_VERSION =
	/(?:^|[\s_.-])(?:revision|version|rev|ver|v)[\s_.-]?(\d+(?:\.\d+)*)(?=$|[\s_.\-)\]])/gi;

/** Trailing 2-3 digit suffix after a separator: QA-SOP-014 */
const IMPLICIT_VERSION = /^(.*?)[\s_.-](\d{2,3})$/;

/** Words carrying no identity when they trail a title */
const NOISE_WORDS = new Set([
	'final',
	'draft',
	'signed',
	'copy',
	'scan',
	'scanned',
	'clean',
	'approved',
]);

export interface VersionMatch {
	title: string;
	versionRaw: string;
}

export function stripExportTimestamp(stem: string): string {
	return stem.replace(EXPORT_TIMESTAMP, '');
}

/**
 * Strip OS duplicate-file markers, repeatedly, so "x (1) - Copy" loses both.
 */
export function stripDuplicateMarkers(stem: string): string {
	let current = stem;
	let changed = true;
	while (changed) {
		changed = false;
		for (const pattern of DUPLICATE_MARKERS) {
			const next = current.replace(pattern, '');
			if (next !== current) {
				current = next;
				changed = true;
			}
		}
	}
	return current;
}

/**
 * Find the last explicit version marker. The title is everything before it.
 */
export function findExplicitVersion(stem: string): VersionMatch | null {
	let last: RegExpMatchArray | null = null;
	for (const match of stem.matchAll(EXPLICIT_VERSION)) {
		last = match;
	}
	if (!last || last[1] === undefined) return null;

	return {
		title: stem.slice(0, last.index ?? 0),
		versionRaw: last[1],
	};
}

export function findImplicitVersion(stem: string): VersionMatch | null {
	const match = IMPLICIT_VERSION.exec(stem);
	if (!match || match[1] === undefined || match[2] === undefined) return null;
	if (match[1].trim().length === 0) return null;
	return {title: match[1], versionRaw: match[2]};
}

/**
 * Underscores to spaces, whitespace collapsed, trailing separators and
 * trailing noise words removed.
 */
export function normalizeTitle(raw: string): string {
	const words = raw
		.replace(/_/g, ' ')
		.replace(/\s+/g, ' ')
		.trim()
		.split(' ');

	while (words.length > 1) {
		const last = words[words.length - 1] ?? '';
		const bare = last.replace(/[^a-z]/gi, '').toLowerCase();
		if (!NOISE_WORDS.has(bare) && last.replace(/[-.]/g, '') !== '') break;
		words.pop();
	}

	return words
		.join(' ')
		.replace(/[\s.-]+$/, '')
		.trim();
}
