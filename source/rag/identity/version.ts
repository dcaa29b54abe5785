import type {Logger} from '../logger/index.js';

const CONTENT_VERSION =
	/\b(?:revision|version|rev\.?|ver\.?)\s*(?:no\.?|number)?\s*[:#]\s*v?(\d+(?:\.\d+)*)/i;

const DOC_NUMBER_FIELDS = [
	/\b(?:document|doc|sop)\.?\s*(?:no\.?|number|#)\s*[:#]?\s*([a-z0-9][a-z0-9._/-]*)/i,
	/^\s*number\s*:\s*([a-z0-9][a-z0-9._/-]*)/im,
];

/**
 * Project a raw version token onto a comparable float.
 *
 * Everything except digits and dots is stripped first, so "Rev07" -> 7 and
 * "v2.5" -> 2.5. A token with nothing parseable left becomes 0.0 and is
 * logged, never thrown.
 *
 * Dotted tokens compare as decimals: "1.10" < "1.9".
 */
export function normalizeVersion(raw: string, logger?: Logger): number {
	const digits = raw.replace(/[^\d.]/g, '');
	const value = Number.parseFloat(digits);
	if (!Number.isFinite(value)) {
		logger?.warn('Resolver', 'Unparseable version token, using 0.0', {
			versionRaw: raw,
		});
		return 0;
	}
	return value;
}

/**
 * Find a "Revision: 07" / "Version: 2.1" field in a first-page text sample.
 */
export function extractContentVersion(text: string): string | null {
	const match = CONTENT_VERSION.exec(text);
	return match?.[1] ?? null;
}

/**
 * Find the business document number ("Document No: QA-SOP-014") in a
 * first-page text sample. Candidates without a digit are ignored.
 */
export function extractDocNumber(text: string): string | null {
	for (const pattern of DOC_NUMBER_FIELDS) {
		const match = pattern.exec(text);
		const candidate = match?.[1]?.replace(/[._/-]+$/, '');
		if (candidate && /\d/.test(candidate)) {
			return candidate.toUpperCase();
		}
	}
	return null;
}
