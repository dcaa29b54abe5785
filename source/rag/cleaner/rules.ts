/**
 * Ordered noise-removal rules applied to each page before chunking.
 */

export interface CleaningRule {
	name: string;
	pattern: RegExp;
	replacement: string;
}

export const PAGE_NUMBERING: CleaningRule = {
	name: 'page-numbering',
	pattern: /Page\s+\d+\s+of\s+\d+/gi,
	replacement: '',
};

export const CONFIDENTIAL_WATERMARK: CleaningRule = {
	name: 'confidential-watermark',
	pattern: /\bCONFIDENTIAL\b/gi,
	replacement: '',
};

/** Controlled-document header fields; the field and the rest of its line go */
export const HEADER_FIELDS: CleaningRule = {
	name: 'header-fields',
	pattern: /\b(?:Document No|Effective Date|Number|Revision|Status)\s*:.*$/gim,
	replacement: '',
};

/** Legal footer; everything after it on the page goes */
export const UNCONTROLLED_COPY_FOOTER: CleaningRule = {
	name: 'uncontrolled-copy-footer',
	pattern: /This is an uncontrolled copy valid for[\s\S]*$/i,
	replacement: '',
};

export const ISOLATED_PAGINATION: CleaningRule = {
	name: 'isolated-pagination',
	pattern: /\b\d+\s+of\s+\d+\b/g,
	replacement: '',
};

export const TRAILING_WHITESPACE: CleaningRule = {
	name: 'trailing-whitespace',
	pattern: /[ \t]+$/gm,
	replacement: '',
};

export const BLANK_LINE_COLLAPSE: CleaningRule = {
	name: 'blank-line-collapse',
	pattern: /\n{3,}/g,
	replacement: '\n\n',
};

export const DEFAULT_CLEANING_RULES: readonly CleaningRule[] = [
	PAGE_NUMBERING,
	CONFIDENTIAL_WATERMARK,
	HEADER_FIELDS,
	UNCONTROLLED_COPY_FOOTER,
	ISOLATED_PAGINATION,
	TRAILING_WHITESPACE,
	BLANK_LINE_COLLAPSE,
];

export function applyRule(text: string, rule: CleaningRule): string {
	return text.replace(rule.pattern, rule.replacement);
}

/**
 * Run every rule in order, then trim.
 */
export function cleanText(
	text: string,
	rules: readonly CleaningRule[] = DEFAULT_CLEANING_RULES,
): string {
	return rules.reduce(applyRule, text.replace(/\r\n?/g, '\n')).trim();
}

/**
 * Clean each page, dropping pages left empty.
 */
export function cleanPages<T extends {text: string}>(
	pages: readonly T[],
	rules: readonly CleaningRule[] = DEFAULT_CLEANING_RULES,
): T[] {
	const cleaned: T[] = [];
	for (const page of pages) {
		const text = cleanText(page.text, rules);
		if (text.length > 0) {
			cleaned.push({...page, text});
		}
	}
	return cleaned;
}
