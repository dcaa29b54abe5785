/**
 * Query normalization, whole-word matching and snippet highlighting for
 * keyword discovery. Matching ignores case and accents.
 */

import {foldAccents, foldWithOffsets} from '../text.js';

/**
 * Lowercase and accent-fold the query, turn punctuation into spaces, drop
 * stop words and duplicates. Order of first appearance is kept.
 */
export function normalizeQueryTerms(
	query: string,
	stopWords: Iterable<string> = [],
): string[] {
	const stop = new Set<string>();
	for (const word of stopWords) stop.add(foldAccents(word.toLowerCase()));

	const terms = foldAccents(query.toLowerCase())
		.replace(/[^\p{L}\p{N}\s]+/gu, ' ')
		.split(/\s+/)
		.filter(term => term.length > 0 && !stop.has(term));

	return [...new Set(terms)];
}

/**
 * Case-insensitive pattern matching any of the terms as a whole word.
 */
export function buildTermPattern(
	terms: readonly string[],
	global = false,
): RegExp {
	const alternatives = [...terms]
		.sort((a, b) => b.length - a.length)
		.map(escapeRegExp)
		.join('|');
	return new RegExp(
		`(?<![\\p{L}\\p{N}])(?:${alternatives})(?![\\p{L}\\p{N}])`,
		global ? 'giu' : 'iu',
	);
}

/**
 * Original-text spans `[start, end)` of whole-word term occurrences.
 */
export function findTermSpans(
	text: string,
	terms: readonly string[],
): Array<[number, number]> {
	if (terms.length === 0) return [];
	const {folded, offsets} = foldWithOffsets(text);
	const pattern = buildTermPattern(terms.map(foldAccents), true);

	const spans: Array<[number, number]> = [];
	for (const match of folded.matchAll(pattern)) {
		const start = match.index ?? 0;
		const end = start + match[0].length;
		spans.push([offsets[start] ?? text.length, offsets[end] ?? text.length]);
	}
	return spans;
}

/**
 * True when at least one term occurs as a whole word.
 */
export function containsAnyTerm(
	text: string,
	terms: readonly string[],
): boolean {
	if (terms.length === 0) return false;
	return buildTermPattern(terms.map(foldAccents)).test(foldAccents(text));
}

/**
 * Wrap every whole-word term occurrence in `**`.
 */
export function highlightTerms(text: string, terms: readonly string[]): string {
	let out = '';
	let last = 0;
	for (const [start, end] of findTermSpans(text, terms)) {
		out += `${text.slice(last, start)}**${text.slice(start, end)}**`;
		last = end;
	}
	return out + text.slice(last);
}

/**
 * Context windows around term occurrences, highlighted.
 *
 * A match already inside the previous window does not open a new one.
 * Windows that do not reach the edge of the text get an ellipsis.
 *
 * @param window - Characters kept on each side of a match
 * @param limit - Maximum number of snippets
 */
export function extractSnippets(
	text: string,
	terms: readonly string[],
	window: number,
	limit: number,
): string[] {
	if (limit <= 0) return [];

	const snippets: string[] = [];
	let coveredUntil = -1;

	for (const [matchStart, matchEnd] of findTermSpans(text, terms)) {
		if (snippets.length >= limit) break;
		if (matchStart < coveredUntil) continue;

		const start = Math.max(0, matchStart - window);
		const end = Math.min(text.length, matchEnd + window);
		coveredUntil = end;

		const body = highlightTerms(text.slice(start, end), terms)
			.replace(/\s+/g, ' ')
			.trim();
		snippets.push(
			`${start > 0 ? '...' : ''}${body}${end < text.length ? '...' : ''}`,
		);
	}

	return snippets;
}

function escapeRegExp(text: string): string {
	return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
