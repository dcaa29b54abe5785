import type {AnswerHit, CitationRow} from './types.js';

/**
 * Source list for an answer: one row per document and page, in hit order,
 * keeping the best-ranked hit's section and score.
 */
export function formatCitations(hits: readonly AnswerHit[]): CitationRow[] {
	const seen = new Set<string>();
	const rows: CitationRow[] = [];

	for (const hit of hits) {
		const key = `${hit.citation.documentTitle}\u0000${hit.citation.pageLabel}`;
		if (seen.has(key)) continue;
		seen.add(key);
		rows.push({
			document: hit.citation.documentTitle,
			version: hit.citation.versionRaw,
			page: hit.citation.pageLabel,
			section: hit.citation.sectionPath.join(' > '),
			score: Math.round(hit.score * 1000) / 1000,
		});
	}

	return rows;
}
