/**
 * Retrieval result types.
 */

import type {Passage} from '../storage/types.js';

export type RetrievalStatus = 'ok' | 'no_results' | 'failed';

/**
 * What a citation needs to point a reader at the source.
 */
export interface CitationMetadata {
	documentTitle: string;
	versionRaw: string;
	docNumber: string | null;
	pageLabel: string;
	sectionPath: string[];
	sourceFilename: string;
}

/**
 * One passage returned by answer retrieval.
 */
export interface AnswerHit {
	id: string;
	/** Original-case passage body */
	body: string;
	/** Indexed text: citation header + body, lowercased */
	text: string;
	/** Fused score in [0, 1] */
	score: number;
	/** Max-normalized dense score, 0 when the passage came only from sparse */
	denseScore: number;
	/** Max-normalized sparse score, 0 when the passage came only from dense */
	sparseScore: number;
	citation: CitationMetadata;
	prevId: string | null;
	nextId: string | null;
}

export interface AnswerRetrieval {
	query: string;
	hits: AnswerHit[];
	status: RetrievalStatus;
	error?: string;
	elapsedMs: number;
}

export interface AnswerOptions {
	topK?: number;
	/** Dense weight; sparse weight is 1 - alpha */
	alpha?: number;
	relevanceFloor?: number;
}

/**
 * A snippet of a matching passage with matches wrapped in `**`.
 */
export interface DiscoverySnippet {
	text: string;
	pageLabel: string;
	sectionPath: string[];
}

/**
 * All matching passages of one document.
 */
export interface DiscoveryGroup {
	documentTitle: string;
	/** Versions of the matching passages, highest first */
	versions: string[];
	/** Number of matching passages */
	matchCount: number;
	/** Best sparse score of a matching passage */
	bestScore: number;
	snippets: DiscoverySnippet[];
}

export interface KeywordDiscovery {
	query: string;
	/** Normalized query terms */
	terms: string[];
	groups: DiscoveryGroup[];
	status: RetrievalStatus;
	error?: string;
	elapsedMs: number;
}

export interface DiscoveryOptions {
	/** Also search Inactive revisions (administrative lookups) */
	includeInactive?: boolean;
	maxSnippets?: number;
}

/**
 * One row of a source list, deduplicated by document and page.
 */
export interface CitationRow {
	document: string;
	version: string;
	page: string;
	section: string;
	/** Rounded to 3 decimals */
	score: number;
}

/**
 * Candidate from one or both signals before the final cut.
 */
export interface FusedCandidate {
	passage: Passage;
	score: number;
	denseScore: number;
	sparseScore: number;
}
