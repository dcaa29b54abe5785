/**
 * In-process passage store.
 *
 * Implements the same contract as the LanceDB store: cosine similarity for
 * dense search, Okapi BM25 over the text column for sparse search.
 */

import {StoreNotConnectedError} from '../errors.js';
import {foldAccents} from '../text.js';
import {isEmptyFilter, matchesFilter} from './filters.js';
import {
	stripVector,
	type EmbeddedPassage,
	type Passage,
	type PassageFieldUpdate,
	type PassageFilter,
	type PassageStore,
	type ScoredPassage,
	type StoreSearchOptions,
} from './types.js';

const BM25_K1 = 1.2;
const BM25_B = 0.75;

export class MemoryPassageStore implements PassageStore {
	private readonly rows = new Map<string, EmbeddedPassage>();
	private connected = false;

	async connect(): Promise<void> {
		this.connected = true;
	}

	close(): void {
		this.connected = false;
	}

	async addPassages(passages: EmbeddedPassage[]): Promise<void> {
		this.ensureConnected();
		for (const passage of passages) {
			this.rows.set(passage.id, {
				...passage,
				sectionPath: [...passage.sectionPath],
				vector: [...passage.vector],
			});
		}
	}

	async deletePassages(filter: PassageFilter): Promise<number> {
		this.ensureConnected();
		requireFilter(filter, 'delete');
		let count = 0;
		for (const [id, row] of this.rows) {
			if (matchesFilter(row, filter)) {
				this.rows.delete(id);
				count++;
			}
		}
		return count;
	}

	async updateFieldsByFilter(
		filter: PassageFilter,
		fields: PassageFieldUpdate,
	): Promise<number> {
		this.ensureConnected();
		requireFilter(filter, 'update');
		let count = 0;
		for (const row of this.rows.values()) {
			if (matchesFilter(row, filter)) {
				row.status = fields.status;
				count++;
			}
		}
		return count;
	}

	async findPassages(filter: PassageFilter, limit?: number): Promise<Passage[]> {
		this.ensureConnected();
		const matches = this.filtered(filter).map(stripVector);
		return limit === undefined ? matches : matches.slice(0, limit);
	}

	async getPassagesByIds(ids: string[]): Promise<Passage[]> {
		this.ensureConnected();
		return ids.flatMap(id => {
			const row = this.rows.get(id);
			return row ? [stripVector(row)] : [];
		});
	}

	async countPassages(filter?: PassageFilter): Promise<number> {
		this.ensureConnected();
		return this.filtered(filter).length;
	}

	/**
	 * Score = 1 / (1 + cosine distance), matching the LanceDB store.
	 */
	async vectorSearch(
		vector: number[],
		options: StoreSearchOptions,
	): Promise<ScoredPassage[]> {
		this.ensureConnected();
		return this.filtered(options.filter)
			.map(row => ({
				passage: stripVector(row),
				score: 1 / (1 + (1 - cosineSimilarity(vector, row.vector))),
			}))
			.sort((a, b) => b.score - a.score)
			.slice(0, options.limit);
	}

	async keywordSearch(
		query: string,
		options: StoreSearchOptions,
	): Promise<ScoredPassage[]> {
		this.ensureConnected();
		const terms = [...new Set(tokenize(query))];
		if (terms.length === 0 || this.rows.size === 0) return [];

		// Corpus statistics cover every row, like a table-wide index
		const documents = [...this.rows.values()].map(row => ({
			row,
			tokens: tokenize(row.text),
		}));
		const avgLength =
			documents.reduce((sum, doc) => sum + doc.tokens.length, 0) /
			documents.length;
		const documentFrequency = new Map<string, number>();
		for (const term of terms) {
			documentFrequency.set(
				term,
				documents.filter(doc => doc.tokens.includes(term)).length,
			);
		}

		const results: ScoredPassage[] = [];
		for (const {row, tokens} of documents) {
			if (!matchesFilter(row, options.filter)) continue;
			const score = bm25(
				terms,
				tokens,
				documentFrequency,
				documents.length,
				avgLength,
			);
			if (score > 0) {
				results.push({passage: stripVector(row), score});
			}
		}

		return results.sort((a, b) => b.score - a.score).slice(0, options.limit);
	}

	private filtered(filter: PassageFilter | undefined): EmbeddedPassage[] {
		return [...this.rows.values()].filter(row => matchesFilter(row, filter));
	}

	private ensureConnected(): void {
		if (!this.connected) {
			throw new StoreNotConnectedError();
		}
	}
}

/**
 * Lowercase, accent-folded alphanumeric tokens.
 */
export function tokenize(text: string): string[] {
	return foldAccents(text.toLowerCase())
		.split(/[^\p{L}\p{N}]+/u)
		.filter(token => token.length > 0);
}

export function cosineSimilarity(a: number[], b: number[]): number {
	let dot = 0;
	let normA = 0;
	let normB = 0;
	const length = Math.min(a.length, b.length);
	for (let i = 0; i < length; i++) {
		const x = a[i] ?? 0;
		const y = b[i] ?? 0;
		dot += x * y;
		normA += x * x;
		normB += y * y;
	}
	if (normA === 0 || normB === 0) return 0;
	return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

function bm25(
	terms: string[],
	tokens: string[],
	documentFrequency: Map<string, number>,
	totalDocuments: number,
	avgLength: number,
): number {
	let score = 0;
	for (const term of terms) {
		const tf = tokens.filter(token => token === term).length;
		if (tf === 0) continue;
		const df = documentFrequency.get(term) ?? 0;
		const idf = Math.log(1 + (totalDocuments - df + 0.5) / (df + 0.5));
		const norm =
			tf + BM25_K1 * (1 - BM25_B + (BM25_B * tokens.length) / (avgLength || 1));
		score += idf * ((tf * (BM25_K1 + 1)) / norm);
	}
	return score;
}

function requireFilter(filter: PassageFilter, operation: string): void {
	if (isEmptyFilter(filter)) {
		throw new Error(`Refusing to ${operation} passages with an empty filter`);
	}
}
