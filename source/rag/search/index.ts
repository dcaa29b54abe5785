/**
 * Read side of the hybrid index.
 */

import type {
	DiscoveryConfig,
	RetrievalConfig,
	StoreConfig,
} from '../config/index.js';
import {PASSAGE_STATUS} from '../constants.js';
import type {EmbeddingProvider} from '../embeddings/types.js';
import {toError} from '../errors.js';
import type {Logger} from '../logger/index.js';
import {guardedCall} from '../retry.js';
import type {
	Passage,
	PassageFilter,
	PassageStore,
	ScoredPassage,
} from '../storage/types.js';
import {fuseScores} from './hybrid.js';
import {containsAnyTerm, extractSnippets, normalizeQueryTerms} from './keyword.js';
import type {
	AnswerHit,
	AnswerOptions,
	AnswerRetrieval,
	DiscoveryGroup,
	DiscoveryOptions,
	FusedCandidate,
	KeywordDiscovery,
} from './types.js';

export type * from './types.js';
export {fuseScores, normalizeByMax} from './hybrid.js';
export {
	buildTermPattern,
	containsAnyTerm,
	extractSnippets,
	findTermSpans,
	highlightTerms,
	normalizeQueryTerms,
} from './keyword.js';
export {formatCitations} from './citations.js';

export interface RetrievalEngineOptions {
	retrieval: RetrievalConfig;
	discovery: DiscoveryConfig;
	store: StoreConfig;
}

const ACTIVE_ONLY: PassageFilter = {status: PASSAGE_STATUS.ACTIVE};

/**
 * Answer retrieval and keyword discovery over stored passages.
 *
 * Answer retrieval only ever returns Active passages. Neither mode throws:
 * store and embedding failures come back as status 'failed'.
 */
export class RetrievalEngine {
	private readonly store: PassageStore;
	private readonly embeddings: EmbeddingProvider;
	private readonly options: RetrievalEngineOptions;
	private readonly logger: Logger | null;

	constructor(
		store: PassageStore,
		embeddings: EmbeddingProvider,
		options: RetrievalEngineOptions,
		logger?: Logger,
	) {
		this.store = store;
		this.embeddings = embeddings;
		this.options = options;
		this.logger = logger ?? null;
	}

	/**
	 * Ranked Active passages for answer synthesis.
	 */
	async answerRetrieve(
		query: string,
		options: AnswerOptions = {},
	): Promise<AnswerRetrieval> {
		const start = Date.now();
		const config = this.options.retrieval;
		const topK = options.topK ?? config.topK;
		const alpha = options.alpha ?? config.alpha;
		const relevanceFloor = options.relevanceFloor ?? config.relevanceFloor;

		if (query.trim().length === 0) {
			return {query, hits: [], status: 'no_results', elapsedMs: 0};
		}

		try {
			const limit = topK * config.candidateMultiplier;
			const sparseQuery = normalizeQueryTerms(query).join(' ');

			const vector = await this.embeddings.embedSingle(query);
			const [dense, sparse] = await Promise.all([
				this.guard(
					() => this.store.vectorSearch(vector, {limit, filter: ACTIVE_ONLY}),
					'dense search',
				),
				sparseQuery.length > 0
					? this.guard(
							() =>
								this.store.keywordSearch(sparseQuery, {
									limit,
									filter: ACTIVE_ONLY,
								}),
							'sparse search',
						)
					: Promise.resolve<ScoredPassage[]>([]),
			]);

			const fused = this.keepActive(fuseScores(dense, sparse, alpha));
			const hits = fused
				.filter(candidate => candidate.score >= relevanceFloor)
				.slice(0, topK)
				.map(toAnswerHit);

			this.log('debug', `Answer retrieval returned ${hits.length} hits`, {
				query,
				dense: dense.length,
				sparse: sparse.length,
				fused: fused.length,
			});

			return {
				query,
				hits,
				status: hits.length > 0 ? 'ok' : 'no_results',
				elapsedMs: Date.now() - start,
			};
		} catch (error) {
			const cause = toError(error);
			this.logger?.error('Retrieval', 'Answer retrieval failed', cause);
			return {
				query,
				hits: [],
				status: 'failed',
				error: cause.message,
				elapsedMs: Date.now() - start,
			};
		}
	}

	/**
	 * Broad OR-match over keywords, grouped by document with highlighted
	 * snippets. Groups are sorted by their best passage score.
	 */
	async keywordDiscover(
		query: string,
		options: DiscoveryOptions = {},
	): Promise<KeywordDiscovery> {
		const start = Date.now();
		const config = this.options.discovery;
		const maxSnippets = options.maxSnippets ?? config.maxSnippets;
		const terms = normalizeQueryTerms(query, config.stopWords);

		if (terms.length === 0) {
			return {
				query,
				terms,
				groups: [],
				status: 'no_results',
				elapsedMs: Date.now() - start,
			};
		}

		try {
			const filter = options.includeInactive ? undefined : ACTIVE_ONLY;
			let candidates = await this.guard(
				() =>
					this.store.keywordSearch(terms.join(' '), {
						limit: config.candidateLimit,
						filter,
					}),
				'keyword discovery',
			);
			if (!options.includeInactive) {
				candidates = candidates.filter(
					candidate => candidate.passage.status === PASSAGE_STATUS.ACTIVE,
				);
			}

			const groups = new Map<string, DiscoveryGroup>();
			const versionNumbers = new Map<string, number>();
			for (const {passage, score} of candidates) {
				if (
					!containsAnyTerm(passage.body, terms) &&
					!containsAnyTerm(passage.documentTitle, terms)
				) {
					continue;
				}
				versionNumbers.set(passage.versionRaw, passage.versionNumeric);
				const group = this.addToGroup(groups, passage, score);
				const remaining = maxSnippets - group.snippets.length;
				for (const text of extractSnippets(
					passage.body,
					terms,
					config.snippetWindow,
					remaining,
				)) {
					group.snippets.push({
						text,
						pageLabel: passage.pageLabel,
						sectionPath: [...passage.sectionPath],
					});
				}
			}

			const sorted = [...groups.values()].sort(
				(a, b) => b.bestScore - a.bestScore,
			);
			for (const group of sorted) {
				group.versions.sort(
					(a, b) => (versionNumbers.get(b) ?? 0) - (versionNumbers.get(a) ?? 0),
				);
			}

			return {
				query,
				terms,
				groups: sorted,
				status: sorted.length > 0 ? 'ok' : 'no_results',
				elapsedMs: Date.now() - start,
			};
		} catch (error) {
			const cause = toError(error);
			this.logger?.error('Retrieval', 'Keyword discovery failed', cause);
			return {
				query,
				terms,
				groups: [],
				status: 'failed',
				error: cause.message,
				elapsedMs: Date.now() - start,
			};
		}
	}

	/**
	 * The hit's passage with up to `radius` Active neighbours on each side,
	 * in reading order. A failed lookup returns what was collected so far.
	 */
	async expandWindow(hit: AnswerHit, radius = 1): Promise<Passage[]> {
		const before: Passage[] = [];
		const after: Passage[] = [];
		let center: Passage | null = null;

		try {
			center = await this.fetchActive(hit.id);
			if (!center) return [];

			let prevId = center.prevId;
			while (prevId && before.length < radius) {
				const previous = await this.fetchActive(prevId);
				if (!previous) break;
				before.unshift(previous);
				prevId = previous.prevId;
			}

			let nextId = center.nextId;
			while (nextId && after.length < radius) {
				const next = await this.fetchActive(nextId);
				if (!next) break;
				after.push(next);
				nextId = next.nextId;
			}

			return [...before, center, ...after];
		} catch (error) {
			this.logger?.error(
				'Retrieval',
				`Window expansion failed for ${hit.id}`,
				toError(error),
			);
			return center ? [...before, center, ...after] : [];
		}
	}

	// ============================================================
	// Internals
	// ============================================================

	/**
	 * Final visibility check, independent of the store's filtering.
	 */
	private keepActive(candidates: FusedCandidate[]): FusedCandidate[] {
		const active = candidates.filter(
			candidate => candidate.passage.status === PASSAGE_STATUS.ACTIVE,
		);
		if (active.length < candidates.length) {
			this.log('warn', 'Store returned Inactive passages for an Active query', {
				dropped: candidates.length - active.length,
			});
		}
		return active;
	}

	private addToGroup(
		groups: Map<string, DiscoveryGroup>,
		passage: Passage,
		score: number,
	): DiscoveryGroup {
		let group = groups.get(passage.documentTitle);
		if (!group) {
			group = {
				documentTitle: passage.documentTitle,
				versions: [],
				matchCount: 0,
				bestScore: score,
				snippets: [],
			};
			groups.set(passage.documentTitle, group);
		}
		group.matchCount++;
		group.bestScore = Math.max(group.bestScore, score);
		if (!group.versions.includes(passage.versionRaw)) {
			group.versions.push(passage.versionRaw);
		}
		return group;
	}

	private async fetchActive(id: string): Promise<Passage | null> {
		const [passage] = await this.guard(
			() => this.store.getPassagesByIds([id]),
			'expand window',
		);
		return passage && passage.status === PASSAGE_STATUS.ACTIVE ? passage : null;
	}

	private guard<T>(fn: () => Promise<T>, label: string): Promise<T> {
		return guardedCall(fn, label, {
			...this.options.store,
			onRetry: (attempt, delayMs, error) => {
				this.log('warn', `Retrying ${label}`, {
					attempt,
					delayMs,
					error: toError(error).message,
				});
			},
		});
	}

	private log(level: 'debug' | 'warn', message: string, data?: object): void {
		this.logger?.[level]('Retrieval', message, data);
	}
}

function toAnswerHit(candidate: FusedCandidate): AnswerHit {
	const {passage} = candidate;
	return {
		id: passage.id,
		body: passage.body,
		text: passage.text,
		score: candidate.score,
		denseScore: candidate.denseScore,
		sparseScore: candidate.sparseScore,
		citation: {
			documentTitle: passage.documentTitle,
			versionRaw: passage.versionRaw,
			docNumber: passage.docNumber,
			pageLabel: passage.pageLabel,
			sectionPath: [...passage.sectionPath],
			sourceFilename: passage.sourceFilename,
		},
		prevId: passage.prevId,
		nextId: passage.nextId,
	};
}
