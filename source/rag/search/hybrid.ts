/**
 * Hybrid fusion of dense and sparse results.
 */

import type {ScoredPassage} from '../storage/types.js';
import type {FusedCandidate} from './types.js';

/**
 * Combine dense and sparse results with relative score fusion.
 *
 * Each signal is divided by its best score so both land in [0, 1], then
 * score = alpha * dense + (1 - alpha) * sparse. A passage missing from one
 * signal contributes 0 for it. Ties keep dense order first.
 *
 * @param alpha - Dense weight, 0.0-1.0
 */
export function fuseScores(
	denseResults: readonly ScoredPassage[],
	sparseResults: readonly ScoredPassage[],
	alpha: number,
): FusedCandidate[] {
	const dense = normalizeByMax(denseResults);
	const sparse = normalizeByMax(sparseResults);

	const candidates = new Map<string, FusedCandidate>();
	for (const {passage, score} of dense) {
		candidates.set(passage.id, {
			passage,
			score: 0,
			denseScore: score,
			sparseScore: 0,
		});
	}
	for (const {passage, score} of sparse) {
		const existing = candidates.get(passage.id);
		if (existing) {
			existing.sparseScore = score;
		} else {
			candidates.set(passage.id, {
				passage,
				score: 0,
				denseScore: 0,
				sparseScore: score,
			});
		}
	}

	const fused = [...candidates.values()];
	for (const candidate of fused) {
		candidate.score =
			alpha * candidate.denseScore + (1 - alpha) * candidate.sparseScore;
	}

	return fused.sort((a, b) => b.score - a.score);
}

/**
 * Scale scores by the best one. Non-positive maxima yield all zeros.
 */
export function normalizeByMax(
	results: readonly ScoredPassage[],
): ScoredPassage[] {
	const max = results.reduce((best, result) => Math.max(best, result.score), 0);
	return results.map(result => ({
		passage: result.passage,
		score: max > 0 ? Math.max(result.score, 0) / max : 0,
	}));
}
