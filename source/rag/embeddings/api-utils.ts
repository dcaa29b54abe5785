import pLimit from 'p-limit';

/**
 * Rate limiting as reported by embedding APIs: HTTP 429 or a quota message.
 */
export function isRateLimitError(error: unknown): boolean {
	if (!(error instanceof Error)) return false;
	return /\b429\b|rate.?limit|quota/i.test(error.message);
}

/**
 * Split texts into consecutive batches of at most `size`.
 */
export function toBatches<T>(items: readonly T[], size: number): T[][] {
	if (size < 1) {
		throw new RangeError(`Batch size must be at least 1, got ${size}`);
	}
	const batches: T[][] = [];
	for (let start = 0; start < items.length; start += size) {
		batches.push(items.slice(start, start + size));
	}
	return batches;
}

export interface BatchRunOptions {
	/** Batches in flight at once */
	concurrency: number;
	/** Items done so far, out of the total across all batches */
	onProgress?: (processed: number, total: number) => void;
}

/**
 * Run every batch through `embedBatch`, at most `concurrency` at a time,
 * and concatenate the results in batch order.
 */
export async function runBatches<T, R>(
	batches: T[][],
	embedBatch: (batch: T[]) => Promise<R[]>,
	{concurrency, onProgress}: BatchRunOptions,
): Promise<R[]> {
	const limit = pLimit(concurrency);
	const total = batches.reduce((sum, batch) => sum + batch.length, 0);
	let processed = 0;

	const perBatch = await Promise.all(
		batches.map(batch =>
			limit(async () => {
				const out = await embedBatch(batch);
				processed += batch.length;
				onProgress?.(processed, total);
				return out;
			}),
		),
	);
	return perBatch.flat();
}
