/**
 * Turns passage bodies and queries into vectors of a fixed width.
 * `initialize()` runs once before the first `embed` or `embedSingle`.
 */
export interface EmbeddingProvider {
	readonly dimensions: number;
	initialize(): Promise<void>;
	/** One vector per text, in input order */
	embed(texts: string[]): Promise<number[][]>;
	/** Query embedding */
	embedSingle(text: string): Promise<number[]>;
	close(): void;
}

export interface EmbeddingCallbacks {
	/** Called with a message while throttled, then with null once requests succeed */
	onThrottle?: (message: string | null) => void;
	onBatchProgress?: (processed: number, total: number) => void;
}
