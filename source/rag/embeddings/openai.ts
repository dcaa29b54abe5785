/**
 * OpenAI embedding provider using the OpenAI embeddings API.
 *
 * Defaults to text-embedding-3-small (1536 dimensions).
 */

import {z} from 'zod';
import {DEFAULT_EMBEDDING_DIMENSIONS} from '../constants.js';
import {withRetry} from '../retry.js';
import {isRateLimitError, runBatches, toBatches} from './api-utils.js';
import type {EmbeddingCallbacks, EmbeddingProvider} from './types.js';

const DEFAULT_BASE_URL = 'https://api.openai.com/v1';
const DEFAULT_MODEL = 'text-embedding-3-small';
// OpenAI limits: 8,191 tokens/text, 300,000 tokens/batch, 2,048 texts/batch.
// Passages are capped near 1024 chars, so 256 texts/batch stays well inside.
const BATCH_SIZE = 256;
const CONCURRENCY = 5;
const RATE_LIMIT_ATTEMPTS = 12;
const RATE_LIMIT_BACKOFF_MS = 1000;
const RATE_LIMIT_MAX_BACKOFF_MS = 60_000;

const embeddingResponseSchema = z.object({
	data: z.array(
		z.object({
			embedding: z.array(z.number()),
			index: z.number().int(),
		}),
	),
});

const errorResponseSchema = z.object({
	error: z.object({message: z.string().optional()}).optional(),
});

export interface OpenAIEmbeddingOptions {
	model?: string;
	dimensions?: number;
	/** Regional or proxy endpoint, e.g. https://us.api.openai.com/v1 */
	baseUrl?: string;
	callbacks?: EmbeddingCallbacks;
}

export class OpenAIEmbeddingProvider implements EmbeddingProvider {
	readonly dimensions: number;
	private readonly apiKey: string;
	private readonly model: string;
	private readonly baseUrl: string;
	private readonly callbacks: EmbeddingCallbacks;
	private initialized = false;

	constructor(apiKey?: string, options: OpenAIEmbeddingOptions = {}) {
		this.apiKey = (apiKey ?? '').trim();
		this.model = options.model ?? DEFAULT_MODEL;
		this.dimensions = options.dimensions ?? DEFAULT_EMBEDDING_DIMENSIONS;
		this.baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '');
		this.callbacks = options.callbacks ?? {};
	}

	async initialize(): Promise<void> {
		if (!this.apiKey) {
			throw new Error(
				'OpenAI API key required. Set OPENAI_API_KEY in the environment.',
			);
		}
		this.initialized = true;
	}

	async embed(texts: string[]): Promise<number[][]> {
		if (!this.initialized) {
			await this.initialize();
		}

		if (texts.length === 0) {
			return [];
		}

		return runBatches(
			toBatches(texts, BATCH_SIZE),
			batch => this.embedBatchWithRetry(batch),
			{concurrency: CONCURRENCY, onProgress: this.callbacks.onBatchProgress},
		);
	}

	async embedSingle(text: string): Promise<number[]> {
		const [vector] = await this.embed([text]);
		if (!vector) {
			throw new Error('OpenAI API returned no embedding for the query');
		}
		return vector;
	}

	close(): void {
		this.initialized = false;
	}

	/**
	 * Embed a batch with exponential backoff retry on rate limit errors.
	 */
	private async embedBatchWithRetry(batch: string[]): Promise<number[][]> {
		let throttled = false;
		const result = await withRetry(() => this.embedBatch(batch), {
			maxAttempts: RATE_LIMIT_ATTEMPTS,
			initialBackoffMs: RATE_LIMIT_BACKOFF_MS,
			maxBackoffMs: RATE_LIMIT_MAX_BACKOFF_MS,
			isRetriable: isRateLimitError,
			onRetry: (attempt, delayMs) => {
				throttled = true;
				const secs = Math.round(delayMs / 1000);
				this.callbacks.onThrottle?.(
					`Rate limited - retry ${attempt}/${RATE_LIMIT_ATTEMPTS - 1} in ${secs}s`,
				);
			},
		});
		if (throttled) this.callbacks.onThrottle?.(null);
		return result;
	}

	private async embedBatch(texts: string[]): Promise<number[][]> {
		const response = await fetch(`${this.baseUrl}/embeddings`, {
			method: 'POST',
			headers: {
				'Content-Type': 'application/json',
				Authorization: `Bearer ${this.apiKey}`,
			},
			body: JSON.stringify({
				model: this.model,
				input: texts,
				dimensions: this.dimensions,
			}),
		});

		if (!response.ok) {
			const errorText = await response.text();
			let errorMessage = errorText;
			try {
				const parsed = errorResponseSchema.safeParse(JSON.parse(errorText));
				if (parsed.success && parsed.data.error?.message) {
					errorMessage = parsed.data.error.message;
				}
			} catch {
				errorMessage = errorText;
			}

			if (response.status === 401) {
				throw new Error(
					`OpenAI API authentication failed (401). Error: ${errorMessage}`,
				);
			}

			throw new Error(`OpenAI API error (${response.status}): ${errorMessage}`);
		}

		const data = embeddingResponseSchema.parse(await response.json());
		if (data.data.length !== texts.length) {
			throw new Error(
				`OpenAI API returned ${data.data.length} embeddings for ${texts.length} inputs`,
			);
		}

		// Sort by index to ensure correct order
		return [...data.data]
			.sort((a, b) => a.index - b.index)
			.map(d => d.embedding);
	}
}
