import {
	StoreNotConnectedError,
	StoreSchemaError,
	TimeoutError,
} from './errors.js';

/**
 * Backoff settings for withRetry.
 */
export interface RetryOptions {
	/** Total attempts including the first one */
	maxAttempts: number;
	initialBackoffMs: number;
	maxBackoffMs: number;
	/** Errors for which this returns false are rethrown immediately */
	isRetriable?: (error: unknown) => boolean;
	/** Called before each backoff sleep */
	onRetry?: (attempt: number, delayMs: number, error: unknown) => void;
}

/**
 * Sleep for a specified duration.
 */
export function sleep(ms: number): Promise<void> {
	return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Execute an async function with exponential backoff retry.
 *
 * The delay doubles after every failed attempt, capped at maxBackoffMs.
 * The last error is rethrown once maxAttempts is reached.
 */
export async function withRetry<T>(
	fn: () => Promise<T>,
	options: RetryOptions,
): Promise<T> {
	let attempt = 0;
	let backoffMs = options.initialBackoffMs;

	while (true) {
		attempt++;
		try {
			return await fn();
		} catch (error) {
			const retriable = options.isRetriable?.(error) ?? true;
			if (!retriable || attempt >= options.maxAttempts) {
				throw error;
			}
			options.onRetry?.(attempt, backoffMs, error);
			await sleep(backoffMs);
			backoffMs = Math.min(backoffMs * 2, options.maxBackoffMs);
		}
	}
}

/**
 * Hard timeout: rejects with a TimeoutError if the promise doesn't settle
 * within `ms`.
 */
export function withTimeout<T>(
	promise: Promise<T>,
	ms: number,
	label: string,
): Promise<T> {
	return new Promise<T>((resolve, reject) => {
		const timer = setTimeout(() => reject(new TimeoutError(label, ms)), ms);
		promise.then(
			value => {
				clearTimeout(timer);
				resolve(value);
			},
			(error: unknown) => {
				clearTimeout(timer);
				reject(error);
			},
		);
	});
}

/**
 * Retry and per-attempt timeout settings for store calls.
 */
export interface GuardOptions extends RetryOptions {
	timeoutMs: number;
	/**
	 * Wait for a timed-out attempt to finish before retrying, and for every
	 * attempt before settling. Set for writes.
	 */
	settle?: boolean;
}

/**
 * Run a store call with a timeout on each attempt and bounded retries.
 * Schema and connection errors are never retried.
 *
 * A timed-out attempt keeps running in the store. With `settle`, no write
 * outlives the call: retries wait for it and so does the result.
 */
export async function guardedCall<T>(
	fn: () => Promise<T>,
	label: string,
	options: GuardOptions,
): Promise<T> {
	const attempts: Array<Promise<T>> = [];
	try {
		return await withRetry(
			async () => {
				if (options.settle) {
					await Promise.allSettled(attempts);
				}
				const call = fn();
				if (options.settle) {
					attempts.push(call);
				}
				return withTimeout(call, options.timeoutMs, label);
			},
			{
				...options,
				isRetriable: error =>
					!(
						error instanceof StoreSchemaError ||
						error instanceof StoreNotConnectedError
					) && (options.isRetriable?.(error) ?? true),
			},
		);
	} finally {
		await Promise.allSettled(attempts);
	}
}
