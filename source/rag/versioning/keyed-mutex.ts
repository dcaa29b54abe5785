import pLimit from 'p-limit';

type Queue = ReturnType<typeof pLimit>;

/**
 * One single-concurrency queue per key.
 *
 * Tasks for the same key run one at a time in submission order; tasks for
 * different keys run in parallel. A key's queue is released once its last
 * task settles.
 */
export class KeyedMutex {
	private readonly queues = new Map<string, {queue: Queue; refs: number}>();

	async run<T>(key: string, task: () => Promise<T>): Promise<T> {
		let entry = this.queues.get(key);
		if (!entry) {
			entry = {queue: pLimit(1), refs: 0};
			this.queues.set(key, entry);
		}
		const held = entry;
		held.refs++;

		try {
			return await held.queue(task);
		} finally {
			held.refs--;
			if (held.refs === 0 && this.queues.get(key) === held) {
				this.queues.delete(key);
			}
		}
	}

	/**
	 * Number of keys with queued or running tasks.
	 */
	get activeKeys(): number {
		return this.queues.size;
	}
}
