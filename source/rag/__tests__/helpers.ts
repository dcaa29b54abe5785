/**
 * Test helpers: config, temp directories, store wrappers and fixtures.
 */

import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import {resolveConfig, type SopRagConfig} from '../config/index.js';
import {MockEmbeddingProvider} from '../embeddings/mock.js';
import {IndexGateway} from '../gateway/index.js';
import {resolveIdentity} from '../identity/index.js';
import {Chunker} from '../indexer/chunker.js';
import type {ParsedPage} from '../indexer/types.js';
import {createMemoryLogger, type Logger} from '../logger/index.js';
import {RetrievalEngine} from '../search/index.js';
import {MemoryPassageStore} from '../storage/memory.js';
import type {
	EmbeddedPassage,
	Passage,
	PassageFieldUpdate,
	PassageFilter,
	PassageStore,
	ScoredPassage,
	StoreSearchOptions,
} from '../storage/types.js';

export const TEST_DIMENSIONS = 16;

/**
 * Defaults with the mock provider, small vectors and no backoff delay.
 */
export function createTestConfig(): SopRagConfig {
	return resolveConfig({
		embeddingProvider: 'mock',
		embeddingDimensions: TEST_DIMENSIONS,
		retrieval: {relevanceFloor: 0},
		store: {
			maxAttempts: 3,
			initialBackoffMs: 0,
			maxBackoffMs: 0,
			timeoutMs: 1000,
		},
	});
}

/** Test context with temp directory and cleanup */
export interface TestContext {
	projectRoot: string;
	cleanup: () => Promise<void>;
}

export async function createTempDir(): Promise<TestContext> {
	const tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'sop-rag-test-'));
	return {
		projectRoot: tempDir,
		cleanup: async () => {
			await fs.rm(tempDir, {recursive: true, force: true});
		},
	};
}

/**
 * Add a new file under a directory.
 */
export async function addFile(
	root: string,
	relativePath: string,
	content: string,
): Promise<void> {
	const fullPath = path.join(root, relativePath);
	await fs.mkdir(path.dirname(fullPath), {recursive: true});
	await fs.writeFile(fullPath, content);
}

export function page(text: string, pageLabel = '1'): ParsedPage {
	return {text, pageLabel};
}

/**
 * Logger that records entries for assertions.
 */
export interface RecordingLogger extends Logger {
	entries: Array<{level: string; component: string; message: string}>;
}

export function createRecordingLogger(): RecordingLogger {
	const memory = createMemoryLogger();
	return {
		debug: memory.debug,
		info: memory.info,
		warn: memory.warn,
		error: memory.error,
		get entries() {
			return memory.entries.map(({level, component, message}) => ({
				level,
				component,
				message,
			}));
		},
	};
}

/**
 * Chunk one revision the way the indexer does, without cleaning.
 */
export function chunkRevision(
	filename: string,
	pages: readonly ParsedPage[],
	config: SopRagConfig = createTestConfig(),
): Passage[] {
	const identity = resolveIdentity(filename, {firstPageText: pages[0]?.text});
	return new Chunker(config.chunking).chunkDocument(
		identity,
		pages,
		new Date('2026-01-15T08:00:00.000Z'),
	);
}

/**
 * Stored passage with placeholder content; override what a test needs.
 */
export function makePassage(id: string, overrides: Partial<Passage> = {}): Passage {
	return {
		id,
		text: `text of ${id}`,
		body: `Body of ${id}`,
		sectionPath: ['General Section'],
		pageLabel: '1',
		documentTitle: 'SOP X',
		versionRaw: '06',
		versionNumeric: 6,
		docNumber: null,
		sourceFilename: 'SOP_X_Rev06.pdf',
		chunkIndex: 0,
		status: 'Active',
		prevId: null,
		nextId: null,
		ingestedAt: '2026-01-15T08:00:00.000Z',
		...overrides,
	};
}

/**
 * Vector with a single 1 at `axis`.
 */
export function axisVector(axis: number, dimensions = TEST_DIMENSIONS): number[] {
	return Array.from({length: dimensions}, (_, i) => (i === axis ? 1 : 0));
}

/**
 * A short SOP with two sections, every body above the quality threshold.
 */
export function sopPages(topic: string): ParsedPage[] {
	return [
		page(
			`# Purpose\nThis procedure describes ${topic} for production areas and equipment.\n` +
				`# Procedure\nOperators perform ${topic} at the end of every batch and record it in the logbook.`,
		),
	];
}

export interface TestHarness {
	config: SopRagConfig;
	store: PassageStore;
	embeddings: MockEmbeddingProvider;
	gateway: IndexGateway;
	retrieval: RetrievalEngine;
}

export async function createHarness(
	store: PassageStore = new MemoryPassageStore(),
	config: SopRagConfig = createTestConfig(),
): Promise<TestHarness> {
	await store.connect();
	const embeddings = new MockEmbeddingProvider(TEST_DIMENSIONS);
	return {
		config,
		store,
		embeddings,
		gateway: new IndexGateway(store, embeddings, {
			store: config.store,
			arbitration: config.arbitration,
		}),
		retrieval: new RetrievalEngine(store, embeddings, {
			retrieval: config.retrieval,
			discovery: config.discovery,
			store: config.store,
		}),
	};
}

// ============================================================================
// Store wrappers
// ============================================================================

type StoreMethod = Exclude<keyof PassageStore, 'connect' | 'close'>;

/**
 * Delegating store whose methods can be made to fail.
 */
export class FlakyStore implements PassageStore {
	readonly inner: PassageStore;
	/** Remaining failures per method; Infinity keeps failing */
	readonly failures = new Map<StoreMethod, number>();
	readonly calls = new Map<StoreMethod, number>();
	/** Milliseconds each call waits before reaching the inner store */
	readonly delays = new Map<StoreMethod, number>();

	constructor(inner: PassageStore = new MemoryPassageStore()) {
		this.inner = inner;
	}

	failNext(method: StoreMethod, times = 1): void {
		this.failures.set(method, times);
	}

	stall(method: StoreMethod, ms: number): void {
		this.delays.set(method, ms);
	}

	heal(): void {
		this.failures.clear();
		this.delays.clear();
	}

	connect(): Promise<void> {
		return this.inner.connect();
	}

	close(): void {
		this.inner.close();
	}

	async addPassages(passages: EmbeddedPassage[]): Promise<void> {
		this.trip('addPassages');
		await this.wait('addPassages');
		return this.inner.addPassages(passages);
	}

	async deletePassages(filter: PassageFilter): Promise<number> {
		this.trip('deletePassages');
		return this.inner.deletePassages(filter);
	}

	async updateFieldsByFilter(
		filter: PassageFilter,
		fields: PassageFieldUpdate,
	): Promise<number> {
		this.trip('updateFieldsByFilter');
		await this.wait('updateFieldsByFilter');
		return this.inner.updateFieldsByFilter(filter, fields);
	}

	async findPassages(filter: PassageFilter, limit?: number): Promise<Passage[]> {
		this.trip('findPassages');
		return this.inner.findPassages(filter, limit);
	}

	async getPassagesByIds(ids: string[]): Promise<Passage[]> {
		this.trip('getPassagesByIds');
		return this.inner.getPassagesByIds(ids);
	}

	async countPassages(filter?: PassageFilter): Promise<number> {
		this.trip('countPassages');
		return this.inner.countPassages(filter);
	}

	async vectorSearch(
		vector: number[],
		options: StoreSearchOptions,
	): Promise<ScoredPassage[]> {
		this.trip('vectorSearch');
		return this.inner.vectorSearch(vector, options);
	}

	async keywordSearch(
		query: string,
		options: StoreSearchOptions,
	): Promise<ScoredPassage[]> {
		this.trip('keywordSearch');
		return this.inner.keywordSearch(query, options);
	}

	private async wait(method: StoreMethod): Promise<void> {
		const ms = this.delays.get(method) ?? 0;
		if (ms > 0) {
			await new Promise(resolve => setTimeout(resolve, ms));
		}
	}

	private trip(method: StoreMethod): void {
		this.calls.set(method, (this.calls.get(method) ?? 0) + 1);
		const remaining = this.failures.get(method) ?? 0;
		if (remaining > 0) {
			this.failures.set(method, remaining - 1);
			throw new Error(`${method} unavailable`);
		}
	}
}

/**
 * Store whose searches ignore the filter, as a misconfigured backend would.
 */
export class FilterIgnoringStore extends MemoryPassageStore {
	override async vectorSearch(
		vector: number[],
		options: StoreSearchOptions,
	): Promise<ScoredPassage[]> {
		return super.vectorSearch(vector, {limit: options.limit});
	}

	override async keywordSearch(
		query: string,
		options: StoreSearchOptions,
	): Promise<ScoredPassage[]> {
		return super.keywordSearch(query, {limit: options.limit});
	}
}
