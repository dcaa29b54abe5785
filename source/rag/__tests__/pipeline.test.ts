import path from 'node:path';
import {describe, it, expect, beforeEach, afterEach, vi} from 'vitest';
import {MockEmbeddingProvider} from '../embeddings/mock.js';
import {ConfigError} from '../errors.js';
import {createPipeline, type Pipeline} from '../pipeline.js';
import {LancePassageStore} from '../storage/index.js';
import {MemoryPassageStore} from '../storage/memory.js';
import {
	addFile,
	createRecordingLogger,
	createTempDir,
	createTestConfig,
	sopPages,
	type TestContext,
} from './helpers.js';

const SOP_TEXT = sopPages('line clearance')[0]?.text ?? '';

describe('createPipeline', () => {
	let ctx: TestContext;
	let pipeline: Pipeline | null;

	beforeEach(async () => {
		vi.stubEnv('SOP_RAG_HOME', '');
		ctx = await createTempDir();
		pipeline = null;
	});

	afterEach(async () => {
		pipeline?.close();
		vi.unstubAllEnvs();
		await ctx.cleanup();
	});

	it('ingests a directory and answers from the Active revision only', async () => {
		const logger = createRecordingLogger();
		pipeline = await createPipeline(ctx.projectRoot, {
			config: createTestConfig(),
			store: new MemoryPassageStore(),
			logger,
		});
		expect(logger.entries).toContainEqual({
			level: 'info',
			component: 'Pipeline',
			message: 'Pipeline ready',
		});

		const docs = path.join(ctx.projectRoot, 'docs');
		await addFile(docs, 'SOP_X_Rev06.md', SOP_TEXT);
		await addFile(docs, 'SOP_X_Rev07.md', SOP_TEXT);
		const stats = await pipeline.indexer.ingestDirectory(docs);
		expect(stats.filesIngested).toBe(2);

		const answer = await pipeline.retrieval.answerRetrieve('line clearance');
		expect(answer.status).toBe('ok');
		expect(answer.hits.map(hit => hit.citation.versionRaw)).toEqual(['07', '07']);

		const discovery = await pipeline.retrieval.keywordDiscover('logbook');
		expect(
			discovery.groups.map(g => [g.documentTitle, g.versions, g.matchCount]),
		).toEqual([['SOP X', ['07'], 1]]);

		const admin = await pipeline.retrieval.keywordDiscover('logbook', {
			includeInactive: true,
		});
		expect(admin.groups[0]?.versions).toEqual(['07', '06']);
	});

	it('refuses a provider whose dimensions disagree with the config', async () => {
		const attempt = createPipeline(ctx.projectRoot, {
			config: createTestConfig(),
			store: new MemoryPassageStore(),
			embeddings: new MockEmbeddingProvider(8),
			logger: createRecordingLogger(),
		});
		await expect(attempt).rejects.toBeInstanceOf(ConfigError);
		await expect(attempt).rejects.toThrow(
			'Embedding dimensions mismatch: provider produces 8, config expects 16',
		);
	});

	it('opens a LanceDB store under the data directory by default', async () => {
		pipeline = await createPipeline(ctx.projectRoot, {
			config: createTestConfig(),
			logger: createRecordingLogger(),
		});
		expect(pipeline.store).toBeInstanceOf(LancePassageStore);
		expect(await pipeline.gateway.listDocuments()).toEqual([]);
	});
});
