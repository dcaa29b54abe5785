import fs from 'node:fs/promises';
import path from 'node:path';
import {describe, it, expect, beforeEach, afterEach, vi} from 'vitest';
import {
	DEFAULT_CONFIG,
	applyEnvOverrides,
	configExists,
	loadConfig,
	resolveConfig,
	saveConfig,
} from '../config/index.js';
import {getConfigPath} from '../constants.js';
import {ConfigError} from '../errors.js';
import {addFile, createTempDir, type TestContext} from './helpers.js';

describe('resolveConfig', () => {
	it('merges sections over the defaults', () => {
		const config = resolveConfig({retrieval: {topK: 3}});
		expect(config.retrieval).toEqual({...DEFAULT_CONFIG.retrieval, topK: 3});
		expect(config.chunking).toEqual(DEFAULT_CONFIG.chunking);
	});

	it('merges over a custom base', () => {
		const base = resolveConfig({embeddingProvider: 'mock'});
		expect(resolveConfig({store: {maxAttempts: 2}}, base)).toMatchObject({
			embeddingProvider: 'mock',
			store: {maxAttempts: 2, timeoutMs: 30_000},
		});
	});

	it('rejects out-of-range values', () => {
		expect(() => resolveConfig({retrieval: {alpha: 1.5}})).toThrow(ConfigError);
	});

	it('rejects an overlap that does not fit the chunk size', () => {
		expect(() => resolveConfig({chunking: {chunkOverlap: 2000}})).toThrow(
			'chunking.chunkOverlap: chunkOverlap must be smaller than chunkSize',
		);
	});
});

describe('applyEnvOverrides', () => {
	it('reads retrieval, discovery and arbitration settings', () => {
		const config = applyEnvOverrides(DEFAULT_CONFIG, {
			SOP_RAG_ALPHA: '0.7',
			SOP_RAG_TOP_K: '5',
			SOP_RAG_STOP_WORDS: ' The, SOP ,,',
			SOP_RAG_ON_STORE_UNAVAILABLE: 'inactive',
		});
		expect(config.retrieval.alpha).toBe(0.7);
		expect(config.retrieval.topK).toBe(5);
		expect(config.discovery.stopWords).toEqual(['the', 'sop']);
		expect(config.arbitration.onStoreUnavailable).toBe('inactive');
	});

	it('ignores blank values', () => {
		expect(applyEnvOverrides(DEFAULT_CONFIG, {SOP_RAG_TOP_K: ' '})).toEqual(
			DEFAULT_CONFIG,
		);
	});

	it('rejects malformed values', () => {
		expect(() => applyEnvOverrides(DEFAULT_CONFIG, {SOP_RAG_ALPHA: 'high'})).toThrow(
			'Invalid SOP_RAG_ALPHA: "high" is not a number',
		);
		expect(() =>
			applyEnvOverrides(DEFAULT_CONFIG, {SOP_RAG_ON_STORE_UNAVAILABLE: 'maybe'}),
		).toThrow(ConfigError);
	});
});

describe('config files', () => {
	let ctx: TestContext;

	beforeEach(async () => {
		vi.stubEnv('SOP_RAG_HOME', '');
		ctx = await createTempDir();
	});

	afterEach(async () => {
		vi.unstubAllEnvs();
		await ctx.cleanup();
	});

	it('falls back to the defaults without a file', async () => {
		expect(await configExists(ctx.projectRoot)).toBe(false);
		expect(await loadConfig(ctx.projectRoot, {})).toEqual(DEFAULT_CONFIG);
	});

	it('round-trips a saved config', async () => {
		const config = resolveConfig({embeddingProvider: 'mock', embeddingDimensions: 16});
		await saveConfig(ctx.projectRoot, config);

		expect(await configExists(ctx.projectRoot)).toBe(true);
		expect(await loadConfig(ctx.projectRoot, {})).toEqual(config);
	});

	it('fills missing keys of a partial file and applies env overrides', async () => {
		await addFile(
			path.join(ctx.projectRoot, '.sop-rag'),
			'config.json',
			JSON.stringify({retrieval: {topK: 4}}),
		);
		const config = await loadConfig(ctx.projectRoot, {SOP_RAG_ALPHA: '0.2'});
		expect(config.retrieval).toEqual({
			...DEFAULT_CONFIG.retrieval,
			topK: 4,
			alpha: 0.2,
		});
	});

	it('reports unreadable and invalid files', async () => {
		const configPath = getConfigPath(ctx.projectRoot);
		await fs.mkdir(path.dirname(configPath), {recursive: true});

		await fs.writeFile(configPath, '{not json');
		await expect(loadConfig(ctx.projectRoot, {})).rejects.toThrow(
			`Invalid config.json at ${configPath}`,
		);

		await fs.writeFile(configPath, JSON.stringify({retrieval: {alpha: 'x'}}));
		await expect(loadConfig(ctx.projectRoot, {})).rejects.toBeInstanceOf(ConfigError);

		await fs.writeFile(configPath, '[]');
		await expect(loadConfig(ctx.projectRoot, {})).rejects.toThrow(
			'expected a JSON object',
		);
	});

	it('honours SOP_RAG_HOME', async () => {
		const home = path.join(ctx.projectRoot, 'elsewhere');
		vi.stubEnv('SOP_RAG_HOME', home);
		expect(getConfigPath(ctx.projectRoot)).toBe(path.join(home, 'config.json'));

		await saveConfig(ctx.projectRoot, DEFAULT_CONFIG);
		await expect(fs.access(path.join(home, 'config.json'))).resolves.toBeUndefined();
	});
});
