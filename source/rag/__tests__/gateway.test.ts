import {describe, it, expect, beforeEach} from 'vitest';
import {resolveConfig} from '../config/index.js';
import type {EmbeddingProvider} from '../embeddings/types.js';
import {IndexGateway} from '../gateway/index.js';
import {MemoryPassageStore} from '../storage/memory.js';
import {
	FlakyStore,
	chunkRevision,
	createHarness,
	createTestConfig,
	sopPages,
	type TestHarness,
} from './helpers.js';

const rev05 = chunkRevision('SOP_X_Rev05.pdf', sopPages('line clearance'));
const rev06 = chunkRevision('SOP_X_Rev06.pdf', sopPages('line clearance'));
const rev07 = chunkRevision('SOP_X_Rev07.pdf', sopPages('line clearance'));

function brokenEmbeddings(embed: EmbeddingProvider['embed']): EmbeddingProvider {
	return {
		dimensions: 16,
		initialize: async () => {},
		embed,
		embedSingle: async () => [],
		close: () => {},
	};
}

describe('IndexGateway.insert', () => {
	let h: TestHarness;

	beforeEach(async () => {
		h = await createHarness();
	});

	it('chunks each fixture into two passages', () => {
		expect(rev06).toHaveLength(2);
		expect(rev07.map(p => p.versionRaw)).toEqual(['07', '07']);
	});

	it('keeps one Active revision through an upgrade and a late downgrade', async () => {
		const first = await h.gateway.insert(rev06);
		expect(first).toMatchObject({
			ok: true,
			status: 'Active',
			inserted: 2,
			replaced: 0,
			retired: 0,
		});

		const upgrade = await h.gateway.insert(rev07);
		expect(upgrade).toMatchObject({ok: true, status: 'Active', retired: 2});
		expect(upgrade.ok && upgrade.decision.reason).toBe('newer');

		const downgrade = await h.gateway.insert(rev06);
		expect(downgrade).toMatchObject({
			ok: true,
			status: 'Inactive',
			inserted: 2,
			replaced: 2,
			retired: 0,
		});
		expect(downgrade.ok && downgrade.decision.reason).toBe('older');

		const active = await h.store.findPassages({status: 'Active'});
		expect(active.map(p => p.versionRaw)).toEqual(['07', '07']);
		expect(await h.store.countPassages({versionRaw: '06'})).toBe(2);
		expect(await h.store.countPassages()).toBe(4);
	});

	it('is idempotent for the same revision', async () => {
		await h.gateway.insert(rev07);
		const again = await h.gateway.insert(rev07);

		expect(again).toMatchObject({
			ok: true,
			status: 'Active',
			inserted: 2,
			replaced: 2,
			retired: 0,
		});
		expect(again.ok && again.decision.reason).toBe('same');
		expect(await h.store.countPassages()).toBe(2);
		expect(await h.store.countPassages({status: 'Active'})).toBe(2);
	});

	it('ends with the highest revision Active whatever the arrival order', async () => {
		await h.gateway.insert(rev07);
		await h.gateway.insert(rev05);
		await h.gateway.insert(rev06);

		const active = await h.store.findPassages({status: 'Active'});
		expect(new Set(active.map(p => p.versionRaw))).toEqual(new Set(['07']));
		expect(await h.store.countPassages({status: 'Inactive'})).toBe(4);
	});

	it('serializes concurrent revisions of one document', async () => {
		const results = await Promise.all([
			h.gateway.insert(rev06),
			h.gateway.insert(rev07),
		]);
		expect(results.map(r => r.ok)).toEqual([true, true]);

		const active = await h.store.findPassages({status: 'Active'});
		expect(active.map(p => p.versionRaw)).toEqual(['07', '07']);
	});

	it('rejects empty and mixed batches', async () => {
		expect(await h.gateway.insert([])).toEqual({
			ok: false,
			reason: 'empty_batch',
			message: 'No passages to insert',
		});

		const mixed = await h.gateway.insert([...rev06, ...rev07]);
		expect(mixed).toEqual({
			ok: false,
			reason: 'mixed_batch',
			message: 'Batch mixes SOP X v06 with SOP X v07',
		});
		expect(await h.store.countPassages()).toBe(0);
	});

	it('reports embedding failures without writing', async () => {
		const config = createTestConfig();
		const store = new MemoryPassageStore();
		await store.connect();

		const throwing = new IndexGateway(
			store,
			brokenEmbeddings(async () => {
				throw new Error('model offline');
			}),
			{store: config.store, arbitration: config.arbitration},
		);
		expect(await throwing.insert(rev06)).toMatchObject({
			ok: false,
			reason: 'embedding_failed',
			message: 'model offline',
		});

		const short = new IndexGateway(
			store,
			brokenEmbeddings(async () => []),
			{store: config.store, arbitration: config.arbitration},
		);
		expect(await short.insert(rev06)).toEqual({
			ok: false,
			reason: 'embedding_failed',
			message: 'Expected 2 embeddings, got 0',
		});
		expect(await store.countPassages()).toBe(0);
	});
});

describe('IndexGateway with an unreliable store', () => {
	let store: FlakyStore;
	let h: TestHarness;

	beforeEach(async () => {
		store = new FlakyStore();
		h = await createHarness(store);
	});

	it('blocks the insert when arbitration cannot read the store', async () => {
		store.failNext('findPassages', Infinity);
		const result = await h.gateway.insert(rev06);

		expect(result).toMatchObject({
			ok: false,
			reason: 'arbitration_failed',
			message: 'Could not check existing revisions of SOP X',
		});
		expect(await store.inner.countPassages()).toBe(0);
	});

	it('accepts as Inactive under the inactive policy', async () => {
		const config = resolveConfig(
			{arbitration: {onStoreUnavailable: 'inactive'}},
			createTestConfig(),
		);
		const flaky = new FlakyStore();
		const lenient = await createHarness(flaky, config);
		flaky.failNext('findPassages', Infinity);

		const result = await lenient.gateway.insert(rev06);
		expect(result).toMatchObject({ok: true, status: 'Inactive', retired: 0});
		expect(result.ok && result.decision.reason).toBe('store_unavailable');
		expect(await flaky.inner.countPassages({status: 'Active'})).toBe(0);
	});

	it('retries transient write failures', async () => {
		store.failNext('addPassages', 2);
		const result = await h.gateway.insert(rev06);

		expect(result.ok).toBe(true);
		expect(store.calls.get('addPassages')).toBe(3);
		expect(await store.inner.countPassages({status: 'Active'})).toBe(2);
	});

	it('names the failing stage when writes keep failing', async () => {
		store.failNext('addPassages', Infinity);
		const result = await h.gateway.insert(rev06);

		expect(result).toMatchObject({
			ok: false,
			reason: 'store_write_failed',
			message: 'add: addPassages unavailable',
		});
		expect(await store.inner.countPassages()).toBe(0);
	});

	it('rolls back the new revision when retiring the old one fails', async () => {
		await h.gateway.insert(rev06);
		store.failNext('updateFieldsByFilter', Infinity);

		const result = await h.gateway.insert(rev07);
		expect(result).toMatchObject({
			ok: false,
			reason: 'store_write_failed',
			message: 'retire: updateFieldsByFilter unavailable',
		});
		expect(await store.inner.countPassages({versionRaw: '07'})).toBe(0);
		const active = await store.inner.findPassages({status: 'Active'});
		expect(active.map(p => p.versionRaw)).toEqual(['06', '06']);

		store.heal();
		const retry = await h.gateway.insert(rev07);
		expect(retry).toMatchObject({ok: true, status: 'Active', retired: 2});
		const after = await store.inner.findPassages({status: 'Active'});
		expect(after.map(p => p.versionRaw)).toEqual(['07', '07']);
	});

	it('waits for timed-out writes before reporting the failure', async () => {
		const config = resolveConfig({store: {timeoutMs: 20}}, createTestConfig());
		const slow = new FlakyStore();
		const stalled = await createHarness(slow, config);
		await stalled.gateway.insert(rev06);
		slow.stall('addPassages', 60);

		const result = await stalled.gateway.insert(rev07);
		expect(result).toMatchObject({
			ok: false,
			reason: 'store_write_failed',
			message: 'add: add passages timed out after 20ms',
		});
		expect(slow.calls.get('addPassages')).toBe(4);

		await new Promise(resolve => setTimeout(resolve, 100));
		const active = await slow.inner.findPassages({status: 'Active'});
		expect(active.map(p => p.versionRaw)).toEqual(['06', '06']);
		expect(await slow.inner.countPassages({versionRaw: '07'})).toBe(0);
	});
});

describe('IndexGateway administration', () => {
	let h: TestHarness;

	beforeEach(async () => {
		h = await createHarness();
		await h.gateway.insert(rev06);
		await h.gateway.insert(rev07);
	});

	it('lists one summary per source file', async () => {
		expect(await h.gateway.listDocuments()).toEqual([
			{
				sourceFilename: 'SOP_X_Rev06.pdf',
				title: 'SOP X',
				docNumber: null,
				versionRaw: '06',
				versionNumeric: 6,
				status: 'Inactive',
				passageCount: 2,
			},
			{
				sourceFilename: 'SOP_X_Rev07.pdf',
				title: 'SOP X',
				docNumber: null,
				versionRaw: '07',
				versionNumeric: 7,
				status: 'Active',
				passageCount: 2,
			},
		]);
	});

	it('reactivates a file and retires the others', async () => {
		expect(await h.gateway.setSourceFileStatus('SOP_X_Rev06.pdf', 'Active')).toEqual({
			updated: 2,
			retired: 2,
		});
		expect(await h.store.countPassages({versionRaw: '06', status: 'Active'})).toBe(2);
		expect(await h.store.countPassages({versionRaw: '07', status: 'Active'})).toBe(0);
	});

	it('deactivates a file without touching others', async () => {
		expect(await h.gateway.setSourceFileStatus('SOP_X_Rev07.pdf', 'Inactive')).toEqual({
			updated: 2,
			retired: 0,
		});
		expect(await h.store.countPassages({status: 'Active'})).toBe(0);
	});

	it('ignores unknown files', async () => {
		expect(await h.gateway.setSourceFileStatus('missing.pdf', 'Active')).toEqual({
			updated: 0,
			retired: 0,
		});
	});

	it('checks whether a source file is stored', async () => {
		expect(await h.gateway.hasSourceFile('SOP_X_Rev06.pdf')).toBe(true);
		expect(await h.gateway.hasSourceFile('other.pdf')).toBe(false);
	});

	it('deletes one revision or the whole document', async () => {
		expect(await h.gateway.deleteDocument('SOP X', {versionRaw: '06'})).toBe(2);
		expect(await h.store.countPassages()).toBe(2);
		expect(await h.gateway.deleteDocument('SOP X')).toBe(2);
		expect(await h.store.countPassages()).toBe(0);
	});
});
