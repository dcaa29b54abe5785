import {describe, it, expect} from 'vitest';
import {
	decideVersionStatus,
	resolveVersionStatus,
	type RevisionIdentity,
} from '../versioning/arbitration.js';
import {FlakyStore, createTestConfig, makePassage} from './helpers.js';

const rev07: RevisionIdentity = {
	title: 'SOP X',
	docNumber: null,
	versionRaw: '07',
	versionNumeric: 7,
};

const guard = createTestConfig().store;

describe('decideVersionStatus', () => {
	it('activates the first revision of a document', () => {
		expect(decideVersionStatus(rev07, [])).toEqual({
			acceptedStatus: 'Active',
			retireFilter: null,
			existingVersion: null,
			reason: 'first',
		});
	});

	it('activates a newer revision and retires the others', () => {
		expect(
			decideVersionStatus(rev07, [{versionRaw: '06', versionNumeric: 6}]),
		).toEqual({
			acceptedStatus: 'Active',
			retireFilter: {title: 'SOP X', status: 'Active', excludeVersionRaw: '07'},
			existingVersion: {versionRaw: '06', versionNumeric: 6},
			reason: 'newer',
		});
	});

	it('stores an older revision as Inactive without retiring anything', () => {
		const decision = decideVersionStatus(
			{...rev07, versionRaw: '05', versionNumeric: 5},
			[{versionRaw: '07', versionNumeric: 7}],
		);
		expect(decision.acceptedStatus).toBe('Inactive');
		expect(decision.retireFilter).toBeNull();
		expect(decision.reason).toBe('older');
	});

	it('lets the latest arrival win a tie', () => {
		const decision = decideVersionStatus(
			{...rev07, versionRaw: '7'},
			[{versionRaw: '07', versionNumeric: 7}],
		);
		expect(decision.acceptedStatus).toBe('Active');
		expect(decision.reason).toBe('same');
		expect(decision.retireFilter?.excludeVersionRaw).toBe('7');
	});

	it('compares against the highest Active revision', () => {
		const decision = decideVersionStatus({...rev07, versionNumeric: 6.5, versionRaw: '6.5'}, [
			{versionRaw: '06', versionNumeric: 6},
			{versionRaw: '07', versionNumeric: 7},
		]);
		expect(decision.reason).toBe('older');
		expect(decision.existingVersion?.versionRaw).toBe('07');
	});

	it('scopes the key by document number when known', () => {
		const decision = decideVersionStatus({...rev07, docNumber: 'QA-1'}, [
			{versionRaw: '06', versionNumeric: 6},
		]);
		expect(decision.retireFilter).toEqual({
			title: 'SOP X',
			docNumber: 'QA-1',
			status: 'Active',
			excludeVersionRaw: '07',
		});
	});
});

describe('resolveVersionStatus', () => {
	it('reads the Active revisions from the store', async () => {
		const store = new FlakyStore();
		await store.connect();
		await store.addPassages([
			{...makePassage('a'), vector: [1]},
			{...makePassage('b', {chunkIndex: 1}), vector: [1]},
		]);

		const result = await resolveVersionStatus(store, rev07, {
			policy: 'block',
			guard,
		});
		expect(result.ok && result.decision.reason).toBe('newer');
	});

	it('retries transient lookup failures', async () => {
		const store = new FlakyStore();
		await store.connect();
		store.failNext('findPassages', 1);

		const result = await resolveVersionStatus(store, rev07, {
			policy: 'block',
			guard,
		});
		expect(result.ok).toBe(true);
		expect(store.calls.get('findPassages')).toBe(2);
	});

	it('blocks when the store stays unavailable', async () => {
		const store = new FlakyStore();
		await store.connect();
		store.failNext('findPassages', Infinity);

		const result = await resolveVersionStatus(store, rev07, {
			policy: 'block',
			guard,
		});
		expect(result.ok).toBe(false);
		expect(!result.ok && result.error.message).toBe('findPassages unavailable');
		expect(store.calls.get('findPassages')).toBe(guard.maxAttempts);
	});

	it('falls back to Inactive under the inactive policy', async () => {
		const store = new FlakyStore();
		await store.connect();
		store.failNext('findPassages', Infinity);

		const result = await resolveVersionStatus(store, rev07, {
			policy: 'inactive',
			guard,
		});
		expect(result).toEqual({
			ok: true,
			decision: {
				acceptedStatus: 'Inactive',
				retireFilter: null,
				existingVersion: null,
				reason: 'store_unavailable',
			},
		});
	});
});
