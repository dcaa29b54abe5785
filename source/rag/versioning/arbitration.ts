import type {ArbitrationConfig} from '../config/index.js';
import {PASSAGE_STATUS, type PassageStatus} from '../constants.js';
import {toError} from '../errors.js';
import type {DocumentIdentity} from '../identity/index.js';
import type {Logger} from '../logger/index.js';
import {guardedCall, type GuardOptions} from '../retry.js';
import type {PassageFilter, PassageStore} from '../storage/types.js';

/**
 * The part of an identity that arbitration compares.
 */
export type RevisionIdentity = Pick<
	DocumentIdentity,
	'title' | 'docNumber' | 'versionRaw' | 'versionNumeric'
>;

export interface ExistingVersion {
	versionRaw: string;
	versionNumeric: number;
}

export type DecisionReason =
	| 'first'
	| 'newer'
	| 'older'
	| 'same'
	| 'store_unavailable';

/**
 * Outcome of arbitration for one incoming revision.
 */
export interface VersionDecision {
	acceptedStatus: PassageStatus;
	/** Active passages of other revisions to flip to Inactive */
	retireFilter: PassageFilter | null;
	/** Highest Active revision found for the key */
	existingVersion: ExistingVersion | null;
	reason: DecisionReason;
}

export type ArbitrationResult =
	| {ok: true; decision: VersionDecision}
	| {ok: false; error: Error};

export interface ArbitrationOptions {
	policy: ArbitrationConfig['onStoreUnavailable'];
	guard: GuardOptions;
	logger?: Logger;
}

/**
 * Filter selecting every revision of a logical document. A document number
 * narrows the key when the incoming revision carries one.
 */
export function documentKeyFilter(
	identity: Pick<DocumentIdentity, 'title' | 'docNumber'>,
): PassageFilter {
	return identity.docNumber === null
		? {title: identity.title}
		: {title: identity.title, docNumber: identity.docNumber};
}

/**
 * Decide the status of an incoming revision given the Active revisions
 * already stored for its key.
 *
 * - nothing Active: Active
 * - incoming newer: Active, older Active revisions retired
 * - incoming older: Inactive, nothing retired
 * - same number: Active (refresh); other raw tokens of that number retired
 */
export function decideVersionStatus(
	incoming: RevisionIdentity,
	activeVersions: readonly ExistingVersion[],
): VersionDecision {
	const retireFilter: PassageFilter = {
		...documentKeyFilter(incoming),
		status: PASSAGE_STATUS.ACTIVE,
		excludeVersionRaw: incoming.versionRaw,
	};

	let existing: ExistingVersion | null = null;
	for (const version of activeVersions) {
		if (!existing || version.versionNumeric > existing.versionNumeric) {
			existing = version;
		}
	}

	if (!existing) {
		return {
			acceptedStatus: PASSAGE_STATUS.ACTIVE,
			retireFilter: null,
			existingVersion: null,
			reason: 'first',
		};
	}

	if (incoming.versionNumeric > existing.versionNumeric) {
		return {
			acceptedStatus: PASSAGE_STATUS.ACTIVE,
			retireFilter,
			existingVersion: existing,
			reason: 'newer',
		};
	}

	if (incoming.versionNumeric < existing.versionNumeric) {
		return {
			acceptedStatus: PASSAGE_STATUS.INACTIVE,
			retireFilter: null,
			existingVersion: existing,
			reason: 'older',
		};
	}

	return {
		acceptedStatus: PASSAGE_STATUS.ACTIVE,
		retireFilter,
		existingVersion: existing,
		reason: 'same',
	};
}

/**
 * Look up the Active revisions for the incoming key and decide.
 *
 * When the store cannot be queried the configured policy applies: `block`
 * reports a failure, `inactive` accepts the revision as Inactive without
 * retiring anything. A revision is never made Active without a successful
 * lookup.
 */
export async function resolveVersionStatus(
	store: PassageStore,
	incoming: RevisionIdentity,
	options: ArbitrationOptions,
): Promise<ArbitrationResult> {
	const {logger} = options;

	let activeVersions: ExistingVersion[];
	try {
		const active = await guardedCall(
			() =>
				store.findPassages({
					...documentKeyFilter(incoming),
					status: PASSAGE_STATUS.ACTIVE,
				}),
			'arbitration lookup',
			options.guard,
		);
		activeVersions = uniqueVersions(active);
	} catch (error) {
		const cause = toError(error);
		if (options.policy === 'inactive') {
			logger?.warn(
				'Arbitration',
				'Store unavailable, accepting revision as Inactive',
				{title: incoming.title, versionRaw: incoming.versionRaw},
			);
			return {
				ok: true,
				decision: {
					acceptedStatus: PASSAGE_STATUS.INACTIVE,
					retireFilter: null,
					existingVersion: null,
					reason: 'store_unavailable',
				},
			};
		}
		logger?.error(
			'Arbitration',
			`Store unavailable, blocking ${incoming.title} v${incoming.versionRaw}`,
			cause,
		);
		return {ok: false, error: cause};
	}

	const decision = decideVersionStatus(incoming, activeVersions);

	if (decision.reason === 'older') {
		logger?.warn('Arbitration', 'Version downgrade: stored as Inactive', {
			title: incoming.title,
			docNumber: incoming.docNumber,
			incoming: incoming.versionRaw,
			active: decision.existingVersion?.versionRaw,
		});
	} else {
		logger?.info('Arbitration', `Accepted as ${decision.acceptedStatus}`, {
			title: incoming.title,
			versionRaw: incoming.versionRaw,
			reason: decision.reason,
			previous: decision.existingVersion?.versionRaw ?? null,
		});
	}

	return {ok: true, decision};
}

function uniqueVersions(
	passages: ReadonlyArray<{versionRaw: string; versionNumeric: number}>,
): ExistingVersion[] {
	const byRaw = new Map<string, ExistingVersion>();
	for (const passage of passages) {
		byRaw.set(passage.versionRaw, {
			versionRaw: passage.versionRaw,
			versionNumeric: passage.versionNumeric,
		});
	}
	return [...byRaw.values()];
}
