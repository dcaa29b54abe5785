/**
 * Write side of the hybrid index.
 *
 * Every insert runs arbitrate -> embed -> replace -> add -> retire inside a
 * per-title lock, so two revisions of one document never interleave. A write
 * failure after the add removes the added rows again.
 */

import type {ArbitrationConfig, StoreConfig} from '../config/index.js';
import {PASSAGE_STATUS, type PassageStatus} from '../constants.js';
import type {EmbeddingProvider} from '../embeddings/types.js';
import {toError} from '../errors.js';
import type {Logger} from '../logger/index.js';
import {guardedCall, type GuardOptions} from '../retry.js';
import type {
	EmbeddedPassage,
	Passage,
	PassageFilter,
	PassageStore,
} from '../storage/types.js';
import {
	documentKeyFilter,
	resolveVersionStatus,
	type RevisionIdentity,
	type VersionDecision,
} from '../versioning/arbitration.js';
import {KeyedMutex} from '../versioning/keyed-mutex.js';

// ============================================================================
// Types
// ============================================================================

export type InsertFailureReason =
	| 'empty_batch'
	| 'mixed_batch'
	| 'arbitration_failed'
	| 'embedding_failed'
	| 'store_write_failed';

export interface InsertSuccess {
	ok: true;
	/** Status stamped on every inserted passage */
	status: PassageStatus;
	inserted: number;
	/** Rows of the same revision removed before the insert */
	replaced: number;
	/** Active rows of other revisions flipped to Inactive */
	retired: number;
	decision: VersionDecision;
}

export interface InsertFailure {
	ok: false;
	reason: InsertFailureReason;
	message: string;
	error?: Error;
}

export type InsertResult = InsertSuccess | InsertFailure;

/**
 * One stored source file.
 */
export interface DocumentSummary {
	sourceFilename: string;
	title: string;
	docNumber: string | null;
	versionRaw: string;
	versionNumeric: number;
	/** Active when any passage of the file is Active */
	status: PassageStatus;
	passageCount: number;
}

export interface StatusChange {
	/** Passages of the file whose status was set */
	updated: number;
	/** Active passages of other files retired by an activation */
	retired: number;
}

export interface DeleteDocumentOptions {
	docNumber?: string;
	/** Delete only this revision */
	versionRaw?: string;
}

export interface IndexGatewayOptions {
	store: StoreConfig;
	arbitration: ArbitrationConfig;
}

// ============================================================================
// Gateway
// ============================================================================

export class IndexGateway {
	private readonly store: PassageStore;
	private readonly embeddings: EmbeddingProvider;
	private readonly options: IndexGatewayOptions;
	private readonly logger: Logger | null;
	private readonly locks = new KeyedMutex();

	constructor(
		store: PassageStore,
		embeddings: EmbeddingProvider,
		options: IndexGatewayOptions,
		logger?: Logger,
	) {
		this.store = store;
		this.embeddings = embeddings;
		this.options = options;
		this.logger = logger ?? null;
	}

	/**
	 * Insert the passages of one document revision.
	 *
	 * Expected failures come back as an InsertFailure; nothing is thrown.
	 */
	async insert(passages: readonly Passage[]): Promise<InsertResult> {
		const first = passages[0];
		if (!first) {
			return {ok: false, reason: 'empty_batch', message: 'No passages to insert'};
		}

		const identity: RevisionIdentity = {
			title: first.documentTitle,
			docNumber: first.docNumber,
			versionRaw: first.versionRaw,
			versionNumeric: first.versionNumeric,
		};

		const stray = passages.find(
			passage =>
				passage.documentTitle !== identity.title ||
				passage.docNumber !== identity.docNumber ||
				passage.versionRaw !== identity.versionRaw,
		);
		if (stray) {
			return {
				ok: false,
				reason: 'mixed_batch',
				message: `Batch mixes ${identity.title} v${identity.versionRaw} with ${stray.documentTitle} v${stray.versionRaw}`,
			};
		}

		return this.locks.run(identity.title, () =>
			this.insertRevision(identity, passages),
		);
	}

	/**
	 * Delete every passage of a document, or of one revision of it.
	 * Arbitration never calls this.
	 *
	 * @returns Number of passages deleted
	 */
	async deleteDocument(
		title: string,
		options: DeleteDocumentOptions = {},
	): Promise<number> {
		const filter: PassageFilter = {title};
		if (options.docNumber !== undefined) filter.docNumber = options.docNumber;
		if (options.versionRaw !== undefined) filter.versionRaw = options.versionRaw;

		return this.locks.run(title, async () => {
			const deleted = await this.write(
				() => this.store.deletePassages(filter),
				'delete document',
			);
			this.log('info', `Deleted ${deleted} passages`, {...filter});
			return deleted;
		});
	}

	/**
	 * One summary per stored source file, ordered by title then version.
	 */
	async listDocuments(): Promise<DocumentSummary[]> {
		const passages = await this.guard(
			() => this.store.findPassages({}),
			'list documents',
		);

		const byFile = new Map<string, DocumentSummary>();
		for (const passage of passages) {
			const summary = byFile.get(passage.sourceFilename);
			if (summary) {
				summary.passageCount++;
				if (passage.status === PASSAGE_STATUS.ACTIVE) {
					summary.status = PASSAGE_STATUS.ACTIVE;
				}
				continue;
			}
			byFile.set(passage.sourceFilename, {
				sourceFilename: passage.sourceFilename,
				title: passage.documentTitle,
				docNumber: passage.docNumber,
				versionRaw: passage.versionRaw,
				versionNumeric: passage.versionNumeric,
				status: passage.status,
				passageCount: 1,
			});
		}

		return [...byFile.values()].sort(
			(a, b) =>
				a.title.localeCompare(b.title) ||
				a.versionNumeric - b.versionNumeric ||
				a.sourceFilename.localeCompare(b.sourceFilename),
		);
	}

	/**
	 * Manually set the status of one source file.
	 *
	 * Activating a file retires the other Active revisions of its document,
	 * so the key keeps a single Active revision.
	 */
	async setSourceFileStatus(
		sourceFilename: string,
		status: PassageStatus,
	): Promise<StatusChange> {
		const [sample] = await this.guard(
			() => this.store.findPassages({sourceFilename}, 1),
			'find source file',
		);
		if (!sample) {
			this.log('warn', 'Status change for unknown source file', {
				sourceFilename,
			});
			return {updated: 0, retired: 0};
		}

		return this.locks.run(sample.documentTitle, async () => {
			const updated = await this.write(
				() => this.store.updateFieldsByFilter({sourceFilename}, {status}),
				'set status',
			);

			let retired = 0;
			if (status === PASSAGE_STATUS.ACTIVE) {
				retired = await this.write(
					() =>
						this.store.updateFieldsByFilter(
							{
								...documentKeyFilter({
									title: sample.documentTitle,
									docNumber: sample.docNumber,
								}),
								status: PASSAGE_STATUS.ACTIVE,
								excludeSourceFilename: sourceFilename,
							},
							{status: PASSAGE_STATUS.INACTIVE},
						),
					'retire other revisions',
				);
			}

			this.log('info', `Set ${sourceFilename} to ${status}`, {
				updated,
				retired,
			});
			return {updated, retired};
		});
	}

	/**
	 * True when any passage of the file is stored.
	 */
	async hasSourceFile(sourceFilename: string): Promise<boolean> {
		const count = await this.guard(
			() => this.store.countPassages({sourceFilename}),
			'count source file',
		);
		return count > 0;
	}

	// ============================================================
	// Internals
	// ============================================================

	private async insertRevision(
		identity: RevisionIdentity,
		passages: readonly Passage[],
	): Promise<InsertResult> {
		const arbitration = await resolveVersionStatus(this.store, identity, {
			policy: this.options.arbitration.onStoreUnavailable,
			guard: this.guardOptions('arbitration lookup'),
			logger: this.logger ?? undefined,
		});
		if (!arbitration.ok) {
			return {
				ok: false,
				reason: 'arbitration_failed',
				message: `Could not check existing revisions of ${identity.title}`,
				error: arbitration.error,
			};
		}
		const {decision} = arbitration;

		let vectors: number[][];
		try {
			vectors = await this.embeddings.embed(passages.map(p => p.text));
		} catch (error) {
			const cause = toError(error);
			this.logger?.error('Gateway', 'Embedding failed', cause);
			return {
				ok: false,
				reason: 'embedding_failed',
				message: cause.message,
				error: cause,
			};
		}
		if (vectors.length !== passages.length) {
			return {
				ok: false,
				reason: 'embedding_failed',
				message: `Expected ${passages.length} embeddings, got ${vectors.length}`,
			};
		}

		const rows: EmbeddedPassage[] = passages.map((passage, index) => ({
			...passage,
			status: decision.acceptedStatus,
			vector: vectors[index] ?? [],
		}));

		const revisionFilter: PassageFilter = {
			...documentKeyFilter(identity),
			versionRaw: identity.versionRaw,
		};
		let stage = 'replace';
		let added = false;
		try {
			const replaced = await this.write(
				() => this.store.deletePassages(revisionFilter),
				'replace revision',
			);

			stage = 'add';
			added = true;
			await this.write(() => this.store.addPassages(rows), 'add passages');

			stage = 'retire';
			const {retireFilter} = decision;
			const retired = retireFilter
				? await this.write(
						() =>
							this.store.updateFieldsByFilter(retireFilter, {
								status: PASSAGE_STATUS.INACTIVE,
							}),
						'retire revisions',
					)
				: 0;

			this.log('info', `Inserted ${rows.length} passages`, {
				title: identity.title,
				versionRaw: identity.versionRaw,
				status: decision.acceptedStatus,
				replaced,
				retired,
			});

			return {
				ok: true,
				status: decision.acceptedStatus,
				inserted: rows.length,
				replaced,
				retired,
				decision,
			};
		} catch (error) {
			const cause = toError(error);
			this.logger?.error(
				'Gateway',
				`Store write failed at ${stage} for ${identity.title} v${identity.versionRaw}`,
				cause,
			);
			const rollback = added ? await this.rollback(revisionFilter) : null;
			return {
				ok: false,
				reason: 'store_write_failed',
				message: rollback
					? `${stage}: ${cause.message} (rollback failed: ${rollback.message})`
					: `${stage}: ${cause.message}`,
				error: cause,
			};
		}
	}

	/**
	 * Remove the rows of a revision whose insert did not complete.
	 * @returns The rollback error, or null once the rows are gone
	 */
	private async rollback(revisionFilter: PassageFilter): Promise<Error | null> {
		try {
			const removed = await this.write(
				() => this.store.deletePassages(revisionFilter),
				'roll back revision',
			);
			this.log('warn', `Rolled back ${removed} passages`, {
				versionRaw: revisionFilter.versionRaw,
			});
			return null;
		} catch (error) {
			const cause = toError(error);
			this.logger?.error('Gateway', 'Rollback failed', cause);
			return cause;
		}
	}

	private write<T>(fn: () => Promise<T>, label: string): Promise<T> {
		return guardedCall(fn, label, {...this.guardOptions(label), settle: true});
	}

	private guard<T>(fn: () => Promise<T>, label: string): Promise<T> {
		return guardedCall(fn, label, this.guardOptions(label));
	}

	private guardOptions(label: string): GuardOptions {
		return {
			...this.options.store,
			onRetry: (attempt, delayMs, error) => {
				this.log('warn', `Retrying ${label}`, {
					attempt,
					delayMs,
					error: toError(error).message,
				});
			},
		};
	}

	private log(
		level: 'debug' | 'info' | 'warn',
		message: string,
		data?: object,
	): void {
		this.logger?.[level]('Gateway', message, data);
	}
}
