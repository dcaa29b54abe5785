/**
 * Indexer - Orchestrates ingestion of SOP files.
 *
 * Pipeline per file:
 * 1. Parse into pages (external parser for binary formats)
 * 2. Resolve identity from filename and first-page text
 * 3. Clean pages with the rule list
 * 4. Chunk into citation-ready passages
 * 5. Insert through the gateway (arbitration + embedding + write)
 *
 * Files are processed one at a time; a failing file never aborts a batch.
 */

import path from 'node:path';
import fg from 'fast-glob';
import {
	cleanPages,
	DEFAULT_CLEANING_RULES,
	type CleaningRule,
} from '../cleaner/rules.js';
import type {ChunkingConfig} from '../config/index.js';
import {toError} from '../errors.js';
import type {IndexGateway, InsertResult} from '../gateway/index.js';
import {resolveIdentity, type DocumentIdentity} from '../identity/index.js';
import type {Logger} from '../logger/index.js';
import type {Passage} from '../storage/types.js';
import {Chunker} from './chunker.js';
import {TextDocumentParser, type DocumentParser} from './parser.js';
import {
	createEmptyIngestStats,
	type IngestStats,
	type ParsedPage,
	type ProgressCallback,
} from './types.js';

export interface IndexerOptions {
	chunking: ChunkingConfig;
	/** Defaults to the bundled text parser */
	parser?: DocumentParser;
	cleaningRules?: readonly CleaningRule[];
}

/**
 * Options for a directory ingest.
 */
export interface IngestDirectoryOptions {
	/** Skip files whose passages are already stored (default: true) */
	resume?: boolean;
	progressCallback?: ProgressCallback;
}

/**
 * Outcome for one file. `insert` is null when nothing was written.
 */
export interface FileIngestResult {
	identity: DocumentIdentity;
	passages: Passage[];
	insert: InsertResult | null;
	/** Set when the file could not be parsed */
	parseError?: string;
}

export class Indexer {
	private readonly gateway: IndexGateway;
	private readonly chunker: Chunker;
	private readonly parser: DocumentParser;
	private readonly cleaningRules: readonly CleaningRule[];
	private readonly logger: Logger | null;

	constructor(gateway: IndexGateway, options: IndexerOptions, logger?: Logger) {
		this.gateway = gateway;
		this.chunker = new Chunker(options.chunking, logger);
		this.parser = options.parser ?? new TextDocumentParser();
		this.cleaningRules = options.cleaningRules ?? DEFAULT_CLEANING_RULES;
		this.logger = logger ?? null;
	}

	/**
	 * Ingest already-parsed pages of one file.
	 * Documents without usable text produce no passages and no write.
	 */
	async ingestPages(
		filename: string,
		pages: readonly ParsedPage[],
	): Promise<FileIngestResult> {
		const identity = resolveIdentity(filename, {
			firstPageText: pages[0]?.text,
			logger: this.logger ?? undefined,
		});

		const cleaned = cleanPages(pages, this.cleaningRules);
		if (cleaned.length === 0) {
			this.log('warn', 'No usable text after cleaning', {
				sourceFilename: identity.sourceFilename,
			});
			return {identity, passages: [], insert: null};
		}

		const passages = this.chunker.chunkDocument(identity, cleaned);
		if (passages.length === 0) {
			return {identity, passages, insert: null};
		}

		const insert = await this.gateway.insert(passages);
		if (insert.ok) {
			this.log('info', `Ingested ${identity.sourceFilename}`, {
				title: identity.title,
				versionRaw: identity.versionRaw,
				status: insert.status,
				passages: insert.inserted,
			});
		} else {
			this.log('warn', `Insert failed for ${identity.sourceFilename}`, {
				reason: insert.reason,
				message: insert.message,
			});
		}

		return {identity, passages, insert};
	}

	/**
	 * Parse and ingest one file. Parse failures are reported in the result.
	 */
	async ingestFile(filePath: string): Promise<FileIngestResult> {
		let pages: ParsedPage[];
		try {
			pages = await this.parser.parse(filePath);
		} catch (error) {
			const cause = toError(error);
			this.log('warn', `Failed to parse ${filePath}`, {error: cause.message});
			return {
				identity: resolveIdentity(filePath, {
					logger: this.logger ?? undefined,
				}),
				passages: [],
				insert: null,
				parseError: cause.message,
			};
		}
		return this.ingestPages(filePath, pages);
	}

	/**
	 * Ingest every supported file under a directory, one at a time.
	 */
	async ingestDirectory(
		directory: string,
		options: IngestDirectoryOptions = {},
	): Promise<IngestStats> {
		const {resume = true, progressCallback} = options;
		const stats = createEmptyIngestStats();

		const files = await this.scan(directory);
		stats.filesScanned = files.length;
		this.log('info', `Scanned ${files.length} files in ${directory}`);

		// Passages are keyed by file name; a later file with the same name
		// replaces the earlier one instead of being mistaken for stored.
		const ingestedThisRun = new Map<string, string>();

		for (const [index, relativePath] of files.entries()) {
			const filePath = path.join(directory, relativePath);
			const sourceFilename = path.basename(relativePath);
			const earlier = ingestedThisRun.get(sourceFilename);

			try {
				if (
					resume &&
					earlier === undefined &&
					(await this.gateway.hasSourceFile(sourceFilename))
				) {
					stats.filesSkipped++;
					this.log('debug', `Skipping stored file ${sourceFilename}`);
				} else {
					if (earlier !== undefined) {
						this.log('warn', `Duplicate file name ${sourceFilename}`, {
							replaces: earlier,
							path: relativePath,
						});
					}
					ingestedThisRun.set(sourceFilename, relativePath);
					this.record(stats, sourceFilename, await this.ingestFile(filePath));
				}
			} catch (error) {
				const cause = toError(error);
				this.logger?.error('Indexer', `Failed to ingest ${sourceFilename}`, cause);
				stats.filesFailed++;
				stats.failures.push({sourceFilename, error: cause.message});
			}

			progressCallback?.(index + 1, files.length, 'Ingesting files');
		}

		this.log(
			'info',
			`Ingest complete: ${stats.filesIngested} ingested, ${stats.filesSkipped} skipped, ${stats.filesFailed} failed`,
			{...stats, failures: stats.failures.length},
		);
		return stats;
	}

	// ============================================================
	// Internals
	// ============================================================

	private async scan(directory: string): Promise<string[]> {
		const extensions = new Set(
			this.parser.extensions.map(extension => extension.toLowerCase()),
		);
		const files = await fg('**/*', {
			cwd: directory,
			onlyFiles: true,
			followSymbolicLinks: false,
		});
		return files
			.filter(file => extensions.has(path.extname(file).toLowerCase()))
			.sort();
	}

	private record(
		stats: IngestStats,
		sourceFilename: string,
		result: FileIngestResult,
	): void {
		const {insert} = result;

		if (result.parseError !== undefined) {
			stats.filesFailed++;
			stats.failures.push({sourceFilename, error: result.parseError});
			return;
		}
		if (!insert) {
			stats.filesEmpty++;
			return;
		}
		if (!insert.ok) {
			stats.filesFailed++;
			stats.failures.push({
				sourceFilename,
				error: `${insert.reason}: ${insert.message}`,
			});
			return;
		}

		stats.filesIngested++;
		stats.passagesAdded += insert.inserted;
		stats.passagesRetired += insert.retired;
		if (insert.decision.reason === 'older') {
			stats.downgrades++;
		}
	}

	private log(
		level: 'debug' | 'info' | 'warn',
		message: string,
		data?: object,
	): void {
		this.logger?.[level]('Indexer', message, data);
	}
}
