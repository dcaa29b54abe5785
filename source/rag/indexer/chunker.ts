import type {ChunkingConfig} from '../config/index.js';
import {PASSAGE_STATUS} from '../constants.js';
import {computePassageId} from '../hash.js';
import type {DocumentIdentity} from '../identity/index.js';
import type {Logger} from '../logger/index.js';
import type {Passage} from '../storage/types.js';
import {splitByHeadings} from './markdown.js';
import {isHeadingLine, repairOrphanHeaders} from './orphans.js';
import {splitText} from './sentence-splitter.js';
import type {ParsedPage, StructuralBlock} from './types.js';

interface Draft {
	body: string;
	sectionPath: string[];
	pageLabel: string;
}

/**
 * Structure-aware chunker for cleaned SOP text.
 *
 * Pipeline: heading split -> orphan-header repair -> size-bound sub-split
 * -> quality filter -> citation header -> adjacency links.
 *
 * Passages come out Inactive; the index gateway stamps the final status.
 */
export class Chunker {
	private readonly options: ChunkingConfig;
	private readonly logger: Logger | null;
	private readonly boilerplate: Set<string>;

	constructor(options: ChunkingConfig, logger?: Logger) {
		this.options = options;
		this.logger = logger ?? null;
		this.boilerplate = new Set(
			options.boilerplatePhrases.map(phrase => phrase.toLowerCase()),
		);
	}

	/**
	 * Chunk one document revision.
	 *
	 * @param pages - Cleaned pages in reading order
	 * @param now - Ingestion timestamp stamped on every passage
	 */
	chunkDocument(
		identity: DocumentIdentity,
		pages: readonly ParsedPage[],
		now: Date = new Date(),
	): Passage[] {
		const blocks = repairOrphanHeaders(
			splitByHeadings(pages, identity.sourceFilename),
		);

		const drafts: Draft[] = [];
		let dropped = 0;
		for (const block of blocks) {
			for (const body of this.sizeBlock(block)) {
				if (this.isLowQuality(body)) {
					dropped++;
					continue;
				}
				drafts.push({
					body,
					sectionPath: block.sectionPath,
					pageLabel: block.pageLabel,
				});
			}
		}

		const passages = this.toPassages(identity, drafts, now.toISOString());

		if (passages.length === 0) {
			this.logger?.warn('Chunker', 'Document produced no passages', {
				sourceFilename: identity.sourceFilename,
				pages: pages.length,
				dropped,
			});
		} else {
			this.logger?.debug('Chunker', 'Chunked document', {
				sourceFilename: identity.sourceFilename,
				blocks: blocks.length,
				passages: passages.length,
				dropped,
			});
		}

		return passages;
	}

	/**
	 * Citation header prefixed to every passage's indexed text.
	 */
	static buildContextHeader(
		identity: Pick<DocumentIdentity, 'title' | 'versionRaw'>,
		pageLabel: string,
		sectionPath: readonly string[],
	): string {
		return (
			`Doc: ${identity.title} | Ver: ${identity.versionRaw} | Page: ${pageLabel}\n` +
			`Section: ${sectionPath.join(' > ')}`
		);
	}

	private sizeBlock(block: StructuralBlock): string[] {
		const text = block.text.trim();
		if (text.length <= this.options.maxBlockChars) {
			return [text];
		}
		return splitText(text, {
			chunkSize: this.options.chunkSize,
			chunkOverlap: this.options.chunkOverlap,
		})
			.map(part => part.trim())
			.filter(part => part.length > 0);
	}

	/**
	 * Too short, heading-only, or nothing but a boilerplate phrase.
	 */
	private isLowQuality(body: string): boolean {
		if (body.length < this.options.minContentChars) return true;

		const content = body
			.split('\n')
			.filter(line => !isHeadingLine(line))
			.join(' ')
			.toLowerCase()
			.replace(/^[\s\p{P}]+|[\s\p{P}]+$/gu, '');

		return content.length === 0 || this.boilerplate.has(content);
	}

	private toPassages(
		identity: DocumentIdentity,
		drafts: Draft[],
		ingestedAt: string,
	): Passage[] {
		const ids = drafts.map((_, index) =>
			computePassageId(
				identity.title,
				identity.docNumber,
				identity.versionRaw,
				index,
			),
		);

		return drafts.map((draft, index) => {
			const header = Chunker.buildContextHeader(
				identity,
				draft.pageLabel,
				draft.sectionPath,
			);
			return {
				id: ids[index] ?? '',
				text: `${header}\n${draft.body}`.toLowerCase(),
				body: draft.body,
				sectionPath: [...draft.sectionPath],
				pageLabel: draft.pageLabel,
				documentTitle: identity.title,
				versionRaw: identity.versionRaw,
				versionNumeric: identity.versionNumeric,
				docNumber: identity.docNumber,
				sourceFilename: identity.sourceFilename,
				chunkIndex: index,
				status: PASSAGE_STATUS.INACTIVE,
				prevId: ids[index - 1] ?? null,
				nextId: ids[index + 1] ?? null,
				ingestedAt,
			};
		});
	}
}
