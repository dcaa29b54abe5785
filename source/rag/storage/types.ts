import {z} from 'zod';
import {PASSAGE_STATUS, type PassageStatus} from '../constants.js';

/**
 * A citation-ready passage of one document revision.
 */
export interface Passage {
	/** Hash of (title, docNumber, versionRaw, chunkIndex) */
	id: string;
	/** Citation header + body, lowercased; what dense and sparse search see */
	text: string;
	/** Original-case body without the citation header */
	body: string;
	/** Heading breadcrumb from document root */
	sectionPath: string[];
	pageLabel: string;
	documentTitle: string;
	versionRaw: string;
	versionNumeric: number;
	docNumber: string | null;
	sourceFilename: string;
	/** Position in emission order within the revision */
	chunkIndex: number;
	status: PassageStatus;
	prevId: string | null;
	nextId: string | null;
	/** ISO timestamp */
	ingestedAt: string;
}

export interface EmbeddedPassage extends Passage {
	vector: number[];
}

export interface ScoredPassage {
	passage: Passage;
	/** Higher is better; scale depends on the signal */
	score: number;
}

/**
 * Structured selection of passages. All present conditions must hold.
 */
export interface PassageFilter {
	title?: string;
	/**
	 * Scope to this document number. Passages stored without a number also
	 * match, so revisions ingested before the number was known stay in scope.
	 */
	docNumber?: string;
	versionRaw?: string;
	/** Passages whose versionRaw differs */
	excludeVersionRaw?: string;
	status?: PassageStatus;
	sourceFilename?: string;
	/** Passages from any other source file */
	excludeSourceFilename?: string;
}

/**
 * Metadata that may change without re-embedding.
 */
export interface PassageFieldUpdate {
	status: PassageStatus;
}

export interface StoreSearchOptions {
	limit: number;
	filter?: PassageFilter;
}

/**
 * Persistent store with dense and sparse search over passages.
 */
export interface PassageStore {
	/**
	 * Open or create the passage table.
	 * @throws StoreSchemaError when an existing table does not match
	 */
	connect(): Promise<void>;
	close(): void;
	/** Upsert by id */
	addPassages(passages: EmbeddedPassage[]): Promise<void>;
	/** @returns Number of passages deleted */
	deletePassages(filter: PassageFilter): Promise<number>;
	/** @returns Number of passages updated */
	updateFieldsByFilter(
		filter: PassageFilter,
		fields: PassageFieldUpdate,
	): Promise<number>;
	findPassages(filter: PassageFilter, limit?: number): Promise<Passage[]>;
	/** Missing ids are skipped; order follows the input */
	getPassagesByIds(ids: string[]): Promise<Passage[]>;
	countPassages(filter?: PassageFilter): Promise<number>;
	vectorSearch(
		vector: number[],
		options: StoreSearchOptions,
	): Promise<ScoredPassage[]>;
	keywordSearch(
		query: string,
		options: StoreSearchOptions,
	): Promise<ScoredPassage[]>;
}

// ============================================================================
// Row format
// ============================================================================

/**
 * Row format for the LanceDB passages table.
 * Uses snake_case to match Arrow/LanceDB conventions. Absent optional
 * values are stored as empty strings.
 */
export const passageRowSchema = z.object({
	id: z.string(),
	text: z.string(),
	body: z.string(),
	section_path: z.string(),
	page_label: z.string(),
	document_title: z.string(),
	version_raw: z.string(),
	version_numeric: z.number(),
	doc_number: z.string(),
	source_filename: z.string(),
	chunk_index: z.number().int(),
	status: z.enum([PASSAGE_STATUS.ACTIVE, PASSAGE_STATUS.INACTIVE]),
	prev_id: z.string(),
	next_id: z.string(),
	ingested_at: z.string(),
});

export type PassageRow = z.infer<typeof passageRowSchema>;

export type EmbeddedPassageRow = PassageRow & {vector: number[]};

const sectionPathSchema = z.array(z.string());

export function passageToRow(passage: EmbeddedPassage): EmbeddedPassageRow {
	return {
		id: passage.id,
		vector: passage.vector,
		text: passage.text,
		body: passage.body,
		section_path: JSON.stringify(passage.sectionPath),
		page_label: passage.pageLabel,
		document_title: passage.documentTitle,
		version_raw: passage.versionRaw,
		version_numeric: passage.versionNumeric,
		doc_number: passage.docNumber ?? '',
		source_filename: passage.sourceFilename,
		chunk_index: passage.chunkIndex,
		status: passage.status,
		prev_id: passage.prevId ?? '',
		next_id: passage.nextId ?? '',
		ingested_at: passage.ingestedAt,
	};
}

/**
 * Validate a raw LanceDB row and convert it to a Passage.
 * Extra columns (vector, _distance, _score) are ignored.
 */
export function rowToPassage(raw: unknown): Passage {
	const row = passageRowSchema.parse(raw);
	return {
		id: row.id,
		text: row.text,
		body: row.body,
		sectionPath: sectionPathSchema.parse(JSON.parse(row.section_path)),
		pageLabel: row.page_label,
		documentTitle: row.document_title,
		versionRaw: row.version_raw,
		versionNumeric: row.version_numeric,
		docNumber: row.doc_number === '' ? null : row.doc_number,
		sourceFilename: row.source_filename,
		chunkIndex: row.chunk_index,
		status: row.status,
		prevId: row.prev_id === '' ? null : row.prev_id,
		nextId: row.next_id === '' ? null : row.next_id,
		ingestedAt: row.ingested_at,
	};
}

/**
 * Drop the vector from an embedded passage.
 */
export function stripVector(passage: EmbeddedPassage): Passage {
	const {vector: _vector, ...rest} = passage;
	return rest;
}
