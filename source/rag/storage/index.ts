import * as lancedb from '@lancedb/lancedb';
import type {Connection, Table} from '@lancedb/lancedb';
import {DataType} from 'apache-arrow';
import {TABLE_NAMES} from '../constants.js';
import {StoreNotConnectedError, StoreSchemaError} from '../errors.js';
import type {Logger} from '../logger/index.js';
import {buildWhereClause, isEmptyFilter} from './filters.js';
import {createPassagesSchema, PASSAGE_COLUMNS} from './schema.js';
import {
	passageToRow,
	rowToPassage,
	type EmbeddedPassage,
	type Passage,
	type PassageFieldUpdate,
	type PassageFilter,
	type PassageStore,
	type ScoredPassage,
	type StoreSearchOptions,
} from './types.js';

export * from './types.js';
export * from './schema.js';
export * from './filters.js';
export {MemoryPassageStore} from './memory.js';

/**
 * Passage store backed by LanceDB.
 *
 * Dense search uses cosine distance on the vector column; sparse search
 * uses LanceDB's BM25 full-text index on the text column.
 */
export class LancePassageStore implements PassageStore {
	private readonly dbPath: string;
	private readonly dimensions: number;
	private readonly logger: Logger | null;
	private db: Connection | null = null;
	private table: Table | null = null;
	/** FTS index is missing or predates the last write */
	private ftsStale = true;

	constructor(dbPath: string, dimensions: number, logger?: Logger) {
		this.dbPath = dbPath;
		this.dimensions = dimensions;
		this.logger = logger ?? null;
	}

	/**
	 * Connect to the LanceDB database.
	 * Creates the passages table if it doesn't exist and validates it if it does.
	 */
	async connect(): Promise<void> {
		const db = await lancedb.connect(this.dbPath);
		const tableNames = await db.tableNames();

		let table: Table;
		if (tableNames.includes(TABLE_NAMES.PASSAGES)) {
			table = await db.openTable(TABLE_NAMES.PASSAGES);
			await this.validateSchema(table);
		} else {
			table = await db.createEmptyTable(
				TABLE_NAMES.PASSAGES,
				createPassagesSchema(this.dimensions),
			);
			this.log('info', `Created table ${TABLE_NAMES.PASSAGES}`);
		}

		this.db = db;
		this.table = table;
		this.ftsStale = true;
	}

	/**
	 * Close the database connection.
	 */
	close(): void {
		// LanceDB connections don't need explicit closing in the JS SDK
		this.db = null;
		this.table = null;
	}

	// ============================================================
	// Writes
	// ============================================================

	async addPassages(passages: EmbeddedPassage[]): Promise<void> {
		const table = this.getTable();
		if (passages.length === 0) return;

		for (const passage of passages) {
			if (passage.vector.length !== this.dimensions) {
				throw new StoreSchemaError({
					table: TABLE_NAMES.PASSAGES,
					expectedDimensions: this.dimensions,
					actualDimensions: passage.vector.length,
					missingColumns: [],
				});
			}
		}

		await table
			.mergeInsert('id')
			.whenMatchedUpdateAll()
			.whenNotMatchedInsertAll()
			.execute(passages.map(passageToRow));
		this.ftsStale = true;
	}

	async deletePassages(filter: PassageFilter): Promise<number> {
		const table = this.getTable();
		const where = requireWhereClause(filter, 'delete');

		const count = await table.countRows(where);
		if (count > 0) {
			await table.delete(where);
			this.ftsStale = true;
		}
		return count;
	}

	/**
	 * Metadata-only update; vectors are untouched.
	 */
	async updateFieldsByFilter(
		filter: PassageFilter,
		fields: PassageFieldUpdate,
	): Promise<number> {
		const table = this.getTable();
		const where = requireWhereClause(filter, 'update');

		const count = await table.countRows(where);
		if (count > 0) {
			await table.update({where, values: {status: fields.status}});
			this.ftsStale = true;
		}
		return count;
	}

	// ============================================================
	// Reads
	// ============================================================

	async findPassages(filter: PassageFilter, limit?: number): Promise<Passage[]> {
		const table = this.getTable();
		const where = buildWhereClause(filter);

		let query = table.query();
		if (where) query = query.where(where);
		if (limit !== undefined) query = query.limit(limit);

		const rows: unknown[] = await query.toArray();
		return rows.map(rowToPassage);
	}

	async getPassagesByIds(ids: string[]): Promise<Passage[]> {
		const table = this.getTable();
		if (ids.length === 0) return [];

		const list = ids.map(id => `'${id.replace(/'/g, "''")}'`).join(', ');
		const rows: unknown[] = await table
			.query()
			.where(`id IN (${list})`)
			.toArray();

		const byId = new Map<string, Passage>();
		for (const row of rows) {
			const passage = rowToPassage(row);
			byId.set(passage.id, passage);
		}
		return ids.flatMap(id => {
			const passage = byId.get(id);
			return passage ? [passage] : [];
		});
	}

	async countPassages(filter?: PassageFilter): Promise<number> {
		const table = this.getTable();
		return table.countRows(buildWhereClause(filter));
	}

	/**
	 * Cosine vector search. Score = 1 / (1 + distance).
	 */
	async vectorSearch(
		vector: number[],
		options: StoreSearchOptions,
	): Promise<ScoredPassage[]> {
		const table = this.getTable();
		const where = buildWhereClause(options.filter);

		let query = table
			.vectorSearch(vector)
			.distanceType('cosine')
			.limit(options.limit);
		if (where) query = query.where(where);

		const rows: unknown[] = await query.toArray();
		return rows.map(row => ({
			passage: rowToPassage(row),
			score: 1 / (1 + readNumericField(row, '_distance', 0)),
		}));
	}

	/**
	 * BM25 full-text search over the text column.
	 */
	async keywordSearch(
		query: string,
		options: StoreSearchOptions,
	): Promise<ScoredPassage[]> {
		const table = this.getTable();
		if (query.trim().length === 0) return [];
		if ((await table.countRows()) === 0) return [];

		await this.ensureFtsIndex(table);

		const where = buildWhereClause(options.filter);
		let search = table.search(query, 'fts').limit(options.limit);
		if (where) search = search.where(where);

		const rows: unknown[] = await search.toArray();
		return rows.map((row, index) => ({
			passage: rowToPassage(row),
			score: readNumericField(row, '_score', 1 / (index + 1)),
		}));
	}

	// ============================================================
	// Internals
	// ============================================================

	/**
	 * (Re)build the FTS index after writes so new and updated rows are
	 * searchable.
	 */
	private async ensureFtsIndex(table: Table): Promise<void> {
		if (!this.ftsStale) return;
		await table.createIndex('text', {
			config: lancedb.Index.fts({asciiFolding: true}),
			replace: true,
		});
		this.ftsStale = false;
		this.log('debug', 'Rebuilt FTS index on text');
	}

	private async validateSchema(table: Table): Promise<void> {
		const schema = await table.schema();
		const names = new Set(schema.fields.map(field => field.name));
		const missingColumns = PASSAGE_COLUMNS.filter(name => !names.has(name));

		const vectorField = schema.fields.find(field => field.name === 'vector');
		const actualDimensions =
			vectorField && DataType.isFixedSizeList(vectorField.type)
				? vectorField.type.listSize
				: null;

		if (missingColumns.length > 0 || actualDimensions !== this.dimensions) {
			const error = new StoreSchemaError({
				table: TABLE_NAMES.PASSAGES,
				expectedDimensions: this.dimensions,
				actualDimensions,
				missingColumns,
			});
			this.log('error', 'Passages table does not match', error);
			throw error;
		}
	}

	private getTable(): Table {
		if (!this.db || !this.table) {
			throw new StoreNotConnectedError();
		}
		return this.table;
	}

	private log(
		level: 'debug' | 'info' | 'error',
		message: string,
		error?: Error,
	): void {
		if (!this.logger) return;
		if (level === 'error') {
			this.logger.error('Store', message, error);
		} else {
			this.logger[level]('Store', message);
		}
	}
}

function requireWhereClause(filter: PassageFilter, operation: string): string {
	const where = buildWhereClause(filter);
	if (where === undefined || isEmptyFilter(filter)) {
		throw new Error(`Refusing to ${operation} passages with an empty filter`);
	}
	return where;
}

function readNumericField(
	row: unknown,
	field: '_distance' | '_score',
	fallback: number,
): number {
	if (typeof row !== 'object' || row === null || !(field in row)) {
		return fallback;
	}
	const value: unknown = Reflect.get(row, field);
	return typeof value === 'number' ? value : fallback;
}
