import {
	Field,
	FixedSizeList,
	Float32,
	Float64,
	Int32,
	Schema,
	Utf8,
} from 'apache-arrow';
import {DEFAULT_EMBEDDING_DIMENSIONS} from '../constants.js';

/**
 * Columns every passages table must carry.
 */
export const PASSAGE_COLUMNS = [
	'id',
	'vector',
	'text',
	'body',
	'section_path',
	'page_label',
	'document_title',
	'version_raw',
	'version_numeric',
	'doc_number',
	'source_filename',
	'chunk_index',
	'status',
	'prev_id',
	'next_id',
	'ingested_at',
] as const;

/**
 * Arrow schema for the passages table.
 */
export function createPassagesSchema(
	dimensions: number = DEFAULT_EMBEDDING_DIMENSIONS,
): Schema {
	return new Schema([
		new Field('id', new Utf8(), false),
		new Field(
			'vector',
			new FixedSizeList(dimensions, new Field('item', new Float32(), false)),
			false,
		),
		new Field('text', new Utf8(), false), // header + body, lowercased
		new Field('body', new Utf8(), false),
		new Field('section_path', new Utf8(), false), // JSON array
		new Field('page_label', new Utf8(), false),
		new Field('document_title', new Utf8(), false),
		new Field('version_raw', new Utf8(), false),
		new Field('version_numeric', new Float64(), false),
		new Field('doc_number', new Utf8(), false), // '' when unknown
		new Field('source_filename', new Utf8(), false),
		new Field('chunk_index', new Int32(), false),
		new Field('status', new Utf8(), false), // Active | Inactive
		new Field('prev_id', new Utf8(), false),
		new Field('next_id', new Utf8(), false),
		new Field('ingested_at', new Utf8(), false), // ISO timestamp
	]);
}
