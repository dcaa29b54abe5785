/**
 * Indexer module: parsing, chunking and ingestion orchestration.
 */

export {Chunker} from './chunker.js';
export {
	Indexer,
	type FileIngestResult,
	type IndexerOptions,
	type IngestDirectoryOptions,
} from './indexer.js';
export {MARKDOWN_HEADING, splitByHeadings} from './markdown.js';
export {isHeadingLine, repairOrphanHeaders} from './orphans.js';
export {
	TextDocumentParser,
	splitPages,
	type DocumentParser,
} from './parser.js';
export {splitSentences, splitText, type SplitterOptions} from './sentence-splitter.js';

export {
	createEmptyIngestStats,
	type IngestStats,
	type ParsedPage,
	type ProgressCallback,
	type StructuralBlock,
} from './types.js';
