/**
 * One page (or segment) of parsed document text.
 */
export interface ParsedPage {
	text: string;
	/** Page label as printed or counted, e.g. "3" */
	pageLabel: string;
}

/**
 * A candidate passage produced by the structural split, before sizing.
 */
export interface StructuralBlock {
	/** Blocks with different keys are never merged */
	documentKey: string;
	text: string;
	sectionPath: string[];
	pageLabel: string;
}

/**
 * Statistics from a bulk ingestion run.
 */
export interface IngestStats {
	/** Number of files found by the scan */
	filesScanned: number;
	/** Files chunked and written */
	filesIngested: number;
	/** Files skipped because they were already stored */
	filesSkipped: number;
	/** Files that yielded no passages */
	filesEmpty: number;
	/** Files whose ingestion failed */
	filesFailed: number;
	/** Passages written */
	passagesAdded: number;
	/** Passages retired by newer revisions */
	passagesRetired: number;
	/** Files stored Inactive because a newer revision was present */
	downgrades: number;
	failures: Array<{sourceFilename: string; error: string}>;
}

/**
 * Progress callback for ingestion operations.
 */
export type ProgressCallback = (
	current: number,
	total: number,
	stage: string,
) => void;

/**
 * Create empty ingest stats.
 */
export function createEmptyIngestStats(): IngestStats {
	return {
		filesScanned: 0,
		filesIngested: 0,
		filesSkipped: 0,
		filesEmpty: 0,
		filesFailed: 0,
		passagesAdded: 0,
		passagesRetired: 0,
		downgrades: 0,
		failures: [],
	};
}
