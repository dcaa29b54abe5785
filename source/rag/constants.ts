import path from 'node:path';

/**
 * Directory name for index data, config and logs.
 * This directory should be added to .gitignore.
 */
export const DATA_DIR = '.sop-rag';

/**
 * Get the absolute path to the data directory for a project.
 * $SOP_RAG_HOME overrides the per-project location.
 */
export function getDataDir(projectRoot: string): string {
	const override = process.env['SOP_RAG_HOME'];
	if (override && override.trim().length > 0) {
		return path.resolve(override);
	}
	return path.join(projectRoot, DATA_DIR);
}

/**
 * Get the path to the config file.
 */
export function getConfigPath(projectRoot: string): string {
	return path.join(getDataDir(projectRoot), 'config.json');
}

/**
 * Get the path to the LanceDB database directory.
 */
export function getLanceDbPath(projectRoot: string): string {
	return path.join(getDataDir(projectRoot), 'lancedb');
}

/**
 * Get the path to the logs directory.
 */
export function getLogsDir(projectRoot: string): string {
	return path.join(getDataDir(projectRoot), 'logs');
}

/**
 * LanceDB table names.
 */
export const TABLE_NAMES = {
	PASSAGES: 'passages',
} as const;

/**
 * Passage visibility states. There is no third state.
 */
export const PASSAGE_STATUS = {
	ACTIVE: 'Active',
	INACTIVE: 'Inactive',
} as const;

export type PassageStatus =
	(typeof PASSAGE_STATUS)[keyof typeof PASSAGE_STATUS];

/**
 * Breadcrumb used for documents without any heading.
 */
export const GENERAL_SECTION = 'General Section';

/**
 * Embedding dimensions for the default model (text-embedding-3-small).
 */
export const DEFAULT_EMBEDDING_DIMENSIONS = 1536;

/**
 * File extensions the bundled text parser understands.
 */
export const TEXT_EXTENSIONS = ['.md', '.markdown', '.txt'];
