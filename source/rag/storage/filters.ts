/**
 * PassageFilter evaluation: LanceDB WHERE clauses and in-process matching.
 */

import type {Passage, PassageFilter} from './types.js';

/**
 * Build a LanceDB WHERE clause from a passage filter.
 *
 * @returns Filter string, or undefined if the filter selects everything
 */
export function buildWhereClause(
	filter: PassageFilter | undefined,
): string | undefined {
	if (!filter) return undefined;

	const conditions: string[] = [];

	if (filter.title !== undefined) {
		conditions.push(`document_title = '${escapeForEquality(filter.title)}'`);
	}
	if (filter.docNumber !== undefined) {
		conditions.push(
			`(doc_number = '${escapeForEquality(filter.docNumber)}' OR doc_number = '')`,
		);
	}
	if (filter.versionRaw !== undefined) {
		conditions.push(`version_raw = '${escapeForEquality(filter.versionRaw)}'`);
	}
	if (filter.excludeVersionRaw !== undefined) {
		conditions.push(
			`version_raw != '${escapeForEquality(filter.excludeVersionRaw)}'`,
		);
	}
	if (filter.status !== undefined) {
		conditions.push(`status = '${escapeForEquality(filter.status)}'`);
	}
	if (filter.sourceFilename !== undefined) {
		conditions.push(
			`source_filename = '${escapeForEquality(filter.sourceFilename)}'`,
		);
	}
	if (filter.excludeSourceFilename !== undefined) {
		conditions.push(
			`source_filename != '${escapeForEquality(filter.excludeSourceFilename)}'`,
		);
	}

	if (conditions.length === 0) {
		return undefined;
	}

	return conditions.join(' AND ');
}

/**
 * Evaluate a passage filter in process.
 */
export function matchesFilter(
	passage: Passage,
	filter: PassageFilter | undefined,
): boolean {
	if (!filter) return true;
	if (filter.title !== undefined && passage.documentTitle !== filter.title) {
		return false;
	}
	if (
		filter.docNumber !== undefined &&
		passage.docNumber !== null &&
		passage.docNumber !== filter.docNumber
	) {
		return false;
	}
	if (
		filter.versionRaw !== undefined &&
		passage.versionRaw !== filter.versionRaw
	) {
		return false;
	}
	if (
		filter.excludeVersionRaw !== undefined &&
		passage.versionRaw === filter.excludeVersionRaw
	) {
		return false;
	}
	if (filter.status !== undefined && passage.status !== filter.status) {
		return false;
	}
	if (
		filter.sourceFilename !== undefined &&
		passage.sourceFilename !== filter.sourceFilename
	) {
		return false;
	}
	if (
		filter.excludeSourceFilename !== undefined &&
		passage.sourceFilename === filter.excludeSourceFilename
	) {
		return false;
	}
	return true;
}

/**
 * True when the filter has no conditions and would select every passage.
 */
export function isEmptyFilter(filter: PassageFilter): boolean {
	return buildWhereClause(filter) === undefined;
}

/**
 * Escape a string for an equality comparison in a LanceDB filter.
 * Single quotes are doubled.
 */
export function escapeForEquality(str: string): string {
	return str.replace(/'/g, "''");
}
