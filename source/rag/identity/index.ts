import path from 'node:path';
import type {Logger} from '../logger/index.js';
import {
	findExplicitVersion,
	findImplicitVersion,
	normalizeTitle,
	stripDuplicateMarkers,
	stripExportTimestamp,
} from './filename.js';
import {
	extractContentVersion,
	extractDocNumber,
	normalizeVersion,
} from './version.js';

export * from './filename.js';
export * from './version.js';

export const DEFAULT_VERSION = '1.0';

/**
 * Where the version of a document came from.
 */
export type VersionSource = 'explicit' | 'implicit' | 'content' | 'default';

/**
 * Canonical identity of one uploaded file.
 */
export interface DocumentIdentity {
	/** Normalized title; equal titles are revisions of one document */
	title: string;
	/** Version token as written, e.g. "06" or "2.5" */
	versionRaw: string;
	/** Float projection of versionRaw */
	versionNumeric: number;
	sourceFilename: string;
	/** Business document number from the first page, when present */
	docNumber: string | null;
	versionSource: VersionSource;
}

export interface ResolveIdentityOptions {
	/** Text of the document's first page, before cleaning */
	firstPageText?: string;
	logger?: Logger;
}

/**
 * Resolve title and version from a filename, falling back to the first-page
 * text and finally to version 1.0.
 *
 * Never throws: ambiguous input degrades to defaults with a warning.
 */
export function resolveIdentity(
	filename: string,
	options: ResolveIdentityOptions = {},
): DocumentIdentity {
	const {firstPageText, logger} = options;
	const sourceFilename = path.basename(filename);
	const extension = path.extname(sourceFilename);
	const rawStem = sourceFilename.slice(
		0,
		sourceFilename.length - extension.length,
	);

	const stem = stripDuplicateMarkers(stripExportTimestamp(rawStem.trim()));
	const docNumber = firstPageText ? extractDocNumber(firstPageText) : null;

	let title = stem;
	let versionRaw = DEFAULT_VERSION;
	let versionSource: VersionSource = 'default';

	const explicit = findExplicitVersion(stem);
	const implicit = explicit ? null : findImplicitVersion(stem);
	const contentVersion =
		explicit || implicit || !firstPageText
			? null
			: extractContentVersion(firstPageText);

	if (explicit) {
		title = explicit.title;
		versionRaw = explicit.versionRaw;
		versionSource = 'explicit';
	} else if (implicit) {
		title = implicit.title;
		versionRaw = implicit.versionRaw;
		versionSource = 'implicit';
	} else if (contentVersion) {
		versionRaw = contentVersion;
		versionSource = 'content';
	} else {
		logger?.warn('Resolver', 'No version found, defaulting to 1.0', {
			sourceFilename,
		});
	}

	let normalizedTitle = normalizeTitle(title);
	if (normalizedTitle.length === 0) {
		normalizedTitle = normalizeTitle(stem) || sourceFilename;
		logger?.warn('Resolver', 'Empty title before version marker', {
			sourceFilename,
			title: normalizedTitle,
		});
	}

	const identity: DocumentIdentity = {
		title: normalizedTitle,
		versionRaw,
		versionNumeric: normalizeVersion(versionRaw, logger),
		sourceFilename,
		docNumber,
		versionSource,
	};

	logger?.debug('Resolver', 'Resolved identity', identity);
	return identity;
}
