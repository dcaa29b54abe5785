import {createHash} from 'node:crypto';

/**
 * Compute SHA256 hash of a string.
 */
export function computeStringHash(content: string): string {
	return createHash('sha256').update(content).digest('hex');
}

/**
 * Deterministic passage id for one position of one document revision.
 * Re-ingesting the same revision reproduces the same ids.
 */
export function computePassageId(
	title: string,
	docNumber: string | null,
	versionRaw: string,
	index: number,
): string {
	return computeStringHash(
		[title, docNumber ?? '', versionRaw, String(index)].join('\u0000'),
	);
}
