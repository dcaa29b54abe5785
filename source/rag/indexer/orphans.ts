import {MARKDOWN_HEADING} from './markdown.js';
import type {StructuralBlock} from './types.js';

/** "2.0 Scope", "4.1.2 Cleaning Agents" */
const NUMBERED_HEADING = /^\s*\d+(?:\.\d+)*\.?\s+[A-Z]/;

const MAX_HEADING_LENGTH = 120;

/**
 * Markdown heading, or a short numbered line that doesn't end like a
 * sentence. Numbered list items ending in a period are body text.
 */
export function isHeadingLine(line: string): boolean {
	const trimmed = line.trim();
	if (trimmed.length === 0 || trimmed.length > MAX_HEADING_LENGTH) return false;
	if (MARKDOWN_HEADING.test(trimmed)) return true;
	return NUMBERED_HEADING.test(trimmed) && !/[.;,]$/.test(trimmed);
}

/**
 * Move trailing heading lines of each block to the start of the next block
 * of the same document. Blocks left empty are dropped.
 *
 * Must run on bodies before the citation header is added.
 */
export function repairOrphanHeaders(
	blocks: readonly StructuralBlock[],
): StructuralBlock[] {
	const repaired = blocks.map(block => ({
		...block,
		sectionPath: [...block.sectionPath],
	}));

	for (let i = 0; i < repaired.length - 1; i++) {
		const current = repaired[i];
		const next = repaired[i + 1];
		if (!current || !next || current.documentKey !== next.documentKey) {
			continue;
		}

		const lines = current.text.trimEnd().split('\n');
		const moved: string[] = [];
		while (lines.length > 0) {
			const last = lines[lines.length - 1] ?? '';
			if (last.trim().length === 0 && moved.length > 0) {
				lines.pop();
				continue;
			}
			if (!isHeadingLine(last)) break;
			moved.unshift(last.trim());
			lines.pop();
		}

		if (moved.length > 0) {
			current.text = lines.join('\n').trim();
			next.text = [...moved, next.text].join('\n');
		}
	}

	return repaired.filter(block => block.text.trim().length > 0);
}
