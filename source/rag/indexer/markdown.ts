import {GENERAL_SECTION} from '../constants.js';
import type {ParsedPage, StructuralBlock} from './types.js';

export const MARKDOWN_HEADING = /^\s{0,3}(#{1,6})\s+(.+?)\s*#*\s*$/;

interface HeadingEntry {
	level: number;
	title: string;
}

/**
 * Split pages along markdown headings.
 *
 * Each heading opens a new block that includes the heading line. The
 * breadcrumb is a level stack carried across page boundaries, so a section
 * continuing onto the next page keeps its path. Text before any heading
 * sits under "General Section".
 */
export function splitByHeadings(
	pages: readonly ParsedPage[],
	documentKey: string,
): StructuralBlock[] {
	const blocks: StructuralBlock[] = [];
	const stack: HeadingEntry[] = [];

	const currentPath = (): string[] =>
		stack.length > 0 ? stack.map(entry => entry.title) : [GENERAL_SECTION];

	for (const page of pages) {
		let lines: string[] = [];

		const flush = () => {
			const text = lines.join('\n').trim();
			if (text.length > 0) {
				blocks.push({
					documentKey,
					text,
					sectionPath: currentPath(),
					pageLabel: page.pageLabel,
				});
			}
			lines = [];
		};

		for (const line of page.text.split('\n')) {
			const match = MARKDOWN_HEADING.exec(line);
			if (match?.[1] && match[2]) {
				flush();
				const level = match[1].length;
				while (stack.length > 0 && (stack[stack.length - 1]?.level ?? 0) >= level) {
					stack.pop();
				}
				stack.push({level, title: match[2].trim()});
			}
			lines.push(line);
		}

		flush();
	}

	return blocks;
}
