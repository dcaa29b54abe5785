import fs from 'node:fs/promises';
import {TEXT_EXTENSIONS} from '../constants.js';
import type {ParsedPage} from './types.js';

/**
 * Turns one source file into ordered pages of marked-up text.
 * Binary formats (PDF, DOCX, scans) are handled by an external parser
 * implementing this interface.
 */
export interface DocumentParser {
	/** Lowercase extensions with the leading dot */
	readonly extensions: readonly string[];
	parse(filePath: string): Promise<ParsedPage[]>;
}

/**
 * Parser for markdown and plain-text exports.
 * Pages are separated by form feeds and labelled by position from 1.
 */
export class TextDocumentParser implements DocumentParser {
	readonly extensions: readonly string[];

	constructor(extensions: readonly string[] = TEXT_EXTENSIONS) {
		this.extensions = extensions;
	}

	async parse(filePath: string): Promise<ParsedPage[]> {
		const content = await fs.readFile(filePath, 'utf-8');
		return splitPages(content);
	}
}

/**
 * Split text on form feeds. Blank pages are dropped but still counted, so
 * labels match the printed page numbers.
 */
export function splitPages(content: string): ParsedPage[] {
	const pages: ParsedPage[] = [];
	content.split('\f').forEach((text, index) => {
		if (text.trim().length > 0) {
			pages.push({text, pageLabel: String(index + 1)});
		}
	});
	return pages;
}
