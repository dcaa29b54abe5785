import {createHash} from 'node:crypto';
import {DEFAULT_EMBEDDING_DIMENSIONS} from '../constants.js';
import type {EmbeddingProvider} from './types.js';

/**
 * Offline provider: each text maps to a unit vector drawn from SHA-256
 * digests of the text. Equal texts get equal vectors; nothing else about
 * the vectors carries meaning.
 */
export class MockEmbeddingProvider implements EmbeddingProvider {
	readonly dimensions: number;

	constructor(dimensions: number = DEFAULT_EMBEDDING_DIMENSIONS) {
		this.dimensions = dimensions;
	}

	async initialize(): Promise<void> {}

	async embed(texts: string[]): Promise<number[][]> {
		return texts.map(text => this.vectorFor(text));
	}

	async embedSingle(text: string): Promise<number[]> {
		return this.vectorFor(text);
	}

	close(): void {}

	private vectorFor(text: string): number[] {
		const raw: number[] = [];
		// 8 components per 32-byte digest
		for (let block = 0; raw.length < this.dimensions; block++) {
			const digest = createHash('sha256')
				.update(`${block}:${text}`)
				.digest();
			for (let offset = 0; offset < 32 && raw.length < this.dimensions; offset += 4) {
				raw.push((digest.readUInt32BE(offset) / 0xffffffff) * 2 - 1);
			}
		}

		const norm = Math.hypot(...raw);
		return raw.map(v => (norm > 0 ? v / norm : 0));
	}
}
