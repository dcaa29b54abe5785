/**
 * Embeddings module for generating vector embeddings.
 */

import type {SopRagConfig} from '../config/index.js';
import {MockEmbeddingProvider} from './mock.js';
import {OpenAIEmbeddingProvider} from './openai.js';
import type {EmbeddingCallbacks, EmbeddingProvider} from './types.js';

export {MockEmbeddingProvider} from './mock.js';
export {OpenAIEmbeddingProvider} from './openai.js';
export type {OpenAIEmbeddingOptions} from './openai.js';
export type {EmbeddingCallbacks, EmbeddingProvider} from './types.js';

/**
 * Create the embedding provider named by the config.
 * The OpenAI key comes from OPENAI_API_KEY.
 */
export function createEmbeddingProvider(
	config: SopRagConfig,
	env: NodeJS.ProcessEnv = process.env,
	callbacks?: EmbeddingCallbacks,
): EmbeddingProvider {
	switch (config.embeddingProvider) {
		case 'mock':
			return new MockEmbeddingProvider(config.embeddingDimensions);
		case 'openai':
			return new OpenAIEmbeddingProvider(env['OPENAI_API_KEY'], {
				model: config.embeddingModel,
				dimensions: config.embeddingDimensions,
				baseUrl: config.openaiBaseUrl,
				callbacks,
			});
	}
}
