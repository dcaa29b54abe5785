import {getLanceDbPath} from './constants.js';
import {loadConfig, type SopRagConfig} from './config/index.js';
import {createEmbeddingProvider} from './embeddings/index.js';
import type {EmbeddingProvider} from './embeddings/types.js';
import {ConfigError} from './errors.js';
import {IndexGateway} from './gateway/index.js';
import {Indexer} from './indexer/indexer.js';
import {TextDocumentParser, type DocumentParser} from './indexer/parser.js';
import {createLogger, type Logger} from './logger/index.js';
import {RetrievalEngine} from './search/index.js';
import {LancePassageStore} from './storage/index.js';
import type {PassageStore} from './storage/types.js';

export interface PipelineOptions {
	/** Defaults to loadConfig(projectRoot) */
	config?: SopRagConfig;
	/** Defaults to a LanceDB store under the data directory */
	store?: PassageStore;
	/** Defaults to the provider named by the config */
	embeddings?: EmbeddingProvider;
	/** Defaults to the text parser over the configured extensions */
	parser?: DocumentParser;
	/** Defaults to the file logger */
	logger?: Logger;
	env?: NodeJS.ProcessEnv;
}

/**
 * Connected components sharing one store, provider and config.
 */
export interface Pipeline {
	config: SopRagConfig;
	store: PassageStore;
	embeddings: EmbeddingProvider;
	gateway: IndexGateway;
	retrieval: RetrievalEngine;
	indexer: Indexer;
	close(): void;
}

/**
 * Build and connect the pipeline for a project.
 *
 * @throws ConfigError when the provider's dimensions disagree with the config
 * @throws StoreSchemaError when the stored table does not match
 */
export async function createPipeline(
	projectRoot: string,
	options: PipelineOptions = {},
): Promise<Pipeline> {
	const env = options.env ?? process.env;
	const config = options.config ?? (await loadConfig(projectRoot, env));
	const logger = options.logger ?? createLogger(projectRoot);

	const embeddings =
		options.embeddings ?? createEmbeddingProvider(config, env);
	if (embeddings.dimensions !== config.embeddingDimensions) {
		throw new ConfigError('Embedding dimensions mismatch', [
			`provider produces ${embeddings.dimensions}, config expects ${config.embeddingDimensions}`,
		]);
	}
	await embeddings.initialize();

	const store =
		options.store ??
		new LancePassageStore(
			getLanceDbPath(projectRoot),
			config.embeddingDimensions,
			logger,
		);
	await store.connect();

	const gateway = new IndexGateway(
		store,
		embeddings,
		{store: config.store, arbitration: config.arbitration},
		logger,
	);
	const retrieval = new RetrievalEngine(
		store,
		embeddings,
		{
			retrieval: config.retrieval,
			discovery: config.discovery,
			store: config.store,
		},
		logger,
	);
	const indexer = new Indexer(
		gateway,
		{
			chunking: config.chunking,
			parser: options.parser ?? new TextDocumentParser(config.extensions),
		},
		logger,
	);

	logger.info('Pipeline', 'Pipeline ready', {
		embeddingProvider: config.embeddingProvider,
		dimensions: config.embeddingDimensions,
	});

	return {
		config,
		store,
		embeddings,
		gateway,
		retrieval,
		indexer,
		close() {
			store.close();
			embeddings.close();
			logger.info('Pipeline', 'Pipeline closed');
		},
	};
}
