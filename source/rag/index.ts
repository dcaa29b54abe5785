/**
 * SOP RAG Core
 *
 * Versioned SOP ingestion with Active-only hybrid retrieval (vector + BM25).
 */

// Constants
export {
	DATA_DIR,
	getDataDir,
	getConfigPath,
	getLanceDbPath,
	getLogsDir,
	TABLE_NAMES,
	PASSAGE_STATUS,
	GENERAL_SECTION,
	DEFAULT_EMBEDDING_DIMENSIONS,
	TEXT_EXTENSIONS,
	type PassageStatus,
} from './constants.js';

// Logger
export {
	createLogger,
	createMemoryLogger,
	createNullLogger,
	createSinkLogger,
	formatEntry,
	getLogPath,
	type LogEntry,
	type Logger,
	type LogLevel,
	type LogSink,
	type MemoryLogger,
} from './logger/index.js';

// Errors
export {
	ConfigError,
	StoreSchemaError,
	StoreNotConnectedError,
	TimeoutError,
	toError,
} from './errors.js';
export {
	withRetry,
	withTimeout,
	guardedCall,
	type RetryOptions,
	type GuardOptions,
} from './retry.js';

// Config
export {
	loadConfig,
	saveConfig,
	configExists,
	resolveConfig,
	applyEnvOverrides,
	DEFAULT_CONFIG,
	DEFAULT_STOP_WORDS,
	type SopRagConfig,
	type ChunkingConfig,
	type RetrievalConfig,
	type DiscoveryConfig,
	type StoreConfig,
	type ArbitrationConfig,
	type EmbeddingProviderType,
} from './config/index.js';

// Identity
export {
	resolveIdentity,
	normalizeVersion,
	extractDocNumber,
	extractContentVersion,
	DEFAULT_VERSION,
	type DocumentIdentity,
	type VersionSource,
} from './identity/index.js';

// Cleaning
export {
	cleanText,
	cleanPages,
	applyRule,
	DEFAULT_CLEANING_RULES,
	type CleaningRule,
} from './cleaner/rules.js';

// Storage
export {
	LancePassageStore,
	MemoryPassageStore,
	createPassagesSchema,
	buildWhereClause,
	matchesFilter,
	type Passage,
	type EmbeddedPassage,
	type ScoredPassage,
	type PassageFilter,
	type PassageStore,
} from './storage/index.js';
export {computePassageId, computeStringHash} from './hash.js';
export {foldAccents, foldWithOffsets, type FoldedText} from './text.js';

// Versioning
export {
	decideVersionStatus,
	resolveVersionStatus,
	documentKeyFilter,
	type VersionDecision,
	type DecisionReason,
	type ArbitrationResult,
} from './versioning/arbitration.js';
export {KeyedMutex} from './versioning/keyed-mutex.js';

// Gateway
export {
	IndexGateway,
	type InsertResult,
	type InsertFailureReason,
	type DocumentSummary,
	type StatusChange,
} from './gateway/index.js';

// Indexer (Chunking & Orchestration)
export {
	Chunker,
	Indexer,
	TextDocumentParser,
	createEmptyIngestStats,
	type DocumentParser,
	type FileIngestResult,
	type IngestStats,
	type ParsedPage,
	type ProgressCallback,
} from './indexer/index.js';

// Embeddings
export {
	createEmbeddingProvider,
	MockEmbeddingProvider,
	OpenAIEmbeddingProvider,
	type EmbeddingProvider,
} from './embeddings/index.js';

// Retrieval
export {
	RetrievalEngine,
	formatCitations,
	fuseScores,
	normalizeQueryTerms,
	type AnswerHit,
	type AnswerOptions,
	type AnswerRetrieval,
	type CitationRow,
	type DiscoveryGroup,
	type DiscoveryOptions,
	type KeywordDiscovery,
} from './search/index.js';

// Wiring
export {createPipeline, type Pipeline, type PipelineOptions} from './pipeline.js';
