import fs from 'node:fs/promises';
import {z} from 'zod';
import {
	DEFAULT_EMBEDDING_DIMENSIONS,
	getConfigPath,
	getDataDir,
} from '../constants.js';
import {ConfigError} from '../errors.js';

// ============================================================================
// Schema
// ============================================================================

export const EMBEDDING_PROVIDERS = ['openai', 'mock'] as const;
export type EmbeddingProviderType = (typeof EMBEDDING_PROVIDERS)[number];

const chunkingSchema = z.object({
	/** Blocks longer than this are sub-split (body characters) */
	maxBlockChars: z.number().int().positive(),
	/** Target size of sub-split passages */
	chunkSize: z.number().int().positive(),
	/** Characters carried over between sub-split passages */
	chunkOverlap: z.number().int().min(0),
	/** Passages with a shorter body are dropped */
	minContentChars: z.number().int().min(0),
	/** Bodies consisting only of one of these phrases are dropped */
	boilerplatePhrases: z.array(z.string()),
});

const retrievalSchema = z.object({
	/** Dense weight in hybrid fusion; sparse weight is 1 - alpha */
	alpha: z.number().min(0).max(1),
	topK: z.number().int().positive(),
	/** Fused scores below this are discarded */
	relevanceFloor: z.number().min(0).max(1),
	/** Candidates fetched per signal = topK * candidateMultiplier */
	candidateMultiplier: z.number().int().positive(),
});

const discoverySchema = z.object({
	candidateLimit: z.number().int().positive(),
	snippetWindow: z.number().int().positive(),
	maxSnippets: z.number().int().positive(),
	stopWords: z.array(z.string()),
});

const storeSchema = z.object({
	maxAttempts: z.number().int().positive(),
	initialBackoffMs: z.number().int().min(0),
	maxBackoffMs: z.number().int().min(0),
	timeoutMs: z.number().int().positive(),
});

const arbitrationSchema = z.object({
	/**
	 * What to do when the existence check cannot reach the store.
	 * - block: refuse the insert
	 * - inactive: store the batch Inactive, retire nothing
	 */
	onStoreUnavailable: z.enum(['block', 'inactive']),
});

export const configSchema = z
	.object({
		version: z.number().int().positive(),
		embeddingProvider: z.enum(EMBEDDING_PROVIDERS),
		embeddingModel: z.string().min(1),
		embeddingDimensions: z.number().int().positive(),
		openaiBaseUrl: z.string().url().optional(),
		extensions: z.array(z.string()),
		chunking: chunkingSchema,
		retrieval: retrievalSchema,
		discovery: discoverySchema,
		store: storeSchema,
		arbitration: arbitrationSchema,
	})
	.superRefine((config, ctx) => {
		const {chunkSize, chunkOverlap, maxBlockChars} = config.chunking;
		if (chunkOverlap >= chunkSize) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				path: ['chunking', 'chunkOverlap'],
				message: 'chunkOverlap must be smaller than chunkSize',
			});
		}
		if (chunkSize > maxBlockChars) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				path: ['chunking', 'chunkSize'],
				message: 'chunkSize must not exceed maxBlockChars',
			});
		}
	});

export type SopRagConfig = z.infer<typeof configSchema>;
export type ChunkingConfig = SopRagConfig['chunking'];
export type RetrievalConfig = SopRagConfig['retrieval'];
export type DiscoveryConfig = SopRagConfig['discovery'];
export type StoreConfig = SopRagConfig['store'];
export type ArbitrationConfig = SopRagConfig['arbitration'];

// ============================================================================
// Defaults
// ============================================================================

/**
 * Words dropped from keyword discovery queries.
 */
export const DEFAULT_STOP_WORDS = [
	'a',
	'an',
	'and',
	'are',
	'as',
	'at',
	'be',
	'by',
	'do',
	'does',
	'for',
	'from',
	'how',
	'in',
	'is',
	'it',
	'of',
	'on',
	'or',
	'that',
	'the',
	'this',
	'to',
	'what',
	'when',
	'where',
	'which',
	'who',
	'with',
];

export const DEFAULT_CONFIG: SopRagConfig = {
	version: 1,
	embeddingProvider: 'openai',
	embeddingModel: 'text-embedding-3-small',
	embeddingDimensions: DEFAULT_EMBEDDING_DIMENSIONS,
	extensions: ['.md', '.markdown', '.txt'],
	chunking: {
		maxBlockChars: 2000,
		chunkSize: 1024,
		chunkOverlap: 200,
		minContentChars: 50,
		boilerplatePhrases: ['not applicable', 'none', 'n/a', 'na', 'nil'],
	},
	retrieval: {
		alpha: 0.5,
		topK: 7,
		relevanceFloor: 0.1,
		candidateMultiplier: 3,
	},
	discovery: {
		candidateLimit: 100,
		snippetWindow: 60,
		maxSnippets: 3,
		stopWords: DEFAULT_STOP_WORDS,
	},
	store: {
		maxAttempts: 4,
		initialBackoffMs: 250,
		maxBackoffMs: 5000,
		timeoutMs: 30_000,
	},
	arbitration: {
		onStoreUnavailable: 'block',
	},
};

// ============================================================================
// Merge & Validate
// ============================================================================

type PartialConfig = Partial<
	Omit<
		SopRagConfig,
		'chunking' | 'retrieval' | 'discovery' | 'store' | 'arbitration'
	>
> & {
	chunking?: Partial<ChunkingConfig>;
	retrieval?: Partial<RetrievalConfig>;
	discovery?: Partial<DiscoveryConfig>;
	store?: Partial<StoreConfig>;
	arbitration?: Partial<ArbitrationConfig>;
};

/**
 * Merge a partial config over the defaults, section by section, and validate.
 * @throws ConfigError when the result is invalid
 */
export function resolveConfig(
	partial: PartialConfig = {},
	base: SopRagConfig = DEFAULT_CONFIG,
): SopRagConfig {
	const merged = {
		...base,
		...partial,
		chunking: {...base.chunking, ...partial.chunking},
		retrieval: {...base.retrieval, ...partial.retrieval},
		discovery: {...base.discovery, ...partial.discovery},
		store: {...base.store, ...partial.store},
		arbitration: {...base.arbitration, ...partial.arbitration},
	};

	const result = configSchema.safeParse(merged);
	if (!result.success) {
		throw new ConfigError(
			'Invalid configuration',
			result.error.issues.map(
				issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`,
			),
		);
	}
	return result.data;
}

/**
 * Apply environment overrides on top of a config.
 * @throws ConfigError when an override is not a valid value
 */
export function applyEnvOverrides(
	config: SopRagConfig,
	env: NodeJS.ProcessEnv = process.env,
): SopRagConfig {
	const retrieval: Partial<RetrievalConfig> = {};
	const chunking: Partial<ChunkingConfig> = {};
	const discovery: Partial<DiscoveryConfig> = {};
	const arbitration: Partial<ArbitrationConfig> = {};

	const alpha = readNumber(env, 'SOP_RAG_ALPHA');
	if (alpha !== undefined) retrieval.alpha = alpha;
	const topK = readNumber(env, 'SOP_RAG_TOP_K');
	if (topK !== undefined) retrieval.topK = topK;
	const floor = readNumber(env, 'SOP_RAG_RELEVANCE_FLOOR');
	if (floor !== undefined) retrieval.relevanceFloor = floor;

	const chunkSize = readNumber(env, 'SOP_RAG_CHUNK_SIZE');
	if (chunkSize !== undefined) chunking.chunkSize = chunkSize;
	const chunkOverlap = readNumber(env, 'SOP_RAG_CHUNK_OVERLAP');
	if (chunkOverlap !== undefined) chunking.chunkOverlap = chunkOverlap;

	const stopWords = env['SOP_RAG_STOP_WORDS'];
	if (stopWords !== undefined && stopWords.trim().length > 0) {
		discovery.stopWords = stopWords
			.split(',')
			.map(word => word.trim().toLowerCase())
			.filter(word => word.length > 0);
	}

	const policy = env['SOP_RAG_ON_STORE_UNAVAILABLE'];
	if (policy !== undefined && policy.trim().length > 0) {
		if (policy !== 'block' && policy !== 'inactive') {
			throw new ConfigError('Invalid SOP_RAG_ON_STORE_UNAVAILABLE', [
				`expected "block" or "inactive", got "${policy}"`,
			]);
		}
		arbitration.onStoreUnavailable = policy;
	}

	return resolveConfig({retrieval, chunking, discovery, arbitration}, config);
}

function readNumber(env: NodeJS.ProcessEnv, name: string): number | undefined {
	const raw = env[name];
	if (raw === undefined || raw.trim().length === 0) return undefined;
	const value = Number(raw);
	if (!Number.isFinite(value)) {
		throw new ConfigError(`Invalid ${name}`, [`"${raw}" is not a number`]);
	}
	return value;
}

// ============================================================================
// Config I/O
// ============================================================================

/**
 * Load config from disk, merging with defaults, then apply environment
 * overrides. Returns the defaults (plus overrides) if no config file exists.
 *
 * A config file that exists but can't be parsed or validated is an error,
 * never a silent fallback: the embedding dimensions depend on it.
 */
export async function loadConfig(
	projectRoot: string,
	env: NodeJS.ProcessEnv = process.env,
): Promise<SopRagConfig> {
	const configPath = getConfigPath(projectRoot);

	let content: string | null = null;
	try {
		content = await fs.readFile(configPath, 'utf-8');
	} catch {
		content = null;
	}

	if (content === null) {
		return applyEnvOverrides(DEFAULT_CONFIG, env);
	}

	let loaded: unknown;
	try {
		loaded = JSON.parse(content);
	} catch (parseError) {
		throw new ConfigError(`Invalid config.json at ${configPath}`, [
			parseError instanceof Error ? parseError.message : String(parseError),
		]);
	}

	if (typeof loaded !== 'object' || loaded === null || Array.isArray(loaded)) {
		throw new ConfigError(`Invalid config.json at ${configPath}`, [
			'expected a JSON object',
		]);
	}

	const partial = partialConfigSchema.safeParse(loaded);
	if (!partial.success) {
		throw new ConfigError(
			`Invalid config.json at ${configPath}`,
			partial.error.issues.map(
				issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`,
			),
		);
	}

	return applyEnvOverrides(resolveConfig(partial.data), env);
}

/**
 * Save config to disk.
 * Creates the data directory if it doesn't exist.
 */
export async function saveConfig(
	projectRoot: string,
	config: SopRagConfig,
): Promise<void> {
	await fs.mkdir(getDataDir(projectRoot), {recursive: true});

	const configPath = getConfigPath(projectRoot);
	await fs.writeFile(configPath, JSON.stringify(config, null, '\t') + '\n');
}

/**
 * Check if a config file exists.
 */
export async function configExists(projectRoot: string): Promise<boolean> {
	const configPath = getConfigPath(projectRoot);
	try {
		await fs.access(configPath);
		return true;
	} catch {
		return false;
	}
}

const partialConfigSchema = z.object({
	version: z.number().int().positive().optional(),
	embeddingProvider: z.enum(EMBEDDING_PROVIDERS).optional(),
	embeddingModel: z.string().min(1).optional(),
	embeddingDimensions: z.number().int().positive().optional(),
	openaiBaseUrl: z.string().url().optional(),
	extensions: z.array(z.string()).optional(),
	chunking: chunkingSchema.partial().optional(),
	retrieval: retrievalSchema.partial().optional(),
	discovery: discoverySchema.partial().optional(),
	store: storeSchema.partial().optional(),
	arbitration: arbitrationSchema.partial().optional(),
});
