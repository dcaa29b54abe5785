/**
 * Error types raised by the pipeline.
 *
 * Expected outcomes (empty batches, version downgrades, unreachable stores
 * during ingestion or retrieval) are reported as result values instead.
 */

/**
 * Configuration file or environment override failed validation.
 */
export class ConfigError extends Error {
	readonly issues: string[];

	constructor(message: string, issues: string[] = []) {
		super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
		this.name = 'ConfigError';
		this.issues = issues;
	}
}

/**
 * The stored table does not match the expected schema or vector dimensions.
 * Raised from connect(), before any write happens.
 */
export class StoreSchemaError extends Error {
	readonly table: string;
	readonly expectedDimensions: number;
	readonly actualDimensions: number | null;
	readonly missingColumns: string[];

	constructor(args: {
		table: string;
		expectedDimensions: number;
		actualDimensions: number | null;
		missingColumns: string[];
	}) {
		const problems: string[] = [];
		if (args.actualDimensions !== args.expectedDimensions) {
			problems.push(
				`vector dimensions ${args.actualDimensions ?? 'unknown'} != ${args.expectedDimensions}`,
			);
		}
		if (args.missingColumns.length > 0) {
			problems.push(`missing columns: ${args.missingColumns.join(', ')}`);
		}
		super(`Schema mismatch for table "${args.table}": ${problems.join('; ')}`);
		this.name = 'StoreSchemaError';
		this.table = args.table;
		this.expectedDimensions = args.expectedDimensions;
		this.actualDimensions = args.actualDimensions;
		this.missingColumns = args.missingColumns;
	}
}

export class StoreNotConnectedError extends Error {
	constructor() {
		super('Store not connected. Call connect() first.');
		this.name = 'StoreNotConnectedError';
	}
}

export class TimeoutError extends Error {
	readonly label: string;
	readonly timeoutMs: number;

	constructor(label: string, timeoutMs: number) {
		super(`${label} timed out after ${timeoutMs}ms`);
		this.name = 'TimeoutError';
		this.label = label;
		this.timeoutMs = timeoutMs;
	}
}

/**
 * Render an unknown thrown value as an Error.
 */
export function toError(value: unknown): Error {
	if (value instanceof Error) return value;
	return new Error(typeof value === 'string' ? value : String(value));
}
