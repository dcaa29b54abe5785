import fs from 'node:fs';
import path from 'node:path';
import {getLogsDir} from '../constants.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
	debug(component: string, message: string, data?: object): void;
	info(component: string, message: string, data?: object): void;
	warn(component: string, message: string, data?: object): void;
	error(component: string, message: string, error?: Error): void;
}

export interface LogEntry {
	timestamp: Date;
	level: LogLevel;
	/** Emitting component, e.g. "Gateway" */
	component: string;
	message: string;
	/** Structured data, or the error for error entries */
	extra?: object | Error;
}

/**
 * Destination for entries that passed the level threshold.
 */
export type LogSink = (entry: LogEntry) => void;

const LEVEL_ORDER: Record<LogLevel, number> = {
	debug: 0,
	info: 1,
	warn: 2,
	error: 3,
};

/**
 * Get the path to the log file for a day (UTC).
 */
export function getLogPath(projectRoot: string, day: Date = new Date()): string {
	const date = day.toISOString().split('T')[0]; // YYYY-MM-DD
	return path.join(getLogsDir(projectRoot), `${date}.log`);
}

/**
 * Render an entry as `[timestamp] [LEVEL] Component: message`, followed by
 * an indented JSON line or the error message and stack.
 */
export function formatEntry(entry: LogEntry): string {
	const levelStr = entry.level.toUpperCase().padEnd(5);
	let line = `[${entry.timestamp.toISOString()}] [${levelStr}] ${entry.component}: ${entry.message}`;

	const {extra} = entry;
	if (extra instanceof Error) {
		line += `\n  Error: ${extra.message}`;
		if (extra.stack) {
			line += `\n  Stack: ${extra.stack}`;
		}
	} else if (extra) {
		line += `\n  ${JSON.stringify(extra)}`;
	}

	return line;
}

/**
 * Logger that forwards entries at or above `minLevel` to a sink.
 */
export function createSinkLogger(sink: LogSink, minLevel: LogLevel = 'debug'): Logger {
	const threshold = LEVEL_ORDER[minLevel];
	const emit = (
		level: LogLevel,
		component: string,
		message: string,
		extra?: object | Error,
	): void => {
		if (LEVEL_ORDER[level] < threshold) return;
		sink({timestamp: new Date(), level, component, message, extra});
	};

	return {
		debug: (component, message, data) => emit('debug', component, message, data),
		info: (component, message, data) => emit('info', component, message, data),
		warn: (component, message, data) => emit('warn', component, message, data),
		error: (component, message, error) => emit('error', component, message, error),
	};
}

/**
 * Create a logger that appends to daily files under .sop-rag/logs/.
 * The directory is created on the first write.
 */
export function createLogger(
	projectRoot: string,
	minLevel: LogLevel = 'info',
): Logger {
	let dirReady = false;

	return createSinkLogger(entry => {
		if (!dirReady) {
			fs.mkdirSync(getLogsDir(projectRoot), {recursive: true});
			dirReady = true;
		}
		fs.appendFileSync(
			getLogPath(projectRoot, entry.timestamp),
			formatEntry(entry) + '\n',
		);
	}, minLevel);
}

/**
 * Logger keeping its entries in memory, for embedders that ship logs
 * elsewhere.
 */
export interface MemoryLogger extends Logger {
	readonly entries: LogEntry[];
	clear(): void;
}

export function createMemoryLogger(minLevel: LogLevel = 'debug'): MemoryLogger {
	const entries: LogEntry[] = [];
	return {
		...createSinkLogger(entry => {
			entries.push(entry);
		}, minLevel),
		entries,
		clear() {
			entries.length = 0;
		},
	};
}

/**
 * Create a no-op logger for testing or when logging is disabled.
 */
export function createNullLogger(): Logger {
	return {
		debug() {},
		info() {},
		warn() {},
		error() {},
	};
}
