/**
 * Logger - File-based logging with daily and hourly rotation.
 *
 * Provides multiple logger implementations:
 * - createLogger: Daily log files in a given directory
 * - createServiceLogger: Per-service hourly rotation under the home dir
 * - createNullLogger: No-op, the library default
 */

import fs from 'node:fs';
import path from 'node:path';
import {
	getServiceLogPath,
	getServiceLogsDir,
	type ServiceName,
} from './constants.js';

// ============================================================================
// Types
// ============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
	debug(component: string, message: string, data?: object): void;
	info(component: string, message: string, data?: object): void;
	warn(component: string, message: string, data?: object): void;
	error(component: string, message: string, error?: Error): void;
}

// ============================================================================
// Formatting
// ============================================================================

/**
 * Get the path to today's log file inside a logs directory.
 */
export function getLogPath(logsDir: string): string {
	const date = new Date().toISOString().split('T')[0]; // YYYY-MM-DD
	return path.join(logsDir, `${date}.log`);
}

/**
 * Format a log entry.
 */
export function formatEntry(
	level: LogLevel,
	component: string,
	message: string,
	extra?: object | Error,
): string {
	const timestamp = new Date().toISOString();
	const levelStr = level.toUpperCase().padEnd(5);
	let entry = `[${timestamp}] [${levelStr}] ${component}: ${message}`;

	if (extra) {
		if (extra instanceof Error) {
			entry += `\n  Error: ${extra.message}`;
			if (extra.stack) {
				entry += `\n  Stack: ${extra.stack}`;
			}
		} else {
			entry += `\n  ${JSON.stringify(extra)}`;
		}
	}

	return entry;
}

function fromWriter(write: (entry: string) => void): Logger {
	return {
		debug(component: string, message: string, data?: object) {
			write(formatEntry('debug', component, message, data));
		},

		info(component: string, message: string, data?: object) {
			write(formatEntry('info', component, message, data));
		},

		warn(component: string, message: string, data?: object) {
			write(formatEntry('warn', component, message, data));
		},

		error(component: string, message: string, error?: Error) {
			write(formatEntry('error', component, message, error));
		},
	};
}

// ============================================================================
// Logger Implementations
// ============================================================================

/**
 * Create a logger that writes to daily log files in `logsDir`.
 */
export function createLogger(logsDir: string): Logger {
	let initialized = false;

	function ensureDir() {
		if (!initialized) {
			fs.mkdirSync(logsDir, {recursive: true});
			initialized = true;
		}
	}

	return fromWriter(entry => {
		ensureDir();
		fs.appendFileSync(getLogPath(logsDir), entry + '\n');
	});
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

/**
 * Create a service-specific logger with hourly rotation.
 *
 * Logs are written to: {home}/logs/{service}/YYYY-MM-DD-HH.log
 *
 * @example
 * const logger = createServiceLogger('cli');
 * logger.error('RankCommand', 'Ranking failed', error);
 */
export function createServiceLogger(service: ServiceName): Logger {
	return fromWriter(entry => {
		try {
			fs.mkdirSync(getServiceLogsDir(service), {recursive: true});
			// Recalculated each write for rotation
			fs.appendFileSync(getServiceLogPath(service), entry + '\n');
		} catch (error) {
			// Logging failures never reach the caller
			process.emitWarning(
				`peer-rank: could not write ${service} log: ${error instanceof Error ? error.message : String(error)}`,
			);
		}
	});
}

export type {ServiceName};
