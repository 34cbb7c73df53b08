/**
 * CLI Error Handler
 *
 * Centralized error handling for the CLI with logging to:
 * - Console (stderr) - immediate visibility
 * - {home}/logs/cli/ - persistent log with hourly rotation
 */

import {createServiceLogger, type Logger} from '../../lib/logger.js';
import {isAbortError} from '../../lib/abort.js';
import {PeerRankError} from '../../lib/errors.js';

/**
 * Create the CLI logger.
 * Writes to {home}/logs/cli/YYYY-MM-DD-HH.log
 */
export function createCliLogger(): Logger {
	return createServiceLogger('cli');
}

/**
 * Errors caused by user input or cancellation: print the message only, no stack.
 */
export function isExpectedError(error: unknown): boolean {
	if (error instanceof PeerRankError || isAbortError(error)) return true;
	const message = error instanceof Error ? error.message : String(error);
	return message.includes('ENOENT') || message.includes('EACCES');
}

/**
 * Handle a CLI error with full logging.
 *
 * @param component - Component or context name (e.g., 'RankCommand')
 * @param error - The error that occurred
 * @param logger - Optional logger instance
 * @param write - Where console output goes (default: stderr)
 */
export function handleCliError(
	component: string,
	error: unknown,
	logger?: Logger | null,
	write: (line: string) => void = line => console.error(line),
): void {
	const message = error instanceof Error ? error.message : String(error);

	// Tier 1: Console
	if (isExpectedError(error)) {
		write(`peer-rank: ${message}`);
	} else {
		write(`[cli] ${component}: ${error instanceof Error && error.stack ? error.stack : message}`);
	}

	// Tier 2: Persistent log file
	logger?.error(component, message, error instanceof Error ? error : new Error(message));
}
