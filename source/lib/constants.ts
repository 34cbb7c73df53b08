/**
 * Constants - Paths and environment overrides.
 *
 * Everything peer-rank persists (config, logs) lives under a single home
 * directory, never beside the candidate files being ranked.
 */

import os from 'node:os';
import path from 'node:path';

// ============================================================================
// Directory Paths
// ============================================================================

/**
 * Environment variable to override the peer-rank home directory.
 */
export const PEER_RANK_HOME_ENV = 'PEER_RANK_HOME';

/**
 * Services that write their own log directory.
 */
export type ServiceName = 'cli' | 'engine';

/**
 * Get the peer-rank home directory.
 *
 * Default: ~/.local/share/peer-rank
 * Override: $PEER_RANK_HOME
 * Linux (conventional): $XDG_DATA_HOME/peer-rank
 */
export function getPeerRankHomeDir(): string {
	const override = process.env[PEER_RANK_HOME_ENV]?.trim();
	if (override) return override;

	const xdg = process.env['XDG_DATA_HOME']?.trim();
	if (xdg) return path.join(xdg, 'peer-rank');

	return path.join(os.homedir(), '.local', 'share', 'peer-rank');
}

/**
 * Get the path to the config file.
 */
export function getConfigPath(): string {
	return path.join(getPeerRankHomeDir(), 'config.json');
}

/**
 * Get the logs directory.
 */
export function getLogsDir(): string {
	return path.join(getPeerRankHomeDir(), 'logs');
}

/**
 * Get the log directory of one service.
 */
export function getServiceLogsDir(service: ServiceName): string {
	return path.join(getLogsDir(), service);
}

/**
 * Get the current hourly log file of a service.
 * Format: logs/{service}/YYYY-MM-DD-HH.log
 */
export function getServiceLogPath(service: ServiceName): string {
	const now = new Date();
	const date = now.toISOString().split('T')[0]; // YYYY-MM-DD
	const hour = String(now.getUTCHours()).padStart(2, '0');
	return path.join(getServiceLogsDir(service), `${date}-${hour}.log`);
}
