/**
 * Constants - Paths and fixed values shared by the CLI and the packager.
 */

import os from 'node:os';
import path from 'node:path';

// ============================================================================
// Directory Paths
// ============================================================================

/**
 * Environment variable to override the solopack home directory.
 */
export const SOLOPACK_HOME_ENV = 'SOLOPACK_HOME';

/**
 * Get the solopack home directory (config and logs).
 *
 * Default: ~/.local/share/solopack
 * Override: $SOLOPACK_HOME
 * Linux (conventional): $XDG_DATA_HOME/solopack
 */
export function getSolopackHomeDir(): string {
	const override = process.env[SOLOPACK_HOME_ENV]?.trim();
	if (override) return override;

	const xdg = process.env['XDG_DATA_HOME']?.trim();
	if (xdg) return path.join(xdg, 'solopack');

	return path.join(os.homedir(), '.local', 'share', 'solopack');
}

/**
 * Get the path to the global config file.
 */
export function getConfigPath(): string {
	return path.join(getSolopackHomeDir(), 'config.json');
}

// ============================================================================
// Logging Paths
// ============================================================================

/**
 * Service names for logging.
 */
export type ServiceName = 'cli' | 'packager';

/**
 * Get the path to the logs directory.
 */
export function getLogsDir(): string {
	return path.join(getSolopackHomeDir(), 'logs');
}

/**
 * Get the path to a service's log directory.
 */
export function getServiceLogsDir(service: ServiceName): string {
	return path.join(getLogsDir(), service);
}

/**
 * Get the path to a service's current hourly log file.
 * Format: {SOLOPACK_HOME}/logs/{service}/YYYY-MM-DD-HH.log
 */
export function getServiceLogPath(service: ServiceName): string {
	const now = new Date();
	const year = now.getFullYear();
	const month = String(now.getMonth() + 1).padStart(2, '0');
	const day = String(now.getDate()).padStart(2, '0');
	const hour = String(now.getHours()).padStart(2, '0');
	const filename = `${year}-${month}-${day}-${hour}.log`;
	return path.join(getServiceLogsDir(service), filename);
}

// ============================================================================
// Packaging
// ============================================================================

/**
 * Prefix for temporary staging directories.
 */
export const STAGING_DIR_PREFIX = 'solopack-';

/**
 * Name of the README written into the staged package.
 */
export const README_FILENAME = 'README.md';

/**
 * Directory (inside the staged package) holding the executable shim.
 */
export const BIN_DIR = 'bin';
