/**
 * CLI Error Handler
 *
 * Centralized error handling for the CLI with logging to:
 * - Console (stderr) - immediate visibility
 * - $SOLOPACK_HOME/logs/cli/ - persistent log with hourly rotation
 */

import {createServiceLogger, type Logger} from '../../lib/logger.js';
import {
	InvalidMetadataSyntaxError,
	MissingFieldError,
	SourceCheckError,
	UnsupportedSourceError,
	ConfigError,
} from '../../lib/errors.js';

/**
 * Create the CLI logger.
 * Writes to $SOLOPACK_HOME/logs/cli/YYYY-MM-DD-HH.log
 */
export function createCliLogger(): Logger {
	return createServiceLogger('cli');
}

/**
 * Errors caused by the input or configuration rather than by solopack.
 * These are reported without a stack trace.
 */
export function isUserError(error: unknown): boolean {
	return (
		error instanceof InvalidMetadataSyntaxError ||
		error instanceof MissingFieldError ||
		error instanceof SourceCheckError ||
		error instanceof UnsupportedSourceError ||
		error instanceof ConfigError
	);
}

/**
 * Handle a CLI error with full logging.
 *
 * @param component - Component or context name (e.g., 'PackCommand')
 * @param error - The error that occurred
 * @param logger - Optional logger instance
 * @param options - Optional configuration
 */
export function handleCliError(
	component: string,
	error: unknown,
	logger?: Logger | null,
	options?: {
		/** If true, don't log to console (already shown elsewhere) */
		skipConsole?: boolean;
	},
): void {
	const message = error instanceof Error ? error.message : String(error);

	// Tier 1: Console; stack traces only for unexpected errors
	if (!options?.skipConsole) {
		if (isUserError(error)) {
			console.error(`[solopack] ${message}`);
		} else {
			console.error(`[solopack] ${component}:`, error);
		}
	}

	// Tier 2: Persistent log file
	logger?.error(
		component,
		message,
		error instanceof Error ? error : new Error(message),
	);
}
