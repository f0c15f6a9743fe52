/**
 * Logger - File-based logging with hourly rotation.
 *
 * Provides two logger implementations:
 * - createServiceLogger: Per-service hourly rotation under $SOLOPACK_HOME/logs
 * - createNullLogger: No-op for testing
 */

import fs from 'node:fs';
import {
	getServiceLogsDir,
	getServiceLogPath,
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

// ============================================================================
// Logger Implementations
// ============================================================================

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
 * Logs are written to: {SOLOPACK_HOME}/logs/{service}/YYYY-MM-DD-HH.log
 *
 * @example
 * const logger = createServiceLogger('packager');
 * logger.warn('Resolver', 'Using version from README: 1.0.0');
 */
export function createServiceLogger(service: ServiceName): Logger {
	function write(entry: string) {
		try {
			fs.mkdirSync(getServiceLogsDir(service), {recursive: true});
			// Recalculated each write for rotation
			fs.appendFileSync(getServiceLogPath(service), entry + '\n');
		} catch {
			// Logging must never abort a build
		}
	}

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

// Re-export ServiceName for convenience
export type {ServiceName};
