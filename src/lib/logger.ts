/**
 * Structured Logging Module
 *
 * Writes JSON Lines (.jsonl) entries for configuration changes, model probes,
 * installs and wiki cache operations, with an optional console echo.
 */

import * as fs from 'fs';
import * as path from 'path';

/**
 * Log levels, lowest first
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error'];

/**
 * One line of the log file
 */
export interface LogEntry {
	timestamp: string;
	level: LogLevel;
	/** Subsystem that wrote the entry (config, catalog, switch, cache, ...) */
	type: string;
	message: string;
	context?: Record<string, unknown>;
	error?: {
		name: string;
		message: string;
		code?: string;
	};
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
	/** Directory for docwiki.jsonl; null disables the file sink */
	logDir?: string | null;
	/** Enable console output (default: true) */
	console?: boolean;
	/** Minimum level echoed to the console (default: warn) */
	consoleLevel?: LogLevel;
}

/**
 * Structured logger
 */
export class Logger {
	private logDir: string | null;
	private consoleEnabled: boolean;
	private consoleLevel: LogLevel;
	private dirReady = false;

	constructor(config: LoggerConfig = {}) {
		this.logDir = config.logDir ?? null;
		this.consoleEnabled = config.console ?? true;
		this.consoleLevel = config.consoleLevel ?? 'warn';
	}

	/**
	 * Path of the log file, or null when file logging is off
	 */
	getLogFile(): string | null {
		return this.logDir ? path.join(this.logDir, 'docwiki.jsonl') : null;
	}

	setConsoleLevel(level: LogLevel): void {
		this.consoleLevel = level;
	}

	/**
	 * Log a message for a subsystem
	 */
	log(level: LogLevel, type: string, message: string, context?: Record<string, unknown>): void {
		this.write({
			timestamp: new Date().toISOString(),
			level,
			type,
			message,
			context,
		});
	}

	debug(type: string, message: string, context?: Record<string, unknown>): void {
		this.log('debug', type, message, context);
	}

	info(type: string, message: string, context?: Record<string, unknown>): void {
		this.log('info', type, message, context);
	}

	warn(type: string, message: string, context?: Record<string, unknown>): void {
		this.log('warn', type, message, context);
	}

	/**
	 * Log an error with the failure attached
	 */
	error(type: string, message: string, error?: unknown, context?: Record<string, unknown>): void {
		const entry: LogEntry = {
			timestamp: new Date().toISOString(),
			level: 'error',
			type,
			message,
			context,
		};

		if (error instanceof Error) {
			const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
			entry.error = { name: error.name, message: error.message, code };
		} else if (error !== undefined) {
			entry.error = { name: 'Error', message: String(error) };
		}

		this.write(entry);
	}

	private write(entry: LogEntry): void {
		this.writeLogEntry(entry);
		this.outputToConsole(entry);
	}

	/**
	 * Append entry to the log file, creating the directory on first use
	 */
	private writeLogEntry(entry: LogEntry): void {
		const logFile = this.getLogFile();
		if (!logFile || !this.logDir) {
			return;
		}

		const logLine = JSON.stringify(entry) + '\n';

		try {
			if (!this.dirReady) {
				fs.mkdirSync(this.logDir, { recursive: true });
				this.dirReady = true;
			}
			fs.appendFileSync(logFile, logLine, 'utf8');
		} catch (error) {
			// Fall back to console if file write fails
			console.error('[LOGGER ERROR] Failed to write log:', error);
			console.error('[ORIGINAL LOG]', logLine);
		}
	}

	private outputToConsole(entry: LogEntry): void {
		if (!this.consoleEnabled) {
			return;
		}

		if (LEVELS.indexOf(entry.level) < LEVELS.indexOf(this.consoleLevel)) {
			return;
		}

		const prefix = `[${entry.level.toUpperCase()}] [${entry.type}]`;
		const detail = entry.error ?? entry.context ?? '';

		switch (entry.level) {
			case 'error':
				console.error(prefix, entry.message, detail);
				break;
			case 'warn':
				console.warn(prefix, entry.message, detail);
				break;
			default:
				console.log(prefix, entry.message, detail);
		}
	}
}

/**
 * Logger that writes nothing, for library callers that bring no sink
 */
export function createSilentLogger(): Logger {
	return new Logger({ logDir: null, console: false });
}
