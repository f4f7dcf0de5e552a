/**
 * @file Logger used by every SqlCatalog component, with configurable log levels.
 */

/**
 * Available log levels in order of priority (from lowest to highest).
 */
export enum LogLevel {
	/** Log all messages */
	ALL = 0,
	/** Compiled SQL, bindings, cache hits */
	DEBUG = 10,
	/** Connections opened and closed, queries loaded */
	INFO = 20,
	/** Rolled back transactions */
	WARN = 30,
	/** Failed rollbacks */
	ERROR = 40,
	/** Disable all logging */
	OFF = 50
}

/**
 * Log entry structure.
 */
export interface LogEntry {
	timestamp: Date;
	level: LogLevel;
	message: string;
	context?: string;
	data?: Record<string, unknown>;
}

/**
 * Logger configuration options.
 */
export interface LoggerConfig {
	/** The minimum log level to output (default: INFO) */
	level?: LogLevel;
	/** Whether to output logs to console (default: true) */
	console?: boolean;
	/** Custom log formatter function */
	formatter?: (entry: LogEntry) => string;
	/** Custom log handler function */
	handler?: (entry: LogEntry) => void;
}

/**
 * Logger bound to a fixed context, as returned by `getLogger`.
 */
export interface ContextLogger {
	debug(message: string, data?: Record<string, unknown>): void;
	info(message: string, data?: Record<string, unknown>): void;
	warn(message: string, data?: Record<string, unknown>): void;
	error(message: string, data?: Record<string, unknown>): void;
	/** Whether debug records would be output; lets callers skip building them */
	isDebugEnabled(): boolean;
}

/**
 * Errors lose their message under JSON.stringify.
 */
const jsonReplacer = (_key: string, value: unknown): unknown =>
	value instanceof Error ? { name: value.name, message: value.message } : value;

/**
 * Default log formatter that creates human-readable log output.
 */
const defaultFormatter = (entry: LogEntry): string => {
	const timestamp = entry.timestamp.toISOString();
	const level = LogLevel[entry.level].padEnd(5);
	const context = entry.context ? `[${entry.context}] ` : '';
	const data = entry.data ? ` ${JSON.stringify(entry.data, jsonReplacer)}` : '';
	return `${timestamp} ${level} ${context}${entry.message}${data}`;
};

/**
 * Logger with configurable log levels and output options.
 */
export class Logger {
	private config: Required<LoggerConfig>;

	constructor(config: LoggerConfig = {}) {
		this.config = {
			level: config.level ?? LogLevel.INFO,
			console: config.console ?? true,
			formatter: config.formatter ?? defaultFormatter,
			handler: config.handler ?? this.defaultHandler.bind(this)
		};
	}

	/**
	 * Updates the logger configuration.
	 */
	configure(config: Partial<LoggerConfig>): void {
		this.config = {
			level: config.level ?? this.config.level,
			console: config.console ?? this.config.console,
			formatter: config.formatter ?? this.config.formatter,
			handler: config.handler ?? this.config.handler
		};
	}

	/**
	 * Gets the current log level.
	 */
	getLevel(): LogLevel {
		return this.config.level;
	}

	/**
	 * Sets the log level. Views returned by `getLogger` follow it immediately.
	 */
	setLevel(level: LogLevel): void {
		this.config.level = level;
	}

	/**
	 * Checks if a log level should be output based on current configuration.
	 */
	isEnabled(level: LogLevel): boolean {
		return this.config.level !== LogLevel.OFF && level >= this.config.level;
	}

	/**
	 * Default log handler that outputs to console.
	 */
	private defaultHandler(entry: LogEntry): void {
		if (!this.config.console) return;

		const formatted = this.config.formatter(entry);

		switch (entry.level) {
			case LogLevel.ERROR:
				console.error(formatted);
				break;
			case LogLevel.WARN:
				console.warn(formatted);
				break;
			case LogLevel.DEBUG:
				console.debug(formatted);
				break;
			default:
				console.log(formatted);
				break;
		}
	}

	/**
	 * Builds an entry and hands it to the configured handler.
	 */
	private log(level: LogLevel, message: string, context?: string, data?: Record<string, unknown>): void {
		if (!this.isEnabled(level)) return;

		this.config.handler({
			timestamp: new Date(),
			level,
			message,
			context,
			data
		});
	}

	/**
	 * Logs a debug message, such as compiled SQL with its bindings.
	 */
	debug(message: string, context?: string, data?: Record<string, unknown>): void {
		this.log(LogLevel.DEBUG, message, context, data);
	}

	/**
	 * Logs an info message.
	 */
	info(message: string, context?: string, data?: Record<string, unknown>): void {
		this.log(LogLevel.INFO, message, context, data);
	}

	/**
	 * Logs a warning message.
	 */
	warn(message: string, context?: string, data?: Record<string, unknown>): void {
		this.log(LogLevel.WARN, message, context, data);
	}

	/**
	 * Logs an error message.
	 */
	error(message: string, context?: string, data?: Record<string, unknown>): void {
		this.log(LogLevel.ERROR, message, context, data);
	}
}

/**
 * Global logger instance shared by all components.
 */
export const globalLogger = new Logger();

/**
 * Returns a view of the global logger bound to `context`.
 * Level and handler changes on `globalLogger` apply to every view.
 */
export function getLogger(context?: string): ContextLogger {
	return {
		debug: (message, data) => globalLogger.debug(message, context, data),
		info: (message, data) => globalLogger.info(message, context, data),
		warn: (message, data) => globalLogger.warn(message, context, data),
		error: (message, data) => globalLogger.error(message, context, data),
		isDebugEnabled: () => globalLogger.isEnabled(LogLevel.DEBUG)
	};
}
