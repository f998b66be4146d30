/** Supported log levels, ordered by severity. */
export type LogLevel = "debug" | "info" | "warn" | "error";

/** A single structured log entry. */
export interface LogEntry {
	level: LogLevel;
	msg: string;
	ts: string;
	[key: string]: unknown;
}

/** Numeric severity values for level comparison. */
const LEVEL_VALUE: Record<LogLevel, number> = {
	debug: 0,
	info: 1,
	warn: 2,
	error: 3,
};

/** Type guard for a log level name. */
export function isLogLevel(value: string): value is LogLevel {
	return Object.hasOwn(LEVEL_VALUE, value);
}

/**
 * Structured logger that outputs JSON lines to stderr.
 *
 * stdout is reserved for checkpoint output, so nothing here may write to it.
 * Supports log-level filtering and child loggers with bound context.
 *
 * @example
 * ```ts
 * const logger = new Logger("info");
 * const tableLogger = logger.child({ table: "users" });
 * tableLogger.info("load completed", { rows: 5 });
 * // => {"level":"info","msg":"load completed","ts":"...","table":"users","rows":5}
 * ```
 */
export class Logger {
	private readonly minLevel: LogLevel;
	private readonly bindings: Record<string, unknown>;

	/** Output function — defaults to stderr, overridable for testing. */
	private readonly writeFn: (line: string) => void;

	constructor(
		minLevel: LogLevel = "info",
		bindings: Record<string, unknown> = {},
		writeFn?: (line: string) => void,
	) {
		this.minLevel = minLevel;
		this.bindings = bindings;
		this.writeFn = writeFn ?? ((line) => process.stderr.write(`${line}\n`));
	}

	/** Log at debug level. */
	debug(msg: string, data?: Record<string, unknown>): void {
		this.log("debug", msg, data);
	}

	/** Log at info level. */
	info(msg: string, data?: Record<string, unknown>): void {
		this.log("info", msg, data);
	}

	/** Log at warn level. */
	warn(msg: string, data?: Record<string, unknown>): void {
		this.log("warn", msg, data);
	}

	/** Log at error level. */
	error(msg: string, data?: Record<string, unknown>): void {
		this.log("error", msg, data);
	}

	/**
	 * Create a child logger with additional bound context.
	 *
	 * The child inherits the parent's level and write function, plus
	 * merges any parent bindings with the new ones.
	 */
	child(bindings: Record<string, unknown>): Logger {
		return new Logger(this.minLevel, { ...this.bindings, ...bindings }, this.writeFn);
	}

	private log(level: LogLevel, msg: string, data?: Record<string, unknown>): void {
		if (LEVEL_VALUE[level] < LEVEL_VALUE[this.minLevel]) return;

		const entry: LogEntry = {
			level,
			msg,
			ts: new Date().toISOString(),
			...this.bindings,
			...data,
		};

		this.writeFn(JSON.stringify(entry));
	}
}

/** Logger that discards everything. */
export const silentLogger = new Logger("error", {}, () => {});
