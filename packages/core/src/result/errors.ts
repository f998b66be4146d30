/** Base error class for all bqsink errors */
export class SinkError extends Error {
	readonly code: string;
	override readonly cause?: Error;

	constructor(message: string, code: string, cause?: Error) {
		super(message);
		this.name = this.constructor.name;
		this.code = code;
		this.cause = cause;
	}
}

/** A `reason` / `message` pair reported by the warehouse for a failed load or insert. */
export interface ErrorReason {
	reason: string;
	message: string;
	/** Position of the offending row in the submitted batch, when the warehouse reports it. */
	index?: number;
}

/** Input line is not valid JSON */
export class ParseError extends SinkError {
	readonly lineNumber: number;
	readonly line: string;

	constructor(lineNumber: number, line: string, cause?: Error) {
		super(`Unable to parse message on line ${lineNumber}: ${line}`, "PARSE_ERROR", cause);
		this.lineNumber = lineNumber;
		this.line = line;
	}
}

/** Parsed line is not a recognised protocol message */
export class InvalidMessageError extends SinkError {
	constructor(message: string, cause?: Error) {
		super(message, "INVALID_MESSAGE", cause);
	}
}

/** A record arrived for a stream that has not declared a schema */
export class SchemaNotFoundError extends SinkError {
	readonly stream: string;

	constructor(stream: string, table: string) {
		super(
			`A record for stream "${stream}" (table ${table}) was encountered before a corresponding schema`,
			"SCHEMA_NOT_FOUND",
		);
		this.stream = stream;
	}
}

/** A record does not satisfy the schema declared for its stream */
export class RecordValidationError extends SinkError {
	readonly stream: string;
	readonly details: string[];

	constructor(stream: string, details: string[]) {
		super(`Record for stream "${stream}" failed validation: ${details.join("; ")}`, "RECORD_VALIDATION");
		this.stream = stream;
		this.details = details;
	}
}

/** Schema node with a missing or unsupported type */
export class UnknownTypeError extends SinkError {
	readonly node: unknown;

	constructor(message: string, node: unknown) {
		super(`${message}: ${JSON.stringify(node)}`, "UNKNOWN_TYPE");
		this.node = node;
	}
}

/** Bulk load of a table failed */
export class LoadFailureError extends SinkError {
	readonly table: string;
	readonly reasons: ErrorReason[];

	constructor(table: string, reasons: ErrorReason[], cause?: Error) {
		super(`Failed to load table ${table}${formatReasons(reasons)}`, "LOAD_FAILURE", cause);
		this.table = table;
		this.reasons = reasons;
	}
}

/** Streaming insert of a record failed */
export class InsertFailureError extends SinkError {
	readonly table: string;
	readonly reasons: ErrorReason[];

	constructor(table: string, reasons: ErrorReason[], cause?: Error) {
		super(`Failed to insert rows into ${table}${formatReasons(reasons)}`, "INSERT_FAILURE", cause);
		this.table = table;
		this.reasons = reasons;
	}
}

/** Warehouse client operation failure */
export class AdapterError extends SinkError {
	constructor(message: string, cause?: Error) {
		super(message, "ADAPTER_ERROR", cause);
	}
}

/** Invalid or unsupported target configuration */
export class ConfigError extends SinkError {
	constructor(message: string, cause?: Error) {
		super(message, "CONFIG_ERROR", cause);
	}
}

/** Render reasons as `reason: ..., message: ...` lines. */
export function formatReasons(reasons: ReadonlyArray<ErrorReason>): string {
	if (reasons.length === 0) return "";
	return `\n${reasons.map((r) => `reason: ${r.reason}, message: ${r.message}`).join("\n")}`;
}

/** Coerce an unknown thrown value into an Error instance. */
export function toError(err: unknown): Error {
	return err instanceof Error ? err : new Error(String(err));
}
