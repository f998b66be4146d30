import {
	createRecordValidator,
	decodeTypeNode,
	encodeRow,
	type Logger,
	parseMessageLine,
	projectRecord,
	renderDecimals,
	type RecordMessage,
	type SchemaMessage,
	SchemaNotFoundError,
	UnknownTypeError,
	unwrapOrThrow,
} from "@bqsink/core";
import { CheckpointSlot } from "./checkpoint";
import type { IngestionEngine } from "./engines/types";
import { type TableEntry, type TableNaming, type TableRegistration, tableNameFor } from "./registry";

/** Options for {@link MessageStreamProcessor}. */
export interface ProcessorOptions {
	logger: Logger;
	naming: TableNaming;
	/** Validate every record against its stream's schema before projecting it. */
	validateRecords: boolean;
}

/**
 * Consumes protocol lines in order and routes records to an ingestion engine.
 *
 * Keeps one entry per table in registration order, and the latest checkpoint
 * that no record has followed yet.
 */
export class MessageStreamProcessor<S> {
	private readonly engine: IngestionEngine<S>;
	private readonly logger: Logger;
	private readonly naming: TableNaming;
	private readonly validateRecords: boolean;
	private readonly tables = new Map<string, TableEntry<S>>();
	private readonly checkpoint = new CheckpointSlot();
	private lineNumber = 0;

	constructor(engine: IngestionEngine<S>, options: ProcessorOptions) {
		this.engine = engine;
		this.logger = options.logger;
		this.naming = options.naming;
		this.validateRecords = options.validateRecords;
	}

	/** Registered tables, in the order their schemas first arrived. */
	get entries(): ReadonlyArray<TableEntry<S>> {
		return [...this.tables.values()];
	}

	/** Number of lines processed so far. */
	get linesRead(): number {
		return this.lineNumber;
	}

	/**
	 * Process one input line. Every failure is fatal and thrown as the
	 * matching error value (`ParseError`, `InvalidMessageError`,
	 * `SchemaNotFoundError`, `RecordValidationError`, `UnknownTypeError`,
	 * or whatever the engine raises).
	 */
	async process(line: string): Promise<void> {
		this.lineNumber++;
		const message = unwrapOrThrow(parseMessageLine(line, this.lineNumber));

		switch (message.type) {
			case "SCHEMA":
				await this.handleSchema(message);
				break;
			case "RECORD":
				await this.handleRecord(message);
				break;
			case "STATE":
				this.logger.debug("Setting state", { state: renderDecimals(message.value) });
				this.checkpoint.set(message.value);
				break;
			case "ACTIVATE_VERSION":
				this.logger.debug("Ignoring ACTIVATE_VERSION", { stream: message.stream, version: message.version });
				break;
		}
	}

	private async handleSchema(message: SchemaMessage): Promise<void> {
		const table = tableNameFor(message.stream, this.naming);
		const existing = this.tables.get(table);

		if (existing && this.engine.strategy === "batch") {
			this.logger.debug("Skipping repeated schema", { table });
			return;
		}

		const schema = unwrapOrThrow(decodeTypeNode(message.schema));
		if (schema.kind !== "object") {
			throw new UnknownTypeError(`Schema for stream "${message.stream}" must describe an object`, message.schema);
		}

		const registration: TableRegistration = {
			table,
			stream: message.stream,
			schema,
			keyProperties: message.keyProperties,
		};
		if (this.validateRecords) {
			registration.validate = createRecordValidator(message.stream, message.schema);
		}

		const state = await this.engine.open(registration, existing?.state);
		this.tables.set(table, { ...registration, state });
	}

	private async handleRecord(message: RecordMessage): Promise<void> {
		const table = tableNameFor(message.stream, this.naming);
		const entry = this.tables.get(table);
		if (!entry) {
			throw new SchemaNotFoundError(message.stream, table);
		}

		if (entry.validate) {
			unwrapOrThrow(entry.validate(message.record));
		}

		const projected = projectRecord(entry.schema, message.record);
		await this.engine.write(entry, encodeRow(entry.schema, projected));
		this.checkpoint.clear();
	}

	/**
	 * End of input: flush the engine and return the checkpoint that is now
	 * safe to emit, or `null` when a record followed the last one.
	 */
	async finish(): Promise<unknown> {
		await this.engine.flush(this.entries);
		return this.checkpoint.take();
	}

	/** Release every table's engine resources. */
	async close(): Promise<void> {
		await this.engine.dispose(this.entries);
	}
}
