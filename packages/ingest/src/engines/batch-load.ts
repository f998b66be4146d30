import { type Logger, serializeRow, type StorageRow, translateSchema } from "@bqsink/core";
import type { WarehouseClient, WriteDisposition } from "@bqsink/adapter";
import type { TableEntry, TableRegistration } from "../registry";
import { Spool } from "../spool";
import type { IngestionEngine } from "./types";

/** Options for {@link BatchLoadEngine}. */
export interface BatchLoadEngineOptions {
	client: WarehouseClient;
	logger: Logger;
	/** Overwrite every table instead of appending. */
	truncate: boolean;
	/** Tables overwritten regardless of `truncate`. */
	forcedFulltables: ReadonlySet<string>;
}

/**
 * Spools every row of the run to a file per table and loads each file with
 * one load job once the input is exhausted.
 *
 * Overwrites are atomic: a `WRITE_TRUNCATE` load replaces the table contents
 * in a single job.
 */
export class BatchLoadEngine implements IngestionEngine<Spool> {
	readonly strategy = "batch";
	private readonly client: WarehouseClient;
	private readonly logger: Logger;
	private readonly truncate: boolean;
	private readonly forcedFulltables: ReadonlySet<string>;

	constructor(options: BatchLoadEngineOptions) {
		this.client = options.client;
		this.logger = options.logger;
		this.truncate = options.truncate;
		this.forcedFulltables = options.forcedFulltables;
	}

	async open(_registration: TableRegistration, previous: Spool | undefined): Promise<Spool> {
		return previous ?? Spool.create();
	}

	async write(entry: TableEntry<Spool>, row: StorageRow): Promise<void> {
		await entry.state.append(serializeRow(row));
	}

	/** The write disposition a table is loaded with. */
	dispositionFor(table: string): WriteDisposition {
		return this.truncate || this.forcedFulltables.has(table) ? "WRITE_TRUNCATE" : "WRITE_APPEND";
	}

	/**
	 * Load every spool, in registration order. The first failed load aborts
	 * the rest and is thrown.
	 */
	async flush(entries: ReadonlyArray<TableEntry<Spool>>): Promise<void> {
		for (const entry of entries) {
			const log = this.logger.child({ table: entry.table });
			const schema = translateSchema(entry.schema, entry.keyProperties);
			const writeDisposition = this.dispositionFor(entry.table);

			if (writeDisposition === "WRITE_TRUNCATE") {
				log.info("Loading table by FULL_TABLE");
			}
			log.info("Loading table", { rows: entry.state.rowCount, writeDisposition });

			await entry.state.close();
			const result = await this.client.loadTable(entry.table, entry.state.path, {
				schema,
				writeDisposition,
			});

			if (!result.ok) {
				log.error("Failed to load table from file", {
					error: result.error.cause?.message ?? result.error.message,
					reasons: result.error.reasons.map((r) => `reason: ${r.reason}, message: ${r.message}`),
				});
				throw result.error;
			}

			log.info("Loaded rows", { rows: result.value.outputRows, jobId: result.value.jobId });
		}
	}

	async dispose(entries: ReadonlyArray<TableEntry<Spool>>): Promise<void> {
		for (const entry of entries) {
			await entry.state.remove();
		}
	}
}
