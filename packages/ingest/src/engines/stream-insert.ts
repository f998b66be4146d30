import { setTimeout as delay } from "node:timers/promises";
import {
	InsertFailureError,
	type Logger,
	type StorageRow,
	translateSchema,
	unwrapOrThrow,
} from "@bqsink/core";
import { extractReasons, type WarehouseClient } from "@bqsink/adapter";
import type { TableEntry, TableRegistration } from "../registry";
import type { IngestionEngine } from "./types";

/** Wait after recreating a table before streaming into it. */
export const RECREATE_COOLDOWN_MS = 5 * 60 * 1000;

/** Per-table state of {@link StreamInsertEngine}. */
export interface StreamTableState {
	/** Rows the warehouse accepted so far. */
	inserted: number;
}

/** Options for {@link StreamInsertEngine}. */
export interface StreamInsertEngineOptions {
	client: WarehouseClient;
	logger: Logger;
	/** Tables dropped and recreated when first registered in a run. */
	forcedFulltables: ReadonlySet<string>;
	/** Defaults to {@link RECREATE_COOLDOWN_MS}. */
	cooldownMs?: number;
	/** Defaults to a timer-based wait. */
	sleep?: (ms: number) => Promise<void>;
}

/**
 * Creates tables as soon as their schema arrives and streams every record
 * into the warehouse as it is read.
 *
 * Streaming inserts are only eventually consistent right after a table is
 * recreated, so no row is sent to a recreated table before the cool-down
 * has elapsed.
 */
export class StreamInsertEngine implements IngestionEngine<StreamTableState> {
	readonly strategy = "stream";
	private readonly client: WarehouseClient;
	private readonly logger: Logger;
	private readonly forcedFulltables: ReadonlySet<string>;
	private readonly cooldownMs: number;
	private readonly sleep: (ms: number) => Promise<void>;

	constructor(options: StreamInsertEngineOptions) {
		this.client = options.client;
		this.logger = options.logger;
		this.forcedFulltables = options.forcedFulltables;
		this.cooldownMs = options.cooldownMs ?? RECREATE_COOLDOWN_MS;
		this.sleep = options.sleep ?? ((ms) => delay(ms));
	}

	async open(
		registration: TableRegistration,
		previous: StreamTableState | undefined,
	): Promise<StreamTableState> {
		const log = this.logger.child({ table: registration.table });

		// Later SCHEMA messages only replace the schema used for projection.
		if (previous) {
			log.debug("Schema replaced");
			return previous;
		}

		const columns = translateSchema(registration.schema, registration.keyProperties);
		const exists = unwrapOrThrow(await this.client.tableExists(registration.table));

		if (!exists) {
			unwrapOrThrow(await this.client.createTable(registration.table, columns));
			log.info("Created table");
		} else if (this.forcedFulltables.has(registration.table)) {
			unwrapOrThrow(await this.client.deleteTable(registration.table));
			unwrapOrThrow(await this.client.createTable(registration.table, columns));
			log.warn("Recreated table, waiting before streaming into it", { cooldownMs: this.cooldownMs });
			await this.sleep(this.cooldownMs);
		} else {
			log.debug("Using existing table");
		}

		return { inserted: 0 };
	}

	/** Insert one row. Any rejection is logged with the row and thrown. */
	async write(entry: TableEntry<StreamTableState>, row: StorageRow): Promise<void> {
		const result = await this.client.insertRows(entry.table, [row]);

		if (!result.ok) {
			const reasons = extractReasons(result.error.cause);
			this.logger.error("Failed to insert rows", {
				table: entry.table,
				record: row,
				error: result.error.cause?.message ?? result.error.message,
				reasons,
			});
			throw new InsertFailureError(entry.table, reasons, result.error);
		}

		if (result.value.length > 0) {
			const reasons = result.value.flatMap((rowError) => rowError.errors);
			this.logger.error("Failed to insert rows", { table: entry.table, record: row, reasons });
			throw new InsertFailureError(entry.table, reasons);
		}

		entry.state.inserted++;
	}

	async flush(entries: ReadonlyArray<TableEntry<StreamTableState>>): Promise<void> {
		for (const entry of entries) {
			this.logger.info("Inserted rows", { table: entry.table, rows: entry.state.inserted });
		}
	}

	async dispose(): Promise<void> {
		// Nothing is held per table.
	}
}
