import type { StorageRow } from "@bqsink/core";
import type { TableEntry, TableRegistration } from "../registry";

/** The two ingestion strategies. */
export type IngestionStrategy = "batch" | "stream";

/**
 * How projected rows reach the warehouse.
 *
 * `S` is the engine's per-table state (a spool, a row counter, ...). The
 * processor stores it on the table entry and hands it back on every call.
 */
export interface IngestionEngine<S> {
	readonly strategy: IngestionStrategy;

	/**
	 * Set up a table when its SCHEMA message arrives.
	 *
	 * @param registration - The declared schema and key properties
	 * @param previous - State from an earlier registration of the same table in this run
	 */
	open(registration: TableRegistration, previous: S | undefined): Promise<S>;

	/** Hand one encoded row to the table. */
	write(entry: TableEntry<S>, row: StorageRow): Promise<void>;

	/** Make every row written so far durable, in table registration order. */
	flush(entries: ReadonlyArray<TableEntry<S>>): Promise<void>;

	/** Release per-table resources. Runs after `flush`, and also after a failure. */
	dispose(entries: ReadonlyArray<TableEntry<S>>): Promise<void>;
}
