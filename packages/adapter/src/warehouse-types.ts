import type {
	AdapterError,
	ColumnDefinition,
	ErrorReason,
	LoadFailureError,
	Result,
	StorageRow,
} from "@bqsink/core";

/** Whether a load replaces the table contents or appends to them. */
export type WriteDisposition = "WRITE_TRUNCATE" | "WRITE_APPEND";

/** Options for a bulk load from a newline-delimited JSON file. */
export interface LoadOptions {
	schema: ColumnDefinition[];
	writeDisposition: WriteDisposition;
}

/** Outcome of a successful bulk load. */
export interface LoadResult {
	/** Rows the warehouse accepted. */
	outputRows: number;
	/** Identifier of the load job, when the warehouse assigns one. */
	jobId?: string;
}

/** Per-row failure reported by a streaming insert. */
export interface RowError {
	/** The row as submitted. */
	row: StorageRow;
	errors: ErrorReason[];
}

/**
 * Operations the ingestion engines need from the warehouse.
 *
 * Every method returns a `Result` and never throws.
 */
export interface WarehouseClient {
	/** Create the dataset when it does not exist yet. */
	ensureDataset(): Promise<Result<void, AdapterError>>;

	/** Whether the dataset exists. */
	datasetExists(): Promise<Result<boolean, AdapterError>>;

	/** Whether a table exists in the dataset. */
	tableExists(table: string): Promise<Result<boolean, AdapterError>>;

	/** Create a table with the given columns. */
	createTable(table: string, schema: ColumnDefinition[]): Promise<Result<void, AdapterError>>;

	/** Delete a table. */
	deleteTable(table: string): Promise<Result<void, AdapterError>>;

	/** Load a newline-delimited JSON file into a table and wait for the job to finish. */
	loadTable(
		table: string,
		filePath: string,
		options: LoadOptions,
	): Promise<Result<LoadResult, LoadFailureError>>;

	/** Stream rows into a table. Resolves with per-row errors, empty on success. */
	insertRows(table: string, rows: StorageRow[]): Promise<Result<RowError[], AdapterError>>;
}
