import { BigQuery } from "@google-cloud/bigquery";
import {
	type AdapterError,
	type ColumnDefinition,
	Err,
	isRecord,
	LoadFailureError,
	Ok,
	type Result,
	type StorageRow,
} from "@bqsink/core";
import { extractReasons, toCause, toErrorReason, wrapAsync } from "./shared";
import type { LoadOptions, LoadResult, RowError, WarehouseClient } from "./warehouse-types";

/**
 * Configuration for the BigQuery warehouse.
 * BigQuery is HTTP-based, no connection string needed.
 */
export interface BigQueryWarehouseConfig {
	/** GCP project ID. */
	projectId: string;
	/** BigQuery dataset name. */
	dataset: string;
	/** Path to a service account JSON key file. Falls back to ADC if omitted. */
	keyFilename?: string;
	/** Dataset location (default: "EU"). */
	location?: string;
}

/** Convert one entry of a `PartialFailureError` into a {@link RowError}. */
function toRowError(value: unknown): RowError | undefined {
	if (!isRecord(value)) return undefined;
	const row = isRecord(value.row) ? value.row : {};
	const errors = Array.isArray(value.errors) ? value.errors : [];
	return {
		row,
		errors: errors.flatMap((e) => toErrorReason(e) ?? []),
	};
}

/**
 * {@link WarehouseClient} backed by the official BigQuery client.
 *
 * All public methods return `Result` and never throw.
 */
export class BigQueryWarehouse implements WarehouseClient {
	/** @internal */
	readonly client: BigQuery;
	/** @internal */
	readonly dataset: string;
	/** @internal */
	readonly location: string;

	constructor(config: BigQueryWarehouseConfig) {
		this.location = config.location ?? "EU";
		this.client = new BigQuery({
			projectId: config.projectId,
			keyFilename: config.keyFilename,
			location: this.location,
		});
		this.dataset = config.dataset;
	}

	async ensureDataset(): Promise<Result<void, AdapterError>> {
		return wrapAsync(async () => {
			const [exists] = await this.client.dataset(this.dataset).exists();
			if (!exists) {
				await this.client.createDataset(this.dataset, { location: this.location });
			}
		}, `Failed to create dataset ${this.dataset} in ${this.location}`);
	}

	async datasetExists(): Promise<Result<boolean, AdapterError>> {
		return wrapAsync(async () => {
			const [exists] = await this.client.dataset(this.dataset).exists();
			return exists;
		}, `Failed to look up dataset ${this.dataset}`);
	}

	async tableExists(table: string): Promise<Result<boolean, AdapterError>> {
		return wrapAsync(async () => {
			const [exists] = await this.client.dataset(this.dataset).table(table).exists();
			return exists;
		}, `Failed to look up table ${this.dataset}.${table}`);
	}

	async createTable(
		table: string,
		schema: ColumnDefinition[],
	): Promise<Result<void, AdapterError>> {
		return wrapAsync(async () => {
			await this.client.dataset(this.dataset).createTable(table, { schema: { fields: schema } });
		}, `Failed to create table ${this.dataset}.${table}`);
	}

	async deleteTable(table: string): Promise<Result<void, AdapterError>> {
		return wrapAsync(async () => {
			await this.client.dataset(this.dataset).table(table).delete();
		}, `Failed to delete table ${this.dataset}.${table}`);
	}

	/**
	 * Run a load job from a newline-delimited JSON file and wait for it.
	 * A failed job carries the `reason` / `message` pairs BigQuery reported.
	 */
	async loadTable(
		table: string,
		filePath: string,
		options: LoadOptions,
	): Promise<Result<LoadResult, LoadFailureError>> {
		try {
			const [metadata] = await this.client
				.dataset(this.dataset)
				.table(table)
				.load(filePath, {
					schema: { fields: options.schema },
					sourceFormat: "NEWLINE_DELIMITED_JSON",
					writeDisposition: options.writeDisposition,
				});

			const statusErrors = extractReasons(metadata.status ?? {});
			if (metadata.status?.errorResult) {
				return Err(new LoadFailureError(table, statusErrors));
			}

			const result: LoadResult = { outputRows: Number(metadata.statistics?.load?.outputRows ?? 0) };
			const jobId = metadata.jobReference?.jobId;
			if (jobId) result.jobId = jobId;
			return Ok(result);
		} catch (error) {
			return Err(new LoadFailureError(table, extractReasons(error), toCause(error)));
		}
	}

	/**
	 * Stream rows into a table.
	 * Rows BigQuery rejects come back as {@link RowError}s, other failures as an `AdapterError`.
	 */
	async insertRows(table: string, rows: StorageRow[]): Promise<Result<RowError[], AdapterError>> {
		return wrapAsync(async () => {
			try {
				await this.client.dataset(this.dataset).table(table).insert(rows);
				return [];
			} catch (error) {
				if (error instanceof Error && error.name === "PartialFailureError" && "errors" in error) {
					const entries = Array.isArray(error.errors) ? error.errors : [];
					return entries.flatMap((e) => toRowError(e) ?? []);
				}
				throw error;
			}
		}, `Failed to insert rows into ${this.dataset}.${table}`);
	}
}
