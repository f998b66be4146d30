import { readFile } from "node:fs/promises";
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
import { wrapAsync } from "./shared";
import type { LoadOptions, LoadResult, RowError, WarehouseClient } from "./warehouse-types";

/** A table held by {@link MemoryWarehouse}. */
export interface MemoryTable {
	schema: ColumnDefinition[];
	rows: StorageRow[];
}

/** A load call as {@link MemoryWarehouse} received it. */
export interface MemoryLoad {
	table: string;
	options: LoadOptions;
	rows: StorageRow[];
}

/**
 * In-memory {@link WarehouseClient}.
 *
 * Keeps tables and every call in plain maps and arrays so runs can be
 * inspected without a real warehouse.
 */
export class MemoryWarehouse implements WarehouseClient {
	readonly tables = new Map<string, MemoryTable>();
	readonly loads: MemoryLoad[] = [];
	readonly inserts: Array<{ table: string; rows: StorageRow[] }> = [];
	readonly deleted: string[] = [];
	datasetCreated = false;

	async ensureDataset(): Promise<Result<void, AdapterError>> {
		this.datasetCreated = true;
		return Ok(undefined);
	}

	async datasetExists(): Promise<Result<boolean, AdapterError>> {
		return Ok(this.datasetCreated);
	}

	async tableExists(table: string): Promise<Result<boolean, AdapterError>> {
		return Ok(this.tables.has(table));
	}

	async createTable(
		table: string,
		schema: ColumnDefinition[],
	): Promise<Result<void, AdapterError>> {
		this.tables.set(table, { schema, rows: [] });
		return Ok(undefined);
	}

	async deleteTable(table: string): Promise<Result<void, AdapterError>> {
		this.tables.delete(table);
		this.deleted.push(table);
		return Ok(undefined);
	}

	async loadTable(
		table: string,
		filePath: string,
		options: LoadOptions,
	): Promise<Result<LoadResult, LoadFailureError>> {
		const content = await wrapAsync(() => readFile(filePath, "utf-8"), `Failed to read ${filePath}`);
		if (!content.ok) {
			return Err(new LoadFailureError(table, [], content.error));
		}

		const rows: StorageRow[] = content.value
			.split("\n")
			.filter((line) => line.length > 0)
			.map((line): unknown => JSON.parse(line))
			.filter(isRecord);
		this.loads.push({ table, options, rows });

		const existing = this.tables.get(table);
		const kept = existing && options.writeDisposition === "WRITE_APPEND" ? existing.rows : [];
		this.tables.set(table, { schema: options.schema, rows: [...kept, ...rows] });
		return Ok({ outputRows: rows.length });
	}

	async insertRows(table: string, rows: StorageRow[]): Promise<Result<RowError[], AdapterError>> {
		const target = this.tables.get(table);
		if (!target) {
			return Ok(rows.map((row) => ({ row, errors: [{ reason: "notFound", message: `Table ${table} not found` }] })));
		}
		this.inserts.push({ table, rows });
		target.rows.push(...rows);
		return Ok([]);
	}
}
