export { BigQueryWarehouse, type BigQueryWarehouseConfig } from "./bigquery";
export { type MemoryLoad, type MemoryTable, MemoryWarehouse } from "./memory";
export { extractReasons, toCause, toErrorReason, wrapAsync } from "./shared";
export type {
	LoadOptions,
	LoadResult,
	RowError,
	WarehouseClient,
	WriteDisposition,
} from "./warehouse-types";
