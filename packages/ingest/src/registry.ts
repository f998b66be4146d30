import type { ObjectNode, RecordValidator } from "@bqsink/core";

/** Everything a SCHEMA message declares for one table. */
export interface TableRegistration {
	/** Warehouse table name: prefix + stream + suffix. */
	table: string;
	stream: string;
	schema: ObjectNode;
	keyProperties: string[];
	/** Present when record validation is enabled. */
	validate?: RecordValidator;
}

/** A registered table plus the ingestion engine's per-table state. */
export interface TableEntry<S> extends TableRegistration {
	state: S;
}

/** Prefix and suffix applied to every stream name. */
export interface TableNaming {
	prefix: string;
	suffix: string;
}

/** Compute the table a stream is written to. */
export function tableNameFor(stream: string, naming: TableNaming): string {
	return `${naming.prefix}${stream}${naming.suffix}`;
}
