import { decodeTypeNode, Logger, type ObjectNode } from "@bqsink/core";
import type { TableRegistration } from "../registry";

/** Decode a raw object schema, failing the test on anything else. */
export function objectSchema(raw: unknown): ObjectNode {
	const decoded = decodeTypeNode(raw);
	if (!decoded.ok) throw decoded.error;
	if (decoded.value.kind !== "object") throw new Error("expected an object schema");
	return decoded.value;
}

export const USERS_SCHEMA = {
	type: "object",
	properties: {
		id: { type: "integer" },
		name: { type: ["string", "null"] },
	},
};

export function registration(table: string, raw: unknown = USERS_SCHEMA): TableRegistration {
	return { table, stream: table, schema: objectSchema(raw), keyProperties: ["id"] };
}

/** Logger that keeps every entry it writes. */
export function capturingLogger(): { logger: Logger; entries: Array<Record<string, unknown>> } {
	const entries: Array<Record<string, unknown>> = [];
	const logger = new Logger("debug", {}, (line) => {
		entries.push(JSON.parse(line));
	});
	return { logger, entries };
}

export function schemaLine(stream: string, schema: unknown = USERS_SCHEMA, keys: string[] = ["id"]): string {
	return JSON.stringify({ type: "SCHEMA", stream, schema, key_properties: keys });
}

export function recordLine(stream: string, record: unknown): string {
	return JSON.stringify({ type: "RECORD", stream, record });
}

export function stateLine(value: unknown): string {
	return JSON.stringify({ type: "STATE", value });
}
