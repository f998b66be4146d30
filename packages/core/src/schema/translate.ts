import { UnknownTypeError } from "../result/errors";
import { sanitizeFieldName } from "../validation/identifier";
import { type LiteralNode, type ObjectNode, resolveNode, type TypeNode } from "./type-node";

/** BigQuery column types the translator can produce. */
export type ColumnType =
	| "BOOLEAN"
	| "INTEGER"
	| "FLOAT64"
	| "NUMERIC"
	| "BIGNUMERIC"
	| "STRING"
	| "DATE"
	| "TIME"
	| "TIMESTAMP"
	| "RECORD";

/** Column mode. A `REPEATED` column is never nullable. */
export type ColumnMode = "REQUIRED" | "NULLABLE" | "REPEATED";

/**
 * A warehouse column. Structurally compatible with the BigQuery client's
 * `TableField`, so it can be handed to table creation and load jobs as is.
 */
export interface ColumnDefinition {
	name: string;
	type: ColumnType;
	mode: ColumnMode;
	/** Child columns, only for `RECORD`. */
	fields?: ColumnDefinition[];
}

const STRING_FORMATS: Record<string, ColumnType> = {
	"date-time": "TIMESTAMP",
	date: "DATE",
	time: "TIME",
};

const NUMBER_FORMATS: Record<string, ColumnType> = {
	float: "FLOAT64",
	numeric: "NUMERIC",
	bignumeric: "BIGNUMERIC",
};

/** Map a literal node to its column type, honouring format hints. */
export function literalColumnType(node: LiteralNode): ColumnType {
	switch (node.type) {
		case "boolean":
			return "BOOLEAN";
		case "integer":
			return "INTEGER";
		case "number":
			return (node.format !== undefined && NUMBER_FORMATS[node.format]) || "NUMERIC";
		case "string":
			return (node.format !== undefined && STRING_FORMATS[node.format]) || "STRING";
	}
}

/**
 * Translate one field into a column definition.
 *
 * A field is `REQUIRED` only when its declared name is in `required`;
 * arrays are always `REPEATED` regardless.
 *
 * @param node - The field's type node
 * @param name - Declared field name; the column gets its sanitised form
 * @param required - Declared names that must not be nullable
 */
export function translateField(
	node: TypeNode,
	name: string,
	required: ReadonlySet<string>,
): ColumnDefinition {
	const resolved = resolveNode(node);
	const column = sanitizeFieldName(name);
	const mode: ColumnMode = required.has(name) ? "REQUIRED" : "NULLABLE";

	switch (resolved.kind) {
		case "literal":
			return { name: column, type: literalColumnType(resolved), mode };
		case "object":
			return { name: column, type: "RECORD", mode, fields: translateSchema(resolved) };
		case "array": {
			const item = resolveNode(resolved.items);
			if (item.kind === "object") {
				return { name: column, type: "RECORD", mode: "REPEATED", fields: translateSchema(item) };
			}
			if (item.kind === "array") {
				// Rejected by decodeTypeNode; BigQuery has no directly nested repeated columns.
				throw new UnknownTypeError(`Nested arrays are not supported for field ${name}`, item);
			}
			return { name: column, type: literalColumnType(item), mode: "REPEATED" };
		}
	}
}

/**
 * Translate an object node into its ordered column list.
 *
 * @param node - The object schema of a stream or nested record
 * @param keyProperties - Pipeline key properties, treated as required in addition to the node's own `required` list
 */
export function translateSchema(
	node: ObjectNode,
	keyProperties: ReadonlyArray<string> = [],
): ColumnDefinition[] {
	const required = new Set([...node.required, ...keyProperties]);
	return node.properties.map((property) => translateField(property.node, property.name, required));
}
