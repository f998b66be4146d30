import { isLosslessNumber } from "lossless-json";
import { isRecord, resolveNode, type TypeNode } from "../schema/type-node";
import { sanitizeFieldName } from "../validation/identifier";

/** A row ready for a load file or a streaming insert. */
export type StorageRow = Record<string, unknown>;

/** Replace exact-text numbers with their decimal string, at any depth. */
export function renderDecimals(value: unknown): unknown {
	if (isLosslessNumber(value)) return value.value;
	if (Array.isArray(value)) return value.map(renderDecimals);
	if (isRecord(value)) {
		const out: Record<string, unknown> = {};
		for (const [key, item] of Object.entries(value)) {
			out[key] = renderDecimals(item);
		}
		return out;
	}
	return value;
}

function encodeValue(node: TypeNode, value: unknown): unknown {
	const resolved = resolveNode(node);

	if (resolved.kind === "object" && isRecord(value)) {
		const out: Record<string, unknown> = {};
		for (const property of resolved.properties) {
			if (!Object.hasOwn(value, property.name)) continue;
			out[sanitizeFieldName(property.name)] = encodeValue(property.node, value[property.name]);
		}
		return out;
	}

	if (resolved.kind === "array" && Array.isArray(value)) {
		return value.map((item) => encodeValue(resolved.items, item));
	}

	return renderDecimals(value);
}

/**
 * Turn a projected record into a storage row.
 *
 * Keys are renamed to the sanitised column names the translator produced,
 * and decimals are written as their exact text.
 *
 * @param node - The stream's schema node
 * @param projected - Output of `projectRecord` for the same node
 */
export function encodeRow(node: TypeNode, projected: unknown): StorageRow {
	const encoded = encodeValue(node, projected);
	return isRecord(encoded) ? encoded : {};
}

/** One newline-delimited JSON line for a load file. */
export function serializeRow(row: StorageRow): string {
	return `${JSON.stringify(row)}\n`;
}
