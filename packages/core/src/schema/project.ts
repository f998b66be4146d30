import { isRecord, resolveNode, type TypeNode } from "./type-node";

function isEmpty(value: unknown): boolean {
	if (value === null || value === undefined || value === "") return true;
	if (Array.isArray(value)) return value.length === 0;
	return isRecord(value) && Object.keys(value).length === 0;
}

/**
 * Conform a record value to its schema node.
 *
 * Object keys the schema does not declare are dropped; everything the schema
 * declares and the value carries is kept. Literals pass through untouched
 * (validation, when enabled, has already run), and so do values whose shape
 * does not match the node.
 *
 * @param node - Schema node the value was declared with
 * @param value - The incoming value
 * @returns The projected value
 */
export function projectRecord(node: TypeNode, value: unknown): unknown {
	if (isEmpty(value)) return value;

	const resolved = resolveNode(node);
	switch (resolved.kind) {
		case "literal":
			return value;

		case "object": {
			if (!isRecord(value)) return value;
			const projected: Record<string, unknown> = {};
			for (const property of resolved.properties) {
				if (!Object.hasOwn(value, property.name)) continue;
				projected[property.name] = projectRecord(property.node, value[property.name]);
			}
			return projected;
		}

		case "array": {
			if (!Array.isArray(value)) return value;
			if (resolveNode(resolved.items).kind !== "object") return value;
			return value.map((item) => projectRecord(resolved.items, item));
		}
	}
}
