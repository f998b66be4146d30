import { UnknownTypeError } from "../result/errors";
import { Err, Ok, type Result } from "../result/result";
import { sanitizeFieldName } from "../validation/identifier";

/** Primitive JSON-Schema kinds a literal node can carry. */
export const LITERAL_TYPES = ["boolean", "number", "integer", "string"] as const;

/** A primitive JSON-Schema kind. */
export type LiteralType = (typeof LITERAL_TYPES)[number];

/** Scalar value, refined by an optional format hint (`date-time`, `float`, ...). */
export interface LiteralNode {
	kind: "literal";
	type: LiteralType;
	format?: string;
	nullable: boolean;
}

/**
 * Alternatives from `anyOf` or a multi-valued `type`.
 *
 * Only the first alternative is authoritative; see {@link resolveNode}.
 */
export interface UnionNode {
	kind: "union";
	alternatives: [TypeNode, ...TypeNode[]];
	nullable: boolean;
}

/** A declared object property, in declaration order. */
export interface PropertyNode {
	name: string;
	node: TypeNode;
}

/** Object with ordered properties and the names its schema marks required. */
export interface ObjectNode {
	kind: "object";
	properties: PropertyNode[];
	required: string[];
	nullable: boolean;
}

/** Homogeneous array of `items`. */
export interface ArrayNode {
	kind: "array";
	items: TypeNode;
	nullable: boolean;
}

/** Decoded schema node. */
export type TypeNode = LiteralNode | UnionNode | ObjectNode | ArrayNode;

/** Any node except a union. */
export type ResolvedNode = Exclude<TypeNode, UnionNode>;

/** Type guard for a plain JSON object (not an array, not a class instance). */
export function isRecord(value: unknown): value is Record<string, unknown> {
	if (typeof value !== "object" || value === null) return false;
	const proto: unknown = Object.getPrototypeOf(value);
	return proto === Object.prototype || proto === null;
}

function isLiteralType(type: string): type is LiteralType {
	return (LITERAL_TYPES as readonly string[]).includes(type);
}

function isNullMarker(raw: unknown): boolean {
	return isRecord(raw) && typeof raw.type === "string" && raw.type.toLowerCase() === "null";
}

/**
 * Decode a raw JSON-Schema node into a {@link TypeNode}.
 *
 * `anyOf` takes precedence over `type`. A `type` array drops its `"null"`
 * entries into the `nullable` flag; several remaining entries become a union
 * whose alternatives share the node's other keywords.
 *
 * @param raw - The schema node as parsed from the SCHEMA message
 * @returns The decoded node, or an {@link UnknownTypeError} naming the offending node
 */
export function decodeTypeNode(raw: unknown): Result<TypeNode, UnknownTypeError> {
	if (!isRecord(raw)) {
		return Err(new UnknownTypeError("Schema node must be an object", raw));
	}

	if (Array.isArray(raw.anyOf)) {
		return decodeAnyOf(raw, raw.anyOf);
	}

	const declared = raw.type;
	if (typeof declared === "string") {
		return decodeKind(raw, declared, false);
	}

	if (Array.isArray(declared)) {
		const kinds: string[] = [];
		let nullable = false;
		for (const entry of declared) {
			if (typeof entry !== "string") {
				return Err(new UnknownTypeError("Type array entries must be strings", raw));
			}
			if (entry.toLowerCase() === "null") {
				nullable = true;
			} else {
				kinds.push(entry);
			}
		}

		const [first, ...rest] = kinds;
		if (first === undefined) {
			return Err(new UnknownTypeError("No non-null type declared", raw));
		}
		if (rest.length === 0) {
			return decodeKind(raw, first, nullable);
		}

		const head = decodeKind(raw, first, false);
		if (!head.ok) return head;
		const alternatives: [TypeNode, ...TypeNode[]] = [head.value];
		for (const kind of rest) {
			const alt = decodeKind(raw, kind, false);
			if (!alt.ok) return alt;
			alternatives.push(alt.value);
		}
		return Ok({ kind: "union", alternatives, nullable });
	}

	return Err(new UnknownTypeError("'type' or 'anyOf' are required fields in property", raw));
}

function decodeAnyOf(raw: Record<string, unknown>, options: unknown[]): Result<UnionNode, UnknownTypeError> {
	const alternatives: TypeNode[] = [];
	let nullable = false;

	for (const option of options) {
		if (isNullMarker(option)) {
			nullable = true;
			continue;
		}
		const decoded = decodeTypeNode(option);
		if (!decoded.ok) return decoded;
		alternatives.push(decoded.value);
	}

	const [first, ...rest] = alternatives;
	if (first === undefined) {
		return Err(new UnknownTypeError("anyOf declares no non-null alternative", raw));
	}
	return Ok({ kind: "union", alternatives: [first, ...rest], nullable });
}

function decodeKind(
	raw: Record<string, unknown>,
	kind: string,
	nullable: boolean,
): Result<TypeNode, UnknownTypeError> {
	if (kind === "object") {
		return decodeObject(raw, nullable);
	}

	if (kind === "array") {
		const items = decodeTypeNode(raw.items ?? {});
		if (!items.ok) return items;
		if (resolveNode(items.value).kind === "array") {
			return Err(new UnknownTypeError("Nested arrays are not supported", raw));
		}
		return Ok({ kind: "array", items: items.value, nullable });
	}

	if (isLiteralType(kind)) {
		const node: LiteralNode = { kind: "literal", type: kind, nullable };
		if (typeof raw.format === "string") {
			node.format = raw.format;
		}
		return Ok(node);
	}

	return Err(new UnknownTypeError(`unknown type: ${kind}`, raw));
}

function decodeObject(raw: Record<string, unknown>, nullable: boolean): Result<ObjectNode, UnknownTypeError> {
	const properties: PropertyNode[] = [];
	const declared = raw.properties ?? {};
	if (!isRecord(declared)) {
		return Err(new UnknownTypeError("'properties' must be an object", raw));
	}

	const columns = new Map<string, string>();
	for (const [name, child] of Object.entries(declared)) {
		// A null or empty property schema carries no type; it gets no column.
		if (child === null || (isRecord(child) && Object.keys(child).length === 0)) continue;

		const column = sanitizeFieldName(name);
		const taken = columns.get(column);
		if (taken !== undefined) {
			return Err(
				new UnknownTypeError(`Properties "${taken}" and "${name}" both map to column "${column}"`, declared),
			);
		}
		columns.set(column, name);

		const node = decodeTypeNode(child);
		if (!node.ok) return node;
		properties.push({ name, node: node.value });
	}

	const required = Array.isArray(raw.required)
		? raw.required.filter((name): name is string => typeof name === "string")
		: [];

	return Ok({ kind: "object", properties, required, nullable });
}

/**
 * Resolve a union to its authoritative alternative: the first non-null one.
 *
 * Known limitation: any further non-null alternatives are discarded, so
 * polymorphic fields keep only their first declared shape.
 */
export function resolveNode(node: TypeNode): ResolvedNode {
	let current: TypeNode = node;
	while (current.kind === "union") {
		current = current.alternatives[0];
	}
	return current;
}
