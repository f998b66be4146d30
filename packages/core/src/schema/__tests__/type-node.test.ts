import { describe, expect, it } from "vitest";
import { UnknownTypeError } from "../../result/errors";
import { decodeTypeNode, resolveNode, type TypeNode } from "../type-node";

function decoded(raw: unknown): TypeNode {
	const result = decodeTypeNode(raw);
	if (!result.ok) throw result.error;
	return result.value;
}

describe("decodeTypeNode", () => {
	it("decodes a literal with its format", () => {
		expect(decoded({ type: "string", format: "date-time" })).toEqual({
			kind: "literal",
			type: "string",
			format: "date-time",
			nullable: false,
		});
	});

	it("folds null out of a type array", () => {
		expect(decoded({ type: ["null", "integer"] })).toEqual({
			kind: "literal",
			type: "integer",
			nullable: true,
		});
	});

	it("treats a type array with several non-null kinds as a union in declared order", () => {
		const node = decoded({ type: ["string", "null", "integer"] });
		expect(node.kind).toBe("union");
		if (node.kind === "union") {
			expect(node.nullable).toBe(true);
			expect(node.alternatives.map((a) => (a.kind === "literal" ? a.type : a.kind))).toEqual([
				"string",
				"integer",
			]);
		}
	});

	it("decodes anyOf, skipping null alternatives", () => {
		const node = decoded({
			anyOf: [{ type: "null" }, { type: "string", format: "date" }, { type: "integer" }],
		});
		expect(node.kind).toBe("union");
		expect(resolveNode(node)).toEqual({ kind: "literal", type: "string", format: "date", nullable: false });
	});

	it("keeps object properties in declaration order and skips empty schemas", () => {
		const node = decoded({
			type: "object",
			properties: { b: { type: "string" }, skipped: {}, a: { type: "integer" } },
			required: ["a"],
		});
		expect(node.kind).toBe("object");
		if (node.kind === "object") {
			expect(node.properties.map((p) => p.name)).toEqual(["b", "a"]);
			expect(node.required).toEqual(["a"]);
		}
	});

	it("skips null property schemas", () => {
		const node = decoded({ type: "object", properties: { id: { type: "integer" }, legacy: null } });
		expect(node.kind === "object" && node.properties.map((p) => p.name)).toEqual(["id"]);
	});

	it("fails when two properties map to the same column", () => {
		const result = decodeTypeNode({
			type: "object",
			properties: { "a-b": { type: "string" }, a_b: { type: "integer" } },
		});
		expect(result.ok).toBe(false);
		if (!result.ok) {
			expect(result.error).toBeInstanceOf(UnknownTypeError);
			expect(result.error.message).toBe(
				'Properties "a-b" and "a_b" both map to column "a_b": {"a-b":{"type":"string"},"a_b":{"type":"integer"}}',
			);
		}
	});

	it("decodes arrays of objects", () => {
		const node = decoded({ type: "array", items: { type: "object", properties: { x: { type: "integer" } } } });
		expect(node.kind).toBe("array");
		if (node.kind === "array") {
			expect(node.items.kind).toBe("object");
		}
	});

	it("fails on a node with neither type nor anyOf", () => {
		const result = decodeTypeNode({ description: "no type" });
		expect(result.ok).toBe(false);
		if (!result.ok) {
			expect(result.error).toBeInstanceOf(UnknownTypeError);
			expect(result.error.node).toEqual({ description: "no type" });
		}
	});

	it("fails on an unknown kind", () => {
		const result = decodeTypeNode({ type: "decimal" });
		expect(result.ok).toBe(false);
		if (!result.ok) expect(result.error.message).toBe('unknown type: decimal: {"type":"decimal"}');
	});

	it("fails on a union with only null", () => {
		expect(decodeTypeNode({ type: ["null"] }).ok).toBe(false);
		expect(decodeTypeNode({ anyOf: [{ type: "null" }] }).ok).toBe(false);
	});

	it("fails on an array without items and on nested arrays", () => {
		expect(decodeTypeNode({ type: "array" }).ok).toBe(false);
		expect(decodeTypeNode({ type: "array", items: { type: "array", items: { type: "string" } } }).ok).toBe(
			false,
		);
	});

	it("reports the failing nested node", () => {
		const result = decodeTypeNode({
			type: "object",
			properties: { ok: { type: "string" }, broken: { format: "date" } },
		});
		expect(result.ok).toBe(false);
		if (!result.ok) expect(result.error.node).toEqual({ format: "date" });
	});
});
