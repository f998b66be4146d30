import { describe, expect, it } from "vitest";
import { projectRecord } from "../project";
import { decodeTypeNode, type TypeNode } from "../type-node";

function node(raw: unknown): TypeNode {
	const result = decodeTypeNode(raw);
	if (!result.ok) throw result.error;
	return result.value;
}

const userSchema = node({
	type: "object",
	properties: {
		id: { type: "integer" },
		name: { type: ["null", "string"] },
		address: {
			type: ["null", "object"],
			properties: { city: { type: "string" } },
		},
		orders: {
			type: "array",
			items: { type: "object", properties: { sku: { type: "string" } } },
		},
		tags: { type: "array", items: { type: "string" } },
	},
});

describe("projectRecord", () => {
	it("drops keys the schema does not declare, at every depth", () => {
		const projected = projectRecord(userSchema, {
			id: 1,
			name: "a",
			extra: true,
			address: { city: "Utrecht", street: "Main" },
			orders: [{ sku: "x1", price: 3 }, { sku: "x2" }],
		});
		expect(projected).toEqual({
			id: 1,
			name: "a",
			address: { city: "Utrecht" },
			orders: [{ sku: "x1" }, { sku: "x2" }],
		});
	});

	it("does not introduce declared keys the record lacks", () => {
		expect(projectRecord(userSchema, { id: 7 })).toEqual({ id: 7 });
	});

	it("keeps explicit nulls for declared keys", () => {
		expect(projectRecord(userSchema, { id: 7, name: null, address: null })).toEqual({
			id: 7,
			name: null,
			address: null,
		});
	});

	it("returns arrays of scalars unchanged", () => {
		const tags = ["a", "b", 3];
		const projected = projectRecord(userSchema, { tags });
		expect(projected).toEqual({ tags });
	});

	it("returns empty and absent values unchanged", () => {
		expect(projectRecord(userSchema, null)).toBeNull();
		expect(projectRecord(userSchema, undefined)).toBeUndefined();
		expect(projectRecord(userSchema, {})).toEqual({});
	});

	it("projects through the first non-null union alternative", () => {
		const schema = node({
			anyOf: [
				{ type: "null" },
				{ type: "object", properties: { a: { type: "string" } } },
				{ type: "object", properties: { b: { type: "string" } } },
			],
		});
		expect(projectRecord(schema, { a: "1", b: "2" })).toEqual({ a: "1" });
	});

	it("passes through values whose shape does not match the node", () => {
		expect(projectRecord(userSchema, "not an object")).toBe("not an object");
	});
});
