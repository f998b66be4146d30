import { describe, expect, it } from "vitest";
import { parseLine } from "../../protocol/parse";
import { RecordValidationError } from "../../result/errors";
import { createRecordValidator } from "../record-validator";

const schema = {
	type: "object",
	properties: {
		id: { type: "integer" },
		price: { type: ["null", "number"], minimum: 0 },
		created_at: { type: "string", format: "date-time" },
	},
	required: ["id"],
};

describe("createRecordValidator", () => {
	const validate = createRecordValidator("orders", schema);

	it("accepts a conforming record", () => {
		expect(validate({ id: 1, price: null, created_at: "2024-01-01T00:00:00Z" }).ok).toBe(true);
	});

	it("treats exact-text decimals as numbers", () => {
		const parsed = parseLine('{"id":1,"price":19.99}', 1);
		if (!parsed.ok) throw parsed.error;
		expect(validate(parsed.value).ok).toBe(true);
	});

	it("does not enforce format hints", () => {
		expect(validate({ id: 1, created_at: "yesterday" }).ok).toBe(true);
	});

	it("fails with RecordValidationError listing every problem", () => {
		const result = validate({ price: "free" });
		expect(result.ok).toBe(false);
		if (!result.ok) {
			expect(result.error).toBeInstanceOf(RecordValidationError);
			expect(result.error.stream).toBe("orders");
			expect(result.error.details).toHaveLength(2);
			expect(result.error.details).toContain("record must have required property 'id'");
			expect(result.error.details).toContain("/price must be null,number");
		}
	});

	it("compiles schemas that declare an older draft and an $id", () => {
		const withDraft = {
			$schema: "http://json-schema.org/draft-04/schema#",
			$id: "urn:test:users",
			type: "object",
			properties: { id: { type: "integer" } },
		};
		expect(createRecordValidator("users", withDraft)({ id: 2 }).ok).toBe(true);
		expect(createRecordValidator("users", withDraft)({ id: "x" }).ok).toBe(false);
	});
});
