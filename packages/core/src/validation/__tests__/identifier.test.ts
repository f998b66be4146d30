import { describe, expect, it } from "vitest";
import { sanitizeFieldName } from "../identifier";

describe("sanitizeFieldName", () => {
	it("leaves legal names untouched", () => {
		expect(sanitizeFieldName("user_id")).toBe("user_id");
		expect(sanitizeFieldName("_private")).toBe("_private");
	});

	it("replaces hyphens and dots with underscores", () => {
		expect(sanitizeFieldName("first-name")).toBe("first_name");
		expect(sanitizeFieldName("address.city")).toBe("address_city");
		expect(sanitizeFieldName("a-b.c-d")).toBe("a_b_c_d");
	});

	it("prefixes names that start with a digit", () => {
		expect(sanitizeFieldName("1st_place")).toBe("_1st_place");
		expect(sanitizeFieldName("2019-total")).toBe("_2019_total");
	});

	it("is idempotent", () => {
		const once = sanitizeFieldName("9.lives-left");
		expect(once).toBe("_9_lives_left");
		expect(sanitizeFieldName(once)).toBe(once);
	});
});
