import { existsSync, readFileSync } from "node:fs";
import { dirname } from "node:path";
import { describe, expect, it } from "vitest";
import { Spool } from "../spool";

describe("Spool", () => {
	it("appends lines and counts them", async () => {
		const spool = await Spool.create();
		await spool.append('{"id":1}\n');
		await spool.append('{"id":2}\n');
		await spool.close();

		expect(spool.rowCount).toBe(2);
		expect(readFileSync(spool.path, "utf-8")).toBe('{"id":1}\n{"id":2}\n');
		await spool.remove();
	});

	it("rejects appends after close", async () => {
		const spool = await Spool.create();
		await spool.close();
		await spool.close();
		await expect(spool.append("{}\n")).rejects.toMatchObject({ code: "SPOOL_CLOSED" });
		await spool.remove();
	});

	it("deletes its directory on remove", async () => {
		const spool = await Spool.create();
		await spool.append("{}\n");
		await spool.remove();
		expect(existsSync(dirname(spool.path))).toBe(false);
	});
});
