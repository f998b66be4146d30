import { AdapterError, ConfigError, Err, type Result, silentLogger } from "@bqsink/core";
import { MemoryWarehouse } from "@bqsink/adapter";
import { describe, expect, it, vi } from "vitest";
import { DEFAULT_TARGET_CONFIG, type TargetConfig } from "../config";
import { runTarget } from "../run";
import { capturingLogger, recordLine, schemaLine, stateLine } from "./helpers";

function config(overrides: Partial<TargetConfig> = {}): TargetConfig {
	return {
		...DEFAULT_TARGET_CONFIG,
		projectId: "test-project",
		datasetId: "test_dataset",
		...overrides,
	};
}

async function* linesOf(lines: string[]): AsyncGenerator<string> {
	yield* lines;
}

class ForbiddenDatasetWarehouse extends MemoryWarehouse {
	override async ensureDataset(): Promise<Result<void, AdapterError>> {
		return Err(new AdapterError("Failed to create dataset test_dataset in EU", new Error("Access denied")));
	}
}

const USERS_RUN = [schemaLine("users"), recordLine("users", { id: 1, name: "a" }), stateLine({ bookmark: 1 })];

describe("runTarget", () => {
	it("rejects streaming with truncation before reading input", async () => {
		let started = false;
		async function* lines(): AsyncGenerator<string> {
			started = true;
			yield schemaLine("users");
		}
		const emitState = vi.fn();

		const run = runTarget({
			lines: lines(),
			client: new MemoryWarehouse(),
			config: config({ streamData: true, truncate: true }),
			logger: silentLogger,
			emitState,
		});

		await expect(run).rejects.toBeInstanceOf(ConfigError);
		expect(started).toBe(false);
		expect(emitState).not.toHaveBeenCalled();
	});

	it("loads in batch and emits the checkpoint once", async () => {
		const client = new MemoryWarehouse();
		const emitState = vi.fn();

		const summary = await runTarget({
			lines: linesOf(USERS_RUN),
			client,
			config: config({ streamData: false }),
			logger: silentLogger,
			emitState,
		});

		expect(client.datasetCreated).toBe(true);
		expect(client.tables.get("users")?.rows).toEqual([{ id: 1, name: "a" }]);
		expect(emitState).toHaveBeenCalledTimes(1);
		expect(emitState).toHaveBeenCalledWith({ bookmark: 1 });
		expect(summary).toEqual({ linesRead: 3, tables: ["users"], checkpoint: { bookmark: 1 } });
	});

	it("emits the checkpoint only after the load finished", async () => {
		const client = new MemoryWarehouse();
		const events: string[] = [];
		const load = client.loadTable.bind(client);
		vi.spyOn(client, "loadTable").mockImplementation(async (table, filePath, options) => {
			const result = await load(table, filePath, options);
			events.push(`load ${table}`);
			return result;
		});

		await runTarget({
			lines: linesOf(USERS_RUN),
			client,
			config: config({ streamData: false }),
			logger: silentLogger,
			emitState: (value) => events.push(`state ${JSON.stringify(value)}`),
		});

		expect(events).toEqual(["load users", 'state {"bookmark":1}']);
	});

	it("inserts nothing into a recreated table before the cool-down ends", async () => {
		const client = new MemoryWarehouse();
		await client.createTable("users", []);
		let endCooldown: () => void = () => {};
		const sleep = vi.fn(
			(_ms: number) =>
				new Promise<void>((resolve) => {
					endCooldown = () => resolve();
				}),
		);

		const run = runTarget({
			lines: linesOf(USERS_RUN),
			client,
			config: config({ forcedFulltables: ["users"] }),
			logger: silentLogger,
			emitState: () => {},
			cooldownMs: 1000,
			sleep,
		});

		await vi.waitFor(() => expect(sleep).toHaveBeenCalledWith(1000));
		expect(client.deleted).toEqual(["users"]);
		expect(client.inserts).toEqual([]);

		endCooldown();
		await run;
		expect(client.inserts).toEqual([{ table: "users", rows: [{ id: 1, name: "a" }] }]);
	});

	it("streams rows and emits the checkpoint at the end", async () => {
		const client = new MemoryWarehouse();
		const emitState = vi.fn();

		await runTarget({
			lines: linesOf(USERS_RUN),
			client,
			config: config(),
			logger: silentLogger,
			emitState,
		});

		expect(client.inserts).toEqual([{ table: "users", rows: [{ id: 1, name: "a" }] }]);
		expect(client.loads).toEqual([]);
		expect(emitState).toHaveBeenCalledWith({ bookmark: 1 });
	});

	it("emits nothing without a trailing checkpoint", async () => {
		const emitState = vi.fn();
		const summary = await runTarget({
			lines: linesOf([schemaLine("users"), stateLine({ bookmark: 1 }), recordLine("users", { id: 1 })]),
			client: new MemoryWarehouse(),
			config: config({ streamData: false }),
			logger: silentLogger,
			emitState,
		});

		expect(emitState).not.toHaveBeenCalled();
		expect(summary.checkpoint).toBeNull();
	});

	it("emits nothing when the run fails", async () => {
		const emitState = vi.fn();
		const run = runTarget({
			lines: linesOf([stateLine({ bookmark: 1 }), recordLine("users", { id: 1 })]),
			client: new MemoryWarehouse(),
			config: config({ streamData: false }),
			logger: silentLogger,
			emitState,
		});

		await expect(run).rejects.toThrow("before a corresponding schema");
		expect(emitState).not.toHaveBeenCalled();
	});

	it("continues with a warning when the dataset cannot be created", async () => {
		const { logger, entries } = capturingLogger();
		const client = new ForbiddenDatasetWarehouse();

		await runTarget({
			lines: linesOf(USERS_RUN),
			client,
			config: config({ streamData: false }),
			logger,
			emitState: () => {},
		});

		expect(entries.find((entry) => entry.level === "warn")).toMatchObject({
			msg: "Could not create dataset, continuing",
			dataset: "test_dataset",
			error: "Access denied",
		});
		expect(client.tables.get("users")?.rows).toEqual([{ id: 1, name: "a" }]);
	});
});
