import { type FileHandle, mkdtemp, open, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { SinkError } from "@bqsink/core";

/**
 * Append-only newline-delimited JSON file holding one table's rows until the
 * end of the run. Owned by exactly one table entry.
 */
export class Spool {
	readonly path: string;
	private readonly dir: string;
	private handle: FileHandle | null;
	private rows = 0;

	private constructor(dir: string, path: string, handle: FileHandle) {
		this.dir = dir;
		this.path = path;
		this.handle = handle;
	}

	/** Create an empty spool in its own temporary directory. */
	static async create(): Promise<Spool> {
		const dir = await mkdtemp(join(tmpdir(), "bqsink-spool-"));
		const path = join(dir, "rows.jsonl");
		const handle = await open(path, "a");
		return new Spool(dir, path, handle);
	}

	/** Number of lines appended so far. */
	get rowCount(): number {
		return this.rows;
	}

	/** Append one serialised row (including its newline). */
	async append(line: string): Promise<void> {
		if (!this.handle) {
			throw new SinkError(`Spool ${this.path} is closed`, "SPOOL_CLOSED");
		}
		await this.handle.write(line);
		this.rows++;
	}

	/** Flush and close the file so it can be read by a load. Idempotent. */
	async close(): Promise<void> {
		const handle = this.handle;
		this.handle = null;
		await handle?.close();
	}

	/** Close and delete the spool. */
	async remove(): Promise<void> {
		await this.close();
		await rm(this.dir, { recursive: true, force: true });
	}
}
