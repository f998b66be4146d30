import { formatCheckpoint } from "@bqsink/core";

/** Print a message to stdout. */
export function print(message: string): void {
	process.stdout.write(`${message}\n`);
}

/** Print an error to stderr and exit with code 1. */
export function fatal(message: string): never {
	process.stderr.write(`Error: ${message}\n`);
	process.exit(1);
}

/** Write a checkpoint to stdout as one JSON line. */
export function emitState(value: unknown): void {
	print(formatCheckpoint(value));
}
