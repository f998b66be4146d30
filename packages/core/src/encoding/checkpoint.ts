import { stringify } from "lossless-json";

/**
 * Serialise a checkpoint value to a single JSON line (no trailing newline).
 *
 * Numbers the input carried as exact text are written back verbatim.
 */
export function formatCheckpoint(value: unknown): string {
	return stringify(value) ?? "null";
}
