import { AdapterError, Err, type ErrorReason, isRecord, Ok, type Result } from "@bqsink/core";

/** Normalise a caught value into an Error or undefined. */
export function toCause(error: unknown): Error | undefined {
	return error instanceof Error ? error : undefined;
}

/** Execute an async operation and wrap errors into an AdapterError Result. */
export async function wrapAsync<T>(
	operation: () => Promise<T>,
	errorMessage: string,
): Promise<Result<T, AdapterError>> {
	try {
		const value = await operation();
		return Ok(value);
	} catch (error) {
		if (error instanceof AdapterError) {
			return Err(error);
		}
		return Err(new AdapterError(errorMessage, toCause(error)));
	}
}

/** Convert one `{ reason, message }` entry of a Google API error, if it is one. */
export function toErrorReason(value: unknown): ErrorReason | undefined {
	if (!isRecord(value)) return undefined;
	const reason = typeof value.reason === "string" ? value.reason : "unknown";
	const message = typeof value.message === "string" ? value.message : "";
	const entry: ErrorReason = { reason, message };
	if (typeof value.index === "number") entry.index = value.index;
	return entry;
}

/**
 * Read the structured `errors` array Google API errors carry.
 *
 * Returns an empty list for errors without one.
 */
export function extractReasons(error: unknown): ErrorReason[] {
	if (typeof error !== "object" || error === null || !("errors" in error)) return [];
	const { errors } = error;
	if (!Array.isArray(errors)) return [];
	return errors.map(toErrorReason).filter((r): r is ErrorReason => r !== undefined);
}
