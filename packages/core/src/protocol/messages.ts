import { isLosslessNumber } from "lossless-json";
import { isRecord } from "../schema/type-node";
import { InvalidMessageError } from "../result/errors";
import { Err, Ok, type Result } from "../result/result";

/** Declares (or re-declares) the shape and key properties of a stream. */
export interface SchemaMessage {
	type: "SCHEMA";
	stream: string;
	schema: unknown;
	keyProperties: string[];
	bookmarkProperties?: string[];
}

/** One data record for a stream. */
export interface RecordMessage {
	type: "RECORD";
	stream: string;
	record: unknown;
	version?: number;
	timeExtracted?: string;
}

/** Opaque replication progress marker. */
export interface StateMessage {
	type: "STATE";
	value: unknown;
}

/** Table version switch. Accepted and ignored. */
export interface ActivateVersionMessage {
	type: "ACTIVATE_VERSION";
	stream: string;
	version: number;
}

/** A decoded line of the input stream. */
export type ProtocolMessage = SchemaMessage | RecordMessage | StateMessage | ActivateVersionMessage;

function requireKey(
	obj: Record<string, unknown>,
	key: string,
	type: string,
): Result<unknown, InvalidMessageError> {
	if (!Object.hasOwn(obj, key)) {
		return Err(new InvalidMessageError(`${type} message is missing required key "${key}"`));
	}
	return Ok(obj[key]);
}

function requireString(
	obj: Record<string, unknown>,
	key: string,
	type: string,
): Result<string, InvalidMessageError> {
	const value = requireKey(obj, key, type);
	if (!value.ok) return value;
	if (typeof value.value !== "string") {
		return Err(new InvalidMessageError(`${type} message key "${key}" must be a string`));
	}
	return Ok(value.value);
}

function toStringList(value: unknown): string[] | undefined {
	if (value === null) return [];
	if (typeof value === "string") return [value];
	if (!Array.isArray(value)) return undefined;
	const names: string[] = [];
	for (const item of value) {
		if (typeof item !== "string") return undefined;
		names.push(item);
	}
	return names;
}

function toVersion(value: unknown): number | undefined {
	if (typeof value === "number") return value;
	// Versions past Number.MAX_SAFE_INTEGER arrive as exact decimal text.
	if (isLosslessNumber(value)) {
		const parsed = Number(value.value);
		return Number.isFinite(parsed) ? parsed : undefined;
	}
	return undefined;
}

/**
 * Decode a parsed JSON value into a {@link ProtocolMessage}.
 *
 * @param raw - One parsed input line
 * @returns The message, or an {@link InvalidMessageError} for an unknown `type` or a missing required key
 */
export function decodeMessage(raw: unknown): Result<ProtocolMessage, InvalidMessageError> {
	if (!isRecord(raw)) {
		return Err(new InvalidMessageError(`Message must be a JSON object: ${JSON.stringify(raw)}`));
	}

	const type = raw.type;
	switch (type) {
		case "SCHEMA": {
			const stream = requireString(raw, "stream", type);
			if (!stream.ok) return stream;
			const schema = requireKey(raw, "schema", type);
			if (!schema.ok) return schema;
			const keys = requireKey(raw, "key_properties", type);
			if (!keys.ok) return keys;

			const keyProperties = toStringList(keys.value);
			if (keyProperties === undefined) {
				return Err(new InvalidMessageError(`SCHEMA message for "${stream.value}" has invalid key_properties`));
			}

			const message: SchemaMessage = {
				type,
				stream: stream.value,
				schema: schema.value,
				keyProperties,
			};
			const bookmarks = toStringList(raw.bookmark_properties);
			if (raw.bookmark_properties !== undefined && bookmarks !== undefined) {
				message.bookmarkProperties = bookmarks;
			}
			return Ok(message);
		}

		case "RECORD": {
			const stream = requireString(raw, "stream", type);
			if (!stream.ok) return stream;
			const record = requireKey(raw, "record", type);
			if (!record.ok) return record;

			const message: RecordMessage = { type, stream: stream.value, record: record.value };
			const version = toVersion(raw.version);
			if (version !== undefined) message.version = version;
			if (typeof raw.time_extracted === "string") message.timeExtracted = raw.time_extracted;
			return Ok(message);
		}

		case "STATE": {
			const value = requireKey(raw, "value", type);
			if (!value.ok) return value;
			return Ok({ type, value: value.value });
		}

		case "ACTIVATE_VERSION": {
			const stream = requireString(raw, "stream", type);
			if (!stream.ok) return stream;
			const version = toVersion(raw.version);
			if (version === undefined) {
				return Err(new InvalidMessageError(`ACTIVATE_VERSION message for "${stream.value}" needs a numeric version`));
			}
			return Ok({ type, stream: stream.value, version });
		}

		default:
			return Err(new InvalidMessageError(`Unrecognized message type: ${JSON.stringify(type ?? null)}`));
	}
}
