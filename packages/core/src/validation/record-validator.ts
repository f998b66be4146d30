import Ajv, { type ErrorObject } from "ajv";
import { isLosslessNumber } from "lossless-json";
import { RecordValidationError } from "../result/errors";
import { Err, Ok, type Result } from "../result/result";
import { isRecord } from "../schema/type-node";

const ajv = new Ajv({
	allErrors: true,
	strict: false,
	allowUnionTypes: true,
	// Format hints drive column types; they are not enforced on values.
	validateFormats: false,
	// Producers declare assorted drafts via $schema and reuse $id across streams.
	validateSchema: false,
	addUsedSchema: false,
});

/** Validates records of one stream against its declared schema. */
export type RecordValidator = (record: unknown) => Result<void, RecordValidationError>;

/** Exact-text numbers become plain numbers so JSON-Schema keywords apply to them. */
function toValidatable(value: unknown): unknown {
	if (isLosslessNumber(value)) return Number(value.value);
	if (Array.isArray(value)) return value.map(toValidatable);
	if (isRecord(value)) {
		const out: Record<string, unknown> = {};
		for (const [key, item] of Object.entries(value)) {
			out[key] = toValidatable(item);
		}
		return out;
	}
	return value;
}

function describeError(error: ErrorObject): string {
	const path = error.instancePath === "" ? "record" : error.instancePath;
	return `${path} ${error.message ?? "is invalid"}`;
}

/**
 * Compile a stream's schema into a record validator.
 *
 * @param stream - Stream name, carried on validation errors
 * @param schema - The raw schema from the SCHEMA message
 */
export function createRecordValidator(stream: string, schema: unknown): RecordValidator {
	const prepared = toValidatable(schema);
	const validate = ajv.compile(isRecord(prepared) ? prepared : {});

	return (record) => {
		if (validate(toValidatable(record))) {
			return Ok(undefined);
		}
		const details = (validate.errors ?? []).map(describeError);
		return Err(new RecordValidationError(stream, details));
	};
}
