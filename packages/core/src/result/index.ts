export {
	AdapterError,
	ConfigError,
	type ErrorReason,
	formatReasons,
	InsertFailureError,
	InvalidMessageError,
	LoadFailureError,
	ParseError,
	RecordValidationError,
	SchemaNotFoundError,
	SinkError,
	toError,
	UnknownTypeError,
} from "./errors";
export {
	Err,
	flatMapResult,
	Ok,
	type Result,
	unwrapOrThrow,
} from "./result";
