import { readFileSync } from "node:fs";
import { ConfigError, Err, isRecord, Ok, type Result, toError } from "@bqsink/core";
import { DEFAULT_TARGET_CONFIG, type TargetConfig } from "@bqsink/ingest";

/** Read and parse the JSON configuration file. */
export function loadConfigFile(path: string): Result<unknown, ConfigError> {
	let raw: string;
	try {
		raw = readFileSync(path, "utf-8");
	} catch (error) {
		return Err(new ConfigError(`Unable to read config file ${path}`, toError(error)));
	}
	try {
		return Ok(JSON.parse(raw));
	} catch (error) {
		return Err(new ConfigError(`Config file ${path} is not valid JSON`, toError(error)));
	}
}

function optionalString(
	obj: Record<string, unknown>,
	key: string,
	fallback: string,
): Result<string, ConfigError> {
	const value = obj[key];
	if (value === undefined || value === null) return Ok(fallback);
	if (typeof value !== "string") {
		return Err(new ConfigError(`${key} must be a string`));
	}
	return Ok(value);
}

function optionalBoolean(
	obj: Record<string, unknown>,
	key: string,
	fallback: boolean,
): Result<boolean, ConfigError> {
	const value = obj[key];
	if (value === undefined || value === null) return Ok(fallback);
	if (typeof value !== "boolean") {
		return Err(new ConfigError(`${key} must be a boolean`));
	}
	return Ok(value);
}

function requiredString(obj: Record<string, unknown>, key: string): Result<string, ConfigError> {
	const value = obj[key];
	if (typeof value !== "string" || value.length === 0) {
		return Err(new ConfigError(`${key} must be a non-empty string`));
	}
	return Ok(value);
}

/**
 * Validate a parsed configuration file and apply defaults.
 *
 * Checks:
 * - `project_id` and `dataset_id` are non-empty strings
 * - optional keys have the right type when present
 * - `forced_fulltables` is a list of table names
 *
 * `replication_method: "FULL_TABLE"` turns on truncation; any other value appends.
 *
 * @param input - Raw input to validate.
 * @returns The validated {@link TargetConfig} or a {@link ConfigError}.
 */
export function validateTargetConfig(input: unknown): Result<TargetConfig, ConfigError> {
	if (!isRecord(input)) {
		return Err(new ConfigError("Config must be a JSON object"));
	}

	const projectId = requiredString(input, "project_id");
	if (!projectId.ok) return projectId;
	const datasetId = requiredString(input, "dataset_id");
	if (!datasetId.ok) return datasetId;

	const location = optionalString(input, "location", DEFAULT_TARGET_CONFIG.location);
	if (!location.ok) return location;
	const tablePrefix = optionalString(input, "table_prefix", DEFAULT_TARGET_CONFIG.tablePrefix);
	if (!tablePrefix.ok) return tablePrefix;
	const tableSuffix = optionalString(input, "table_suffix", DEFAULT_TARGET_CONFIG.tableSuffix);
	if (!tableSuffix.ok) return tableSuffix;
	const replicationMethod = optionalString(input, "replication_method", "");
	if (!replicationMethod.ok) return replicationMethod;

	const streamData = optionalBoolean(input, "stream_data", DEFAULT_TARGET_CONFIG.streamData);
	if (!streamData.ok) return streamData;
	const validateRecords = optionalBoolean(input, "validate_records", DEFAULT_TARGET_CONFIG.validateRecords);
	if (!validateRecords.ok) return validateRecords;

	// --- forced_fulltables ---
	const forced = input.forced_fulltables ?? [];
	if (!Array.isArray(forced)) {
		return Err(new ConfigError("forced_fulltables must be an array of table names"));
	}
	const forcedFulltables: string[] = [];
	for (const table of forced) {
		if (typeof table !== "string") {
			return Err(new ConfigError("forced_fulltables must be an array of table names"));
		}
		forcedFulltables.push(table);
	}

	const config: TargetConfig = {
		projectId: projectId.value,
		datasetId: datasetId.value,
		location: location.value,
		streamData: streamData.value,
		truncate: replicationMethod.value === "FULL_TABLE",
		forcedFulltables,
		tablePrefix: tablePrefix.value,
		tableSuffix: tableSuffix.value,
		validateRecords: validateRecords.value,
	};

	// --- key_file ---
	const keyFile = input.key_file;
	if (keyFile !== undefined && keyFile !== null) {
		if (typeof keyFile !== "string" || keyFile.length === 0) {
			return Err(new ConfigError("key_file must be a non-empty string"));
		}
		config.keyFile = keyFile;
	}

	return Ok(config);
}
