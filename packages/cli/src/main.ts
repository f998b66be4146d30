import { createInterface } from "node:readline";
import { BigQueryWarehouse, type WarehouseClient } from "@bqsink/adapter";
import { ConfigError, isLogLevel, Logger, type LogLevel, unwrapOrThrow } from "@bqsink/core";
import { runTarget, type TargetConfig } from "@bqsink/ingest";
import { flagValue, hasFlag, parseArgs } from "./args";
import { loadConfigFile, validateTargetConfig } from "./config";
import { emitState, print } from "./output";

export const VERSION = "0.1.0";

export const HELP = `bqsink - load a SCHEMA/RECORD/STATE message stream into BigQuery

Usage: bqsink --config <file> [options] < messages.jsonl

Options:
  --config, -c <file>      JSON config file (required)
  --log-level <level>      debug, info, warn or error (default: info)
  --help, -h               Show this help message
  --version, -v            Show version

Config keys:
  project_id               GCP project (required)
  dataset_id               Target dataset (required)
  location                 Dataset location (default: EU)
  stream_data              Stream inserts instead of batch loads (default: true)
  replication_method       FULL_TABLE overwrites every table
  forced_fulltables        Tables always overwritten
  table_prefix             Prepended to every table name
  table_suffix             Appended to every table name
  validate_records         Validate records against their schema (default: true)
  key_file                 Service account key (default: application credentials)

Checkpoints are written to stdout, logs to stderr.
`;

/** Collaborators {@link main} uses, replaceable in tests. */
export interface MainOptions {
	/** Message stream. Defaults to stdin. */
	input?: NodeJS.ReadableStream;
	/** Builds the warehouse client. Defaults to BigQuery. */
	createClient?: (config: TargetConfig) => WarehouseClient;
	/** Log sink. Defaults to stderr. */
	logWrite?: (line: string) => void;
}

function createBigQueryClient(config: TargetConfig): WarehouseClient {
	return new BigQueryWarehouse({
		projectId: config.projectId,
		dataset: config.datasetId,
		location: config.location,
		keyFilename: config.keyFile,
	});
}

function resolveLogLevel(flags: Record<string, string>): LogLevel {
	const level = flagValue(flags, "log-level") ?? "info";
	if (!isLogLevel(level)) {
		throw new ConfigError(`Unknown log level "${level}"`);
	}
	return level;
}

/**
 * Run the command line. Throws on any failure; the caller decides how to
 * report it and which exit code to use.
 */
export async function main(argv: string[], options: MainOptions = {}): Promise<void> {
	const { flags } = parseArgs(argv);

	if (hasFlag(flags, "version", "v")) {
		print(VERSION);
		return;
	}

	if (hasFlag(flags, "help", "h")) {
		print(HELP);
		return;
	}

	const configPath = flagValue(flags, "config", "c");
	if (configPath === undefined) {
		throw new ConfigError("--config is required\nRun 'bqsink --help' for usage.");
	}

	const logger = new Logger(resolveLogLevel(flags), {}, options.logWrite);
	const config = unwrapOrThrow(validateTargetConfig(unwrapOrThrow(loadConfigFile(configPath))));
	const client = (options.createClient ?? createBigQueryClient)(config);

	const lines = createInterface({ input: options.input ?? process.stdin, crlfDelay: Number.POSITIVE_INFINITY });
	try {
		const summary = await runTarget({ lines, client, config, logger, emitState });
		logger.info("Run complete", { lines: summary.linesRead, tables: summary.tables });
	} finally {
		lines.close();
	}
}
