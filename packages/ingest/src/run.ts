import { ConfigError, type Logger } from "@bqsink/core";
import type { WarehouseClient } from "@bqsink/adapter";
import type { TargetConfig } from "./config";
import { BatchLoadEngine } from "./engines/batch-load";
import { StreamInsertEngine } from "./engines/stream-insert";
import { MessageStreamProcessor, type ProcessorOptions } from "./processor";

/** Inputs of {@link runTarget}. */
export interface RunTargetOptions {
	/** Protocol lines, in order. */
	lines: AsyncIterable<string>;
	client: WarehouseClient;
	config: TargetConfig;
	logger: Logger;
	/** Receives the final checkpoint, at most once. */
	emitState: (value: unknown) => void;
	/** Cool-down after recreating a table under the streaming strategy. */
	cooldownMs?: number;
	sleep?: (ms: number) => Promise<void>;
}

/** What a run did. */
export interface RunSummary {
	linesRead: number;
	tables: string[];
	/** The emitted checkpoint, or `null` when nothing was emitted. */
	checkpoint: unknown;
}

/**
 * Reject configurations no engine supports.
 *
 * Streaming inserts cannot overwrite a table atomically, so truncation
 * requires the batch strategy.
 */
export function assertSupportedConfig(config: TargetConfig): void {
	if (config.streamData && config.truncate) {
		throw new ConfigError(
			"Streaming data and truncating tables is not supported; set stream_data to false for FULL_TABLE replication",
		);
	}
}

/** Feed every line, flush, and emit the checkpoint. Engine resources are always released. */
async function consume<S>(processor: MessageStreamProcessor<S>, options: RunTargetOptions): Promise<RunSummary> {
	try {
		for await (const line of options.lines) {
			await processor.process(line);
		}
		const checkpoint = await processor.finish();

		if (checkpoint !== null && checkpoint !== undefined) {
			options.emitState(checkpoint);
		}

		return {
			linesRead: processor.linesRead,
			tables: processor.entries.map((entry) => entry.table),
			checkpoint: checkpoint ?? null,
		};
	} finally {
		await processor.close();
	}
}

/**
 * Run the target over a line stream.
 *
 * The checkpoint is emitted only after every table is durable: after all
 * load jobs finished (batch) or after every insert succeeded (streaming).
 * Any failure is thrown and nothing is emitted.
 */
export async function runTarget(options: RunTargetOptions): Promise<RunSummary> {
	const { client, config, logger } = options;
	assertSupportedConfig(config);

	logger.info("Target configured", {
		project: config.projectId,
		dataset: config.datasetId,
		location: config.location,
		streamData: config.streamData,
		truncate: config.truncate,
		tablePrefix: config.tablePrefix,
		tableSuffix: config.tableSuffix,
		validateRecords: config.validateRecords,
		forcedFulltables: config.forcedFulltables,
	});

	const dataset = await client.ensureDataset();
	if (dataset.ok) {
		logger.info("Dataset ready", { dataset: config.datasetId, location: config.location });
	} else {
		// The dataset may exist while the credentials may not create datasets.
		logger.warn("Could not create dataset, continuing", {
			dataset: config.datasetId,
			error: dataset.error.cause?.message ?? dataset.error.message,
		});
	}

	const forcedFulltables = new Set(config.forcedFulltables);
	const processorOptions: ProcessorOptions = {
		logger,
		naming: { prefix: config.tablePrefix, suffix: config.tableSuffix },
		validateRecords: config.validateRecords,
	};

	if (config.streamData) {
		const engine = new StreamInsertEngine({
			client,
			logger,
			forcedFulltables,
			cooldownMs: options.cooldownMs,
			sleep: options.sleep,
		});
		return consume(new MessageStreamProcessor(engine, processorOptions), options);
	}

	const engine = new BatchLoadEngine({ client, logger, truncate: config.truncate, forcedFulltables });
	return consume(new MessageStreamProcessor(engine, processorOptions), options);
}
