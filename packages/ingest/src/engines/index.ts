export { BatchLoadEngine, type BatchLoadEngineOptions } from "./batch-load";
export {
	RECREATE_COOLDOWN_MS,
	StreamInsertEngine,
	type StreamInsertEngineOptions,
	type StreamTableState,
} from "./stream-insert";
export type { IngestionEngine, IngestionStrategy } from "./types";
