export { CheckpointSlot } from "./checkpoint";
export { DEFAULT_TARGET_CONFIG, type TargetConfig } from "./config";
export * from "./engines";
export { MessageStreamProcessor, type ProcessorOptions } from "./processor";
export { type TableEntry, type TableNaming, type TableRegistration, tableNameFor } from "./registry";
export { assertSupportedConfig, type RunSummary, type RunTargetOptions, runTarget } from "./run";
export { Spool } from "./spool";
