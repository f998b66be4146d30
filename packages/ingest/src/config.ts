/** Target configuration, after validation and defaults. */
export interface TargetConfig {
	projectId: string;
	datasetId: string;
	/** Dataset location. */
	location: string;
	/** Stream records with inserts instead of loading them at the end. */
	streamData: boolean;
	/** Overwrite every table (`replication_method: FULL_TABLE`). */
	truncate: boolean;
	/** Tables overwritten regardless of `truncate`. */
	forcedFulltables: string[];
	tablePrefix: string;
	tableSuffix: string;
	validateRecords: boolean;
	/** Service account key file. Application Default Credentials when absent. */
	keyFile?: string;
}

/** Defaults for every optional key. */
export const DEFAULT_TARGET_CONFIG = {
	location: "EU",
	streamData: true,
	truncate: false,
	forcedFulltables: [],
	tablePrefix: "",
	tableSuffix: "",
	validateRecords: true,
} satisfies Omit<TargetConfig, "projectId" | "datasetId" | "keyFile">;
