import { defineConfig } from "tsup";

export default defineConfig({
	entry: {
		bin: "src/bin.ts",
	},
	format: ["esm"],
	platform: "node",
	target: "node20",
	sourcemap: true,
	clean: true,
	// Workspace packages ship TypeScript sources and are inlined.
	noExternal: [/^@bqsink\//],
	external: ["@google-cloud/bigquery", "ajv", "lossless-json"],
});
