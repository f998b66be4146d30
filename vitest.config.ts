import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const packages = fileURLToPath(new URL("./packages", import.meta.url));

export default defineConfig({
	resolve: {
		alias: {
			"@bqsink/core": `${packages}/core/src/index.ts`,
			"@bqsink/adapter": `${packages}/adapter/src/index.ts`,
			"@bqsink/ingest": `${packages}/ingest/src/index.ts`,
		},
	},
	test: {
		include: ["packages/*/src/**/__tests__/**/*.test.ts"],
		testTimeout: 10_000,
	},
});
