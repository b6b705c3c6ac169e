import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
	resolve: {
		alias: {
			"@yamlpipe/core": fileURLToPath(
				new URL("./packages/core/src/index.ts", import.meta.url),
			),
		},
	},
	test: {
		include: ["packages/*/tests/**/*.test.ts"],
		environment: "node",
	},
});
