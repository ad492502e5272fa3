import { fileURLToPath } from "url";
import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		include: ["packages/*/test/**/*.test.ts"],
		environment: "node",
	},
	resolve: {
		alias: {
			"@timr/tui": fileURLToPath(new URL("./packages/tui/src/index.ts", import.meta.url)),
		},
	},
});
