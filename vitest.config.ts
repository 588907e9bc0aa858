import { dirname } from "node:path";
import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
	resolve: {
		alias: {
			"@": dirname(fileURLToPath(import.meta.url)),
		},
	},
	test: {
		// Command tests change the working directory.
		pool: "forks",
		include: ["**/*.test.ts"],
		exclude: ["node_modules/**", "dist/**"],
	},
});
