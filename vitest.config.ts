import { defineConfig } from "vitest/config"

export default defineConfig({
	test: {
		include: ["test/**/*.test.ts"],
		globals: false, // Explicit imports preferred
		environment: "node",
		testTimeout: 30000,
		setupFiles: ["test/helpers/setup.ts"],
		coverage: {
			provider: "v8",
			reporter: ["text", "json-summary", "html"],
			include: ["src/**/*.ts"],
			exclude: ["src/cli/**", "src/logger.ts", "src/ui.ts"],
			thresholds: {
				// Retry and validation logic
				"src/download.ts": { statements: 85, branches: 75 },
				"src/catalog.ts": { statements: 85, branches: 70 },
				// IO modules
				"src/extract.ts": { statements: 70 },
			},
		},
	},
})
