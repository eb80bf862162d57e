import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		include: ["src/**/*.test.ts", "__tests__/**/*.test.ts"],
		exclude: ["node_modules"],
		environment: "node",
		setupFiles: ["__tests__/setup.ts"],
		testTimeout: 30000,
		hookTimeout: 10000,
		pool: "threads",
		coverage: {
			provider: "v8",
			reporter: ["text", "html", "lcov"],
			include: ["src/**/*.ts"],
			exclude: ["src/**/*.test.ts", "src/types/**", "src/index.ts"],
		},
	},
});
