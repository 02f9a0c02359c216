import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		globals: true,
		environment: "node",
		include: ["src/__tests__/**/*.test.ts"],
		testTimeout: 30000,
		hookTimeout: 10000,
		env: {
			// Keep test output quiet and skip the pino-pretty transport worker
			NODE_ENV: "production",
			LOG_LEVEL: "silent",
		},
		coverage: {
			provider: "v8",
			reporter: ["text", "html", "json-summary"],
			include: ["src/**/*.ts"],
			exclude: ["src/__tests__/**", "src/index.ts", "src/cli.ts", "src/commands/**"],
		},
	},
});
