import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		include: ["common/src/**/*.test.ts", "tools/*/src/**/*.test.ts"],
		pool: "forks",
		coverage: {
			provider: "v8",
			reporter: ["text", "json", "html"],
			include: ["common/src/**/*.ts", "tools/*/src/**/*.ts"],
			exclude: ["**/*.test.ts", "**/index.ts", "tools/*/src/bin.ts"],
		},
	},
});
