import { fileURLToPath } from "node:url";
import { defineConfig } from "vite";

export default defineConfig({
	build: {
		lib: {
			entry: {
				bin: fileURLToPath(new URL("./src/bin.ts", import.meta.url)),
			},
			formats: ["es"],
		},
		rollupOptions: {
			// docsite-common ships TypeScript sources and is bundled in
			external: [/^node:/, "commander", "dotenv", "glob", "pino", "yaml", "zod"],
			output: {
				banner: "#!/usr/bin/env node",
			},
		},
		outDir: "dist",
		ssr: true,
		target: "node20",
		minify: false,
	},
});
