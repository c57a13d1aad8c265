import { readFileSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";
import { parse as parseEnv } from "dotenv";
import { z } from "zod";

/**
 * Configuration schema definition
 */
const configSchema = {
	// Log level for pino logger
	LOG_LEVEL: z.enum(["trace", "debug", "info", "warn", "error", "fatal"]).default("info"),

	// Default output directory for `docsite generate`
	DOCSITE_OUTPUT_DIR: z.string().min(1).default("./docsite"),
};

type ConfigSchema = typeof configSchema;
export type Config = {
	[K in keyof ConfigSchema]: z.infer<ConfigSchema[K]>;
};

/**
 * Load a .env file, returning an empty object if it doesn't exist.
 */
function loadEnvFile(path: string): Record<string, string> {
	try {
		return parseEnv(readFileSync(path, "utf-8"));
	} catch {
		return {};
	}
}

/**
 * Load environment variables from .env files.
 * Priority (highest to lowest):
 * 1. Process environment variables
 * 2. .env in the current working directory
 * 3. ~/.docsite/.env
 */
function loadEnvFiles(): Record<string, string> {
	const userEnv = loadEnvFile(join(homedir(), ".docsite", ".env"));
	const localEnv = loadEnvFile(join(process.cwd(), ".env"));
	return { ...userEnv, ...localEnv };
}

function createConfig(): Config {
	const envFromFiles = loadEnvFiles();

	function getEnvValue(key: keyof Config): string | undefined {
		const envValue = process.env[key] ?? envFromFiles[key];
		// Treat empty string as undefined so defaults apply
		return envValue === "" ? undefined : envValue;
	}

	return {
		LOG_LEVEL: configSchema.LOG_LEVEL.parse(getEnvValue("LOG_LEVEL")),
		DOCSITE_OUTPUT_DIR: configSchema.DOCSITE_OUTPUT_DIR.parse(getEnvValue("DOCSITE_OUTPUT_DIR")),
	};
}

let currentConfig: Config | undefined;

/**
 * Gets the current configuration object.
 * Config is created on first access and cached.
 */
export function getConfig(): Config {
	if (!currentConfig) {
		currentConfig = createConfig();
	}
	return currentConfig;
}

/**
 * Resets the config cache (useful for testing)
 */
export function resetConfig(): void {
	currentConfig = undefined;
}
