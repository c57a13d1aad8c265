import { cleanApiReferenceFile, sanitizeFile } from "../generator/FileCleaners";
import type { Command } from "commander";
import { glob } from "glob";

interface SanitizeOptions {
	api: boolean;
	check: boolean;
}

/**
 * Expands file arguments and glob patterns into a sorted list of files.
 */
export async function expandPatterns(patterns: Array<string>): Promise<Array<string>> {
	const files = await glob(patterns, { nodir: true, ignore: ["**/node_modules/**"] });
	return [...new Set(files)].sort();
}

async function runSanitize(patterns: Array<string>, options: SanitizeOptions): Promise<void> {
	const files = await expandPatterns(patterns);
	if (files.length === 0) {
		throw new Error(`No files matched: ${patterns.join(", ")}`);
	}

	const failed: Array<string> = [];
	const changed: Array<string> = [];
	for (const file of files) {
		const result = await sanitizeFile(file, options);
		if (!result.success) {
			failed.push(`${file}: ${result.error ?? "unknown error"}`);
		} else if (result.changed) {
			changed.push(file);
			console.log(options.check ? `Would sanitize ${file}` : `Sanitized ${file}`);
		}
	}

	if (failed.length > 0) {
		throw new Error(`Failed to sanitize ${failed.length} file(s):\n${failed.join("\n")}`);
	}
	if (options.check && changed.length > 0) {
		throw new Error(`${changed.length} of ${files.length} file(s) need sanitizing`);
	}
	console.log(`${changed.length} of ${files.length} file(s) ${options.check ? "need sanitizing" : "changed"}`);
}

async function runCleanApi(files: Array<string>): Promise<void> {
	const failed: Array<string> = [];
	for (const file of files) {
		if (await cleanApiReferenceFile(file)) {
			console.log(`Cleaned ${file}`);
		} else {
			failed.push(file);
		}
	}
	if (failed.length > 0) {
		throw new Error(`Failed to clean ${failed.join(", ")}`);
	}
}

export function registerSanitizeCommands(program: Command): void {
	program
		.command("sanitize <patterns...>")
		.description("Escape markdown files in place so that they compile as MDX")
		.option("--api", "Also apply the API reference cleanup", false)
		.option("--check", "Report files that would change without writing them", false)
		.action(async (patterns: Array<string>, options: SanitizeOptions) => {
			try {
				await runSanitize(patterns, options);
			} catch (error) {
				const message = error instanceof Error ? error.message : String(error);
				console.error(`Error: ${message}`);
				process.exit(1);
			}
		});

	program
		.command("clean-api <files...>")
		.description("Run the API reference cleanup over already sanitized pages")
		.action(async (files: Array<string>) => {
			try {
				await runCleanApi(files);
			} catch (error) {
				const message = error instanceof Error ? error.message : String(error);
				console.error(`Error: ${message}`);
				process.exit(1);
			}
		});
}
