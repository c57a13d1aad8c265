import type { SourceFile } from "../content/ApiReferenceGenerator";
import { getLog } from "../shared/logger";
import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { detectSourceLanguage } from "docsite-common";
import { glob } from "glob";

const log = getLog(import.meta);

/**
 * Reads a UTF-8 file, or returns undefined when it does not exist or cannot be read.
 */
export async function readOptionalFile(path: string): Promise<string | undefined> {
	try {
		return await readFile(path, "utf-8");
	} catch (error) {
		if (error instanceof Error && "code" in error && error.code !== "ENOENT") {
			log.warn(`Error reading ${path}: ${error.message}`);
		}
		return;
	}
}

/**
 * Returns the content of the first repository-relative path that exists.
 */
export async function readFirstExisting(
	repoPath: string,
	candidates: ReadonlyArray<string>,
): Promise<{ path: string; content: string } | undefined> {
	for (const candidate of candidates) {
		const content = await readOptionalFile(join(repoPath, candidate));
		if (content !== undefined) {
			return { path: candidate, content };
		}
	}
	return;
}

/**
 * Finds source files matching the include globs, keeping only languages whose classes and
 * functions can be extracted.
 */
export async function collectSourceFiles(
	repoPath: string,
	include: Array<string>,
	exclude: Array<string>,
): Promise<Array<SourceFile>> {
	const matches = await glob(include, { cwd: repoPath, nodir: true, ignore: exclude, posix: true });
	const files: Array<SourceFile> = [];
	for (const path of [...new Set(matches)].sort()) {
		if (!detectSourceLanguage(path)) {
			continue;
		}
		const content = await readOptionalFile(join(repoPath, path));
		if (content !== undefined) {
			files.push({ path, content });
		}
	}
	log.debug(`Found ${files.length} source files in ${repoPath}`);
	return files;
}
