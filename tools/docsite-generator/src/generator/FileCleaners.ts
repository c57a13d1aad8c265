import { getLog } from "../shared/logger";
import { readFile, writeFile } from "node:fs/promises";
import { cleanApiReference, sanitizeMdx, stripFrontmatter } from "docsite-common";

const log = getLog(import.meta);

export interface SanitizeFileOptions {
	/** Also apply the API reference cleaner */
	api?: boolean;
	/** Report whether the file would change without writing it */
	check?: boolean;
}

export interface SanitizeFileResult {
	success: boolean;
	changed: boolean;
	error?: string;
}

/**
 * Applies a content transform to the body of a markdown document, keeping any frontmatter
 * block as it is.
 */
export function transformBody(content: string, transform: (body: string) => string): string {
	const body = stripFrontmatter(content);
	const frontmatter = content.slice(0, content.length - body.length);
	return frontmatter + transform(body);
}

export function sanitizeDocument(content: string, options: Pick<SanitizeFileOptions, "api"> = {}): string {
	return transformBody(content, body => {
		const sanitized = sanitizeMdx(body);
		return options.api ? cleanApiReference(sanitized) : sanitized;
	});
}

/**
 * Sanitizes a markdown file in place so that it compiles as MDX.
 */
export async function sanitizeFile(path: string, options: SanitizeFileOptions = {}): Promise<SanitizeFileResult> {
	try {
		const original = await readFile(path, "utf-8");
		const sanitized = sanitizeDocument(original, options);
		const changed = sanitized !== original;
		if (changed && !options.check) {
			await writeFile(path, sanitized, "utf-8");
			log.debug(`Sanitized ${path}`);
		}
		return { success: true, changed };
	} catch (error) {
		const message = error instanceof Error ? error.message : String(error);
		log.warn(`Failed to sanitize ${path}: ${message}`);
		return { success: false, changed: false, error: message };
	}
}

/**
 * Runs the API reference cleaner over an already sanitized page in place.
 *
 * @returns false when the file could not be read or written
 */
export async function cleanApiReferenceFile(path: string): Promise<boolean> {
	try {
		const content = await readFile(path, "utf-8");
		const cleaned = transformBody(content, cleanApiReference);
		if (cleaned !== content) {
			await writeFile(path, cleaned, "utf-8");
			log.info(`Cleaned API reference ${path}`);
		}
		return true;
	} catch (error) {
		const message = error instanceof Error ? error.message : String(error);
		log.warn(`Failed to clean API reference ${path}: ${message}`);
		return false;
	}
}
