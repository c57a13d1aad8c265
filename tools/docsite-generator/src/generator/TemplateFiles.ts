import { getLog, logError } from "../shared/logger";
import { cp, mkdir, readFile, writeFile } from "node:fs/promises";
import { basename, dirname } from "node:path";
import { renderTemplate, type TemplateVariables } from "docsite-common";

const log = getLog(import.meta);

const SKIPPED_TEMPLATE_ENTRIES = new Set([".git", "node_modules", ".docusaurus", "build"]);

/**
 * Copies a local site template into the output directory, skipping version control and
 * build artifacts.
 */
export async function copyTemplate(templateDir: string, outputDir: string): Promise<boolean> {
	try {
		await cp(templateDir, outputDir, {
			recursive: true,
			filter: source => source === templateDir || !SKIPPED_TEMPLATE_ENTRIES.has(basename(source)),
		});
		log.info(`Copied template ${templateDir} to ${outputDir}`);
		return true;
	} catch (error) {
		logError(log, error, `Failed to copy template ${templateDir}`);
		return false;
	}
}

/**
 * Renders the `{{ name }}` placeholders of a template file into the output path. The two
 * paths may be the same file.
 */
export async function createFileFromTemplate(
	templatePath: string,
	outputPath: string,
	variables: TemplateVariables,
): Promise<boolean> {
	try {
		const template = await readFile(templatePath, "utf-8");
		await mkdir(dirname(outputPath), { recursive: true });
		await writeFile(outputPath, renderTemplate(template, variables), "utf-8");
		log.debug(`Created ${outputPath} from template`);
		return true;
	} catch (error) {
		logError(log, error, `Error creating file from template ${templatePath}`);
		return false;
	}
}
