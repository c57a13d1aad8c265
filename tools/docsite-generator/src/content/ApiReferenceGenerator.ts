import { type CodeElements, extractCodeElements, extractFirstSection, stripFrontmatter } from "docsite-common";

export interface SourceFile {
	/** Repository-relative path with forward slashes */
	path: string;
	content: string;
}

export interface ApiReferenceInputs {
	/** Existing API documentation found in the repository, used verbatim */
	document?: string;
	readme?: string;
	readmeSections?: Array<string>;
	sourceFiles?: Array<SourceFile>;
}

export interface ApiReferenceOptions {
	title?: string;
	/** Files listed per module before the rest are summarized; defaults to 10 */
	maxFiles?: number;
}

export const DEFAULT_MAX_FILES = 10;
const DEFAULT_README_SECTIONS = ["API"];
const ROOT_MODULE = "root";

function capitalize(value: string): string {
	return value.charAt(0).toUpperCase() + value.slice(1);
}

function baseName(path: string): string {
	return path.slice(path.lastIndexOf("/") + 1);
}

function moduleName(path: string): string {
	const slash = path.indexOf("/");
	return slash > 0 ? path.slice(0, slash) : ROOT_MODULE;
}

function renderElements(lines: Array<string>, elements: CodeElements): void {
	if (elements.classes.length > 0) {
		lines.push("**Classes:**\n");
		for (const { name, description } of elements.classes) {
			lines.push(`- \`${name}\`${description ? `: ${description}` : ""}`);
		}
	}
	if (elements.functions.length > 0) {
		lines.push("\n**Functions:**\n");
		for (const { name, description } of elements.functions) {
			lines.push(`- \`${name}()\`${description ? `: ${description}` : ""}`);
		}
	}
}

/**
 * Renders an overview of classes and functions grouped by top-level directory. Returns an
 * empty string when there are no files.
 */
export function renderSourceOverview(sourceFiles: Array<SourceFile>, maxFiles = DEFAULT_MAX_FILES): string {
	const modules = new Map<string, Array<SourceFile>>();
	for (const file of sourceFiles) {
		const name = moduleName(file.path);
		modules.set(name, [...(modules.get(name) ?? []), file]);
	}

	const lines: Array<string> = [];
	for (const name of [...modules.keys()].sort()) {
		const files = (modules.get(name) ?? []).sort((a, b) => a.path.localeCompare(b.path));
		lines.push(`\n## ${capitalize(name)} Module\n`);
		for (const file of files.slice(0, maxFiles)) {
			lines.push(`\n### ${baseName(file.path)}\n`);
			lines.push(`Path: \`${file.path}\`\n`);
			renderElements(lines, extractCodeElements(file.path, file.content));
		}
		if (files.length > maxFiles) {
			lines.push(`\n*...and ${files.length - maxFiles} more files*\n`);
		}
	}
	return lines.join("\n");
}

/**
 * Builds the API reference page. Existing API documentation wins, then an API section of
 * the README, then an overview generated from the source files; with none of these a
 * placeholder page is returned.
 */
export function generateApiReference(inputs: ApiReferenceInputs, options: ApiReferenceOptions = {}): string {
	const content = [
		`# ${options.title ?? "API Reference"}\n`,
		"This page provides documentation for the API of this project.\n",
	];

	if (inputs.document) {
		content.push(stripFrontmatter(inputs.document));
		return content.join("\n");
	}

	if (inputs.readme) {
		const section = extractFirstSection(inputs.readme, inputs.readmeSections ?? DEFAULT_README_SECTIONS);
		if (section) {
			content.push(section);
			return content.join("\n");
		}
	}

	const overview = renderSourceOverview(inputs.sourceFiles ?? [], options.maxFiles);
	if (overview) {
		content.push(overview);
	} else {
		content.push(
			"\n*No API documentation is available at this time.*\n",
			"\nConsider adding API documentation to your project by:\n",
			"- Adding a dedicated API.md file in your docs directory",
			"- Using doc comments in your code",
			"- Implementing API documentation tools like Swagger, JSDoc, or Sphinx",
		);
	}
	return content.join("\n");
}
