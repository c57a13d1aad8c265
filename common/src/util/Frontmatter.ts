import { parse as parseYaml, stringify as stringifyYaml } from "yaml";

export type FrontmatterData = Record<string, unknown>;

export interface ParsedFrontmatter {
	raw: string;
	data?: FrontmatterData;
}

/** Result of splitting a markdown file into its frontmatter and body. */
export interface FrontmatterSplit {
	/** Parsed frontmatter fields (empty when absent or not valid YAML) */
	data: FrontmatterData;
	/** The markdown body after the frontmatter block */
	body: string;
}

const FRONTMATTER_BLOCK = /^---\r?\n([\s\S]*?)\r?\n---(?:\r?\n|$)/;

export function isRecord(value: unknown): value is Record<string, unknown> {
	return !!value && typeof value === "object" && !Array.isArray(value);
}

function stripBom(content: string): string {
	return content.startsWith("\ufeff") ? content.slice(1) : content;
}

/**
 * Extracts YAML frontmatter from a markdown string.
 */
export function parseYamlFrontmatter(content: string): ParsedFrontmatter | null {
	const match = stripBom(content).match(FRONTMATTER_BLOCK);
	if (!match?.[1]) {
		return null;
	}

	const raw = match[1];
	let data: FrontmatterData | undefined;
	try {
		const parsed = parseYaml(raw);
		if (isRecord(parsed)) {
			data = parsed;
		}
	} catch {
		data = undefined;
	}

	return data !== undefined ? { raw, data } : { raw };
}

/**
 * Splits frontmatter from the body.
 *
 * If the frontmatter block is present but not valid YAML, the content is returned
 * unchanged as the body with no data.
 */
export function extractFrontmatter(content: string): FrontmatterSplit {
	const normalized = stripBom(content);
	const match = normalized.match(FRONTMATTER_BLOCK);
	const parsed = parseYamlFrontmatter(normalized);
	if (!match || !parsed?.data) {
		return { data: {}, body: content };
	}
	return { data: parsed.data, body: normalized.slice(match[0].length) };
}

/**
 * Removes a leading frontmatter block regardless of whether its YAML parses.
 */
export function stripFrontmatter(content: string): string {
	const normalized = stripBom(content);
	const match = normalized.match(FRONTMATTER_BLOCK);
	return match ? normalized.slice(match[0].length) : content;
}

/**
 * Renders a frontmatter block (including the trailing blank line) for the given fields.
 */
export function buildFrontmatter(data: FrontmatterData): string {
	const yaml = stringifyYaml(data, { lineWidth: 0 }).trimEnd();
	return `---\n${yaml}\n---\n\n`;
}
