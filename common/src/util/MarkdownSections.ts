import { extractFrontmatter } from "./Frontmatter";
import { isFenceDelimiter } from "./MdxSanitization";

const HEADING = /^(#{1,6})\s+(.*)$/;
const BULLET_POINT = /^\s*-\s+(.+)$/gm;

function escapeRegExp(text: string): string {
	return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Extracts a `##` or `###` section whose heading starts with the given name (case-insensitive),
 * up to the next heading of the same or a higher level. Headings inside fenced code blocks
 * are ignored.
 *
 * @returns the trimmed section including its heading, or undefined when not found
 */
export function extractSection(content: string, sectionName: string): string | undefined {
	const lines = content.split("\n");
	const startPattern = new RegExp(`^(#{2,3})\\s+${escapeRegExp(sectionName)}`, "i");

	let inFence = false;
	let start = -1;
	let level = 0;
	for (let i = 0; i < lines.length; i++) {
		const line = lines[i];
		if (isFenceDelimiter(line)) {
			inFence = !inFence;
			continue;
		}
		if (inFence) {
			continue;
		}
		if (start < 0) {
			const match = line.match(startPattern);
			if (match) {
				start = i;
				level = match[1].length;
			}
			continue;
		}
		const heading = line.match(HEADING);
		if (heading && heading[1].length <= level) {
			return lines.slice(start, i).join("\n").trim();
		}
	}
	return start < 0 ? undefined : lines.slice(start).join("\n").trim();
}

/**
 * Returns the first section found among the candidate names, in order.
 */
export function extractFirstSection(content: string, sectionNames: ReadonlyArray<string>): string | undefined {
	for (const name of sectionNames) {
		const section = extractSection(content, name);
		if (section) {
			return section;
		}
	}
	return;
}

/**
 * The document title: frontmatter `title`, falling back to the first level-one heading.
 */
export function extractTitle(content: string): string | undefined {
	const { data, body } = extractFrontmatter(content);
	if (typeof data.title === "string" && data.title.trim()) {
		return data.title.trim();
	}
	const heading = body.match(/^#\s+(.+)$/m);
	return heading ? heading[1].trim() : undefined;
}

/**
 * The first line of body text that is not a heading or a bullet point.
 */
export function extractFirstParagraph(content: string): string | undefined {
	const { body } = extractFrontmatter(content);
	for (const line of body.split("\n")) {
		const trimmed = line.trim();
		if (trimmed && !trimmed.startsWith("#") && !trimmed.startsWith("-")) {
			return trimmed;
		}
	}
	return;
}

/**
 * Bullet point texts (`- item`) in document order.
 */
export function extractBulletPoints(content: string, limit = Number.POSITIVE_INFINITY): Array<string> {
	const points: Array<string> = [];
	for (const match of content.matchAll(BULLET_POINT)) {
		if (points.length >= limit) {
			break;
		}
		points.push(match[1].trim());
	}
	return points;
}
