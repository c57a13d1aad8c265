import {
	escapeMdxCharacters,
	type FenceState,
	HTML_ELEMENT_NAMES,
	isFenceDelimiter,
	OUTSIDE_FENCE,
	splitInlineCode,
} from "./MdxSanitization";

/**
 * Placeholder-like sequences that generated API references are known to emit.
 * Replaced literally on every line outside fenced code blocks, inline code included.
 */
export const API_REFERENCE_DENYLIST: ReadonlyArray<string> = Object.freeze([
	"<Type>",
	"<Key>",
	"<Value>",
	"<Generic>",
	"<Parameter>",
	"<Class>",
	"<Method>",
	"<Function>",
	"<Property>",
	"<ES>",
]);

/**
 * Elements that never take a closing tag.
 */
export const VOID_ELEMENT_NAMES: ReadonlySet<string> = new Set([
	"area",
	"base",
	"br",
	"col",
	"embed",
	"hr",
	"img",
	"input",
	"link",
	"meta",
	"source",
	"track",
	"wbr",
]);

const BARE_IDENTIFIER_TAG = /(?<![\\<])<([A-Za-z_]\w*)>/g;

const OPENING_TAG = /(?<!\\)<([A-Za-z][\w.-]*)((?:\s[^<>]*)?)>/g;

const CLOSING_TAG = /<\/([A-Za-z][\w.-]*)>/g;

/** Whether `</name>` appears on a line after the current one */
type LaterClosingCheck = (name: string) => boolean;

/**
 * Index of the last line on which each `</name>` appears.
 */
function indexClosingTags(lines: Array<string>): Map<string, number> {
	const lastLine = new Map<string, number>();
	lines.forEach((line, index) => {
		for (const match of line.matchAll(CLOSING_TAG)) {
			lastLine.set(match[1], index);
		}
	});
	return lastLine;
}

function isClosed(name: string, after: string, hasLaterClosing: LaterClosingCheck): boolean {
	return after.includes(`</${name}>`) || hasLaterClosing(name);
}

function escapeIdentifierTags(text: string, lineRest: string, hasLaterClosing: LaterClosingCheck): string {
	return text.replace(BARE_IDENTIFIER_TAG, (whole: string, name: string, offset: number) => {
		if (HTML_ELEMENT_NAMES.has(name.toLowerCase())) {
			return whole;
		}
		if (isClosed(name, text.slice(offset + whole.length) + lineRest, hasLaterClosing)) {
			return whole;
		}
		return `\\<${name}\\>`;
	});
}

function escapeUnclosedTags(text: string, lineRest: string, hasLaterClosing: LaterClosingCheck): string {
	return text.replace(OPENING_TAG, (whole: string, name: string, tail: string, offset: number) => {
		if (whole.endsWith("/>") || VOID_ELEMENT_NAMES.has(name.toLowerCase())) {
			return whole;
		}
		if (isClosed(name, text.slice(offset + whole.length) + lineRest, hasLaterClosing)) {
			return whole;
		}
		return `\\<${name}${escapeMdxCharacters(tail)}\\>`;
	});
}

/**
 * Replaces every denylisted placeholder with its escaped form.
 */
export function replaceDenylisted(line: string): string {
	let result = line;
	for (const sequence of API_REFERENCE_DENYLIST) {
		result = result.split(sequence).join(`\\${sequence.slice(0, -1)}\\>`);
	}
	return result;
}

function cleanLine(line: string, hasLaterClosing: LaterClosingCheck): string {
	const segments = splitInlineCode(line);
	let cleaned = "";
	for (let i = 0; i < segments.length; i++) {
		const segment = segments[i];
		if (segment.kind === "code") {
			cleaned += segment.text;
			continue;
		}
		const lineRest = segments
			.slice(i + 1)
			.map(s => s.text)
			.join("");
		cleaned += escapeUnclosedTags(
			escapeIdentifierTags(segment.text, lineRest, hasLaterClosing),
			lineRest,
			hasLaterClosing,
		);
	}
	return replaceDenylisted(cleaned);
}

/**
 * Narrow cleanup pass for generated API reference pages, run after {@link sanitizeMdx}.
 *
 * Outside fenced code blocks it escapes bare `<Identifier>` placeholders that are neither HTML
 * elements nor closed later, escapes opening tags that are never closed, and substitutes the
 * {@link API_REFERENCE_DENYLIST} entries. Escaped tags get both brackets escaped, so running
 * {@link sanitizeMdx} again leaves them alone.
 */
export function cleanApiReference(content: string): string {
	const lines = content.split("\n");
	const lastClosingLine = indexClosingTags(lines);
	const output: Array<string> = [];
	let inFence: FenceState = OUTSIDE_FENCE;
	for (let i = 0; i < lines.length; i++) {
		const line = lines[i];
		if (isFenceDelimiter(line)) {
			inFence = !inFence;
			output.push(line);
			continue;
		}
		if (inFence) {
			output.push(line);
			continue;
		}
		output.push(cleanLine(line, name => (lastClosingLine.get(name) ?? -1) > i));
	}
	return output.join("\n");
}
