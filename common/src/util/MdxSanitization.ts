/**
 * Sanitizes Markdown content so it can be embedded in an MDX renderer.
 *
 * MDX treats `{`, `}` and anything shaped like `<tag>` as live syntax. Extracted
 * API signatures (`List<T>`) and AI-produced prose routinely contain both, so every
 * line outside a code block is rewritten:
 * - Fenced code blocks pass through untouched
 * - Inline code spans pass through untouched
 * - Genuine HTML elements and component references (`<div>`, `<Tabs>`) are preserved
 * - Any other tag-like sequence and every bare brace or angle bracket is backslash-escaped
 *
 * The transform is a fold over lines threading an immutable "inside fence" flag,
 * and is idempotent: characters already preceded by a backslash are left alone.
 */

import htmlElementNames from "./html-elements.json";

/** Whether the fold is currently inside a fenced code block. */
export type FenceState = boolean;

export const OUTSIDE_FENCE: FenceState = false;

export interface LineResult {
	text: string;
	inFence: FenceState;
}

export type SegmentKind = "prose" | "code";

export interface Segment {
	kind: SegmentKind;
	text: string;
}

export type TagDisposition = "preserve" | "escape";

/**
 * HTML element names left unescaped wherever they appear (matched case-insensitively).
 */
export const HTML_ELEMENT_NAMES: ReadonlySet<string> = new Set(htmlElementNames);

const FENCE_DELIMITER = /^```[^\s`]*$/;

// Only the first marker on the line is exempt from escaping.
const STRUCTURAL_MARKER = /^\s*(?:#{1,6}|>|[-*+])(?:\s+|$)/;

const INLINE_CODE_SPAN = /`[^`]*`/g;

// <name ...>, </name>, <name/>; a backslash before "<" means it was already escaped
const TAG_LIKE = /(?<!\\)<(\/?)([A-Za-z][\w.-]*)((?:\s[^<>]*)?\/?)>/g;

const URL_AUTOLINK = /(?<!\\)<(https?:\/\/[^\s<>]+)>/g;
const EMAIL_AUTOLINK = /(?<!\\)<([a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,})>/g;

const UNESCAPED_SPECIAL = /(?<!\\)([{}<>])/g;

const WORD_CHARACTER = /\w/;

const ESCAPED_OPENING = /\\<([A-Za-z][\w.-]*)/g;

/**
 * Whether the line opens or closes a fenced code block. The whole trimmed line must be the
 * delimiter, so a stray ``` in the middle of a sentence never toggles the fence state.
 */
export function isFenceDelimiter(line: string): boolean {
	return FENCE_DELIMITER.test(line.trim());
}

/**
 * Escapes every `{`, `}`, `<` and `>` that is not already preceded by a backslash.
 */
export function escapeMdxCharacters(text: string): string {
	return text.replace(UNESCAPED_SPECIAL, "\\$1");
}

/**
 * Decides whether a tag-like sequence is real markup or literal text.
 *
 * @param name the tag name as written
 * @param precededByWord whether the `<` directly follows a word character (generic type syntax)
 * @param closing whether the sequence is a closing tag (`</name>`)
 */
export function classifyTag(name: string, precededByWord: boolean, closing: boolean): TagDisposition {
	const first = name.charAt(0);
	const uppercase = first !== first.toLowerCase();
	const glued = precededByWord && !closing;
	// Vec<Path>: a capitalized type argument is generic syntax even when it names an HTML element
	if (glued && uppercase) {
		return "escape";
	}
	if (HTML_ELEMENT_NAMES.has(name.toLowerCase())) {
		return "preserve";
	}
	if (glued) {
		return "escape";
	}
	return uppercase ? "preserve" : "escape";
}

/**
 * Splits a line into prose and inline code segments, left to right.
 * An unmatched backtick stays in the prose segment.
 */
export function splitInlineCode(line: string): Array<Segment> {
	const segments: Array<Segment> = [];
	let cursor = 0;
	for (const match of line.matchAll(INLINE_CODE_SPAN)) {
		const start = match.index ?? 0;
		if (start > cursor) {
			segments.push({ kind: "prose", text: line.slice(cursor, start) });
		}
		segments.push({ kind: "code", text: match[0] });
		cursor = start + match[0].length;
	}
	if (cursor < line.length) {
		segments.push({ kind: "prose", text: line.slice(cursor) });
	}
	return segments;
}

function convertAutolinks(text: string): string {
	return text.replace(URL_AUTOLINK, "[$1]($1)").replace(EMAIL_AUTOLINK, "[$1](mailto:$1)");
}

function hasEscapedOpening(text: string, name: string): boolean {
	for (const match of text.matchAll(ESCAPED_OPENING)) {
		if (match[1] === name) {
			return true;
		}
	}
	return false;
}

/**
 * Escapes a prose segment: preserved tags are copied as-is, everything else goes through
 * the character-level escaper. A closing tag whose opening was escaped earlier on the line
 * is escaped as well.
 *
 * @param preceding already sanitized text of the line before this segment
 */
export function escapeProse(text: string, preceding = ""): string {
	const prose = convertAutolinks(text);
	let result = "";
	let cursor = 0;
	for (const match of prose.matchAll(TAG_LIKE)) {
		const start = match.index ?? 0;
		const [whole, slash, name, tail] = match;
		const closing = slash === "/";
		const precededByWord = start > 0 && WORD_CHARACTER.test(prose.charAt(start - 1));

		result += escapeMdxCharacters(prose.slice(cursor, start));
		const orphaned = closing && hasEscapedOpening(preceding + result, name);
		if (!orphaned && classifyTag(name, precededByWord, closing) === "preserve") {
			result += whole;
		} else {
			result += `\\<${slash}${name}${escapeMdxCharacters(tail)}\\>`;
		}
		cursor = start + whole.length;
	}
	return result + escapeMdxCharacters(prose.slice(cursor));
}

function escapeLineContent(line: string, prefix = ""): string {
	let escaped = prefix;
	for (const segment of splitInlineCode(line)) {
		escaped += segment.kind === "code" ? segment.text : escapeProse(segment.text, escaped);
	}
	return escaped;
}

/**
 * Sanitizes a single line given the fence state before it.
 */
export function sanitizeMdxLine(line: string, inFence: FenceState): LineResult {
	if (isFenceDelimiter(line)) {
		return { text: line, inFence: !inFence };
	}
	if (inFence) {
		return { text: line, inFence };
	}
	const marker = line.match(STRUCTURAL_MARKER);
	if (marker) {
		const prefix = marker[0];
		return { text: escapeLineContent(line.slice(prefix.length), prefix), inFence };
	}
	return { text: escapeLineContent(line), inFence };
}

/**
 * Sanitizes Markdown content to be MDX-compatible.
 *
 * An unterminated fence leaves the rest of the document unescaped.
 *
 * @param content - The Markdown body, without frontmatter
 * @returns MDX-safe content with the same line count
 */
export function sanitizeMdx(content: string): string {
	const output: Array<string> = [];
	let inFence = OUTSIDE_FENCE;
	for (const line of content.split("\n")) {
		const result = sanitizeMdxLine(line, inFence);
		output.push(result.text);
		inFence = result.inFence;
	}
	return output.join("\n");
}
