/**
 * Lightweight, regex-based extraction of documented classes and functions from source text.
 * This is not a parser: it finds top-level declarations good enough for an API overview page.
 */

export interface CodeElement {
	name: string;
	description: string;
}

export interface CodeElements {
	classes: Array<CodeElement>;
	functions: Array<CodeElement>;
}

export type SourceLanguage = "python" | "javascript" | "java";

const LANGUAGE_BY_EXTENSION: Record<string, SourceLanguage> = {
	".py": "python",
	".js": "javascript",
	".jsx": "javascript",
	".ts": "javascript",
	".tsx": "javascript",
	".java": "java",
};

export const SUPPORTED_SOURCE_EXTENSIONS: ReadonlyArray<string> = Object.freeze(Object.keys(LANGUAGE_BY_EXTENSION));

const PYTHON_CLASS = /^class\s+(\w+)(?:\([^)]*\))?:\s*(?:"""([\s\S]*?)""")?/gm;
const PYTHON_FUNCTION = /^def\s+(\w+)\s*\([\s\S]*?\)(?:\s*->\s*[^:]+)?:\s*(?:"""([\s\S]*?)""")?/gm;

const JS_CLASS = /\bclass\s+(\w+)[^{;\n]*\{/g;
const JS_FUNCTIONS = [
	/\bfunction\s+(\w+)\s*[<(]/g,
	/\bconst\s+(\w+)\s*=\s*(?:async\s*)?\([^)]*\)(?:\s*:\s*[^=]+?)?\s*=>/g,
	/^\s*(\w+)\s*:\s*(?:async\s*)?\([^)]*\)(?:\s*:\s*[^=]+?)?\s*=>/gm,
];

const JAVA_CLASS = /\bclass\s+(\w+)/g;
const JAVA_METHOD =
	/^[ \t]*(?:(?:public|protected|private|static|final|abstract|synchronized)\s+)*([\w.]+(?:<[^>{};()]*>)?(?:\[\])*)\s+(\w+)\s*\([^)]*\)\s*(?:throws\s+[\w\s,.]+)?\{/gm;
const JAVA_KEYWORDS = new Set(["if", "for", "while", "switch", "catch", "return", "new", "else", "synchronized"]);

const DOC_COMMENT_BEFORE = /\/\*\*((?:(?!\*\/)[\s\S])*)\*\/\s*(?:@\w+(?:\([^)]*\))?\s*)*(?:export\s+)?(?:default\s+)?$/;

/**
 * Determines the source language from a file name, or undefined when unsupported.
 */
export function detectSourceLanguage(fileName: string): SourceLanguage | undefined {
	const dot = fileName.lastIndexOf(".");
	return dot >= 0 ? LANGUAGE_BY_EXTENSION[fileName.slice(dot).toLowerCase()] : undefined;
}

/**
 * First descriptive sentence of a `/** ... *\/` comment body, stopping at the first tag.
 */
export function summarizeDocComment(body: string): string {
	const lines: Array<string> = [];
	for (const raw of body.split("\n")) {
		const line = raw.replace(/^\s*\*?\s?/, "").trim();
		if (line.startsWith("@")) {
			break;
		}
		if (!line) {
			if (lines.length > 0) {
				break;
			}
			continue;
		}
		lines.push(line);
	}
	return lines.join(" ");
}

function docCommentBefore(content: string, index: number): string {
	const match = DOC_COMMENT_BEFORE.exec(content.slice(0, index));
	return match ? summarizeDocComment(match[1]) : "";
}

function firstDocstringLine(docstring: string | undefined): string {
	return docstring ? docstring.trim().split("\n")[0].trim() : "";
}

function pushUnique(elements: Array<CodeElement>, element: CodeElement): void {
	if (!elements.some(existing => existing.name === element.name)) {
		elements.push(element);
	}
}

function extractPython(content: string): CodeElements {
	const classes: Array<CodeElement> = [];
	const functions: Array<CodeElement> = [];
	for (const match of content.matchAll(PYTHON_CLASS)) {
		pushUnique(classes, { name: match[1], description: firstDocstringLine(match[2]) });
	}
	for (const match of content.matchAll(PYTHON_FUNCTION)) {
		if (!match[1].startsWith("_")) {
			pushUnique(functions, { name: match[1], description: firstDocstringLine(match[2]) });
		}
	}
	return { classes, functions };
}

function declarationIndex(match: RegExpMatchArray): number {
	// skip leading whitespace captured by line-anchored patterns
	const leading = match[0].length - match[0].trimStart().length;
	return (match.index ?? 0) + leading;
}

function extractJavaScript(content: string): CodeElements {
	const classes: Array<CodeElement> = [];
	const functions: Array<CodeElement> = [];
	for (const match of content.matchAll(JS_CLASS)) {
		pushUnique(classes, { name: match[1], description: docCommentBefore(content, declarationIndex(match)) });
	}
	for (const pattern of JS_FUNCTIONS) {
		for (const match of content.matchAll(pattern)) {
			if (!match[1].startsWith("_")) {
				pushUnique(functions, {
					name: match[1],
					description: docCommentBefore(content, declarationIndex(match)),
				});
			}
		}
	}
	return { classes, functions };
}

function extractJava(content: string): CodeElements {
	const classes: Array<CodeElement> = [];
	const functions: Array<CodeElement> = [];
	for (const match of content.matchAll(JAVA_CLASS)) {
		const start = content.lastIndexOf("\n", match.index ?? 0) + 1;
		pushUnique(classes, { name: match[1], description: docCommentBefore(content, start) });
	}
	for (const match of content.matchAll(JAVA_METHOD)) {
		const [, returnType, name] = match;
		if (!name.startsWith("_") && !JAVA_KEYWORDS.has(name) && !JAVA_KEYWORDS.has(returnType)) {
			pushUnique(functions, { name, description: docCommentBefore(content, declarationIndex(match)) });
		}
	}
	return { classes, functions };
}

/**
 * Extracts classes and functions from the given source text, choosing the rules by file
 * extension. Unsupported files yield no elements.
 */
export function extractCodeElements(fileName: string, content: string): CodeElements {
	switch (detectSourceLanguage(fileName)) {
		case "python":
			return extractPython(content);
		case "javascript":
			return extractJavaScript(content);
		case "java":
			return extractJava(content);
		default:
			return { classes: [], functions: [] };
	}
}
