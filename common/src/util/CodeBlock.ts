import { isFenceDelimiter } from "./MdxSanitization";

const CODE_START_PATTERNS: Record<string, RegExp> = {
	javascript: /^(?:import|const|let|var|function|class|\/\*\*)/m,
	css: /^(?:\.|\/\*|\*|#|@media|:root)/m,
};

const MARKDOWN_REPLY = /^```(?:markdown|md|mdx)?\r?\n([\s\S]*)\r?\n```$/;

/**
 * Extracts code from an AI reply that may wrap it in a fenced block or surround it with
 * explanations.
 *
 * @param language fence language to look for; also selects the heuristics used when
 * the reply has no fence ("javascript" and "css" are known)
 */
export function extractCodeBlock(content: string, language: string): string {
	const fenced = new RegExp(`\`\`\`(?:${language})?\\r?\\n([\\s\\S]*?)\`\`\``).exec(content);
	if (fenced) {
		return fenced[1].trim();
	}

	const startPattern = CODE_START_PATTERNS[language];
	if (startPattern) {
		const start = startPattern.exec(content);
		if (start) {
			return content.slice(start.index).trim();
		}
	}
	return content.trim();
}

/**
 * Unwraps a markdown reply that an AI model wrapped in a single ```markdown fence.
 * Replies with more than one fenced block are returned unchanged.
 */
export function unwrapMarkdownReply(reply: string): string {
	const trimmed = reply.trim();
	const match = MARKDOWN_REPLY.exec(trimmed);
	if (!match) {
		return reply;
	}
	const inner = match[1];
	if (inner.split("\n").some(isFenceDelimiter)) {
		return reply;
	}
	return inner;
}
