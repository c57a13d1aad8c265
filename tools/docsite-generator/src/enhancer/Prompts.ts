export const SYSTEM_CONTEXT =
	"You are a technical documentation specialist helping to improve software documentation. " +
	"Your job is to enhance the provided documentation while maintaining factual accuracy. " +
	"Improve clarity, organization, and comprehensiveness. " +
	"Add examples where helpful. Format using markdown.";

const SECTION_INSTRUCTIONS: Record<string, string> = {
	overview:
		"Enhance this project overview to be more comprehensive and user-friendly while maintaining accuracy. " +
		"Add clear sections for features, use cases, and key concepts if they're not already present:",
	installation:
		"Improve this installation guide by adding clear prerequisites, troubleshooting tips, " +
		"and platform-specific instructions while maintaining accuracy:",
	api:
		"Enhance this API documentation by adding more detailed descriptions, usage examples, " +
		"and parameter explanations while maintaining technical accuracy:",
	development:
		"Improve this development guide by adding more context, best practices, " +
		"and workflow descriptions while maintaining accuracy:",
	contributing:
		"Enhance these contributing guidelines by adding more specific examples, " +
		"workflow descriptions, and best practices while maintaining accuracy:",
};

const GENERIC_INSTRUCTION = "Enhance this documentation while maintaining accuracy and improving clarity:";

export function getSectionInstruction(section: string): string {
	return Object.hasOwn(SECTION_INSTRUCTIONS, section) ? SECTION_INSTRUCTIONS[section] : GENERIC_INSTRUCTION;
}

/**
 * Builds the single user prompt sent for a section: system context, the section's
 * instruction, then the original content.
 */
export function buildEnhancementPrompt(content: string, section: string): string {
	return `${SYSTEM_CONTEXT}\n\n${getSectionInstruction(section)}\n\n${content}`;
}
