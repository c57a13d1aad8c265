import { buildEnhancementPrompt, getSectionInstruction, SYSTEM_CONTEXT } from "./Prompts";
import { describe, expect, it } from "vitest";

describe("buildEnhancementPrompt", () => {
	it("should combine the system context, the section instruction and the content", () => {
		const prompt = buildEnhancementPrompt("# API\n\nDetails", "api");
		expect(prompt).toBe(
			`${SYSTEM_CONTEXT}\n\nEnhance this API documentation by adding more detailed descriptions, usage examples, ` +
				"and parameter explanations while maintaining technical accuracy:\n\n# API\n\nDetails",
		);
	});

	it("should use the generic instruction for unknown sections", () => {
		expect(getSectionInstruction("faq")).toBe(
			"Enhance this documentation while maintaining accuracy and improving clarity:",
		);
	});

	it("should not resolve inherited object keys as sections", () => {
		expect(getSectionInstruction("toString")).toBe(getSectionInstruction("faq"));
	});
});
