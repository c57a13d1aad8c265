import { parseModelSpec } from "./ModelSpec";
import { describe, expect, it, vi } from "vitest";

function mockLogger() {
	const warn = vi.fn();
	return { logger: { warn }, warn };
}

describe("parseModelSpec", () => {
	it("should split a provider/model string", () => {
		expect(parseModelSpec("ollama/llama3")).toEqual({ provider: "ollama", model: "llama3" });
		expect(parseModelSpec("azure/gpt-4o")).toEqual({ provider: "azure", model: "gpt-4o" });
	});

	it("should fall back to openai for an unsupported provider", () => {
		const { logger, warn } = mockLogger();
		expect(parseModelSpec("acme/large", logger)).toEqual({ provider: "openai", model: "large" });
		expect(warn).toHaveBeenCalledWith("Unsupported provider: acme. Falling back to openai.");
	});

	it("should treat a string without a provider as an openai model name", () => {
		const { logger, warn } = mockLogger();
		expect(parseModelSpec("gpt-4o", logger)).toEqual({ provider: "openai", model: "gpt-4o" });
		expect(warn).toHaveBeenCalledWith("Invalid model format: gpt-4o. Expected format: 'provider/model_name'");
	});

	it("should keep the whole string as the model name when there are several slashes", () => {
		expect(parseModelSpec("openai/org/model")).toEqual({ provider: "openai", model: "openai/org/model" });
	});
});
