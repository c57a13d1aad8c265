import { DEFAULT_SECTIONS, defaultSiteConfig, loadSiteConfig, parseSiteConfig } from "./SiteConfig";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

describe("parseSiteConfig", () => {
	it("should fill in defaults for an empty document", () => {
		const { config, warning } = parseSiteConfig(null);
		expect(warning).toBeUndefined();
		expect(config.readme).toBe("README.md");
		expect(config.sections.map(section => section.id)).toEqual([
			"overview",
			"installation",
			"api",
			"development",
			"contributing",
		]);
		expect(config.api.maxFiles).toBe(10);
		expect(config.ai.model).toBeUndefined();
	});

	it("should apply section defaults", () => {
		const { config } = parseSiteConfig({
			projectName: "Widgets",
			sections: [{ id: "guide", title: "Guide" }],
			ai: { model: "ollama/llama3" },
		});
		expect(config.projectName).toBe("Widgets");
		expect(config.sections).toEqual([
			{ id: "guide", title: "Guide", kind: "prose", group: "Reference", sources: [], readmeSections: [] },
		]);
		expect(config.ai.model).toBe("ollama/llama3");
	});

	it("should reject duplicate section ids and fall back to defaults", () => {
		const { config, warning } = parseSiteConfig({
			sections: [
				{ id: "guide", title: "Guide" },
				{ id: "guide", title: "Again" },
			],
		});
		expect(warning).toBe("Invalid site configuration: sections: section ids must be unique");
		expect(config).toEqual(defaultSiteConfig());
	});

	it("should report the path of invalid fields", () => {
		const { warning } = parseSiteConfig({ api: { maxFiles: 0 } });
		expect(warning).toContain("api.maxFiles");
	});

	it("should expose the default sections", () => {
		expect(DEFAULT_SECTIONS.find(section => section.kind === "api")?.id).toBe("api");
	});
});

describe("loadSiteConfig", () => {
	let dir: string;

	beforeEach(async () => {
		dir = await mkdtemp(join(tmpdir(), "docsite-site-config-"));
	});

	afterEach(async () => {
		await rm(dir, { recursive: true, force: true });
	});

	it("should load a YAML file", async () => {
		const path = join(dir, "docsite.yaml");
		await writeFile(
			path,
			[
				"projectName: Widgets",
				"description: Widget toolkit",
				"repoUrl: https://example.com/widgets",
				"api:",
				"  include:",
				"    - lib/**/*.ts",
				"  maxFiles: 3",
			].join("\n"),
		);

		const config = await loadSiteConfig(path);

		expect(config.projectName).toBe("Widgets");
		expect(config.description).toBe("Widget toolkit");
		expect(config.repoUrl).toBe("https://example.com/widgets");
		expect(config.api.include).toEqual(["lib/**/*.ts"]);
		expect(config.api.maxFiles).toBe(3);
		expect(config.sections).toHaveLength(5);
	});

	it("should return defaults when the file is missing", async () => {
		expect(await loadSiteConfig(join(dir, "missing.yaml"))).toEqual(defaultSiteConfig());
	});

	it("should return defaults when the YAML is malformed", async () => {
		const path = join(dir, "broken.yaml");
		await writeFile(path, "sections: [unclosed");
		expect(await loadSiteConfig(path)).toEqual(defaultSiteConfig());
	});

	it("should return defaults when validation fails", async () => {
		const path = join(dir, "invalid.yaml");
		await writeFile(path, "repoUrl: not a url\n");
		expect(await loadSiteConfig(path)).toEqual(defaultSiteConfig());
	});
});
