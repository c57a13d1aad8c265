import { copyTemplate, createFileFromTemplate } from "./TemplateFiles";
import { mkdir, mkdtemp, readFile, rm, stat, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

async function exists(path: string): Promise<boolean> {
	try {
		await stat(path);
		return true;
	} catch {
		return false;
	}
}

describe("template files", () => {
	let dir: string;

	beforeEach(async () => {
		dir = await mkdtemp(join(tmpdir(), "docsite-template-"));
	});

	afterEach(async () => {
		await rm(dir, { recursive: true, force: true });
	});

	describe("createFileFromTemplate", () => {
		it("should render placeholders into a new file", async () => {
			const templatePath = join(dir, "config.js.tpl");
			const outputPath = join(dir, "out", "docusaurus.config.js");
			await writeFile(templatePath, "title: '{{ projectName }}', url: '{{repoUrl}}', other: '{{ unknown }}'");

			const created = await createFileFromTemplate(templatePath, outputPath, {
				projectName: "Widgets",
				repoUrl: "https://example.com/widgets",
			});

			expect(created).toBe(true);
			expect(await readFile(outputPath, "utf-8")).toBe(
				"title: 'Widgets', url: 'https://example.com/widgets', other: '{{ unknown }}'",
			);
		});

		it("should render a file in place", async () => {
			const path = join(dir, "README.md");
			await writeFile(path, "# {{ projectName }}");

			expect(await createFileFromTemplate(path, path, { projectName: "Widgets" })).toBe(true);
			expect(await readFile(path, "utf-8")).toBe("# Widgets");
		});

		it("should return false when the template is missing", async () => {
			expect(await createFileFromTemplate(join(dir, "missing"), join(dir, "out.txt"), {})).toBe(false);
			expect(await exists(join(dir, "out.txt"))).toBe(false);
		});
	});

	describe("copyTemplate", () => {
		it("should copy the template without version control and dependencies", async () => {
			const templateDir = join(dir, "template");
			const outputDir = join(dir, "site");
			await mkdir(join(templateDir, "src", "css"), { recursive: true });
			await mkdir(join(templateDir, ".git"), { recursive: true });
			await mkdir(join(templateDir, "node_modules", "dep"), { recursive: true });
			await writeFile(join(templateDir, "src", "css", "custom.css"), ":root {}");
			await writeFile(join(templateDir, ".git", "HEAD"), "ref: main");
			await writeFile(join(templateDir, "node_modules", "dep", "index.js"), "");

			expect(await copyTemplate(templateDir, outputDir)).toBe(true);

			expect(await readFile(join(outputDir, "src", "css", "custom.css"), "utf-8")).toBe(":root {}");
			expect(await exists(join(outputDir, ".git"))).toBe(false);
			expect(await exists(join(outputDir, "node_modules"))).toBe(false);
		});

		it("should return false when the template directory is missing", async () => {
			expect(await copyTemplate(join(dir, "missing"), join(dir, "site"))).toBe(false);
		});
	});
});
