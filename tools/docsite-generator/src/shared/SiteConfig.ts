import { getLog } from "./logger";
import { readFile } from "node:fs/promises";
import { parse as parseYaml } from "yaml";
import { z } from "zod";

const log = getLog(import.meta);

const SectionSchema = z.object({
	id: z.string().regex(/^[a-z0-9][a-z0-9-]*$/, "section ids are lowercase slugs"),
	title: z.string().min(1),
	kind: z.enum(["prose", "api"]).default("prose"),
	group: z.enum(["Getting Started", "Reference"]).default("Reference"),
	intro: z.string().optional(),
	// Repository-relative files tried in order; the first one found becomes the page
	sources: z.array(z.string()).default([]),
	// README headings tried in order when no source file exists
	readmeSections: z.array(z.string()).default([]),
});

export type SectionConfig = z.infer<typeof SectionSchema>;
export type SectionGroup = SectionConfig["group"];

export const DEFAULT_SECTIONS: ReadonlyArray<SectionConfig> = Object.freeze([
	{
		id: "overview",
		title: "Overview",
		kind: "prose",
		group: "Getting Started",
		sources: ["docs/overview.md"],
		readmeSections: ["Overview", "About", "Introduction"],
	},
	{
		id: "installation",
		title: "Installation",
		kind: "prose",
		group: "Getting Started",
		intro: "This page explains how to install this project.",
		sources: ["docs/installation.md", "INSTALL.md"],
		readmeSections: ["Installation", "Getting Started", "Setup"],
	},
	{
		id: "api",
		title: "API Reference",
		kind: "api",
		group: "Reference",
		sources: ["docs/api.md", "docs/api-reference.md", "docs/api-docs.md", "docs/reference.md"],
		readmeSections: ["API", "API Reference"],
	},
	{
		id: "development",
		title: "Development",
		kind: "prose",
		group: "Reference",
		intro: "This page provides information for developers working on this project.",
		sources: ["docs/development.md", "docs/developers.md", "docs/dev-guide.md", "docs/hacking.md"],
		readmeSections: ["Development", "Developing", "For Developers", "Hacking"],
	},
	{
		id: "contributing",
		title: "Contributing",
		kind: "prose",
		group: "Reference",
		intro: "This page provides guidelines for contributing to this project.",
		sources: ["CONTRIBUTING.md", "docs/contributing.md"],
		readmeSections: ["Contributing", "How to Contribute"],
	},
] satisfies Array<SectionConfig>);

const SiteConfigSchema = z.object({
	projectName: z.string().min(1).optional(),
	description: z.string().optional(),
	repoUrl: z.string().url().optional(),
	readme: z.string().default("README.md"),
	sections: z
		.array(SectionSchema)
		.min(1)
		.refine(sections => new Set(sections.map(section => section.id)).size === sections.length, {
			message: "section ids must be unique",
		})
		.default(() => [...DEFAULT_SECTIONS]),
	api: z
		.object({
			include: z.array(z.string()).default(["src/**/*.{ts,tsx,js,jsx}", "lib/**/*.{ts,js}", "**/*.py", "**/*.java"]),
			exclude: z.array(z.string()).default(["**/node_modules/**", "**/dist/**", "**/*.test.*", "**/test/**"]),
			maxFiles: z.number().int().positive().default(10),
		})
		.default({}),
	ai: z
		.object({
			model: z.string().optional(),
		})
		.default({}),
});

export type SiteConfig = z.infer<typeof SiteConfigSchema>;

export interface SiteConfigResult {
	config: SiteConfig;
	/** Set when the file could not be read or validated and defaults were used */
	warning?: string;
}

/**
 * Validates a parsed site configuration object, filling in defaults.
 */
export function parseSiteConfig(raw: unknown): SiteConfigResult {
	const result = SiteConfigSchema.safeParse(raw ?? {});
	if (result.success) {
		return { config: result.data };
	}
	const issues = result.error.issues.map(issue => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
	return { config: defaultSiteConfig(), warning: `Invalid site configuration: ${issues.join("; ")}` };
}

export function defaultSiteConfig(): SiteConfig {
	return SiteConfigSchema.parse({});
}

/**
 * Loads the YAML site configuration. A missing or invalid file is not fatal: a warning is
 * logged and the defaults are returned.
 */
export async function loadSiteConfig(path: string): Promise<SiteConfig> {
	let text: string;
	try {
		text = await readFile(path, "utf-8");
	} catch (error) {
		const message = error instanceof Error ? error.message : String(error);
		log.warn(`Error loading configuration from ${path}: ${message}`);
		return defaultSiteConfig();
	}

	let raw: unknown;
	try {
		raw = parseYaml(text);
	} catch (error) {
		const message = error instanceof Error ? error.message : String(error);
		log.warn(`Error parsing configuration from ${path}: ${message}`);
		return defaultSiteConfig();
	}

	const { config, warning } = parseSiteConfig(raw);
	if (warning) {
		log.warn(`${warning} (${path})`);
	}
	return config;
}
