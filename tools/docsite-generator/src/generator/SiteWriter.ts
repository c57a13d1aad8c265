import type { SectionConfig, SectionGroup } from "../shared/SiteConfig";
import { buildFrontmatter, sanitizeMdx, stripFrontmatter } from "docsite-common";

export const SIDEBAR_ID = "tutorialSidebar";

const GROUP_ORDER: ReadonlyArray<SectionGroup> = ["Getting Started", "Reference"];
const SIDEBAR_ID_PATTERN = /sidebarId:\s*(["'])[^"']*\1/g;

/**
 * A section page: frontmatter with the section id and title, then the sanitized body.
 */
export function renderSectionPage(section: Pick<SectionConfig, "id" | "title">, content: string): string {
	return buildFrontmatter({ id: section.id, title: section.title }) + sanitizeMdx(stripFrontmatter(content));
}

export interface IndexPageOptions {
	projectName: string;
	description?: string;
	sections: ReadonlyArray<Pick<SectionConfig, "id" | "title" | "group">>;
}

/**
 * The landing page served at `/`, linking every written section under its group heading.
 */
export function renderIndexPage(options: IndexPageOptions): string {
	const title = `${options.projectName} Documentation`;
	const lines = [`# ${title}`, "", options.description ?? `${options.projectName} documentation`];

	for (const group of GROUP_ORDER) {
		const sections = options.sections.filter(section => section.group === group);
		if (sections.length === 0) {
			continue;
		}
		lines.push("", `## ${group}`, "");
		for (const section of sections) {
			lines.push(`- [${section.title}](${section.id}.md)`);
		}
	}

	return `${buildFrontmatter({ slug: "/", id: "index", title })}${sanitizeMdx(lines.join("\n"))}\n`;
}

/**
 * A `sidebars.js` with a single sidebar listing the index page followed by the given docs.
 */
export function renderSidebars(docIds: ReadonlyArray<string>): string {
	const sidebars = { [SIDEBAR_ID]: ["index", ...docIds.filter(id => id !== "index")] };
	return [
		"/** @type {import('@docusaurus/plugin-content-docs').SidebarsConfig} */",
		`const sidebars = ${JSON.stringify(sidebars, null, 2)};`,
		"",
		"module.exports = sidebars;",
		"",
	].join("\n");
}

/**
 * Points every `sidebarId` in a Docusaurus config at the generated sidebar.
 */
export function ensureSidebarId(config: string): string {
	return config.replace(SIDEBAR_ID_PATTERN, `sidebarId: "${SIDEBAR_ID}"`);
}
