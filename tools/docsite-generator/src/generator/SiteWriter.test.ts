import { ensureSidebarId, renderIndexPage, renderSectionPage, renderSidebars } from "./SiteWriter";
import { describe, expect, it } from "vitest";

describe("renderSectionPage", () => {
	it("should replace the frontmatter and sanitize the body", () => {
		const page = renderSectionPage({ id: "overview", title: "Overview" }, "---\nx: 1\n---\n# Overview\n\nUse {config}");
		expect(page).toBe("---\nid: overview\ntitle: Overview\n---\n\n# Overview\n\nUse \\{config\\}");
	});
});

describe("renderIndexPage", () => {
	it("should link sections under their group headings", () => {
		const page = renderIndexPage({
			projectName: "Widgets",
			description: "Widget toolkit",
			sections: [
				{ id: "overview", title: "Overview", group: "Getting Started" },
				{ id: "api", title: "API Reference", group: "Reference" },
				{ id: "development", title: "Development", group: "Reference" },
			],
		});
		expect(page).toBe(
			[
				"---",
				"slug: /",
				"id: index",
				"title: Widgets Documentation",
				"---",
				"",
				"# Widgets Documentation",
				"",
				"Widget toolkit",
				"",
				"## Getting Started",
				"",
				"- [Overview](overview.md)",
				"",
				"## Reference",
				"",
				"- [API Reference](api.md)",
				"- [Development](development.md)",
				"",
			].join("\n"),
		);
	});

	it("should omit empty groups and default the description", () => {
		const page = renderIndexPage({
			projectName: "Widgets",
			sections: [{ id: "api", title: "API Reference", group: "Reference" }],
		});
		expect(page.endsWith("# Widgets Documentation\n\nWidgets documentation\n\n## Reference\n\n- [API Reference](api.md)\n")).toBe(
			true,
		);
		expect(page).not.toContain("## Getting Started");
	});

	it("should escape MDX characters in the description", () => {
		const page = renderIndexPage({ projectName: "Widgets", description: "Config via {options}", sections: [] });
		expect(page.endsWith("\nConfig via \\{options\\}\n")).toBe(true);
	});
});

describe("renderSidebars", () => {
	it("should list the index page first", () => {
		expect(renderSidebars(["overview", "index", "api"])).toBe(
			[
				"/** @type {import('@docusaurus/plugin-content-docs').SidebarsConfig} */",
				"const sidebars = {",
				'  "tutorialSidebar": [',
				'    "index",',
				'    "overview",',
				'    "api"',
				"  ]",
				"};",
				"",
				"module.exports = sidebars;",
				"",
			].join("\n"),
		);
	});
});

describe("ensureSidebarId", () => {
	it("should point every sidebarId at the generated sidebar", () => {
		expect(ensureSidebarId("{ sidebarId: 'docs', label: 'Docs' }")).toBe(
			'{ sidebarId: "tutorialSidebar", label: \'Docs\' }',
		);
	});

	it("should leave configs without a sidebarId unchanged", () => {
		expect(ensureSidebarId("module.exports = {};")).toBe("module.exports = {};");
	});
});
