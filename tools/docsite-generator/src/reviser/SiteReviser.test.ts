import { AiEnhancer, type CompletionRequest } from "../enhancer/AiEnhancer";
import { SiteReviser } from "./SiteReviser";
import { mkdir, mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

const OVERVIEW = "---\nid: overview\ntitle: Overview\n---\n\n# Widgets\n\nA toolkit for widgets.\n\n- Fast rendering\n- Small bundle\n";

const LANDING_PAGE = [
	'import React from "react";',
	'import Layout from "@theme/Layout";',
	"",
	"export default function Home() {",
	"  const { siteConfig } = useDocusaurusContext();",
	'  return <Layout title="Hello">Welcome</Layout>;',
	"}",
	"",
].join("\n");

const REVISED_LANDING_PAGE = LANDING_PAGE.replace("Welcome", "Build widgets fast").trim();

const FEATURES = 'const FeatureList = [{ title: "Easy" }];\nexport default FeatureList;\n';

const CONFIG = "const config = { title: 'My Site' };\nmodule.exports = config;\n";

interface Replies {
	landingPage?: string;
	features?: string;
	config?: string;
}

function replyFor(request: CompletionRequest, replies: Replies): string | undefined {
	if (request.prompt.includes("CURRENT INDEX.JS:")) {
		return replies.landingPage;
	}
	if (request.prompt.includes("CURRENT COMPONENT:")) {
		return replies.features;
	}
	return replies.config;
}

describe("SiteReviser", () => {
	let site: string;

	beforeEach(async () => {
		site = await mkdtemp(join(tmpdir(), "docsite-reviser-"));
		await mkdir(join(site, "docs"), { recursive: true });
		await mkdir(join(site, "src", "pages"), { recursive: true });
		await mkdir(join(site, "src", "components", "HomepageFeatures"), { recursive: true });
		await writeFile(join(site, "docs", "overview.md"), OVERVIEW);
		await writeFile(join(site, "src", "pages", "index.js"), LANDING_PAGE);
		await writeFile(join(site, "src", "components", "HomepageFeatures", "index.js"), FEATURES);
		await writeFile(join(site, "docusaurus.config.js"), CONFIG);
	});

	afterEach(async () => {
		await rm(site, { recursive: true, force: true });
	});

	function reviser(replies: Replies) {
		const complete = vi.fn((request: CompletionRequest) => Promise.resolve(replyFor(request, replies)));
		const enhancer = new AiEnhancer({ complete }, "openai/gpt-4o");
		return { complete, reviser: new SiteReviser({ outputDir: site, enhancer }) };
	}

	it("should revise the landing page, the features and the site config", async () => {
		const { reviser: siteReviser } = reviser({
			landingPage: `\`\`\`javascript\n${REVISED_LANDING_PAGE}\n\`\`\``,
			features: '```javascript\nconst FeatureList = [{ title: "Fast rendering" }];\nexport default FeatureList;\n```',
			config: "Here is the updated config:\n\nconst config = { title: 'Widgets' };\nmodule.exports = config;",
		});

		expect(await siteReviser.revise()).toEqual({
			success: true,
			outcomes: { landingPage: "updated", homepageFeatures: "updated", siteConfig: "updated" },
		});
		expect(await readFile(join(site, "src", "pages", "index.js"), "utf-8")).toBe(`${REVISED_LANDING_PAGE}\n`);
		expect(await readFile(join(site, "src", "components", "HomepageFeatures", "index.js"), "utf-8")).toBe(
			'const FeatureList = [{ title: "Fast rendering" }];\nexport default FeatureList;\n',
		);
		expect(await readFile(join(site, "docusaurus.config.js"), "utf-8")).toBe(
			"const config = { title: 'Widgets' };\nmodule.exports = config;\n",
		);
	});

	it("should send the overview and its feature bullets to the model", async () => {
		const { complete, reviser: siteReviser } = reviser({});

		await siteReviser.revise();

		expect(complete).toHaveBeenCalledTimes(3);
		const prompts = complete.mock.calls.map(([request]) => request.prompt);
		expect(prompts.every(prompt => prompt.includes("# Widgets\n\nA toolkit for widgets."))).toBe(true);
		expect(prompts[1]).toContain("KEY FEATURES:\n- Fast rendering\n- Small bundle");
		expect(prompts[2]).toContain("Suggested title: Overview\nSuggested tagline: A toolkit for widgets.");
	});

	it("should keep the landing page when the reply drops an import", async () => {
		const { reviser: siteReviser } = reviser({
			landingPage: REVISED_LANDING_PAGE.replace('import React from "react";\n', ""),
		});

		const result = await siteReviser.revise();

		expect(result.success).toBe(true);
		expect(result.outcomes.landingPage).toBe("failed");
		expect(await readFile(join(site, "src", "pages", "index.js"), "utf-8")).toBe(LANDING_PAGE);
	});

	it("should keep the landing page when the reply drops the siteConfig binding", async () => {
		const { reviser: siteReviser } = reviser({
			landingPage: REVISED_LANDING_PAGE.replace("const { siteConfig } = useDocusaurusContext();", ""),
		});

		expect((await siteReviser.revise()).outcomes.landingPage).toBe("failed");
		expect(await readFile(join(site, "src", "pages", "index.js"), "utf-8")).toBe(LANDING_PAGE);
	});

	it("should report unchanged files and missing components", async () => {
		await rm(join(site, "src", "components"), { recursive: true, force: true });
		const { reviser: siteReviser } = reviser({ config: CONFIG });

		expect(await siteReviser.revise()).toEqual({
			success: true,
			outcomes: { landingPage: "failed", homepageFeatures: "missing", siteConfig: "unchanged" },
		});
	});

	it("should find the features component case-insensitively", async () => {
		await rm(join(site, "src", "components", "HomepageFeatures"), { recursive: true, force: true });
		await mkdir(join(site, "src", "components", "landing", "homepagefeatures"), { recursive: true });
		const path = join(site, "src", "components", "landing", "homepagefeatures", "index.js");
		await writeFile(path, FEATURES);
		const { reviser: siteReviser } = reviser({ features: "const FeatureList = [];" });

		expect((await siteReviser.revise()).outcomes.homepageFeatures).toBe("updated");
		expect(await readFile(path, "utf-8")).toBe("const FeatureList = [];\n");
	});

	it("should not revise without a completion provider", async () => {
		expect(await new SiteReviser({ outputDir: site }).revise()).toEqual({
			success: false,
			outcomes: {},
			error: "Site revision needs an AI completion provider",
		});
	});

	it("should not revise a site without pages", async () => {
		await rm(join(site, "src", "pages"), { recursive: true, force: true });
		const { complete, reviser: siteReviser } = reviser({});

		const result = await siteReviser.revise();

		expect(result).toEqual({
			success: false,
			outcomes: {},
			error: `Pages directory not found at ${join(site, "src", "pages")}`,
		});
		expect(complete).not.toHaveBeenCalled();
	});
});
