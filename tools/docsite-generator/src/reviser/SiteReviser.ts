import type { AiEnhancer } from "../enhancer/AiEnhancer";
import { readOptionalFile } from "../generator/RepoFiles";
import { getLog, logError } from "../shared/logger";
import { buildHomepageFeaturesPrompt, buildLandingPagePrompt, buildSiteConfigPrompt } from "./RevisionPrompts";
import { stat, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { extractCodeBlock } from "docsite-common";
import { glob } from "glob";

const log = getLog(import.meta);

export type RevisionTarget = "landingPage" | "homepageFeatures" | "siteConfig";

/** `missing`: the file to revise is not in the site; `failed`: the AI reply was unusable */
export type RevisionOutcome = "updated" | "unchanged" | "missing" | "failed";

export interface RevisionResult {
	success: boolean;
	outcomes: Partial<Record<RevisionTarget, RevisionOutcome>>;
	error?: string;
}

export interface SiteReviserOptions {
	outputDir: string;
	enhancer?: AiEnhancer;
}

const IMPORT_LINE = /^import .+?;?$/gm;
const SITE_CONFIG_DESTRUCTURE = /const\s*\{\s*siteConfig\s*\}/;

async function isDirectory(path: string): Promise<boolean> {
	try {
		return (await stat(path)).isDirectory();
	} catch {
		return false;
	}
}

/**
 * Rewrites the text of a generated site's landing page, its HomepageFeatures component and
 * the title and tagline in `docusaurus.config.js` from `docs/overview.md`, through the AI
 * enhancer. Replies that drop an import or the `siteConfig` binding of the landing page are
 * discarded.
 */
export class SiteReviser {
	private readonly outputDir: string;
	private readonly enhancer: AiEnhancer | undefined;

	constructor(options: SiteReviserOptions) {
		this.outputDir = options.outputDir;
		this.enhancer = options.enhancer;
	}

	async revise(): Promise<RevisionResult> {
		const result: RevisionResult = { success: false, outcomes: {} };
		log.info("Revising site landing page content based on docs/overview.md");

		const docsDir = join(this.outputDir, "docs");
		const pagesDir = join(this.outputDir, "src", "pages");
		if (!(await isDirectory(docsDir))) {
			return this.skip(result, `Docs directory not found at ${docsDir}`);
		}
		if (!(await isDirectory(pagesDir))) {
			return this.skip(result, `Pages directory not found at ${pagesDir}`);
		}
		const enhancer = this.enhancer;
		if (!enhancer) {
			return this.skip(result, "Site revision needs an AI completion provider");
		}
		const overview = (await readOptionalFile(join(docsDir, "overview.md")))?.trim();
		if (!overview) {
			return this.skip(result, `overview.md not found or empty in ${docsDir}`);
		}

		result.outcomes.landingPage = await this.reviseTarget("index.js", () =>
			this.reviseLandingPage(enhancer, overview, join(pagesDir, "index.js")),
		);
		result.outcomes.homepageFeatures = await this.reviseTarget("HomepageFeatures", () =>
			this.reviseHomepageFeatures(enhancer, overview),
		);
		result.outcomes.siteConfig = await this.reviseTarget("docusaurus.config.js", () =>
			this.reviseSiteConfig(enhancer, overview),
		);

		if (Object.values(result.outcomes).some(outcome => outcome === "failed" || outcome === "missing")) {
			log.warn("Some files could not be updated, but the revision completed");
		} else {
			log.info("Successfully revised site landing page content");
		}
		result.success = true;
		return result;
	}

	private skip(result: RevisionResult, error: string): RevisionResult {
		log.warn(error);
		result.error = error;
		return result;
	}

	private async reviseTarget(label: string, revise: () => Promise<RevisionOutcome>): Promise<RevisionOutcome> {
		try {
			return await revise();
		} catch (error) {
			logError(log, error, `Error updating ${label}`);
			return "failed";
		}
	}

	private async reviseLandingPage(enhancer: AiEnhancer, overview: string, path: string): Promise<RevisionOutcome> {
		const page = await readOptionalFile(path);
		if (page === undefined) {
			log.warn(`index.js not found at ${path}`);
			return "missing";
		}

		const imports = page.match(IMPORT_LINE) ?? [];
		const reply = await enhancer.complete(buildLandingPagePrompt(overview, page, imports), "index_js_update");
		if (!reply) {
			log.warn("AI failed to generate updated index.js content");
			return "failed";
		}

		const updated = extractCodeBlock(reply, "javascript");
		if (SITE_CONFIG_DESTRUCTURE.test(page) && !SITE_CONFIG_DESTRUCTURE.test(updated)) {
			log.warn("AI removed the siteConfig reference; keeping the original index.js");
			return "failed";
		}
		const dropped = imports.find(line => !updated.includes(line));
		if (dropped) {
			log.warn(`AI removed an import; keeping the original index.js: ${dropped}`);
			return "failed";
		}
		return await this.write(path, page, updated, "index.js");
	}

	private async reviseHomepageFeatures(enhancer: AiEnhancer, overview: string): Promise<RevisionOutcome> {
		const path = await this.findHomepageFeatures();
		if (!path) {
			log.warn("HomepageFeatures component not found");
			return "missing";
		}
		const component = await readOptionalFile(path);
		if (component === undefined) {
			return "missing";
		}

		const reply = await enhancer.complete(
			buildHomepageFeaturesPrompt(overview, component),
			"homepage_features_update",
		);
		if (!reply) {
			log.warn("AI failed to generate updated HomepageFeatures content");
			return "failed";
		}
		return await this.write(path, component, extractCodeBlock(reply, "javascript"), "HomepageFeatures");
	}

	private async reviseSiteConfig(enhancer: AiEnhancer, overview: string): Promise<RevisionOutcome> {
		const path = join(this.outputDir, "docusaurus.config.js");
		const config = await readOptionalFile(path);
		if (config === undefined) {
			log.warn(`docusaurus.config.js not found at ${path}`);
			return "missing";
		}

		const reply = await enhancer.complete(buildSiteConfigPrompt(overview, config), "docusaurus_config_update");
		if (!reply) {
			log.warn("AI failed to generate updated docusaurus.config.js content");
			return "failed";
		}
		return await this.write(path, config, extractCodeBlock(reply, "javascript"), "docusaurus.config.js");
	}

	/**
	 * `index.js` of the first `HomepageFeatures` directory under `src/components`, matched
	 * case-insensitively.
	 */
	private async findHomepageFeatures(): Promise<string | undefined> {
		const componentsDir = join(this.outputDir, "src", "components");
		const matches = await glob("**/homepagefeatures/index.js", {
			cwd: componentsDir,
			nocase: true,
			nodir: true,
			posix: true,
		});
		const first = matches.sort()[0];
		return first ? join(componentsDir, first) : undefined;
	}

	private async write(path: string, current: string, updated: string, label: string): Promise<RevisionOutcome> {
		if (updated.trim() === current.trim()) {
			log.info(`No changes needed for ${label}`);
			return "unchanged";
		}
		await writeFile(path, `${updated.trim()}\n`, "utf-8");
		log.info(`Updated ${label} content from overview.md`);
		return "updated";
	}
}
