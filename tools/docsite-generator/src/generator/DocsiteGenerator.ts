import { generateApiReference } from "../content/ApiReferenceGenerator";
import { generateSectionContent } from "../content/SectionGenerator";
import { AiEnhancer, type CompletionProvider } from "../enhancer/AiEnhancer";
import { SiteReviser } from "../reviser/SiteReviser";
import { getLog, logError } from "../shared/logger";
import type { SectionConfig, SiteConfig } from "../shared/SiteConfig";
import { runCommand } from "./CommandRunner";
import { cleanApiReferenceFile } from "./FileCleaners";
import { collectSourceFiles, readFirstExisting, readOptionalFile } from "./RepoFiles";
import { ensureSidebarId, renderIndexPage, renderSectionPage, renderSidebars } from "./SiteWriter";
import { copyTemplate, createFileFromTemplate } from "./TemplateFiles";
import { mkdir, stat, writeFile } from "node:fs/promises";
import { basename, join, resolve } from "node:path";
import { extractFirstParagraph, extractTitle, type TemplateVariables } from "docsite-common";

const log = getLog(import.meta);

/** Template files whose `{{ name }}` placeholders are filled in after copying */
export const TEMPLATED_SITE_FILES = ["docusaurus.config.js", "docusaurus.config.ts", "package.json", "README.md"];

export interface DocsiteGeneratorOptions {
	repoPath: string;
	outputDir: string;
	siteConfig: SiteConfig;
	/** Local site template copied into the output directory first */
	templateDir?: string;
	/** Enables AI enhancement of each section through `siteConfig.ai.model` */
	completionProvider?: CompletionProvider;
	/** Revise the landing page and site config from the overview page; needs AI enhancement */
	reviseSite?: boolean;
}

/** Timeout for `npm install` in the generated site */
export const INSTALL_TIMEOUT_MS = 600000;

export interface GenerationResult {
	success: boolean;
	outputDir: string;
	/** Ids of the section pages that were written */
	sections: Array<string>;
	error?: string;
}

interface RepoContext {
	readme?: string;
	projectName: string;
	description?: string;
}

async function isDirectory(path: string): Promise<boolean> {
	try {
		return (await stat(path)).isDirectory();
	} catch {
		return false;
	}
}

/**
 * Generates a Docusaurus docs site from a repository: one sanitized page per configured
 * section, an index page, and a sidebar.
 *
 * @example
 * ```typescript
 * const generator = new DocsiteGenerator({
 *   repoPath: "./my-project",
 *   outputDir: "./my-project-docs",
 *   siteConfig: await loadSiteConfig("./docsite.yaml"),
 * });
 * const result = await generator.generate();
 * ```
 */
export class DocsiteGenerator {
	private readonly repoPath: string;
	private readonly outputDir: string;
	private readonly siteConfig: SiteConfig;
	private readonly templateDir: string | undefined;
	private readonly enhancer: AiEnhancer | undefined;
	private readonly reviseSite: boolean;

	constructor(options: DocsiteGeneratorOptions) {
		this.repoPath = resolve(options.repoPath);
		this.outputDir = resolve(options.outputDir);
		this.siteConfig = options.siteConfig;
		this.templateDir = options.templateDir ? resolve(options.templateDir) : undefined;
		this.reviseSite = options.reviseSite ?? false;

		const model = options.siteConfig.ai.model;
		if (options.completionProvider && model) {
			this.enhancer = new AiEnhancer(options.completionProvider, model);
		} else if (model) {
			log.warn(`No completion provider configured; AI model ${model} is ignored`);
		}
	}

	get docsDir(): string {
		return join(this.outputDir, "docs");
	}

	async generate(): Promise<GenerationResult> {
		const result: GenerationResult = { success: false, outputDir: this.outputDir, sections: [] };

		if (!(await isDirectory(this.repoPath))) {
			result.error = `Repository path does not exist or is not a directory: ${this.repoPath}`;
			return result;
		}

		try {
			const repo = await this.readRepoContext();

			if (this.templateDir) {
				if (!(await copyTemplate(this.templateDir, this.outputDir))) {
					result.error = `Failed to copy template from ${this.templateDir}`;
					return result;
				}
				await this.fillTemplatePlaceholders(repo);
			}

			await mkdir(this.docsDir, { recursive: true });

			const written: Array<SectionConfig> = [];
			for (const section of this.siteConfig.sections) {
				if (await this.writeSection(section, repo)) {
					written.push(section);
				}
			}
			result.sections = written.map(section => section.id);

			await writeFile(
				join(this.docsDir, "index.md"),
				renderIndexPage({ projectName: repo.projectName, description: repo.description, sections: written }),
				"utf-8",
			);
			log.info("Generated index.md");

			await writeFile(join(this.outputDir, "sidebars.js"), renderSidebars(result.sections), "utf-8");
			await this.verifyStructure();

			if (this.reviseSite) {
				const revision = await new SiteReviser({ outputDir: this.outputDir, enhancer: this.enhancer }).revise();
				if (!revision.success) {
					log.warn(`Site revision skipped: ${revision.error ?? "unknown error"}`);
				}
			}

			log.info(`Documentation successfully generated at ${this.outputDir}`);
			result.success = true;
			return result;
		} catch (error) {
			logError(log, error, "Error generating documentation");
			result.error = error instanceof Error ? error.message : String(error);
			return result;
		}
	}

	private async readRepoContext(): Promise<RepoContext> {
		const readme = await readOptionalFile(join(this.repoPath, this.siteConfig.readme));
		return {
			readme,
			projectName:
				this.siteConfig.projectName ?? (readme ? extractTitle(readme) : undefined) ?? basename(this.repoPath),
			description: this.siteConfig.description ?? (readme ? extractFirstParagraph(readme) : undefined),
		};
	}

	private async fillTemplatePlaceholders(repo: RepoContext): Promise<void> {
		const variables: TemplateVariables = {
			projectName: repo.projectName,
			description: repo.description ?? `${repo.projectName} documentation`,
			repoUrl: this.siteConfig.repoUrl ?? "",
		};
		for (const file of TEMPLATED_SITE_FILES) {
			const path = join(this.outputDir, file);
			if ((await readOptionalFile(path)) !== undefined) {
				await createFileFromTemplate(path, path, variables);
			}
		}
	}

	private async buildSectionContent(section: SectionConfig, repo: RepoContext): Promise<string> {
		const document = await readFirstExisting(this.repoPath, section.sources);
		if (document) {
			log.info(`Using ${document.path} for ${section.id}`);
		}

		if (section.kind === "api") {
			const sourceFiles = document
				? []
				: await collectSourceFiles(this.repoPath, this.siteConfig.api.include, this.siteConfig.api.exclude);
			return generateApiReference(
				{
					document: document?.content,
					readme: repo.readme,
					readmeSections: section.readmeSections,
					sourceFiles,
				},
				{ title: section.title, maxFiles: this.siteConfig.api.maxFiles },
			);
		}
		return generateSectionContent(section, { document: document?.content, readme: repo.readme });
	}

	/**
	 * Generates, enhances, sanitizes and writes one section page. Failures are logged and the
	 * section is skipped; a failed API clean keeps the page as written.
	 */
	private async writeSection(section: SectionConfig, repo: RepoContext): Promise<boolean> {
		const filePath = join(this.docsDir, `${section.id}.md`);
		try {
			let content = await this.buildSectionContent(section, repo);
			if (this.enhancer && content) {
				content = await this.enhancer.enhance(content, section.id);
			}
			if (!content.trim()) {
				log.warn(`No content generated for ${section.id}`);
				return false;
			}

			await writeFile(filePath, renderSectionPage(section, content), "utf-8");
			if (section.kind === "api" && !(await cleanApiReferenceFile(filePath))) {
				log.warn(`Keeping ${section.id} without API reference cleaning`);
			}
			log.info(`Generated ${section.id} content`);
			return true;
		} catch (error) {
			logError(log, error, `Failed to generate ${section.id}`);
			return false;
		}
	}

	/**
	 * Makes sure the output is a loadable Docusaurus site: the static image directory exists
	 * and the config points at the generated sidebar.
	 */
	private async verifyStructure(): Promise<void> {
		await mkdir(join(this.outputDir, "static", "img"), { recursive: true });

		for (const configFile of ["docusaurus.config.js", "docusaurus.config.ts"]) {
			const path = join(this.outputDir, configFile);
			const config = await readOptionalFile(path);
			if (config === undefined) {
				continue;
			}
			const updated = ensureSidebarId(config);
			if (updated !== config) {
				await writeFile(path, updated, "utf-8");
				log.info(`Updated sidebarId in ${configFile}`);
			}
		}
	}

	/**
	 * Runs `npm install` in the generated site.
	 */
	async installDependencies(): Promise<boolean> {
		log.info("Installing dependencies");
		const result = await runCommand("npm", ["install"], { cwd: this.outputDir, timeout: INSTALL_TIMEOUT_MS });
		return result.exitCode === 0;
	}

	/**
	 * Runs `npm start` in the generated site with the terminal attached, resolving once the
	 * development server exits.
	 */
	async startServer(): Promise<boolean> {
		log.info("Starting development server");
		const result = await runCommand("npm", ["start"], { cwd: this.outputDir, inheritOutput: true });
		return result.exitCode === 0;
	}
}
