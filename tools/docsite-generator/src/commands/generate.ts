import { DocsiteGenerator } from "../generator/DocsiteGenerator";
import { getConfig } from "../shared/config";
import { defaultSiteConfig, loadSiteConfig } from "../shared/SiteConfig";
import type { Command } from "commander";

interface GenerateOptions {
	output?: string;
	config?: string;
	template?: string;
	revise?: boolean;
	install?: boolean;
	start?: boolean;
}

async function runGenerate(repo: string, options: GenerateOptions): Promise<void> {
	const siteConfig = options.config ? await loadSiteConfig(options.config) : defaultSiteConfig();
	const generator = new DocsiteGenerator({
		repoPath: repo,
		outputDir: options.output ?? getConfig().DOCSITE_OUTPUT_DIR,
		siteConfig,
		templateDir: options.template,
		reviseSite: options.revise ?? false,
	});

	const result = await generator.generate();
	if (!result.success) {
		throw new Error(result.error ?? "Documentation generation failed");
	}
	console.log(`Documentation generated at ${result.outputDir}`);
	console.log(`Sections: ${result.sections.join(", ") || "(none)"}`);

	if (options.install && !(await generator.installDependencies())) {
		throw new Error("Failed to install dependencies");
	}
	if (options.start && !(await generator.startServer())) {
		throw new Error("Failed to start development server");
	}
}

export function registerGenerateCommand(program: Command): void {
	program
		.command("generate <repo>")
		.description("Generate a Docusaurus documentation site from a repository")
		.option("-o, --output <dir>", "Output directory (defaults to DOCSITE_OUTPUT_DIR)")
		.option("-c, --config <file>", "YAML site configuration file")
		.option("-t, --template <dir>", "Local site template to copy into the output directory")
		.option("--revise", "Revise the landing page and site config from the overview page (needs AI)")
		.option("--install", "Run npm install in the generated site")
		.option("--start", "Run npm start in the generated site")
		.action(async (repo: string, options: GenerateOptions) => {
			try {
				await runGenerate(repo, options);
			} catch (error) {
				const message = error instanceof Error ? error.message : String(error);
				console.error(`Error: ${message}`);
				process.exit(1);
			}
		});
}
