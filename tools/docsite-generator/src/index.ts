/**
 * Docsite Generator
 *
 * Generates Docusaurus documentation sites from repositories and keeps markdown pages
 * compilable as MDX.
 */

// CLI
export { createProgram, main as cli } from "./Cli";
// Content generators
export {
	type ApiReferenceInputs,
	type ApiReferenceOptions,
	generateApiReference,
	renderSourceOverview,
	type SourceFile,
} from "./content/ApiReferenceGenerator";
export { generateSectionContent, type SectionInputs } from "./content/SectionGenerator";
// AI enhancement
export {
	AiEnhancer,
	type CompletionProvider,
	type CompletionRequest,
} from "./enhancer/AiEnhancer";
export { type ModelSpec, parseModelSpec, type ProviderName, SUPPORTED_PROVIDERS } from "./enhancer/ModelSpec";
export { buildEnhancementPrompt } from "./enhancer/Prompts";
// Site generation
export { type CommandOptions, type CommandResult, runCommand } from "./generator/CommandRunner";
export { DocsiteGenerator, type DocsiteGeneratorOptions, type GenerationResult } from "./generator/DocsiteGenerator";
export {
	cleanApiReferenceFile,
	sanitizeDocument,
	sanitizeFile,
	type SanitizeFileOptions,
	type SanitizeFileResult,
} from "./generator/FileCleaners";
export { copyTemplate, createFileFromTemplate } from "./generator/TemplateFiles";
// Site revision
export {
	type RevisionOutcome,
	type RevisionResult,
	type RevisionTarget,
	SiteReviser,
	type SiteReviserOptions,
} from "./reviser/SiteReviser";
// Configuration
export { getConfig, resetConfig } from "./shared/config";
export {
	DEFAULT_SECTIONS,
	defaultSiteConfig,
	loadSiteConfig,
	parseSiteConfig,
	type SectionConfig,
	type SiteConfig,
} from "./shared/SiteConfig";
