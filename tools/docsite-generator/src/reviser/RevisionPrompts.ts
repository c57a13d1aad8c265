import { extractBulletPoints, extractFirstParagraph, extractTitle } from "docsite-common";

/** Feature bullets from the overview offered to the homepage features prompt */
export const MAX_FEATURE_HINTS = 5;

function fenced(content: string): string {
	return `\`\`\`\n${content}\n\`\`\``;
}

function overviewBlock(overview: string): string {
	return `OVERVIEW.MD CONTENT (Use this as the source of information):\n${fenced(overview)}`;
}

function numbered(instructions: Array<string>): string {
	return instructions.map((instruction, index) => `${index + 1}. ${instruction}`).join("\n");
}

/**
 * Prompt for rewriting the text of the landing page component (`src/pages/index.js`).
 */
export function buildLandingPagePrompt(overview: string, page: string, imports: Array<string>): string {
	return [
		"Using the provided overview.md content as context, update ONLY the text content in this React component " +
			"(index.js) while preserving its existing structure completely.",
		overviewBlock(overview),
		`CURRENT INDEX.JS IMPORTS:\n${fenced(imports.join("\n"))}`,
		`CURRENT INDEX.JS:\n${fenced(page)}`,
		`INSTRUCTIONS:\n${numbered([
			"Update ONLY textual content (titles, descriptions, feature text) based on overview.md",
			"DO NOT change any component structure, imports, exports, or function definitions",
			"DO NOT modify any className values or styling",
			"DO NOT change any hooks or hook calls (useState, useEffect, useDocusaurusContext, etc.)",
			"Preserve ALL variable references like {siteConfig.title} exactly as they appear",
			"If the component uses useDocusaurusContext() to get siteConfig, KEEP this pattern exactly as is",
			"If overview.md doesn't have relevant content for a section, leave it unchanged",
		])}`,
		"Return ONLY the complete, updated index.js code.",
	].join("\n\n");
}

/**
 * Prompt for rewriting the feature list of the HomepageFeatures component. The overview's
 * first bullet points are called out as feature hints.
 */
export function buildHomepageFeaturesPrompt(overview: string, component: string): string {
	const features = extractBulletPoints(overview, MAX_FEATURE_HINTS);
	const sections = [
		"Using the provided overview.md content as context, update ONLY the feature descriptions in this React " +
			"component (HomepageFeatures/index.js) while preserving its structure.",
		overviewBlock(overview),
	];
	if (features.length > 0) {
		sections.push(`KEY FEATURES:\n${features.map(feature => `- ${feature}`).join("\n")}`);
	}
	sections.push(
		`CURRENT COMPONENT:\n${fenced(component)}`,
		`INSTRUCTIONS:\n${numbered([
			"Update ONLY the feature titles and descriptions based on the features in overview.md",
			"If the component has a FeatureList array, update the text in that array",
			"DO NOT change the component structure, imports, or exports",
			"DO NOT modify any className values or styling",
			"DO NOT add or remove features - only update existing ones",
			"If overview.md doesn't have relevant content for features, leave them unchanged",
		])}`,
		"Return ONLY the updated component code.",
	);
	return sections.join("\n\n");
}

/**
 * Prompt for updating the title and tagline of `docusaurus.config.js`.
 */
export function buildSiteConfigPrompt(overview: string, config: string): string {
	const title = extractTitle(overview);
	const tagline = extractFirstParagraph(overview);
	const hints = [title ? `Suggested title: ${title}` : "", tagline ? `Suggested tagline: ${tagline}` : ""].filter(
		Boolean,
	);
	return [
		"Using the provided overview.md content as context, update ONLY the title and tagline in this " +
			"docusaurus.config.js file.",
		overviewBlock(overview),
		...(hints.length > 0 ? [hints.join("\n")] : []),
		`CURRENT CONFIG:\n${fenced(config)}`,
		`INSTRUCTIONS:\n${numbered([
			"Update ONLY the title and tagline values based on overview.md",
			"DO NOT change any other configuration settings",
			"DO NOT modify any structural elements, plugins, or presets",
			"Preserve all routing and sidebar configuration",
		])}`,
		"Return ONLY the updated configuration code.",
	].join("\n\n");
}
