import type { SectionConfig } from "../shared/SiteConfig";
import { extractFirstSection, stripFrontmatter } from "docsite-common";

export interface SectionInputs {
	/** A dedicated document for the section found in the repository */
	document?: string;
	readme?: string;
}

/**
 * Builds a prose section page: a dedicated document is used as-is, otherwise the matching
 * README section is placed under the section heading, otherwise a placeholder page.
 */
export function generateSectionContent(section: SectionConfig, inputs: SectionInputs): string {
	if (inputs.document) {
		return stripFrontmatter(inputs.document);
	}

	const content = [`# ${section.title}\n`];
	if (section.intro) {
		content.push(`${section.intro}\n`);
	}

	const readmeSection = inputs.readme ? extractFirstSection(inputs.readme, section.readmeSections) : undefined;
	if (readmeSection) {
		content.push(readmeSection);
	} else {
		content.push(`*No ${section.title.toLowerCase()} documentation is available at this time.*\n`);
	}
	return content.join("\n");
}
