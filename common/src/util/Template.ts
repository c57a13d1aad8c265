export type TemplateVariables = Record<string, string | number | boolean>;

const PLACEHOLDER = /\{\{\s*([\w.-]+)\s*\}\}/g;

/**
 * Replaces `{{ name }}` placeholders with their values. Unknown placeholders are left in place.
 */
export function renderTemplate(template: string, variables: TemplateVariables): string {
	return template.replace(PLACEHOLDER, (placeholder: string, name: string) =>
		Object.hasOwn(variables, name) ? String(variables[name]) : placeholder,
	);
}
