export * from "./util/ApiReferenceCleaning";
export * from "./util/CodeBlock";
export * from "./util/CodeElements";
export * from "./util/Frontmatter";
export * from "./util/MarkdownSections";
export * from "./util/MdxSanitization";
export * from "./util/Template";
