// Re-exports all command registration functions

export { registerGenerateCommand } from "./generate";
export { registerSanitizeCommands } from "./sanitize";
