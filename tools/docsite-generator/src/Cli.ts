import { registerGenerateCommand, registerSanitizeCommands } from "./commands";
import { Command } from "commander";

export const VERSION = "1.0.0";

export function createProgram(): Command {
	const program = new Command();
	program
		.name("docsite")
		.description("Docsite CLI - generate MDX-safe documentation sites from repositories")
		.version(VERSION, "-v, --version");

	registerSanitizeCommands(program);
	registerGenerateCommand(program);
	return program;
}

/**
 * Runs the CLI with the given arguments (without the node and script paths).
 */
export async function main(argv: Array<string>): Promise<void> {
	await createProgram().parseAsync(argv, { from: "user" });
}
