import { getLog } from "../shared/logger";
import { spawn } from "node:child_process";

const log = getLog(import.meta);

/**
 * Result of running a command
 */
export interface CommandResult {
	/** Exit code (0 = success, 124 = timed out) */
	exitCode: number;
	/** Captured standard output; empty when the output is inherited */
	stdout: string;
	/** Captured standard error; empty when the output is inherited */
	stderr: string;
}

export interface CommandOptions {
	/** Working directory */
	cwd: string;
	/** Timeout in milliseconds; no timeout when omitted */
	timeout?: number;
	/** Connect the command to this process's terminal instead of capturing its output */
	inheritOutput?: boolean;
}

/**
 * Runs a command in the site directory, resolving with its exit code once it ends.
 * Never rejects: a command that cannot be started resolves with exit code 1.
 *
 * @param command - The command to run (e.g., 'npm')
 * @param args - Arguments to pass to the command
 */
export function runCommand(command: string, args: Array<string>, options: CommandOptions): Promise<CommandResult> {
	const { cwd, timeout, inheritOutput = false } = options;

	log.info(`Running ${command} ${args.join(" ")} in ${cwd}`);

	return new Promise(resolve => {
		const proc = spawn(command, args, {
			cwd,
			shell: true,
			stdio: inheritOutput ? "inherit" : "pipe",
		});

		let stdout = "";
		let stderr = "";
		let timedOut = false;

		const timeoutId =
			timeout === undefined
				? undefined
				: setTimeout(() => {
						timedOut = true;
						proc.kill("SIGTERM");
						log.warn(`${command} timed out after ${timeout}ms`);
					}, timeout);

		proc.stdout?.on("data", (data: Buffer) => {
			stdout += data.toString();
		});

		proc.stderr?.on("data", (data: Buffer) => {
			stderr += data.toString();
		});

		proc.on("error", error => {
			clearTimeout(timeoutId);
			log.error(`Failed to start ${command}: ${error.message}`);
			resolve({ exitCode: 1, stdout, stderr: `${stderr}\nFailed to start command: ${error.message}` });
		});

		proc.on("close", code => {
			clearTimeout(timeoutId);
			const exitCode = timedOut ? 124 : (code ?? 1);
			if (exitCode !== 0) {
				log.warn(`${command} ${args.join(" ")} exited with code ${exitCode}`);
			}
			resolve({ exitCode, stdout, stderr: timedOut ? `${stderr}\nCommand timed out` : stderr });
		});
	});
}
