import { runCommand } from "./CommandRunner";
import { EventEmitter } from "node:events";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

vi.mock("node:child_process", () => ({
	spawn: vi.fn(),
}));

vi.mock("../shared/logger", () => ({
	getLog: () => ({
		info: vi.fn(),
		warn: vi.fn(),
		error: vi.fn(),
	}),
}));

import { spawn } from "node:child_process";

interface MockProcess extends EventEmitter {
	stdout: EventEmitter | null;
	stderr: EventEmitter | null;
	kill: ReturnType<typeof vi.fn>;
}

function createMockProcess(piped = true): MockProcess {
	const proc = new EventEmitter() as MockProcess;
	proc.stdout = piped ? new EventEmitter() : null;
	proc.stderr = piped ? new EventEmitter() : null;
	proc.kill = vi.fn();
	return proc;
}

describe("runCommand", () => {
	beforeEach(() => {
		vi.useFakeTimers();
		vi.clearAllMocks();
	});

	afterEach(() => {
		vi.useRealTimers();
	});

	it("should capture the output of a successful command", async () => {
		const proc = createMockProcess();
		vi.mocked(spawn).mockReturnValue(proc as unknown as ReturnType<typeof spawn>);

		const pending = runCommand("npm", ["install"], { cwd: "/site" });
		proc.stdout?.emit("data", Buffer.from("added 12 packages\n"));
		proc.emit("close", 0);

		expect(await pending).toEqual({ exitCode: 0, stdout: "added 12 packages\n", stderr: "" });
		expect(spawn).toHaveBeenCalledWith("npm", ["install"], { cwd: "/site", shell: true, stdio: "pipe" });
	});

	it("should report a non-zero exit code with stderr", async () => {
		const proc = createMockProcess();
		vi.mocked(spawn).mockReturnValue(proc as unknown as ReturnType<typeof spawn>);

		const pending = runCommand("npm", ["install"], { cwd: "/site" });
		proc.stderr?.emit("data", Buffer.from("npm ERR! missing script\n"));
		proc.emit("close", 1);

		const result = await pending;
		expect(result.exitCode).toBe(1);
		expect(result.stderr).toBe("npm ERR! missing script\n");
	});

	it("should inherit the terminal when asked", async () => {
		const proc = createMockProcess(false);
		vi.mocked(spawn).mockReturnValue(proc as unknown as ReturnType<typeof spawn>);

		const pending = runCommand("npm", ["start"], { cwd: "/site", inheritOutput: true });
		proc.emit("close", 0);

		expect(await pending).toEqual({ exitCode: 0, stdout: "", stderr: "" });
		expect(spawn).toHaveBeenCalledWith("npm", ["start"], { cwd: "/site", shell: true, stdio: "inherit" });
	});

	it("should resolve with exit code 1 when the command cannot start", async () => {
		const proc = createMockProcess();
		vi.mocked(spawn).mockReturnValue(proc as unknown as ReturnType<typeof spawn>);

		const pending = runCommand("missing-binary", [], { cwd: "/site" });
		proc.emit("error", new Error("spawn missing-binary ENOENT"));

		expect(await pending).toEqual({
			exitCode: 1,
			stdout: "",
			stderr: "\nFailed to start command: spawn missing-binary ENOENT",
		});
	});

	it("should kill the command when it times out", async () => {
		const proc = createMockProcess();
		vi.mocked(spawn).mockReturnValue(proc as unknown as ReturnType<typeof spawn>);

		const pending = runCommand("npm", ["install"], { cwd: "/site", timeout: 1000 });
		vi.advanceTimersByTime(1000);
		proc.emit("close", null);

		const result = await pending;
		expect(proc.kill).toHaveBeenCalledWith("SIGTERM");
		expect(result.exitCode).toBe(124);
		expect(result.stderr).toBe("\nCommand timed out");
	});
});
