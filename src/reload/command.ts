import { spawn } from "node:child_process";

import { TimeoutError } from "../infra/timeout.js";

export type CommandResult = {
	code: number;
	stdout: string;
	stderr: string;
};

export type CommandRunner = (
	command: string,
	args: readonly string[],
	options: { timeoutMs: number },
) => Promise<CommandResult>;

/**
 * Run a command without a shell and collect its output. A non-zero exit is
 * returned, not thrown; spawn failures (e.g. ENOENT) reject. Past
 * `timeoutMs` the child is killed and the promise rejects with TimeoutError.
 */
export const runCommand: CommandRunner = (command, args, { timeoutMs }) =>
	new Promise<CommandResult>((resolve, reject) => {
		const proc = spawn(command, args, { stdio: ["ignore", "pipe", "pipe"] });
		let stdout = "";
		let stderr = "";
		let settled = false;

		const timer = setTimeout(() => {
			if (settled) return;
			settled = true;
			proc.kill("SIGKILL");
			reject(new TimeoutError(`${command} ${args[0] ?? ""} timed out after ${timeoutMs}ms`, timeoutMs));
		}, timeoutMs);
		timer.unref();

		proc.stdout.on("data", (data: Buffer) => {
			stdout += data.toString();
		});
		proc.stderr.on("data", (data: Buffer) => {
			stderr += data.toString();
		});

		proc.on("error", (err) => {
			if (settled) return;
			settled = true;
			clearTimeout(timer);
			reject(err);
		});

		proc.on("close", (code) => {
			if (settled) return;
			settled = true;
			clearTimeout(timer);
			resolve({ code: code ?? -1, stdout, stderr });
		});
	});
