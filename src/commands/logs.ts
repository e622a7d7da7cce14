import type { Command } from "commander";

import { openControlPlane, reportFailure } from "./shared.js";

export function registerLogsCommand(program: Command): void {
	program
		.command("logs")
		.description("Print recent engine logs")
		.argument("<protocol>", "xray, trojan, singbox or wireguard")
		.option("-n, --lines <count>", "Number of lines", "100")
		.action(async (protocol: string, opts: { lines: string }) => {
			const lines = Number.parseInt(opts.lines, 10);
			if (!Number.isInteger(lines) || lines < 1) {
				console.error(`Error: --lines must be a positive integer, got '${opts.lines}'`);
				process.exitCode = 1;
				return;
			}
			const result = await openControlPlane().readServiceLogs(protocol, lines);
			if (!result.ok) {
				reportFailure("logs", result.error);
				return;
			}
			process.stdout.write(result.value.endsWith("\n") || result.value === "" ? result.value : `${result.value}\n`);
		});
}
