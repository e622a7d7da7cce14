import type { Command } from "commander";

import { formatState, openControlPlane, reportFailure } from "./shared.js";

export function registerReloadCommand(program: Command): void {
	program
		.command("reload")
		.description("Reload one engine with the config already on disk and wait for it to be healthy")
		.argument("<protocol>", "xray, trojan, singbox or wireguard")
		.action(async (protocol: string) => {
			const result = await openControlPlane().reloadService(protocol);
			if (!result.ok) {
				reportFailure("reload", result.error);
				return;
			}
			const status = result.value;
			const via = status.method ? ` via ${status.method}` : "";
			console.log(`${status.protocol}: ${formatState(status.state)}${via}`);
			if (status.error) console.log(`  ${status.error.message}`);
			if (status.state !== "healthy") process.exitCode = 1;
		});
}
