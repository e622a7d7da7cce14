import chalk from "chalk";
import type { Command } from "commander";

import { getConfigPath } from "../config/config.js";
import type { StatusReport } from "../operator/control-plane.js";
import type { HealthStatus } from "../reload/service-manager.js";
import { formatState, openControlPlane, reportFailure } from "./shared.js";

export type StatusOptions = {
	json?: boolean;
};

function formatHealth(health: HealthStatus): string {
	switch (health) {
		case "healthy":
			return chalk.green(health);
		case "unhealthy":
			return chalk.red(health);
		case "unknown":
			return chalk.gray(health);
	}
}

function printStatus(status: StatusReport, configPath: string): void {
	console.log(chalk.bold("=== Proxy Warden Status ===\n"));

	console.log("Data:");
	console.log(`  Directory: ${status.dataDir}`);
	console.log(`  Config: ${configPath}`);
	console.log(`  Initialized: ${status.initialized ? "yes" : "no"}`);
	if (status.domain) console.log(`  Domain: ${status.domain}`);
	console.log();

	console.log("Users:");
	console.log(`  Total: ${status.users.total}`);
	console.log(`  Enabled: ${status.users.enabled}`);
	console.log();

	console.log("Engines:");
	for (const engine of status.protocols) {
		const name = engine.protocol.padEnd(10);
		if (!engine.enabled) {
			console.log(`  ${name} ${chalk.gray("disabled")}`);
			continue;
		}
		const last = engine.reload.state === "idle" ? "" : `  last reload: ${formatState(engine.reload.state)}`;
		console.log(`  ${name} ${formatHealth(engine.health)}${last}`);
	}
	console.log();

	console.log("Backups:");
	console.log(`  Count: ${status.backups.count}`);
	console.log(`  Latest: ${status.backups.latest ? `${status.backups.latest.id} (${status.backups.latest.reason})` : "-"}`);
}

export function registerStatusCommand(program: Command): void {
	program
		.command("status")
		.description("Show records, engine health and backups")
		.option("--json", "Output as JSON")
		.action(async (opts: StatusOptions) => {
			const result = await openControlPlane().getStatus();
			if (!result.ok) {
				reportFailure("status", result.error);
				return;
			}
			if (opts.json) {
				console.log(JSON.stringify(result.value, null, 2));
				return;
			}
			printStatus(result.value, getConfigPath());
		});
}
