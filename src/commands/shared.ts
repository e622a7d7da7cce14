import chalk from "chalk";

import { loadConfig } from "../config/config.js";
import { readEnv } from "../env.js";
import type { ErrorSummary } from "../errors.js";
import { getChildLogger } from "../logging.js";
import { type ApplyReport, type ControlPlane, createControlPlane } from "../operator/control-plane.js";
import type { ProtocolStatus } from "../reload/coordinator.js";

const logger = getChildLogger({ module: "cli" });

export function openControlPlane(): ControlPlane {
	const env = readEnv();
	return createControlPlane({ dataDir: env.dataDir, domain: env.domain, config: loadConfig() });
}

/** Print an operation failure and mark the process as failed. */
export function reportFailure(command: string, error: ErrorSummary): void {
	logger.debug({ command, kind: error.kind, code: error.code }, "command failed");
	console.error(chalk.red(`Error [${error.code}]: ${error.message}`));
	process.exitCode = 1;
}

export function splitList(value: string | undefined): string[] | undefined {
	if (value === undefined) return undefined;
	return value
		.split(",")
		.map((item) => item.trim())
		.filter((item) => item.length > 0);
}

const STATE_COLORS: Record<ProtocolStatus["state"], (text: string) => string> = {
	idle: chalk.gray,
	validating: chalk.yellow,
	reloading: chalk.yellow,
	healthy: chalk.green,
	"validation-failed": chalk.red,
	"reload-failed": chalk.red,
};

export function formatState(state: ProtocolStatus["state"]): string {
	return STATE_COLORS[state](state);
}

/** Print rendered configs, client file failures and engine reloads; exit code 1 when any failed. */
export function printApplyReport(report: ApplyReport): void {
	for (const config of report.configs) {
		const name = config.protocol.padEnd(10);
		switch (config.status) {
			case "rendered":
				console.log(`  ${name} ${config.changed ? chalk.green("rendered") : chalk.gray("unchanged")}`);
				break;
			case "skipped":
				console.log(`  ${name} ${chalk.gray("disabled")}`);
				break;
			case "failed":
				console.log(`  ${name} ${chalk.red("failed")}  ${config.error?.message ?? ""}`);
				process.exitCode = 1;
				break;
		}
	}
	for (const client of report.clients) {
		const target = client.username === null ? "clients directory" : `clients of ${client.username}`;
		console.log(`  ${chalk.red("failed")}  ${target}: ${client.error.message}`);
		process.exitCode = 1;
	}
	for (const reload of report.reloads) {
		const via = reload.method ? ` via ${reload.method}` : "";
		const detail = reload.error ? `  ${reload.error.message}` : "";
		console.log(`  ${reload.protocol.padEnd(10)} ${formatState(reload.state)}${via}${detail}`);
		if (reload.state !== "healthy") process.exitCode = 1;
	}
}
