import chalk from "chalk";
import type { Command } from "commander";

import { openControlPlane, printApplyReport, reportFailure } from "./shared.js";

export function registerInitCommand(program: Command): void {
	program
		.command("init")
		.description("Create the records document, install templates and render the first configs")
		.option("-d, --domain <domain>", "Public domain (defaults to PROXY_WARDEN_DOMAIN)")
		.action(async (opts: { domain?: string }) => {
			const plane = openControlPlane();
			const result = await plane.initialize(opts.domain);
			if (!result.ok) {
				reportFailure("init", result.error);
				return;
			}

			console.log(chalk.bold(`Initialized ${plane.dataDir} for ${result.value.domain}`));
			if (result.value.templatesInstalled.length > 0) {
				console.log(`  Templates: ${result.value.templatesInstalled.join(", ")}`);
			}
			printApplyReport(result.value);
		});
}
