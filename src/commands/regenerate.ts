import chalk from "chalk";
import type { Command } from "commander";

import { openControlPlane, printApplyReport, reportFailure } from "./shared.js";

export function registerRegenerateCommand(program: Command): void {
	program
		.command("regenerate")
		.description("Re-render every engine config and client file, reloading what changed")
		.option("-f, --force", "Reload every enabled engine even if its config is unchanged")
		.action(async (opts: { force?: boolean }) => {
			const result = await openControlPlane().regenerateAllConfigs({ force: opts.force === true });
			if (!result.ok) {
				reportFailure("regenerate", result.error);
				return;
			}
			console.log(chalk.bold("Configs regenerated"));
			printApplyReport(result.value);
		});
}
