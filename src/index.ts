#!/usr/bin/env node

import { createProgram } from "./cli/program.js";
import { registerBackupCommand } from "./commands/backup.js";
import { registerInitCommand } from "./commands/init.js";
import { registerLogsCommand } from "./commands/logs.js";
import { registerRegenerateCommand } from "./commands/regenerate.js";
import { registerReloadCommand } from "./commands/reload.js";
import { registerSettingsCommand } from "./commands/settings.js";
import { registerStatusCommand } from "./commands/status.js";
import { registerUserCommand } from "./commands/user.js";
import { setConfigPath } from "./config/path.js";
import { setVerbose } from "./globals.js";
import { installUnhandledRejectionHandler } from "./infra/unhandled-rejections.js";
import { closeLogger, getLogger } from "./logging.js";

// Create CLI program
const program = createProgram();

// Register commands
registerInitCommand(program);
registerUserCommand(program);
registerSettingsCommand(program);
registerRegenerateCommand(program);
registerBackupCommand(program);
registerReloadCommand(program);
registerStatusCommand(program);
registerLogsCommand(program);

// Pre-parse to extract global options before commands run
// This ensures --config and --verbose are set before any config loading happens
program.hook("preAction", (thisCommand) => {
	const opts = thisCommand.opts<{ config?: string; verbose?: boolean }>();
	if (opts.config) {
		setConfigPath(opts.config);
	}
	if (opts.verbose) {
		setVerbose(true);
	}
	// Initialize logger after config path is set
	getLogger();
	installUnhandledRejectionHandler("cli");
});

async function main(): Promise<void> {
	await program.parseAsync();
}

main()
	.catch((err) => {
		// Commander prints some errors itself; keep this minimal.
		console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
		process.exitCode = 1;
	})
	.finally(() => {
		// pino's file destination keeps a handle open
		closeLogger();
	});
