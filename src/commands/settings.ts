import chalk from "chalk";
import type { Command } from "commander";

import { summarizeError } from "../errors.js";
import type { ServerSettings } from "../storage/schema.js";
import { parseSettingsAssignment } from "../storage/settings.js";
import { openControlPlane, printApplyReport, reportFailure } from "./shared.js";

/** Settings with key material replaced, for display. */
function redact(settings: ServerSettings): ServerSettings {
	return {
		...settings,
		protocols: {
			...settings.protocols,
			singbox: { ...settings.protocols.singbox, obfsPassword: "<redacted>" },
			wireguard: { ...settings.protocols.wireguard, serverPrivateKey: "<redacted>" },
		},
	};
}

export function registerSettingsCommand(program: Command): void {
	const settings = program.command("settings").description("Inspect and change server settings");

	settings
		.command("show")
		.description("Print the server settings")
		.option("--show-secrets", "Include the obfuscation password and server private key")
		.action(async (opts: { showSecrets?: boolean }) => {
			const result = await openControlPlane().getSettings();
			if (!result.ok) {
				reportFailure("settings show", result.error);
				return;
			}
			const shown = opts.showSecrets ? result.value : redact(result.value);
			console.log(JSON.stringify(shown, null, 2));
		});

	settings
		.command("set")
		.description("Change one setting, e.g. `settings set xray.visionPort 9443`")
		.argument("<key>", "domain, tls.<field> or <protocol>.<field>")
		.argument("<value>", "New value (numbers, booleans and JSON lists are parsed)")
		.action(async (key: string, value: string) => {
			let patch: ReturnType<typeof parseSettingsAssignment>;
			try {
				patch = parseSettingsAssignment(key, value);
			} catch (err) {
				reportFailure("settings set", summarizeError(err));
				return;
			}

			const result = await openControlPlane().updateSettings(patch);
			if (!result.ok) {
				reportFailure("settings set", result.error);
				return;
			}
			console.log(chalk.bold(`Updated ${key}`));
			printApplyReport(result.value);
		});
}
