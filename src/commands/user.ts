import chalk from "chalk";
import type { Command } from "commander";

import type { UserChange, UserSummary } from "../operator/control-plane.js";
import { openControlPlane, printApplyReport, reportFailure, splitList } from "./shared.js";

function printUsers(users: UserSummary[]): void {
	if (users.length === 0) {
		console.log("No users.");
		return;
	}
	console.log("Username                         Enabled Slot  Protocols                      Last Seen");
	for (const user of users) {
		const name = user.username.padEnd(32);
		const enabled = (user.enabled ? "yes" : "no").padEnd(7);
		const slot = String(user.slot).padEnd(5);
		const protocols = user.protocols.join(",").padEnd(30);
		console.log(`${name} ${enabled} ${slot} ${protocols} ${user.lastSeenAt ?? "-"}`);
	}
}

function printChange(verb: string, change: UserChange): void {
	console.log(chalk.bold(`${verb} ${change.user.username}`));
	printApplyReport(change);
}

export function registerUserCommand(program: Command): void {
	const user = program.command("user").description("Manage proxy users");

	user
		.command("add")
		.description("Create a user with fresh credentials")
		.argument("<username>", "Username (3-32 of A-Z a-z 0-9 _ -)")
		.option("-p, --protocols <list>", "Comma-separated protocols (default: all)")
		.action(async (username: string, opts: { protocols?: string }) => {
			const result = await openControlPlane().createUser(username, splitList(opts.protocols));
			if (!result.ok) {
				reportFailure("user add", result.error);
				return;
			}
			printChange("Created", result.value);
		});

	user
		.command("remove")
		.description("Delete a user and their client files")
		.argument("<username>", "Username")
		.action(async (username: string) => {
			const result = await openControlPlane().deleteUser(username);
			if (!result.ok) {
				reportFailure("user remove", result.error);
				return;
			}
			printChange("Removed", result.value);
		});

	user
		.command("list")
		.description("List users")
		.option("--json", "Output as JSON")
		.action(async (opts: { json?: boolean }) => {
			const result = await openControlPlane().listUsers();
			if (!result.ok) {
				reportFailure("user list", result.error);
				return;
			}
			if (opts.json) {
				console.log(JSON.stringify({ users: result.value }, null, 2));
				return;
			}
			printUsers(result.value);
		});

	user
		.command("show")
		.description("Show a user and their connection links")
		.argument("<username>", "Username")
		.option("--json", "Output as JSON")
		.action(async (username: string, opts: { json?: boolean }) => {
			const result = await openControlPlane().getUser(username);
			if (!result.ok) {
				reportFailure("user show", result.error);
				return;
			}
			const details = result.value;
			if (opts.json) {
				console.log(JSON.stringify(details, null, 2));
				return;
			}
			console.log(chalk.bold(details.username));
			console.log(`  Enabled: ${details.enabled ? "yes" : "no"}`);
			console.log(`  Slot: ${details.slot}`);
			console.log(`  Protocols: ${details.protocols.join(", ") || "-"}`);
			console.log(`  Created: ${details.createdAt}`);
			console.log(`  Client files: ${details.clientDir}`);
			if (details.links.length > 0) {
				console.log("\nLinks:");
				for (const link of details.links) console.log(`  ${link}`);
			}
		});

	for (const [name, enabled] of [
		["enable", true],
		["disable", false],
	] as const) {
		user
			.command(name)
			.description(`${enabled ? "Enable" : "Disable"} a user`)
			.argument("<username>", "Username")
			.action(async (username: string) => {
				const result = await openControlPlane().setUserEnabled(username, enabled);
				if (!result.ok) {
					reportFailure(`user ${name}`, result.error);
					return;
				}
				printChange(enabled ? "Enabled" : "Disabled", result.value);
			});
	}

	user
		.command("rotate")
		.description("Replace a user's credentials")
		.argument("<username>", "Username")
		.option("-p, --protocols <list>", "Comma-separated protocols (default: all the user has)")
		.action(async (username: string, opts: { protocols?: string }) => {
			const result = await openControlPlane().regenerateUserCredentials(username, splitList(opts.protocols));
			if (!result.ok) {
				reportFailure("user rotate", result.error);
				return;
			}
			printChange("Rotated credentials for", result.value);
		});
}
