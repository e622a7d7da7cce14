import chalk from "chalk";
import type { Command } from "commander";

import type { BackupRecord } from "../backup/backup-manager.js";
import { openControlPlane, printApplyReport, reportFailure } from "./shared.js";

function formatSize(bytes: number): string {
	if (bytes < 1024) return `${bytes} B`;
	if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KiB`;
	return `${(bytes / (1024 * 1024)).toFixed(1)} MiB`;
}

function printBackups(backups: BackupRecord[]): void {
	if (backups.length === 0) {
		console.log("No backups.");
		return;
	}
	console.log("ID                              Created                   Reason        Size");
	for (const backup of backups) {
		console.log(
			`${backup.id.padEnd(31)} ${backup.createdAt.padEnd(25)} ${backup.reason.padEnd(13)} ${formatSize(backup.size)}`,
		);
	}
}

export function registerBackupCommand(program: Command): void {
	const backup = program.command("backup").description("Snapshot and restore the data directory");

	backup
		.command("create")
		.description("Take a snapshot now")
		.action(async () => {
			const result = await openControlPlane().createBackup();
			if (!result.ok) {
				reportFailure("backup create", result.error);
				return;
			}
			console.log(`Created ${result.value.id} (${formatSize(result.value.size)})`);
		});

	backup
		.command("list")
		.description("List snapshots, newest first")
		.option("--json", "Output as JSON")
		.action(async (opts: { json?: boolean }) => {
			const result = await openControlPlane().listBackups();
			if (!result.ok) {
				reportFailure("backup list", result.error);
				return;
			}
			if (opts.json) {
				console.log(JSON.stringify({ backups: result.value }, null, 2));
				return;
			}
			printBackups(result.value);
		});

	backup
		.command("restore")
		.description("Restore a snapshot, then regenerate and reload every engine")
		.argument("<id>", "Backup id")
		.action(async (id: string) => {
			const result = await openControlPlane().restoreBackup(id);
			if (!result.ok) {
				reportFailure("backup restore", result.error);
				return;
			}
			console.log(chalk.bold(`Restored ${result.value.restored.id}`));
			console.log(`  Previous state saved as ${result.value.safety.id}`);
			printApplyReport(result.value);
		});

	backup
		.command("prune")
		.description("Delete snapshots beyond the retention limit")
		.action(async () => {
			const result = await openControlPlane().pruneBackups();
			if (!result.ok) {
				reportFailure("backup prune", result.error);
				return;
			}
			console.log(result.value.length > 0 ? `Pruned ${result.value.join(", ")}` : "Nothing to prune.");
		});

	backup
		.command("delete")
		.description("Delete one snapshot")
		.argument("<id>", "Backup id")
		.action(async (id: string) => {
			const result = await openControlPlane().deleteBackup(id);
			if (!result.ok) {
				reportFailure("backup delete", result.error);
				return;
			}
			console.log(`Deleted ${result.value.id}`);
		});
}
