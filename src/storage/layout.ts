import path from "node:path";

import type { ProtocolName } from "../config/config.js";

/**
 * On-disk layout under the data directory.
 */
export type DataLayout = {
	root: string;
	recordsDir: string;
	recordsFile: string;
	historyDir: string;
	templatesDir: string;
	configsDir: string;
	clientsDir: string;
	backupsDir: string;
	locksDir: string;
	logsDir: string;
};

/** Top-level directories captured by a backup, relative to the data root. */
export const SNAPSHOT_DIRS = ["records", "configs", "clients", "templates"] as const;
export type SnapshotDir = (typeof SNAPSHOT_DIRS)[number];

export function resolveLayout(root: string): DataLayout {
	const recordsDir = path.join(root, "records");
	return {
		root,
		recordsDir,
		recordsFile: path.join(recordsDir, "users.json"),
		historyDir: path.join(recordsDir, "history"),
		templatesDir: path.join(root, "templates"),
		configsDir: path.join(root, "configs"),
		clientsDir: path.join(root, "clients"),
		backupsDir: path.join(root, "backups"),
		locksDir: path.join(root, "locks"),
		logsDir: path.join(root, "logs"),
	};
}

/**
 * Lock file guarding a path inside the data root. Lock files live outside
 * the directories a restore swaps, so a held lock survives the swap.
 */
export function lockPathFor(layout: DataLayout, target: string): string {
	const relative = path.relative(layout.root, target) || path.basename(target);
	return path.join(layout.locksDir, `${relative.replace(/[\\/]/g, "__")}.lock`);
}

export function configTargetFor(layout: DataLayout, protocol: ProtocolName, fileName: string): string {
	return path.join(layout.configsDir, protocol, fileName);
}
