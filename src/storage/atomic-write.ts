/**
 * Write-then-rename primitives.
 *
 * Every file the system produces (records document, engine configs, client
 * configs, backup archives and manifests) reaches its live path through
 * `commitFile`: the content is written to a temporary path in the same
 * directory, fsynced, renamed over the target, and the directory entry is
 * fsynced. Readers therefore see either the previous file or the new one.
 */

import crypto from "node:crypto";
import fs from "node:fs";
import type { FileHandle } from "node:fs/promises";
import path from "node:path";

import { getChildLogger } from "../logging.js";
import { ensureDir, errnoCode } from "../utils.js";

const logger = getChildLogger({ module: "atomic-write" });

const TEMP_SUFFIX = ".tmp";

export type AtomicWriteOptions = {
	mode?: number;
};

export function tempPathFor(target: string): string {
	const suffix = crypto.randomBytes(6).toString("hex");
	return path.join(path.dirname(target), `.${path.basename(target)}.${suffix}${TEMP_SUFFIX}`);
}

/**
 * fsync a directory so a completed rename survives power loss.
 * Some filesystems refuse to open directories for sync; that is logged, not fatal.
 */
export async function syncDirectory(dir: string): Promise<void> {
	let handle: FileHandle | undefined;
	try {
		handle = await fs.promises.open(dir, "r");
		await handle.sync();
	} catch (err) {
		const code = errnoCode(err);
		if (code !== "EISDIR" && code !== "EINVAL" && code !== "EPERM" && code !== "EBADF") {
			throw err;
		}
		logger.debug({ dir, code }, "directory fsync not supported");
	} finally {
		await handle?.close();
	}
}

async function discard(target: string): Promise<void> {
	await fs.promises.rm(target, { force: true, recursive: true }).catch((err: unknown) => {
		logger.warn({ target, error: String(err) }, "failed to remove temporary path");
	});
}

/**
 * fsync an already-written temporary file and rename it over `target`.
 * On failure the temporary file is removed and the target is untouched.
 */
export async function commitFile(tempPath: string, target: string): Promise<void> {
	try {
		const handle = await fs.promises.open(tempPath, "r+");
		try {
			await handle.sync();
		} finally {
			await handle.close();
		}
		await fs.promises.rename(tempPath, target);
	} catch (err) {
		await discard(tempPath);
		throw err;
	}
	await syncDirectory(path.dirname(target));
}

export async function writeFileAtomic(
	target: string,
	content: string | Uint8Array,
	options: AtomicWriteOptions = {},
): Promise<void> {
	await ensureDir(path.dirname(target));
	const tempPath = tempPathFor(target);

	const handle = await fs.promises.open(tempPath, "wx", options.mode ?? 0o600);
	try {
		await handle.writeFile(content);
	} catch (err) {
		await handle.close();
		await discard(tempPath);
		throw err;
	}
	await handle.close();

	await commitFile(tempPath, target);
}

/**
 * Remove temporary files left behind by writers that died before rename.
 * Callers must hold the lock guarding `target`.
 */
export async function removeStaleTempFiles(target: string): Promise<number> {
	const dir = path.dirname(target);
	const prefix = `.${path.basename(target)}.`;
	let entries: string[];
	try {
		entries = await fs.promises.readdir(dir);
	} catch (err) {
		if (errnoCode(err) === "ENOENT") return 0;
		throw err;
	}

	const stale = entries.filter((name) => name.startsWith(prefix) && name.endsWith(TEMP_SUFFIX));
	for (const name of stale) {
		await fs.promises.rm(path.join(dir, name), { force: true });
	}
	if (stale.length > 0) {
		logger.warn({ target, count: stale.length }, "removed interrupted writes");
	}
	return stale.length;
}

/**
 * Replace the directory at `live` with `staged` by rename.
 *
 * The previous directory (if any) is parked at `<live>.<suffix>.old` and
 * returned so the caller can either discard it once every swap of a batch
 * succeeded or move it back with `restoreDirectory`.
 */
export async function swapDirectory(staged: string, live: string): Promise<string | null> {
	let parked: string | null = `${live}.${crypto.randomBytes(4).toString("hex")}.old`;
	try {
		await fs.promises.rename(live, parked);
	} catch (err) {
		if (errnoCode(err) !== "ENOENT") throw err;
		parked = null;
	}

	try {
		await fs.promises.rename(staged, live);
	} catch (err) {
		if (parked) {
			await fs.promises.rename(parked, live);
		}
		throw err;
	}
	await syncDirectory(path.dirname(live));
	return parked;
}

/**
 * Undo a `swapDirectory`: drop the swapped-in directory and move the parked one back.
 */
export async function restoreDirectory(live: string, parked: string | null): Promise<void> {
	await fs.promises.rm(live, { recursive: true, force: true });
	if (parked) {
		await fs.promises.rename(parked, live);
	}
	await syncDirectory(path.dirname(live));
}

/**
 * Delete a directory by first renaming it out of the way, so no reader ever
 * observes a half-deleted tree at the live path.
 */
export async function removeDirectory(live: string): Promise<boolean> {
	const doomed = `${live}.${crypto.randomBytes(4).toString("hex")}.deleted`;
	try {
		await fs.promises.rename(live, doomed);
	} catch (err) {
		if (errnoCode(err) === "ENOENT") return false;
		throw err;
	}
	await fs.promises.rm(doomed, { recursive: true, force: true });
	return true;
}
