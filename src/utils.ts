import fs from "node:fs";
import os from "node:os";
import path from "node:path";

export async function ensureDir(dir: string, mode = 0o700) {
	await fs.promises.mkdir(dir, { recursive: true, mode });
}

export function sleep(ms: number) {
	return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Filesystem-safe UTC timestamp, e.g. `20261019T081502123Z`.
 * Lexicographic order matches chronological order.
 */
export function compactTimestamp(date: Date): string {
	return date.toISOString().replace(/[-:.]/g, "");
}

export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
	return err instanceof Error && "code" in err;
}

export function errnoCode(err: unknown): string | undefined {
	return isErrnoException(err) ? err.code : undefined;
}

export async function pathExists(target: string): Promise<boolean> {
	try {
		await fs.promises.access(target);
		return true;
	} catch (err) {
		if (errnoCode(err) === "ENOENT") return false;
		throw err;
	}
}

export const DEFAULT_DATA_DIR = path.join(os.homedir(), ".proxy-warden");
