/**
 * File-scoped exclusive lock.
 *
 * Two layers:
 * - in-process: one Mutex per lock path, shared by every FileLock instance, so
 *   waiters queue without polling;
 * - cross-process: an advisory lock file created with O_EXCL holding the
 *   owner's pid. Node has no blocking flock(), so a process that finds the
 *   file taken sleeps with backoff until the owner removes it, the owner is
 *   found dead, or the deadline passes. A live owner is never broken,
 *   however long it holds the lock; age only matters for a file whose owner
 *   cannot be read.
 *
 * Both waits share one deadline; past it the caller gets LockTimeout.
 */

import fs from "node:fs";
import path from "node:path";

import { StorageError } from "../errors.js";
import { Mutex } from "../infra/mutex.js";
import { TimeoutError } from "../infra/timeout.js";
import { getChildLogger } from "../logging.js";
import { ensureDir, errnoCode, sleep } from "../utils.js";

const logger = getChildLogger({ module: "file-lock" });

const processMutexes = new Map<string, Mutex>();

function mutexFor(lockPath: string): Mutex {
	let mutex = processMutexes.get(lockPath);
	if (!mutex) {
		mutex = new Mutex();
		processMutexes.set(lockPath, mutex);
	}
	return mutex;
}

export type FileLockOptions = {
	timeoutMs: number;
	staleMs: number;
	/** First sleep between cross-process attempts; doubles up to maxPollMs. */
	pollMs?: number;
	maxPollMs?: number;
};

type LockOwner = {
	pid: number;
	acquiredAt: string;
};

function isPidAlive(pid: number): boolean {
	try {
		process.kill(pid, 0);
		return true;
	} catch (err) {
		// EPERM: exists but owned by someone else
		return errnoCode(err) === "EPERM";
	}
}

function parseOwner(raw: string): LockOwner | null {
	try {
		const value: unknown = JSON.parse(raw);
		if (typeof value !== "object" || value === null) return null;
		const pid: unknown = Reflect.get(value, "pid");
		const acquiredAt: unknown = Reflect.get(value, "acquiredAt");
		if (typeof pid !== "number" || typeof acquiredAt !== "string") return null;
		return { pid, acquiredAt };
	} catch {
		return null;
	}
}

export class FileLock {
	private readonly pollMs: number;
	private readonly maxPollMs: number;

	constructor(
		readonly lockPath: string,
		private readonly options: FileLockOptions,
	) {
		this.pollMs = options.pollMs ?? 20;
		this.maxPollMs = options.maxPollMs ?? 250;
	}

	async withLock<T>(fn: () => Promise<T>): Promise<T> {
		const deadline = Date.now() + this.options.timeoutMs;
		const mutex = mutexFor(this.lockPath);

		try {
			await mutex.acquire(this.options.timeoutMs, `lock ${this.lockPath}`);
		} catch (err) {
			if (err instanceof TimeoutError) {
				throw this.timeoutError();
			}
			throw err;
		}

		try {
			const owner = await this.acquireFile(deadline);
			try {
				return await fn();
			} finally {
				await this.releaseFile(owner);
			}
		} finally {
			mutex.release();
		}
	}

	private timeoutError(): StorageError {
		return new StorageError(
			"LockTimeout",
			`Timed out after ${this.options.timeoutMs}ms waiting for ${this.lockPath}`,
		);
	}

	private async acquireFile(deadline: number): Promise<LockOwner> {
		await ensureDir(path.dirname(this.lockPath));
		let delay = this.pollMs;

		for (;;) {
			try {
				const handle = await fs.promises.open(this.lockPath, "wx", 0o600);
				const owner: LockOwner = { pid: process.pid, acquiredAt: new Date().toISOString() };
				try {
					await handle.writeFile(JSON.stringify(owner));
				} finally {
					await handle.close();
				}
				return owner;
			} catch (err) {
				if (errnoCode(err) !== "EEXIST") {
					throw new StorageError("IoFailure", `Cannot create lock file ${this.lockPath}`, {
						cause: err,
					});
				}
			}

			if (await this.breakIfStale()) {
				continue;
			}

			const remaining = deadline - Date.now();
			if (remaining <= 0) {
				throw this.timeoutError();
			}
			await sleep(Math.min(delay, remaining));
			delay = Math.min(delay * 2, this.maxPollMs);
		}
	}

	/**
	 * Remove the lock file if its owner is gone, or if it names no owner and
	 * is older than staleMs. Returns true when the caller should retry
	 * immediately.
	 */
	private async breakIfStale(): Promise<boolean> {
		let raw: string;
		let mtimeMs: number;
		try {
			raw = await fs.promises.readFile(this.lockPath, "utf8");
			mtimeMs = (await fs.promises.stat(this.lockPath)).mtimeMs;
		} catch (err) {
			if (errnoCode(err) === "ENOENT") return true;
			throw err;
		}

		const owner = parseOwner(raw);
		const age = Date.now() - mtimeMs;
		// An unparseable file is either mid-write or garbage; only age tells them apart.
		const stale = owner === null ? age > this.options.staleMs : !isPidAlive(owner.pid);
		if (!stale) {
			return false;
		}

		logger.warn(
			{ lockPath: this.lockPath, pid: owner?.pid ?? null, ageMs: Math.round(age) },
			"breaking stale lock",
		);
		await fs.promises.rm(this.lockPath, { force: true });
		return true;
	}

	/** Unlink the lock file only while it still names `owner`. */
	private async releaseFile(owner: LockOwner): Promise<void> {
		let raw: string;
		try {
			raw = await fs.promises.readFile(this.lockPath, "utf8");
		} catch (err) {
			if (errnoCode(err) !== "ENOENT") throw err;
			logger.warn({ lockPath: this.lockPath }, "lock file vanished while held");
			return;
		}

		const current = parseOwner(raw);
		if (current === null || current.pid !== owner.pid || current.acquiredAt !== owner.acquiredAt) {
			logger.warn(
				{ lockPath: this.lockPath, pid: current?.pid ?? null },
				"lock file taken over while held; leaving it",
			);
			return;
		}
		await fs.promises.rm(this.lockPath, { force: true });
	}
}
