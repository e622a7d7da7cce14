/**
 * Full-state snapshots as gzipped tar archives.
 *
 * A snapshot is two files in backups/: `<id>.tar.gz` holding the records,
 * generated configs, client configs and templates, and `<id>.json`, the
 * manifest with the archive's sha256. The manifest is written last, so an
 * archive without one is an interrupted snapshot and is never listed.
 *
 * Restore never writes into live directories. The archive is verified,
 * extracted into a staging directory beside them, checked, and each
 * directory is then swapped in by rename. If any step fails the swaps done
 * so far are undone and live state is as it was.
 */

import crypto from "node:crypto";
import fs from "node:fs";
import path from "node:path";

import * as tar from "tar";
import { z } from "zod";

import { BackupError, WardenError } from "../errors.js";
import { getChildLogger } from "../logging.js";
import { commitFile, restoreDirectory, swapDirectory, tempPathFor, writeFileAtomic } from "../storage/atomic-write.js";
import { SNAPSHOT_DIRS } from "../storage/layout.js";
import { parseRecordsDocument, type RecordStore } from "../storage/record-store.js";
import { describeZodError } from "../storage/schema.js";
import { compactTimestamp, ensureDir, errnoCode, pathExists } from "../utils.js";

const logger = getChildLogger({ module: "backup" });

export const BACKUP_REASONS = ["manual", "pre-mutation", "pre-restore"] as const;
export type BackupReason = (typeof BACKUP_REASONS)[number];

const BACKUP_ID_PATTERN = /^backup-\d{8}T\d{9}Z-\d{3}$/;

export const BackupRecordSchema = z.object({
	id: z.string().regex(BACKUP_ID_PATTERN),
	createdAt: z.string().datetime(),
	reason: z.enum(BACKUP_REASONS),
	archive: z.string().min(1),
	includedPaths: z.array(z.enum(SNAPSHOT_DIRS)),
	sha256: z.string().regex(/^[0-9a-f]{64}$/),
	size: z.number().int().nonnegative(),
});

export type BackupRecord = z.infer<typeof BackupRecordSchema>;

export type RestoreResult = {
	restored: BackupRecord;
	safety: BackupRecord;
};

export type BackupManagerOptions = {
	store: RecordStore;
	/** Archives to keep; the newest one survives even at 0. */
	retention?: number;
	now?: () => Date;
};

async function sha256File(file: string): Promise<string> {
	const hash = crypto.createHash("sha256");
	for await (const chunk of fs.createReadStream(file)) {
		hash.update(chunk);
	}
	return hash.digest("hex");
}

function isTempName(name: string): boolean {
	return name.endsWith(".tmp");
}

export class BackupManager {
	private readonly store: RecordStore;
	private readonly retention: number;
	private readonly now: () => Date;

	constructor(options: BackupManagerOptions) {
		this.store = options.store;
		this.retention = Math.max(0, options.retention ?? 20);
		this.now = options.now ?? (() => new Date());
	}

	private get backupsDir(): string {
		return this.store.layout.backupsDir;
	}

	private manifestPath(id: string): string {
		return path.join(this.backupsDir, `${id}.json`);
	}

	private archivePath(id: string): string {
		return path.join(this.backupsDir, `${id}.tar.gz`);
	}

	// ═══════════════════════════════════════════════════════════════════════════
	// Snapshot
	// ═══════════════════════════════════════════════════════════════════════════

	/**
	 * Archive the current state, then prune. Holds the store lock so the
	 * records document cannot change while it is being read.
	 */
	async snapshot(reason: BackupReason): Promise<BackupRecord> {
		const record = await this.store.withStoreLock(() => this.createArchive(reason));
		await this.prune();
		return record;
	}

	private async nextId(): Promise<string> {
		const stamp = compactTimestamp(this.now());
		for (let seq = 0; seq < 1000; seq++) {
			const id = `backup-${stamp}-${String(seq).padStart(3, "0")}`;
			if (!(await pathExists(this.manifestPath(id))) && !(await pathExists(this.archivePath(id)))) {
				return id;
			}
		}
		throw new BackupError("ArchiveFailed", `Too many backups created at ${stamp}`);
	}

	/** Callers must hold the store lock. */
	private async createArchive(reason: BackupReason): Promise<BackupRecord> {
		const { root } = this.store.layout;
		await ensureDir(this.backupsDir);

		const includedPaths: BackupRecord["includedPaths"] = [];
		for (const dir of SNAPSHOT_DIRS) {
			if (await pathExists(path.join(root, dir))) includedPaths.push(dir);
		}
		if (!includedPaths.includes("records")) {
			throw new BackupError("ArchiveFailed", `Nothing to back up: ${this.store.layout.recordsDir} is missing`);
		}

		const id = await this.nextId();
		const createdAt = this.now().toISOString();
		const archive = this.archivePath(id);
		const tempArchive = tempPathFor(archive);

		try {
			await tar.create(
				{
					gzip: true,
					file: tempArchive,
					cwd: root,
					portable: true,
					filter: (entryPath: string) => !isTempName(path.basename(entryPath)),
				},
				includedPaths,
			);
			const [sha256, stat] = await Promise.all([sha256File(tempArchive), fs.promises.stat(tempArchive)]);
			await commitFile(tempArchive, archive);

			const record: BackupRecord = {
				id,
				createdAt,
				reason,
				archive: path.basename(archive),
				includedPaths,
				sha256,
				size: stat.size,
			};
			await writeFileAtomic(this.manifestPath(id), `${JSON.stringify(record, null, 2)}\n`);
			logger.info({ id, reason, size: stat.size, includedPaths }, "backup created");
			return record;
		} catch (err) {
			await fs.promises.rm(tempArchive, { force: true });
			if (err instanceof WardenError) throw err;
			throw new BackupError("ArchiveFailed", `Could not create backup ${id}`, { cause: err });
		}
	}

	// ═══════════════════════════════════════════════════════════════════════════
	// Listing
	// ═══════════════════════════════════════════════════════════════════════════

	/** Backups newest first. Unreadable manifests are skipped with a warning. */
	async list(): Promise<BackupRecord[]> {
		let names: string[];
		try {
			names = await fs.promises.readdir(this.backupsDir);
		} catch (err) {
			if (errnoCode(err) === "ENOENT") return [];
			throw err;
		}

		const records: BackupRecord[] = [];
		for (const name of names) {
			if (!name.endsWith(".json") || !BACKUP_ID_PATTERN.test(name.slice(0, -5))) continue;
			const record = await this.readManifest(name.slice(0, -5));
			if (record) records.push(record);
		}
		return records.sort((a, b) => (a.id < b.id ? 1 : a.id > b.id ? -1 : 0));
	}

	async get(id: string): Promise<BackupRecord> {
		const record = BACKUP_ID_PATTERN.test(id) ? await this.readManifest(id) : null;
		if (!record) {
			throw new BackupError("BackupNotFound", `Backup "${id}" does not exist`);
		}
		return record;
	}

	private async readManifest(id: string): Promise<BackupRecord | null> {
		let raw: string;
		try {
			raw = await fs.promises.readFile(this.manifestPath(id), "utf8");
		} catch (err) {
			if (errnoCode(err) === "ENOENT") return null;
			throw err;
		}

		let value: unknown;
		try {
			value = JSON.parse(raw);
		} catch {
			logger.warn({ id }, "backup manifest is not valid JSON");
			return null;
		}
		const parsed = BackupRecordSchema.safeParse(value);
		if (!parsed.success || parsed.data.id !== id || parsed.data.archive !== `${id}.tar.gz`) {
			logger.warn(
				{ id, error: parsed.success ? "id or archive name mismatch" : describeZodError(parsed.error) },
				"backup manifest rejected",
			);
			return null;
		}
		return parsed.data;
	}

	/** Check the archive against its manifest checksum. */
	async verify(id: string): Promise<BackupRecord> {
		const record = await this.get(id);
		const archive = path.join(this.backupsDir, record.archive);
		let actual: string;
		try {
			actual = await sha256File(archive);
		} catch (err) {
			throw new BackupError("ChecksumMismatch", `Archive ${record.archive} cannot be read`, { cause: err });
		}
		if (actual !== record.sha256) {
			throw new BackupError(
				"ChecksumMismatch",
				`Archive ${record.archive} has sha256 ${actual}, manifest says ${record.sha256}`,
			);
		}
		return record;
	}

	// ═══════════════════════════════════════════════════════════════════════════
	// Restore
	// ═══════════════════════════════════════════════════════════════════════════

	async restore(id: string): Promise<RestoreResult> {
		const target = await this.get(id);

		const result = await this.store.withStoreLock(async () => {
			try {
				await this.verify(id);
			} catch (err) {
				throw new BackupError("RestoreFailed", `Backup ${id} failed verification`, { cause: err });
			}

			const safety = await this.createArchive("pre-restore");
			await this.swapIn(target);
			return { restored: target, safety };
		});

		logger.info({ id, safety: result.safety.id }, "backup restored");
		await this.prune();
		return result;
	}

	private async swapIn(record: BackupRecord): Promise<void> {
		const { root } = this.store.layout;
		const staging = path.join(root, `.restore-${record.id}-${crypto.randomBytes(4).toString("hex")}`);
		const swapped: Array<{ live: string; parked: string | null }> = [];

		try {
			await ensureDir(staging);
			await tar.extract({ file: path.join(this.backupsDir, record.archive), cwd: staging, strict: true });
			await this.checkStaged(staging, record);

			for (const dir of record.includedPaths) {
				const live = path.join(root, dir);
				const parked = await swapDirectory(path.join(staging, dir), live);
				swapped.push({ live, parked });
			}
		} catch (err) {
			for (const { live, parked } of swapped.reverse()) {
				await restoreDirectory(live, parked);
			}
			await fs.promises.rm(staging, { recursive: true, force: true });
			throw new BackupError("RestoreFailed", `Restoring ${record.id} failed; live state unchanged`, {
				cause: err,
			});
		}

		for (const { parked } of swapped) {
			if (parked) await fs.promises.rm(parked, { recursive: true, force: true });
		}
		await fs.promises.rm(staging, { recursive: true, force: true });
	}

	private async checkStaged(staging: string, record: BackupRecord): Promise<void> {
		for (const dir of record.includedPaths) {
			const stat = await fs.promises.stat(path.join(staging, dir)).catch(() => null);
			if (!stat?.isDirectory()) {
				throw new Error(`Archive is missing ${dir}/`);
			}
		}
		const raw = await fs.promises.readFile(path.join(staging, "records", "users.json"), "utf8");
		const parsed = parseRecordsDocument(raw);
		if (!parsed.ok) {
			throw new Error(`Archived records document is invalid: ${parsed.error}`);
		}
	}

	// ═══════════════════════════════════════════════════════════════════════════
	// Retention
	// ═══════════════════════════════════════════════════════════════════════════

	/** Delete the oldest backups beyond the retention cap. Returns the removed ids. */
	async prune(): Promise<string[]> {
		const records = await this.list();
		const keep = Math.max(1, this.retention);
		const removed: string[] = [];
		for (const record of records.slice(keep)) {
			await this.removeFiles(record);
			removed.push(record.id);
		}
		if (removed.length > 0) {
			logger.info({ removed, kept: keep }, "old backups pruned");
		}
		return removed;
	}

	async remove(id: string): Promise<BackupRecord> {
		const record = await this.get(id);
		await this.removeFiles(record);
		logger.info({ id }, "backup deleted");
		return record;
	}

	private async removeFiles(record: BackupRecord): Promise<void> {
		// manifest first: a leftover archive is invisible, a leftover manifest is not
		await fs.promises.rm(this.manifestPath(record.id), { force: true });
		await fs.promises.rm(path.join(this.backupsDir, record.archive), { force: true });
	}
}
