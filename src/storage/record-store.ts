/**
 * Durable storage for user records and server settings.
 *
 * One JSON document (records/users.json) holds the settings singleton and
 * every user record. The file is the source of truth: each mutation re-reads
 * it under the store lock, copies the previous version into records/history,
 * and replaces it with write-temp/fsync/rename. Nothing is cached between
 * calls.
 *
 * Recovery: when the live document does not parse, reads fall back to the
 * newest history copy that does and report it via `recoveredFrom`. The next
 * mutation quarantines the corrupt file and writes a good one over it. With
 * no parseable history the store refuses to operate (StoreCorrupt) rather
 * than start empty.
 */

import fs from "node:fs";
import path from "node:path";

import { StorageError, ValidationError } from "../errors.js";
import { getChildLogger } from "../logging.js";
import { compactTimestamp, errnoCode } from "../utils.js";
import { removeDirectory, removeStaleTempFiles, writeFileAtomic } from "./atomic-write.js";
import { FileLock } from "./file-lock.js";
import { type DataLayout, lockPathFor } from "./layout.js";
import {
	type Credentials,
	CredentialsSchema,
	describeZodError,
	type RecordsDocument,
	RecordsDocumentSchema,
	SCHEMA_VERSION,
	type ServerSettings,
	type SettingsPatch,
	USERNAME_PATTERN,
	type UserRecord,
} from "./schema.js";
import { applySettingsPatch, parseSettings } from "./settings.js";

const logger = getChildLogger({ module: "record-store" });

const HISTORY_PREFIX = "users-";
const HISTORY_SUFFIX = ".json";

export type RecordStoreOptions = {
	layout: DataLayout;
	lockTimeoutMs?: number;
	staleLockMs?: number;
	historyLimit?: number;
	now?: () => Date;
};

export type LoadResult = {
	document: RecordsDocument;
	/** History file the document was recovered from, or null when the live file parsed. */
	recoveredFrom: string | null;
};

type ReadResult = LoadResult & { raw: string };

export type AdmitOptions = {
	/** Last check on the record about to be written, run under the store lock; throw to refuse it. */
	admit?: (record: UserRecord, settings: ServerSettings) => void;
};

export type ParseResult = { ok: true; document: RecordsDocument } | { ok: false; error: string };

export function parseRecordsDocument(raw: string): ParseResult {
	let value: unknown;
	try {
		value = JSON.parse(raw);
	} catch (err) {
		return { ok: false, error: `not valid JSON (${err instanceof Error ? err.message : String(err)})` };
	}
	const result = RecordsDocumentSchema.safeParse(value);
	if (!result.success) {
		return { ok: false, error: describeZodError(result.error) };
	}
	return { ok: true, document: result.data };
}

/**
 * Stable serialization: users ordered by username, two-space indent,
 * trailing newline.
 */
export function serializeRecordsDocument(doc: RecordsDocument): string {
	const users: Record<string, UserRecord> = {};
	for (const username of Object.keys(doc.users).sort()) {
		users[username] = doc.users[username];
	}
	return `${JSON.stringify({ ...doc, users }, null, 2)}\n`;
}

export function assertUsername(username: string): void {
	if (!USERNAME_PATTERN.test(username) || username === "__proto__") {
		throw new ValidationError(
			"InvalidUsername",
			`Invalid username "${username}": use 3-32 characters from A-Z, a-z, 0-9, "_" and "-"`,
		);
	}
}

/** Lowest slot no user holds. */
export function nextFreeSlot(doc: RecordsDocument): number {
	const used = new Set(Object.values(doc.users).map((user) => user.slot));
	let slot = 1;
	while (used.has(slot)) slot++;
	return slot;
}

function parseCredentials(credentials: Credentials): Credentials {
	const result = CredentialsSchema.safeParse(credentials);
	if (!result.success) {
		throw new ValidationError(
			"InvalidCredentials",
			`Invalid credentials: ${describeZodError(result.error)}`,
		);
	}
	return result.data;
}

export class RecordStore {
	readonly layout: DataLayout;
	private readonly lock: FileLock;
	private readonly historyLimit: number;
	private readonly lockTimeoutMs: number;
	private readonly staleLockMs: number;
	private readonly now: () => Date;

	constructor(options: RecordStoreOptions) {
		this.layout = options.layout;
		this.lockTimeoutMs = options.lockTimeoutMs ?? 10_000;
		this.staleLockMs = options.staleLockMs ?? 60_000;
		this.historyLimit = Math.max(1, options.historyLimit ?? 10);
		this.now = options.now ?? (() => new Date());
		this.lock = this.lockFor(this.layout.recordsFile);
	}

	// ═══════════════════════════════════════════════════════════════════════════
	// Reads
	// ═══════════════════════════════════════════════════════════════════════════

	async load(): Promise<LoadResult> {
		const { document, recoveredFrom } = await this.readDocument();
		return { document, recoveredFrom };
	}

	async isInitialized(): Promise<boolean> {
		try {
			await fs.promises.access(this.layout.recordsFile);
			return true;
		} catch (err) {
			if (errnoCode(err) === "ENOENT") return false;
			throw err;
		}
	}

	async get(username: string): Promise<UserRecord | null> {
		const { document } = await this.readDocument();
		return Object.hasOwn(document.users, username) ? document.users[username] : null;
	}

	/** All records, ordered by username. */
	async list(): Promise<UserRecord[]> {
		const { document } = await this.readDocument();
		return Object.keys(document.users)
			.sort()
			.map((username) => document.users[username]);
	}

	async readSettings(): Promise<ServerSettings> {
		const { document } = await this.readDocument();
		return document.settings;
	}

	// ═══════════════════════════════════════════════════════════════════════════
	// Mutations
	// ═══════════════════════════════════════════════════════════════════════════

	/**
	 * Create the records document. Refuses to overwrite an existing one, even a
	 * corrupt one: that is what restore is for.
	 */
	async initialize(settings: ServerSettings): Promise<RecordsDocument> {
		const validated = parseSettings(settings);
		return this.lock.withLock(async () => {
			if (await this.isInitialized()) {
				throw new ValidationError(
					"AlreadyInitialized",
					`Records document already exists at ${this.layout.recordsFile}`,
				);
			}
			const doc: RecordsDocument = {
				schemaVersion: SCHEMA_VERSION,
				updatedAt: this.now().toISOString(),
				settings: validated,
				users: {},
			};
			await writeFileAtomic(this.layout.recordsFile, serializeRecordsDocument(doc));
			logger.info({ file: this.layout.recordsFile, domain: validated.domain }, "records initialized");
			return doc;
		});
	}

	/**
	 * Read-modify-write under the store lock. `fn` edits a private copy of the
	 * document; the copy is validated and persisted only if `fn` returns
	 * normally.
	 */
	async mutate<T>(fn: (doc: RecordsDocument) => T | Promise<T>): Promise<T> {
		return this.lock.withLock(async () => {
			await removeStaleTempFiles(this.layout.recordsFile);
			const current = await this.readDocument();
			const draft = structuredClone(current.document);

			const result = await fn(draft);

			draft.updatedAt = this.now().toISOString();
			const checked = RecordsDocumentSchema.safeParse(draft);
			if (!checked.success) {
				throw new StorageError(
					"InvalidDocument",
					`Refusing to write invalid records document: ${describeZodError(checked.error)}`,
				);
			}

			if (current.recoveredFrom === null) {
				await this.appendHistory(current.raw);
			} else {
				await this.quarantine(current.raw);
			}
			await writeFileAtomic(this.layout.recordsFile, serializeRecordsDocument(checked.data));
			return result;
		});
	}

	async create(username: string, credentials: Credentials, options: AdmitOptions = {}): Promise<UserRecord> {
		assertUsername(username);
		const bundles = parseCredentials(credentials);

		const record = await this.mutate((doc) => {
			if (Object.hasOwn(doc.users, username)) {
				throw new ValidationError("DuplicateUser", `User "${username}" already exists`);
			}
			const created: UserRecord = {
				username,
				createdAt: this.now().toISOString(),
				lastSeenAt: null,
				enabled: true,
				slot: nextFreeSlot(doc),
				credentials: bundles,
			};
			options.admit?.(created, doc.settings);
			doc.users[username] = created;
			return created;
		});

		logger.info(
			{ username, slot: record.slot, protocols: Object.keys(bundles) },
			"user created",
		);
		return record;
	}

	async delete(username: string): Promise<UserRecord> {
		const removed = await this.mutate((doc) => {
			const existing = this.requireUser(doc, username);
			delete doc.users[username];
			return existing;
		});
		logger.info({ username }, "user deleted");
		return removed;
	}

	async setEnabled(username: string, enabled: boolean): Promise<UserRecord> {
		return this.mutate((doc) => {
			const record = this.requireUser(doc, username);
			record.enabled = enabled;
			return record;
		});
	}

	/** Record client activity. */
	async touch(username: string, at: Date = this.now()): Promise<UserRecord> {
		return this.mutate((doc) => {
			const record = this.requireUser(doc, username);
			record.lastSeenAt = at.toISOString();
			return record;
		});
	}

	/**
	 * Attach bundles for protocols the user has none for yet. Existing bundles
	 * are kept as they are; returns the protocols that were added.
	 */
	async addCredentials(username: string, credentials: Credentials): Promise<string[]> {
		const bundles = parseCredentials(credentials);
		return this.mutate((doc) => {
			const record = this.requireUser(doc, username);
			const missing: Credentials = {
				...(bundles.xray && !record.credentials.xray ? { xray: bundles.xray } : {}),
				...(bundles.trojan && !record.credentials.trojan ? { trojan: bundles.trojan } : {}),
				...(bundles.singbox && !record.credentials.singbox ? { singbox: bundles.singbox } : {}),
				...(bundles.wireguard && !record.credentials.wireguard
					? { wireguard: bundles.wireguard }
					: {}),
			};
			record.credentials = { ...record.credentials, ...missing };
			return Object.keys(missing);
		});
	}

	/**
	 * Replace bundles explicitly. Client configs issued with the old material
	 * stop working once engines reload.
	 */
	async regenerateCredentials(
		username: string,
		credentials: Credentials,
		options: AdmitOptions = {},
	): Promise<UserRecord> {
		const bundles = parseCredentials(credentials);
		const record = await this.mutate((doc) => {
			const existing = this.requireUser(doc, username);
			existing.credentials = { ...existing.credentials, ...bundles };
			options.admit?.(existing, doc.settings);
			return existing;
		});
		logger.info({ username, protocols: Object.keys(bundles) }, "credentials regenerated");
		return record;
	}

	async updateSettings(patch: SettingsPatch): Promise<ServerSettings> {
		const settings = await this.mutate((doc) => {
			doc.settings = applySettingsPatch(doc.settings, patch);
			return doc.settings;
		});
		logger.info({ domain: settings.domain }, "settings updated");
		return settings;
	}

	// ═══════════════════════════════════════════════════════════════════════════
	// Shared write primitives
	// ═══════════════════════════════════════════════════════════════════════════

	/**
	 * Atomically replace a generated file (engine config, client config) under
	 * a lock scoped to that file.
	 */
	async writeArtifact(target: string, content: string): Promise<void> {
		await this.lockFor(target).withLock(async () => {
			await removeStaleTempFiles(target);
			await writeFileAtomic(target, content, { mode: 0o600 });
		});
	}

	async removeArtifact(target: string): Promise<boolean> {
		return this.lockFor(target).withLock(async () => {
			try {
				await fs.promises.unlink(target);
				return true;
			} catch (err) {
				if (errnoCode(err) === "ENOENT") return false;
				throw err;
			}
		});
	}

	async removeArtifactDir(target: string): Promise<boolean> {
		return this.lockFor(target).withLock(() => removeDirectory(target));
	}

	/**
	 * Run `fn` while holding the store lock, without reading or writing the
	 * document. Used by restore to swap the records directory.
	 */
	async withStoreLock<T>(fn: () => Promise<T>): Promise<T> {
		return this.lock.withLock(fn);
	}

	lockFor(target: string): FileLock {
		return new FileLock(lockPathFor(this.layout, target), {
			timeoutMs: this.lockTimeoutMs,
			staleMs: this.staleLockMs,
		});
	}

	// ═══════════════════════════════════════════════════════════════════════════
	// File I/O
	// ═══════════════════════════════════════════════════════════════════════════

	private requireUser(doc: RecordsDocument, username: string): UserRecord {
		if (!Object.hasOwn(doc.users, username)) {
			throw new ValidationError("NotFound", `User "${username}" does not exist`);
		}
		return doc.users[username];
	}

	private async readDocument(): Promise<ReadResult> {
		const file = this.layout.recordsFile;
		let raw: string;
		try {
			raw = await fs.promises.readFile(file, "utf8");
		} catch (err) {
			if (errnoCode(err) === "ENOENT") {
				throw new StorageError(
					"StoreNotInitialized",
					`No records document at ${file}; run "proxy-warden init" first`,
				);
			}
			throw new StorageError("IoFailure", `Cannot read ${file}`, { cause: err });
		}

		const parsed = parseRecordsDocument(raw);
		if (parsed.ok) {
			return { document: parsed.document, recoveredFrom: null, raw };
		}

		logger.error({ file, error: parsed.error }, "records document unreadable, trying history");
		for (const candidate of await this.listHistory()) {
			const historyRaw = await fs.promises.readFile(candidate, "utf8");
			const recovered = parseRecordsDocument(historyRaw);
			if (recovered.ok) {
				logger.warn({ file, recoveredFrom: candidate }, "records recovered from history copy");
				return { document: recovered.document, recoveredFrom: candidate, raw };
			}
			logger.warn({ candidate, error: recovered.error }, "history copy unreadable");
		}

		throw new StorageError(
			"StoreCorrupt",
			`Records document ${file} is corrupt (${parsed.error}) and no history copy is readable`,
		);
	}

	/** History files, newest first. */
	private async listHistory(): Promise<string[]> {
		let names: string[];
		try {
			names = await fs.promises.readdir(this.layout.historyDir);
		} catch (err) {
			if (errnoCode(err) === "ENOENT") return [];
			throw err;
		}
		return names
			.filter((name) => name.startsWith(HISTORY_PREFIX) && name.endsWith(HISTORY_SUFFIX))
			.sort()
			.reverse()
			.map((name) => path.join(this.layout.historyDir, name));
	}

	private async appendHistory(raw: string): Promise<void> {
		const stamp = compactTimestamp(this.now());
		const existing = new Set(await this.listHistory());
		let seq = 0;
		let target: string;
		do {
			target = path.join(
				this.layout.historyDir,
				`${HISTORY_PREFIX}${stamp}-${String(seq).padStart(3, "0")}${HISTORY_SUFFIX}`,
			);
			seq++;
		} while (existing.has(target));

		await writeFileAtomic(target, raw);

		const history = await this.listHistory();
		for (const stale of history.slice(this.historyLimit)) {
			await fs.promises.rm(stale, { force: true });
		}
	}

	private async quarantine(raw: string): Promise<void> {
		const target = `${this.layout.recordsFile}.corrupted.${compactTimestamp(this.now())}`;
		await writeFileAtomic(target, raw);
		logger.warn({ quarantined: target }, "corrupt records document preserved");
	}
}
