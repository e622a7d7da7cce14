/**
 * Operator-facing facade.
 *
 * Every operation returns `{ ok: true, value }` or `{ ok: false, error }` with
 * the error flattened to `{ kind, code, message }`; nothing here throws to the
 * caller. Mutations follow one path: snapshot (when enabled), record store,
 * render, client files, engine reload.
 */

import { type BackupRecord, BackupManager, type RestoreResult } from "../backup/backup-manager.js";
import { buildClientLinks, ClientConfigWriter, type ClientSyncFailure } from "../clients/client-configs.js";
import {
	PROTOCOL_NAMES,
	type ProtocolName,
	ProtocolNameSchema,
	resolveBackupConfig,
	resolveReloadConfig,
	resolveServices,
	resolveStoreConfig,
	type WardenConfig,
} from "../config/config.js";
import { CredentialGenerator } from "../credentials/generator.js";
import { type ErrorSummary, RenderError, summarizeError, ValidationError } from "../errors.js";
import { formatErrorSafe } from "../infra/error-format.js";
import { getChildLogger } from "../logging.js";
import { ConfigRenderer, type RenderOutcome } from "../render/config-renderer.js";
import { installDefaultTemplates } from "../render/default-templates.js";
import { wireguardPeerAddress } from "../render/wireguard.js";
import { type ProtocolStatus, ReloadCoordinator } from "../reload/coordinator.js";
import {
	DockerServiceManager,
	dockerCallBudgetMs,
	type HealthStatus,
	type ServiceManager,
} from "../reload/service-manager.js";
import { resolveLayout } from "../storage/layout.js";
import { assertUsername, nextFreeSlot, RecordStore } from "../storage/record-store.js";
import type { ServerSettings, SettingsPatch, UserRecord } from "../storage/schema.js";
import { applySettingsPatch, createDefaultSettings } from "../storage/settings.js";

const logger = getChildLogger({ module: "control-plane" });

export type OperationResult<T> = { ok: true; value: T } | { ok: false; error: ErrorSummary };

/** A render outcome without the config body. */
export type ConfigReport = {
	protocol: ProtocolName;
	status: RenderOutcome["status"];
	path?: string;
	changed?: boolean;
	error?: ErrorSummary;
};

/** Client files that could not be written; `username` is null for the clients directory itself. */
export type ClientReport = {
	username: string | null;
	error: ErrorSummary;
};

export type ApplyReport = {
	configs: ConfigReport[];
	clients: ClientReport[];
	reloads: ProtocolStatus[];
};

/** User record without credential material. */
export type UserSummary = {
	username: string;
	enabled: boolean;
	slot: number;
	protocols: ProtocolName[];
	createdAt: string;
	lastSeenAt: string | null;
};

export type UserDetails = UserSummary & { links: string[]; clientDir: string };

export type UserChange = ApplyReport & { user: UserSummary };

export type InitializeReport = ApplyReport & { domain: string; templatesInstalled: string[] };

export type ProtocolOverview = {
	protocol: ProtocolName;
	enabled: boolean;
	reload: ProtocolStatus;
	health: HealthStatus;
};

export type StatusReport = {
	dataDir: string;
	initialized: boolean;
	domain: string | null;
	users: { total: number; enabled: number };
	protocols: ProtocolOverview[];
	backups: { count: number; latest: BackupRecord | null };
};

export type ControlPlaneDeps = {
	store: RecordStore;
	renderer: ConfigRenderer;
	clients: ClientConfigWriter;
	backups: BackupManager;
	coordinator: ReloadCoordinator;
	services: ServiceManager;
	generator: CredentialGenerator;
	/** Take a pre-mutation snapshot before every change to the records. */
	autoSnapshot: boolean;
	/** Domain used by `initialize` when none is passed. */
	defaultDomain?: string;
};

export function toConfigReport(outcome: RenderOutcome): ConfigReport {
	switch (outcome.status) {
		case "rendered":
			return {
				protocol: outcome.protocol,
				status: outcome.status,
				path: outcome.config.path,
				changed: outcome.changed,
			};
		case "failed":
			return { protocol: outcome.protocol, status: outcome.status, error: summarizeError(outcome.error) };
		case "skipped":
			return { protocol: outcome.protocol, status: outcome.status };
	}
}

function toClientReport(failure: ClientSyncFailure): ClientReport {
	return { username: failure.username, error: summarizeError(failure.error) };
}

function assertSlotAddress(settings: ServerSettings, slot: number): void {
	try {
		wireguardPeerAddress(settings, slot);
	} catch (err) {
		if (err instanceof RenderError) {
			throw new ValidationError("AddressPoolExhausted", err.message, { cause: err });
		}
		throw err;
	}
}

/** Refuse a WireGuard bundle for a slot that has no address in the pool. */
function admitPeer(user: UserRecord, settings: ServerSettings): void {
	if (user.credentials.wireguard) assertSlotAddress(settings, user.slot);
}

export function summarizeUser(user: UserRecord): UserSummary {
	return {
		username: user.username,
		enabled: user.enabled,
		slot: user.slot,
		protocols: PROTOCOL_NAMES.filter((protocol) => user.credentials[protocol] !== undefined),
		createdAt: user.createdAt,
		lastSeenAt: user.lastSeenAt,
	};
}

export function parseProtocol(value: string): ProtocolName {
	const parsed = ProtocolNameSchema.safeParse(value);
	if (!parsed.success) {
		throw new ValidationError(
			"UnknownProtocol",
			`Unknown protocol "${value}" (expected one of ${PROTOCOL_NAMES.join(", ")})`,
		);
	}
	return parsed.data;
}

function parseProtocols(values: readonly string[] | undefined): ProtocolName[] | undefined {
	if (values === undefined) return undefined;
	if (values.length === 0) {
		throw new ValidationError("InvalidCredentials", "At least one protocol is required");
	}
	return [...new Set(values.map(parseProtocol))];
}

export class ControlPlane {
	constructor(private readonly deps: ControlPlaneDeps) {}

	get dataDir(): string {
		return this.deps.store.layout.root;
	}

	// ═══════════════════════════════════════════════════════════════════════════
	// Setup
	// ═══════════════════════════════════════════════════════════════════════════

	async initialize(domain?: string): Promise<OperationResult<InitializeReport>> {
		return this.run("initialize", async () => {
			const chosen = domain ?? this.deps.defaultDomain;
			if (!chosen) {
				throw new ValidationError("InvalidSettings", "A domain is required (pass one or set PROXY_WARDEN_DOMAIN)");
			}
			const settings = createDefaultSettings(chosen, this.deps.generator);
			await this.deps.store.initialize(settings);
			const templatesInstalled = await installDefaultTemplates(this.deps.store);

			// Engines are usually not running yet; render only.
			const { document } = await this.deps.store.load();
			const outcomes = await this.deps.renderer.renderAll({ document });
			const clientFailures = await this.deps.clients.syncAll(document);
			return {
				domain: settings.domain,
				templatesInstalled,
				configs: outcomes.map(toConfigReport),
				clients: clientFailures.map(toClientReport),
				reloads: [],
			};
		});
	}

	// ═══════════════════════════════════════════════════════════════════════════
	// Users
	// ═══════════════════════════════════════════════════════════════════════════

	/** Create a user with credentials for `protocols` (all protocols by default). */
	async createUser(username: string, protocols?: readonly string[]): Promise<OperationResult<UserChange>> {
		return this.run("createUser", async () => {
			assertUsername(username);
			const wanted = parseProtocols(protocols) ?? PROTOCOL_NAMES;
			const { document } = await this.deps.store.load();
			if (Object.hasOwn(document.users, username)) {
				throw new ValidationError("DuplicateUser", `User "${username}" already exists`);
			}
			if (wanted.includes("wireguard")) {
				assertSlotAddress(document.settings, nextFreeSlot(document));
			}
			await this.snapshotBeforeMutation();

			const user = await this.deps.store.create(username, this.deps.generator.generateAll(wanted), {
				admit: admitPeer,
			});
			return { user: summarizeUser(user), ...(await this.propagate()) };
		});
	}

	async deleteUser(username: string): Promise<OperationResult<UserChange>> {
		return this.run("deleteUser", async () => {
			await this.requireUser(username);
			await this.snapshotBeforeMutation();

			const user = await this.deps.store.delete(username);
			return { user: summarizeUser(user), ...(await this.propagate()) };
		});
	}

	async listUsers(): Promise<OperationResult<UserSummary[]>> {
		return this.run("listUsers", async () => (await this.deps.store.list()).map(summarizeUser));
	}

	/** One user plus the connection links handed to their clients. */
	async getUser(username: string): Promise<OperationResult<UserDetails>> {
		return this.run("getUser", async () => {
			const user = await this.requireUser(username);
			const settings = await this.deps.store.readSettings();
			return {
				...summarizeUser(user),
				links: user.enabled ? buildClientLinks(user, settings) : [],
				clientDir: this.deps.clients.userDir(username),
			};
		});
	}

	async setUserEnabled(username: string, enabled: boolean): Promise<OperationResult<UserChange>> {
		return this.run("setUserEnabled", async () => {
			const existing = await this.requireUser(username);
			if (existing.enabled === enabled) {
				return { user: summarizeUser(existing), configs: [], clients: [], reloads: [] };
			}
			await this.snapshotBeforeMutation();

			const user = await this.deps.store.setEnabled(username, enabled);
			return { user: summarizeUser(user), ...(await this.propagate()) };
		});
	}

	/**
	 * Replace credentials for `protocols`, by default every protocol the user
	 * already has. Protocols the user lacks are added.
	 */
	async regenerateUserCredentials(
		username: string,
		protocols?: readonly string[],
	): Promise<OperationResult<UserChange>> {
		return this.run("regenerateUserCredentials", async () => {
			const existing = await this.requireUser(username);
			const wanted = parseProtocols(protocols) ?? summarizeUser(existing).protocols;
			if (wanted.length === 0) {
				throw new ValidationError("InvalidCredentials", `User "${username}" has no credentials to rotate`);
			}
			const rotatesWireguard = wanted.includes("wireguard");
			if (rotatesWireguard) {
				assertSlotAddress(await this.deps.store.readSettings(), existing.slot);
			}
			await this.snapshotBeforeMutation();

			const user = await this.deps.store.regenerateCredentials(
				username,
				this.deps.generator.generateAll(wanted),
				rotatesWireguard ? { admit: admitPeer } : {},
			);
			return { user: summarizeUser(user), ...(await this.propagate()) };
		});
	}

	// ═══════════════════════════════════════════════════════════════════════════
	// Settings and configs
	// ═══════════════════════════════════════════════════════════════════════════

	async getSettings(): Promise<OperationResult<ServerSettings>> {
		return this.run("getSettings", () => this.deps.store.readSettings());
	}

	async updateSettings(patch: SettingsPatch): Promise<OperationResult<ApplyReport & { settings: ServerSettings }>> {
		return this.run("updateSettings", async () => {
			applySettingsPatch(await this.deps.store.readSettings(), patch);
			await this.snapshotBeforeMutation();
			const settings = await this.deps.store.updateSettings(patch);
			return { settings, ...(await this.propagate()) };
		});
	}

	/**
	 * Re-render every config from the records and reload the engines whose
	 * config changed, or all of them with `force`.
	 */
	async regenerateAllConfigs(options: { force?: boolean } = {}): Promise<OperationResult<ApplyReport>> {
		return this.run("regenerateAllConfigs", () => this.propagate(options));
	}

	// ═══════════════════════════════════════════════════════════════════════════
	// Backups
	// ═══════════════════════════════════════════════════════════════════════════

	async createBackup(): Promise<OperationResult<BackupRecord>> {
		return this.run("createBackup", () => this.deps.backups.snapshot("manual"));
	}

	async listBackups(): Promise<OperationResult<BackupRecord[]>> {
		return this.run("listBackups", () => this.deps.backups.list());
	}

	/**
	 * Restore a snapshot, then re-render and reload everything from the
	 * restored records. This is also how a bad change is rolled back.
	 */
	async restoreBackup(id: string): Promise<OperationResult<RestoreResult & ApplyReport>> {
		return this.run("restoreBackup", async () => {
			const result = await this.deps.backups.restore(id);
			return { ...result, ...(await this.propagate({ force: true })) };
		});
	}

	async pruneBackups(): Promise<OperationResult<string[]>> {
		return this.run("pruneBackups", () => this.deps.backups.prune());
	}

	async deleteBackup(id: string): Promise<OperationResult<BackupRecord>> {
		return this.run("deleteBackup", () => this.deps.backups.remove(id));
	}

	// ═══════════════════════════════════════════════════════════════════════════
	// Engines
	// ═══════════════════════════════════════════════════════════════════════════

	async reloadService(protocol: string): Promise<OperationResult<ProtocolStatus>> {
		return this.run("reloadService", () => this.deps.coordinator.reload(parseProtocol(protocol)));
	}

	async readServiceLogs(protocol: string, lines = 100): Promise<OperationResult<string>> {
		return this.run("readServiceLogs", () => this.deps.services.readLogs(parseProtocol(protocol), lines));
	}

	async getStatus(): Promise<OperationResult<StatusReport>> {
		return this.run("getStatus", async () => {
			const { store, coordinator, backups } = this.deps;
			const initialized = await store.isInitialized();
			const document = initialized ? (await store.load()).document : null;
			const users = document ? Object.values(document.users) : [];

			const protocols = await Promise.all(
				PROTOCOL_NAMES.map(async (protocol): Promise<ProtocolOverview> => {
					const enabled = document?.settings.protocols[protocol].enabled ?? false;
					return {
						protocol,
						enabled,
						reload: coordinator.getState(protocol),
						health: enabled ? await this.probeHealth(protocol) : "unknown",
					};
				}),
			);

			const all = await backups.list();
			return {
				dataDir: store.layout.root,
				initialized,
				domain: document?.settings.domain ?? null,
				users: { total: users.length, enabled: users.filter((user) => user.enabled).length },
				protocols,
				backups: { count: all.length, latest: all[0] ?? null },
			};
		});
	}

	// ═══════════════════════════════════════════════════════════════════════════
	// Internals
	// ═══════════════════════════════════════════════════════════════════════════

	private async run<T>(operation: string, fn: () => Promise<T>): Promise<OperationResult<T>> {
		try {
			return { ok: true, value: await fn() };
		} catch (err) {
			const error = summarizeError(err);
			if (error.kind === "internal" || error.kind === "fatal") {
				logger.error({ operation, error: formatErrorSafe(err) }, "operation failed");
			} else {
				logger.warn({ operation, kind: error.kind, code: error.code }, error.message);
			}
			return { ok: false, error };
		}
	}

	private async requireUser(username: string): Promise<UserRecord> {
		const user = await this.deps.store.get(username);
		if (!user) {
			throw new ValidationError("NotFound", `User "${username}" not found`);
		}
		return user;
	}

	private async snapshotBeforeMutation(): Promise<void> {
		if (!this.deps.autoSnapshot) return;
		const record = await this.deps.backups.snapshot("pre-mutation");
		logger.debug({ id: record.id }, "pre-mutation snapshot taken");
	}

	/** Render, sync client files and reload, all from one read of the records. */
	private async propagate(options: { force?: boolean } = {}): Promise<ApplyReport> {
		const { document } = await this.deps.store.load();
		const outcomes = await this.deps.renderer.renderAll({ document });
		const clientFailures = await this.deps.clients.syncAll(document);
		const reloads = await this.deps.coordinator.apply(outcomes, options);
		return { configs: outcomes.map(toConfigReport), clients: clientFailures.map(toClientReport), reloads };
	}

	private async probeHealth(protocol: ProtocolName): Promise<HealthStatus> {
		try {
			return await this.deps.services.healthStatus(protocol);
		} catch (err) {
			logger.debug({ protocol, error: formatErrorSafe(err) }, "health probe failed");
			return "unknown";
		}
	}
}

export type CreateControlPlaneOptions = {
	dataDir: string;
	config?: WardenConfig;
	domain?: string;
	services?: ServiceManager;
	generator?: CredentialGenerator;
	now?: () => Date;
};

/** Wire the components for a data directory from configuration. */
export function createControlPlane(options: CreateControlPlaneOptions): ControlPlane {
	const storeConfig = resolveStoreConfig(options.config);
	const backupConfig = resolveBackupConfig(options.config);
	const reloadConfig = resolveReloadConfig(options.config);

	const store = new RecordStore({
		layout: resolveLayout(options.dataDir),
		lockTimeoutMs: storeConfig.lockTimeoutMs,
		staleLockMs: storeConfig.staleLockMs,
		historyLimit: storeConfig.historyLimit,
		now: options.now,
	});
	const services =
		options.services ??
		new DockerServiceManager({
			services: resolveServices(options.config),
			commandTimeoutMs: reloadConfig.commandTimeoutMs,
			maxAttempts: reloadConfig.maxAttempts,
		});

	return new ControlPlane({
		store,
		renderer: new ConfigRenderer(store),
		clients: new ClientConfigWriter(store),
		backups: new BackupManager({ store, retention: backupConfig.retention, now: options.now }),
		coordinator: new ReloadCoordinator({
			services,
			healthTimeoutMs: reloadConfig.healthTimeoutMs,
			pollIntervalMs: reloadConfig.pollIntervalMs,
			serviceCallTimeoutMs: dockerCallBudgetMs(reloadConfig),
			now: options.now,
		}),
		services,
		generator: options.generator ?? new CredentialGenerator(),
		autoSnapshot: backupConfig.autoSnapshot,
		defaultDomain: options.domain,
	});
}
