import fs from "node:fs";

import JSON5 from "json5";
import { z } from "zod";

import { errnoCode } from "../utils.js";
import { resolveConfigPath } from "./path.js";

export const ProtocolNameSchema = z.enum(["xray", "trojan", "singbox", "wireguard"]);
export type ProtocolName = z.infer<typeof ProtocolNameSchema>;
export const PROTOCOL_NAMES: readonly ProtocolName[] = ProtocolNameSchema.options;

// Logging configuration schema
const LoggingConfigSchema = z.object({
	level: z.enum(["silent", "fatal", "error", "warn", "info", "debug", "trace"]).optional(),
	file: z.string().optional(),
});

// Record store tuning
const StoreConfigSchema = z.object({
	lockTimeoutMs: z.number().int().positive().default(10_000),
	// Lock files older than this are considered abandoned even if the pid is alive
	staleLockMs: z.number().int().positive().default(60_000),
	historyLimit: z.number().int().positive().default(10),
});

const BackupConfigSchema = z.object({
	retention: z.number().int().min(0).default(20),
	// Snapshot before every mutating operator action
	autoSnapshot: z.boolean().default(true),
});

const ReloadConfigSchema = z.object({
	healthTimeoutMs: z.number().int().positive().default(30_000),
	pollIntervalMs: z.number().int().positive().default(1_000),
	commandTimeoutMs: z.number().int().positive().default(20_000),
	maxAttempts: z.number().int().positive().default(2),
});

// How a running engine picks up a new config file.
// "signal" and "exec" keep established connections; "restart" drops them.
export const ReloadStrategySchema = z.discriminatedUnion("kind", [
	z.object({ kind: z.literal("signal"), signal: z.string().regex(/^SIG[A-Z0-9]+$/) }),
	z.object({ kind: z.literal("exec"), command: z.array(z.string().min(1)).min(1) }),
	z.object({ kind: z.literal("restart") }),
]);
export type ReloadStrategy = z.infer<typeof ReloadStrategySchema>;

const ServiceConfigSchema = z.object({
	container: z.string().min(1),
	reload: ReloadStrategySchema,
});
export type ServiceConfig = z.infer<typeof ServiceConfigSchema>;

export const DEFAULT_SERVICES: Record<ProtocolName, ServiceConfig> = {
	// xray has no in-process config reload
	xray: { container: "proxy-xray", reload: { kind: "restart" } },
	trojan: { container: "proxy-trojan", reload: { kind: "restart" } },
	singbox: { container: "proxy-singbox", reload: { kind: "signal", signal: "SIGHUP" } },
	wireguard: {
		container: "proxy-wireguard",
		reload: { kind: "exec", command: ["bash", "-c", "wg syncconf wg0 <(wg-quick strip wg0)"] },
	},
};

const ServicesConfigSchema = z.object({
	xray: ServiceConfigSchema.optional(),
	trojan: ServiceConfigSchema.optional(),
	singbox: ServiceConfigSchema.optional(),
	wireguard: ServiceConfigSchema.optional(),
});

// Main config schema
const WardenConfigSchema = z.object({
	logging: LoggingConfigSchema.optional(),
	store: StoreConfigSchema.optional(),
	backup: BackupConfigSchema.optional(),
	reload: ReloadConfigSchema.optional(),
	services: ServicesConfigSchema.optional(),
});

export type WardenConfig = z.infer<typeof WardenConfigSchema>;
export type StoreConfig = z.infer<typeof StoreConfigSchema>;
export type BackupConfig = z.infer<typeof BackupConfigSchema>;
export type ReloadConfig = z.infer<typeof ReloadConfigSchema>;

let cachedConfig: WardenConfig | null = null;
let configMtime: number | null = null;
let cachedConfigPath: string | null = null;

/**
 * Load and parse the configuration file.
 * Uses resolveConfigPath() to determine the config file location.
 */
export function loadConfig(): WardenConfig {
	const configPath = resolveConfigPath();

	try {
		const stat = fs.statSync(configPath);
		// Invalidate cache if path changed or mtime changed
		if (cachedConfig && cachedConfigPath === configPath && configMtime === stat.mtimeMs) {
			return cachedConfig;
		}

		const raw = fs.readFileSync(configPath, "utf-8");
		const parsed: unknown = JSON5.parse(raw);
		const validated = WardenConfigSchema.parse(parsed);

		cachedConfig = validated;
		configMtime = stat.mtimeMs;
		cachedConfigPath = configPath;

		return validated;
	} catch (err) {
		if (errnoCode(err) === "ENOENT") {
			// No config file - use defaults
			return {};
		}
		throw err;
	}
}

export function resolveStoreConfig(cfg: WardenConfig = loadConfig()): StoreConfig {
	return StoreConfigSchema.parse(cfg.store ?? {});
}

export function resolveBackupConfig(cfg: WardenConfig = loadConfig()): BackupConfig {
	return BackupConfigSchema.parse(cfg.backup ?? {});
}

export function resolveReloadConfig(cfg: WardenConfig = loadConfig()): ReloadConfig {
	return ReloadConfigSchema.parse(cfg.reload ?? {});
}

export function resolveServices(cfg: WardenConfig = loadConfig()): Record<ProtocolName, ServiceConfig> {
	return {
		xray: cfg.services?.xray ?? DEFAULT_SERVICES.xray,
		trojan: cfg.services?.trojan ?? DEFAULT_SERVICES.trojan,
		singbox: cfg.services?.singbox ?? DEFAULT_SERVICES.singbox,
		wireguard: cfg.services?.wireguard ?? DEFAULT_SERVICES.wireguard,
	};
}

/**
 * Get the current config file path being used.
 */
export function getConfigPath(): string {
	return resolveConfigPath();
}

/**
 * Reset the config cache (useful for testing).
 */
export function resetConfigCache() {
	cachedConfig = null;
	configMtime = null;
	cachedConfigPath = null;
}
