import path from "node:path";
import { readEnv } from "../env.js";

/**
 * Global config path override. Set via CLI or programmatically.
 */
let configPathOverride: string | null = null;

/**
 * Resolve the config file path from:
 * 1. Programmatic override (set via setConfigPath)
 * 2. PROXY_WARDEN_CONFIG environment variable
 * 3. Default: <data dir>/proxy-warden.json
 */
export function resolveConfigPath(): string {
	if (configPathOverride) {
		return configPathOverride;
	}

	const envPath = process.env.PROXY_WARDEN_CONFIG;
	if (envPath) {
		return envPath;
	}

	return path.join(readEnv().dataDir, "proxy-warden.json");
}

/**
 * Set the config path override. Called from CLI parsing.
 */
export function setConfigPath(configPath: string | null): void {
	configPathOverride = configPath;
}

/**
 * Reset config path to default (for testing).
 */
export function resetConfigPath(): void {
	configPathOverride = null;
}
