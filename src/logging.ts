import fs from "node:fs";
import path from "node:path";

import pino, { type Bindings, type LevelWithSilent, type Logger } from "pino";
import { type WardenConfig, loadConfig } from "./config/config.js";
import { readEnv } from "./env.js";
import { isVerbose } from "./globals.js";
import { errnoCode } from "./utils.js";

const ALLOWED_LEVELS: readonly LevelWithSilent[] = [
	"silent",
	"fatal",
	"error",
	"warn",
	"info",
	"debug",
	"trace",
];

export type LoggerSettings = {
	level?: LevelWithSilent;
	file?: string;
};

type ResolvedSettings = {
	level: LevelWithSilent;
	file: string;
};
export type LoggerResolvedSettings = ResolvedSettings;

let cachedLogger: Logger | null = null;
let cachedSettings: ResolvedSettings | null = null;
type Destination = ReturnType<typeof pino.destination>;

let cachedDestination: Destination | null = null;
let overrideSettings: LoggerSettings | null = null;

function isLevel(value: string): value is LevelWithSilent {
	return (ALLOWED_LEVELS as readonly string[]).includes(value);
}

function normalizeLevel(level?: string): LevelWithSilent {
	if (isVerbose()) return "debug";
	const candidate = level ?? "info";
	return isLevel(candidate) ? candidate : "info";
}

export function defaultLogFile(): string {
	return path.join(readEnv().dataDir, "logs", "proxy-warden.log");
}

function resolveSettings(): ResolvedSettings {
	const cfg: WardenConfig["logging"] | undefined = overrideSettings ?? loadConfig().logging;
	const level = normalizeLevel(process.env.PROXY_WARDEN_LOG_LEVEL ?? cfg?.level);
	const file = cfg?.file ?? defaultLogFile();
	return { level, file };
}

function settingsChanged(a: ResolvedSettings | null, b: ResolvedSettings) {
	if (!a) return true;
	return a.level !== b.level || a.file !== b.file;
}

function closeDestination(dest: Destination): void {
	// Flush and close so CLI commands can exit cleanly.
	try {
		dest.flushSync();
		dest.end();
	} catch (err) {
		process.stderr.write(`proxy-warden: failed to close log destination: ${String(err)}\n`);
	}
}

function prepareLogFile(file: string): void {
	fs.mkdirSync(path.dirname(file), { recursive: true, mode: 0o700 });

	// Create with 0600 so credentials that leak into messages are not world-readable
	try {
		const fd = fs.openSync(
			file,
			fs.constants.O_WRONLY | fs.constants.O_CREAT | fs.constants.O_EXCL,
			0o600,
		);
		fs.closeSync(fd);
	} catch (err) {
		if (errnoCode(err) !== "EEXIST") {
			throw err;
		}
	}
}

function buildLogger(settings: ResolvedSettings): {
	logger: Logger;
	destination: Destination | null;
} {
	if (settings.level === "silent") {
		return { logger: pino({ level: "silent" }), destination: null };
	}

	prepareLogFile(settings.file);
	const destination = pino.destination({
		dest: settings.file,
		mkdir: true,
		sync: true, // deterministic for tests; log volume is modest.
	});
	const logger = pino(
		{
			level: settings.level,
			base: undefined,
			timestamp: pino.stdTimeFunctions.isoTime,
		},
		destination,
	);
	return { logger, destination };
}

export function getLogger(): Logger {
	const settings = resolveSettings();
	if (!cachedLogger || settingsChanged(cachedSettings, settings)) {
		if (cachedDestination) {
			closeDestination(cachedDestination);
			cachedDestination = null;
		}
		const built = buildLogger(settings);
		cachedLogger = built.logger;
		cachedDestination = built.destination;
		cachedSettings = settings;
	}
	return cachedLogger;
}

export function getChildLogger(bindings?: Bindings, opts?: { level?: LevelWithSilent }): Logger {
	return getLogger().child(bindings ?? {}, opts);
}

export function getResolvedLoggerSettings(): LoggerResolvedSettings {
	return resolveSettings();
}

// Test helpers
export function setLoggerOverride(settings: LoggerSettings | null) {
	overrideSettings = settings;
	cachedLogger = null;
	cachedSettings = null;
}

export function closeLogger(): void {
	if (cachedDestination) {
		closeDestination(cachedDestination);
		cachedDestination = null;
	}
	cachedLogger = null;
	cachedSettings = null;
}
