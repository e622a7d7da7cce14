/**
 * Shared fixtures: temp data roots, a deterministic random source and a
 * ready-made settings object.
 */

import crypto from "node:crypto";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import type { ProtocolName } from "../src/config/config.js";
import { CredentialGenerator, type RandomSource } from "../src/credentials/generator.js";
import type { HealthStatus, ReloadResult, ServiceManager } from "../src/reload/service-manager.js";
import { type DataLayout, resolveLayout } from "../src/storage/layout.js";
import { RecordStore } from "../src/storage/record-store.js";
import type { ServerSettings } from "../src/storage/schema.js";
import { createDefaultSettings } from "../src/storage/settings.js";

export const TEST_DOMAIN = "vpn.example.test";

export function makeTempRoot(prefix = "proxy-warden-test-"): string {
	return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeTempRoot(root: string): void {
	fs.rmSync(root, { recursive: true, force: true });
}

/** Repeatable byte stream: sha256 of a running counter, concatenated. */
export function seededRandom(seed = "test-seed"): RandomSource {
	let counter = 0;
	return (size: number) => {
		const chunks: Buffer[] = [];
		let length = 0;
		while (length < size) {
			const chunk = crypto.createHash("sha256").update(`${seed}:${counter++}`).digest();
			chunks.push(chunk);
			length += chunk.length;
		}
		return Buffer.concat(chunks).subarray(0, size);
	};
}

export function testGenerator(seed?: string): CredentialGenerator {
	return new CredentialGenerator(seededRandom(seed));
}

export function testSettings(generator: CredentialGenerator = testGenerator("server")): ServerSettings {
	return createDefaultSettings(TEST_DOMAIN, generator);
}

/** A clock that advances one second per call, starting at `start`. */
export function steppingClock(start = "2026-01-01T00:00:00.000Z"): () => Date {
	let current = new Date(start).getTime();
	return () => {
		const now = new Date(current);
		current += 1000;
		return now;
	};
}

export async function createTestStore(
	root: string,
	options: { historyLimit?: number; now?: () => Date; initialize?: boolean } = {},
): Promise<{ store: RecordStore; layout: DataLayout }> {
	const layout = resolveLayout(root);
	const store = new RecordStore({
		layout,
		lockTimeoutMs: 2_000,
		staleLockMs: 60_000,
		historyLimit: options.historyLimit ?? 10,
		now: options.now,
	});
	if (options.initialize ?? true) {
		await store.initialize(testSettings());
	}
	return { store, layout };
}

export type ServiceCall = { action: "reload" | "restart" | "health" | "logs"; protocol: ProtocolName };

/**
 * In-memory engine control. Every protocol reloads gracefully and reports
 * healthy unless told otherwise.
 */
export class FakeServiceManager implements ServiceManager {
	readonly calls: ServiceCall[] = [];
	readonly reloadBehaviour = new Map<ProtocolName, ReloadResult | Error>();
	readonly restartFailures = new Map<ProtocolName, Error>();
	readonly health = new Map<ProtocolName, HealthStatus>();
	readonly logs = new Map<ProtocolName, string>();
	/** Delay applied to reload calls, to make overlap observable. */
	reloadDelayMs = 0;
	/** Calls that never settle. */
	readonly hanging = new Set<ServiceCall["action"]>();

	async reload(protocol: ProtocolName): Promise<ReloadResult> {
		this.calls.push({ action: "reload", protocol });
		if (this.hanging.has("reload")) return new Promise<ReloadResult>(() => {});
		if (this.reloadDelayMs > 0) {
			await new Promise((resolve) => setTimeout(resolve, this.reloadDelayMs));
		}
		const behaviour = this.reloadBehaviour.get(protocol) ?? "reloaded";
		if (behaviour instanceof Error) throw behaviour;
		return behaviour;
	}

	async restart(protocol: ProtocolName): Promise<void> {
		this.calls.push({ action: "restart", protocol });
		if (this.hanging.has("restart")) return new Promise<void>(() => {});
		const failure = this.restartFailures.get(protocol);
		if (failure) throw failure;
	}

	async healthStatus(protocol: ProtocolName): Promise<HealthStatus> {
		this.calls.push({ action: "health", protocol });
		return this.health.get(protocol) ?? "healthy";
	}

	async readLogs(protocol: ProtocolName, lines: number): Promise<string> {
		this.calls.push({ action: "logs", protocol });
		const text = this.logs.get(protocol) ?? "";
		return text.split("\n").slice(-lines).join("\n");
	}

	actionsFor(protocol: ProtocolName): string[] {
		return this.calls.filter((call) => call.protocol === protocol).map((call) => call.action);
	}
}
