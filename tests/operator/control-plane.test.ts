import fs from "node:fs";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { z } from "zod";

import type { WardenConfig } from "../../src/config/config.js";
import { type ControlPlane, createControlPlane, type OperationResult } from "../../src/operator/control-plane.js";
import { resolveLayout } from "../../src/storage/layout.js";
import { RecordStore } from "../../src/storage/record-store.js";
import {
	FakeServiceManager,
	makeTempRoot,
	removeTempRoot,
	steppingClock,
	TEST_DOMAIN,
	testGenerator,
} from "../helpers.js";

const TEST_CONFIG: WardenConfig = {
	store: { lockTimeoutMs: 2_000, staleLockMs: 60_000, historyLimit: 10 },
	backup: { retention: 10, autoSnapshot: true },
	reload: { healthTimeoutMs: 100, pollIntervalMs: 5, commandTimeoutMs: 1_000, maxAttempts: 1 },
};

const XrayConfigSchema = z.object({
	inbounds: z.array(z.object({ tag: z.string(), settings: z.object({ clients: z.array(z.object({ id: z.string() })) }) })),
});
const TrojanConfigSchema = z.object({ password: z.array(z.string()) });

function unwrap<T>(result: OperationResult<T>): T {
	if (!result.ok) {
		throw new Error(`operation failed: ${result.error.code}: ${result.error.message}`);
	}
	return result.value;
}

describe("ControlPlane", () => {
	let root: string;
	let services: FakeServiceManager;
	let plane: ControlPlane;
	let records: RecordStore;

	beforeEach(() => {
		root = makeTempRoot();
		services = new FakeServiceManager();
		plane = createControlPlane({
			dataDir: root,
			config: TEST_CONFIG,
			domain: TEST_DOMAIN,
			services,
			generator: testGenerator("control-plane"),
			now: steppingClock(),
		});
		records = new RecordStore({ layout: resolveLayout(root) });
	});

	afterEach(() => {
		removeTempRoot(root);
	});

	function readConfig(protocol: string, file: string): string {
		return fs.readFileSync(path.join(root, "configs", protocol, file), "utf8");
	}

	function xrayClientIds(): string[][] {
		const config = XrayConfigSchema.parse(JSON.parse(readConfig("xray", "config.json")));
		return config.inbounds.map((inbound) => inbound.settings.clients.map((client) => client.id));
	}

	describe("before initialization", () => {
		it("reports the store as not initialized", async () => {
			const result = await plane.createUser("alice");
			expect(result).toEqual({
				ok: false,
				error: {
					kind: "storage",
					code: "StoreNotInitialized",
					message: expect.stringContaining("users.json"),
				},
			});
		});

		it("shows an empty status", async () => {
			const status = unwrap(await plane.getStatus());
			expect(status.initialized).toBe(false);
			expect(status.domain).toBeNull();
			expect(status.users).toEqual({ total: 0, enabled: 0 });
			expect(status.protocols.map((p) => [p.protocol, p.enabled, p.health])).toEqual([
				["xray", false, "unknown"],
				["trojan", false, "unknown"],
				["singbox", false, "unknown"],
				["wireguard", false, "unknown"],
			]);
			expect(status.backups).toEqual({ count: 0, latest: null });
		});

		it("requires a domain to initialize", async () => {
			const bare = createControlPlane({ dataDir: root, config: TEST_CONFIG, services });
			const result = await bare.initialize();
			expect(result.ok).toBe(false);
			if (!result.ok) expect(result.error.code).toBe("InvalidSettings");
		});
	});

	describe("once initialized", () => {
		beforeEach(async () => {
			unwrap(await plane.initialize());
		});

		it("installs templates and renders every engine without reloading", async () => {
			const second = await plane.initialize("other.example.test");
			expect(second.ok).toBe(false);
			if (!second.ok) expect(second.error.code).toBe("AlreadyInitialized");

			expect(fs.readdirSync(path.join(root, "templates")).sort()).toEqual([
				"singbox.template.json",
				"trojan.template.json",
				"wireguard.template.conf",
				"xray.template.json",
			]);
			expect(xrayClientIds()).toEqual([[], []]);
			expect(services.calls).toEqual([]);
		});

		it("creates alice end to end", async () => {
			const change = unwrap(await plane.createUser("alice"));

			expect(change.user).toMatchObject({
				username: "alice",
				enabled: true,
				slot: 1,
				protocols: ["xray", "trojan", "singbox", "wireguard"],
			});
			expect(change.configs.map((c) => [c.protocol, c.status, c.changed])).toEqual([
				["xray", "rendered", true],
				["trojan", "rendered", true],
				["singbox", "rendered", true],
				["wireguard", "rendered", true],
			]);
			expect(change.reloads.map((r) => [r.protocol, r.state])).toEqual([
				["xray", "healthy"],
				["trojan", "healthy"],
				["singbox", "healthy"],
				["wireguard", "healthy"],
			]);

			const alice = await records.get("alice");
			const xrayId = alice?.credentials.xray?.id;
			expect(xrayId).toBeDefined();
			expect(xrayClientIds()).toEqual([[xrayId], [xrayId]]);

			const trojan = TrojanConfigSchema.parse(JSON.parse(readConfig("trojan", "config.json")));
			expect(trojan.password).toEqual([alice?.credentials.trojan?.password]);
			expect(readConfig("wireguard", "wg0.conf")).toContain("AllowedIPs = 10.13.13.2/32");

			const links = fs.readFileSync(path.join(root, "clients", "alice", "links.txt"), "utf8");
			expect(links.startsWith(`vless://${xrayId}@${TEST_DOMAIN}:8443?`)).toBe(true);
			expect(fs.existsSync(path.join(root, "clients", "alice", "wireguard.conf"))).toBe(true);

			const backups = unwrap(await plane.listBackups());
			expect(backups.map((b) => b.reason)).toEqual(["pre-mutation"]);
		});

		it("rejects a duplicate user without taking a snapshot", async () => {
			unwrap(await plane.createUser("alice"));
			const result = await plane.createUser("alice");

			expect(result).toEqual({
				ok: false,
				error: { kind: "validation", code: "DuplicateUser", message: 'User "alice" already exists' },
			});
			expect(unwrap(await plane.listBackups())).toHaveLength(1);
		});

		it("validates usernames and protocol names", async () => {
			const badName = await plane.createUser("a");
			expect(badName.ok ? null : badName.error.code).toBe("InvalidUsername");

			const badProtocol = await plane.createUser("alice", ["openvpn"]);
			expect(badProtocol.ok ? null : badProtocol.error.code).toBe("UnknownProtocol");
			expect(unwrap(await plane.listUsers())).toEqual([]);
		});

		it("creates users for a subset of protocols", async () => {
			const change = unwrap(await plane.createUser("bob", ["trojan"]));
			expect(change.user.protocols).toEqual(["trojan"]);
			expect(xrayClientIds()).toEqual([[], []]);
		});

		it("deletes a user from configs and client files", async () => {
			unwrap(await plane.createUser("alice"));
			const change = unwrap(await plane.deleteUser("alice"));

			expect(change.user.username).toBe("alice");
			expect(xrayClientIds()).toEqual([[], []]);
			expect(fs.existsSync(path.join(root, "clients", "alice"))).toBe(false);

			const missing = await plane.deleteUser("alice");
			expect(missing.ok ? null : missing.error).toEqual({
				kind: "validation",
				code: "NotFound",
				message: 'User "alice" not found',
			});
		});

		it("disables and re-enables a user", async () => {
			unwrap(await plane.createUser("alice"));

			const disabled = unwrap(await plane.setUserEnabled("alice", false));
			expect(disabled.user.enabled).toBe(false);
			expect(xrayClientIds()).toEqual([[], []]);
			expect(fs.existsSync(path.join(root, "clients", "alice"))).toBe(false);

			const again = unwrap(await plane.setUserEnabled("alice", false));
			expect(again.configs).toEqual([]);

			unwrap(await plane.setUserEnabled("alice", true));
			expect(xrayClientIds()[0]).toHaveLength(1);
		});

		it("rotates only the requested credentials", async () => {
			unwrap(await plane.createUser("alice"));
			const before = await records.get("alice");

			unwrap(await plane.regenerateUserCredentials("alice", ["trojan"]));
			const after = await records.get("alice");

			expect(after?.credentials.trojan?.password).not.toBe(before?.credentials.trojan?.password);
			expect(after?.credentials.xray).toEqual(before?.credentials.xray);
			expect(after?.slot).toBe(before?.slot);
		});

		it("lists users and shows links without credentials in the summary", async () => {
			unwrap(await plane.createUser("bob", ["xray"]));
			unwrap(await plane.createUser("alice", ["trojan"]));

			expect(unwrap(await plane.listUsers()).map((u) => [u.username, u.slot, u.protocols])).toEqual([
				["alice", 2, ["trojan"]],
				["bob", 1, ["xray"]],
			]);

			const bob = unwrap(await plane.getUser("bob"));
			expect(bob).not.toHaveProperty("credentials");
			expect(bob.links).toHaveLength(2);
			expect(bob.clientDir).toBe(path.join(root, "clients", "bob"));
		});

		it("applies settings changes and re-renders", async () => {
			unwrap(await plane.createUser("alice"));
			const result = unwrap(await plane.updateSettings({ protocols: { trojan: { enabled: false } } }));

			expect(result.settings.protocols.trojan.enabled).toBe(false);
			expect(result.configs.find((c) => c.protocol === "trojan")?.status).toBe("skipped");
			expect(result.reloads.map((r) => r.protocol)).not.toContain("trojan");

			const invalid = await plane.updateSettings({ protocols: { xray: { visionPort: 0 } } });
			expect(invalid.ok ? null : invalid.error.code).toBe("InvalidSettings");
		});

		it("leaves backups untouched when a settings patch is invalid", async () => {
			const invalid = await plane.updateSettings({ protocols: { xray: { visionPort: 70000 } } });

			expect(invalid.ok ? null : invalid.error.code).toBe("InvalidSettings");
			expect(unwrap(await plane.listBackups())).toEqual([]);
		});

		it("refuses a WireGuard user the address pool has no room for", async () => {
			unwrap(await plane.updateSettings({ protocols: { wireguard: { address: "10.0.0.1/30" } } }));
			unwrap(await plane.createUser("alice"));

			const bob = await plane.createUser("bob");

			expect(bob).toEqual({
				ok: false,
				error: {
					kind: "validation",
					code: "AddressPoolExhausted",
					message: "wireguard: address pool 10.0.0.1/30 has no room for slot 2",
				},
			});
			expect(unwrap(await plane.listBackups())).toHaveLength(2);
			expect(unwrap(await plane.createUser("bob", ["xray"])).user.slot).toBe(2);
		});

		it("keeps reloading the other engines when one user's client files fail", async () => {
			unwrap(await plane.createUser("alice"));
			unwrap(await plane.createUser("bob"));

			const shrunk = unwrap(await plane.updateSettings({ protocols: { wireguard: { address: "10.0.0.1/30" } } }));
			expect(shrunk.clients).toEqual([
				{
					username: "bob",
					error: {
						kind: "render",
						code: "SemanticConflict",
						message: "wireguard: address pool 10.0.0.1/30 has no room for slot 2",
					},
				},
			]);
			services.calls.length = 0;

			const forced = unwrap(await plane.regenerateAllConfigs({ force: true }));

			expect(forced.reloads.map((r) => [r.protocol, r.state])).toEqual([
				["xray", "healthy"],
				["trojan", "healthy"],
				["singbox", "healthy"],
				["wireguard", "validation-failed"],
			]);
			expect(services.actionsFor("xray")).toEqual(["reload", "health"]);
			expect(forced.clients.map((c) => c.username)).toEqual(["bob"]);
			expect(fs.existsSync(path.join(root, "clients", "bob", "links.txt"))).toBe(true);
		});

		it("reloads only what changed unless forced", async () => {
			unwrap(await plane.createUser("alice"));

			expect(unwrap(await plane.regenerateAllConfigs()).reloads).toEqual([]);
			const forced = unwrap(await plane.regenerateAllConfigs({ force: true }));
			expect(forced.reloads.map((r) => r.state)).toEqual(["healthy", "healthy", "healthy", "healthy"]);
		});

		it("keeps the change when an engine never becomes healthy", async () => {
			services.health.set("singbox", "unhealthy");

			const change = unwrap(await plane.createUser("alice"));

			const singbox = change.reloads.find((r) => r.protocol === "singbox");
			expect(singbox?.state).toBe("reload-failed");
			expect(singbox?.error?.code).toBe("HealthTimeout");
			expect(change.reloads.filter((r) => r.state === "healthy")).toHaveLength(3);
			expect(await records.get("alice")).not.toBeNull();

			const status = unwrap(await plane.getStatus());
			expect(status.protocols.find((p) => p.protocol === "singbox")).toMatchObject({
				health: "unhealthy",
				reload: { state: "reload-failed" },
			});
		});

		it("rolls back through restore", async () => {
			unwrap(await plane.createUser("alice"));
			unwrap(await plane.createUser("bob"));
			const [beforeBob] = unwrap(await plane.listBackups());
			if (!beforeBob) throw new Error("expected a snapshot");

			const restored = unwrap(await plane.restoreBackup(beforeBob.id));

			expect(restored.restored.id).toBe(beforeBob.id);
			expect(restored.safety.reason).toBe("pre-restore");
			expect(unwrap(await plane.listUsers()).map((u) => u.username)).toEqual(["alice"]);
			expect(restored.reloads).toHaveLength(4);
			expect(fs.existsSync(path.join(root, "clients", "bob"))).toBe(false);
		});

		it("creates, prunes and deletes backups", async () => {
			const backup = unwrap(await plane.createBackup());
			expect(backup.reason).toBe("manual");
			expect(unwrap(await plane.pruneBackups())).toEqual([]);

			expect(unwrap(await plane.deleteBackup(backup.id)).id).toBe(backup.id);
			const again = await plane.deleteBackup(backup.id);
			expect(again.ok ? null : again.error.code).toBe("BackupNotFound");
		});

		it("reloads one engine and reads its logs", async () => {
			const status = unwrap(await plane.reloadService("wireguard"));
			expect(status.state).toBe("healthy");

			services.logs.set("xray", "one\ntwo\nthree");
			expect(unwrap(await plane.readServiceLogs("xray", 2))).toBe("two\nthree");

			const unknown = await plane.reloadService("openvpn");
			expect(unknown.ok ? null : unknown.error.code).toBe("UnknownProtocol");
		});

		it("summarizes status", async () => {
			unwrap(await plane.createUser("alice"));
			unwrap(await plane.createUser("bob"));
			unwrap(await plane.setUserEnabled("bob", false));

			const status = unwrap(await plane.getStatus());
			expect(status.initialized).toBe(true);
			expect(status.domain).toBe(TEST_DOMAIN);
			expect(status.users).toEqual({ total: 2, enabled: 1 });
			expect(status.protocols.every((p) => p.enabled && p.health === "healthy")).toBe(true);
			expect(status.backups.count).toBe(3);
			expect(status.backups.latest?.reason).toBe("pre-mutation");
		});
	});
});
