import fs from "node:fs";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { StorageError, ValidationError } from "../../src/errors.js";
import { type DataLayout } from "../../src/storage/layout.js";
import {
	parseRecordsDocument,
	type RecordStore,
	serializeRecordsDocument,
} from "../../src/storage/record-store.js";
import { createTestStore, makeTempRoot, removeTempRoot, steppingClock, testGenerator } from "../helpers.js";

const generator = testGenerator("records");

function historyFiles(layout: DataLayout): string[] {
	return fs.existsSync(layout.historyDir) ? fs.readdirSync(layout.historyDir).sort() : [];
}

describe("RecordStore", () => {
	let root: string;
	let store: RecordStore;
	let layout: DataLayout;

	beforeEach(async () => {
		root = makeTempRoot();
		({ store, layout } = await createTestStore(root, { now: steppingClock() }));
	});

	afterEach(() => {
		removeTempRoot(root);
	});

	describe("initialize", () => {
		it("writes an empty document with the given settings", async () => {
			const { document, recoveredFrom } = await store.load();
			expect(recoveredFrom).toBeNull();
			expect(document.schemaVersion).toBe(1);
			expect(document.users).toEqual({});
			expect(document.settings.domain).toBe("vpn.example.test");
		});

		it("refuses to overwrite an existing document", async () => {
			await expect(store.initialize(await store.readSettings())).rejects.toMatchObject({
				code: "AlreadyInitialized",
			});
		});

		it("reports a missing document as StoreNotInitialized", async () => {
			const fresh = await createTestStore(makeTempRoot(), { initialize: false });
			try {
				await expect(fresh.store.list()).rejects.toMatchObject({
					kind: "storage",
					code: "StoreNotInitialized",
				});
				expect(await fresh.store.isInitialized()).toBe(false);
			} finally {
				removeTempRoot(fresh.layout.root);
			}
		});
	});

	describe("create", () => {
		it("stores a record with the lowest free slot", async () => {
			const record = await store.create("alice", generator.generateAll(["xray", "trojan"]));

			expect(record.username).toBe("alice");
			expect(record.enabled).toBe(true);
			expect(record.slot).toBe(1);
			expect(record.lastSeenAt).toBeNull();
			expect(Object.keys(record.credentials).sort()).toEqual(["trojan", "xray"]);
			expect(await store.get("alice")).toEqual(record);
		});

		it("rejects a duplicate username and leaves the first record intact", async () => {
			const first = await store.create("alice", generator.generateAll(["xray"]));

			const err = await store.create("alice", generator.generateAll(["xray"])).catch((e: unknown) => e);

			expect(err).toBeInstanceOf(ValidationError);
			expect(err).toMatchObject({ code: "DuplicateUser" });
			expect(await store.get("alice")).toEqual(first);
			expect(await store.list()).toHaveLength(1);
		});

		it.each(["ab", "has space", "x".repeat(33), "ünïcode", "__proto__", "a/b"])(
			"rejects invalid username %j",
			async (username) => {
				await expect(store.create(username, {})).rejects.toMatchObject({ code: "InvalidUsername" });
			},
		);

		it("rejects malformed credential bundles", async () => {
			await expect(store.create("alice", { trojan: { password: "short" } })).rejects.toMatchObject({
				code: "InvalidCredentials",
			});
		});

		it("keeps usernames unique under concurrent creates", async () => {
			const names = ["u-01", "u-02", "u-03", "u-04", "u-05", "u-06"];
			const results = await Promise.allSettled([
				...names.map((name) => store.create(name, {})),
				store.create("u-01", {}),
			]);

			expect(results.filter((r) => r.status === "rejected")).toHaveLength(1);
			const users = await store.list();
			expect(users.map((u) => u.username)).toEqual(names);
			expect(users.map((u) => u.slot).sort((a, b) => a - b)).toEqual([1, 2, 3, 4, 5, 6]);
		});

		it("reuses the slot of a deleted user", async () => {
			await store.create("alice", {});
			await store.create("bob", {});
			await store.create("carol", {});
			await store.delete("bob");

			const dave = await store.create("dave", {});

			expect(dave.slot).toBe(2);
			expect((await store.get("carol"))?.slot).toBe(3);
		});
	});

	describe("other mutations", () => {
		it("deletes users and reports unknown ones as NotFound", async () => {
			await store.create("alice", {});
			const removed = await store.delete("alice");

			expect(removed.username).toBe("alice");
			expect(await store.get("alice")).toBeNull();
			await expect(store.delete("alice")).rejects.toMatchObject({ kind: "validation", code: "NotFound" });
		});

		it("lists users ordered by username", async () => {
			for (const name of ["carol", "Alice", "bob"]) {
				await store.create(name, {});
			}
			expect((await store.list()).map((u) => u.username)).toEqual(["Alice", "bob", "carol"]);
		});

		it("toggles enabled and records activity", async () => {
			await store.create("alice", {});

			await store.setEnabled("alice", false);
			await store.touch("alice", new Date("2026-03-04T05:06:07.000Z"));

			const record = await store.get("alice");
			expect(record?.enabled).toBe(false);
			expect(record?.lastSeenAt).toBe("2026-03-04T05:06:07.000Z");
		});

		it("adds only missing credential bundles", async () => {
			const original = generator.generateAll(["xray"]);
			await store.create("alice", original);

			const added = await store.addCredentials("alice", generator.generateAll(["xray", "trojan"]));

			expect(added).toEqual(["trojan"]);
			const record = await store.get("alice");
			expect(record?.credentials.xray).toEqual(original.xray);
			expect(record?.credentials.trojan).toBeDefined();
		});

		it("replaces bundles on explicit regeneration", async () => {
			const original = generator.generateAll(["xray", "trojan"]);
			await store.create("alice", original);
			const replacement = generator.generateAll(["xray"]);

			const record = await store.regenerateCredentials("alice", replacement);

			expect(record.credentials.xray).toEqual(replacement.xray);
			expect(record.credentials.trojan).toEqual(original.trojan);
		});

		it("merges settings patches and rejects invalid ones without writing", async () => {
			const updated = await store.updateSettings({ protocols: { trojan: { port: 10_443 } } });
			expect(updated.protocols.trojan.port).toBe(10_443);
			expect(updated.protocols.trojan.wsPath).toBe("/api/v1/files/sync");

			const before = fs.readFileSync(layout.recordsFile, "utf8");
			await expect(store.updateSettings({ protocols: { xray: { visionPort: 70_000 } } })).rejects.toMatchObject(
				{ code: "InvalidSettings" },
			);
			expect(fs.readFileSync(layout.recordsFile, "utf8")).toBe(before);
		});

		it("does not persist anything when the mutation callback throws", async () => {
			await store.create("alice", {});
			const before = fs.readFileSync(layout.recordsFile, "utf8");

			await expect(
				store.mutate((doc) => {
					doc.users = {};
					throw new Error("abort");
				}),
			).rejects.toThrow("abort");

			expect(fs.readFileSync(layout.recordsFile, "utf8")).toBe(before);
		});
	});

	describe("history", () => {
		it("copies the previous document before each write", async () => {
			const initial = fs.readFileSync(layout.recordsFile, "utf8");

			await store.create("alice", {});

			const files = historyFiles(layout);
			expect(files).toHaveLength(1);
			expect(files[0]).toMatch(/^users-\d{8}T\d{9}Z-000\.json$/);
			expect(fs.readFileSync(path.join(layout.historyDir, files[0]), "utf8")).toBe(initial);
		});

		it("keeps only the newest copies", async () => {
			const limited = await createTestStore(makeTempRoot(), { historyLimit: 3, now: steppingClock() });
			try {
				for (const name of ["user-a", "user-b", "user-c", "user-d", "user-e"]) {
					await limited.store.create(name, {});
				}
				const files = historyFiles(limited.layout);
				expect(files).toHaveLength(3);
				// the newest copy is the document as it was before user-e
				const newest = parseRecordsDocument(
					fs.readFileSync(path.join(limited.layout.historyDir, files[2]), "utf8"),
				);
				expect(newest.ok && Object.keys(newest.document.users)).toEqual([
					"user-a",
					"user-b",
					"user-c",
					"user-d",
				]);
			} finally {
				removeTempRoot(limited.layout.root);
			}
		});
	});

	describe("recovery", () => {
		it("loads the newest valid history copy when the live file is corrupt", async () => {
			await store.create("alice", {});
			await store.create("bob", {});
			fs.writeFileSync(layout.recordsFile, '{"schemaVersion": 1, "users": {"tru');

			const { document, recoveredFrom } = await store.load();

			expect(recoveredFrom).not.toBeNull();
			expect(path.dirname(recoveredFrom ?? "")).toBe(layout.historyDir);
			expect(Object.keys(document.users)).toEqual(["alice"]);
		});

		it("quarantines the corrupt file on the next mutation", async () => {
			await store.create("alice", {});
			await store.create("bob", {});
			const garbage = "not json at all";
			fs.writeFileSync(layout.recordsFile, garbage);

			await store.create("carol", {});

			const quarantined = fs.readdirSync(layout.recordsDir).filter((n) => n.startsWith("users.json.corrupted."));
			expect(quarantined).toHaveLength(1);
			expect(fs.readFileSync(path.join(layout.recordsDir, quarantined[0]), "utf8")).toBe(garbage);
			expect((await store.list()).map((u) => u.username)).toEqual(["alice", "carol"]);
			expect((await store.load()).recoveredFrom).toBeNull();
		});

		it("refuses to operate when nothing parses", async () => {
			fs.writeFileSync(layout.recordsFile, "{");

			const err = await store.list().catch((e: unknown) => e);

			expect(err).toBeInstanceOf(StorageError);
			expect(err).toMatchObject({ code: "StoreCorrupt" });
		});

		it("treats a schema violation like a parse failure", async () => {
			await store.create("alice", {});
			const doc = JSON.parse(fs.readFileSync(layout.recordsFile, "utf8"));
			doc.users.alice.slot = -1;
			fs.writeFileSync(layout.recordsFile, JSON.stringify(doc));

			const { recoveredFrom, document } = await store.load();

			expect(recoveredFrom).not.toBeNull();
			expect(document.users).toEqual({});
		});

		it("cleans up temp files from an interrupted write", async () => {
			await store.create("alice", {});
			const stale = path.join(layout.recordsDir, ".users.json.0123456789ab.tmp");
			fs.writeFileSync(stale, '{"schemaVersion":1,"users":{"al');

			// the interrupted write never reached the live path
			expect((await store.list()).map((u) => u.username)).toEqual(["alice"]);

			await store.create("bob", {});
			expect(fs.existsSync(stale)).toBe(false);
			expect((await store.list()).map((u) => u.username)).toEqual(["alice", "bob"]);
		});
	});

	describe("serialization", () => {
		it("orders users by username and ends with a newline", async () => {
			await store.create("zed", {});
			await store.create("amy", {});
			const { document } = await store.load();

			const text = serializeRecordsDocument(document);

			expect(text.endsWith("}\n")).toBe(true);
			expect(text.indexOf('"amy"')).toBeLessThan(text.indexOf('"zed"'));
			expect(fs.readFileSync(layout.recordsFile, "utf8")).toBe(text);
		});
	});
});
