import crypto from "node:crypto";
import { describe, expect, it } from "vitest";

import {
	CredentialGenerator,
	deriveWireguardPublicKey,
	importWireguardPrivateKey,
	importWireguardPublicKey,
} from "../../src/credentials/generator.js";
import { EntropyUnavailableError } from "../../src/errors.js";
import { CredentialsSchema } from "../../src/storage/schema.js";
import { seededRandom } from "../helpers.js";

describe("CredentialGenerator", () => {
	const generator = new CredentialGenerator();

	it("formats identifiers as 128-bit UUID-shaped strings", () => {
		const id = generator.identifier();
		expect(id).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/);
		expect(id.replace(/-/g, "")).toHaveLength(32);
	});

	it("encodes 256-bit secrets as unpadded base64url", () => {
		const secret = generator.secret();
		expect(secret).toMatch(/^[A-Za-z0-9_-]{43}$/);
		expect(Buffer.from(secret, "base64url")).toHaveLength(32);
	});

	it("produces bundles that pass the record schema", () => {
		const all = generator.generateAll(["xray", "trojan", "singbox", "wireguard"]);
		expect(CredentialsSchema.safeParse(all).success).toBe(true);
		expect(Object.keys(all).sort()).toEqual(["singbox", "trojan", "wireguard", "xray"]);
	});

	it("generates only the requested protocols", () => {
		expect(Object.keys(generator.generateAll(["trojan"]))).toEqual(["trojan"]);
		expect(generator.generateAll([])).toEqual({});
	});

	it("never repeats identifiers or secrets", () => {
		const ids = new Set(Array.from({ length: 200 }, () => generator.identifier()));
		const secrets = new Set(Array.from({ length: 200 }, () => generator.secret()));
		expect(ids.size).toBe(200);
		expect(secrets.size).toBe(200);
	});

	it("is repeatable with a seeded random source", () => {
		const a = new CredentialGenerator(seededRandom("same")).generate("singbox");
		const b = new CredentialGenerator(seededRandom("same")).generate("singbox");
		expect(a).toEqual(b);
	});

	describe("wireguard keys", () => {
		it("clamps the private key like wg genkey", () => {
			const raw = Buffer.from(generator.wireguardKeyPair().privateKey, "base64");
			expect(raw).toHaveLength(32);
			expect(raw[0] & 7).toBe(0);
			expect(raw[31] & 128).toBe(0);
			expect(raw[31] & 64).toBe(64);
		});

		it("derives a public key that agrees on a shared secret", () => {
			const server = generator.wireguardKeyPair();
			const peer = generator.wireguardKeyPair();

			const fromServer = crypto.diffieHellman({
				privateKey: importWireguardPrivateKey(server.privateKey),
				publicKey: importWireguardPublicKey(peer.publicKey),
			});
			const fromPeer = crypto.diffieHellman({
				privateKey: importWireguardPrivateKey(peer.privateKey),
				publicKey: importWireguardPublicKey(server.publicKey),
			});

			expect(fromServer.equals(fromPeer)).toBe(true);
			expect(deriveWireguardPublicKey(server.privateKey)).toBe(server.publicKey);
		});
	});

	describe("entropy failures", () => {
		it("wraps a throwing random source", () => {
			const broken = new CredentialGenerator(() => {
				throw new Error("getrandom failed");
			});

			let caught: unknown;
			try {
				broken.generate("trojan");
			} catch (err) {
				caught = err;
			}

			expect(caught).toBeInstanceOf(EntropyUnavailableError);
			expect(caught).toMatchObject({ kind: "fatal", code: "EntropyUnavailable" });
		});

		it("rejects short reads", () => {
			const short = new CredentialGenerator((size) => Buffer.alloc(size - 1));
			expect(() => short.identifier()).toThrow("Random source returned 15 bytes, expected 16");
		});
	});
});
