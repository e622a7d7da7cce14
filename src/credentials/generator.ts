/**
 * Credential generation.
 *
 * Produces fresh, protocol-shaped secret material. Never reads existing
 * state. All randomness comes from one injectable source (the platform CSPRNG
 * by default); if that source fails the generator throws
 * EntropyUnavailableError and does not retry.
 */

import crypto, { type KeyObject } from "node:crypto";

import type { ProtocolName } from "../config/config.js";
import { EntropyUnavailableError } from "../errors.js";
import type { CredentialBundleMap, Credentials, WireguardCredential } from "../storage/schema.js";

export type RandomSource = (size: number) => Buffer;

// DER prefixes wrapping a raw 32-byte X25519 key as PKCS#8 / SPKI
const X25519_PKCS8_PREFIX = Buffer.from("302e020100300506032b656e04220420", "hex");
const X25519_SPKI_PREFIX = Buffer.from("302a300506032b656e032100", "hex");

const IDENTIFIER_BYTES = 16; // 128 bits
const SECRET_BYTES = 32; // 256 bits

export function importWireguardPrivateKey(base64Key: string): KeyObject {
	return crypto.createPrivateKey({
		key: Buffer.concat([X25519_PKCS8_PREFIX, Buffer.from(base64Key, "base64")]),
		format: "der",
		type: "pkcs8",
	});
}

export function importWireguardPublicKey(base64Key: string): KeyObject {
	return crypto.createPublicKey({
		key: Buffer.concat([X25519_SPKI_PREFIX, Buffer.from(base64Key, "base64")]),
		format: "der",
		type: "spki",
	});
}

export function deriveWireguardPublicKey(base64PrivateKey: string): string {
	const spki = crypto
		.createPublicKey(importWireguardPrivateKey(base64PrivateKey))
		.export({ format: "der", type: "spki" });
	return spki.subarray(spki.length - 32).toString("base64");
}

export class CredentialGenerator {
	private readonly factories: { [P in ProtocolName]: () => CredentialBundleMap[P] } = {
		xray: () => ({ id: this.identifier() }),
		trojan: () => ({ password: this.secret() }),
		singbox: () => ({
			shadowtlsPassword: this.secret(),
			hysteria2Password: this.secret(),
			tuicId: this.identifier(),
			tuicPassword: this.secret(),
		}),
		wireguard: () => this.wireguardKeyPair(),
	};

	constructor(private readonly random: RandomSource = crypto.randomBytes) {}

	generate<P extends ProtocolName>(protocol: P): CredentialBundleMap[P] {
		return this.factories[protocol]();
	}

	generateAll(protocols: readonly ProtocolName[]): Credentials {
		const wanted = new Set(protocols);
		return {
			...(wanted.has("xray") ? { xray: this.generate("xray") } : {}),
			...(wanted.has("trojan") ? { trojan: this.generate("trojan") } : {}),
			...(wanted.has("singbox") ? { singbox: this.generate("singbox") } : {}),
			...(wanted.has("wireguard") ? { wireguard: this.generate("wireguard") } : {}),
		};
	}

	/**
	 * 128 random bits laid out as a UUID string. Unlike a v4 UUID no bits are
	 * spent on version or variant markers.
	 */
	identifier(): string {
		const hex = this.bytes(IDENTIFIER_BYTES).toString("hex");
		return [hex.slice(0, 8), hex.slice(8, 12), hex.slice(12, 16), hex.slice(16, 20), hex.slice(20)].join(
			"-",
		);
	}

	/** 256 random bits, base64url without padding. */
	secret(): string {
		return this.bytes(SECRET_BYTES).toString("base64url");
	}

	/** X25519 key pair in WireGuard's base64 encoding, private key clamped like `wg genkey`. */
	wireguardKeyPair(): WireguardCredential {
		const raw = Buffer.from(this.bytes(32));
		raw[0] &= 248;
		raw[31] = (raw[31] & 127) | 64;
		const privateKey = raw.toString("base64");
		return { privateKey, publicKey: deriveWireguardPublicKey(privateKey) };
	}

	private bytes(size: number): Buffer {
		let buf: Buffer;
		try {
			buf = this.random(size);
		} catch (err) {
			throw new EntropyUnavailableError("Platform random source is unavailable", { cause: err });
		}
		if (buf.length !== size) {
			throw new EntropyUnavailableError(
				`Random source returned ${buf.length} bytes, expected ${size}`,
			);
		}
		return buf;
	}
}
