import JSON5 from "json5";
import type { z } from "zod";

import { type CredentialGenerator, deriveWireguardPublicKey } from "../credentials/generator.js";
import { ValidationError } from "../errors.js";
import {
	describeZodError,
	type ServerSettings,
	ServerSettingsSchema,
	SingboxSettingsSchema,
	type SettingsPatch,
	TlsSettingsSchema,
	TrojanSettingsSchema,
	WireguardSettingsSchema,
	XraySettingsSchema,
} from "./schema.js";

/**
 * Initial settings for a fresh deployment. Every protocol starts enabled on
 * its own internal port; TLS terminates at the external reverse proxy for
 * the websocket transports.
 */
export function createDefaultSettings(domain: string, generator: CredentialGenerator): ServerSettings {
	const wireguardServer = generator.wireguardKeyPair();
	return parseSettings({
		domain,
		tls: {
			certificatePath: "/etc/proxy-warden/tls/fullchain.pem",
			keyPath: "/etc/proxy-warden/tls/privkey.pem",
		},
		protocols: {
			xray: {
				enabled: true,
				visionPort: 8443,
				wsPort: 10001,
				wsPath: "/cdn/assets/js/analytics.min.js",
			},
			trojan: {
				enabled: true,
				port: 10002,
				wsPath: "/api/v1/files/sync",
			},
			singbox: {
				enabled: true,
				shadowtlsPort: 8444,
				hysteria2Port: 8445,
				tuicPort: 8446,
				handshakeServer: "www.microsoft.com",
				obfsPassword: generator.secret(),
			},
			wireguard: {
				enabled: true,
				port: 51820,
				address: "10.13.13.1/24",
				dns: ["1.1.1.1", "8.8.8.8"],
				persistentKeepalive: 25,
				serverPrivateKey: wireguardServer.privateKey,
				serverPublicKey: wireguardServer.publicKey,
			},
		},
	});
}

export function parseSettings(value: unknown): ServerSettings {
	const result = ServerSettingsSchema.safeParse(value);
	if (!result.success) {
		throw new ValidationError("InvalidSettings", `Invalid settings: ${describeZodError(result.error)}`);
	}
	return result.data;
}

/**
 * Merge a partial update into the current settings and validate the result.
 * The input is not modified. The WireGuard server public key always follows
 * the private key: it is derived when only the private key is patched, and a
 * patched public key that does not match is rejected.
 */
export function applySettingsPatch(current: ServerSettings, patch: SettingsPatch): ServerSettings {
	const protocols = patch.protocols ?? {};
	const merged = parseSettings({
		domain: patch.domain ?? current.domain,
		tls: { ...current.tls, ...patch.tls },
		protocols: {
			xray: { ...current.protocols.xray, ...protocols.xray },
			trojan: { ...current.protocols.trojan, ...protocols.trojan },
			singbox: { ...current.protocols.singbox, ...protocols.singbox },
			wireguard: { ...current.protocols.wireguard, ...protocols.wireguard },
		},
	});

	const keys = protocols.wireguard;
	if (!keys || (keys.serverPrivateKey === undefined && keys.serverPublicKey === undefined)) {
		return merged;
	}
	const wireguard = merged.protocols.wireguard;
	const derived = deriveWireguardPublicKey(wireguard.serverPrivateKey);
	if (keys.serverPublicKey !== undefined && keys.serverPublicKey !== derived) {
		throw new ValidationError(
			"InvalidSettings",
			"Invalid settings: wireguard.serverPublicKey does not belong to wireguard.serverPrivateKey",
		);
	}
	return { ...merged, protocols: { ...merged.protocols, wireguard: { ...wireguard, serverPublicKey: derived } } };
}

/** Sections `settings set` accepts as `<section>.<field>`. */
const SECTION_SCHEMAS = {
	tls: TlsSettingsSchema,
	xray: XraySettingsSchema,
	trojan: TrojanSettingsSchema,
	singbox: SingboxSettingsSchema,
	wireguard: WireguardSettingsSchema,
} as const;

type Section = keyof typeof SECTION_SCHEMAS;

function isSection(value: string): value is Section {
	return Object.hasOwn(SECTION_SCHEMAS, value);
}

/** JSON5 literal if it parses (numbers, booleans, arrays), the raw text otherwise. */
function coerceValue(raw: string): unknown {
	try {
		return JSON5.parse(raw);
	} catch {
		return raw;
	}
}

function parseField<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, key: string, field: string, raw: string): T {
	const result = schema.safeParse({ [field]: coerceValue(raw) });
	if (!result.success) {
		throw new ValidationError("InvalidSettings", `Invalid value for ${key}: ${describeZodError(result.error)}`);
	}
	return result.data;
}

/**
 * Turn a `key value` pair such as `xray.visionPort 9443` into a settings
 * patch. Only the one field is checked here; the merged settings are
 * validated again when the patch is applied.
 */
export function parseSettingsAssignment(key: string, raw: string): SettingsPatch {
	if (key === "domain") {
		return { domain: raw };
	}

	const [section, field, ...rest] = key.split(".");
	if (
		section === undefined ||
		field === undefined ||
		rest.length > 0 ||
		!isSection(section) ||
		!Object.hasOwn(SECTION_SCHEMAS[section].shape, field)
	) {
		throw new ValidationError("InvalidSettings", `Unknown setting "${key}"`);
	}

	switch (section) {
		case "tls":
			return { tls: parseField(TlsSettingsSchema.partial(), key, field, raw) };
		case "xray":
			return { protocols: { xray: parseField(XraySettingsSchema.partial(), key, field, raw) } };
		case "trojan":
			return { protocols: { trojan: parseField(TrojanSettingsSchema.partial(), key, field, raw) } };
		case "singbox":
			return { protocols: { singbox: parseField(SingboxSettingsSchema.partial(), key, field, raw) } };
		case "wireguard":
			return { protocols: { wireguard: parseField(WireguardSettingsSchema.partial(), key, field, raw) } };
	}
}
