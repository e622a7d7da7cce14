/**
 * Records document schema: server settings plus user records, validated with
 * zod on every read and before every write.
 */

import { Validator } from "ip-num";
import { z } from "zod";

import type { ProtocolName } from "../config/config.js";
import { DOMAIN_PATTERN } from "../env.js";

export const SCHEMA_VERSION = 1;

export const USERNAME_PATTERN = /^[A-Za-z0-9_-]{3,32}$/;

const IdentifierSchema = z
	.string()
	.regex(/^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/, "Expected a UUID-shaped id");
// base64url without padding, at least 128 bits
const SecretSchema = z.string().regex(/^[A-Za-z0-9_-]{22,}$/, "Expected a base64url secret");
// 32 raw bytes, standard base64
const WireguardKeySchema = z.string().regex(/^[A-Za-z0-9+/]{43}=$/, "Expected a WireGuard key");

// ═══════════════════════════════════════════════════════════════════════════════
// Credential bundles
// ═══════════════════════════════════════════════════════════════════════════════

export const XrayCredentialSchema = z.object({ id: IdentifierSchema }).strict();
export const TrojanCredentialSchema = z.object({ password: SecretSchema }).strict();
export const SingboxCredentialSchema = z
	.object({
		shadowtlsPassword: SecretSchema,
		hysteria2Password: SecretSchema,
		tuicId: IdentifierSchema,
		tuicPassword: SecretSchema,
	})
	.strict();
export const WireguardCredentialSchema = z
	.object({ privateKey: WireguardKeySchema, publicKey: WireguardKeySchema })
	.strict();

export type XrayCredential = z.infer<typeof XrayCredentialSchema>;
export type TrojanCredential = z.infer<typeof TrojanCredentialSchema>;
export type SingboxCredential = z.infer<typeof SingboxCredentialSchema>;
export type WireguardCredential = z.infer<typeof WireguardCredentialSchema>;

export type CredentialBundleMap = {
	xray: XrayCredential;
	trojan: TrojanCredential;
	singbox: SingboxCredential;
	wireguard: WireguardCredential;
};

export type CredentialBundle = CredentialBundleMap[ProtocolName];

export const CredentialsSchema = z
	.object({
		xray: XrayCredentialSchema.optional(),
		trojan: TrojanCredentialSchema.optional(),
		singbox: SingboxCredentialSchema.optional(),
		wireguard: WireguardCredentialSchema.optional(),
	})
	.strict();

export type Credentials = z.infer<typeof CredentialsSchema>;

// ═══════════════════════════════════════════════════════════════════════════════
// User records
// ═══════════════════════════════════════════════════════════════════════════════

export const UserRecordSchema = z.object({
	username: z.string().regex(USERNAME_PATTERN),
	createdAt: z.string().datetime(),
	lastSeenAt: z.string().datetime().nullable(),
	enabled: z.boolean(),
	slot: z.number().int().positive(),
	credentials: CredentialsSchema,
});

export type UserRecord = z.infer<typeof UserRecordSchema>;

// ═══════════════════════════════════════════════════════════════════════════════
// Server settings
// ═══════════════════════════════════════════════════════════════════════════════

const PortSchema = z.number().int().min(1).max(65_535);
const UrlPathSchema = z.string().regex(/^\/[A-Za-z0-9._~/-]*$/, "Expected an absolute URL path");
const Ipv4CidrSchema = z
	.string()
	.regex(/^(\d{1,3})\.(\d{1,3})\.(\d{1,3})\.(\d{1,3})\/(\d{1,2})$/, "Expected IPv4 CIDR notation");
const HostSchema = z.string().regex(DOMAIN_PATTERN, "Invalid host name");
const FilePathSchema = z.string().regex(/^\/[A-Za-z0-9._/-]+$/, "Expected an absolute file path");

export const XraySettingsSchema = z.object({
	enabled: z.boolean(),
	visionPort: PortSchema,
	wsPort: PortSchema,
	wsPath: UrlPathSchema,
});

export const TrojanSettingsSchema = z.object({
	enabled: z.boolean(),
	port: PortSchema,
	wsPath: UrlPathSchema,
});

export const SingboxSettingsSchema = z.object({
	enabled: z.boolean(),
	shadowtlsPort: PortSchema,
	hysteria2Port: PortSchema,
	tuicPort: PortSchema,
	handshakeServer: HostSchema,
	// server-wide salamander obfuscation for hysteria2
	obfsPassword: SecretSchema,
});

export const WireguardSettingsSchema = z.object({
	enabled: z.boolean(),
	port: PortSchema,
	address: Ipv4CidrSchema,
	dns: z.array(z.string().refine((value) => Validator.isValidIPv4String(value)[0], "Expected an IPv4 address")).min(1),
	persistentKeepalive: z.number().int().min(0).max(65_535),
	serverPrivateKey: WireguardKeySchema,
	serverPublicKey: WireguardKeySchema,
});

export const TlsSettingsSchema = z.object({
	certificatePath: FilePathSchema,
	keyPath: FilePathSchema,
});

export const ServerSettingsSchema = z.object({
	domain: HostSchema,
	tls: TlsSettingsSchema,
	protocols: z.object({
		xray: XraySettingsSchema,
		trojan: TrojanSettingsSchema,
		singbox: SingboxSettingsSchema,
		wireguard: WireguardSettingsSchema,
	}),
});

export type ServerSettings = z.infer<typeof ServerSettingsSchema>;
export type ProtocolSettingsMap = ServerSettings["protocols"];

export type SettingsPatch = {
	domain?: string;
	tls?: Partial<ServerSettings["tls"]>;
	protocols?: { [P in ProtocolName]?: Partial<ProtocolSettingsMap[P]> };
};

// ═══════════════════════════════════════════════════════════════════════════════
// Document
// ═══════════════════════════════════════════════════════════════════════════════

export const RecordsDocumentSchema = z
	.object({
		schemaVersion: z.literal(SCHEMA_VERSION),
		updatedAt: z.string().datetime(),
		settings: ServerSettingsSchema,
		users: z.record(z.string(), UserRecordSchema),
	})
	.superRefine((doc, ctx) => {
		const slots = new Set<number>();
		for (const [key, record] of Object.entries(doc.users)) {
			if (key !== record.username) {
				ctx.addIssue({
					code: z.ZodIssueCode.custom,
					path: ["users", key],
					message: `Key does not match username "${record.username}"`,
				});
			}
			if (slots.has(record.slot)) {
				ctx.addIssue({
					code: z.ZodIssueCode.custom,
					path: ["users", key, "slot"],
					message: `Slot ${record.slot} is assigned twice`,
				});
			}
			slots.add(record.slot);
		}
	});

export type RecordsDocument = z.infer<typeof RecordsDocumentSchema>;

export function describeZodError(err: z.ZodError): string {
	return err.issues
		.map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
		.join("; ");
}
