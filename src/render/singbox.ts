import { z } from "zod";

import {
	assertUnique,
	commonVariables,
	escapeJsonString,
	parseJsonOutput,
	PortSchema,
	type ProtocolVariant,
} from "./types.js";

const SingboxUserSchema = z
	.object({
		name: z.string().min(1),
		password: z.string().min(1).optional(),
		uuid: z.string().min(1).optional(),
	})
	.passthrough()
	.refine((user) => user.password !== undefined || user.uuid !== undefined, {
		message: "user needs a password or uuid",
	});

const SingboxOutputSchema = z
	.object({
		inbounds: z
			.array(
				z
					.object({
						type: z.string().min(1),
						tag: z.string().min(1),
						listen_port: PortSchema,
						users: z.array(SingboxUserSchema).optional(),
					})
					.passthrough(),
			)
			.min(1),
	})
	.passthrough();

/** ShadowTLS v3 (TCP), Hysteria2 with salamander obfuscation (UDP) and TUIC v5 (UDP). */
export const singboxVariant: ProtocolVariant = {
	protocol: "singbox",
	templateFile: "singbox.template.json",
	outputFile: "config.json",
	separator: ",\n",
	userFields: ["NAME", "SHADOWTLS_PASSWORD", "HYSTERIA2_PASSWORD", "TUIC_ID", "TUIC_PASSWORD"],
	escape: escapeJsonString,

	listeners(settings) {
		const { shadowtlsPort, hysteria2Port, tuicPort } = settings.protocols.singbox;
		return [
			{ protocol: "singbox", name: "shadowtls", port: shadowtlsPort, transport: "tcp" },
			{ protocol: "singbox", name: "hysteria2", port: hysteria2Port, transport: "udp" },
			{ protocol: "singbox", name: "tuic", port: tuicPort, transport: "udp" },
		];
	},

	variables(settings) {
		const singbox = settings.protocols.singbox;
		return {
			...commonVariables(settings),
			SHADOWTLS_PORT: String(singbox.shadowtlsPort),
			HYSTERIA2_PORT: String(singbox.hysteria2Port),
			TUIC_PORT: String(singbox.tuicPort),
			HANDSHAKE_SERVER: singbox.handshakeServer,
			OBFS_PASSWORD: singbox.obfsPassword,
		};
	},

	userVariables(user) {
		const bundle = user.credentials.singbox;
		if (!bundle) return null;
		return {
			NAME: user.username,
			SHADOWTLS_PASSWORD: bundle.shadowtlsPassword,
			HYSTERIA2_PASSWORD: bundle.hysteria2Password,
			TUIC_ID: bundle.tuicId,
			TUIC_PASSWORD: bundle.tuicPassword,
		};
	},

	validate(content) {
		const config = parseJsonOutput("singbox", content, SingboxOutputSchema);
		assertUnique(
			"singbox",
			config.inbounds.map((inbound) => inbound.tag),
			"inbound tag",
		);
		for (const inbound of config.inbounds) {
			const users = inbound.users ?? [];
			assertUnique(
				"singbox",
				users.map((user) => user.name),
				`user name in inbound "${inbound.tag}"`,
			);
			assertUnique(
				"singbox",
				users.map((user) => user.uuid ?? user.password ?? ""),
				`client credential in inbound "${inbound.tag}"`,
			);
		}
	},
};
