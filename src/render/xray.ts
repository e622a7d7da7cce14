import { z } from "zod";

import {
	assertUnique,
	commonVariables,
	escapeJsonString,
	parseJsonOutput,
	PortSchema,
	type ProtocolVariant,
} from "./types.js";

const XrayOutputSchema = z
	.object({
		inbounds: z
			.array(
				z
					.object({
						tag: z.string().min(1),
						port: PortSchema,
						protocol: z.string().min(1),
						settings: z
							.object({
								clients: z.array(z.object({ id: z.string().min(1) }).passthrough()),
							})
							.passthrough(),
					})
					.passthrough(),
			)
			.min(1),
		outbounds: z.array(z.unknown()).min(1),
	})
	.passthrough();

/** VLESS with XTLS-Vision on TCP, plus VLESS over websocket behind the reverse proxy. */
export const xrayVariant: ProtocolVariant = {
	protocol: "xray",
	templateFile: "xray.template.json",
	outputFile: "config.json",
	separator: ",\n",
	userFields: ["NAME", "ID", "EMAIL"],
	escape: escapeJsonString,

	listeners(settings) {
		const { visionPort, wsPort } = settings.protocols.xray;
		return [
			{ protocol: "xray", name: "vision", port: visionPort, transport: "tcp" },
			{ protocol: "xray", name: "websocket", port: wsPort, transport: "tcp" },
		];
	},

	variables(settings) {
		const { visionPort, wsPort, wsPath } = settings.protocols.xray;
		return {
			...commonVariables(settings),
			VISION_PORT: String(visionPort),
			WS_PORT: String(wsPort),
			WS_PATH: wsPath,
		};
	},

	userVariables(user, settings) {
		const bundle = user.credentials.xray;
		if (!bundle) return null;
		return { NAME: user.username, ID: bundle.id, EMAIL: `${user.username}@${settings.domain}` };
	},

	validate(content) {
		const config = parseJsonOutput("xray", content, XrayOutputSchema);
		assertUnique(
			"xray",
			config.inbounds.map((inbound) => inbound.tag),
			"inbound tag",
		);
		for (const inbound of config.inbounds) {
			assertUnique(
				"xray",
				inbound.settings.clients.map((client) => client.id),
				`client id in inbound "${inbound.tag}"`,
			);
		}
	},
};
