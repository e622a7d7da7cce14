import { z } from "zod";

import {
	assertUnique,
	commonVariables,
	escapeJsonString,
	parseJsonOutput,
	PortSchema,
	type ProtocolVariant,
} from "./types.js";

const TrojanOutputSchema = z
	.object({
		run_type: z.literal("server"),
		local_port: PortSchema,
		// may be empty: an engine with no users still has to start
		password: z.array(z.string().min(1)),
		ssl: z.object({ cert: z.string().min(1), key: z.string().min(1) }).passthrough(),
		websocket: z
			.object({ enabled: z.boolean(), path: z.string().startsWith("/") })
			.passthrough()
			.optional(),
	})
	.passthrough();

export const trojanVariant: ProtocolVariant = {
	protocol: "trojan",
	templateFile: "trojan.template.json",
	outputFile: "config.json",
	separator: ",\n",
	userFields: ["NAME", "PASSWORD"],
	escape: escapeJsonString,

	listeners(settings) {
		return [{ protocol: "trojan", name: "websocket", port: settings.protocols.trojan.port, transport: "tcp" }];
	},

	variables(settings) {
		const { port, wsPath } = settings.protocols.trojan;
		return { ...commonVariables(settings), PORT: String(port), WS_PATH: wsPath };
	},

	userVariables(user) {
		const bundle = user.credentials.trojan;
		return bundle ? { NAME: user.username, PASSWORD: bundle.password } : null;
	},

	validate(content) {
		const config = parseJsonOutput("trojan", content, TrojanOutputSchema);
		assertUnique("trojan", config.password, "password");
	},
};
