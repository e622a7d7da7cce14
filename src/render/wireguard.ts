import { RenderError } from "../errors.js";
import type { ServerSettings } from "../storage/schema.js";
import { broadcastOf, formatIpv4, networkOf, parseCidr } from "./ipv4.js";
import { assertUnique, type ProtocolVariant } from "./types.js";

export type IniSection = {
	name: string;
	line: number;
	entries: Map<string, string>;
};

const KEY_PATTERN = /^[A-Za-z0-9+/]{43}=$/;

/**
 * Parse wg-quick style INI: `[Section]` headers, `Key = Value` lines, `#`
 * comments. Keys are case-sensitive as wg-quick reads them.
 */
export function parseWireguardIni(content: string): IniSection[] {
	const sections: IniSection[] = [];
	const lines = content.split(/\r?\n/);

	for (const [index, rawLine] of lines.entries()) {
		const lineNo = index + 1;
		const line = rawLine.trim();
		if (line === "" || line.startsWith("#") || line.startsWith(";")) continue;

		const header = /^\[([A-Za-z]+)\]$/.exec(line);
		if (header) {
			sections.push({ name: header[1], line: lineNo, entries: new Map() });
			continue;
		}

		const entry = /^([A-Za-z][A-Za-z0-9]*)\s*=\s*(.*)$/.exec(line);
		const current = sections.at(-1);
		if (!entry || !current) {
			throw new RenderError("InvalidTemplate", "wireguard", `line ${lineNo} is not valid INI: "${line}"`);
		}
		const [, key, value] = entry;
		if (current.entries.has(key)) {
			throw new RenderError("SemanticConflict", "wireguard", `duplicate ${key} at line ${lineNo}`);
		}
		current.entries.set(key, value.trim());
	}
	return sections;
}

function required(section: IniSection, key: string): string {
	const value = section.entries.get(key);
	if (value === undefined || value === "") {
		throw new RenderError(
			"SemanticConflict",
			"wireguard",
			`[${section.name}] at line ${section.line} is missing ${key}`,
		);
	}
	return value;
}

/**
 * Tunnel address for the peer in `slot`: the interface network's base plus
 * slot + 1, so slot 1 of 10.13.13.1/24 is 10.13.13.2. Stable for the
 * lifetime of the user.
 */
export function wireguardPeerAddress(settings: ServerSettings, slot: number): string {
	const cidr = parseCidr(settings.protocols.wireguard.address);
	if (!cidr) {
		throw new RenderError(
			"SemanticConflict",
			"wireguard",
			`interface address "${settings.protocols.wireguard.address}" is not IPv4 CIDR`,
		);
	}
	const host = networkOf(cidr) + slot + 1;
	if (host >= broadcastOf(cidr)) {
		throw new RenderError(
			"SemanticConflict",
			"wireguard",
			`address pool ${settings.protocols.wireguard.address} has no room for slot ${slot}`,
		);
	}
	if (host === cidr.address) {
		throw new RenderError(
			"SemanticConflict",
			"wireguard",
			`slot ${slot} maps onto the interface address ${formatIpv4(host)}`,
		);
	}
	return formatIpv4(host);
}

export const wireguardVariant: ProtocolVariant = {
	protocol: "wireguard",
	templateFile: "wireguard.template.conf",
	outputFile: "wg0.conf",
	// each peer fragment starts with its own blank line
	separator: "",
	userFields: ["NAME", "PUBLIC_KEY", "PEER_ADDRESS"],

	listeners(settings) {
		return [{ protocol: "wireguard", name: "tunnel", port: settings.protocols.wireguard.port, transport: "udp" }];
	},

	variables(settings) {
		const wireguard = settings.protocols.wireguard;
		return {
			DOMAIN: settings.domain,
			PORT: String(wireguard.port),
			ADDRESS: wireguard.address,
			PRIVATE_KEY: wireguard.serverPrivateKey,
		};
	},

	userVariables(user, settings) {
		const bundle = user.credentials.wireguard;
		if (!bundle) return null;
		return {
			NAME: user.username,
			PUBLIC_KEY: bundle.publicKey,
			PEER_ADDRESS: `${wireguardPeerAddress(settings, user.slot)}/32`,
		};
	},

	validate(content) {
		const sections = parseWireguardIni(content);
		const interfaces = sections.filter((section) => section.name === "Interface");
		if (interfaces.length !== 1 || sections[0]?.name !== "Interface") {
			throw new RenderError("SemanticConflict", "wireguard", "expected exactly one leading [Interface]");
		}
		const [iface] = interfaces;

		const port = Number(required(iface, "ListenPort"));
		if (!Number.isInteger(port) || port < 1 || port > 65_535) {
			throw new RenderError("SemanticConflict", "wireguard", `ListenPort ${port} is out of range`);
		}
		if (!parseCidr(required(iface, "Address"))) {
			throw new RenderError("SemanticConflict", "wireguard", "Address is not IPv4 CIDR notation");
		}
		if (!KEY_PATTERN.test(required(iface, "PrivateKey"))) {
			throw new RenderError("SemanticConflict", "wireguard", "PrivateKey is not a WireGuard key");
		}

		const peers = sections.filter((section) => section.name === "Peer");
		if (peers.length + 1 !== sections.length) {
			throw new RenderError("SemanticConflict", "wireguard", "only [Interface] and [Peer] sections are allowed");
		}
		for (const peer of peers) {
			if (!KEY_PATTERN.test(required(peer, "PublicKey"))) {
				throw new RenderError(
					"SemanticConflict",
					"wireguard",
					`[Peer] at line ${peer.line} has an invalid PublicKey`,
				);
			}
			required(peer, "AllowedIPs");
		}
		assertUnique(
			"wireguard",
			peers.map((peer) => required(peer, "PublicKey")),
			"peer PublicKey",
		);
		assertUnique(
			"wireguard",
			peers.map((peer) => required(peer, "AllowedIPs")),
			"peer AllowedIPs",
		);
	},
};
