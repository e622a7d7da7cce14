import { describe, expect, it } from "vitest";

import { RenderError } from "../../src/errors.js";
import { broadcastOf, formatIpv4, networkOf, parseCidr, parseIpv4 } from "../../src/render/ipv4.js";
import { parseWireguardIni, wireguardPeerAddress, wireguardVariant } from "../../src/render/wireguard.js";
import { applySettingsPatch } from "../../src/storage/settings.js";
import { testSettings } from "../helpers.js";

const KEY_A = `${"A".repeat(43)}=`;
const KEY_B = `${"B".repeat(43)}=`;

function config(peers: string): string {
	return `[Interface]\nAddress = 10.13.13.1/24\nListenPort = 51820\nPrivateKey = ${KEY_A}\n${peers}`;
}

describe("ipv4 helpers", () => {
	it("parses and formats dotted quads", () => {
		expect(parseIpv4("10.13.13.1")).toBe(0x0a0d0d01);
		expect(formatIpv4(0x0a0d0d01)).toBe("10.13.13.1");
		expect(parseIpv4("256.1.1.1")).toBeNull();
		expect(parseIpv4("1.2.3")).toBeNull();
	});

	it("computes network and broadcast addresses", () => {
		const cidr = parseCidr("10.13.13.1/24");
		expect(cidr).toEqual({ address: 0x0a0d0d01, prefix: 24 });
		if (!cidr) return;
		expect(formatIpv4(networkOf(cidr))).toBe("10.13.13.0");
		expect(formatIpv4(broadcastOf(cidr))).toBe("10.13.13.255");
		expect(parseCidr("10.0.0.1/33")).toBeNull();
		expect(parseCidr("10.0.0.1")).toBeNull();
	});
});

describe("wireguardPeerAddress", () => {
	it("maps slots onto the interface network", () => {
		const settings = testSettings();
		expect(wireguardPeerAddress(settings, 1)).toBe("10.13.13.2");
		expect(wireguardPeerAddress(settings, 253)).toBe("10.13.13.254");
	});

	it("fails when the pool is exhausted", () => {
		const settings = testSettings();
		expect(() => wireguardPeerAddress(settings, 254)).toThrow(RenderError);
	});

	it("never hands out the interface address", () => {
		const settings = applySettingsPatch(testSettings(), { protocols: { wireguard: { address: "10.13.13.5/24" } } });
		expect(wireguardPeerAddress(settings, 3)).toBe("10.13.13.4");
		expect(() => wireguardPeerAddress(settings, 4)).toThrow("slot 4 maps onto the interface address 10.13.13.5");
	});
});

describe("wg-quick config checks", () => {
	const settings = testSettings();

	it("parses sections, entries and comments", () => {
		const sections = parseWireguardIni(config(`\n# alice\n[Peer]\nPublicKey = ${KEY_B}\nAllowedIPs = 10.13.13.2/32\n`));
		expect(sections.map((s) => s.name)).toEqual(["Interface", "Peer"]);
		expect(sections[1].line).toBe(7);
		expect(sections[1].entries.get("AllowedIPs")).toBe("10.13.13.2/32");
	});

	it("accepts an interface without peers", () => {
		expect(() => wireguardVariant.validate(config(""), settings)).not.toThrow();
	});

	it.each([
		["a stray line", config("garbage\n"), "InvalidTemplate"],
		["a peer without AllowedIPs", config(`[Peer]\nPublicKey = ${KEY_B}\n`), "SemanticConflict"],
		["a malformed key", config("[Peer]\nPublicKey = nope\nAllowedIPs = 10.13.13.2/32\n"), "SemanticConflict"],
		[
			"duplicate peers",
			config(
				`[Peer]\nPublicKey = ${KEY_B}\nAllowedIPs = 10.13.13.2/32\n[Peer]\nPublicKey = ${KEY_B}\nAllowedIPs = 10.13.13.3/32\n`,
			),
			"SemanticConflict",
		],
		["an out-of-range port", config("").replace("51820", "70000"), "SemanticConflict"],
		["a missing interface", `[Peer]\nPublicKey = ${KEY_B}\nAllowedIPs = 10.13.13.2/32\n`, "SemanticConflict"],
	])("rejects %s", (_label, content, code) => {
		let caught: unknown;
		try {
			wireguardVariant.validate(content, settings);
		} catch (err) {
			caught = err;
		}
		expect(caught).toBeInstanceOf(RenderError);
		expect(caught).toMatchObject({ code });
	});
});
