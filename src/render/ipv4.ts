/**
 * IPv4 arithmetic for the WireGuard address pool. Addresses are handled as
 * unsigned 32-bit integers.
 */

import { Validator } from "ip-num";

export type Ipv4Cidr = {
	address: number;
	prefix: number;
};

export function parseIpv4(text: string): number | null {
	const [isValid] = Validator.isValidIPv4String(text);
	if (!isValid) return null;
	return text.split(".").reduce((value, octet) => value * 256 + Number(octet), 0);
}

export function formatIpv4(value: number): string {
	return [24, 16, 8, 0].map((shift) => (value >>> shift) & 255).join(".");
}

export function parseCidr(text: string): Ipv4Cidr | null {
	const [addressText, prefixText, ...rest] = text.split("/");
	if (rest.length > 0 || prefixText === undefined || !/^\d{1,2}$/.test(prefixText)) return null;
	const address = parseIpv4(addressText);
	const prefix = Number(prefixText);
	if (address === null || prefix > 32) return null;
	return { address, prefix };
}

export function networkOf(cidr: Ipv4Cidr): number {
	const mask = cidr.prefix === 0 ? 0 : (0xffffffff << (32 - cidr.prefix)) >>> 0;
	return (cidr.address & mask) >>> 0;
}

export function broadcastOf(cidr: Ipv4Cidr): number {
	const hostBits = 32 - cidr.prefix;
	return networkOf(cidr) + (hostBits === 32 ? 0xffffffff : 2 ** hostBits - 1);
}
