import type { ProtocolName } from "../config/config.js";
import { singboxVariant } from "./singbox.js";
import { trojanVariant } from "./trojan.js";
import type { ProtocolVariant } from "./types.js";
import { wireguardVariant } from "./wireguard.js";
import { xrayVariant } from "./xray.js";

export const VARIANTS: Readonly<Record<ProtocolName, ProtocolVariant>> = {
	xray: xrayVariant,
	trojan: trojanVariant,
	singbox: singboxVariant,
	wireguard: wireguardVariant,
};
