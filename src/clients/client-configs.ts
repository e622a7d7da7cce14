/**
 * Per-user client material under clients/<username>/:
 *
 *   links.txt       share links for the proxy protocols
 *   wireguard.conf  wg-quick client config
 *
 * Only enabled protocols for which the user holds credentials appear. A
 * disabled user has no client directory.
 */

import fs from "node:fs";
import path from "node:path";

import { StorageError, WardenError } from "../errors.js";
import { formatErrorSafe } from "../infra/error-format.js";
import { getChildLogger } from "../logging.js";
import { wireguardPeerAddress } from "../render/wireguard.js";
import type { RecordStore } from "../storage/record-store.js";
import type { RecordsDocument, ServerSettings, UserRecord } from "../storage/schema.js";
import { errnoCode } from "../utils.js";

const logger = getChildLogger({ module: "client-configs" });

export const LINKS_FILE = "links.txt";
export const WIREGUARD_FILE = "wireguard.conf";

// websocket transports are published through the reverse proxy
const PUBLIC_TLS_PORT = 443;

function link(
	scheme: string,
	userinfo: string,
	settings: ServerSettings,
	port: number,
	params: Record<string, string>,
	label: string,
): string {
	const query = new URLSearchParams(params).toString();
	return `${scheme}://${userinfo}@${settings.domain}:${port}?${query}#${encodeURIComponent(label)}`;
}

export function buildClientLinks(user: UserRecord, settings: ServerSettings): string[] {
	const { domain, protocols } = settings;
	const { xray, trojan, singbox } = user.credentials;
	const links: string[] = [];

	if (protocols.xray.enabled && xray) {
		links.push(
			link(
				"vless",
				xray.id,
				settings,
				protocols.xray.visionPort,
				{ type: "tcp", security: "tls", flow: "xtls-rprx-vision", sni: domain, fp: "chrome" },
				`${user.username}-vision`,
			),
			link(
				"vless",
				xray.id,
				settings,
				PUBLIC_TLS_PORT,
				{ type: "ws", security: "tls", path: protocols.xray.wsPath, host: domain, sni: domain },
				`${user.username}-ws`,
			),
		);
	}

	if (protocols.trojan.enabled && trojan) {
		links.push(
			link(
				"trojan",
				encodeURIComponent(trojan.password),
				settings,
				PUBLIC_TLS_PORT,
				{ type: "ws", security: "tls", path: protocols.trojan.wsPath, host: domain, sni: domain },
				`${user.username}-trojan`,
			),
		);
	}

	if (protocols.singbox.enabled && singbox) {
		links.push(
			link(
				"hysteria2",
				encodeURIComponent(singbox.hysteria2Password),
				settings,
				protocols.singbox.hysteria2Port,
				{ sni: domain, obfs: "salamander", "obfs-password": protocols.singbox.obfsPassword },
				`${user.username}-hy2`,
			),
			link(
				"tuic",
				`${singbox.tuicId}:${encodeURIComponent(singbox.tuicPassword)}`,
				settings,
				protocols.singbox.tuicPort,
				{ congestion_control: "bbr", alpn: "h3", sni: domain },
				`${user.username}-tuic`,
			),
		);
	}

	return links;
}

/** A user whose client files could not be brought up to date; `null` stands for the clients directory. */
export type ClientSyncFailure = {
	username: string | null;
	error: WardenError;
};

function asSyncError(err: unknown): WardenError {
	if (err instanceof WardenError) return err;
	return new StorageError("IoFailure", formatErrorSafe(err), { cause: err });
}

export function buildWireguardClientConfig(user: UserRecord, settings: ServerSettings): string | null {
	const wireguard = settings.protocols.wireguard;
	const bundle = user.credentials.wireguard;
	if (!wireguard.enabled || !bundle) return null;

	return [
		"[Interface]",
		`PrivateKey = ${bundle.privateKey}`,
		`Address = ${wireguardPeerAddress(settings, user.slot)}/32`,
		`DNS = ${wireguard.dns.join(", ")}`,
		"",
		"[Peer]",
		`PublicKey = ${wireguard.serverPublicKey}`,
		`Endpoint = ${settings.domain}:${wireguard.port}`,
		"AllowedIPs = 0.0.0.0/0",
		`PersistentKeepalive = ${wireguard.persistentKeepalive}`,
		"",
	].join("\n");
}

export class ClientConfigWriter {
	constructor(private readonly store: RecordStore) {}

	userDir(username: string): string {
		return path.join(this.store.layout.clientsDir, username);
	}

	/** Bring one user's client files in line with the records. Returns the files now present. */
	async write(user: UserRecord, settings: ServerSettings): Promise<string[]> {
		const dir = this.userDir(user.username);
		if (!user.enabled) {
			await this.store.removeArtifactDir(dir);
			return [];
		}

		const files: string[] = [];
		const outputs: Array<[string, string | null]> = [
			[LINKS_FILE, this.linksContent(user, settings)],
			[WIREGUARD_FILE, buildWireguardClientConfig(user, settings)],
		];
		for (const [name, content] of outputs) {
			const target = path.join(dir, name);
			if (content === null) {
				await this.store.removeArtifact(target);
				continue;
			}
			await this.store.writeArtifact(target, content);
			files.push(target);
		}

		logger.debug({ username: user.username, files: files.length }, "client configs written");
		return files;
	}

	async remove(username: string): Promise<boolean> {
		return this.store.removeArtifactDir(this.userDir(username));
	}

	/**
	 * Rewrite every user's client files and drop directories of users that no
	 * longer exist. One user's failure does not stop the others; failures are
	 * returned, not thrown.
	 */
	async syncAll(document: RecordsDocument): Promise<ClientSyncFailure[]> {
		const failures: ClientSyncFailure[] = [];
		const attempt = async (username: string | null, fn: () => Promise<unknown>) => {
			try {
				await fn();
			} catch (err) {
				const error = asSyncError(err);
				logger.warn({ username, code: error.code, error: error.message }, "client config sync failed");
				failures.push({ username, error });
			}
		};

		for (const user of Object.values(document.users)) {
			await attempt(user.username, () => this.write(user, document.settings));
		}

		let entries: string[] = [];
		await attempt(null, async () => {
			try {
				entries = await fs.promises.readdir(this.store.layout.clientsDir);
			} catch (err) {
				if (errnoCode(err) !== "ENOENT") throw err;
			}
		});
		for (const name of entries) {
			if (!Object.hasOwn(document.users, name)) {
				logger.info({ username: name }, "removing client configs of deleted user");
				await attempt(name, () => this.remove(name));
			}
		}
		return failures;
	}

	private linksContent(user: UserRecord, settings: ServerSettings): string | null {
		const links = buildClientLinks(user, settings);
		return links.length > 0 ? `${links.join("\n")}\n` : null;
	}
}
