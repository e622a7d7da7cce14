/**
 * Renders engine configurations from templates and the records document.
 *
 * Rendering is pure: the same settings, users and template give the same
 * bytes. Each protocol is rendered, checked and written on its own, so a
 * broken template, a port clash or an unwritable target fails that protocol
 * only. Only output that passed
 * its checks is written, atomically and under the target's lock.
 */

import fs from "node:fs";
import path from "node:path";

import { PROTOCOL_NAMES, type ProtocolName } from "../config/config.js";
import { RenderError, StorageError, WardenError } from "../errors.js";
import { formatErrorSafe } from "../infra/error-format.js";
import { getChildLogger } from "../logging.js";
import { configTargetFor } from "../storage/layout.js";
import type { RecordStore } from "../storage/record-store.js";
import type { RecordsDocument, ServerSettings, UserRecord } from "../storage/schema.js";
import { errnoCode } from "../utils.js";
import { renderTemplate, TemplateError, type TemplateVariables } from "./template.js";
import type { Listener, RenderedConfig } from "./types.js";
import { VARIANTS } from "./variants.js";

const logger = getChildLogger({ module: "renderer" });

export type RenderOutcome =
	| { protocol: ProtocolName; status: "rendered"; config: RenderedConfig; changed: boolean }
	| { protocol: ProtocolName; status: "failed"; error: WardenError }
	| { protocol: ProtocolName; status: "skipped"; reason: "disabled" };

/** Enabled users in username order. */
export function activeUsers(users: Iterable<UserRecord>): UserRecord[] {
	return [...users]
		.filter((user) => user.enabled)
		.sort((a, b) => (a.username < b.username ? -1 : a.username > b.username ? 1 : 0));
}

export function enabledListeners(settings: ServerSettings): Listener[] {
	return PROTOCOL_NAMES.filter((protocol) => settings.protocols[protocol].enabled).flatMap((protocol) =>
		VARIANTS[protocol].listeners(settings),
	);
}

/**
 * Fail `protocol` when one of its sockets is also bound by another listener
 * (same port and transport) of any enabled protocol, itself included.
 */
export function assertNoListenerConflicts(protocol: ProtocolName, settings: ServerSettings): void {
	const all = enabledListeners(settings);
	const own = VARIANTS[protocol].listeners(settings);
	for (const listener of own) {
		const clash = all.find(
			(other) =>
				other.port === listener.port &&
				other.transport === listener.transport &&
				(other.protocol !== listener.protocol || other.name !== listener.name),
		);
		if (clash) {
			throw new RenderError(
				"SemanticConflict",
				protocol,
				`${listener.name} and ${clash.protocol}/${clash.name} both listen on ${listener.port}/${listener.transport}`,
			);
		}
	}
}

function asOutcomeError(protocol: ProtocolName, err: unknown): WardenError {
	if (err instanceof WardenError) return err;
	return new StorageError("IoFailure", `${protocol}: ${formatErrorSafe(err)}`, { cause: err });
}

export class ConfigRenderer {
	constructor(private readonly store: RecordStore) {}

	templatePath(protocol: ProtocolName): string {
		return path.join(this.store.layout.templatesDir, VARIANTS[protocol].templateFile);
	}

	outputPath(protocol: ProtocolName): string {
		return configTargetFor(this.store.layout, protocol, VARIANTS[protocol].outputFile);
	}

	async loadTemplate(protocol: ProtocolName): Promise<string> {
		const file = this.templatePath(protocol);
		try {
			return await fs.promises.readFile(file, "utf8");
		} catch (err) {
			if (errnoCode(err) === "ENOENT") {
				throw new RenderError("TemplateMissing", protocol, `template ${file} does not exist`);
			}
			throw err;
		}
	}

	/**
	 * Expand and check one protocol's template. `users` is filtered to active
	 * users carrying this protocol's credentials.
	 */
	renderFromTemplate(
		protocol: ProtocolName,
		template: string,
		settings: ServerSettings,
		users: readonly UserRecord[],
	): RenderedConfig {
		const variant = VARIANTS[protocol];
		assertNoListenerConflicts(protocol, settings);

		const userVars: TemplateVariables[] = [];
		for (const user of activeUsers(users)) {
			const vars = variant.userVariables(user, settings);
			if (vars) userVars.push(vars);
		}

		let content: string;
		try {
			content = renderTemplate(template, {
				variables: variant.variables(settings),
				users: userVars,
				userFields: variant.userFields,
				separator: variant.separator,
				escape: variant.escape,
			});
		} catch (err) {
			if (err instanceof TemplateError) {
				throw new RenderError("InvalidTemplate", protocol, err.message, { cause: err });
			}
			throw err;
		}

		variant.validate(content, settings);
		return { protocol, path: this.outputPath(protocol), content };
	}

	async render(
		protocol: ProtocolName,
		settings: ServerSettings,
		users: readonly UserRecord[],
	): Promise<RenderedConfig> {
		const template = await this.loadTemplate(protocol);
		return this.renderFromTemplate(protocol, template, settings, users);
	}

	/**
	 * Render every enabled protocol (or the given subset) from one consistent
	 * read of the records document and write the ones that pass. Disabled
	 * protocols are reported as skipped; their previous output is left as is.
	 */
	async renderAll(
		options: { protocols?: readonly ProtocolName[]; document?: RecordsDocument } = {},
	): Promise<RenderOutcome[]> {
		const document = options.document ?? (await this.store.load()).document;
		const { settings } = document;
		const users = Object.values(document.users);
		const outcomes: RenderOutcome[] = [];

		for (const protocol of options.protocols ?? PROTOCOL_NAMES) {
			if (!settings.protocols[protocol].enabled) {
				outcomes.push({ protocol, status: "skipped", reason: "disabled" });
				continue;
			}

			try {
				const config = await this.render(protocol, settings, users);
				const changed = await this.write(config);
				logger.info({ protocol, path: config.path, changed }, "config rendered");
				outcomes.push({ protocol, status: "rendered", config, changed });
			} catch (err) {
				const error = asOutcomeError(protocol, err);
				logger.warn({ protocol, code: error.code, error: error.message }, "render failed");
				outcomes.push({ protocol, status: "failed", error });
			}
		}
		return outcomes;
	}

	/** Returns false when the live file already has this content. */
	private async write(config: RenderedConfig): Promise<boolean> {
		try {
			const current = await fs.promises.readFile(config.path, "utf8");
			if (current === config.content) return false;
		} catch (err) {
			if (errnoCode(err) !== "ENOENT") throw err;
		}
		await this.store.writeArtifact(config.path, config.content);
		return true;
	}
}
