import { z } from "zod";

import type { ProtocolName } from "../config/config.js";
import { RenderError } from "../errors.js";
import { describeZodError, type ServerSettings, type UserRecord } from "../storage/schema.js";
import type { TemplateVariables } from "./template.js";

export type Transport = "tcp" | "udp";

/** A socket an engine binds, used to detect clashes across protocols. */
export type Listener = {
	protocol: ProtocolName;
	name: string;
	port: number;
	transport: Transport;
};

export type RenderedConfig = {
	protocol: ProtocolName;
	path: string;
	content: string;
};

/**
 * One engine's rendering rules. The set of variants is fixed; each one
 * knows its template and output file names, what variables the template can
 * use, and how to check the rendered result.
 */
export interface ProtocolVariant {
	readonly protocol: ProtocolName;
	readonly templateFile: string;
	readonly outputFile: string;
	/** Placed between per-user fragments. */
	readonly separator: string;
	readonly userFields: readonly string[];
	escape?(value: string): string;
	listeners(settings: ServerSettings): Listener[];
	variables(settings: ServerSettings): TemplateVariables;
	/** Per-user values, or null when the user has no credentials for this protocol. */
	userVariables(user: UserRecord, settings: ServerSettings): TemplateVariables | null;
	/** Throws RenderError when the output is unusable. */
	validate(content: string, settings: ServerSettings): void;
}

export const PortSchema = z.number().int().min(1).max(65_535);

export function commonVariables(settings: ServerSettings): Record<string, string> {
	return {
		DOMAIN: settings.domain,
		CERT_PATH: settings.tls.certificatePath,
		KEY_PATH: settings.tls.keyPath,
	};
}

export function escapeJsonString(value: string): string {
	return JSON.stringify(value).slice(1, -1);
}

/**
 * JSON syntax check followed by a structural check against `schema`.
 */
export function parseJsonOutput<T>(
	protocol: ProtocolName,
	content: string,
	schema: z.ZodType<T, z.ZodTypeDef, unknown>,
): T {
	let value: unknown;
	try {
		value = JSON.parse(content);
	} catch (err) {
		throw new RenderError(
			"InvalidTemplate",
			protocol,
			`rendered output is not valid JSON (${err instanceof Error ? err.message : String(err)})`,
		);
	}
	const result = schema.safeParse(value);
	if (!result.success) {
		throw new RenderError("SemanticConflict", protocol, describeZodError(result.error));
	}
	return result.data;
}

export function assertUnique(protocol: ProtocolName, values: readonly string[], what: string): void {
	const seen = new Set<string>();
	for (const value of values) {
		if (seen.has(value)) {
			throw new RenderError("SemanticConflict", protocol, `duplicate ${what}`);
		}
		seen.add(value);
	}
}
