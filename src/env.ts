import path from "node:path";
import { z } from "zod";
import { DEFAULT_DATA_DIR } from "./utils.js";

export const DOMAIN_PATTERN = /^(?=.{1,253}$)(?!-)[A-Za-z0-9-]{1,63}(?<!-)(\.(?!-)[A-Za-z0-9-]{1,63}(?<!-))*$/;

const WardenEnvSchema = z.object({
	dataDir: z.string().min(1),
	domain: z.string().regex(DOMAIN_PATTERN, "Invalid domain name").optional(),
});

export type WardenEnv = Readonly<z.infer<typeof WardenEnvSchema>>;

let cachedEnv: WardenEnv | null = null;

/**
 * Read the process-level environment once.
 *
 * PROXY_WARDEN_DATA_DIR - base directory for records, configs and backups
 * PROXY_WARDEN_DOMAIN   - deployment domain, used when initializing settings
 *
 * The result is frozen and cached: both values are fixed for the lifetime of
 * the process.
 */
export function readEnv(source: NodeJS.ProcessEnv = process.env): WardenEnv {
	if (cachedEnv) return cachedEnv;

	const parsed = WardenEnvSchema.safeParse({
		dataDir: path.resolve(source.PROXY_WARDEN_DATA_DIR || DEFAULT_DATA_DIR),
		domain: source.PROXY_WARDEN_DOMAIN?.trim() || undefined,
	});
	if (!parsed.success) {
		const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
		throw new Error(`Invalid environment: ${issues.join("; ")}`);
	}

	cachedEnv = Object.freeze(parsed.data);
	return cachedEnv;
}

export function resetEnvCache(): void {
	cachedEnv = null;
}
