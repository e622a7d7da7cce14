import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";

import { PROTOCOL_NAMES } from "../config/config.js";
import { getChildLogger } from "../logging.js";
import type { RecordStore } from "../storage/record-store.js";
import { pathExists } from "../utils.js";
import { VARIANTS } from "./variants.js";

const logger = getChildLogger({ module: "templates" });

// src/render -> <repo>/templates; dist/src/render -> <repo>/templates
const CANDIDATE_DIRS = ["../../templates/", "../../../templates/"];

/** Directory holding the templates shipped with the package. */
export function bundledTemplatesDir(): string {
	for (const candidate of CANDIDATE_DIRS) {
		const dir = fileURLToPath(new URL(candidate, import.meta.url));
		if (fs.existsSync(path.join(dir, VARIANTS.xray.templateFile))) {
			return dir;
		}
	}
	throw new Error("Bundled templates not found next to the installed package");
}

/**
 * Copy shipped templates into the data directory. Templates an operator has
 * already customised are left alone. Returns the files that were installed.
 */
export async function installDefaultTemplates(
	store: RecordStore,
	sourceDir: string = bundledTemplatesDir(),
): Promise<string[]> {
	const installed: string[] = [];
	for (const protocol of PROTOCOL_NAMES) {
		const file = VARIANTS[protocol].templateFile;
		const target = path.join(store.layout.templatesDir, file);
		if (await pathExists(target)) continue;

		const content = await fs.promises.readFile(path.join(sourceDir, file), "utf8");
		await store.writeArtifact(target, content);
		installed.push(file);
	}
	if (installed.length > 0) {
		logger.info({ installed }, "default templates installed");
	}
	return installed;
}
