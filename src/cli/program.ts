import { createRequire } from "node:module";
import { Command } from "commander";

const require = createRequire(import.meta.url);

function getVersion(): string {
	// package.json sits two levels up from src/cli and three from dist/src/cli
	for (const candidate of ["../../package.json", "../../../package.json"]) {
		try {
			const pkg: unknown = require(candidate);
			if (pkg && typeof pkg === "object" && "version" in pkg && typeof pkg.version === "string") {
				return pkg.version;
			}
		} catch {
			// try the next location
		}
	}
	return "0.0.0";
}

export function createProgram(): Command {
	const program = new Command();

	program
		.name("proxy-warden")
		.description("Credential, config and reload lifecycle for a multi-protocol proxy server")
		.version(getVersion())
		.option("-v, --verbose", "Enable verbose output")
		.option("-c, --config <path>", "Path to config file");

	return program;
}
