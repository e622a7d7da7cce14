/**
 * Process-level unhandled rejection handler.
 *
 * Classifies unhandled rejections and decides whether to exit or continue:
 * - Fatal errors (no entropy, out of memory) → exit(1)
 * - Configuration / environment errors → exit(1)
 * - Transient errors (docker daemon, EAGAIN) → warn + continue
 * - Anything else → log at error level + continue
 */

import { WardenError } from "../errors.js";
import { getChildLogger } from "../logging.js";
import { formatErrorSafe, isTransientError } from "./error-format.js";

const logger = getChildLogger({ module: "unhandled-rejections" });

export type RejectionCategory = "fatal" | "config" | "transient" | "operation" | "unknown";

export function categorize(err: unknown): RejectionCategory {
	if (err instanceof WardenError) {
		return err.kind === "fatal" ? "fatal" : "operation";
	}
	if (isTransientError(err)) return "transient";

	const message = formatErrorSafe(err, 1000);
	const lower = message.toLowerCase();

	// Bad config file or environment
	if (
		lower.includes("invalid environment") ||
		lower.includes("invalid configuration") ||
		lower.includes("json5:") ||
		lower.includes("cannot find module")
	) {
		return "config";
	}

	if (
		lower.includes("out of memory") ||
		lower.includes("assertion") ||
		lower.includes("invariant") ||
		lower.includes("maximum call stack")
	) {
		return "fatal";
	}

	return "unknown";
}

/**
 * Install the unhandled rejection handler. Call once at process startup.
 */
export function installUnhandledRejectionHandler(processLabel: string): void {
	process.on("unhandledRejection", (reason: unknown) => {
		const category = categorize(reason);
		const formatted = formatErrorSafe(reason);

		switch (category) {
			case "transient":
				logger.warn(
					{ process: processLabel, category },
					`transient unhandled rejection (continuing): ${formatted}`,
				);
				break;

			case "config":
				logger.fatal({ process: processLabel, category }, `config error (exiting): ${formatted}`);
				process.exit(1);
				break;

			case "fatal":
				logger.fatal(
					{ process: processLabel, category },
					`fatal unhandled rejection (exiting): ${formatted}`,
				);
				process.exit(1);
				break;

			default:
				// A stray operation failure should not take the process down with it.
				logger.error({ process: processLabel, category }, `unhandled rejection: ${formatted}`);
				break;
		}
	});

	logger.debug({ process: processLabel }, "unhandled rejection handler installed");
}
