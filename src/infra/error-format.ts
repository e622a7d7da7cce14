/**
 * Error inspection utilities.
 *
 * BFS traversal through error cause chains to find errno codes and transient
 * conditions, plus a safe formatter for logs and operator output.
 */

/** Error codes that indicate a transient condition worth retrying. */
const TRANSIENT_CODES = new Set(["EAGAIN", "EBUSY", "ETIMEDOUT", "ECONNRESET", "ECONNREFUSED", "EPIPE"]);

/** Error messages (substrings) that indicate a transient condition. */
const TRANSIENT_MESSAGE_PATTERNS = [
	"timed out after",
	"resource temporarily unavailable",
	"connection reset",
	"cannot connect to the docker daemon",
];

/**
 * Collect all error candidates from a (potentially nested) error.
 * BFS through `.cause`, `.reason`, `.errors` to find all relevant error objects.
 */
export function collectErrorCandidates(err: unknown, maxDepth = 5): unknown[] {
	const candidates: unknown[] = [];
	const queue: Array<{ value: unknown; depth: number }> = [{ value: err, depth: 0 }];
	const seen = new WeakSet<object>();

	while (queue.length > 0) {
		const item = queue.shift();
		if (!item) break;
		if (item.depth > maxDepth) continue;

		const val = item.value;
		if (val == null || typeof val !== "object") {
			if (val != null) candidates.push(val);
			continue;
		}

		if (seen.has(val)) continue;
		seen.add(val);
		candidates.push(val);

		const nextDepth = item.depth + 1;
		const cause: unknown = Reflect.get(val, "cause");
		const reason: unknown = Reflect.get(val, "reason");
		const errors: unknown = Reflect.get(val, "errors");

		if (cause != null) {
			queue.push({ value: cause, depth: nextDepth });
		}
		if (reason != null) {
			queue.push({ value: reason, depth: nextDepth });
		}
		if (Array.isArray(errors)) {
			for (const e of errors) {
				queue.push({ value: e, depth: nextDepth });
			}
		}
	}

	return candidates;
}

/**
 * First string `code` found anywhere in the cause chain.
 */
export function findErrorCode(err: unknown): string | undefined {
	for (const candidate of collectErrorCandidates(err)) {
		if (candidate == null || typeof candidate !== "object") continue;
		const code: unknown = Reflect.get(candidate, "code");
		if (typeof code === "string") return code;
	}
	return undefined;
}

/**
 * Check if an error (or any error in its cause chain) is transient.
 * TimeoutError from infra/timeout counts as transient.
 */
export function isTransientError(err: unknown): boolean {
	for (const candidate of collectErrorCandidates(err)) {
		if (candidate == null) continue;

		if (typeof candidate === "object") {
			const code: unknown = Reflect.get(candidate, "code");
			if (typeof code === "string" && TRANSIENT_CODES.has(code)) {
				return true;
			}
			if (Reflect.get(candidate, "name") === "TimeoutError") {
				return true;
			}
		}

		const message = extractMessage(candidate);
		if (message && matchesTransientPattern(message)) {
			return true;
		}
	}

	return false;
}

/**
 * Safely format an error to a string, avoiding circular references
 * and redacting URLs that might contain tokens.
 */
export function formatErrorSafe(err: unknown, maxLength = 500): string {
	if (err == null) return "unknown error";

	try {
		if (err instanceof Error) {
			let msg = `${err.name}: ${err.message}`;
			if (err.cause) {
				msg += ` [cause: ${formatErrorSafe(err.cause, maxLength / 2)}]`;
			}
			return truncate(redactUrls(msg), maxLength);
		}
		if (typeof err === "string") {
			return truncate(redactUrls(err), maxLength);
		}
		return truncate(redactUrls(String(err)), maxLength);
	} catch {
		return "error (could not format)";
	}
}

function extractMessage(val: unknown): string | null {
	if (typeof val === "string") return val;
	if (val instanceof Error) return val.message;
	if (typeof val === "object" && val !== null) {
		const msg: unknown = Reflect.get(val, "message");
		if (typeof msg === "string") return msg;
	}
	return null;
}

function matchesTransientPattern(message: string): boolean {
	const lower = message.toLowerCase();
	return TRANSIENT_MESSAGE_PATTERNS.some((pattern) => lower.includes(pattern));
}

function redactUrls(str: string): string {
	return str.replace(/[a-z][a-z0-9+.-]*:\/\/[^\s]+/gi, "[URL]");
}

function truncate(str: string, maxLength: number): string {
	if (str.length <= maxLength) return str;
	return `${str.slice(0, maxLength - 3)}...`;
}
