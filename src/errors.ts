/**
 * Error taxonomy.
 *
 * Every failure the core can report is a WardenError with a `kind` (which
 * layer failed) and a `code` (what happened). Operator-facing code maps these
 * to structured results; nothing outside this file should need `instanceof`
 * checks on concrete subclasses to decide how to report an error.
 */

export type ErrorKind = "validation" | "storage" | "render" | "reload" | "backup" | "fatal";

export abstract class WardenError extends Error {
	abstract readonly kind: ErrorKind;
	abstract readonly code: string;

	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = new.target.name;
	}
}

export type ValidationCode =
	| "DuplicateUser"
	| "NotFound"
	| "InvalidUsername"
	| "InvalidSettings"
	| "InvalidCredentials"
	| "UnknownProtocol"
	| "AddressPoolExhausted"
	| "AlreadyInitialized";

export class ValidationError extends WardenError {
	readonly kind = "validation";

	constructor(
		readonly code: ValidationCode,
		message: string,
		options?: { cause?: unknown },
	) {
		super(message, options);
	}
}

export type StorageCode =
	| "LockTimeout"
	| "StoreCorrupt"
	| "StoreNotInitialized"
	| "InvalidDocument"
	| "IoFailure";

export class StorageError extends WardenError {
	readonly kind = "storage";

	constructor(
		readonly code: StorageCode,
		message: string,
		options?: { cause?: unknown },
	) {
		super(message, options);
	}
}

export type RenderCode = "InvalidTemplate" | "SemanticConflict" | "TemplateMissing";

export class RenderError extends WardenError {
	readonly kind = "render";

	constructor(
		readonly code: RenderCode,
		readonly protocol: string,
		message: string,
		options?: { cause?: unknown },
	) {
		super(`${protocol}: ${message}`, options);
	}
}

export type ReloadCode = "ReloadFailed" | "HealthTimeout" | "ServiceUnavailable";

export class ReloadError extends WardenError {
	readonly kind = "reload";

	constructor(
		readonly code: ReloadCode,
		readonly protocol: string,
		message: string,
		options?: { cause?: unknown },
	) {
		super(`${protocol}: ${message}`, options);
	}
}

export type BackupCode = "BackupNotFound" | "ChecksumMismatch" | "ArchiveFailed" | "RestoreFailed";

export class BackupError extends WardenError {
	readonly kind = "backup";

	constructor(
		readonly code: BackupCode,
		message: string,
		options?: { cause?: unknown },
	) {
		super(message, options);
	}
}

/**
 * The platform random source could not be read. Never retried.
 */
export class EntropyUnavailableError extends WardenError {
	readonly kind = "fatal";
	readonly code = "EntropyUnavailable";
}

export type ErrorSummary = {
	kind: ErrorKind | "internal";
	code: string;
	message: string;
};

export function summarizeError(err: unknown): ErrorSummary {
	if (err instanceof WardenError) {
		return { kind: err.kind, code: err.code, message: err.message };
	}
	return {
		kind: "internal",
		code: "Unexpected",
		message: err instanceof Error ? err.message : String(err),
	};
}
