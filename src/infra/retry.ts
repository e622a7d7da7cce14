import { sleep } from "../utils.js";

/**
 * Backoff for engine control commands: the wait before retry `n` is
 * `baseDelayMs * 2^(n-1)`, capped at `maxDelayMs`. No jitter, so the total
 * time a retried call can take is known up front (see `retryBudgetMs`).
 */
export type BackoffConfig = {
	/** Attempts including the first; at least 1. */
	maxAttempts: number;
	baseDelayMs: number;
	maxDelayMs: number;
};

export type RetryOptions = Partial<BackoffConfig> & {
	/** Return false to give up on `err` right away. Defaults to always-retry. */
	shouldRetry?: (err: unknown, info: RetryInfo) => boolean;
	onRetry?: (err: unknown, info: RetryInfo) => void;
};

export type RetryInfo = {
	/** 1-based attempt number that just failed. */
	attempt: number;
	maxAttempts: number;
	/** Wait before the next attempt. */
	delayMs: number;
};

const DEFAULT_BACKOFF: BackoffConfig = {
	maxAttempts: 2,
	baseDelayMs: 500,
	maxDelayMs: 5_000,
};

function resolveBackoff(opts?: Partial<BackoffConfig>): BackoffConfig {
	return {
		maxAttempts: Math.max(1, opts?.maxAttempts ?? DEFAULT_BACKOFF.maxAttempts),
		baseDelayMs: Math.max(0, opts?.baseDelayMs ?? DEFAULT_BACKOFF.baseDelayMs),
		maxDelayMs: Math.max(0, opts?.maxDelayMs ?? DEFAULT_BACKOFF.maxDelayMs),
	};
}

export function backoffDelay(config: BackoffConfig, attempt: number): number {
	return Math.min(config.baseDelayMs * 2 ** (attempt - 1), config.maxDelayMs);
}

/** Longest a retried call can run when each attempt is bounded by `attemptTimeoutMs`. */
export function retryBudgetMs(attemptTimeoutMs: number, opts?: Partial<BackoffConfig>): number {
	const config = resolveBackoff(opts);
	let total = attemptTimeoutMs * config.maxAttempts;
	for (let attempt = 1; attempt < config.maxAttempts; attempt++) {
		total += backoffDelay(config, attempt);
	}
	return total;
}

/**
 * Retry an async operation with capped exponential backoff.
 *
 * @example
 * ```ts
 * await retryAsync(() => runDocker(["kill", "--signal", "SIGHUP", container]), {
 *   maxAttempts: 2,
 *   shouldRetry: (err) => isTransientError(err),
 * });
 * ```
 */
export async function retryAsync<T>(fn: () => Promise<T>, opts?: RetryOptions): Promise<T> {
	const config = resolveBackoff(opts);

	for (let attempt = 1; ; attempt++) {
		try {
			return await fn();
		} catch (err) {
			if (attempt >= config.maxAttempts) throw err;

			const info: RetryInfo = { attempt, maxAttempts: config.maxAttempts, delayMs: backoffDelay(config, attempt) };
			if (opts?.shouldRetry && !opts.shouldRetry(err, info)) throw err;

			opts?.onRetry?.(err, info);
			if (info.delayMs > 0) {
				await sleep(info.delayMs);
			}
		}
	}
}
