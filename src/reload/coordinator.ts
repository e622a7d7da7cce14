/**
 * Drives each engine from a freshly rendered config to a healthy process.
 *
 * Per protocol: idle -> validating -> reloading -> healthy, with
 * validation-failed and reload-failed as the terminal failures. Protocols
 * are independent of each other; sequences for one protocol never
 * interleave. A failed reload is recorded and left in place: the new config
 * file stays on disk.
 */

import { PROTOCOL_NAMES, type ProtocolName } from "../config/config.js";
import { type ErrorSummary, ReloadError, summarizeError } from "../errors.js";
import { formatErrorSafe } from "../infra/error-format.js";
import { Mutex } from "../infra/mutex.js";
import { TimeoutError, withTimeout } from "../infra/timeout.js";
import { getChildLogger } from "../logging.js";
import type { RenderOutcome } from "../render/config-renderer.js";
import { sleep as realSleep } from "../utils.js";
import type { HealthStatus, ServiceManager } from "./service-manager.js";

const logger = getChildLogger({ module: "reload" });

export type ReloadState = "idle" | "validating" | "reloading" | "healthy" | "validation-failed" | "reload-failed";

export type ReloadMethod = "reload" | "restart";

export type ProtocolStatus = {
	protocol: ProtocolName;
	state: ReloadState;
	updatedAt: string;
	method?: ReloadMethod;
	lastHealth?: HealthStatus;
	error?: ErrorSummary;
};

export type ReloadCoordinatorOptions = {
	services: ServiceManager;
	healthTimeoutMs: number;
	pollIntervalMs: number;
	/** Bound on each reload or restart call; past it the protocol is reload-failed. */
	serviceCallTimeoutMs: number;
	now?: () => Date;
	sleep?: (ms: number) => Promise<unknown>;
};

export type ApplyOptions = {
	/** Reload protocols whose config bytes did not change. */
	force?: boolean;
};

export class ReloadCoordinator {
	private readonly states = new Map<ProtocolName, ProtocolStatus>();
	private readonly locks = new Map<ProtocolName, Mutex>();
	private readonly now: () => Date;
	private readonly sleep: (ms: number) => Promise<unknown>;

	constructor(private readonly options: ReloadCoordinatorOptions) {
		this.now = options.now ?? (() => new Date());
		this.sleep = options.sleep ?? realSleep;
		for (const protocol of PROTOCOL_NAMES) {
			this.states.set(protocol, { protocol, state: "idle", updatedAt: this.now().toISOString() });
			this.locks.set(protocol, new Mutex());
		}
	}

	getState(protocol: ProtocolName): ProtocolStatus {
		const status = this.states.get(protocol);
		if (!status) {
			return { protocol, state: "idle", updatedAt: this.now().toISOString() };
		}
		return { ...status };
	}

	getStates(): ProtocolStatus[] {
		return PROTOCOL_NAMES.map((protocol) => this.getState(protocol));
	}

	/**
	 * Push render outcomes to the engines. Skipped protocols are ignored, and
	 * so are unchanged ones unless `force` is set. Resolves once every touched
	 * protocol reached a terminal state; never rejects for engine failures.
	 */
	async apply(outcomes: readonly RenderOutcome[], options: ApplyOptions = {}): Promise<ProtocolStatus[]> {
		const work = outcomes.filter((outcome) => {
			if (outcome.status === "skipped") return false;
			if (outcome.status === "rendered" && !outcome.changed && !options.force) return false;
			return true;
		});
		return Promise.all(work.map((outcome) => this.run(outcome.protocol, outcome)));
	}

	/** Reload one protocol against the config already on disk. */
	async reload(protocol: ProtocolName): Promise<ProtocolStatus> {
		return this.run(protocol, null);
	}

	private async run(protocol: ProtocolName, outcome: RenderOutcome | null): Promise<ProtocolStatus> {
		const lock = this.locks.get(protocol) ?? new Mutex();
		this.locks.set(protocol, lock);

		return lock.withLock(async () => {
			this.transition(protocol, { state: "validating" });
			if (outcome?.status === "failed") {
				logger.warn({ protocol, code: outcome.error.code }, "config failed validation; engine left alone");
				return this.transition(protocol, { state: "validation-failed", error: summarizeError(outcome.error) });
			}

			this.transition(protocol, { state: "reloading" });
			let method: ReloadMethod | undefined;
			try {
				method = await this.push(protocol);
				const lastHealth = await this.waitHealthy(protocol);
				logger.info({ protocol, method }, "engine healthy");
				return this.transition(protocol, { state: "healthy", method, lastHealth });
			} catch (err) {
				logger.error({ protocol, method, error: formatErrorSafe(err) }, "engine reload failed");
				return this.transition(protocol, { state: "reload-failed", method, error: summarizeError(err) });
			}
		});
	}

	private async push(protocol: ProtocolName): Promise<ReloadMethod> {
		const { services, serviceCallTimeoutMs } = this.options;
		try {
			const result = await withTimeout(services.reload(protocol), serviceCallTimeoutMs, `${protocol} reload`);
			if (result === "reloaded") {
				return "reload";
			}
			logger.debug({ protocol }, "graceful reload unsupported; restarting");
		} catch (err) {
			logger.warn({ protocol, error: formatErrorSafe(err) }, "graceful reload failed; restarting");
		}
		try {
			await withTimeout(services.restart(protocol), serviceCallTimeoutMs, `${protocol} restart`);
		} catch (err) {
			if (err instanceof TimeoutError) {
				throw new ReloadError("ReloadFailed", protocol, err.message, { cause: err });
			}
			throw err;
		}
		return "restart";
	}

	private async waitHealthy(protocol: ProtocolName): Promise<HealthStatus> {
		const { services, healthTimeoutMs, pollIntervalMs } = this.options;
		const deadline = Date.now() + healthTimeoutMs;
		let last: HealthStatus = "unknown";

		for (;;) {
			const remaining = deadline - Date.now();
			if (remaining <= 0) break;
			try {
				last = await withTimeout(services.healthStatus(protocol), remaining, `${protocol} health check`);
			} catch (err) {
				logger.debug({ protocol, error: formatErrorSafe(err) }, "health check failed");
				last = "unknown";
			}
			if (last === "healthy") return last;
			if (Date.now() + pollIntervalMs >= deadline) break;
			await this.sleep(pollIntervalMs);
		}

		throw new ReloadError("HealthTimeout", protocol, `not healthy after ${healthTimeoutMs}ms (last status: ${last})`);
	}

	private transition(protocol: ProtocolName, next: Omit<ProtocolStatus, "protocol" | "updatedAt">): ProtocolStatus {
		const status: ProtocolStatus = { protocol, updatedAt: this.now().toISOString(), ...next };
		this.states.set(protocol, status);
		logger.debug({ protocol, state: status.state }, "reload state");
		return { ...status };
	}
}
