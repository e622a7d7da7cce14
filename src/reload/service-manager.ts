/**
 * Engine control through the docker CLI.
 *
 * The rest of the system only sees the ServiceManager interface; tests and
 * other runtimes supply their own implementation.
 */

import { z } from "zod";

import type { ProtocolName, ServiceConfig } from "../config/config.js";
import { ReloadError, WardenError } from "../errors.js";
import { findErrorCode, formatErrorSafe, isTransientError } from "../infra/error-format.js";
import { retryAsync, retryBudgetMs } from "../infra/retry.js";
import { getChildLogger } from "../logging.js";
import { type CommandResult, type CommandRunner, runCommand } from "./command.js";

const logger = getChildLogger({ module: "service-manager" });

export type HealthStatus = "healthy" | "unhealthy" | "unknown";

/** "unsupported" means the engine has no graceful reload; restart instead. */
export type ReloadResult = "reloaded" | "unsupported";

export interface ServiceManager {
	reload(protocol: ProtocolName): Promise<ReloadResult>;
	restart(protocol: ProtocolName): Promise<void>;
	healthStatus(protocol: ProtocolName): Promise<HealthStatus>;
	readLogs(protocol: ProtocolName, lines: number): Promise<string>;
}

export type DockerServiceManagerOptions = {
	services: Readonly<Record<ProtocolName, ServiceConfig>>;
	commandTimeoutMs: number;
	maxAttempts: number;
	dockerBinary?: string;
	run?: CommandRunner;
	/** Backoff before retrying a transient docker failure. */
	retryDelayMs?: number;
};

/** Longest one retried docker call can take, waits between attempts included. */
export function dockerCallBudgetMs(
	options: Pick<DockerServiceManagerOptions, "commandTimeoutMs" | "maxAttempts" | "retryDelayMs">,
): number {
	return retryBudgetMs(options.commandTimeoutMs, {
		maxAttempts: options.maxAttempts,
		baseDelayMs: options.retryDelayMs ?? 500,
	});
}

const ContainerStateSchema = z.object({
	Status: z.string(),
	Running: z.boolean().optional(),
	Health: z.object({ Status: z.string() }).nullish(),
});

export function mapContainerState(raw: string): HealthStatus {
	let value: unknown;
	try {
		value = JSON.parse(raw);
	} catch {
		return "unknown";
	}
	const state = ContainerStateSchema.safeParse(value);
	if (!state.success) return "unknown";

	if (state.data.Status !== "running") return "unhealthy";
	switch (state.data.Health?.Status) {
		case undefined:
			// no healthcheck defined: running is the best signal there is
			return "healthy";
		case "healthy":
			return "healthy";
		case "unhealthy":
			return "unhealthy";
		default:
			return "unknown";
	}
}

class DockerCommandError extends Error {
	constructor(
		message: string,
		readonly result: CommandResult,
	) {
		super(message);
		this.name = "DockerCommandError";
	}
}

export class DockerServiceManager implements ServiceManager {
	private readonly run: CommandRunner;
	private readonly docker: string;

	constructor(private readonly options: DockerServiceManagerOptions) {
		this.run = options.run ?? runCommand;
		this.docker = options.dockerBinary ?? "docker";
	}

	async reload(protocol: ProtocolName): Promise<ReloadResult> {
		const { container, reload } = this.options.services[protocol];
		switch (reload.kind) {
			case "restart":
				return "unsupported";
			case "signal":
				await this.runDocker(protocol, ["kill", "--signal", reload.signal, container]);
				return "reloaded";
			case "exec":
				await this.runDocker(protocol, ["exec", container, ...reload.command]);
				return "reloaded";
		}
	}

	async restart(protocol: ProtocolName): Promise<void> {
		const { container } = this.options.services[protocol];
		await this.runDocker(protocol, ["restart", "--time", "10", container]);
	}

	async healthStatus(protocol: ProtocolName): Promise<HealthStatus> {
		const { container } = this.options.services[protocol];
		const result = await this.invoke(protocol, ["inspect", "--format", "{{json .State}}", container]);
		if (result.code !== 0) {
			logger.debug({ protocol, container, stderr: result.stderr.trim() }, "inspect failed");
			return "unknown";
		}
		return mapContainerState(result.stdout.trim());
	}

	async readLogs(protocol: ProtocolName, lines: number): Promise<string> {
		const { container } = this.options.services[protocol];
		const result = await this.runDocker(protocol, ["logs", "--tail", String(Math.max(1, lines)), container]);
		// engines log to either stream
		return `${result.stdout}${result.stderr}`;
	}

	/** Run docker and require exit code 0, retrying transient failures. */
	private async runDocker(protocol: ProtocolName, args: string[]): Promise<CommandResult> {
		try {
			return await retryAsync(
				async () => {
					const result = await this.run(this.docker, args, { timeoutMs: this.options.commandTimeoutMs });
					if (result.code !== 0) {
						throw new DockerCommandError(
							`docker ${args[0]} exited with ${result.code}: ${result.stderr.trim()}`,
							result,
						);
					}
					return result;
				},
				{
					maxAttempts: this.options.maxAttempts,
					baseDelayMs: this.options.retryDelayMs ?? 500,
					shouldRetry: (err) => isTransientError(err),
					onRetry: (err, info) =>
						logger.warn(
							{ protocol, command: args[0], attempt: info.attempt, error: formatErrorSafe(err) },
							"retrying docker command",
						),
				},
			);
		} catch (err) {
			throw this.toReloadError(protocol, args, err);
		}
	}

	/** Run docker once and return whatever it exits with. */
	private async invoke(protocol: ProtocolName, args: string[]): Promise<CommandResult> {
		try {
			return await this.run(this.docker, args, { timeoutMs: this.options.commandTimeoutMs });
		} catch (err) {
			throw this.toReloadError(protocol, args, err);
		}
	}

	private toReloadError(protocol: ProtocolName, args: string[], err: unknown): WardenError {
		if (err instanceof WardenError) return err;
		if (findErrorCode(err) === "ENOENT") {
			return new ReloadError("ServiceUnavailable", protocol, `${this.docker} is not installed`, { cause: err });
		}
		if (isTransientError(err)) {
			return new ReloadError("ServiceUnavailable", protocol, `docker ${args[0]} failed: ${formatErrorSafe(err)}`, {
				cause: err,
			});
		}
		return new ReloadError("ReloadFailed", protocol, `docker ${args[0]} failed: ${formatErrorSafe(err)}`, {
			cause: err,
		});
	}
}
