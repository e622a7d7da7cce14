import { beforeEach, describe, expect, it, vi } from "vitest";

vi.mock("../../src/utils.js", () => ({
	sleep: vi.fn().mockResolvedValue(undefined),
}));

import { isTransientError } from "../../src/infra/error-format.js";
import { backoffDelay, type RetryInfo, retryAsync, retryBudgetMs } from "../../src/infra/retry.js";
import { sleep } from "../../src/utils.js";

describe("infra/retry", () => {
	const mockSleep = vi.mocked(sleep);

	beforeEach(() => {
		mockSleep.mockClear();
	});

	it("doubles the delay up to the cap", () => {
		const config = { maxAttempts: 5, baseDelayMs: 100, maxDelayMs: 500 };

		expect(backoffDelay(config, 1)).toBe(100);
		expect(backoffDelay(config, 2)).toBe(200);
		expect(backoffDelay(config, 4)).toBe(500);
	});

	it("adds every attempt and every wait to the budget", () => {
		// 3 x 1000 + 100 + 200
		expect(retryBudgetMs(1_000, { maxAttempts: 3, baseDelayMs: 100, maxDelayMs: 5_000 })).toBe(3_300);
		expect(retryBudgetMs(20_000, { maxAttempts: 1 })).toBe(20_000);
	});

	it("retries and succeeds with exponential delays", async () => {
		let attempts = 0;
		const onRetry = vi.fn();
		const op = vi.fn(async () => {
			attempts++;
			if (attempts < 3) {
				throw new Error("transient");
			}
			return "ok";
		});

		const result = await retryAsync(op, { maxAttempts: 4, baseDelayMs: 10, onRetry });

		expect(result).toBe("ok");
		expect(op).toHaveBeenCalledTimes(3);
		expect(mockSleep).toHaveBeenNthCalledWith(1, 10);
		expect(mockSleep).toHaveBeenNthCalledWith(2, 20);
		expect(onRetry).toHaveBeenCalledTimes(2);
	});

	it("stops immediately when shouldRetry returns false", async () => {
		const err = new Error("not retryable");
		const shouldRetry = vi.fn((_error: unknown, _info: RetryInfo) => false);

		await expect(
			retryAsync(
				async () => {
					throw err;
				},
				{ maxAttempts: 5, baseDelayMs: 10, shouldRetry },
			),
		).rejects.toBe(err);

		expect(shouldRetry).toHaveBeenCalledTimes(1);
		expect(mockSleep).not.toHaveBeenCalled();
	});

	it("retries only transient docker failures", async () => {
		const missing = new Error("No such container: proxy-trojan");
		let calls = 0;

		await expect(
			retryAsync(
				async () => {
					calls++;
					throw missing;
				},
				{ maxAttempts: 3, baseDelayMs: 5, shouldRetry: (err) => isTransientError(err) },
			),
		).rejects.toBe(missing);
		expect(calls).toBe(1);

		let busyCalls = 0;
		const result = await retryAsync(
			async () => {
				busyCalls++;
				if (busyCalls === 1) {
					throw Object.assign(new Error("resource busy"), { code: "EBUSY" });
				}
				return "reloaded";
			},
			{ maxAttempts: 3, baseDelayMs: 5, shouldRetry: (err) => isTransientError(err) },
		);
		expect(result).toBe("reloaded");
		expect(mockSleep).toHaveBeenCalledWith(5);
	});

	it("throws the last error after exhausting attempts", async () => {
		const err = new Error("still failing");
		const op = vi.fn(async () => {
			throw err;
		});

		await expect(retryAsync(op, { maxAttempts: 3, baseDelayMs: 1 })).rejects.toBe(err);

		expect(op).toHaveBeenCalledTimes(3);
		expect(mockSleep).toHaveBeenCalledTimes(2);
	});
});
