import { TimeoutError } from "./timeout.js";

type Waiter = {
	grant: () => void;
};

/**
 * Promise-based mutex. Waiters queue in FIFO order and are woken by
 * `release()`; nothing polls. A waiter that gives up after `timeoutMs` is
 * removed from the queue so the lock is never handed to nobody.
 */
export class Mutex {
	private locked = false;
	private queue: Waiter[] = [];

	get isLocked(): boolean {
		return this.locked;
	}

	async acquire(timeoutMs?: number, label = "mutex"): Promise<void> {
		if (!this.locked) {
			this.locked = true;
			return;
		}

		return new Promise<void>((resolve, reject) => {
			let timer: NodeJS.Timeout | undefined;
			const waiter: Waiter = {
				grant: () => {
					if (timer) clearTimeout(timer);
					resolve();
				},
			};

			if (timeoutMs !== undefined && Number.isFinite(timeoutMs)) {
				timer = setTimeout(() => {
					const index = this.queue.indexOf(waiter);
					if (index >= 0) {
						this.queue.splice(index, 1);
						reject(new TimeoutError(`${label} timed out after ${timeoutMs}ms`, timeoutMs));
					}
				}, timeoutMs);
				timer.unref();
			}

			this.queue.push(waiter);
		});
	}

	release(): void {
		const next = this.queue.shift();
		if (next) {
			// Ownership passes directly to the next waiter; `locked` stays true.
			next.grant();
		} else {
			this.locked = false;
		}
	}

	async withLock<T>(fn: () => Promise<T> | T, timeoutMs?: number): Promise<T> {
		await this.acquire(timeoutMs);
		try {
			return await fn();
		} finally {
			this.release();
		}
	}
}
