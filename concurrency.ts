/**
 * @module Concurrency
 * @description Locks and bounded parallelism for store operations.
 */

type Waiter = {
	grant: () => void;
	timer: ReturnType<typeof setTimeout> | null;
};

function remove_waiter<W>(queue: W[], waiter: W): void {
	const idx = queue.indexOf(waiter);
	if (idx !== -1) queue.splice(idx, 1);
}

/**
 * Semaphore for controlling concurrent operations.
 *
 * Callers acquire a permit before proceeding. When all permits are taken,
 * subsequent acquires wait until a permit is released, or until their
 * timeout expires, in which case `acquire` resolves to `false` and the
 * caller holds nothing.
 *
 * @example
 * ```ts
 * const semaphore = new Semaphore(3)
 *
 * if (await semaphore.acquire(1000)) {
 *   try {
 *     await work()
 *   } finally {
 *     semaphore.release()
 *   }
 * }
 * ```
 */
export class Semaphore {
	private permits: number;
	private waiting: Waiter[] = [];

	constructor(permits: number) {
		this.permits = permits;
	}

	async acquire(timeout_ms?: number): Promise<boolean> {
		if (this.permits > 0) {
			this.permits--;
			return true;
		}
		return new Promise<boolean>(resolve => {
			const waiter: Waiter = {
				grant: () => resolve(true),
				timer: null,
			};
			if (timeout_ms !== undefined) {
				waiter.timer = setTimeout(() => {
					remove_waiter(this.waiting, waiter);
					resolve(false);
				}, Math.max(0, timeout_ms));
			}
			this.waiting.push(waiter);
		});
	}

	release(): void {
		const next = this.waiting.shift();
		if (next) {
			if (next.timer) clearTimeout(next.timer);
			next.grant();
		} else {
			this.permits++;
		}
	}
}

type RwWaiter = Waiter & { mode: "shared" | "exclusive" };

/** Releases a held lock. Calling it more than once has no effect. */
export type Release = () => void;

/**
 * Reader/writer lock with FIFO hand-off.
 *
 * Any number of shared holders may run together; an exclusive holder runs
 * alone. A queued exclusive request blocks later shared requests so that
 * metadata changes are not starved by a stream of writes.
 */
export class RwLock {
	private shared_holders = 0;
	private exclusive_held = false;
	private queue: RwWaiter[] = [];

	get idle(): boolean {
		return this.shared_holders === 0 && !this.exclusive_held && this.queue.length === 0;
	}

	acquire_shared(timeout_ms?: number): Promise<Release | null> {
		return this.acquire("shared", timeout_ms);
	}

	acquire_exclusive(timeout_ms?: number): Promise<Release | null> {
		return this.acquire("exclusive", timeout_ms);
	}

	private can_grant(mode: RwWaiter["mode"]): boolean {
		if (this.exclusive_held) return false;
		if (mode === "exclusive") return this.shared_holders === 0;
		return true;
	}

	private take(mode: RwWaiter["mode"]): Release {
		if (mode === "exclusive") this.exclusive_held = true;
		else this.shared_holders++;

		let released = false;
		return () => {
			if (released) return;
			released = true;
			if (mode === "exclusive") this.exclusive_held = false;
			else this.shared_holders--;
			this.drain();
		};
	}

	private drain(): void {
		while (this.queue.length > 0) {
			const head = this.queue[0];
			if (!head || !this.can_grant(head.mode)) return;
			this.queue.shift();
			if (head.timer) clearTimeout(head.timer);
			head.grant();
			if (head.mode === "exclusive") return;
		}
	}

	private acquire(mode: RwWaiter["mode"], timeout_ms?: number): Promise<Release | null> {
		if (this.queue.length === 0 && this.can_grant(mode)) {
			return Promise.resolve(this.take(mode));
		}
		return new Promise<Release | null>(resolve => {
			const waiter: RwWaiter = {
				mode,
				grant: () => resolve(this.take(mode)),
				timer: null,
			};
			if (timeout_ms !== undefined) {
				waiter.timer = setTimeout(() => {
					remove_waiter(this.queue, waiter);
					resolve(null);
					this.drain();
				}, Math.max(0, timeout_ms));
			}
			this.queue.push(waiter);
		});
	}
}

/**
 * One RwLock per key, created on demand and dropped once idle.
 */
export class LockTable {
	private locks = new Map<string, RwLock>();

	async shared(key: string, timeout_ms?: number): Promise<Release | null> {
		return this.wrap(key, lock => lock.acquire_shared(timeout_ms));
	}

	async exclusive(key: string, timeout_ms?: number): Promise<Release | null> {
		return this.wrap(key, lock => lock.acquire_exclusive(timeout_ms));
	}

	get size(): number {
		return this.locks.size;
	}

	private async wrap(key: string, acquire: (lock: RwLock) => Promise<Release | null>): Promise<Release | null> {
		let lock = this.locks.get(key);
		if (!lock) {
			lock = new RwLock();
			this.locks.set(key, lock);
		}
		const held = lock;
		const release = await acquire(held);
		if (!release) {
			if (held.idle) this.locks.delete(key);
			return null;
		}
		return () => {
			release();
			if (held.idle && this.locks.get(key) === held) this.locks.delete(key);
		};
	}
}

/**
 * Map over array with controlled concurrency.
 * Results are returned in the same order as inputs.
 *
 * @example
 * ```ts
 * const counts = await parallel_map(users, u => materialize(u), 4)
 * ```
 */
export const parallel_map = async <T, R>(items: T[], mapper: (item: T, index: number) => Promise<R>, concurrency: number): Promise<R[]> => {
	const semaphore = new Semaphore(Math.max(1, concurrency));
	const results: R[] = new Array(items.length);

	await Promise.all(
		items.map(async (item, index) => {
			await semaphore.acquire();
			try {
				results[index] = await mapper(item, index);
			} finally {
				semaphore.release();
			}
		})
	);

	return results;
};
