/**
 * Async locks.
 */

/**
 * Runs functions one at a time, in submission order.
 */
export class Mutex {
	private queue: Array<() => void> = [];
	private locked = false;

	async runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
		await this.acquire();
		try {
			return await fn();
		} finally {
			this.release();
		}
	}

	/** Whether a function is running or waiting */
	get busy(): boolean {
		return this.locked;
	}

	private acquire(): Promise<void> {
		return new Promise<void>((resolve) => {
			if (!this.locked) {
				this.locked = true;
				resolve();
			} else {
				this.queue.push(resolve);
			}
		});
	}

	private release(): void {
		const next = this.queue.shift();
		if (next) {
			next();
		} else {
			this.locked = false;
		}
	}
}

/**
 * One {@link Mutex} per key. Idle keys are dropped.
 */
export class KeyedMutex {
	private map = new Map<string, Mutex>();

	async runExclusive<T>(key: string, fn: () => Promise<T> | T): Promise<T> {
		let mutex = this.map.get(key);
		if (!mutex) {
			mutex = new Mutex();
			this.map.set(key, mutex);
		}
		const held = mutex;
		try {
			return await held.runExclusive(fn);
		} finally {
			if (!held.busy && this.map.get(key) === held) {
				this.map.delete(key);
			}
		}
	}

	/** Number of keys currently held */
	get size(): number {
		return this.map.size;
	}
}
