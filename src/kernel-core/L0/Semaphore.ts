// src/kernel-core/L0/Semaphore.ts
import { DisposedError } from '../Errors.js';

interface Waiter {
    resolve: () => void;
    reject: (reason: Error) => void;
}

/**
 * Counting semaphore with a FIFO wait queue.
 * With one permit it is the binary lock used by the navigation coordinator.
 */
export class Semaphore {
    private available: number;
    private readonly queue: Waiter[] = [];
    private disposed = false;

    constructor(private readonly permits: number = 1) {
        if (!Number.isInteger(permits) || permits < 1) {
            throw new RangeError(`Semaphore: permits must be a positive integer, got ${permits}`);
        }
        this.available = permits;
    }

    public get waiting(): number { return this.queue.length; }
    public get locked(): boolean { return this.available === 0; }

    public acquire(): Promise<void> {
        if (this.disposed) return Promise.reject(new DisposedError('Semaphore'));

        if (this.available > 0) {
            this.available--;
            return Promise.resolve();
        }
        return new Promise<void>((resolve, reject) => {
            this.queue.push({ resolve, reject });
        });
    }

    /**
     * Hands the permit to the oldest waiter, or returns it to the pool.
     */
    public release(): void {
        if (this.disposed) return;

        const next = this.queue.shift();
        if (next) {
            next.resolve();
        } else {
            this.available = Math.min(this.available + 1, this.permits);
        }
    }

    public async use<T>(fn: () => T | Promise<T>): Promise<T> {
        await this.acquire();
        try {
            return await fn();
        } finally {
            this.release();
        }
    }

    /**
     * Rejects every waiter. Later acquisitions fail immediately.
     */
    public dispose(): void {
        if (this.disposed) return;
        this.disposed = true;
        for (const waiter of this.queue.splice(0)) {
            waiter.reject(new DisposedError('Semaphore'));
        }
    }
}

/**
 * A value guarded by a binary semaphore.
 */
export class Mutex<T> {
    private readonly lock = new Semaphore(1);

    constructor(private value: T) { }

    public get(): Promise<T> {
        return this.lock.use(() => this.value);
    }

    public set(value: T): Promise<void> {
        return this.lock.use(() => { this.value = value; });
    }

    public use<V>(fn: (value: T) => V | Promise<V>): Promise<V> {
        return this.lock.use(() => fn(this.value));
    }
}
