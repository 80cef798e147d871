// src/kernel-core/L0/Deferred.ts

/**
 * Single-resolution handle: a promise plus the function that settles it.
 */
export class Deferred<T> {
    public readonly promise: Promise<T>;
    private settle: (value: T) => void = () => { };
    private done = false;

    constructor() {
        this.promise = new Promise<T>(resolve => {
            this.settle = resolve;
        });
    }

    public get settled(): boolean { return this.done; }

    /**
     * Returns false when already settled; the first value wins.
     */
    public resolve(value: T): boolean {
        if (this.done) return false;
        this.done = true;
        this.settle(value);
        return true;
    }
}
