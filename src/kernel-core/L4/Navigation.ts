// src/kernel-core/L4/Navigation.ts
import { freeze, produce } from 'immer';
import { AlreadyResolvedError, DisposedError, EmptyHistoryError, UnitNotActiveError } from '../Errors.js';
import { Deferred } from '../L0/Deferred.js';
import { Semaphore } from '../L0/Semaphore.js';
import { silentLogger } from '../L0/Logger.js';
import type { Logger } from '../L0/Logger.js';
import { AnonymousIdentityProvider, Relationship } from '../L1/Identity.js';
import type { IdentityProvider, IUnitDirectory, UnitName } from '../L1/Identity.js';

export interface RouteHistoryEntry {
    readonly unitName: UnitName;
}

export type TransitionDirection = 'FORWARD' | 'BACK';

/**
 * Broadcast on `router/change/<unit>` after every transition.
 */
export interface TransitionContext {
    from?: UnitName;
    to: UnitName;
    direction: TransitionDirection;
    /** Outgoing → incoming; for auditing, never used to block */
    relationship: Relationship;
    params: unknown;
}

/**
 * Transition Channel Port
 * Satisfied by the event bus; transitions are published outside the unit policy gate.
 */
export interface ITransitionChannel {
    readonly separator: string;
    publish(channel: string, data?: unknown): unknown;
}

export interface NavigationOptions {
    maxDepth?: number;
    identity?: IdentityProvider;
    channel?: ITransitionChannel;
    /** When set, `goto` refuses units the directory does not report as active */
    directory?: IUnitDirectory;
    logger?: Logger;
}

export const DEFAULT_MAX_DEPTH = 20;

interface PendingEntry {
    readonly unitName: UnitName;
    readonly completion: Deferred<unknown>;
}

export function isTransitionContext(data: unknown): data is TransitionContext {
    return typeof data === 'object' && data !== null && 'to' in data && 'direction' in data;
}

/**
 * Navigation Coordinator
 *
 * States: Idle / Transitioning. `goto` holds a binary semaphore for the whole
 * transition, so at most one is in flight and waiters proceed in FIFO order.
 * The critical section never awaits, which keeps the synchronous `goBack`
 * from interleaving with it.
 */
export class NavigationCoordinator {
    public readonly maxDepth: number;
    private entries: PendingEntry[] = [];
    private snapshot: readonly RouteHistoryEntry[] = freeze([], true);
    private readonly lock = new Semaphore(1);
    private readonly identity: IdentityProvider;
    private readonly channel: ITransitionChannel | undefined;
    private readonly directory: IUnitDirectory | undefined;
    private readonly logger: Logger;
    private disposed = false;

    constructor(options: NavigationOptions = {}) {
        this.maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
        if (!Number.isInteger(this.maxDepth) || this.maxDepth < 1) {
            throw new RangeError(`NavigationCoordinator: maxDepth must be a positive integer, got ${this.maxDepth}`);
        }
        this.identity = options.identity ?? new AnonymousIdentityProvider();
        this.channel = options.channel;
        this.directory = options.directory;
        this.logger = (options.logger ?? silentLogger).child('router');
    }

    /**
     * Read-only, frozen view of the history, oldest first.
     */
    public get history(): readonly RouteHistoryEntry[] { return this.snapshot; }

    public get transitioning(): boolean { return this.lock.locked; }

    public get isDisposed(): boolean { return this.disposed; }

    public get current(): UnitName {
        this.ensureAlive();
        const top = this.entries[this.entries.length - 1];
        if (!top) throw new EmptyHistoryError('read current unit');
        return top.unitName;
    }

    public init(defaultUnit: UnitName): void {
        this.ensureAlive();
        this.evict();
        this.push(defaultUnit);
        this.logger.info(`Initialized with ${defaultUnit}`);
    }

    public async goto(unit: UnitName, value?: unknown): Promise<void> {
        await this.transition(unit, value);
    }

    /**
     * Navigates to `unit` and waits until that entry is popped; resolves with
     * the value given to `goBack` (undefined on eviction, clear or dispose).
     */
    public async gotoForResult(unit: UnitName, value?: unknown): Promise<unknown> {
        const entry = await this.transition(unit, value);
        return entry.completion.promise;
    }

    /**
     * Pushes inside the critical section and hands back the new entry, so a
     * caller never picks up an entry pushed by a later transition.
     */
    private async transition(unit: UnitName, value: unknown): Promise<PendingEntry> {
        this.ensureAlive();
        await this.lock.acquire();
        try {
            this.ensureAlive();
            if (this.directory && !this.directory.isActive(unit)) {
                throw new UnitNotActiveError(unit);
            }

            const from = this.entries[this.entries.length - 1]?.unitName;
            this.evict();
            const entry = this.push(unit);

            const relationship = from === undefined
                ? Relationship.UNRELATED
                : this.identity.relationshipBetween(from, unit);
            this.notify({ from, to: unit, direction: 'FORWARD', relationship, params: value });
            return entry;
        } finally {
            this.lock.release();
        }
    }

    /**
     * Pending completion of the most recent entry for `unit`, or of the top entry.
     */
    public completion(unit?: UnitName): Promise<unknown> {
        this.ensureAlive();
        for (let i = this.entries.length - 1; i >= 0; i--) {
            const entry = this.entries[i];
            if (entry && (unit === undefined || entry.unitName === unit)) return entry.completion.promise;
        }
        throw new EmptyHistoryError(unit === undefined ? 'await completion' : `await completion of ${unit}`);
    }

    public goBack(value?: unknown): void {
        this.ensureAlive();
        const entry = this.entries.pop();
        if (!entry) throw new EmptyHistoryError('go back');
        this.snapshot = produce(this.snapshot, draft => { draft.pop(); });

        const top = this.entries[this.entries.length - 1];
        if (top) {
            this.logger.info(`Go back to ${top.unitName}`);
            this.notify({
                from: entry.unitName,
                to: top.unitName,
                direction: 'BACK',
                relationship: this.identity.relationshipBetween(entry.unitName, top.unitName),
                params: value
            });
        }

        if (entry.completion.settled) {
            throw new AlreadyResolvedError(entry.unitName);
        }
        entry.completion.resolve(value);
    }

    /**
     * Drops every entry above the root one, resolving their completions with no value.
     */
    public clear(): void {
        this.ensureAlive();
        const removed = this.entries.splice(1);
        this.snapshot = produce(this.snapshot, draft => { draft.splice(1); });
        for (const entry of removed) entry.completion.resolve(undefined);
        this.logger.info(`Cleared ${removed.length} history entries`);
    }

    public dispose(): void {
        if (this.disposed) {
            this.logger.warning('Router already disposed');
            return;
        }
        this.disposed = true;
        for (const entry of this.entries) entry.completion.resolve(undefined);
        this.entries = [];
        this.snapshot = freeze([], true);
        this.lock.dispose();
        this.logger.info('Disposed');
    }

    /**
     * Makes room for one more entry. Evicted completions resolve with no value
     * so nobody waits on an entry that can no longer be popped.
     */
    private evict() {
        const excess = this.entries.length - this.maxDepth + 1;
        if (excess <= 0) return;

        const evicted = this.entries.splice(0, excess);
        this.snapshot = produce(this.snapshot, draft => { draft.splice(0, excess); });
        for (const entry of evicted) entry.completion.resolve(undefined);
        this.logger.debug(`Evicted ${evicted.map(e => e.unitName).join(', ')}`);
    }

    private push(unit: UnitName): PendingEntry {
        const entry: PendingEntry = { unitName: unit, completion: new Deferred<unknown>() };
        this.entries.push(entry);
        this.snapshot = produce(this.snapshot, draft => { draft.push({ unitName: unit }); });
        return entry;
    }

    private notify(ctx: TransitionContext) {
        this.logger.info(`${ctx.direction} ${ctx.from ?? '(none)'} -> ${ctx.to}`);
        if (!this.channel) return;
        this.channel.publish(['router', 'change', ctx.to].join(this.channel.separator), ctx);
    }

    private ensureAlive() {
        if (this.disposed) throw new DisposedError('NavigationCoordinator');
    }
}
