// src/kernel-core/L3/Events.ts
import { InvalidChannelError } from '../Errors.js';
import { silentLogger } from '../L0/Logger.js';
import type { Logger } from '../L0/Logger.js';
import type { IdentityProvider, UnitName } from '../L1/Identity.js';
import type { ActionKind, PolicyEngine } from '../L2/Policy.js';

export interface EventContext<T> {
    data: T | undefined;
    name: string;
    /** Segments captured by `*` and `#` */
    params: string[];
}

export type EventCallback<T> = (ctx: EventContext<T>) => void;

/**
 * A listener on a channel pattern. `*` matches one segment, `#` the rest.
 */
export class EventListener {
    constructor(
        public readonly pattern: readonly string[],
        public readonly callback: EventCallback<unknown>,
        public readonly owner?: UnitName
    ) { }

    public matches(channel: readonly string[]): boolean {
        const len = Math.min(channel.length, this.pattern.length);
        for (let i = 0; i < len; i++) {
            const p = this.pattern[i];
            if (p === '#') return true;
            if (p === '*') continue;
            if (channel[i] !== p) return false;
        }
        return channel.length === this.pattern.length;
    }

    public params(channel: readonly string[]): string[] {
        const out: string[] = [];
        for (let i = 0; i < channel.length && i < this.pattern.length; i++) {
            const p = this.pattern[i];
            if (p === '#') return [...out, ...channel.slice(i)];
            if (p === '*') out.push(channel[i] ?? '');
        }
        return out;
    }
}

export interface EventBusOptions {
    separator?: string;
    logger?: Logger;
    policy?: PolicyEngine;
    identity?: IdentityProvider;
}

/**
 * Channel-based event bus with retained events. When a policy engine and an
 * identity provider are configured, every operation is authorized against the
 * unit owning the channel (its first segment); denied operations are dropped.
 */
export class EventBus {
    public readonly separator: string;
    private listeners: EventListener[] = [];
    private retained: Map<string, unknown> = new Map();
    private known: Set<string> = new Set();
    private readonly logger: Logger;
    private readonly policy: PolicyEngine | undefined;
    private readonly identity: IdentityProvider | undefined;

    constructor(options: EventBusOptions = {}) {
        this.separator = options.separator ?? '/';
        this.logger = (options.logger ?? silentLogger).child('events');
        this.policy = options.policy;
        this.identity = options.identity;
    }

    public get listenerCount(): number { return this.listeners.length; }
    public get retainedChannels(): string[] { return Array.from(this.retained.keys()); }

    public on(channel: string, callback: EventCallback<unknown>): EventListener {
        if (channel.length === 0) throw new InvalidChannelError(channel);

        const listener = new EventListener(channel.split(this.separator), callback, this.identity?.identityOf());
        this.deliverRetained(listener);
        this.listeners.push(listener);
        this.logger.info(`Registered listener for '${channel}' (${this.listeners.length} total)`);
        return listener;
    }

    /**
     * Like `on`, but the callback only sees events whose data passes `accepts`.
     */
    public subscribe<T>(channel: string, accepts: (data: unknown) => data is T, callback: EventCallback<T>): EventListener {
        return this.on(channel, ctx => {
            const data = ctx.data;
            if (accepts(data)) callback({ name: ctx.name, params: ctx.params, data });
        });
    }

    public once(channel: string, callback: EventCallback<unknown>): EventListener {
        let fired = false;
        let self: EventListener | undefined;
        const listener = this.on(channel, ctx => {
            if (fired) return;
            fired = true;
            if (self) this.off(self);
            callback(ctx);
        });
        self = listener;
        // Fired during retained delivery, before it was attached to `self`
        if (fired) this.off(listener);
        return listener;
    }

    public off(listener: EventListener): boolean {
        const index = this.listeners.indexOf(listener);
        if (index < 0) {
            this.logger.warning('Attempted to remove non-existent listener');
            return false;
        }
        this.listeners.splice(index, 1);
        this.logger.info(`Removed listener (${this.listeners.length} remaining)`);
        return true;
    }

    /**
     * Returns the number of listeners notified, or -1 when the emission was denied.
     */
    public emit(channel: string, data?: unknown, retain = false): number {
        if (channel.length === 0) {
            this.logger.warning('Attempted to emit event on empty channel');
            return 0;
        }
        const path = channel.split(this.separator);

        if (!this.known.has(channel) && !this.permitted('CREATE_CHANNELS', channel, path)) return -1;
        if (!this.permitted('EMIT', channel, path)) return -1;
        if (retain && !this.permitted('RETAIN', channel, path)) return -1;

        this.known.add(channel);
        if (retain) this.retained.set(channel, data);
        this.logger.info(`Emitting '${channel}'${retain ? ' (retained)' : ''}`);
        return this.deliver(channel, path, data, true);
    }

    /**
     * Emits on a platform channel. No unit owns it, so neither the emission nor
     * the deliveries go through the policy gate.
     */
    public publish(channel: string, data?: unknown): number {
        if (channel.length === 0) throw new InvalidChannelError(channel);
        this.logger.info(`Publishing '${channel}'`);
        return this.deliver(channel, channel.split(this.separator), data, false);
    }

    /**
     * Drops retained events, optionally only under `prefix`. Returns how many were removed.
     */
    public clearRetained(prefix?: string): number {
        let count = 0;
        for (const channel of [...this.retained.keys()]) {
            if (prefix !== undefined && channel !== prefix && !channel.startsWith(prefix + this.separator)) continue;
            if (!this.permitted('CLEAR_RETAINED', channel, channel.split(this.separator))) continue;
            this.retained.delete(channel);
            count++;
        }
        this.logger.info(`Cleared ${count} retained events`);
        return count;
    }

    public clear() {
        const listenerCount = this.listeners.length;
        const retainedCount = this.retained.size;
        this.listeners = [];
        this.retained.clear();
        this.known.clear();
        this.logger.info(`Cleared ${listenerCount} listeners and ${retainedCount} retained events`);
    }

    private deliver(channel: string, path: readonly string[], data: unknown, gated: boolean): number {
        let notified = 0;
        // Snapshot: `once` listeners remove themselves during delivery
        for (const listener of [...this.listeners]) {
            // Removed by an earlier callback of this emission
            if (!this.listeners.includes(listener)) continue;
            if (!listener.matches(path)) continue;
            if (gated && !this.canReceive(listener, channel, path)) continue;
            if (this.invoke(listener, { data, name: channel, params: listener.params(path) })) notified++;
        }
        this.logger.debug(`Notified ${notified} listeners for '${channel}'`);
        return notified;
    }

    private deliverRetained(listener: EventListener) {
        for (const [channel, data] of this.retained) {
            const path = channel.split(this.separator);
            if (!listener.matches(path)) continue;
            if (!this.canReceive(listener, channel, path)) continue;
            this.invoke(listener, { data, name: channel, params: listener.params(path) });
        }
    }

    private invoke(listener: EventListener, ctx: EventContext<unknown>): boolean {
        try {
            listener.callback(ctx);
            return true;
        } catch (e) {
            const message = e instanceof Error ? e.message : String(e);
            this.logger.error(`Error in event listener for '${ctx.name}': ${message}`);
            return false;
        }
    }

    private canReceive(listener: EventListener, channel: string, path: readonly string[]): boolean {
        if (!this.policy || listener.owner === undefined) return true;
        const owner = path[0] ?? channel;
        return this.policy.check('LISTEN', listener.owner, owner, channel, this.separator).ok;
    }

    private permitted(kind: ActionKind, channel: string, path: readonly string[]): boolean {
        if (!this.policy || !this.identity) return true;
        const owner = path[0] ?? channel;
        return this.policy.check(kind, this.identity.identityOf(), owner, channel, this.separator).ok;
    }
}
