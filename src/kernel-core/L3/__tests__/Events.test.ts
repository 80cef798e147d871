import { describe, test, expect, beforeEach, jest } from '@jest/globals';
import { EventBus, EventListener } from '../Events.js';
import type { EventContext } from '../Events.js';
import { InvalidChannelError } from '../../Errors.js';
import { Logger, MemorySink } from '../../L0/Logger.js';
import { RelationshipResolver } from '../../L1/Identity.js';
import { UnitRegistry } from '../../L1/UnitRegistry.js';
import { AccessLevel, ALL_ACTION_KINDS, PolicyEngine } from '../../L2/Policy.js';
import type { ActionKind, Policy, ViolationContext } from '../../L2/Policy.js';

const isString = (data: unknown): data is string => typeof data === 'string';

describe('Event Bus', () => {
    let sink: MemorySink;
    let bus: EventBus;

    beforeEach(() => {
        sink = new MemorySink();
        bus = new EventBus({ logger: new Logger('info', [sink]) });
    });

    describe('1. Channel patterns', () => {
        test('1.1 Should match literal, single and rest wildcards', () => {
            const listener = (pattern: string) => new EventListener(pattern.split('/'), () => { });
            const channel = ['user', '42', 'updated'];

            expect(listener('user/42/updated').matches(channel)).toBe(true);
            expect(listener('user/*/updated').matches(channel)).toBe(true);
            expect(listener('user/#').matches(channel)).toBe(true);
            expect(listener('user/*').matches(channel)).toBe(false);
            expect(listener('user/42/updated/x').matches(channel)).toBe(false);
            expect(listener('order/#').matches(channel)).toBe(false);
        });

        test('1.2 Should capture wildcard segments as params', () => {
            const received: EventContext<unknown>[] = [];
            bus.on('user/*/#', ctx => { received.push(ctx); });

            expect(bus.emit('user/42/profile/avatar', 'png')).toBe(1);
            expect(received).toEqual([{ data: 'png', name: 'user/42/profile/avatar', params: ['42', 'profile', 'avatar'] }]);
        });

        test('1.3 Should not deliver to non-matching listeners', () => {
            const callback = jest.fn();
            bus.on('cart/updated', callback);

            expect(bus.emit('cart/cleared')).toBe(0);
            expect(callback).not.toHaveBeenCalled();
        });
    });

    describe('2. Retained events', () => {
        test('2.1 Should replay retained events to late listeners', () => {
            bus.emit('app/ready', true, true);
            const received: EventContext<unknown>[] = [];

            bus.on('app/#', ctx => { received.push(ctx); });

            expect(received).toEqual([{ data: true, name: 'app/ready', params: ['ready'] }]);
            expect(bus.retainedChannels).toEqual(['app/ready']);
        });

        test('2.2 Should keep only the latest retained value per channel', () => {
            bus.emit('theme', 'light', true);
            bus.emit('theme', 'dark', true);
            const callback = jest.fn();

            bus.on('theme', callback);

            expect(callback).toHaveBeenCalledTimes(1);
            expect(callback).toHaveBeenCalledWith({ data: 'dark', name: 'theme', params: [] });
        });

        test('2.3 Should clear retained events under a prefix', () => {
            bus.emit('cart/total', 10, true);
            bus.emit('cart/items', 2, true);
            bus.emit('cartography', 1, true);

            expect(bus.clearRetained('cart')).toBe(2);
            expect(bus.retainedChannels).toEqual(['cartography']);
            expect(bus.clearRetained()).toBe(1);
        });
    });

    describe('3. Subscriptions', () => {
        test('3.1 Should fire a once listener a single time', () => {
            const callback = jest.fn();
            bus.once('ping', callback);

            expect(bus.emit('ping')).toBe(1);
            expect(bus.emit('ping')).toBe(0);
            expect(callback).toHaveBeenCalledTimes(1);
            expect(bus.listenerCount).toBe(0);
        });

        test('3.2 Should detach a once listener served by a retained event', () => {
            bus.emit('ping', 1, true);
            const callback = jest.fn();

            bus.once('ping', callback);
            bus.emit('ping', 2);

            expect(callback).toHaveBeenCalledTimes(1);
            expect(bus.listenerCount).toBe(0);
        });

        test('3.3 Should report whether a listener was removed', () => {
            const listener = bus.on('ping', () => { });

            expect(bus.off(listener)).toBe(true);
            expect(bus.off(listener)).toBe(false);
            expect(sink.messages('warning')).toEqual(['Attempted to remove non-existent listener']);
        });

        test('3.4 Should only pass data accepted by the guard', () => {
            const received: string[] = [];
            bus.subscribe('greeting', isString, ctx => { if (ctx.data !== undefined) received.push(ctx.data.toUpperCase()); });

            bus.emit('greeting', 42);
            bus.emit('greeting', 'hello');

            expect(received).toEqual(['HELLO']);
        });

        test('3.5 Should isolate failing listeners', () => {
            const callback = jest.fn();
            bus.on('ping', () => { throw new Error('listener broke'); });
            bus.on('ping', callback);

            expect(bus.emit('ping')).toBe(1);
            expect(callback).toHaveBeenCalledTimes(1);
            expect(sink.messages('error')).toEqual(["Error in event listener for 'ping': listener broke"]);
        });

        test('3.6 Should reject empty channels', () => {
            expect(() => bus.on('', () => { })).toThrow(InvalidChannelError);
            expect(bus.emit('')).toBe(0);
            expect(sink.messages('warning')).toEqual(['Attempted to emit event on empty channel']);
        });

        test('3.7 Should not deliver to a listener removed earlier in the same emission', () => {
            const late = jest.fn();
            let lateListener: EventListener | undefined;
            bus.on('ping', () => { if (lateListener) bus.off(lateListener); });
            lateListener = bus.on('ping', late);

            expect(bus.emit('ping')).toBe(1);
            expect(late).not.toHaveBeenCalled();
            expect(bus.listenerCount).toBe(1);
        });

        test('3.8 Should drop listeners and retained events on clear', () => {
            bus.on('a', () => { });
            bus.emit('b', 1, true);

            bus.clear();

            expect(bus.listenerCount).toBe(0);
            expect(bus.retainedChannels).toEqual([]);
        });
    });

    describe('4. Policy gate', () => {
        let units: UnitRegistry;
        let policy: PolicyEngine;
        let gated: EventBus;
        let violations: ViolationContext[];

        const catalogPolicy = (permissions: readonly ActionKind[] = ALL_ACTION_KINDS): Policy => ({
            ...PolicyEngine.permissive(),
            emitLevel: AccessLevel.DEPENDENCIES,
            receiveLevel: AccessLevel.DEPENDENCIES,
            permissions: new Set(permissions),
            onViolation: v => { violations.push(v); }
        });

        beforeEach(() => {
            violations = [];
            units = new UnitRegistry();
            units.register({ name: 'cart', dependencies: ['catalog'] });
            units.register({ name: 'catalog' });
            units.register({ name: 'admin' });
            const identity = new RelationshipResolver(units);
            policy = new PolicyEngine(identity);
            policy.setPolicy('catalog', catalogPolicy());
            gated = new EventBus({ policy, identity });
        });

        test('4.1 Should let a dependent unit create and emit on the owner channel', () => {
            units.setCurrent('cart');
            expect(gated.emit('catalog/update', 1)).toBe(0);
            expect(violations).toEqual([]);
        });

        test('4.2 Should refuse channel creation to an unrelated unit', () => {
            units.setCurrent('admin');

            expect(gated.emit('catalog/update', 1)).toBe(-1);
            expect(violations).toHaveLength(1);
            expect(violations[0]).toMatchObject({ sender: 'admin', receiver: 'catalog', kind: 'CREATE_CHANNELS', path: 'catalog/update' });
        });

        test('4.3 Should refuse emission on an existing channel to an unrelated unit', () => {
            units.setCurrent('cart');
            gated.emit('catalog/update', 1);
            units.setCurrent('admin');

            expect(gated.emit('catalog/update', 2)).toBe(-1);
            expect(violations[0]?.kind).toBe('EMIT');
        });

        test('4.4 Should skip listeners whose owner may not receive', () => {
            const adminCallback = jest.fn();
            const cartCallback = jest.fn();
            units.setCurrent('admin');
            gated.on('catalog/#', adminCallback);
            units.setCurrent('cart');
            gated.on('catalog/#', cartCallback);

            expect(gated.emit('catalog/update', 1)).toBe(1);
            expect(adminCallback).not.toHaveBeenCalled();
            expect(cartCallback).toHaveBeenCalledTimes(1);
            expect(violations.map(v => v.kind)).toEqual(['LISTEN']);
        });

        test('4.5 Should publish platform channels outside the gate', () => {
            const callback = jest.fn();
            units.setCurrent('admin');
            gated.on('catalog/#', callback);

            expect(gated.publish('catalog/reindexed', 1)).toBe(1);
            expect(callback).toHaveBeenCalledTimes(1);
            expect(violations).toEqual([]);
            expect(() => gated.publish('')).toThrow(InvalidChannelError);
        });

        test('4.6 Should check RETAIN separately from EMIT', () => {
            policy.setPolicy('catalog', catalogPolicy(['CREATE_CHANNELS', 'EMIT', 'LISTEN']));
            units.setCurrent('cart');

            expect(gated.emit('catalog/update', 1, true)).toBe(-1);
            expect(gated.retainedChannels).toEqual([]);
            expect(violations.map(v => v.code)).toEqual(['PERMISSION_DENIED']);
        });
    });
});
