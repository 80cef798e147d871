import { describe, test, expect, jest, afterEach } from '@jest/globals';
import { ConsoleSink, Logger, MemorySink, isLogLevel } from '../Logger.js';

describe('Logger', () => {
    afterEach(() => {
        jest.restoreAllMocks();
    });

    test('1.1 Should drop records below the configured level', () => {
        const sink = new MemorySink();
        const logger = new Logger('warning', [sink]);

        logger.debug('d');
        logger.info('i');
        logger.warning('w');
        logger.error('e');

        expect(sink.messages()).toEqual(['w', 'e']);
        expect(sink.messages('error')).toEqual(['e']);
    });

    test('1.2 Should tag child records and share the parent level', () => {
        const sink = new MemorySink();
        const root = new Logger('info', [sink]);
        const child = root.child('imc', 'cart');

        child.debug('hidden');
        root.setLevel('debug');
        child.debug('shown');

        expect(sink.records).toHaveLength(1);
        expect(sink.records[0]).toMatchObject({ level: 'debug', message: 'shown', tags: ['imc', 'cart'] });
        expect(child.level).toBe('debug');
    });

    test('1.3 Should share sinks added after a child was created', () => {
        const root = new Logger('info', []);
        const child = root.child('events');
        const sink = new MemorySink();

        root.addSink(sink);
        child.info('late');
        root.removeSink('memory');
        child.info('gone');

        expect(sink.messages()).toEqual(['late']);
    });

    test('1.4 Should route console output by level', () => {
        const warn = jest.spyOn(console, 'warn').mockImplementation(() => { });
        const sink = new ConsoleSink();

        sink.write({ level: 'warning', message: 'careful', tags: ['router'], timestamp: '2026-01-01T00:00:00.000Z' });

        expect(warn).toHaveBeenCalledWith('2026-01-01T00:00:00.000Z warning: [router] careful');
    });

    test('1.5 Should recognize level names', () => {
        expect(isLogLevel('warning')).toBe(true);
        expect(isLogLevel('warn')).toBe(false);
    });
});
