import { describe, test, expect } from '@jest/globals';
import { ConfigValidator, DEFAULT_CONFIG, configFromEnv, resolveConfig } from '../Config.js';
import { ConfigError } from '../../kernel-core/Errors.js';

describe('Platform Configuration', () => {
    test('1.1 Should fall back to the defaults', () => {
        expect(resolveConfig({}, {})).toEqual({
            actionSeparator: '.',
            eventSeparator: '/',
            maxHistoryDepth: 20,
            logLevel: 'info',
            enforceActiveUnits: true
        });
    });

    test('1.2 Should read the environment', () => {
        expect(configFromEnv({ MODGATE_LOG_LEVEL: 'debug', MODGATE_MAX_HISTORY: '5' })).toEqual({
            logLevel: 'debug',
            maxHistoryDepth: 5
        });
        expect(configFromEnv({ MODGATE_LOG_LEVEL: '', OTHER: 'x' })).toEqual({});
    });

    test('1.3 Should let explicit overrides beat the environment', () => {
        const config = resolveConfig({ logLevel: 'error' }, { MODGATE_LOG_LEVEL: 'debug', MODGATE_MAX_HISTORY: '3' });

        expect(config.logLevel).toBe('error');
        expect(config.maxHistoryDepth).toBe(3);
    });

    test('1.4 Should reject malformed environment values', () => {
        expect(() => configFromEnv({ MODGATE_LOG_LEVEL: 'loud' })).toThrow("MODGATE_LOG_LEVEL: unknown level 'loud'");
        expect(() => configFromEnv({ MODGATE_MAX_HISTORY: 'ten' })).toThrow(ConfigError);
    });

    test('1.5 Should name the offending field', () => {
        const attempt = (overrides: Parameters<typeof resolveConfig>[0]) => {
            try {
                resolveConfig(overrides, {});
                return undefined;
            } catch (e) {
                return e instanceof ConfigError ? e.field : String(e);
            }
        };

        expect(attempt({ actionSeparator: '' })).toBe('actionSeparator');
        expect(attempt({ eventSeparator: '.' })).toBe('eventSeparator');
        expect(attempt({ maxHistoryDepth: 0 })).toBe('maxHistoryDepth');
        expect(attempt({ maxHistoryDepth: 1.5 })).toBe('maxHistoryDepth');
        expect(attempt({ maxHistoryDepth: 1 })).toBeUndefined();
    });

    test('1.6 Should accept the defaults as they are', () => {
        expect(() => ConfigValidator.validate({ ...DEFAULT_CONFIG })).not.toThrow();
        expect(Object.isFrozen(DEFAULT_CONFIG)).toBe(true);
    });
});
