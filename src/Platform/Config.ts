// src/Platform/Config.ts
import { ConfigError } from '../kernel-core/Errors.js';
import { isLogLevel } from '../kernel-core/L0/Logger.js';
import type { LogLevel } from '../kernel-core/L0/Logger.js';
import { DEFAULT_MAX_DEPTH } from '../kernel-core/L4/Navigation.js';

export interface PlatformConfig {
    actionSeparator: string;
    eventSeparator: string;
    maxHistoryDepth: number;
    logLevel: LogLevel;
    /** Refuse navigation to units that are not ACTIVE */
    enforceActiveUnits: boolean;
}

export const DEFAULT_CONFIG: Readonly<PlatformConfig> = Object.freeze({
    actionSeparator: '.',
    eventSeparator: '/',
    maxHistoryDepth: DEFAULT_MAX_DEPTH,
    logLevel: 'info',
    enforceActiveUnits: true
});

export type Environment = Record<string, string | undefined>;

/**
 * Reads MODGATE_LOG_LEVEL and MODGATE_MAX_HISTORY.
 */
export function configFromEnv(env: Environment): Partial<PlatformConfig> {
    const out: Partial<PlatformConfig> = {};

    const level = env['MODGATE_LOG_LEVEL'];
    if (level !== undefined && level !== '') {
        if (!isLogLevel(level)) {
            throw new ConfigError(`MODGATE_LOG_LEVEL: unknown level '${level}'`, 'logLevel');
        }
        out.logLevel = level;
    }

    const depth = env['MODGATE_MAX_HISTORY'];
    if (depth !== undefined && depth !== '') {
        const parsed = Number(depth);
        if (!Number.isInteger(parsed)) {
            throw new ConfigError(`MODGATE_MAX_HISTORY: '${depth}' is not an integer`, 'maxHistoryDepth');
        }
        out.maxHistoryDepth = parsed;
    }
    return out;
}

export class ConfigValidator {
    static validate(config: PlatformConfig): void {
        if (!config.actionSeparator) {
            throw new ConfigError('PlatformConfig: actionSeparator cannot be empty', 'actionSeparator');
        }
        if (!config.eventSeparator) {
            throw new ConfigError('PlatformConfig: eventSeparator cannot be empty', 'eventSeparator');
        }
        if (config.actionSeparator === config.eventSeparator) {
            throw new ConfigError('PlatformConfig: actionSeparator and eventSeparator must differ', 'eventSeparator');
        }
        if (!Number.isInteger(config.maxHistoryDepth) || config.maxHistoryDepth < 1) {
            throw new ConfigError('PlatformConfig: maxHistoryDepth must be a positive integer', 'maxHistoryDepth');
        }
        if (!isLogLevel(config.logLevel)) {
            throw new ConfigError(`PlatformConfig: unknown logLevel '${config.logLevel}'`, 'logLevel');
        }
    }
}

/**
 * Defaults, then environment, then explicit overrides.
 */
export function resolveConfig(overrides: Partial<PlatformConfig> = {}, env: Environment = process.env): PlatformConfig {
    const config: PlatformConfig = { ...DEFAULT_CONFIG, ...configFromEnv(env), ...overrides };
    ConfigValidator.validate(config);
    return config;
}
