// src/kernel-core/L0/Logger.ts

export type LogLevel = 'debug' | 'info' | 'warning' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warning', 'error'];

const SEVERITY: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warning: 2,
    error: 3
};

export function isLogLevel(value: string): value is LogLevel {
    return LOG_LEVELS.some(level => level === value);
}

export interface LogRecord {
    level: LogLevel;
    message: string;
    tags: string[];
    timestamp: string;
}

/**
 * Log Sink Port
 * Receives every record that passes the logger's level filter.
 */
export interface ILogSink {
    readonly name: string;
    write(record: LogRecord): void;
}

export class ConsoleSink implements ILogSink {
    public readonly name = 'console';

    public write(record: LogRecord): void {
        const line = `${record.timestamp} ${record.level}: [${record.tags.join(',')}] ${record.message}`;
        switch (record.level) {
            case 'error':
                console.error(line);
                break;
            case 'warning':
                console.warn(line);
                break;
            default:
                console.log(line);
        }
    }
}

/**
 * Collects records in memory. Used by tests and diagnostics panels.
 */
export class MemorySink implements ILogSink {
    public readonly name = 'memory';
    public readonly records: LogRecord[] = [];

    public write(record: LogRecord): void {
        this.records.push(record);
    }

    public messages(level?: LogLevel): string[] {
        return this.records
            .filter(r => level === undefined || r.level === level)
            .map(r => r.message);
    }
}

/**
 * Tagged, levelled logger. Child loggers share sinks and level with the
 * parent and add their own tags.
 */
export class Logger {
    private core: { level: LogLevel; sinks: Map<string, ILogSink> };

    constructor(
        level: LogLevel = 'info',
        sinks: ILogSink[] = [new ConsoleSink()],
        private readonly tags: readonly string[] = []
    ) {
        this.core = { level, sinks: new Map(sinks.map(s => [s.name, s])) };
    }

    public get level(): LogLevel { return this.core.level; }

    public setLevel(level: LogLevel) {
        this.core.level = level;
    }

    public addSink(sink: ILogSink) {
        this.core.sinks.set(sink.name, sink);
    }

    public removeSink(name: string) {
        this.core.sinks.delete(name);
    }

    public child(...tags: string[]): Logger {
        const child = new Logger(this.core.level, [], [...this.tags, ...tags]);
        child.core = this.core;
        return child;
    }

    public debug(message: string) { this.log('debug', message); }
    public info(message: string) { this.log('info', message); }
    public warning(message: string) { this.log('warning', message); }
    public error(message: string) { this.log('error', message); }

    public log(level: LogLevel, message: string) {
        if (SEVERITY[level] < SEVERITY[this.core.level]) return;

        const record: LogRecord = {
            level,
            message,
            tags: [...this.tags],
            timestamp: new Date().toISOString()
        };
        for (const sink of this.core.sinks.values()) {
            sink.write(record);
        }
    }
}

/**
 * Logger that drops everything. Default for components built without one.
 */
export const silentLogger = new Logger('error', []);
