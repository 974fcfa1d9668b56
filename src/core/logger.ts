/**
 * Tagged console logger: `[Pipeline] run 1f2e… complete in 0.41ms`
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
    silent: 100,
};

export interface Logger {
    debug(message: string, ...details: unknown[]): void;
    info(message: string, ...details: unknown[]): void;
    warn(message: string, ...details: unknown[]): void;
    error(message: string, ...details: unknown[]): void;
}

function isLogLevel(value: string): value is LogLevel {
    return Object.hasOwn(LEVEL_ORDER, value);
}

export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
    const configured = env.LOG_LEVEL?.toLowerCase();
    if (configured && isLogLevel(configured)) {
        return configured;
    }
    return env.NODE_ENV === 'test' ? 'silent' : 'info';
}

export function createLogger(tag: string, level: LogLevel = resolveLogLevel()): Logger {
    const threshold = LEVEL_ORDER[level];
    const prefix = `[${tag}]`;

    const enabled = (l: LogLevel) => LEVEL_ORDER[l] >= threshold;

    return {
        debug: (message, ...details) => {
            if (enabled('debug')) console.debug(`${prefix} ${message}`, ...details);
        },
        info: (message, ...details) => {
            if (enabled('info')) console.log(`${prefix} ${message}`, ...details);
        },
        warn: (message, ...details) => {
            if (enabled('warn')) console.warn(`${prefix} ${message}`, ...details);
        },
        error: (message, ...details) => {
            if (enabled('error')) console.error(`${prefix} ${message}`, ...details);
        },
    };
}
