/**
 * Centralized Logging Utility
 * Timestamped, levelled console output with optional per-target scopes
 */

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

const levels: Record<LogLevel, number> = {
    DEBUG: 0,
    INFO: 1,
    WARN: 2,
    ERROR: 3,
};

let currentLevel = levels.INFO;
let debugMode = false;

function timestamp(): string {
    return new Date().toISOString().substring(11, 23);
}

function format(
    label: string,
    emoji: string,
    scope: string | undefined,
    message: string,
    args: unknown[]
): unknown[] {
    const prefix = scope ? `[${timestamp()}] ${emoji} ${label} [${scope}]:` : `[${timestamp()}] ${emoji} ${label}:`;
    return [prefix, message, ...args];
}

export interface ScopedLogger {
    debug(message: string, ...args: unknown[]): void;
    info(message: string, ...args: unknown[]): void;
    warn(message: string, ...args: unknown[]): void;
    error(message: string, ...args: unknown[]): void;
    success(message: string, ...args: unknown[]): void;
}

function createLogger(scope?: string): ScopedLogger {
    return {
        debug(message: string, ...args: unknown[]): void {
            if (currentLevel <= levels.DEBUG && debugMode) {
                console.log(...format('DEBUG', '🔍', scope, message, args));
            }
        },

        info(message: string, ...args: unknown[]): void {
            if (currentLevel <= levels.INFO) {
                console.log(...format('INFO', 'ℹ️', scope, message, args));
            }
        },

        warn(message: string, ...args: unknown[]): void {
            if (currentLevel <= levels.WARN) {
                console.warn(...format('WARN', '⚠️', scope, message, args));
            }
        },

        error(message: string, ...args: unknown[]): void {
            if (currentLevel <= levels.ERROR) {
                console.error(...format('ERROR', '❌', scope, message, args));
            }
        },

        success(message: string, ...args: unknown[]): void {
            if (currentLevel <= levels.INFO) {
                console.log(...format('SUCCESS', '✅', scope, message, args));
            }
        },
    };
}

export const Logger = {
    ...createLogger(),

    levels,

    /** Logger whose lines carry a scope tag, e.g. one per polled target */
    scoped(scope: string): ScopedLogger {
        return createLogger(scope);
    },

    setLevel(level: LogLevel): void {
        currentLevel = levels[level] ?? levels.INFO;
    },

    getLevel(): LogLevel {
        const names: LogLevel[] = ['DEBUG', 'INFO', 'WARN', 'ERROR'];
        return names.find(name => levels[name] === currentLevel) ?? 'INFO';
    },

    setDebugMode(enabled: boolean): void {
        debugMode = enabled;
    },
};
