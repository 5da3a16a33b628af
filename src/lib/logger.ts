/**
 * Logger interface for graph execution.
 * Users can provide their own logger (e.g., pino, winston, console).
 */
export interface Logger {
    debug(message: string, meta?: LogMeta): void;
    info(message: string, meta?: LogMeta): void;
    warn(message: string, meta?: LogMeta): void;
    error(message: string, meta?: LogMeta): void;
}

export type LogMeta = Record<string, unknown>;

/** Levels from most to least verbose; `silent` drops everything */
export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

type EntryLevel = Exclude<LogLevel, 'silent'>;

/**
 * Default no-op logger (silent)
 */
export const noopLogger: Logger = {
    debug: () => { },
    info: () => { },
    warn: () => { },
    error: () => { },
};

/**
 * Console logger writing `[prefix:LEVEL] message`.
 */
export function createConsoleLogger(prefix = 'StepGraph'): Logger {
    const tag = (level: EntryLevel) => `[${prefix}:${level.toUpperCase()}]`;

    return {
        debug: (msg, meta) => console.debug(`${tag('debug')} ${msg}`, meta ?? ''),
        info: (msg, meta) => console.info(`${tag('info')} ${msg}`, meta ?? ''),
        warn: (msg, meta) => console.warn(`${tag('warn')} ${msg}`, meta ?? ''),
        error: (msg, meta) => console.error(`${tag('error')} ${msg}`, meta ?? ''),
    };
}

/**
 * Console logger for development/debugging
 */
export const consoleLogger: Logger = createConsoleLogger();

/**
 * Only forwards entries at or above `level`.
 */
export function createFilteredLogger(baseLogger: Logger, level: LogLevel): Logger {
    const threshold = LOG_LEVELS.indexOf(level);
    const enabled = (entry: EntryLevel) => LOG_LEVELS.indexOf(entry) >= threshold;

    return {
        debug: (msg, meta) => { if (enabled('debug')) baseLogger.debug(msg, meta); },
        info: (msg, meta) => { if (enabled('info')) baseLogger.info(msg, meta); },
        warn: (msg, meta) => { if (enabled('warn')) baseLogger.warn(msg, meta); },
        error: (msg, meta) => { if (enabled('error')) baseLogger.error(msg, meta); },
    };
}

/**
 * Binds fixed metadata (thread id, run id) to every entry written through the logger.
 * Per-entry metadata wins on key collisions.
 */
export function withLogContext(baseLogger: Logger, context: LogMeta): Logger {
    return {
        debug: (msg, meta) => baseLogger.debug(msg, { ...context, ...meta }),
        info: (msg, meta) => baseLogger.info(msg, { ...context, ...meta }),
        warn: (msg, meta) => baseLogger.warn(msg, { ...context, ...meta }),
        error: (msg, meta) => baseLogger.error(msg, { ...context, ...meta }),
    };
}
