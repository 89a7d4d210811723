import pino from 'pino';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

type LogFn = (contextOrMessage: Record<string, unknown> | string, message?: string) => void;

export interface Logger {
    debug: LogFn;
    info: LogFn;
    warn: LogFn;
    error: LogFn;
}

export function isLogLevel(value: string | undefined): value is LogLevel {
    return LOG_LEVELS.some(level => level === value);
}

export const silentLogger: Logger = {
    debug() {},
    info() {},
    warn() {},
    error() {},
};

/**
 * Creates a structured logger writing JSON lines to stderr, so stdout stays
 * free for the run report.
 *
 * @example
 * ```ts
 * const logger = createLogger({ module: 'harness' });
 * logger.info({ fixture: path }, 'Fixture written');
 * ```
 */
export function createLogger(
    context: Record<string, unknown> = {},
    options: { level?: LogLevel } = {}
): Logger {
    const envLevel = process.env.BITMAP_ORACLE_LOG_LEVEL;
    const level = options.level ?? (isLogLevel(envLevel) ? envLevel : 'info');

    if (level === 'silent') {
        return silentLogger;
    }

    const base = pino({ level, base: context }, pino.destination(2));

    const forward = (method: Exclude<LogLevel, 'silent'>): LogFn => (contextOrMessage, message) => {
        if (typeof contextOrMessage === 'string') {
            base[method](contextOrMessage);
        } else {
            base[method](contextOrMessage, message ?? '');
        }
    };

    return {
        debug: forward('debug'),
        info: forward('info'),
        warn: forward('warn'),
        error: forward('error'),
    };
}
