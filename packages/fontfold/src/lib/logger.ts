// fontfold/src/lib/logger.ts
// Prefix logger. Every component receives one explicitly.

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface LogContext {
    [key: string]: unknown;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
    silent: 100,
};

export function isLogLevel(value: unknown): value is LogLevel {
    return typeof value === 'string' && value in LEVEL_ORDER;
}

export class Logger {
    constructor(
        private readonly prefix: string,
        private readonly context: LogContext = {},
        readonly level: LogLevel = 'info',
    ) {}

    debug(message: string, context?: LogContext): void {
        this.log('debug', message, context);
    }

    info(message: string, context?: LogContext): void {
        this.log('info', message, context);
    }

    warn(message: string, context?: LogContext): void {
        this.log('warn', message, context);
    }

    error(message: string, error?: Error, context?: LogContext): void {
        const errorContext = error
            ? { error: error.message, ...context }
            : context;
        this.log('error', message, errorContext);
    }

    /** Logger for a sub-component: same level, prefix `Parent:child`. */
    child(prefix: string, context?: LogContext): Logger {
        return new Logger(`${this.prefix}:${prefix}`, { ...this.context, ...context }, this.level);
    }

    private log(level: Exclude<LogLevel, 'silent'>, message: string, context?: LogContext): void {
        if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) return;

        const fullContext = { ...this.context, ...context };
        const contextStr =
            Object.keys(fullContext).length > 0
                ? ` ${JSON.stringify(fullContext)}`
                : '';

        const formattedMessage = `[${this.prefix}] ${message}${contextStr}`;

        switch (level) {
            case 'debug':
                console.debug(formattedMessage);
                break;
            case 'info':
                console.log(formattedMessage);
                break;
            case 'warn':
                console.warn(formattedMessage);
                break;
            case 'error':
                console.error(formattedMessage);
                break;
        }
    }
}

export function createLogger(prefix: string, context?: LogContext, level?: LogLevel): Logger {
    return new Logger(prefix, context, level);
}
