import pino from 'pino';
import type { LogLevel } from '../types/index.js';

/**
 * Logger singleton. Configured once at startup via `initLogger()`.
 * Uses pino for structured logging with human-readable default output.
 *
 * Modules call `getLogger()` where they log, so a level or format chosen
 * on the command line reaches every module.
 */
let loggerInstance: pino.Logger | null = null;

/**
 * Initialize the logger with the specified options.
 * Should be called once at CLI startup.
 */
export function initLogger(options: {
    level?: LogLevel | 'silent';
    jsonLogs?: boolean;
}): pino.Logger {
    const { level = 'info', jsonLogs = false } = options;

    if (jsonLogs || level === 'silent') {
        loggerInstance = pino({ level });
    } else {
        loggerInstance = pino({
            level,
            transport: {
                target: 'pino-pretty',
                options: {
                    colorize: true,
                    translateTime: 'HH:MM:ss',
                    ignore: 'pid,hostname',
                },
            },
        });
    }

    return loggerInstance;
}

/**
 * Get the logger instance.
 * If not initialized, creates a logger at `CMDBMAP_LOG_LEVEL` (default info).
 */
export function getLogger(): pino.Logger {
    if (!loggerInstance) {
        loggerInstance = initLogger({ level: parseLogLevel(process.env['CMDBMAP_LOG_LEVEL']) });
    }
    return loggerInstance;
}

function parseLogLevel(value: string | undefined): LogLevel | 'silent' {
    switch (value) {
        case 'error':
        case 'warn':
        case 'info':
        case 'debug':
        case 'silent':
            return value;
        default:
            return 'info';
    }
}
