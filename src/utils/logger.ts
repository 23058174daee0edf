import pino from 'pino';
import type { LogLevel } from '../types/index.js';

/**
 * Logger singleton. Configured once at startup via `initLogger()`.
 * Uses pino for structured JSON logging with human-readable default.
 */
let loggerInstance: pino.Logger | null = null;

const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug', 'silent'];

/**
 * Initialize the logger with the specified options.
 * Should be called once at CLI startup.
 */
export function initLogger(options: {
    level?: LogLevel;
    jsonLogs?: boolean;
}): pino.Logger {
    const { level = 'info', jsonLogs = false } = options;

    // stdout is reserved for the report
    if (jsonLogs || level === 'silent') {
        loggerInstance = pino({ level }, pino.destination(2));
    } else {
        loggerInstance = pino({
            level,
            transport: {
                target: 'pino-pretty',
                options: {
                    colorize: true,
                    translateTime: 'HH:MM:ss',
                    ignore: 'pid,hostname',
                    destination: 2,
                },
            },
        });
    }

    return loggerInstance;
}

/**
 * Get the logger instance.
 * If not initialized, creates a default logger at `LOG_LEVEL` (or info).
 */
export function getLogger(): pino.Logger {
    if (!loggerInstance) {
        loggerInstance = initLogger({ level: parseLogLevel(process.env['LOG_LEVEL']) ?? 'info' });
    }
    return loggerInstance;
}

export function parseLogLevel(value: string | undefined): LogLevel | undefined {
    return LOG_LEVELS.find((level) => level === value?.toLowerCase());
}
