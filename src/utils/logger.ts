import pino from 'pino';
import { LOG_LEVELS, type LogLevel } from '../types/index.js';

/**
 * Logger singleton. Configured once at startup via `initLogger()`.
 * Uses pino for structured JSON logging with human-readable default.
 */
let loggerInstance: pino.Logger | null = null;

/**
 * Initialize the logger with the specified options.
 * Should be called once at CLI startup.
 */
export function initLogger(options: {
    level?: LogLevel;
    jsonLogs?: boolean;
}): pino.Logger {
    const { level = 'info', jsonLogs = false } = options;

    if (jsonLogs || level === 'silent') {
        loggerInstance = pino({ level }, stderrDestination());
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
 * If not initialized, creates a default logger at PUBTRAIL_LOG_LEVEL (info).
 */
export function getLogger(): pino.Logger {
    if (!loggerInstance) {
        loggerInstance = initLogger({ level: parseLogLevel(process.env['PUBTRAIL_LOG_LEVEL']) ?? 'info' });
    }
    return loggerInstance;
}

/**
 * Logs go to stderr so stdout carries only command output.
 */
export function stderrDestination(): ReturnType<typeof pino.destination> {
    return pino.destination(2);
}

export function parseLogLevel(value: string | undefined): LogLevel | undefined {
    return LOG_LEVELS.find((level) => level === value);
}
