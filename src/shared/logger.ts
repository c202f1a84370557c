// ============================================================
// Structured logger (pino)
// ============================================================

import pino from 'pino';
import type { Logger as PinoLogger, LoggerOptions as PinoLoggerOptions } from 'pino';
import type { LogLevel } from './config.js';

export type Logger = PinoLogger;

export interface LoggerOptions {
    level?: LogLevel;
    /** Human-readable output through pino-pretty (development) */
    pretty?: boolean;
    /** Write to stderr; stdout belongs to the MCP stdio transport in the agent */
    stderr?: boolean;
}

const REDACT_PATHS = ['token', 'authorization', 'jwtSecret', '*.token', 'headers.authorization'];

export function createLogger(options: LoggerOptions = {}): Logger {
    const config: PinoLoggerOptions = {
        level: options.level ?? 'info',
        redact: {
            paths: REDACT_PATHS,
            censor: '[REDACTED]',
        },
        formatters: {
            level: (label) => ({ level: label }),
        },
        timestamp: pino.stdTimeFunctions.isoTime,
    };

    if (options.pretty) {
        config.transport = {
            target: 'pino-pretty',
            options: {
                colorize: true,
                translateTime: 'SYS:HH:MM:ss',
                ignore: 'pid,hostname',
                destination: options.stderr ? 2 : 1,
            },
        };
        return pino(config);
    }

    return options.stderr ? pino(config, pino.destination(2)) : pino(config);
}

/**
 * Silent logger for tests and embedders that bring their own.
 */
export function createNullLogger(): Logger {
    return pino({ level: 'silent' });
}
