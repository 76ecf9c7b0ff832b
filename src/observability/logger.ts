/**
 * Structured logger with run correlation support
 */
import pino from 'pino';
import { logLevelSchema } from '../config/index.js';

// Level is read directly so the logger works before configuration is loaded
const initialLevel = logLevelSchema.catch('info').parse(process.env['LOG_LEVEL']);

// Create base logger
const baseLogger = pino({
    level: initialLevel,
    base: {
        service: 'unreeled',
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
        level: (label) => ({ level: label }),
    },
});

export interface LogContext {
    runId?: string;
    targetDate?: string;
    provider?: string;
    mediaType?: string;
    stage?: 'config' | 'fetch' | 'normalize' | 'filter' | 'dedup' | 'enrich' | 'write';
}

export class Logger {
    private logger: pino.Logger;

    constructor(context?: LogContext) {
        this.logger = context ? baseLogger.child(context) : baseLogger;
    }

    child(context: LogContext): Logger {
        const newLogger = new Logger();
        newLogger.logger = this.logger.child(context);
        return newLogger;
    }

    debug(message: string, data?: Record<string, unknown>): void {
        this.logger.debug(data || {}, message);
    }

    info(message: string, data?: Record<string, unknown>): void {
        this.logger.info(data || {}, message);
    }

    warn(message: string, data?: Record<string, unknown>): void {
        this.logger.warn(data || {}, message);
    }

    error(message: string, error?: unknown, data?: Record<string, unknown>): void {
        const errorData = error instanceof Error
            ? { error: { code: error.name, message: error.message, stack: error.stack } }
            : { error };
        this.logger.error({ ...errorData, ...data }, message);
    }
}

/**
 * Apply the configured level once configuration has been validated
 */
export function setLogLevel(level: pino.LevelWithSilent): void {
    baseLogger.level = level;
}

export const logger = new Logger();
