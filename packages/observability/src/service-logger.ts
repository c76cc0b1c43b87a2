/**
 * Structured logger bound to one service.
 *
 * Adds the service name to every line, filters by minimum level and
 * redacts metadata keys that look like credentials before they reach
 * the base logger.
 */

import { log as baseLog, type LogLevel } from './logger.js';

export interface ServiceLoggerConfig {
    /** Service name injected into every log line. */
    service: string;
    /** Minimum log level (default: LOG_LEVEL, else 'info' in production and 'debug' elsewhere). */
    minLevel?: LogLevel;
    /** Fields to redact from metadata (default: access_key, token, secret, etc.). */
    redactFields?: string[];
}

export interface ServiceLogger {
    debug(message: string, metadata?: Record<string, unknown>): void;
    info(message: string, metadata?: Record<string, unknown>): void;
    warn(message: string, metadata?: Record<string, unknown>): void;
    error(message: string, metadata?: Record<string, unknown>): void;
}

const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3
};

const DEFAULT_REDACT_FIELDS = [
    'password',
    'token',
    'secret',
    'authorization',
    'access_key',
    'accessKey',
    'apiKey',
    'api_key'
];

function isLogLevel(value: string | undefined): value is LogLevel {
    return value !== undefined && Object.hasOwn(LOG_LEVEL_ORDER, value);
}

export function redactMetadata(
    metadata: Record<string, unknown>,
    redactFields: string[] = DEFAULT_REDACT_FIELDS
): Record<string, unknown> {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(metadata)) {
        if (redactFields.some((f) => key.toLowerCase().includes(f.toLowerCase()))) {
            result[key] = '[REDACTED]';
        } else if (typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date)) {
            result[key] = redactMetadata(Object.fromEntries(Object.entries(value)), redactFields);
        } else {
            result[key] = value;
        }
    }
    return result;
}

export function createServiceLogger(config: ServiceLoggerConfig): ServiceLogger {
    const env = process.env.NODE_ENV ?? 'development';
    const envLevel = process.env.LOG_LEVEL;
    const minLevel = config.minLevel ?? (isLogLevel(envLevel) ? envLevel : env === 'production' ? 'info' : 'debug');
    const minLevelOrder = LOG_LEVEL_ORDER[minLevel];
    const redactFields = config.redactFields ?? DEFAULT_REDACT_FIELDS;

    const emit = (level: LogLevel, message: string, metadata?: Record<string, unknown>): void => {
        if (LOG_LEVEL_ORDER[level] < minLevelOrder) return;

        baseLog(level, message, {
            service: config.service,
            ...(metadata ? redactMetadata(metadata, redactFields) : {})
        });
    };

    return {
        debug: (message, metadata) => emit('debug', message, metadata),
        info: (message, metadata) => emit('info', message, metadata),
        warn: (message, metadata) => emit('warn', message, metadata),
        error: (message, metadata) => emit('error', message, metadata)
    };
}
