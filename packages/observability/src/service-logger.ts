/**
 * Structured logger bound to one service or component.
 *
 * Every line carries the service name, entries below the minimum level are
 * dropped, and metadata keys that look like credentials are redacted before
 * they reach the base logger.
 */

import { log as baseLog, type LogLevel } from './logger.js';

export interface ServiceLoggerConfig {
    /** Service name injected into every log line. */
    service: string;
    /** Minimum log level (default: 'info' in production, 'debug' elsewhere). */
    minLevel?: LogLevel;
    /** Metadata keys to redact, matched case-insensitively as substrings. */
    redactFields?: string[];
    /** Extra fields merged into every entry. */
    bindings?: Record<string, unknown>;
}

export interface ServiceLogger {
    debug(message: string, metadata?: Record<string, unknown>): void;
    info(message: string, metadata?: Record<string, unknown>): void;
    warn(message: string, metadata?: Record<string, unknown>): void;
    error(message: string, metadata?: Record<string, unknown>): void;
    /** Derive a logger that adds `bindings` to every entry. */
    child(bindings: Record<string, unknown>): ServiceLogger;
}

const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3
};

const DEFAULT_REDACT_FIELDS = [
    'password',
    'secret',
    'token',
    'authorization',
    'apiKey',
    'api_key',
    'databaseUrl',
    'database_url',
    'connectionString'
];

function isPlainObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

export function redactMetadata(metadata: Record<string, unknown>, redactFields: string[]): Record<string, unknown> {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(metadata)) {
        if (redactFields.some((field) => key.toLowerCase().includes(field.toLowerCase()))) {
            result[key] = '[REDACTED]';
        } else if (isPlainObject(value)) {
            result[key] = redactMetadata(value, redactFields);
        } else {
            result[key] = value;
        }
    }
    return result;
}

export function createServiceLogger(config: ServiceLoggerConfig): ServiceLogger {
    const env = process.env.NODE_ENV ?? 'development';
    const minLevel = config.minLevel ?? (env === 'production' ? 'info' : 'debug');
    const minLevelOrder = LOG_LEVEL_ORDER[minLevel];
    const redactFields = config.redactFields ?? DEFAULT_REDACT_FIELDS;
    const bindings = config.bindings ?? {};

    const emit = (level: LogLevel, message: string, metadata?: Record<string, unknown>): void => {
        if (LOG_LEVEL_ORDER[level] < minLevelOrder) return;

        const enriched = redactMetadata(
            {
                service: config.service,
                ...bindings,
                ...(metadata ?? {})
            },
            redactFields
        );

        baseLog(level, message, enriched);
    };

    return {
        debug: (message, metadata) => emit('debug', message, metadata),
        info: (message, metadata) => emit('info', message, metadata),
        warn: (message, metadata) => emit('warn', message, metadata),
        error: (message, metadata) => emit('error', message, metadata),
        child: (extra) =>
            createServiceLogger({
                ...config,
                minLevel,
                redactFields,
                bindings: { ...bindings, ...extra }
            })
    };
}
