import type { LogConfig } from '../types/config.types.js';
import { getCorrelationId } from '../errors/index.js';
import { pino, destination as pinoDestination, type Logger as PinoLogger } from 'pino';
import { prettyFactory } from 'pino-pretty';

export interface LogMeta {
    correlationId?: string;
    pdfPath?: string;
    pageNumber?: number;
    [key: string]: unknown;
}

export interface Logger {
    debug(message: string, meta?: LogMeta): void;
    info(message: string, meta?: LogMeta): void;
    warn(message: string, meta?: LogMeta): void;
    error(message: string, meta?: LogMeta): void;
}

type LogLevel = LogConfig['level'];

const LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
};

/** stderr, so stdout carries only command output */
const LOG_FD = 2;

const PRETTY_OPTIONS = {
    colorize: true,
    translateTime: 'SYS:standard',
    ignore: 'pid,hostname',
} as const;

function createPinoLogger(config: LogConfig): PinoLogger {
    const { destination } = config;
    if (destination) {
        // formatted in-process so each line reaches the sink before the call returns
        if (config.structured === false) {
            const prettify = prettyFactory(PRETTY_OPTIONS);
            return pino({ level: config.level }, {
                write: (line: string) => destination.write(prettify(line)),
            });
        }
        return pino({ level: config.level }, destination);
    }
    if (config.structured === false) {
        return pino({
            level: config.level,
            transport: {
                target: 'pino-pretty',
                options: { ...PRETTY_OPTIONS, destination: LOG_FD },
            },
        });
    }
    return pino({ level: config.level }, pinoDestination(LOG_FD));
}

/**
 * Creates a Pino logger instance
 * Automatically injects correlation ID into all log entries
 *
 * - Structured JSON for machine consumption
 * - pino-pretty transport when `structured` is false
 * - `destination` swaps stderr for a synchronous sink
 * - `customLogger` replaces pino entirely
 */
export function createLogger(config: LogConfig): Logger {
    const pinoLogger = config.customLogger ? undefined : createPinoLogger(config);

    /**
     * Enrich metadata with correlation ID
     */
    const enrichMeta = (meta?: LogMeta): LogMeta => ({
        correlationId: meta?.correlationId ?? getCorrelationId(),
        ...meta,
    });

    const log = (level: LogLevel, message: string, meta?: LogMeta): void => {
        const enrichedMeta = enrichMeta(meta);

        if (config.customLogger) {
            if (LEVEL_ORDER[level] >= LEVEL_ORDER[config.level]) {
                config.customLogger(level, message, enrichedMeta);
            }
            return;
        }

        pinoLogger?.[level](enrichedMeta, message);
    };

    return {
        debug: (message: string, meta?: LogMeta) => log('debug', message, meta),
        info: (message: string, meta?: LogMeta) => log('info', message, meta),
        warn: (message: string, meta?: LogMeta) => log('warn', message, meta),
        error: (message: string, meta?: LogMeta) => log('error', message, meta),
    };
}
