/**
 * Structured Logger
 *
 * Pino-based structured JSON logging.
 * - Local: pretty-printed, colorized (pino-pretty)
 * - Everywhere else: JSON lines
 *
 * Child loggers for subsystems:
 *   const log = createLogger('SimulationEngine');
 *   log.info({ year, startWeek }, 'Simulation started');
 */

import pino from 'pino';

const isLocal = !process.env.NODE_ENV || process.env.NODE_ENV === 'development';
const isTest = process.env.NODE_ENV === 'test';

export const logger = pino({
    level: process.env.LOG_LEVEL || (isTest ? 'silent' : isLocal ? 'debug' : 'info'),

    redact: {
        paths: [
            'req.headers.authorization',
            'req.headers.cookie',
            'databaseUrl',
            'DATABASE_URL',
        ],
        censor: '[REDACTED]',
    },

    base: {
        service: 'market-demand-analytics',
        env: process.env.NODE_ENV || 'development',
    },

    timestamp: pino.stdTimeFunctions.isoTime,

    transport: isLocal
        ? {
            target: 'pino-pretty',
            options: {
                colorize: true,
                translateTime: 'HH:MM:ss.l',
                ignore: 'pid,hostname,service,env',
            },
        }
        : undefined,
});

export const serviceLogger = logger.child({ module: 'service' });
export const dbLogger = logger.child({ module: 'db' });
export const httpLogger = logger.child({ module: 'http' });

export function createLogger(moduleName: string): pino.Logger {
    return logger.child({ module: moduleName });
}
