/**
 * Centralized logger using Pino
 *
 * Development: pretty-printed, colorized output via pino-pretty.
 * Production: JSON lines on stdout with string level labels.
 * Tests: no transport worker (LOG_LEVEL=silent is set by the Vitest config).
 */
import pino from 'pino';
import type { Logger, LoggerOptions } from 'pino';

const isDev = process.env.NODE_ENV !== 'production';
const isTest = process.env.NODE_ENV === 'test' || process.env.VITEST !== undefined;

const options: LoggerOptions = {
    level: process.env.LOG_LEVEL || (isDev ? 'debug' : 'info'),
    formatters: isDev ? {} : {
        level: (label: string) => ({ level: label }),
    },
};

if (isDev && !isTest) {
    options.transport = {
        target: 'pino-pretty',
        options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
        },
    };
}

const logger: Logger = pino(options);

// Child loggers per area
export const consolidationLogger: Logger = logger.child({ module: 'consolidation' });
export const catalogLogger: Logger = logger.child({ module: 'catalog' });
export const ledgerLogger: Logger = logger.child({ module: 'ledger' });
export const sheetsLogger: Logger = logger.child({ module: 'sheets' });
export const schedulerLogger: Logger = logger.child({ module: 'scheduler' });

export default logger;
