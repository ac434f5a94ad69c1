import pino from 'pino';

const isTest = process.env.NODE_ENV === 'test';

export const logger = pino({
    level: process.env.LOG_LEVEL ?? (isTest ? 'silent' : 'info'),
    transport: isTest
        ? undefined
        : {
            target: 'pino-pretty',
            options: {
                colorize: true,
                ignore: 'pid,hostname',
            },
        },
});

/**
 * Map the CLI's repeated -v flag onto pino levels (0=info, 1=debug, 2+=trace).
 * An explicit LOG_LEVEL always wins.
 */
export function setVerbosity(verbosity: number): void {
    if (process.env.LOG_LEVEL) return;
    if (verbosity >= 2) {
        logger.level = 'trace';
    } else if (verbosity === 1) {
        logger.level = 'debug';
    } else {
        logger.level = 'info';
    }
}
