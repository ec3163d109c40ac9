import pino from 'pino';
import { config } from './config';

const options: pino.LoggerOptions = {
    name: 'id3-frame-kit',
    level: config.logLevel,
    formatters: {
        level: label => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
};

export const logger = pino(options);

/*
 **  Child logger tagged with the component it belongs to
 */
export function createLogger(context: string): pino.Logger {
    return logger.child({ context });
}
