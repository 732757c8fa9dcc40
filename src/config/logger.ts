import { pino } from 'pino';
import { loadConfig } from './env.js';

const config = loadConfig();
const env = process.env.NODE_ENV;

export const logger = pino({
    level: config.log.level,
    base: { service: 'request-triage' },
    transport:
        env !== 'production' && env !== 'test'
            ? {
                target: 'pino-pretty',
                options: {
                    colorize: true,
                    translateTime: 'SYS:standard',
                    ignore: 'pid,hostname',
                },
            }
            : undefined,
});

export type Logger = typeof logger;
