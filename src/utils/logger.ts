import dotenv from 'dotenv';
import pino from 'pino';

// Level and transport are read at load time, before the entry point runs.
dotenv.config();

const env = process.env.NODE_ENV;

const level = process.env.LOG_LEVEL
    ?? (env === 'test' ? 'silent' : env === 'production' ? 'info' : 'debug');

const transport = env === 'production' || env === 'test'
    ? undefined
    : {
        target: 'pino-pretty',
        options: {
            colorize: true,
            singleLine: true,
            translateTime: 'SYS:standard',
        },
    };

export const logger = pino({
    level,
    transport,
});
