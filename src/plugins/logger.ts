import pino from 'pino';

export type Logger = pino.Logger;

function defaultLevel(): string {
    if (process.env.LOG_LEVEL) return process.env.LOG_LEVEL;
    if (process.env.NODE_ENV === 'test') return 'silent';
    return process.env.NODE_ENV === 'production' ? 'info' : 'debug';
}

const pretty = process.env.NODE_ENV !== 'production' && process.env.NODE_ENV !== 'test';

const logger = pino({
    name: 'lomography',
    level: defaultLevel(),
    transport: pretty
        ? { target: 'pino-pretty', options: { colorize: true } }
        : undefined
});

export default logger;
