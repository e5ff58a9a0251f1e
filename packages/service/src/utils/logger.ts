import pino from 'pino';

const logLevel = process.env.LOG_LEVEL || 'info';
const prettyPrint = process.env.NODE_ENV !== 'production' && process.env.NODE_ENV !== 'test';

export const logger = pino({
  name: 'oncoqa',
  level: logLevel,
  transport: prettyPrint ? {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'SYS:standard',
      ignore: 'pid,hostname'
    }
  } : undefined,
  formatters: {
    level: (label) => {
      return { level: label };
    }
  }
});

export type Logger = typeof logger;
