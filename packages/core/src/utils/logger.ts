import pino from 'pino';

// The core also runs in browsers, where process.env may be missing.
const logLevel = (typeof process !== 'undefined' && process.env && process.env.LOG_LEVEL) || 'info';

export const logger = pino({
  name: 'oncoqa-core',
  level: logLevel,
  browser: {
    asObject: true
  }
});

export type Logger = typeof logger;
