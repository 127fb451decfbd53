import pino from 'pino';

export type Logger = pino.Logger;

export const logger: Logger = pino({
  name: 'contact-search',
  level: process.env.LOG_LEVEL ?? 'info',
  base: { service: 'contact-search' },
  timestamp: pino.stdTimeFunctions.isoTime,
});
