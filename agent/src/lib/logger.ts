import pino from 'pino';

export const logger = pino({
  name: 'rangelab-agent',
  level: process.env.LOG_LEVEL ?? 'info',
});

export type Logger = pino.Logger;

/** Logger for library code constructed without one. */
export const silentLogger: Logger = pino({ level: 'silent' });
