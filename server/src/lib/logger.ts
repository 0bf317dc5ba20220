import pino from 'pino';

export const logger = pino({
  name: 'rangelab-server',
  level: process.env.LOG_LEVEL ?? 'info',
});

export type Logger = pino.Logger;
