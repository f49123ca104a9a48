import pino from 'pino';
import { env } from '../config/env';

export const logger = pino({
  name: 'fvg-swing-bot',
  level: env.LOG_LEVEL,
  base: { env: env.NODE_ENV },
  timestamp: pino.stdTimeFunctions.isoTime,
});

export type Logger = typeof logger;
