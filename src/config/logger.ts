import pino from 'pino';
import { env } from './env';

/**
 * Process-wide structured logger. Fastify builds its own request logger with
 * the same level; services import this one.
 */
export const logger = pino({
  level: env.LOG_LEVEL,
  base: { service: 'notification-dispatch' },
  transport:
    env.NODE_ENV === 'development'
      ? { target: 'pino-pretty', options: { colorize: true } }
      : undefined,
});

export type Logger = typeof logger;
