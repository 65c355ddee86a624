import pino from 'pino';
import type { Config } from '../config/validation.js';

const nodeEnv = process.env.NODE_ENV ?? 'development';

export const logger = pino({
  level: nodeEnv === 'test' ? 'silent' : 'info',
  transport:
    nodeEnv === 'development'
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

/** Entry points call this once config has loaded; until then the logger runs at info. */
export function applyLogLevel(level: Config['server']['logLevel']): void {
  logger.level = level;
}
