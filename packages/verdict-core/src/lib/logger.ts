import { pino, type Logger, type LoggerOptions } from 'pino';
import type { LogLevel, LogFormat } from '@code-verdict/config';

/**
 * Create a configured logger instance
 */
export function createLogger(level: LogLevel = 'info', format: LogFormat = 'pretty'): Logger {
  const options: LoggerOptions = {
    level,
    ...(format === 'pretty' && {
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      },
    }),
  };

  return pino(options);
}

/**
 * Logger for components constructed without one
 */
export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}
