/**
 * Console Logger Adapter
 *
 * Structured pino logging to stdout. Used for development and for any
 * deployment whose log collector reads container output.
 * Pretty-printed through pino-pretty in development.
 */

import pino from 'pino';
import { env } from '@/config/env';
import { PinoLogger } from './PinoLogger';

export function consoleLoggerOptions(name: string): pino.LoggerOptions {
  return {
    name,
    level: env.LOG_LEVEL,
    transport:
      env.NODE_ENV === 'development' && env.LOG_PRETTY
        ? {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'SYS:standard',
              ignore: 'pid,hostname',
            },
          }
        : undefined,
  };
}

export class ConsoleLogger extends PinoLogger {
  constructor(context?: string) {
    super(pino(consoleLoggerOptions(context || 'app')));
  }
}
