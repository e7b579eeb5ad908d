/**
 * Logger Factory
 *
 * Selects the logger implementation from LOGGER_TYPE:
 * - cloudwatch → CloudWatchLogger (JSON for AWS deployments)
 * - console (default) → ConsoleLogger
 */

import pino from 'pino';
import { ILogger, ILoggerFactory } from '@/interfaces/ILogger';
import { env } from '@/config/env';
import { ConsoleLogger, consoleLoggerOptions } from './ConsoleLogger';
import { CloudWatchLogger, cloudWatchLoggerOptions } from './CloudWatchLogger';

export class LoggerFactory implements ILoggerFactory {
  createLogger(context?: string): ILogger {
    switch (env.LOGGER_TYPE) {
      case 'cloudwatch':
        return new CloudWatchLogger(context);

      case 'console':
      default:
        return new ConsoleLogger(context);
    }
  }

  /**
   * Raw pino instance for pino-http, formatted like the selected adapter
   */
  createHttpLogger(): pino.Logger {
    return pino(
      env.LOGGER_TYPE === 'cloudwatch' ? cloudWatchLoggerOptions('http') : consoleLoggerOptions('http')
    );
  }
}

const factory = new LoggerFactory();

/**
 * Default logger instance for application use
 */
export const logger = factory.createLogger('app');

/**
 * Create named loggers for specific contexts
 */
export function createLogger(context: string): ILogger {
  return factory.createLogger(context);
}

export function createHttpLogger(): pino.Logger {
  return factory.createHttpLogger();
}
