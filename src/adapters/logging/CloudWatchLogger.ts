/**
 * AWS CloudWatch Logger Adapter
 *
 * Logs to stdout as JSON shaped for CloudWatch Logs Insights: upper-case
 * level labels, ISO timestamps and environment metadata on every line.
 * The CloudWatch agent (EC2) or the awslogs driver (ECS) ships stdout.
 */

import pino from 'pino';
import { env } from '@/config/env';
import { PinoLogger } from './PinoLogger';

export function cloudWatchLoggerOptions(name: string): pino.LoggerOptions {
  return {
    name,
    level: env.LOG_LEVEL,
    formatters: {
      level: (label) => ({ level: label.toUpperCase() }),
    },
    base: {
      env: env.NODE_ENV,
      region: env.AWS_REGION,
      service: 'member-admin-api',
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };
}

export class CloudWatchLogger extends PinoLogger {
  constructor(context?: string) {
    super(pino(cloudWatchLoggerOptions(context || 'app')));
  }
}
