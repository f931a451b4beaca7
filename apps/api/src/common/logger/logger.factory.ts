import * as winston from 'winston';
import type { AppConfig } from '../../config/config.schema';

const { combine, timestamp, json, colorize, simple } = winston.format;

const STDERR_LEVELS = ['error'];

export function buildWinstonTransports(nodeEnv: AppConfig['NODE_ENV']): winston.transport[] {
  if (nodeEnv === 'test') {
    return [new winston.transports.Console({ silent: true })];
  }

  if (nodeEnv === 'production') {
    return [
      new winston.transports.Console({
        format: combine(timestamp(), json()),
        stderrLevels: STDERR_LEVELS,
      }),
    ];
  }

  return [
    new winston.transports.Console({
      format: combine(colorize(), timestamp(), simple()),
      stderrLevels: STDERR_LEVELS,
    }),
  ];
}

export function resolveLogLevel(nodeEnv: AppConfig['NODE_ENV']): string {
  return nodeEnv === 'production' ? 'info' : 'debug';
}
