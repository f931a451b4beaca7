import type { LoggerService as NestLoggerService } from '@nestjs/common';
import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as winston from 'winston';
import { buildWinstonTransports, resolveLogLevel } from './logger.factory';
import type { AppConfig } from '../../config/config.schema';

type Meta = Record<string, unknown>;

@Injectable()
export class LoggerService implements NestLoggerService {
  private readonly logger: winston.Logger;

  constructor(private readonly configService: ConfigService<AppConfig, true>) {
    const nodeEnv = this.configService.get('NODE_ENV', { infer: true });

    this.logger = winston.createLogger({
      level: resolveLogLevel(nodeEnv),
      transports: buildWinstonTransports(nodeEnv),
    });
  }

  log(message: string, context?: string, meta?: Meta) {
    this.logger.info({ message, context, ...meta });
  }

  warn(message: string, context?: string, meta?: Meta) {
    this.logger.warn({ message, context, ...meta });
  }

  error(message: string, trace?: string, context?: string, meta?: Meta) {
    this.logger.error({ message, trace, context, ...meta });
  }

  debug(message: string, context?: string, meta?: Meta) {
    this.logger.debug({ message, context, ...meta });
  }

  verbose(message: string, context?: string, meta?: Meta) {
    this.logger.verbose({ message, context, ...meta });
  }
}
