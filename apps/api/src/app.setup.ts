import { Logger } from '@nestjs/common';
import type { NestApplicationOptions } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { NestFastifyApplication } from '@nestjs/platform-fastify';
import { FastifyAdapter } from '@nestjs/platform-fastify';
import { createFrameworkErrorHandler } from './common/filters/framework-error.handler';
import { LoggerService } from './common/logger/logger.service';
import type { AppConfig } from './config/config.schema';

const logger = new Logger('Bootstrap');

// No route reads a body; Nest must not register its JSON/urlencoded parsers.
export const APP_OPTIONS: NestApplicationOptions = { bodyParser: false };

const ignoreBody = async (): Promise<undefined> => undefined;

// Route matching follows Express defaults: case-insensitive, trailing slash optional.
export function createAdapter(correlationIdHeader: AppConfig['CORRELATION_ID_HEADER']): FastifyAdapter {
  const adapter = new FastifyAdapter({
    logger: false,
    caseSensitive: false,
    ignoreTrailingSlash: true,
    frameworkErrors: createFrameworkErrorHandler(correlationIdHeader),
  });

  const instance = adapter.getInstance();
  instance.removeAllContentTypeParsers();
  instance.addContentTypeParser('*', ignoreBody);

  return adapter;
}

export function configureApp(app: NestFastifyApplication) {
  app.useLogger(app.get(LoggerService));
}

/**
 * Binds on all interfaces at the configured port. A failed bind ends the
 * process with status 1; NestApplication has already logged the cause.
 */
export async function startApp(app: NestFastifyApplication): Promise<number> {
  const configService = app.get(ConfigService<AppConfig, true>);
  const port = configService.get('PORT', { infer: true });

  try {
    await app.listen(port, '0.0.0.0');
  } catch {
    return process.exit(1);
  }

  logger.log(`Servidor corriendo en el puerto ${port}`);
  logger.log(`Health check disponible en: http://localhost:${port}/health`);

  return port;
}
