import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import type { NestFastifyApplication } from '@nestjs/platform-fastify';
import { AppModule } from './app.module';
import { APP_OPTIONS, configureApp, createAdapter, startApp } from './app.setup';
import { configSchema } from './config/config.schema';

async function bootstrap() {
  // ConfigModule has loaded .env into process.env by the time AppModule is imported.
  const { CORRELATION_ID_HEADER } = configSchema.parse(process.env);

  const app = await NestFactory.create<NestFastifyApplication>(
    AppModule,
    createAdapter(CORRELATION_ID_HEADER),
    { ...APP_OPTIONS, bufferLogs: true },
  );

  configureApp(app);

  await startApp(app);
}

bootstrap().catch((error: unknown) => {
  const err = error instanceof Error ? error : new Error(String(error));
  new Logger('Bootstrap').error(err.message, err.stack);
  process.exit(1);
});
