import { Module } from '@nestjs/common';
import { ConfigModule as NestConfigModule } from '@nestjs/config';
import { configSchema } from './config.schema';

@Module({
  imports: [
    NestConfigModule.forRoot({
      isGlobal: true,
      validate: (env: Record<string, unknown>) => configSchema.parse(env),
    }),
  ],
})
export class ConfigModule {}
