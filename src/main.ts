#!/usr/bin/env node
import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';

import { AppModule } from './app.module';
import { QuizCliService } from './cli/quiz-cli.service';
import { AppConfig } from './config/configuration';

async function bootstrap() {
  // No HTTP listener: the quiz runs in a standalone application context.
  const app = await NestFactory.createApplicationContext(AppModule, { bufferLogs: true });
  const config = app.get<ConfigService<AppConfig, true>>(ConfigService);
  app.useLogger(config.get('logLevels', { infer: true }));
  app.flushLogs();

  await app.get(QuizCliService).run();
  await app.close();
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error(error instanceof Error ? error.stack : String(error));
  process.exitCode = 1;
});
