#!/usr/bin/env node
import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { resolveLogLevels } from './config/log-levels';
import { AgendaRunner } from './modules/agenda/application/agenda.runner';

const EXIT_FAILURE = 1;

async function bootstrap(): Promise<number> {
  const app = await NestFactory.createApplicationContext(AppModule, {
    logger: resolveLogLevels(process.env.AGENDA_LOG_LEVEL),
  });

  try {
    return await app.get(AgendaRunner).run();
  } finally {
    await app.close();
  }
}

bootstrap().then(
  (exitCode) => process.exit(exitCode),
  (error: unknown) => {
    const logger = new Logger('Bootstrap');
    logger.error(
      error instanceof Error ? error.message : String(error),
      error instanceof Error ? error.stack : undefined,
    );
    process.exit(EXIT_FAILURE);
  },
);
