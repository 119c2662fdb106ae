import 'dotenv/config';
import 'reflect-metadata';
import { ConsoleLogger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module.js';
import { cleanEnv } from './config/config.service.js';
import { SERVICE_NAME } from './constants.js';

const DEFAULT_PORT = 8000;

function resolvePort(raw: string | undefined): number {
  const value = Number(cleanEnv(raw));
  return Number.isInteger(value) && value > 0 && value < 65_536 ? value : DEFAULT_PORT;
}

async function bootstrap() {
  const app = await NestFactory.create(AppModule, { bufferLogs: true });
  const logger = await app.resolve(ConsoleLogger);
  logger.setContext('Bootstrap');
  app.useLogger(logger);
  app.setGlobalPrefix('api');
  app.enableShutdownHooks();

  const port = resolvePort(process.env.PORT);
  await app.listen(port);
  logger.log(`${SERVICE_NAME} listening on http://localhost:${port}/api`);
}

bootstrap().catch((err: unknown) => {
  console.error('Fatal error:', err);
  process.exitCode = 1;
});
