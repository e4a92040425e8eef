// src/main.ts
import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { configureApp } from './app.setup';
import { describeTarget } from './infra/postgres/postgres.config';
import { getPostgresConfig } from './modules/postgres/internal/postgres.client';

const DEFAULT_PORT = 8080;

function resolvePort(raw: string | undefined): number {
  const n = raw ? Number(raw) : NaN;
  return Number.isInteger(n) && n > 0 && n < 65_536 ? n : DEFAULT_PORT;
}

async function bootstrap(): Promise<void> {
  const app = configureApp(await NestFactory.create(AppModule, { cors: false }));
  const port = resolvePort(process.env.PORT);

  await app.listen(port, '0.0.0.0');

  const logger = new Logger('Bootstrap');
  logger.log(`Listening on :${port} (MCP at POST /mcp, REST under /api)`);
  logger.log(`Postgres target: ${describeTarget(getPostgresConfig())}`);
}

void bootstrap();
