// Sentry instrumentation MUST be imported first — before any other modules.
import './sentry/instrument';
import 'reflect-metadata';

import { NestFactory } from '@nestjs/core';
import type { LogLevel } from '@nestjs/common';
import type { NestExpressApplication } from '@nestjs/platform-express';
import compression from 'compression';
import helmet from 'helmet';
import { AppModule } from './app.module';
import { SentryExceptionFilter } from './sentry/sentry-exception.filter';

async function bootstrap() {
  const isDebug = process.env.DEBUG === 'true';
  const logLevels: LogLevel[] = isDebug
    ? ['error', 'warn', 'log', 'debug', 'verbose']
    : ['error', 'warn', 'log'];

  const app = await NestFactory.create<NestExpressApplication>(AppModule, {
    logger: logLevels,
  });

  // Security headers (X-Content-Type-Options, X-Frame-Options, HSTS, etc.)
  app.use(helmet());

  // Debug bar snapshots grow with every statement; compress anything > 1KB
  app.use(compression({ threshold: 1024 }));

  // Close the database connection (and log it) on SIGTERM/SIGINT
  app.enableShutdownHooks();

  app.useGlobalFilters(new SentryExceptionFilter());

  await app.listen(process.env.PORT ?? 3000);
}
void bootstrap();
