import 'reflect-metadata';
import { BadRequestException, ValidationPipe } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { json } from 'express';
import helmet from 'helmet';
import { AppModule } from './app.module';
import { HttpExceptionFilter } from './common/filters/http-exception.filter';
import { requestIdMiddleware } from './common/middleware/request-id.middleware';
import { INVALID_PAYLOAD_MESSAGE } from './common/constants/error-messages.constants';
import { validateEnv, type AppEnv } from './common/config/env.validation';
import { createLogger, logger } from './common/utils/logger';
import { buildCorsOptions, resolveCorsMode } from './common/http/cors-policy';

async function bootstrap(): Promise<void> {
  logger.boot();

  const validatedEnv = validateEnv(process.env);
  const nestLogLevel = validatedEnv.LOG_LEVEL === 'info' ? 'log' : validatedEnv.LOG_LEVEL;
  const app = await NestFactory.create(AppModule, {
    logger: [nestLogLevel, 'warn', 'error'],
  });

  app.use(helmet());
  app.use(json({ limit: '256kb' }));
  app.use(requestIdMiddleware);

  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
      exceptionFactory: () => new BadRequestException(INVALID_PAYLOAD_MESSAGE),
    }),
  );

  app.useGlobalFilters(new HttpExceptionFilter());

  configureCors(app, validatedEnv);

  await app.listen(validatedEnv.PORT);

  createLogger('Bootstrap').info(`Concierge service listening on port ${validatedEnv.PORT}`, {
    event: 'service_started',
    plugins: validatedEnv.CONCIERGE_PLUGINS,
  });
}

function configureCors(app: Awaited<ReturnType<typeof NestFactory.create>>, env: AppEnv): void {
  const corsMode = resolveCorsMode(env);
  createLogger('Bootstrap').info('cors_configuration', {
    event: 'cors_configuration',
    cors_mode: corsMode,
    allowedOriginsCount: env.ALLOWED_ORIGINS.length,
  });

  app.enableCors(buildCorsOptions(env));
}

bootstrap().catch((error: unknown) => {
  createLogger('Bootstrap').error(
    'Failed to bootstrap concierge service',
    error instanceof Error ? error : undefined,
  );
  process.exit(1);
});
