import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger, LogLevel, ValidationPipe } from '@nestjs/common';
import { NextFunction, Request, Response } from 'express';
import { AppModule } from './app.module';

const PRODUCTION_LOG_LEVELS: LogLevel[] = ['log', 'warn', 'error'];
const DEVELOPMENT_LOG_LEVELS: LogLevel[] = ['log', 'warn', 'error', 'debug', 'verbose'];

async function bootstrap() {
  const app = await NestFactory.create(AppModule, {
    logger: process.env.NODE_ENV === 'production' ? PRODUCTION_LOG_LEVELS : DEVELOPMENT_LOG_LEVELS,
  });
  const logger = new Logger('Bootstrap');

  app.setGlobalPrefix('api');

  app.useGlobalPipes(new ValidationPipe({
    transform: true,
    whitelist: true,
    forbidNonWhitelisted: true,
  }));

  app.enableCors({
    origin: process.env.CORS_ORIGIN ?? 'http://localhost:4200',
  });

  const requestLogger = new Logger('HTTP');
  app.use((req: Request, _res: Response, next: NextFunction) => {
    requestLogger.debug(`${req.method} ${req.url}`);
    next();
  });

  const port = Number(process.env.PORT ?? 3000);
  await app.listen(port);
  logger.log(`Listening on port ${port}`);
}

bootstrap().catch(error => {
  new Logger('Bootstrap').error('Failed to start', error instanceof Error ? error.stack : String(error));
  process.exit(1);
});
