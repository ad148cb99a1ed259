import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger, ValidationPipe } from '@nestjs/common';
import * as dotenv from 'dotenv';
import { AppModule } from './app.module';

// Load environment variables from .env file
dotenv.config();

async function bootstrap() {
  const app = await NestFactory.create(AppModule, {
    logger: ['log', 'error', 'warn', 'debug'],
  });

  app.enableCors({
    origin: true,
    credentials: true,
  });

  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      transform: true,
    }),
  );

  app.setGlobalPrefix('api');

  const port = process.env.PORT || 4001;
  await app.listen(port);

  const logger = new Logger('Bootstrap');
  logger.log(`AI service listening on http://localhost:${port}`);
  logger.log(`Health check: http://localhost:${port}/api/ai/health`);
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error(
    `Failed to start: ${error instanceof Error ? error.message : String(error)}`,
  );
  process.exit(1);
});
