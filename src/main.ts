import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { AppModule } from './app.module';

async function bootstrap() {
  const app = await NestFactory.create(AppModule);

  // CORS for local dev UIs
  app.enableCors({
    origin: [/^http:\/\/localhost:\d+$/],
    credentials: true,
    allowedHeaders: ['content-type', 'x-session-id', 'x-admin-token'],
    methods: ['GET', 'POST', 'PUT', 'OPTIONS'],
  });

  // Reads PORT from .env via ConfigService
  const config = app.get(ConfigService);
  const port = Number(config.get('PORT')) || 3001;

  await app.listen(port);
  Logger.log(`Server listening on http://localhost:${port}`, 'Bootstrap');
}

bootstrap().catch((err: unknown) => {
  Logger.error(err instanceof Error ? err.stack : String(err), 'Bootstrap');
  process.exitCode = 1;
});
