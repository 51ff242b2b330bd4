#!/usr/bin/env node
import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { AppModule } from './app.module';
import { AppConfig } from './config/configuration';
import { PinoLoggerService } from './shared/logging/pino-logger.service';
import { ResolveCredentialsUseCase, DownloadModelUseCase } from './application/use-cases';
import { createDownloadModelCommand } from './cli/download-model.command';

/**
 * Bootstrap a NestJS application context (no HTTP server) and run the CLI
 */
async function bootstrap() {
  const app = await NestFactory.createApplicationContext(AppModule, {
    bufferLogs: true,
  });

  const configService = app.get(ConfigService<AppConfig>);
  const logger = app.get(PinoLoggerService);

  app.useLogger(logger);
  logger.setContext('Bootstrap');

  const command = createDownloadModelCommand({
    resolveCredentials: app.get(ResolveCredentialsUseCase),
    downloadModel: app.get(DownloadModelUseCase),
    model: configService.getOrThrow('model', { infer: true }),
    logger,
  });

  try {
    await command.parseAsync(process.argv);
  } finally {
    await app.close();
  }
}

bootstrap().catch((error) => {
  console.error('Failed to start model-fetch:', error);
  process.exit(1);
});
