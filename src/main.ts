import 'reflect-metadata';

import { type LogLevel, Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';

import { AppModule } from './app.module';
import { AppConfigService } from './config/app-config.service';

const resolveNestLogLevels = (logLevel: string): LogLevel[] => {
  if (logLevel === 'debug') {
    return ['error', 'warn', 'log', 'debug'];
  }

  if (logLevel === 'info') {
    return ['error', 'warn', 'log'];
  }

  if (logLevel === 'warn') {
    return ['error', 'warn'];
  }

  return ['error'];
};

const bootstrap = async (): Promise<void> => {
  const configuredLogLevel: string = process.env['LOG_LEVEL'] ?? 'info';
  const app = await NestFactory.create(AppModule, {
    logger: resolveNestLogLevels(configuredLogLevel),
  });
  app.enableShutdownHooks();

  const appConfigService: AppConfigService = app.get(AppConfigService);
  const logger: Logger = new Logger('Bootstrap');

  logger.log(`Resolved log level: ${appConfigService.logLevel}`);
  logger.log(
    `Runtime config: nodeEnv=${appConfigService.nodeEnv}, ledgerEnabled=${String(appConfigService.ledgerEnabled)}, authMode=${appConfigService.authMode}, tradeWorkers=${String(appConfigService.tradeWorkerConcurrency)}`,
  );

  if (appConfigService.authMode === 'none') {
    logger.warn('No auth scheme configured; every protected route will answer 401');
  }

  const swaggerConfig = new DocumentBuilder()
    .setTitle('Subnet Dividends API')
    .setDescription('Dividend lookups per subnet and hotkey with sentiment-driven staking')
    .setVersion(appConfigService.appVersion)
    .addBearerAuth()
    .build();
  const document = SwaggerModule.createDocument(app, swaggerConfig);
  SwaggerModule.setup('api/docs', app, document);

  await app.listen(appConfigService.port);
  logger.log(`Subnet Dividends API is listening on port ${String(appConfigService.port)}.`);
};

void bootstrap();
