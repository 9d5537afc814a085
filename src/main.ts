// ============================================================
// Identity Graph Engine
// Application Bootstrap
// ============================================================
import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import { AppModule } from './app.module';
import { configureApp } from './app.setup';
import { Settings } from './config/settings';

async function bootstrap() {
  const logger = new Logger('IdentityGraph');
  const app = await NestFactory.create(AppModule, { bufferLogs: true, rawBody: true });

  const settings = app.get(Settings);
  app.useLogger(settings.logLevels);
  configureApp(app, settings);
  app.enableShutdownHooks();

  await app.listen(settings.port);

  logger.log('');
  logger.log('Identity Graph Engine');
  logger.log(`API running at    http://localhost:${settings.port}`);
  logger.log(`Environment       ${settings.nodeEnv}`);
  logger.log(`Database          ${settings.databasePath}`);
  logger.log(`Queue consumer    ${settings.rabbitmqEnabled ? settings.rabbitmqQueue : 'disabled'}`);
  logger.log(
    `CORS              ${settings.isProduction ? settings.corsOrigins.join(', ') || 'same-origin only' : 'open (dev)'}`,
  );
  if (settings.ingestApiKeyHashes.length === 0) {
    logger.warn('INGEST_API_KEY_HASHES is empty: POST /api/ingest is unauthenticated');
  }
}

bootstrap().catch((error: unknown) => {
  new Logger('IdentityGraph').error(
    'Startup failed',
    error instanceof Error ? error.stack : String(error),
  );
  process.exit(1);
});
