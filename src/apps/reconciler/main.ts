import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { setupGracefulShutdown } from '@/shared/utils/graceful-shutdown';
import { ReconcilerAppModule } from './app.module';

async function bootstrap() {
  const logger = new Logger('Reconciler');
  const app = await NestFactory.createApplicationContext(ReconcilerAppModule);

  setupGracefulShutdown(app, 'reconciler');

  const staleAfterMs = app
    .get(ConfigService)
    .get<number>('RECONCILE_STALE_AFTER_MS');
  logger.log(
    `Reconciler started, removing undispatched QUEUED jobs older than ${staleAfterMs}ms`,
  );
}

bootstrap().catch((error) => {
  new Logger('Reconciler').error(`Failed to start: ${error}`);
  process.exit(1);
});
