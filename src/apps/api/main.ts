import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import {
  FastifyAdapter,
  NestFastifyApplication,
} from '@nestjs/platform-fastify';
import { setupGracefulShutdown } from '@/shared/utils/graceful-shutdown';
import { ApiAppModule } from './app.module';
import { configureApp } from './setup-app';
import { setupSwagger, SWAGGER_PATH } from './setup-swagger';

async function bootstrap() {
  const logger = new Logger('Api');
  const app = await NestFactory.create<NestFastifyApplication>(
    ApiAppModule,
    new FastifyAdapter({ trustProxy: true }),
  );

  configureApp(app);
  setupGracefulShutdown(app, 'api');

  const configService = app.get(ConfigService);
  if (configService.get<string>('NODE_ENV') === 'development') {
    setupSwagger(app);
    logger.log(`OpenAPI docs served at /${SWAGGER_PATH}`);
  }

  const port = configService.get<number>('API_PORT') ?? 3000;
  await app.listen(port, '0.0.0.0');
  logger.log(`Job admission API listening on port ${port}`);
}

bootstrap().catch((error) => {
  new Logger('Api').error(`Failed to start: ${error}`);
  process.exit(1);
});
