import { INestApplication } from '@nestjs/common';
import { DocumentBuilder, OpenAPIObject, SwaggerModule } from '@nestjs/swagger';

export const SWAGGER_PATH = 'docs';

export function createSwaggerDocument(app: INestApplication): OpenAPIObject {
  const config = new DocumentBuilder()
    .setTitle('Scrape Job Admission API')
    .setDescription('Create scrape jobs and follow their status')
    .setVersion('1.0')
    .build();

  return SwaggerModule.createDocument(app, config);
}

/**
 * Serves the OpenAPI UI at /docs; mounted in development only.
 */
export function setupSwagger(app: INestApplication): void {
  SwaggerModule.setup(SWAGGER_PATH, app, createSwaggerDocument(app));
}
