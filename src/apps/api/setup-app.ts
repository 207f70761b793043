import { INestApplication, ValidationPipe } from '@nestjs/common';
import { HttpAdapterHost } from '@nestjs/core';
import { JobAdmissionExceptionFilter } from '@/shared/common/filters/job-admission-exception.filter';

/**
 * Global pipes and filters, shared by the server bootstrap and HTTP tests.
 */
export function configureApp(app: INestApplication): void {
  const httpAdapterHost = app.get(HttpAdapterHost);

  app.useGlobalFilters(new JobAdmissionExceptionFilter(httpAdapterHost));
  app.useGlobalPipes(new ValidationPipe({ transform: true, whitelist: true }));
}
