import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { HttpAdapterHost } from '@nestjs/core';
import {
  JobAdmissionError,
  ValidationError,
} from '@/shared/jobs/errors/job-admission.errors';
import { describeError } from '@/shared/lib/util';

export interface ErrorResponseBody {
  statusCode: number;
  message: string | string[];
  error: string;
  path: string;
  timestamp: string;
}

/**
 * Turns job admission failures into HTTP responses. Dependency failures all
 * read as a single 503 so callers never learn which backend failed.
 */
@Catch(JobAdmissionError)
export class JobAdmissionExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(JobAdmissionExceptionFilter.name);

  constructor(private readonly httpAdapterHost: HttpAdapterHost) {}

  catch(exception: JobAdmissionError, host: ArgumentsHost): void {
    const { httpAdapter } = this.httpAdapterHost;
    const ctx = host.switchToHttp();
    const path: string = httpAdapter.getRequestUrl(ctx.getRequest());

    let body: ErrorResponseBody;

    if (exception instanceof ValidationError) {
      body = {
        statusCode: HttpStatus.BAD_REQUEST,
        message: exception.details,
        error: 'Bad Request',
        path,
        timestamp: new Date().toISOString(),
      };
    } else {
      this.logger.error(
        `${exception.name} on ${path}: ${exception.message}` +
          (exception.cause === undefined
            ? ''
            : ` (cause: ${describeError(exception.cause)})`),
      );
      body = {
        statusCode: HttpStatus.SERVICE_UNAVAILABLE,
        message: 'Service temporarily unavailable',
        error: 'Service Unavailable',
        path,
        timestamp: new Date().toISOString(),
      };
    }

    httpAdapter.reply(ctx.getResponse(), body, body.statusCode);
  }
}
