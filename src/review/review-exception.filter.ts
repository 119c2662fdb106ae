import {
  ArgumentsHost,
  Catch,
  ConsoleLogger,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Inject,
} from '@nestjs/common';
import type { Response } from 'express';
import { sanitizeErrorMessage } from './retry-utils.js';
import { ErrorBody, ReviewError } from './review.errors.js';

interface MappedError {
  status: number;
  body: ErrorBody;
}

const INTERNAL_BODY: ErrorBody = {
  error: {
    kind: 'internal',
    code: 'INTERNAL_ERROR',
    message: 'An unexpected error occurred',
  },
};

/**
 * Map any thrown value onto a status code and the `{ error }` wire body.
 * Server-side review errors keep their status but never expose their message.
 */
export function toErrorResponse(exception: unknown): MappedError | null {
  if (exception instanceof ReviewError) {
    if (exception.statusCode >= 500) {
      return { status: exception.statusCode, body: INTERNAL_BODY };
    }
    const error: ErrorBody['error'] = {
      kind: exception.kind,
      code: exception.code,
      message: exception.message,
    };
    if ('part' in exception && typeof exception.part === 'string') {
      error.part = exception.part;
    }
    return { status: exception.statusCode, body: { error } };
  }
  if (exception instanceof HttpException && exception.getStatus() < 500) {
    const status = exception.getStatus();
    return {
      status,
      body: {
        error: {
          kind: 'validation',
          code:
            status === HttpStatus.PAYLOAD_TOO_LARGE ? 'PART_TOO_LARGE' : 'INVALID_REQUEST',
          message: exception.message,
        },
      },
    };
  }
  return null;
}

@Catch()
export class ReviewExceptionFilter implements ExceptionFilter {
  constructor(@Inject(ConsoleLogger) private readonly logger: ConsoleLogger) {
    this.logger.setContext(ReviewExceptionFilter.name);
  }

  catch(exception: unknown, host: ArgumentsHost): void {
    const response = host.switchToHttp().getResponse<Response>();
    let mapped = toErrorResponse(exception);
    if (mapped) {
      if (mapped.status >= 500) {
        const stack = exception instanceof Error ? exception.stack : undefined;
        this.logger.error(`Internal error: ${sanitizeErrorMessage(exception)}`, stack);
      }
    } else {
      const stack = exception instanceof Error ? exception.stack : undefined;
      this.logger.error(`Unhandled error: ${sanitizeErrorMessage(exception)}`, stack);
      mapped = { status: HttpStatus.INTERNAL_SERVER_ERROR, body: INTERNAL_BODY };
    }

    if (response.headersSent || response.writableEnded) return;
    response.status(mapped.status).json(mapped.body);
  }
}
