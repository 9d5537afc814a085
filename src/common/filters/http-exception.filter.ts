// ============================================================
// Identity Graph Engine — HTTP Exception Filter
//
// Converts all thrown exceptions to:
//   { status: "error", message: "<reason>" }
//
// An envelope that fails to decode is a 400. Graph store
// integrity failures (an edge endpoint that does not exist)
// surface as 422 with the store's message. Anything else
// unexpected is logged and returned as a generic 500.
// ============================================================

import {
  ExceptionFilter,
  Catch,
  ArgumentsHost,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { Request, Response } from 'express';
import { GraphStoreError } from '../../graph/graph-store';
import { MalformedEventError } from '../../ingest/ingestion-event';

export interface ErrorBody {
  status: 'error';
  message: string;
}

/** Nest's error bodies carry `message` as a string or, from ValidationPipe, a string[]. */
function messageOf(exception: HttpException): string {
  const body = exception.getResponse();
  if (typeof body === 'string') return body;

  if (typeof body === 'object' && body !== null && 'message' in body) {
    const { message } = body;
    if (Array.isArray(message)) return message.join('; ');
    if (typeof message === 'string') return message;
  }
  return exception.message;
}

@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(HttpExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    let status: number;
    let message: string;

    if (exception instanceof HttpException) {
      status = exception.getStatus();
      message = messageOf(exception);
    } else if (exception instanceof MalformedEventError) {
      status = HttpStatus.BAD_REQUEST;
      message = exception.message;
    } else if (exception instanceof GraphStoreError) {
      status = HttpStatus.UNPROCESSABLE_ENTITY;
      message = exception.message;
      this.logger.warn(`${request.method} ${request.url}: ${exception.message}`);
    } else {
      status = HttpStatus.INTERNAL_SERVER_ERROR;
      message = 'Internal server error';

      this.logger.error(
        `Unhandled exception on ${request.method} ${request.url}`,
        exception instanceof Error ? exception.stack : String(exception),
      );
    }

    const body: ErrorBody = { status: 'error', message };
    response.status(status).json(body);
  }
}
