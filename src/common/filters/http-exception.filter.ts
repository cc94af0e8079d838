// src/common/filters/http-exception.filter.ts

import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
} from '@nestjs/common';
import { Request, Response } from 'express';

/**
 * Renders every HTTP exception, the access errors included, as
 * `{ statusCode, error, message, field?, timestamp, path, method }`.
 */
@Catch(HttpException)
export class HttpExceptionFilter implements ExceptionFilter {
  catch(exception: HttpException, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    const status = exception.getStatus();
    const body = exception.getResponse();
    const details: Record<string, unknown> =
      typeof body === 'object' && body !== null ? { ...body } : {};

    return response.status(status).json({
      statusCode: status,
      error: typeof details.error === 'string' ? details.error : exception.name,
      message: typeof body === 'string' ? body : details.message,
      ...(typeof details.field === 'string' ? { field: details.field } : {}),
      timestamp: new Date().toISOString(),
      path: request.url,
      method: request.method,
    });
  }
}
