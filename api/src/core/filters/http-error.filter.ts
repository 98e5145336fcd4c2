import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import type { Request, Response } from 'express';
import { formatError } from '../../shared/logging/ignore-error.util';

type RequestWithId = Request & { requestId?: string };

const readMessage = (response: object): string | undefined => {
  const message = 'message' in response ? response.message : undefined;
  if (typeof message === 'string') return message;
  if (Array.isArray(message)) return message.map(String).join('; ');
  return undefined;
};

const readCode = (response: object): string | undefined => {
  const error = 'error' in response ? response.error : undefined;
  return typeof error === 'string' ? error : undefined;
};

/** Единый JSON-формат ошибок для всех контроллеров. */
@Catch()
export class HttpErrorFilter implements ExceptionFilter {
  private readonly logger = new Logger(HttpErrorFilter.name);

  catch(exception: unknown, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const res = ctx.getResponse<Response>();
    const req = ctx.getRequest<RequestWithId>();

    let status = HttpStatus.INTERNAL_SERVER_ERROR;
    let message = 'Internal Server Error';
    let code = 'InternalError';

    if (exception instanceof HttpException) {
      status = exception.getStatus();
      const response = exception.getResponse();
      if (typeof response === 'string') {
        message = response;
      } else {
        message = readMessage(response) ?? exception.message ?? message;
        code = readCode(response) ?? exception.name;
      }
    } else {
      this.logger.error(
        `unhandled error on ${req.method} ${req.originalUrl}: ${formatError(exception)}`,
        exception instanceof Error ? exception.stack : undefined,
      );
    }

    const requestIdHeader = req.headers?.['x-request-id'];
    res.status(status).json({
      error: code,
      message,
      statusCode: status,
      requestId:
        req.requestId ||
        (typeof requestIdHeader === 'string' ? requestIdHeader : undefined),
      path: req.originalUrl || req.url,
      timestamp: new Date().toISOString(),
    });
  }
}
