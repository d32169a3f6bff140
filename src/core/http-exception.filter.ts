import {
  ExceptionFilter,
  Catch,
  ArgumentsHost,
  HttpException,
  Logger,
} from '@nestjs/common';
import { Request, Response } from 'express';

@Catch(HttpException)
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(HttpExceptionFilter.name);

  catch(exception: HttpException, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const request = ctx.getRequest<Request>();
    const response = ctx.getResponse<Response>();
    const status = exception.getStatus();
    const error = exception.getResponse();

    if (status >= 500) {
      this.logger.error(`${request.method} ${request.url} -> ${status}`, exception.stack);
    }

    if (typeof error === 'string') {
      response.status(status).json({
        statusCode: status,
        error: error,
      });
    } else {
      response.status(status).json({
        ...error,
        statusCode: status,
      });
    }
  }
}
