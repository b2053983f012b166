import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { Request, Response } from 'express';

@Catch()
export class AllExceptionsFilter implements ExceptionFilter {
  private readonly logger = new Logger(AllExceptionsFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    let status: number = HttpStatus.INTERNAL_SERVER_ERROR;
    let body: Record<string, unknown> = {
      message: 'Internal server error',
      error: 'InternalServerError',
    };

    if (exception instanceof HttpException) {
      status = exception.getStatus();
      const exceptionResponse = exception.getResponse();

      if (typeof exceptionResponse === 'object' && exceptionResponse !== null) {
        body = {
          ...exceptionResponse,
          message: 'message' in exceptionResponse ? exceptionResponse.message : exception.message,
          error: 'error' in exceptionResponse ? exceptionResponse.error : exception.name,
        };
      } else {
        body = { message: exceptionResponse, error: exception.name };
      }
    } else if (exception instanceof Error) {
      this.logger.error(`Unexpected error: ${exception.message}`, exception.stack);
    } else {
      this.logger.error(`Unexpected non-error thrown: ${String(exception)}`);
    }

    response.status(status).json({
      statusCode: status,
      ...body,
      timestamp: new Date().toISOString(),
      path: request.url,
    });
  }
}
