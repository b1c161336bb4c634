import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import type { Request, Response } from 'express';
import { RunStateError, StoreUnavailableError } from '../../qualification/errors/qualification.errors';
import { getErrorMessage, getErrorStack } from '../utils/error.util';

export interface ErrorResponseBody {
  statusCode: number;
  message: string | string[];
  path: string;
  timestamp: string;
}

function httpMessage(exception: HttpException): string | string[] {
  const response = exception.getResponse();
  if (typeof response === 'string') return response;
  if ('message' in response) {
    const { message } = response;
    if (typeof message === 'string') return message;
    if (Array.isArray(message) && message.every((item) => typeof item === 'string')) {
      return message;
    }
  }
  return exception.message;
}

function send(host: ArgumentsHost, statusCode: number, message: string | string[]): void {
  const ctx = host.switchToHttp();
  const request = ctx.getRequest<Request>();
  const body: ErrorResponseBody = {
    statusCode,
    message,
    path: request.url,
    timestamp: new Date().toISOString(),
  };
  ctx.getResponse<Response>().status(statusCode).json(body);
}

@Catch(HttpException)
export class HttpExceptionFilter implements ExceptionFilter {
  catch(exception: HttpException, host: ArgumentsHost): void {
    send(host, exception.getStatus(), httpMessage(exception));
  }
}

/**
 * Everything that is not an HttpException. Store outages answer 503 and
 * ledger state conflicts 409; anything else is logged and answers 500
 * without its details.
 */
@Catch()
export class AllExceptionsFilter implements ExceptionFilter {
  private readonly logger = new Logger(AllExceptionsFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    if (exception instanceof HttpException) {
      send(host, exception.getStatus(), httpMessage(exception));
      return;
    }
    if (exception instanceof StoreUnavailableError) {
      this.logger.error(exception.message, getErrorStack(exception));
      send(host, HttpStatus.SERVICE_UNAVAILABLE, exception.message);
      return;
    }
    if (exception instanceof RunStateError) {
      send(host, HttpStatus.CONFLICT, exception.message);
      return;
    }

    this.logger.error(`Unhandled error: ${getErrorMessage(exception)}`, getErrorStack(exception));
    send(host, HttpStatus.INTERNAL_SERVER_ERROR, 'Internal server error');
  }
}
