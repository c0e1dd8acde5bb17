import { ArgumentsHost, Catch, ExceptionFilter, HttpException, HttpStatus, Logger } from '@nestjs/common';
import { MESSAGES } from '@nestjs/core/constants';

import { FastifyReply, FastifyRequest } from 'fastify';

import type { ErrorResponse } from '@storefront/api-interfaces';

import { AppException, ErrorCode, InternalException } from '../exceptions';

/**
 * Status → code table for exceptions raised by the framework rather than the application.
 */
const STATUS_ERROR_CODES: Partial<Record<number, ErrorCode>> = {
  [HttpStatus.BAD_REQUEST]: ErrorCode.VALIDATION_INVALID_INPUT,
  [HttpStatus.UNAUTHORIZED]: ErrorCode.AUTH_UNAUTHORIZED,
  [HttpStatus.FORBIDDEN]: ErrorCode.FORBIDDEN_INSUFFICIENT_PERMISSIONS,
  [HttpStatus.NOT_FOUND]: ErrorCode.NOT_FOUND_RESOURCE,
  [HttpStatus.CONFLICT]: ErrorCode.CONFLICT_DUPLICATE_RESOURCE,
  [HttpStatus.TOO_MANY_REQUESTS]: ErrorCode.TOO_MANY_REQUESTS,
  [HttpStatus.INTERNAL_SERVER_ERROR]: ErrorCode.INTERNAL_SERVER_ERROR,
  [HttpStatus.SERVICE_UNAVAILABLE]: ErrorCode.SERVICE_UNAVAILABLE
};

/**
 * Translates anything thrown while handling a request into an {@link ErrorResponse}.
 * Registered once as `APP_FILTER`; controllers never catch domain failures themselves.
 */
@Catch()
export class GlobalExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(GlobalExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<FastifyReply>();
    const request = ctx.getRequest<FastifyRequest>();

    let errorResponse: ErrorResponse;

    if (exception instanceof AppException) {
      errorResponse = exception.toErrorResponse(request.url);
    } else if (exception instanceof HttpException) {
      errorResponse = this.handleHttpException(exception, request);
    } else {
      errorResponse = this.handleUnknownError(exception, request);
    }

    this.logError(errorResponse, exception);

    response.status(errorResponse.statusCode).send(errorResponse);
  }

  private handleHttpException(exception: HttpException, request: FastifyRequest): ErrorResponse {
    const status = exception.getStatus();

    return {
      statusCode: status,
      code: STATUS_ERROR_CODES[status] ?? ErrorCode.INTERNAL_UNEXPECTED_ERROR,
      message: this.extractMessage(exception),
      details: `uri=${request.url}`,
      timestamp: new Date().toISOString()
    };
  }

  private handleUnknownError(exception: unknown, request: FastifyRequest): ErrorResponse {
    // Internal details stay out of production responses
    const isProduction = process.env.NODE_ENV === 'production';
    const internal = isProduction
      ? new InternalException(MESSAGES.UNKNOWN_EXCEPTION_MESSAGE, ErrorCode.INTERNAL_UNEXPECTED_ERROR)
      : new InternalException(
          exception instanceof Error ? exception.message : undefined,
          ErrorCode.INTERNAL_UNEXPECTED_ERROR
        );

    return internal.toErrorResponse(request.url);
  }

  /**
   * The response of an `HttpException` is either a string or an object whose
   * `message` is a string or, for pipe validation errors, a list of strings.
   */
  private extractMessage(exception: HttpException): string {
    const exceptionResponse = exception.getResponse();

    if (typeof exceptionResponse === 'string') return exceptionResponse;

    if (typeof exceptionResponse === 'object' && exceptionResponse !== null && 'message' in exceptionResponse) {
      const { message } = exceptionResponse;
      if (typeof message === 'string' && message) return message;
      if (Array.isArray(message) && message.length) return message.map(String).join(', ');
    }

    return exception.message;
  }

  private logError(errorResponse: ErrorResponse, exception: unknown): void {
    const logContext = {
      code: errorResponse.code,
      statusCode: errorResponse.statusCode,
      details: errorResponse.details,
      context: errorResponse.context
    };

    if (errorResponse.statusCode >= 500) {
      this.logger.error(
        `${errorResponse.code}: ${errorResponse.message}`,
        exception instanceof Error ? exception.stack : undefined,
        logContext
      );
    } else if (errorResponse.statusCode >= 400) {
      this.logger.warn(`${errorResponse.code}: ${errorResponse.message}`, logContext);
    }
  }
}
