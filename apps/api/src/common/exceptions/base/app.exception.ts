import { HttpException, HttpStatus } from '@nestjs/common';

import type { ErrorResponse } from '@storefront/api-interfaces';

import { ErrorCode } from '../error-codes.enum';

/**
 * Base class for every exception the application raises on purpose.
 * Carries an HTTP status, a machine-readable code and optional context.
 */
export abstract class AppException extends HttpException {
  abstract readonly code: ErrorCode;

  /**
   * Identifiers of the resource involved, echoed to the client
   */
  readonly context?: Record<string, unknown>;

  readonly timestamp: string;

  constructor(statusCode: HttpStatus, message: string, context?: Record<string, unknown>) {
    super(message, statusCode);
    this.context = context;
    this.timestamp = new Date().toISOString();

    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Builds the error body for the request that raised this exception.
   */
  toErrorResponse(path: string): ErrorResponse {
    return {
      statusCode: this.getStatus(),
      code: this.code,
      message: this.message,
      details: `uri=${path}`,
      timestamp: this.timestamp,
      ...(this.context && { context: this.context })
    };
  }
}
