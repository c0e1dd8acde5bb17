import { HttpStatus } from '@nestjs/common';

import { AppException } from './app.exception';

import { ErrorCode } from '../error-codes.enum';

/**
 * Base exception for resource not found errors (404 Not Found).
 */
export class NotFoundException extends AppException {
  readonly code: ErrorCode;

  constructor(message: string, code: ErrorCode = ErrorCode.NOT_FOUND_RESOURCE, context?: Record<string, unknown>) {
    super(HttpStatus.NOT_FOUND, message, context);
    this.code = code;
  }
}
