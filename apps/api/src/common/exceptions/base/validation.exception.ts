import { HttpStatus } from '@nestjs/common';

import { ValidationError } from 'class-validator';

import { AppException } from './app.exception';

import { ErrorCode } from '../error-codes.enum';

/**
 * Base exception for input validation errors (400 Bad Request).
 */
export class ValidationException extends AppException {
  readonly code: ErrorCode;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.VALIDATION_INVALID_INPUT,
    context?: Record<string, unknown>
  ) {
    super(HttpStatus.BAD_REQUEST, message, context);
    this.code = code;
  }

  /**
   * Used as the `ValidationPipe` exception factory. The message lists every
   * failed constraint; context maps each property to its messages.
   */
  static fromValidationErrors(errors: ValidationError[]): ValidationException {
    const fields: Record<string, string[]> = {};
    collectConstraints(errors, '', fields);

    const messages = Object.values(fields).flat();
    return new ValidationException(messages.length ? messages.join(', ') : 'Validation failed', undefined, {
      fields
    });
  }
}

function collectConstraints(errors: ValidationError[], prefix: string, into: Record<string, string[]>): void {
  for (const error of errors) {
    const path = prefix ? `${prefix}.${error.property}` : error.property;
    if (error.constraints) {
      into[path] = Object.values(error.constraints);
    }
    if (error.children?.length) {
      collectConstraints(error.children, path, into);
    }
  }
}
