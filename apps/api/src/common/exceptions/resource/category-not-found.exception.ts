import { NotFoundException } from '../base/not-found.exception';
import { ErrorCode } from '../error-codes.enum';

/**
 * Thrown when no category has the requested id.
 */
export class CategoryNotFoundException extends NotFoundException {
  constructor(id: number | string) {
    super(`Category not found with id: ${id}`, ErrorCode.NOT_FOUND_CATEGORY, { id });
  }
}
