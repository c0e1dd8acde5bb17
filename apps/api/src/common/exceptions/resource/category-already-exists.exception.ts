import { ConflictException } from '../base/conflict.exception';
import { ErrorCode } from '../error-codes.enum';

/**
 * Thrown when creating a category whose name is already taken.
 */
export class CategoryAlreadyExistsException extends ConflictException {
  constructor(name: string) {
    super('Category already exists', ErrorCode.CONFLICT_CATEGORY_EXISTS, { name });
  }
}
