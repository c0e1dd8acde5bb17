import { ValidationError } from 'class-validator';

import { ValidationException } from './validation.exception';

import { ErrorCode } from '../error-codes.enum';

const validationError = (fields: Partial<ValidationError>): ValidationError =>
  Object.assign(new ValidationError(), { children: [], ...fields });

describe('ValidationException', () => {
  it('should be a 400 with the invalid-input code by default', () => {
    const exception = new ValidationException('Bad input');

    expect(exception.getStatus()).toBe(400);
    expect(exception.code).toBe(ErrorCode.VALIDATION_INVALID_INPUT);
    expect(exception.message).toBe('Bad input');
  });

  describe('fromValidationErrors', () => {
    it('should join every constraint message and map them per property', () => {
      const exception = ValidationException.fromValidationErrors([
        validationError({ property: 'name', constraints: { isNotEmpty: 'Category name is required' } }),
        validationError({ property: 'description', constraints: { isString: 'description must be a string' } })
      ]);

      expect(exception.message).toBe('Category name is required, description must be a string');
      expect(exception.context).toEqual({
        fields: {
          name: ['Category name is required'],
          description: ['description must be a string']
        }
      });
    });

    it('should address nested properties with a dotted path', () => {
      const exception = ValidationException.fromValidationErrors([
        validationError({
          property: 'meta',
          children: [validationError({ property: 'label', constraints: { isString: 'label must be a string' } })]
        })
      ]);

      expect(exception.context).toEqual({ fields: { 'meta.label': ['label must be a string'] } });
    });

    it('should fall back to a generic message when no constraint is reported', () => {
      const exception = ValidationException.fromValidationErrors([]);

      expect(exception.message).toBe('Validation failed');
    });
  });
});
