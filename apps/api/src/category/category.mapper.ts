import type { CategoryDto as CategoryDtoShape } from '@storefront/api-interfaces';

import { Category } from './category.entity';
import { CategoryDto, CategoryResponseDto } from './dto';

/**
 * Field-by-field conversions between the persisted entity and the API shapes.
 * Absent descriptions are stored and returned as `null`.
 */
export function toCategoryEntity(dto: CategoryDtoShape): Category {
  return new Category({
    name: dto.name.trim(),
    description: dto.description ?? null
  });
}

export function toCategoryDto(category: Category): CategoryDto {
  return new CategoryDto({
    name: category.name,
    description: category.description
  });
}

export function toCategoryResponse(category: Category): CategoryResponseDto {
  return new CategoryResponseDto({
    id: category.id,
    name: category.name,
    description: category.description
  });
}
