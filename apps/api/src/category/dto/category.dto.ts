import { ApiProperty } from '@nestjs/swagger';

import type { CategoryDto as CategoryDtoShape } from '@storefront/api-interfaces';

/**
 * Echo of a created category, returned by `POST /categories`.
 */
export class CategoryDto implements CategoryDtoShape {
  @ApiProperty({ description: 'Name of the category', example: 'Electronics' })
  name: string;

  @ApiProperty({
    description: 'Description of the category',
    example: 'Electronic devices and accessories',
    nullable: true,
    type: String
  })
  description: string | null;

  constructor(category: CategoryDtoShape) {
    this.name = category.name;
    this.description = category.description ?? null;
  }
}
