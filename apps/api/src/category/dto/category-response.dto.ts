import { ApiProperty } from '@nestjs/swagger';

import type { CategoryResponse } from '@storefront/api-interfaces';

export class CategoryResponseDto implements CategoryResponse {
  @ApiProperty({
    description: 'Unique identifier for the category',
    example: 1
  })
  id: number;

  @ApiProperty({
    description: 'Name of the category',
    example: 'Electronics'
  })
  name: string;

  @ApiProperty({
    description: 'Description of the category',
    example: 'Electronic devices and accessories',
    nullable: true,
    type: String
  })
  description: string | null;

  constructor(category: CategoryResponse) {
    this.id = category.id;
    this.name = category.name;
    this.description = category.description;
  }
}
