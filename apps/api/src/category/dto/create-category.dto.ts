import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';

import { Transform } from 'class-transformer';
import { IsNotEmpty, IsOptional, IsString, MaxLength } from 'class-validator';

import type { CategoryDto } from '@storefront/api-interfaces';

const trim = ({ value }: { value: unknown }) => (typeof value === 'string' ? value.trim() : value);

export class CreateCategoryDto implements CategoryDto {
  // Constraints run bottom-up; with stopAtFirstError the nearest one is reported
  @Transform(trim)
  @ApiProperty({ example: 'Electronics', description: 'Unique category name', maxLength: 100, required: true })
  @MaxLength(100, { message: 'Category name must be at most 100 characters' })
  @IsString()
  @IsNotEmpty({ message: 'Category name is required' })
  name!: string;

  @ApiPropertyOptional({
    example: 'Electronic devices and accessories',
    description: 'Free-text description',
    maxLength: 500
  })
  @MaxLength(500, { message: 'Category description must be at most 500 characters' })
  @IsString()
  @IsOptional()
  description?: string;
}
