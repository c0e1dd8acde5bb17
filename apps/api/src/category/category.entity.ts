import { ApiProperty } from '@nestjs/swagger';
import { Column, CreateDateColumn, Entity, PrimaryGeneratedColumn, Unique, UpdateDateColumn } from 'typeorm';

import type { Category as CategoryShape } from '@storefront/api-interfaces';

export const CATEGORY_NAME_CONSTRAINT = 'UQ_category_name';

@Entity()
@Unique(CATEGORY_NAME_CONSTRAINT, ['name'])
export class Category implements CategoryShape {
  @PrimaryGeneratedColumn()
  @ApiProperty({
    description: 'Unique identifier for the category',
    example: 1
  })
  id!: number;

  @Column({ type: 'varchar', length: 100 })
  @ApiProperty({
    description: 'Unique name of the category',
    example: 'Electronics'
  })
  name!: string;

  @Column({ type: 'text', nullable: true })
  @ApiProperty({
    description: 'Optional description of the category',
    example: 'Electronic devices and accessories',
    nullable: true,
    type: String
  })
  description!: string | null;

  @CreateDateColumn({
    type: 'timestamptz',
    default: () => 'CURRENT_TIMESTAMP'
  })
  @ApiProperty({
    description: 'Timestamp when the category was created',
    example: '2024-04-23T18:25:43.511Z',
    type: 'string',
    format: 'date-time'
  })
  createdAt!: Date;

  @UpdateDateColumn({
    type: 'timestamptz',
    default: () => 'CURRENT_TIMESTAMP'
  })
  @ApiProperty({
    description: 'Timestamp when the category was last updated',
    example: '2024-04-23T18:25:43.511Z',
    type: 'string',
    format: 'date-time'
  })
  updatedAt!: Date;

  constructor(partial: Partial<Category> = {}) {
    Object.assign(this, partial);
  }
}
