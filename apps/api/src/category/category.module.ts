import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';

import { CategoryController } from './category.controller';
import { Category } from './category.entity';
import { CategoryRepository } from './category.repository';
import { CategoryService } from './category.service';
import { TypeOrmCategoryRepository } from './typeorm-category.repository';

@Module({
  imports: [TypeOrmModule.forFeature([Category])],
  providers: [CategoryService, { provide: CategoryRepository, useClass: TypeOrmCategoryRepository }],
  controllers: [CategoryController],
  exports: [CategoryService]
})
export class CategoryModule {}
