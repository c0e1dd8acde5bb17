import { Injectable, Logger } from '@nestjs/common';

import { toCategoryDto, toCategoryEntity, toCategoryResponse } from './category.mapper';
import { CategoryRepository } from './category.repository';
import { CategoryDto, CategoryResponseDto, CreateCategoryDto } from './dto';

import { CategoryAlreadyExistsException, CategoryNotFoundException } from '../common/exceptions';

@Injectable()
export class CategoryService {
  private readonly logger = new Logger(CategoryService.name);

  constructor(private readonly category: CategoryRepository) {}

  async createCategory(dto: CreateCategoryDto): Promise<CategoryDto> {
    const name = dto.name.trim();
    if (await this.category.exists(name)) throw new CategoryAlreadyExistsException(name);

    const saved = await this.category.save(toCategoryEntity(dto));
    this.logger.log(`Created category ${saved.id} (${saved.name})`);
    return toCategoryDto(saved);
  }

  async getCategoryById(categoryId: number): Promise<CategoryResponseDto> {
    const category = await this.category.findById(categoryId);
    if (!category) throw new CategoryNotFoundException(categoryId);
    return toCategoryResponse(category);
  }

  async getCategories(): Promise<CategoryResponseDto[]> {
    const categories = await this.category.findAll();
    return categories.map(toCategoryResponse);
  }
}
