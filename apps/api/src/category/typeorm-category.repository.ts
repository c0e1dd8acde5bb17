import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';

import { Repository } from 'typeorm';

import { CATEGORY_NAME_CONSTRAINT, Category } from './category.entity';
import { CategoryRepository } from './category.repository';

import { CategoryAlreadyExistsException } from '../common/exceptions';
import { isUniqueConstraintViolation } from '../shared/error.util';

@Injectable()
export class TypeOrmCategoryRepository extends CategoryRepository {
  constructor(@InjectRepository(Category) private readonly category: Repository<Category>) {
    super();
  }

  async exists(name: string): Promise<boolean> {
    return await this.category.existsBy({ name });
  }

  async save(category: Category): Promise<Category> {
    try {
      return await this.category.save(category);
    } catch (error: unknown) {
      // Two concurrent creates can both pass the existence check; the constraint decides
      if (isUniqueConstraintViolation(error, CATEGORY_NAME_CONSTRAINT)) {
        throw new CategoryAlreadyExistsException(category.name);
      }
      throw error;
    }
  }

  async findById(id: number): Promise<Category | null> {
    return await this.category.findOneBy({ id });
  }

  async findAll(): Promise<Category[]> {
    return await this.category.find({ order: { name: 'ASC' } });
  }
}
