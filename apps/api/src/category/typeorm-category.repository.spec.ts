import { Test, TestingModule } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';

import { QueryFailedError } from 'typeorm';

import { CATEGORY_NAME_CONSTRAINT, Category } from './category.entity';
import { TypeOrmCategoryRepository } from './typeorm-category.repository';

import { CategoryAlreadyExistsException } from '../common/exceptions';

const uniqueViolation = (constraint: string) =>
  new QueryFailedError(
    'INSERT INTO "category"("name", "description") VALUES ($1, $2)',
    ['Electronics', null],
    Object.assign(new Error('duplicate key value violates unique constraint'), { code: '23505', constraint })
  );

describe('TypeOrmCategoryRepository', () => {
  let repository: TypeOrmCategoryRepository;
  let typeorm: { existsBy: jest.Mock; save: jest.Mock; findOneBy: jest.Mock; find: jest.Mock };

  beforeEach(async () => {
    typeorm = {
      existsBy: jest.fn(),
      save: jest.fn(),
      findOneBy: jest.fn(),
      find: jest.fn()
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [TypeOrmCategoryRepository, { provide: getRepositoryToken(Category), useValue: typeorm }]
    }).compile();

    repository = module.get(TypeOrmCategoryRepository);
  });

  it('should check existence by exact name', async () => {
    typeorm.existsBy.mockResolvedValue(true);

    await expect(repository.exists('Electronics')).resolves.toBe(true);
    expect(typeorm.existsBy).toHaveBeenCalledWith({ name: 'Electronics' });
  });

  it('should resolve with the saved entity', async () => {
    const entity = new Category({ name: 'Electronics', description: null });
    const saved = new Category({ ...entity, id: 1 });
    typeorm.save.mockResolvedValue(saved);

    await expect(repository.save(entity)).resolves.toBe(saved);
    expect(typeorm.save).toHaveBeenCalledWith(entity);
  });

  it('should turn a name constraint violation into a conflict', async () => {
    typeorm.save.mockRejectedValue(uniqueViolation(CATEGORY_NAME_CONSTRAINT));

    const error = await repository.save(new Category({ name: 'Electronics', description: null })).catch((e) => e);

    expect(error).toBeInstanceOf(CategoryAlreadyExistsException);
    expect(error.context).toEqual({ name: 'Electronics' });
  });

  it('should rethrow any other storage failure unchanged', async () => {
    const failure = uniqueViolation('UQ_some_other_index');
    typeorm.save.mockRejectedValue(failure);

    await expect(repository.save(new Category({ name: 'Electronics', description: null }))).rejects.toBe(failure);
  });

  it('should find by id', async () => {
    typeorm.findOneBy.mockResolvedValue(null);

    await expect(repository.findById(999)).resolves.toBeNull();
    expect(typeorm.findOneBy).toHaveBeenCalledWith({ id: 999 });
  });

  it('should list categories ordered by name', async () => {
    typeorm.find.mockResolvedValue([]);

    await expect(repository.findAll()).resolves.toEqual([]);
    expect(typeorm.find).toHaveBeenCalledWith({ order: { name: 'ASC' } });
  });
});
