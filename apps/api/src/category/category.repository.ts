import { Category } from './category.entity';

/**
 * Persistence capability the category service depends on. Also used as the
 * injection token; `CategoryModule` binds it to the TypeORM implementation.
 */
export abstract class CategoryRepository {
  abstract exists(name: string): Promise<boolean>;

  /**
   * Inserts a new category and resolves with it, `id` assigned.
   * Rejects with `CategoryAlreadyExistsException` when the name is taken.
   */
  abstract save(category: Category): Promise<Category>;

  abstract findById(id: number): Promise<Category | null>;

  abstract findAll(): Promise<Category[]>;
}
